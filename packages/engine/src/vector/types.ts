import type { SparseVector } from '../embedding/interface.js';
import type { FilterExpr } from './expr.js';

export type DistanceMetric = 'cosine' | 'dot' | 'l2';

export type FieldValue = string | number | boolean | null;
export type Fields = Record<string, FieldValue>;

/** A record as callers hand it to `upsert`. A missing id gets a generated UUIDv7. */
export interface VectorRecord {
  id?: string;
  vector?: number[];
  sparseVector?: SparseVector;
  fields: Fields;
}

export interface StoredRecord {
  id: string;
  vector?: number[];
  sparseVector?: SparseVector;
  fields: Fields;
}

export interface QueryRequest {
  /** Dense query vector. At most one of `vector` and `sparseVector` may be set. */
  vector?: number[];
  sparseVector?: SparseVector;
  filter?: FilterExpr;
  topK: number;
  signal?: AbortSignal;
}

export interface QueryHit {
  id: string;
  /** Higher is better for every metric; l2 distances are mapped to 1 / (1 + d). */
  score: number;
  fields: Fields;
}

export interface AggregateSpec {
  /** Count records per distinct value of this field. */
  groupBy?: string;
  limit?: number;
}

export interface AggregateGroup {
  value: FieldValue;
  count: number;
}

export interface AggregateResult {
  count: number;
  groups: AggregateGroup[];
}

export interface RemoteCollectionInfo {
  name: string;
  dimension: number;
  distance: DistanceMetric;
  sparse: boolean;
  count?: number;
}

export interface CollectionHandle {
  readonly name: string;
  readonly dimension: number;
  readonly distance: DistanceMetric;
  readonly sparse: boolean;
  /** True when this adapter created the collection, false when it found it. */
  readonly created: boolean;
}

export interface IndexMeta {
  indexType: 'flat' | 'flat_hybrid';
  indexName: string;
  distance: DistanceMetric;
  enableSparse: boolean;
  sparseWeight: number;
  scalarIndexFields: string[];
}

export interface AdapterOptions {
  collection: string;
  distance: DistanceMetric;
  sparseWeight: number;
  indexName: string;
  batchSize: number;
  timeoutMs: number;
  retries: number;
}

export interface WriteOptions {
  signal?: AbortSignal;
}

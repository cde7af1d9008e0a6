import type { DistanceMetric, FieldValue } from './types.js';

export type ScalarType = 'string' | 'int64' | 'float' | 'bool' | 'date_time';

export interface ScalarFieldSpec {
  name: string;
  type: ScalarType;
  /** Build a scalar index (payload index, inverted index) for filtering. */
  indexed: boolean;
  maxLength?: number;
  default?: FieldValue;
}

export interface CollectionSchema {
  name: string;
  dimension: number;
  distance: DistanceMetric;
  /** Carry a sparse vector field next to the dense one. */
  sparse: boolean;
  sparseWeight: number;
  fields: ScalarFieldSpec[];
}

/** Scalar fields of every context record; `date_time` fields hold epoch milliseconds. */
export const CONTEXT_FIELDS: readonly ScalarFieldSpec[] = Object.freeze([
  { name: 'uri', type: 'string', indexed: true, maxLength: 1024, default: '' },
  { name: 'parent_uri', type: 'string', indexed: true, maxLength: 1024, default: '' },
  { name: 'resource_id', type: 'string', indexed: true, maxLength: 64, default: '' },
  { name: 'workspace_id', type: 'string', indexed: true, maxLength: 128, default: '' },
  { name: 'agent_id', type: 'string', indexed: true, maxLength: 128, default: '' },
  { name: 'level', type: 'int64', indexed: true, default: 0 },
  { name: 'context_type', type: 'string', indexed: true, maxLength: 32, default: 'text' },
  { name: 'mime_type', type: 'string', indexed: false, maxLength: 128, default: '' },
  { name: 'title', type: 'string', indexed: false, maxLength: 512, default: '' },
  { name: 'abstract', type: 'string', indexed: false, maxLength: 4096, default: '' },
  { name: 'content', type: 'string', indexed: false, maxLength: 65535, default: '' },
  { name: 'content_hash', type: 'string', indexed: false, maxLength: 64, default: '' },
  { name: 'model_signature', type: 'string', indexed: false, maxLength: 256, default: '' },
  { name: 'created_at', type: 'date_time', indexed: true, default: 0 },
  { name: 'updated_at', type: 'date_time', indexed: true, default: 0 },
]);

export function contextCollectionSchema(
  name: string,
  dimension: number,
  distance: DistanceMetric,
  sparseWeight: number,
): CollectionSchema {
  return {
    name,
    dimension,
    distance,
    sparse: sparseWeight > 0,
    sparseWeight,
    fields: CONTEXT_FIELDS.map(f => ({ ...f })),
  };
}

import {
  BackendError,
  CollectionNotFoundError,
  DimensionMismatchError,
  PartialBatchFailureError,
  StrataError,
  ValidationError,
  abortError,
  type BatchOutcome,
} from '../errors.js';
import type { SparseVector } from '../embedding/interface.js';
import { generateId } from '../utils/helpers.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { compileFilter, type CompiledFilter, type FilterVisitor } from './compiler.js';
import type { FilterExpr } from './expr.js';
import type { CollectionSchema, ScalarFieldSpec } from './schema.js';
import type {
  AdapterOptions,
  AggregateGroup,
  AggregateResult,
  AggregateSpec,
  CollectionHandle,
  IndexMeta,
  QueryHit,
  QueryRequest,
  RemoteCollectionInfo,
  StoredRecord,
  VectorRecord,
  WriteOptions,
} from './types.js';

export type AdapterState = 'unbound' | 'binding' | 'creating' | 'bound' | 'closed';

/** Query handed to a backend after validation and filter compilation. */
export interface NativeQuery<TFilter> {
  vector?: number[];
  sparseVector?: SparseVector;
  filter?: TFilter;
  topK: number;
  signal?: AbortSignal;
}

const FIELD_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

function toStrataError(backend: string, e: unknown): StrataError {
  if (e instanceof StrataError) return e;
  return new BackendError(backend, e instanceof Error ? e.message : String(e), undefined, { cause: e });
}

function compareHits(a: QueryHit, b: QueryHit): number {
  if (b.score !== a.score) return b.score - a.score;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

function compareGroups(a: AggregateGroup, b: AggregateGroup): number {
  if (b.count !== a.count) return b.count - a.count;
  const av = String(a.value);
  const bv = String(b.value);
  return av < bv ? -1 : av > bv ? 1 : 0;
}

/** What callers see of a bound collection, whichever backend holds it. */
export interface VectorCollection {
  readonly backend: string;
  readonly state: AdapterState;
  readonly collectionName: string;
  ensureCollection(schema: CollectionSchema): Promise<CollectionHandle>;
  loadExisting(): Promise<CollectionHandle | null>;
  collectionExists(): Promise<boolean>;
  getCollectionInfo(): Promise<RemoteCollectionInfo | null>;
  dropCollection(): Promise<void>;
  close(): Promise<void>;
  upsert(record: VectorRecord, opts?: WriteOptions): Promise<string>;
  upsertBatch(records: VectorRecord[], opts?: WriteOptions): Promise<BatchOutcome[]>;
  get(id: string): Promise<StoredRecord | null>;
  getMany(ids: string[]): Promise<StoredRecord[]>;
  delete(id: string, opts?: WriteOptions): Promise<void>;
  deleteMany(ids: string[], opts?: WriteOptions): Promise<BatchOutcome[]>;
  deleteByFilter(filter: FilterExpr): Promise<void>;
  count(filter?: FilterExpr): Promise<number>;
  query(request: QueryRequest): Promise<QueryHit[]>;
  aggregate(filter: FilterExpr | undefined, spec?: AggregateSpec): Promise<AggregateResult>;
}

/**
 * Lifecycle, validation and batching shared by every vector store backend. Subclasses
 * implement the remote hooks; callers only ever see this contract.
 *
 * unbound → binding → bound, or unbound → binding → creating → bound. Concurrent first
 * calls share one in-flight bind, so a collection is checked and created at most once
 * per adapter. `bound` lasts until the adapter is closed or its collection dropped.
 */
export abstract class CollectionAdapter<TFilter> implements VectorCollection {
  abstract readonly backend: string;
  protected abstract readonly filterVisitor: FilterVisitor<TFilter>;

  protected readonly log: Logger;
  private stateValue: AdapterState = 'unbound';
  private handle?: CollectionHandle;
  private pending?: Promise<CollectionHandle>;

  constructor(protected readonly options: AdapterOptions) {
    if (!FIELD_RE.test(options.collection)) {
      throw new ValidationError(`Invalid collection name: ${JSON.stringify(options.collection)}`);
    }
    this.log = createLogger('vector').child({ collection: options.collection });
  }

  get state(): AdapterState {
    return this.stateValue;
  }

  get collectionName(): string {
    return this.options.collection;
  }

  // ── Remote hooks ────────────────────────────────────────────────────────────

  /** Current remote description, or null when the collection does not exist. */
  protected abstract describeRemote(signal?: AbortSignal): Promise<RemoteCollectionInfo | null>;
  protected abstract createRemote(schema: CollectionSchema, indexMeta: IndexMeta): Promise<void>;
  protected abstract dropRemote(): Promise<void>;
  protected abstract writeRecords(records: StoredRecord[], signal?: AbortSignal): Promise<void>;
  protected abstract fetchRecords(ids: string[]): Promise<StoredRecord[]>;
  protected abstract removeRecords(ids: string[], signal?: AbortSignal): Promise<void>;
  /** `undefined` filter means every record. */
  protected abstract removeByFilter(filter: TFilter | undefined): Promise<void>;
  protected abstract countNative(filter: TFilter | undefined): Promise<number>;
  protected abstract searchNative(query: NativeQuery<TFilter>): Promise<QueryHit[]>;
  protected abstract aggregateNative(field: string, filter: TFilter | undefined, limit: number): Promise<AggregateGroup[]>;

  /** Restrict the scalar fields that get a remote index. Default keeps them all. */
  protected sanitizeScalarIndexFields(fields: ScalarFieldSpec[]): ScalarFieldSpec[] {
    return fields;
  }

  protected buildDefaultIndexMeta(schema: CollectionSchema): IndexMeta {
    return {
      indexType: schema.sparse ? 'flat_hybrid' : 'flat',
      indexName: this.options.indexName,
      distance: schema.distance,
      enableSparse: schema.sparse,
      sparseWeight: schema.sparseWeight,
      scalarIndexFields: [],
    };
  }

  /** Undo backend storage quirks on records read back. Default is passthrough. */
  protected normalizeRecordForRead(record: StoredRecord): StoredRecord {
    return record;
  }

  protected async closeResources(): Promise<void> {
    return undefined;
  }

  // ── Lifecycle ───────────────────────────────────────────────────────────────

  /**
   * Bind to the collection, creating it from `schema` when it does not exist. Repeated
   * and concurrent calls resolve to the same handle.
   */
  async ensureCollection(schema: CollectionSchema): Promise<CollectionHandle> {
    this.assertOpen();
    if (schema.name !== this.options.collection) {
      throw new ValidationError(`Schema ${schema.name} does not match adapter collection ${this.options.collection}`);
    }
    const badField = schema.fields.find(f => !FIELD_RE.test(f.name));
    if (badField) throw new ValidationError(`Invalid schema field name: ${JSON.stringify(badField.name)}`);
    const handle = this.handle ?? (await this.bindOnce(schema));
    if (handle.dimension !== schema.dimension) {
      throw new DimensionMismatchError(handle.dimension, schema.dimension, `collection ${handle.name}`);
    }
    return handle;
  }

  /** Bind to an existing collection without creating one. */
  async loadExisting(): Promise<CollectionHandle | null> {
    this.assertOpen();
    if (this.handle) return this.handle;
    if (this.pending) return this.pending;
    const remote = await this.describeRemote();
    if (!remote) return null;
    return this.adopt(remote, false);
  }

  /** Remote existence check; never answered from the bound handle. */
  async collectionExists(): Promise<boolean> {
    this.assertOpen();
    return (await this.describeRemote()) !== null;
  }

  async getCollectionInfo(): Promise<RemoteCollectionInfo | null> {
    this.assertOpen();
    return this.describeRemote();
  }

  async dropCollection(): Promise<void> {
    this.assertOpen();
    await this.dropRemote();
    this.log.info('Collection dropped');
    this.handle = undefined;
    this.pending = undefined;
    this.stateValue = 'closed';
    await this.closeResources();
  }

  async close(): Promise<void> {
    if (this.stateValue === 'closed') return;
    this.stateValue = 'closed';
    this.handle = undefined;
    this.pending = undefined;
    await this.closeResources();
  }

  private bindOnce(schema: CollectionSchema): Promise<CollectionHandle> {
    this.pending ??= this.bind(schema).catch((e: unknown) => {
      this.pending = undefined;
      if (this.stateValue !== 'closed') this.stateValue = 'unbound';
      throw e;
    });
    return this.pending;
  }

  private async bind(schema: CollectionSchema): Promise<CollectionHandle> {
    this.stateValue = 'binding';
    const remote = await this.describeRemote();
    if (remote) {
      if (remote.dimension !== schema.dimension) {
        throw new DimensionMismatchError(remote.dimension, schema.dimension, `existing collection ${remote.name}`);
      }
      return this.adopt(remote, false);
    }

    this.stateValue = 'creating';
    const indexed = this.sanitizeScalarIndexFields(schema.fields.filter(f => f.indexed));
    const indexMeta: IndexMeta = {
      ...this.buildDefaultIndexMeta(schema),
      scalarIndexFields: indexed.map(f => f.name),
    };
    await this.createRemote(schema, indexMeta);
    this.log.info({ dimension: schema.dimension, distance: schema.distance, sparse: schema.sparse }, 'Collection created');
    return this.adopt(
      { name: schema.name, dimension: schema.dimension, distance: schema.distance, sparse: schema.sparse },
      true,
    );
  }

  private adopt(info: RemoteCollectionInfo, created: boolean): CollectionHandle {
    if (this.stateValue === 'closed') throw new CollectionNotFoundError(this.options.collection);
    if (!this.handle) {
      this.handle = Object.freeze({
        name: info.name,
        dimension: info.dimension,
        distance: info.distance,
        sparse: info.sparse,
        created,
      });
      if (!created) this.log.info({ dimension: info.dimension }, 'Collection loaded');
    }
    this.stateValue = 'bound';
    return this.handle;
  }

  private assertOpen(): void {
    if (this.stateValue === 'closed') {
      throw new CollectionNotFoundError(this.options.collection);
    }
  }

  private async bound(): Promise<CollectionHandle> {
    const handle = this.handle ?? (await this.loadExisting());
    if (!handle) throw new CollectionNotFoundError(this.options.collection);
    return handle;
  }

  // ── Records ─────────────────────────────────────────────────────────────────

  compileFilter(filter: FilterExpr | undefined): CompiledFilter<TFilter> {
    return compileFilter(filter, this.filterVisitor);
  }

  private prepare(record: VectorRecord & { id: string }, handle: CollectionHandle): StoredRecord {
    const { id } = record;
    if (!record.vector) throw new ValidationError(`Record ${id} has no dense vector`);
    if (record.vector.length !== handle.dimension) {
      throw new DimensionMismatchError(handle.dimension, record.vector.length, `record ${id}`);
    }
    if (record.sparseVector && !handle.sparse) {
      throw new ValidationError(`Collection ${handle.name} has no sparse vector field (record ${id})`);
    }
    for (const key of Object.keys(record.fields)) {
      if (!FIELD_RE.test(key)) throw new ValidationError(`Invalid field name on record ${id}: ${JSON.stringify(key)}`);
    }
    return { id, vector: record.vector, sparseVector: record.sparseVector, fields: { ...record.fields } };
  }

  /** Write one record; any failure is thrown. Returns the record id. */
  async upsert(record: VectorRecord, opts: WriteOptions = {}): Promise<string> {
    const [outcome] = await this.upsertBatch([record], opts);
    if (!outcome) throw new ValidationError('Nothing to upsert');
    if (outcome.ok) return outcome.id;
    if ('error' in outcome) throw outcome.error;
    throw opts.signal ? abortError(opts.signal) : new PartialBatchFailureError([outcome]);
  }

  /**
   * Best-effort batch write. Returns one outcome per input, in input order. Records
   * that were written stay written when others fail; after an abort the remaining
   * records are reported as abandoned.
   */
  async upsertBatch(records: VectorRecord[], opts: WriteOptions = {}): Promise<BatchOutcome[]> {
    this.assertOpen();
    const handle = await this.bound();
    const outcomes: BatchOutcome[] = [];
    const valid: { index: number; record: StoredRecord }[] = [];

    records.forEach((record, index) => {
      const id = record.id ?? generateId();
      try {
        valid.push({ index, record: this.prepare({ ...record, id }, handle) });
        outcomes.push({ id, ok: true });
      } catch (e) {
        outcomes.push({ id, ok: false, error: toStrataError(this.backend, e) });
      }
    });

    await this.runBatches(
      valid.map(v => ({ index: v.index, id: v.record.id, item: v.record })),
      outcomes,
      (items, signal) => this.writeRecords(items, signal),
      opts.signal,
      'upsert',
    );
    return outcomes;
  }

  async get(id: string): Promise<StoredRecord | null> {
    const [record] = await this.getMany([id]);
    return record ?? null;
  }

  /** Records for the ids that exist, in the order of `ids`. */
  async getMany(ids: string[]): Promise<StoredRecord[]> {
    this.assertOpen();
    await this.bound();
    if (ids.length === 0) return [];
    const found = new Map((await this.fetchRecords(ids)).map(r => [r.id, r]));
    const out: StoredRecord[] = [];
    for (const id of ids) {
      const record = found.get(id);
      if (record) out.push(this.normalizeRecordForRead(record));
    }
    return out;
  }

  async delete(id: string, opts: WriteOptions = {}): Promise<void> {
    const [outcome] = await this.deleteMany([id], opts);
    if (outcome && !outcome.ok) {
      if ('error' in outcome) throw outcome.error;
      throw opts.signal ? abortError(opts.signal) : new PartialBatchFailureError([outcome]);
    }
  }

  /** Best-effort batch delete with the same per-id reporting as `upsertBatch`. */
  async deleteMany(ids: string[], opts: WriteOptions = {}): Promise<BatchOutcome[]> {
    this.assertOpen();
    await this.bound();
    const outcomes: BatchOutcome[] = ids.map(id => ({ id, ok: true }));
    await this.runBatches(
      ids.map((id, index) => ({ index, id, item: id })),
      outcomes,
      (items, signal) => this.removeRecords(items, signal),
      opts.signal,
      'delete',
    );
    return outcomes;
  }

  async deleteByFilter(filter: FilterExpr): Promise<void> {
    this.assertOpen();
    await this.bound();
    const compiled = this.compileFilter(filter);
    if (compiled.kind === 'none') return;
    await this.removeByFilter(compiled.kind === 'native' ? compiled.native : undefined);
  }

  async count(filter?: FilterExpr): Promise<number> {
    this.assertOpen();
    await this.bound();
    const compiled = this.compileFilter(filter);
    if (compiled.kind === 'none') return 0;
    return this.countNative(compiled.kind === 'native' ? compiled.native : undefined);
  }

  /**
   * Nearest records to the dense or sparse query vector, or a plain filtered scan
   * (score 0) when neither is given. Ordered by score, then id.
   */
  async query(request: QueryRequest): Promise<QueryHit[]> {
    this.assertOpen();
    const handle = await this.bound();
    if (!Number.isInteger(request.topK) || request.topK <= 0) {
      throw new ValidationError(`topK must be a positive integer, got ${request.topK}`);
    }
    if (request.vector && request.sparseVector) {
      throw new ValidationError('Query takes either a dense or a sparse vector, not both');
    }
    if (request.vector && request.vector.length !== handle.dimension) {
      throw new DimensionMismatchError(handle.dimension, request.vector.length, 'query vector');
    }
    if (request.sparseVector && !handle.sparse) {
      throw new ValidationError(`Collection ${handle.name} has no sparse vector field`);
    }

    const compiled = this.compileFilter(request.filter);
    if (compiled.kind === 'none') return [];
    if (request.signal?.aborted) throw abortError(request.signal);

    const hits = await this.searchNative({
      vector: request.vector,
      sparseVector: request.sparseVector,
      filter: compiled.kind === 'native' ? compiled.native : undefined,
      topK: request.topK,
      signal: request.signal,
    });
    return hits
      .map(hit => ({ ...hit, fields: this.normalizeRecordForRead({ id: hit.id, fields: hit.fields }).fields }))
      .sort(compareHits)
      .slice(0, request.topK);
  }

  async aggregate(filter: FilterExpr | undefined, spec: AggregateSpec = {}): Promise<AggregateResult> {
    this.assertOpen();
    await this.bound();
    if (spec.groupBy !== undefined && !FIELD_RE.test(spec.groupBy)) {
      throw new ValidationError(`Invalid groupBy field: ${JSON.stringify(spec.groupBy)}`);
    }
    const compiled = this.compileFilter(filter);
    if (compiled.kind === 'none') return { count: 0, groups: [] };
    const native = compiled.kind === 'native' ? compiled.native : undefined;
    const count = await this.countNative(native);
    if (spec.groupBy === undefined) return { count, groups: [] };
    const groups = await this.aggregateNative(spec.groupBy, native, spec.limit ?? 100);
    return { count, groups: [...groups].sort(compareGroups) };
  }

  /**
   * Write `entries` in chunks of `batchSize`. A failed chunk is retried record by
   * record so one bad record does not fail its neighbours.
   */
  private async runBatches<T>(
    entries: { index: number; id: string; item: T }[],
    outcomes: BatchOutcome[],
    op: (items: T[], signal?: AbortSignal) => Promise<void>,
    signal: AbortSignal | undefined,
    action: string,
  ): Promise<void> {
    const size = Math.max(1, this.options.batchSize);
    const abandon = (from: number) => {
      for (const entry of entries.slice(from)) {
        outcomes[entry.index] = { id: entry.id, ok: false, abandoned: true };
      }
    };

    for (let start = 0; start < entries.length; start += size) {
      if (signal?.aborted) {
        abandon(start);
        this.log.warn({ action, abandoned: entries.length - start }, 'Batch abandoned on cancellation');
        return;
      }
      const chunk = entries.slice(start, start + size);
      try {
        await op(chunk.map(e => e.item), signal);
        continue;
      } catch (e) {
        if (signal?.aborted) {
          abandon(start);
          this.log.warn({ action, abandoned: entries.length - start }, 'Batch abandoned on cancellation');
          return;
        }
        if (chunk.length === 1) {
          const [only] = chunk;
          if (only) outcomes[only.index] = { id: only.id, ok: false, error: toStrataError(this.backend, e) };
          this.log.warn({ action, id: only?.id, error: e instanceof Error ? e.message : String(e) }, 'Record write failed');
          continue;
        }
        this.log.warn({ action, size: chunk.length, error: e instanceof Error ? e.message : String(e) }, 'Batch failed, isolating records');
      }

      for (const [offset, entry] of chunk.entries()) {
        if (signal?.aborted) {
          for (const rest of chunk.slice(offset)) outcomes[rest.index] = { id: rest.id, ok: false, abandoned: true };
          abandon(start + size);
          return;
        }
        try {
          await op([entry.item], signal);
        } catch (e) {
          outcomes[entry.index] = { id: entry.id, ok: false, error: toStrataError(this.backend, e) };
          this.log.warn({ action, id: entry.id, error: e instanceof Error ? e.message : String(e) }, 'Record write failed');
        }
      }
    }
  }
}

import { CollectionNotFoundError } from '../errors.js';
import type { FilterVisitor } from './compiler.js';
import { CollectionAdapter, type NativeQuery } from './adapter.js';
import { memoryFilterVisitor, type FieldPredicate } from './filters/memory.js';
import { similarity, sparseDot } from './math.js';
import type { CollectionSchema } from './schema.js';
import type {
  AdapterOptions,
  AggregateGroup,
  FieldValue,
  IndexMeta,
  QueryHit,
  RemoteCollectionInfo,
  StoredRecord,
} from './types.js';

interface MemoryCollection {
  info: RemoteCollectionInfo;
  indexMeta: IndexMeta;
  records: Map<string, StoredRecord>;
}

function clone(record: StoredRecord): StoredRecord {
  return {
    id: record.id,
    vector: record.vector ? [...record.vector] : undefined,
    sparseVector: record.sparseVector ? { ...record.sparseVector } : undefined,
    fields: { ...record.fields },
  };
}

/**
 * Process-local stand-in for a vector database server. Several adapters can share one
 * store the way several clients share one server.
 */
export class MemoryVectorStore {
  private readonly collections = new Map<string, MemoryCollection>();

  describe(name: string): RemoteCollectionInfo | null {
    const c = this.collections.get(name);
    return c ? { ...c.info, count: c.records.size } : null;
  }

  createCollection(schema: CollectionSchema, indexMeta: IndexMeta): void {
    if (this.collections.has(schema.name)) return;
    this.collections.set(schema.name, {
      info: { name: schema.name, dimension: schema.dimension, distance: schema.distance, sparse: schema.sparse },
      indexMeta,
      records: new Map(),
    });
  }

  dropCollection(name: string): void {
    this.collections.delete(name);
  }

  indexMeta(name: string): IndexMeta | undefined {
    return this.collections.get(name)?.indexMeta;
  }

  records(name: string): Map<string, StoredRecord> {
    const c = this.collections.get(name);
    if (!c) throw new CollectionNotFoundError(name);
    return c.records;
  }

  collectionNames(): string[] {
    return [...this.collections.keys()].sort();
  }
}

export class MemoryCollectionAdapter extends CollectionAdapter<FieldPredicate> {
  readonly backend = 'memory';
  protected readonly filterVisitor: FilterVisitor<FieldPredicate> = memoryFilterVisitor;

  constructor(
    options: AdapterOptions,
    readonly store: MemoryVectorStore = new MemoryVectorStore(),
  ) {
    super(options);
  }

  private matching(filter: FieldPredicate | undefined): StoredRecord[] {
    const all = [...this.store.records(this.collectionName).values()];
    return filter ? all.filter(r => filter(r.fields)) : all;
  }

  protected async describeRemote(): Promise<RemoteCollectionInfo | null> {
    return this.store.describe(this.collectionName);
  }

  protected async createRemote(schema: CollectionSchema, indexMeta: IndexMeta): Promise<void> {
    this.store.createCollection(schema, indexMeta);
  }

  protected async dropRemote(): Promise<void> {
    this.store.dropCollection(this.collectionName);
  }

  protected async writeRecords(records: StoredRecord[]): Promise<void> {
    const target = this.store.records(this.collectionName);
    for (const record of records) target.set(record.id, clone(record));
  }

  protected async fetchRecords(ids: string[]): Promise<StoredRecord[]> {
    const source = this.store.records(this.collectionName);
    const out: StoredRecord[] = [];
    for (const id of ids) {
      const record = source.get(id);
      if (record) out.push(clone(record));
    }
    return out;
  }

  protected async removeRecords(ids: string[]): Promise<void> {
    const target = this.store.records(this.collectionName);
    for (const id of ids) target.delete(id);
  }

  protected async removeByFilter(filter: FieldPredicate | undefined): Promise<void> {
    const target = this.store.records(this.collectionName);
    for (const record of this.matching(filter)) target.delete(record.id);
  }

  protected async countNative(filter: FieldPredicate | undefined): Promise<number> {
    return this.matching(filter).length;
  }

  protected async searchNative(query: NativeQuery<FieldPredicate>): Promise<QueryHit[]> {
    const info = this.store.describe(this.collectionName);
    const metric = info?.distance ?? this.options.distance;
    return this.matching(query.filter).map(record => {
      let score = 0;
      if (query.vector && record.vector) score = similarity(metric, query.vector, record.vector);
      else if (query.sparseVector) score = record.sparseVector ? sparseDot(query.sparseVector, record.sparseVector) : 0;
      return { id: record.id, score, fields: { ...record.fields } };
    });
  }

  protected async aggregateNative(field: string, filter: FieldPredicate | undefined, limit: number): Promise<AggregateGroup[]> {
    const counts = new Map<FieldValue, number>();
    for (const record of this.matching(filter)) {
      const value = record.fields[field];
      if (value === undefined) continue;
      counts.set(value, (counts.get(value) ?? 0) + 1);
    }
    return [...counts.entries()]
      .map(([value, count]) => ({ value, count }))
      .sort((a, b) => b.count - a.count || String(a.value).localeCompare(String(b.value)))
      .slice(0, limit);
  }
}

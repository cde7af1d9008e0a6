import { describe, it, expect, vi, afterEach } from 'vitest';
import { MemoryCollectionAdapter, MemoryVectorStore } from '../src/vector/memory.js';
import { SqliteCollectionAdapter, openSqliteDatabase } from '../src/vector/sqlite.js';
import { Eq, In } from '../src/vector/expr.js';
import type { CollectionSchema } from '../src/vector/schema.js';
import type { AdapterOptions, StoredRecord } from '../src/vector/types.js';
import {
  CollectionNotFoundError,
  DimensionMismatchError,
  ValidationError,
} from '../src/errors.js';

const options: AdapterOptions = {
  collection: 'docs',
  distance: 'cosine',
  sparseWeight: 0,
  indexName: 'default',
  batchSize: 64,
  timeoutMs: 1000,
  retries: 0,
};

function schema(overrides: Partial<CollectionSchema> = {}): CollectionSchema {
  return {
    name: 'docs',
    dimension: 2,
    distance: 'cosine',
    sparse: false,
    sparseWeight: 0,
    fields: [
      { name: 'kind', type: 'string', indexed: true },
      { name: 'title', type: 'string', indexed: false },
    ],
    ...overrides,
  };
}

/** Memory adapter whose writes can be made to fail or to trigger a callback. */
class ScriptedAdapter extends MemoryCollectionAdapter {
  readonly failIds = new Set<string>();
  onWrite?: (ids: string[]) => void;
  readonly writes: string[][] = [];

  protected override async writeRecords(records: StoredRecord[]): Promise<void> {
    this.writes.push(records.map(r => r.id));
    if (records.some(r => this.failIds.has(r.id))) throw new Error('write rejected');
    await super.writeRecords(records);
    this.onWrite?.(records.map(r => r.id));
  }
}

describe('CollectionAdapter lifecycle', () => {
  it('creates the collection once for concurrent first calls', async () => {
    const store = new MemoryVectorStore();
    const create = vi.spyOn(store, 'createCollection');
    const adapter = new MemoryCollectionAdapter(options, store);

    const handles = await Promise.all(Array.from({ length: 5 }, () => adapter.ensureCollection(schema())));
    expect(create).toHaveBeenCalledTimes(1);
    expect(new Set(handles).size).toBe(1);
    expect(handles[0]).toMatchObject({ name: 'docs', dimension: 2, created: true });
    expect(adapter.state).toBe('bound');

    await adapter.ensureCollection(schema());
    expect(create).toHaveBeenCalledTimes(1);
  });

  it('binds to an existing collection without creating it', async () => {
    const store = new MemoryVectorStore();
    await new MemoryCollectionAdapter(options, store).ensureCollection(schema());
    const create = vi.spyOn(store, 'createCollection');

    const second = new MemoryCollectionAdapter(options, store);
    expect(second.state).toBe('unbound');
    expect(await second.ensureCollection(schema())).toMatchObject({ created: false });
    expect(create).not.toHaveBeenCalled();
  });

  it('refuses a schema whose dimension differs from the existing collection', async () => {
    const store = new MemoryVectorStore();
    await new MemoryCollectionAdapter(options, store).ensureCollection(schema());

    const other = new MemoryCollectionAdapter(options, store);
    await expect(other.ensureCollection(schema({ dimension: 3 }))).rejects.toBeInstanceOf(DimensionMismatchError);
    expect(other.state).toBe('unbound');
  });

  it('rejects a schema for another collection and invalid collection names', async () => {
    const adapter = new MemoryCollectionAdapter(options);
    await expect(adapter.ensureCollection(schema({ name: 'other' }))).rejects.toBeInstanceOf(ValidationError);
    expect(() => new MemoryCollectionAdapter({ ...options, collection: 'no spaces' })).toThrow(ValidationError);
  });

  it('reports a missing collection on reads before any bind', async () => {
    const adapter = new MemoryCollectionAdapter(options);
    expect(await adapter.collectionExists()).toBe(false);
    expect(await adapter.loadExisting()).toBeNull();
    await expect(adapter.count()).rejects.toBeInstanceOf(CollectionNotFoundError);
  });

  it('is closed after a drop', async () => {
    const store = new MemoryVectorStore();
    const adapter = new MemoryCollectionAdapter(options, store);
    await adapter.ensureCollection(schema());
    await adapter.dropCollection();

    expect(adapter.state).toBe('closed');
    expect(store.collectionNames()).toEqual([]);
    await expect(adapter.count()).rejects.toBeInstanceOf(CollectionNotFoundError);
    await expect(adapter.ensureCollection(schema())).rejects.toBeInstanceOf(CollectionNotFoundError);
  });

  it('describes the remote collection', async () => {
    const adapter = new MemoryCollectionAdapter(options);
    await adapter.ensureCollection(schema({ sparse: true, sparseWeight: 0.3 }));
    await adapter.upsert({ id: 'a', vector: [1, 0], fields: {} });
    expect(await adapter.getCollectionInfo()).toEqual({ name: 'docs', dimension: 2, distance: 'cosine', sparse: true, count: 1 });
    expect(adapter.store.indexMeta('docs')).toEqual({
      indexType: 'flat_hybrid',
      indexName: 'default',
      distance: 'cosine',
      enableSparse: true,
      sparseWeight: 0.3,
      scalarIndexFields: ['kind'],
    });
  });
});

describe('CollectionAdapter writes', () => {
  it('reports per-record outcomes and keeps the good records of a partial batch', async () => {
    const adapter = new MemoryCollectionAdapter(options);
    await adapter.ensureCollection(schema());

    const outcomes = await adapter.upsertBatch([
      { id: 'a', vector: [1, 0], fields: { kind: 'doc' } },
      { id: 'b', vector: [1, 0, 0], fields: { kind: 'doc' } },
      { id: 'c', vector: [0, 1], fields: { 'bad key': 1 } },
      { id: 'd', vector: [0, 1], fields: { kind: 'img' } },
    ]);

    expect(outcomes.map(o => [o.id, o.ok])).toEqual([['a', true], ['b', false], ['c', false], ['d', true]]);
    expect(outcomes[1]).toMatchObject({ error: { code: 'DIMENSION_MISMATCH' } });
    expect(outcomes[2]).toMatchObject({ error: { code: 'VALIDATION_ERROR' } });
    expect((await adapter.getMany(['d', 'b', 'a'])).map(r => r.id)).toEqual(['d', 'a']);
  });

  it('isolates a failing record inside a failed chunk', async () => {
    const adapter = new ScriptedAdapter({ ...options, batchSize: 2 });
    await adapter.ensureCollection(schema());
    adapter.failIds.add('bad');

    const outcomes = await adapter.upsertBatch([
      { id: 'a', vector: [1, 0], fields: {} },
      { id: 'bad', vector: [1, 0], fields: {} },
      { id: 'c', vector: [0, 1], fields: {} },
    ]);

    expect(adapter.writes).toEqual([['a', 'bad'], ['a'], ['bad'], ['c']]);
    expect(outcomes).toEqual([
      { id: 'a', ok: true },
      { id: 'bad', ok: false, error: expect.objectContaining({ code: 'BACKEND_ERROR', message: 'memory: write rejected' }) },
      { id: 'c', ok: true },
    ]);
    expect(await adapter.count()).toBe(2);
  });

  it('abandons the rest of a batch once cancelled', async () => {
    const adapter = new ScriptedAdapter({ ...options, batchSize: 1 });
    await adapter.ensureCollection(schema());
    const controller = new AbortController();
    adapter.onWrite = () => controller.abort();

    const outcomes = await adapter.upsertBatch(
      ['a', 'b', 'c'].map(id => ({ id, vector: [1, 0], fields: {} })),
      { signal: controller.signal },
    );

    expect(outcomes).toEqual([
      { id: 'a', ok: true },
      { id: 'b', ok: false, abandoned: true },
      { id: 'c', ok: false, abandoned: true },
    ]);
    expect(await adapter.count()).toBe(1);
  });

  it('generates time-ordered ids for records without one', async () => {
    const adapter = new MemoryCollectionAdapter(options);
    await adapter.ensureCollection(schema());
    const id = await adapter.upsert({ vector: [1, 0], fields: { kind: 'doc' } });
    expect(id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-7[0-9a-f]{3}-[0-9a-f]{4}-[0-9a-f]{12}$/);
    expect(await adapter.get(id)).toMatchObject({ id, fields: { kind: 'doc' } });
  });

  it('throws the failure of a single upsert', async () => {
    const adapter = new MemoryCollectionAdapter(options);
    await adapter.ensureCollection(schema());
    await expect(adapter.upsert({ id: 'x', vector: [1], fields: {} })).rejects.toBeInstanceOf(DimensionMismatchError);
    await expect(adapter.upsert({ id: 'y', fields: {} })).rejects.toBeInstanceOf(ValidationError);
  });

  it('deletes by id and by filter', async () => {
    const adapter = new MemoryCollectionAdapter(options);
    await adapter.ensureCollection(schema());
    await adapter.upsertBatch([
      { id: 'a', vector: [1, 0], fields: { kind: 'doc' } },
      { id: 'b', vector: [1, 0], fields: { kind: 'img' } },
      { id: 'c', vector: [1, 0], fields: { kind: 'img' } },
    ]);

    await adapter.delete('a');
    expect(await adapter.get('a')).toBeNull();
    await adapter.deleteByFilter(Eq('kind', 'img'));
    expect(await adapter.count()).toBe(0);
  });
});

describe('CollectionAdapter reads', () => {
  async function seeded(): Promise<MemoryCollectionAdapter> {
    const adapter = new MemoryCollectionAdapter(options);
    await adapter.ensureCollection(schema());
    await adapter.upsertBatch([
      { id: 'y', vector: [1, 0], fields: { kind: 'doc' } },
      { id: 'x', vector: [1, 0], fields: { kind: 'doc' } },
      { id: 'a', vector: [0, 1], fields: { kind: 'img' } },
    ]);
    return adapter;
  }

  it('orders hits by score, then id', async () => {
    const adapter = await seeded();
    const hits = await adapter.query({ vector: [1, 0], topK: 3 });
    expect(hits.map(h => [h.id, h.score])).toEqual([['x', 1], ['y', 1], ['a', 0]]);
    expect((await adapter.query({ vector: [1, 0], topK: 1 })).map(h => h.id)).toEqual(['x']);
  });

  it('validates queries', async () => {
    const adapter = await seeded();
    await expect(adapter.query({ vector: [1, 0], topK: 0 })).rejects.toBeInstanceOf(ValidationError);
    await expect(adapter.query({ vector: [1, 0, 0], topK: 1 })).rejects.toBeInstanceOf(DimensionMismatchError);
    await expect(adapter.query({ vector: [1, 0], sparseVector: { a: 1 }, topK: 1 })).rejects.toBeInstanceOf(ValidationError);
    await expect(adapter.query({ sparseVector: { a: 1 }, topK: 1 })).rejects.toBeInstanceOf(ValidationError);
  });

  it('counts and groups under a filter', async () => {
    const adapter = await seeded();
    expect(await adapter.aggregate(undefined, { groupBy: 'kind' })).toEqual({
      count: 3,
      groups: [{ value: 'doc', count: 2 }, { value: 'img', count: 1 }],
    });
    expect(await adapter.aggregate(In('kind', ['img']))).toEqual({ count: 1, groups: [] });
    expect(await adapter.aggregate(In('kind', []), { groupBy: 'kind' })).toEqual({ count: 0, groups: [] });
  });

  it('scores sparse queries by term overlap', async () => {
    const adapter = new MemoryCollectionAdapter(options);
    await adapter.ensureCollection(schema({ sparse: true, sparseWeight: 0.5 }));
    await adapter.upsertBatch([
      { id: 'cat', vector: [1, 0], sparseVector: { cat: 1 }, fields: {} },
      { id: 'dog', vector: [0, 1], sparseVector: { dog: 1 }, fields: {} },
    ]);
    const hits = await adapter.query({ sparseVector: { cat: 0.5 }, topK: 2 });
    expect(hits.map(h => [h.id, h.score])).toEqual([['cat', 0.5], ['dog', 0]]);
  });
});

describe('SqliteCollectionAdapter', () => {
  const db = openSqliteDatabase(':memory:');

  afterEach(() => {
    db.exec('DELETE FROM _strata_collections');
    db.exec('DROP TABLE IF EXISTS vec_docs');
  });

  it('refuses schema field names that cannot be used as identifiers', async () => {
    const adapter = new SqliteCollectionAdapter(options, db);
    const hostile = schema({ fields: [{ name: "kind') OR 1=1 --", type: 'string', indexed: true }] });
    await expect(adapter.ensureCollection(hostile)).rejects.toThrow(ValidationError);
    expect(adapter.state).toBe('unbound');
    expect(await adapter.collectionExists()).toBe(false);
  });

  it('persists records across adapters sharing a connection', async () => {
    const writer = new SqliteCollectionAdapter(options, db);
    expect(await writer.ensureCollection(schema())).toMatchObject({ created: true });
    await writer.upsertBatch([
      { id: 'a', vector: [1, 0], fields: { kind: 'doc', title: 'A', flag: true } },
      { id: 'b', vector: [0, 1], fields: { kind: 'img', title: 'B', flag: false } },
    ]);

    const reader = new SqliteCollectionAdapter(options, db);
    expect(await reader.loadExisting()).toMatchObject({ name: 'docs', dimension: 2, created: false });
    expect(await reader.get('a')).toEqual({
      id: 'a',
      vector: [1, 0],
      sparseVector: undefined,
      fields: { kind: 'doc', title: 'A', flag: true },
    });
    const hits = await reader.query({ vector: [0, 1], topK: 1, filter: Eq('kind', 'img') });
    expect(hits.map(h => h.id)).toEqual(['b']);
  });

  it('keeps booleans distinct when grouping', async () => {
    const adapter = new SqliteCollectionAdapter(options, db);
    await adapter.ensureCollection(schema());
    await adapter.upsertBatch([
      { id: 'a', vector: [1, 0], fields: { flag: true } },
      { id: 'b', vector: [1, 0], fields: { flag: true } },
      { id: 'c', vector: [1, 0], fields: { flag: false } },
      { id: 'd', vector: [1, 0], fields: {} },
    ]);
    expect(await adapter.aggregate(undefined, { groupBy: 'flag' })).toEqual({
      count: 4,
      groups: [{ value: true, count: 2 }, { value: false, count: 1 }],
    });
  });

  it('overwrites a record on re-upsert', async () => {
    const adapter = new SqliteCollectionAdapter(options, db);
    await adapter.ensureCollection(schema());
    await adapter.upsert({ id: 'a', vector: [1, 0], fields: { title: 'old' } });
    await adapter.upsert({ id: 'a', vector: [0, 1], fields: { title: 'new' } });
    expect(await adapter.count()).toBe(1);
    expect(await adapter.get('a')).toMatchObject({ vector: [0, 1], fields: { title: 'new' } });
  });

  it('drops the table and its metadata', async () => {
    const adapter = new SqliteCollectionAdapter(options, db);
    await adapter.ensureCollection(schema());
    await adapter.dropCollection();
    expect(await new SqliteCollectionAdapter(options, db).collectionExists()).toBe(false);
  });
});

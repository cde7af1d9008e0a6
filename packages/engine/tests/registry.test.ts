import { describe, it, expect, vi } from 'vitest';
import { BackendRegistry, adapterOptions, createBackendRegistry } from '../src/vector/registry.js';
import { MemoryCollectionAdapter, MemoryVectorStore } from '../src/vector/memory.js';
import { QdrantCollectionAdapter } from '../src/vector/qdrant.js';
import { SqliteCollectionAdapter } from '../src/vector/sqlite.js';
import { contextCollectionSchema } from '../src/vector/schema.js';
import { And, Eq, In, Or } from '../src/vector/expr.js';
import { TenantCollectionRegistry } from '../src/tenancy/registry.js';
import { collectionNameFor, parentUri, recordIdFor, resourceIdFor, targetFilter, tenantFilter } from '../src/tenancy/scope.js';
import { parseBackendConfig } from '../src/utils/config.js';
import { ConfigError, UnsupportedBackendError, ValidationError } from '../src/errors.js';

describe('BackendRegistry', () => {
  it('ships memory, sqlite, qdrant and milvus', () => {
    expect(createBackendRegistry().keys()).toEqual(['memory', 'milvus', 'qdrant', 'sqlite']);
  });

  it('fails with UnsupportedBackend for an unknown key, naming the available ones', () => {
    const registry = createBackendRegistry();
    expect(() => registry.fromConfig({ backend: 'pinecone' })).toThrow(UnsupportedBackendError);
    expect(() => registry.fromConfig({ backend: 'pinecone' })).toThrow(
      'Vector backend "pinecone" is not supported. Available backends: memory, milvus, qdrant, sqlite',
    );
  });

  it('rejects configurations missing what the backend needs', () => {
    const registry = createBackendRegistry();
    expect(() => registry.fromConfig({ backend: 'qdrant' })).toThrow(ConfigError);
    expect(() => registry.fromConfig({ backend: 'milvus' })).toThrow('requires "url"');
    expect(() => registry.fromConfig({ backend: 'sqlite' })).toThrow('requires "path"');
    expect(() => registry.fromConfig({ backend: 'memory', batchSize: 0 })).toThrow(ConfigError);
  });

  it('resolves keys case-insensitively and defaults the collection to the configured name', () => {
    const adapter = createBackendRegistry().fromConfig({ backend: 'Qdrant', url: 'http://qdrant.test:6333', name: 'kb' });
    expect(adapter).toBeInstanceOf(QdrantCollectionAdapter);
    expect(adapter.collectionName).toBe('kb');
  });

  it('accepts custom backends', () => {
    const store = new MemoryVectorStore();
    const factory = vi.fn((config: Parameters<typeof adapterOptions>[0], collection: string) =>
      new MemoryCollectionAdapter(adapterOptions(config, collection), store),
    );
    const registry = new BackendRegistry().register('inproc', factory);

    const adapter = registry.fromConfig({ backend: 'inproc', batchSize: 7 }, 'notes');
    expect(adapter.collectionName).toBe('notes');
    expect(factory).toHaveBeenCalledWith(expect.objectContaining({ backend: 'inproc', batchSize: 7, distance: 'cosine' }), 'notes');
  });

  it('shares one memory store and one sqlite connection per registry', async () => {
    const registry = createBackendRegistry();
    const schema = contextCollectionSchema('shared', 2, 'cosine', 0);

    const a = registry.fromConfig({ backend: 'memory' }, 'shared');
    const b = registry.fromConfig({ backend: 'memory' }, 'shared');
    await a.ensureCollection(schema);
    await a.upsert({ id: 'r1', vector: [1, 0], fields: {} });
    expect(await b.get('r1')).not.toBeNull();

    const s1 = registry.fromConfig({ backend: 'sqlite', path: ':memory:' }, 'shared');
    const s2 = registry.fromConfig({ backend: 'sqlite', path: ':memory:' }, 'shared');
    expect(s1).toBeInstanceOf(SqliteCollectionAdapter);
    await s1.ensureCollection(schema);
    await s1.upsert({ id: 'r1', vector: [1, 0], fields: {} });
    expect(await s2.count()).toBe(1);

    registry.close();
  });
});

describe('tenant scope', () => {
  it('derives collection names from the workspace', () => {
    expect(collectionNameFor('ctx', 'acme')).toBe('ctx_acme');
    expect(collectionNameFor('ctx', 'Acme Corp')).toMatch(/^ctx_acme_corp_[0-9a-f]{8}$/);
    expect(collectionNameFor('ctx', 'Acme Corp')).not.toBe(collectionNameFor('ctx', 'acme-corp'));
  });

  it('filters to shared records, or to the agent plus shared records', () => {
    expect(tenantFilter({ workspaceId: 'w' })).toEqual(And([Eq('workspace_id', 'w'), Eq('agent_id', '')]));
    expect(tenantFilter({ workspaceId: 'w', agentId: 'a1' })).toEqual(
      And([Eq('workspace_id', 'w'), In('agent_id', ['a1', ''])]),
    );
  });

  it('rejects malformed scopes', () => {
    expect(() => tenantFilter({ workspaceId: ' ' })).toThrow(ValidationError);
    expect(() => tenantFilter({ workspaceId: 'w', agentId: '' })).toThrow(ValidationError);
  });

  it('gives each scope and layer its own stable id', () => {
    const shared = resourceIdFor({ workspaceId: 'w' }, 'doc://a');
    const own = resourceIdFor({ workspaceId: 'w', agentId: 'a1' }, 'doc://a');
    expect(shared).toBe(resourceIdFor({ workspaceId: 'w' }, 'doc://a'));
    expect(shared).not.toBe(own);
    expect(recordIdFor(shared, 0)).not.toBe(recordIdFor(shared, 1));
    expect(recordIdFor(shared, 2)).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
  });

  it('derives the directory a uri sits in', () => {
    expect(parentUri('mem://notes/cats.md')).toBe('mem://notes');
    expect(parentUri('mem://notes/guides/')).toBe('mem://notes');
    expect(parentUri('mem://cats.md')).toBe('mem://');
    expect(parentUri('/srv/docs/a.txt')).toBe('/srv/docs');
    expect(parentUri('a.txt')).toBe('');
  });

  it('scopes to target uris and the resources directly inside them', () => {
    expect(targetFilter([])).toBeUndefined();
    expect(targetFilter(['mem://notes/', 'mem://a.md'])).toEqual(
      Or([Eq('uri', 'mem://notes'), Eq('parent_uri', 'mem://notes'), Eq('uri', 'mem://a.md'), Eq('parent_uri', 'mem://a.md')]),
    );
    expect(() => targetFilter(['mem://notes', ' '])).toThrow(ValidationError);
  });
});

describe('TenantCollectionRegistry', () => {
  function setup() {
    const store = new MemoryVectorStore();
    let clock = 1_000;
    const tenants = new TenantCollectionRegistry({
      backends: createBackendRegistry({ memoryStore: store }),
      backendConfig: parseBackendConfig({ backend: 'memory', name: 'ctx' }),
      schemaFor: name => contextCollectionSchema(name, 2, 'cosine', 0),
      recheckIntervalMs: 500,
      now: () => clock,
    });
    return { store, tenants, advance: (ms: number) => (clock += ms) };
  }

  it('does not create a collection on a plain lookup', async () => {
    const { store, tenants } = setup();
    expect(await tenants.resolve({ workspaceId: 'acme' })).toBeNull();
    expect(store.collectionNames()).toEqual([]);
  });

  it('binds one adapter for concurrent first use', async () => {
    const { store, tenants } = setup();
    const create = vi.spyOn(store, 'createCollection');

    const adapters = await Promise.all(Array.from({ length: 4 }, () => tenants.resolve({ workspaceId: 'acme' }, { create: true })));
    expect(create).toHaveBeenCalledTimes(1);
    expect(new Set(adapters).size).toBe(1);
    expect(tenants.boundCollections()).toEqual(['ctx_acme']);
    expect(await tenants.resolve({ workspaceId: 'acme', agentId: 'a1' })).toBe(adapters[0]);
  });

  it('rechecks a stale binding and notices an external drop', async () => {
    const { store, tenants, advance } = setup();
    const first = await tenants.resolve({ workspaceId: 'acme' }, { create: true });

    store.dropCollection('ctx_acme');
    advance(100);
    expect(await tenants.resolve({ workspaceId: 'acme' })).toBe(first);

    advance(500);
    expect(await tenants.resolve({ workspaceId: 'acme' })).toBeNull();
    expect(first?.state).toBe('closed');
    expect(tenants.boundCollections()).toEqual([]);

    const second = await tenants.resolve({ workspaceId: 'acme' }, { create: true });
    expect(second).not.toBe(first);
    expect(store.collectionNames()).toEqual(['ctx_acme']);
  });

  it('drops a tenant collection once', async () => {
    const { store, tenants } = setup();
    await tenants.resolve({ workspaceId: 'acme' }, { create: true });
    expect(await tenants.drop({ workspaceId: 'acme' })).toBe(true);
    expect(store.collectionNames()).toEqual([]);
    expect(await tenants.drop({ workspaceId: 'acme' })).toBe(false);
  });

  it('closes every bound adapter', async () => {
    const { tenants } = setup();
    const a = await tenants.resolve({ workspaceId: 'a' }, { create: true });
    const b = await tenants.resolve({ workspaceId: 'b' }, { create: true });
    await tenants.close();
    expect([a?.state, b?.state]).toEqual(['closed', 'closed']);
    expect(tenants.boundCollections()).toEqual([]);
  });
});

import type Database from 'better-sqlite3';
import { ConfigError, UnsupportedBackendError } from '../errors.js';
import { parseBackendConfig, type VectorDBBackendConfig, type VectorDBBackendConfigInput } from '../utils/config.js';
import { createLogger } from '../utils/logger.js';
import type { VectorCollection } from './adapter.js';
import { MemoryCollectionAdapter, MemoryVectorStore } from './memory.js';
import { MilvusCollectionAdapter } from './milvus.js';
import { QdrantCollectionAdapter } from './qdrant.js';
import { SqliteCollectionAdapter, openSqliteDatabase } from './sqlite.js';
import type { AdapterOptions } from './types.js';

const log = createLogger('vector-registry');

/** Builds an adapter for one collection from a resolved backend configuration. */
export type BackendFactory = (config: VectorDBBackendConfig, collection: string) => VectorCollection;

export function adapterOptions(config: VectorDBBackendConfig, collection: string): AdapterOptions {
  return {
    collection,
    distance: config.distance,
    sparseWeight: config.sparseWeight,
    indexName: config.indexName,
    batchSize: config.batchSize,
    timeoutMs: config.timeoutMs,
    retries: config.retries,
  };
}

function requireField(config: VectorDBBackendConfig, field: 'url' | 'path'): string {
  const value = config[field];
  if (!value) throw new ConfigError(`Vector backend "${config.backend}" requires "${field}"`);
  return value;
}

/**
 * Backend factories keyed by name. Resolving a key nobody registered fails with
 * UnsupportedBackendError.
 */
export class BackendRegistry {
  private readonly factories = new Map<string, BackendFactory>();
  private readonly disposers: (() => void)[] = [];

  register(key: string, factory: BackendFactory, dispose?: () => void): this {
    const normalized = key.trim().toLowerCase();
    if (!normalized) throw new ConfigError('Backend key must not be empty');
    if (this.factories.has(normalized)) log.warn({ backend: normalized }, 'Replacing registered vector backend');
    this.factories.set(normalized, factory);
    if (dispose) this.disposers.push(dispose);
    return this;
  }

  has(key: string): boolean {
    return this.factories.has(key.trim().toLowerCase());
  }

  keys(): string[] {
    return [...this.factories.keys()].sort();
  }

  resolve(key: string): BackendFactory {
    const factory = this.factories.get(key.trim().toLowerCase());
    if (!factory) throw new UnsupportedBackendError(key, this.keys());
    return factory;
  }

  /** Validate `input` and build an adapter for `collection` (default: the configured name). */
  fromConfig(input: VectorDBBackendConfig | VectorDBBackendConfigInput, collection?: string): VectorCollection {
    const config = parseBackendConfig(input);
    return this.resolve(config.backend)(config, collection ?? config.name);
  }

  /** Release shared resources (such as SQLite connections) held by the factories. */
  close(): void {
    for (const dispose of this.disposers.splice(0)) dispose();
  }
}

export interface BackendRegistryOptions {
  /** Store behind the `memory` backend; one per registry by default. */
  memoryStore?: MemoryVectorStore;
}

/** A registry with the built-in backends: memory, sqlite, qdrant and milvus. */
export function createBackendRegistry(options: BackendRegistryOptions = {}): BackendRegistry {
  const memoryStore = options.memoryStore ?? new MemoryVectorStore();
  const connections = new Map<string, Database.Database>();

  return new BackendRegistry()
    .register('memory', (config, collection) => new MemoryCollectionAdapter(adapterOptions(config, collection), memoryStore))
    .register(
      'sqlite',
      (config, collection) => {
        const path = requireField(config, 'path');
        let db = connections.get(path);
        if (!db) {
          db = openSqliteDatabase(path);
          connections.set(path, db);
        }
        return new SqliteCollectionAdapter(adapterOptions(config, collection), db);
      },
      () => {
        for (const db of connections.values()) db.close();
        connections.clear();
      },
    )
    .register('qdrant', (config, collection) =>
      new QdrantCollectionAdapter({ ...adapterOptions(config, collection), url: requireField(config, 'url'), apiKey: config.apiKey }),
    )
    .register('milvus', (config, collection) =>
      new MilvusCollectionAdapter({ ...adapterOptions(config, collection), url: requireField(config, 'url'), apiKey: config.apiKey }),
    );
}

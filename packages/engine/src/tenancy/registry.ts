import type { VectorDBBackendConfig } from '../utils/config.js';
import { createLogger } from '../utils/logger.js';
import type { VectorCollection } from '../vector/adapter.js';
import type { BackendRegistry } from '../vector/registry.js';
import type { CollectionSchema } from '../vector/schema.js';
import { collectionNameFor, validateScope, type TenantScope } from './scope.js';

const log = createLogger('tenancy');

interface BoundEntry {
  adapter: VectorCollection;
  checkedAt: number;
}

export interface ResolveOptions {
  /** Create the collection when it does not exist. Default false. */
  create?: boolean;
}

export interface TenantRegistryOptions {
  backends: BackendRegistry;
  backendConfig: VectorDBBackendConfig;
  schemaFor: (collection: string) => CollectionSchema;
  /** How long a bound collection is trusted before its existence is checked again. */
  recheckIntervalMs: number;
  now?: () => number;
}

/**
 * Owns every collection handle. Concurrent first use of a tenant's collection shares
 * one in-flight bind: a single existence check, at most one create.
 */
export class TenantCollectionRegistry {
  private readonly entries = new Map<string, BoundEntry>();
  private readonly inflight = new Map<string, Promise<VectorCollection | null>>();
  private readonly now: () => number;

  constructor(private readonly options: TenantRegistryOptions) {
    this.now = options.now ?? Date.now;
  }

  collectionFor(scope: TenantScope): string {
    validateScope(scope);
    return collectionNameFor(this.options.backendConfig.name, scope.workspaceId);
  }

  /** The tenant's collection, or null when it does not exist and `create` is off. */
  async resolve(scope: TenantScope, opts: ResolveOptions = {}): Promise<VectorCollection | null> {
    const name = this.collectionFor(scope);
    const create = opts.create ?? false;

    for (;;) {
      const pending = this.inflight.get(name);
      if (pending) {
        const adapter = await pending;
        // a plain load found nothing; this caller wants it created
        if (adapter || !create) return adapter;
        continue;
      }

      const entry = this.entries.get(name);
      if (entry && this.now() - entry.checkedAt < this.options.recheckIntervalMs) return entry.adapter;

      const gate = this.bind(name, create, entry).finally(() => this.inflight.delete(name));
      this.inflight.set(name, gate);
      return gate;
    }
  }

  /** Drop the tenant's collection. Returns false when there was nothing to drop. */
  async drop(scope: TenantScope): Promise<boolean> {
    const adapter = await this.resolve(scope);
    if (!adapter) return false;
    const name = this.collectionFor(scope);
    this.entries.delete(name);
    await adapter.dropCollection();
    log.info({ collection: name }, 'Tenant collection dropped');
    return true;
  }

  /** Collections currently bound in this process. */
  boundCollections(): string[] {
    return [...this.entries.keys()].sort();
  }

  async close(): Promise<void> {
    await Promise.allSettled([...this.inflight.values()]);
    const adapters = [...this.entries.values()].map(e => e.adapter);
    this.entries.clear();
    await Promise.all(adapters.map(a => a.close()));
  }

  private async bind(name: string, create: boolean, stale: BoundEntry | undefined): Promise<VectorCollection | null> {
    if (stale) {
      if (await stale.adapter.collectionExists()) {
        stale.checkedAt = this.now();
        return stale.adapter;
      }
      log.warn({ collection: name }, 'Collection no longer exists, rebinding');
      this.entries.delete(name);
      await stale.adapter.close();
    }

    const adapter = this.options.backends.fromConfig(this.options.backendConfig, name);
    try {
      const handle = create
        ? await adapter.ensureCollection(this.options.schemaFor(name))
        : await adapter.loadExisting();
      if (!handle) {
        await adapter.close();
        return null;
      }
    } catch (e) {
      await adapter.close();
      throw e;
    }
    this.entries.set(name, { adapter, checkedAt: this.now() });
    return adapter;
  }
}

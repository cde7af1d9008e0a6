import {
  NotFoundError,
  PartialBatchFailureError,
  StrataError,
  ValidationError,
  type BatchOutcome,
} from './errors.js';
import { ContextBuilder, type ResourceInput } from './context/builder.js';
import { createModelGateway, type GatewayProviders, type ModelGateway } from './gateway/index.js';
import { HybridRetrievalCoordinator, type ContextLevel, type SearchRequest, type SearchResponse, type SearchResult } from './search/hybrid.js';
import type { ByteStore } from './storage/byte-store.js';
import { TenantCollectionRegistry } from './tenancy/registry.js';
import { parentUri, recordIdFor, resourceIdFor, tenantFilter, validateScope, type TenantScope } from './tenancy/scope.js';
import { parseConfig, type StrataConfig, type StrataConfigInput } from './utils/config.js';
import { createLogger } from './utils/logger.js';
import type { VectorCollection } from './vector/adapter.js';
import { And, Eq, type FilterExpr } from './vector/expr.js';
import { createBackendRegistry, type BackendRegistry } from './vector/registry.js';
import { contextCollectionSchema } from './vector/schema.js';
import type { Fields, StoredRecord, VectorRecord } from './vector/types.js';

const log = createLogger('app');

const LEVELS: readonly ContextLevel[] = [0, 1, 2];

export interface IngestRequest extends ResourceInput {
  scope: TenantScope;
}

export interface IngestOptions {
  signal?: AbortSignal;
}

export interface IngestResult {
  resourceId: string;
  uri: string;
  /** Unchanged content under an unchanged model configuration; nothing was rewritten. */
  skipped: boolean;
  degraded: boolean;
  chunks: number;
  layers: ContextLevel[];
}

export type IngestOutcome =
  | { uri: string; ok: true; result: IngestResult }
  | { uri: string; ok: false; error: StrataError };

export interface LayerPayload {
  resourceId: string;
  uri: string;
  layer: ContextLevel;
  contentType: string;
  mimeType: string;
  title: string;
  /** Text of L0, L1, and of L2 for text resources. */
  text?: string;
  /** L2 bytes of image resources. */
  bytes?: Uint8Array;
}

export interface KnowledgeStoreDeps {
  gateway: ModelGateway;
  backends: BackendRegistry;
  byteStore?: ByteStore;
  now?: () => number;
}

function str(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function visibleTo(record: StoredRecord, scope: TenantScope): boolean {
  const agent = record.fields['agent_id'];
  return record.fields['workspace_id'] === scope.workspaceId && (agent === '' || agent === scope.agentId);
}

function toStrataError(e: unknown): StrataError {
  if (e instanceof StrataError) return e;
  return new StrataError('BACKEND_ERROR', e instanceof Error ? e.message : String(e), { cause: e });
}

/**
 * Service facade: the only entry points a transport layer calls. Tenant scoping is
 * enforced here, never by the caller.
 */
export class KnowledgeStore {
  readonly gateway: ModelGateway;
  readonly tenants: TenantCollectionRegistry;
  readonly builder: ContextBuilder;
  readonly searchEngine: HybridRetrievalCoordinator;
  private readonly backends: BackendRegistry;
  private readonly byteStore?: ByteStore;
  private readonly now: () => number;

  constructor(
    readonly config: StrataConfig,
    deps: KnowledgeStoreDeps,
  ) {
    this.gateway = deps.gateway;
    this.backends = deps.backends;
    this.byteStore = deps.byteStore;
    this.now = deps.now ?? Date.now;

    const vb = config.vectorBackend;
    this.tenants = new TenantCollectionRegistry({
      backends: this.backends,
      backendConfig: vb,
      schemaFor: name => contextCollectionSchema(name, config.embedding.dimensions, vb.distance, vb.sparseWeight),
      recheckIntervalMs: config.tenancy.recheckIntervalMs,
      now: this.now,
    });
    this.builder = new ContextBuilder(this.gateway, config.context, this.byteStore);
    this.searchEngine = new HybridRetrievalCoordinator(this.gateway, this.tenants, {
      ...config.search,
      sparseWeight: vb.sparseWeight,
    });

    log.info({ backend: vb.backend, capabilities: this.gateway.capabilities() }, 'KnowledgeStore initialized');
  }

  /**
   * Derive L0/L1/L2 for a resource and index them. Re-ingesting the same uri under the
   * same scope updates the existing records in place.
   */
  async ingest(req: IngestRequest, opts: IngestOptions = {}): Promise<IngestResult> {
    validateScope(req.scope);
    const collection = await this.requireCollection(req.scope);
    const content = await this.builder.load(req, opts);
    const resourceId = resourceIdFor(req.scope, req.uri);
    const ids = LEVELS.map(level => recordIdFor(resourceId, level));
    const signature = this.gateway.signature();

    const isText = content.contentType !== 'image';
    const expected: ContextLevel[] = isText ? [0, 1, 2] : [0, 1];
    const stored = await collection.getMany(ids);
    const existing = stored.find(r => r.id === ids[0]);
    // every expected layer must be present and derived from this content and configuration
    const unchanged =
      expected.every(level => stored.some(r => r.id === ids[level])) &&
      stored.every(r => r.fields['content_hash'] === content.hash && r.fields['model_signature'] === signature);
    if (this.config.context.skipUnchanged && unchanged) {
      log.debug({ uri: req.uri, resourceId }, 'Content unchanged, skipping');
      return { resourceId, uri: req.uri, skipped: true, degraded: false, chunks: 0, layers: expected };
    }

    const built = await this.builder.build(content, opts);
    const layerTexts = isText ? [built.abstract, built.overview, built.contentExcerpt] : [built.abstract, built.overview];

    const useSparse = this.config.vectorBackend.sparseWeight > 0 && this.gateway.capabilities().sparse;
    const [dense, sparse] = await Promise.all([
      this.gateway.embed(layerTexts, 'dense', opts),
      useSparse ? this.gateway.embed(layerTexts, 'sparse', opts) : Promise.resolve(undefined),
    ]);

    const now = this.now();
    const createdAt = typeof existing?.fields['created_at'] === 'number' ? existing.fields['created_at'] : now;
    const base: Fields = {
      uri: req.uri,
      parent_uri: parentUri(req.uri),
      resource_id: resourceId,
      workspace_id: req.scope.workspaceId,
      agent_id: req.scope.agentId ?? '',
      context_type: content.contentType,
      mime_type: content.mimeType,
      title: content.title,
      abstract: built.abstract,
      content_hash: content.hash,
      model_signature: signature,
      created_at: createdAt,
      updated_at: now,
    };
    // L2 text is kept in the index only when it did not come from the byte store
    const layerContent = [built.abstract, built.overview, content.inline ? content.text : ''];

    const records: VectorRecord[] = layerTexts.map((_, level) => ({
      id: ids[level],
      vector: dense[level],
      sparseVector: sparse?.[level],
      fields: { ...base, level, content: layerContent[level] ?? '' },
    }));

    if (!isText && content.inline && req.bytes && this.byteStore?.putBytes) {
      await this.byteStore.putBytes(req.uri, req.bytes);
    }
    const outcomes = await collection.upsertBatch(records, opts);
    if (!isText) {
      const stale = await collection.deleteMany([ids[2] ?? ''], opts);
      outcomes.push(...stale.filter(o => !o.ok));
    }
    this.raiseOnFailure(outcomes);

    log.info({ uri: req.uri, resourceId, chunks: built.chunks, degraded: built.degraded }, 'Resource ingested');
    return {
      resourceId,
      uri: req.uri,
      skipped: false,
      degraded: built.degraded,
      chunks: built.chunks,
      layers: isText ? [0, 1, 2] : [0, 1],
    };
  }

  /** Ingest concurrently (bounded by the gateway); one outcome per request, in order. */
  async ingestMany(requests: IngestRequest[], opts: IngestOptions = {}): Promise<IngestOutcome[]> {
    return Promise.all(
      requests.map(async (req): Promise<IngestOutcome> => {
        try {
          return { uri: req.uri, ok: true, result: await this.ingest(req, opts) };
        } catch (e) {
          log.warn({ uri: req.uri, error: e instanceof Error ? e.message : String(e) }, 'Ingest failed');
          return { uri: req.uri, ok: false, error: toStrataError(e) };
        }
      }),
    );
  }

  async search(req: SearchRequest): Promise<SearchResult[]> {
    return (await this.searchEngine.search(req)).results;
  }

  /** `search` with per-stage counts and timings. */
  async searchWithDebug(req: SearchRequest): Promise<SearchResponse> {
    return this.searchEngine.search({ ...req, debug: true });
  }

  async getLayer(resourceId: string, layer: ContextLevel, scope: TenantScope, opts: IngestOptions = {}): Promise<LayerPayload> {
    if (!LEVELS.includes(layer)) throw new ValidationError(`Unknown layer: ${String(layer)}`);
    const collection = await this.tenants.resolve(scope);
    if (!collection) throw new NotFoundError('Resource', resourceId);

    const head = await collection.get(recordIdFor(resourceId, 0));
    if (!head || !visibleTo(head, scope)) throw new NotFoundError('Resource', resourceId);

    const payload: LayerPayload = {
      resourceId,
      uri: str(head.fields['uri']),
      layer,
      contentType: str(head.fields['context_type']),
      mimeType: str(head.fields['mime_type']),
      title: str(head.fields['title']),
    };

    if (layer === 0) return { ...payload, text: str(head.fields['content']) };
    if (layer === 1) {
      const overview = await collection.get(recordIdFor(resourceId, 1));
      if (!overview) throw new NotFoundError('Layer L1 of resource', resourceId);
      return { ...payload, text: str(overview.fields['content']) };
    }

    if (payload.contentType === 'image') {
      return { ...payload, bytes: await this.fetchCanonical(payload.uri, opts.signal) };
    }
    const full = await collection.get(recordIdFor(resourceId, 2));
    const inline = full ? str(full.fields['content']) : '';
    if (inline) return { ...payload, text: inline };
    return { ...payload, text: new TextDecoder().decode(await this.fetchCanonical(payload.uri, opts.signal)) };
  }

  /** Remove every layer of a resource. Returns false when it was not visible to `scope`. */
  async remove(resourceId: string, scope: TenantScope): Promise<boolean> {
    const collection = await this.tenants.resolve(scope);
    if (!collection) return false;
    const head = await collection.get(recordIdFor(resourceId, 0));
    if (!head || !visibleTo(head, scope)) return false;
    this.raiseOnFailure(await collection.deleteMany(LEVELS.map(level => recordIdFor(resourceId, level))));
    log.info({ resourceId }, 'Resource removed');
    return true;
  }

  /** Number of resources visible to `scope` that match `filter`. */
  async count(scope: TenantScope, filter?: FilterExpr): Promise<number> {
    const scoped = And([tenantFilter(scope), Eq('level', 0), filter]);
    const collection = await this.tenants.resolve(scope);
    if (!collection) return 0;
    return collection.count(scoped);
  }

  async dropTenant(scope: TenantScope): Promise<boolean> {
    return this.tenants.drop(scope);
  }

  async close(): Promise<void> {
    await this.tenants.close();
    this.backends.close();
    log.info('KnowledgeStore closed');
  }

  private async requireCollection(scope: TenantScope): Promise<VectorCollection> {
    const collection = await this.tenants.resolve(scope, { create: true });
    if (!collection) throw new NotFoundError('Collection for workspace', scope.workspaceId);
    return collection;
  }

  private async fetchCanonical(uri: string, signal?: AbortSignal): Promise<Uint8Array> {
    if (!this.byteStore) throw new NotFoundError('Canonical content (no byte store configured)', uri);
    return this.byteStore.fetchBytes(uri, { signal });
  }

  /**
   * All-failed with one cause rethrows that cause (a DimensionMismatch stays one);
   * anything mixed becomes PartialBatchFailure with the per-id list.
   */
  private raiseOnFailure(outcomes: BatchOutcome[]): void {
    const failed = outcomes.filter(o => !o.ok);
    if (failed.length === 0) return;
    const errors = failed.flatMap(o => ('error' in o ? [o.error] : []));
    const [first] = errors;
    if (first && errors.length === outcomes.length && errors.every(e => e.code === first.code)) throw first;
    throw new PartialBatchFailureError(outcomes);
  }
}

export interface KnowledgeStoreOverrides {
  providers?: GatewayProviders;
  gateway?: ModelGateway;
  backends?: BackendRegistry;
  byteStore?: ByteStore;
  now?: () => number;
}

/** Wire a KnowledgeStore from configuration; overrides replace the pieces it would build. */
export function createKnowledgeStore(
  input: StrataConfigInput = {},
  overrides: KnowledgeStoreOverrides = {},
): KnowledgeStore {
  const config = parseConfig(input);
  return new KnowledgeStore(config, {
    gateway: overrides.gateway ?? createModelGateway(config, overrides.providers),
    backends: overrides.backends ?? createBackendRegistry(),
    byteStore: overrides.byteStore,
    now: overrides.now,
  });
}

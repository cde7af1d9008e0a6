import { ValidationError } from '../errors.js';
import type { ModelGateway } from '../gateway/model-gateway.js';
import type { SparseVector } from '../embedding/interface.js';
import type { TenantCollectionRegistry } from '../tenancy/registry.js';
import { targetFilter, tenantFilter, type TenantScope } from '../tenancy/scope.js';
import { estimateTokens, truncateToTokens } from '../utils/helpers.js';
import { createLogger } from '../utils/logger.js';
import { And, In, type FilterExpr } from '../vector/expr.js';
import type { Fields, QueryHit } from '../vector/types.js';
import { fuseHits, type FusedHit, type FusionStrategy } from './fusion.js';

const log = createLogger('search');

export type ContextLevel = 0 | 1 | 2;

export interface SearchRequest {
  query: string;
  scope: TenantScope;
  filter?: FilterExpr;
  topK?: number;
  /** Restrict matching to these layers. Default: all. */
  layers?: ContextLevel[];
  /** Only resources at or directly under one of these uris. */
  targetUris?: string[];
  /** Drop results scoring below this, after fusion and rerank. */
  scoreThreshold?: number;
  signal?: AbortSignal;
  debug?: boolean;
}

export interface SearchResult {
  resourceId: string;
  uri: string;
  score: number;
  /** Layer of the best-scoring record of the resource. */
  layer: ContextLevel;
  title: string;
  abstract: string;
  contextType: string;
  createdAt: number;
  fields: Fields;
}

export interface SearchDebug {
  denseHits: number;
  sparseHits: number;
  fusedCount: number;
  resourceCount: number;
  reranked: boolean;
  timings: {
    embedMs: number;
    queryMs: number;
    rerankMs: number;
    totalMs: number;
  };
}

export interface SearchResponse {
  results: SearchResult[];
  debug?: SearchDebug;
}

export interface HybridSearchSettings {
  defaultTopK: number;
  candidateMultiplier: number;
  fusion: FusionStrategy;
  rrfK: number;
  rerankWindow: number;
  sparseWeight: number;
}

function asLevel(value: unknown): ContextLevel {
  return value === 1 || value === 2 ? value : 0;
}

function str(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function num(value: unknown): number {
  return typeof value === 'number' ? value : 0;
}

/** Score desc, then most recent first, then uri; deterministic for equal inputs. */
export function compareResults(a: SearchResult, b: SearchResult): number {
  if (b.score !== a.score) return b.score - a.score;
  if (b.createdAt !== a.createdAt) return b.createdAt - a.createdAt;
  if (a.uri !== b.uri) return a.uri < b.uri ? -1 : 1;
  return a.resourceId < b.resourceId ? -1 : a.resourceId > b.resourceId ? 1 : 0;
}

function toResult(hit: FusedHit): SearchResult {
  const f = hit.fields;
  return {
    resourceId: str(f['resource_id']) || hit.id,
    uri: str(f['uri']),
    score: hit.score,
    layer: asLevel(f['level']),
    title: str(f['title']),
    abstract: str(f['abstract']),
    contextType: str(f['context_type']),
    createdAt: num(f['created_at']),
    fields: f,
  };
}

/** One result per resource: the record with the best fused score. */
function groupByResource(hits: FusedHit[]): SearchResult[] {
  const best = new Map<string, SearchResult>();
  for (const hit of hits) {
    const candidate = toResult(hit);
    const current = best.get(candidate.resourceId);
    if (!current || candidate.score > current.score || (candidate.score === current.score && candidate.layer < current.layer)) {
      best.set(candidate.resourceId, candidate);
    }
  }
  return [...best.values()];
}

/**
 * Query-time orchestration: embed, scope, query each configured vector kind, fuse,
 * rerank a bounded window, truncate. Any failure fails the whole search.
 */
export class HybridRetrievalCoordinator {
  constructor(
    private readonly gateway: ModelGateway,
    private readonly tenants: TenantCollectionRegistry,
    private readonly settings: HybridSearchSettings,
  ) {}

  async search(req: SearchRequest): Promise<SearchResponse> {
    const startTime = Date.now();
    const topK = req.topK ?? this.settings.defaultTopK;
    if (!Number.isInteger(topK) || topK <= 0) throw new ValidationError(`topK must be a positive integer, got ${topK}`);
    if (!req.query.trim()) throw new ValidationError('Search query must not be empty');
    if (req.scoreThreshold !== undefined && !Number.isFinite(req.scoreThreshold)) {
      throw new ValidationError(`scoreThreshold must be a finite number, got ${req.scoreThreshold}`);
    }

    const filter = And([
      tenantFilter(req.scope),
      req.filter,
      req.layers && req.layers.length > 0 ? In('level', req.layers) : undefined,
      targetFilter(req.targetUris ?? []),
    ]);
    const collection = await this.tenants.resolve(req.scope);
    if (!collection) return { results: [] };

    // 1. Embed the query for each configured kind
    const embedStart = Date.now();
    const useSparse = this.settings.sparseWeight > 0 && this.gateway.capabilities().sparse;
    const [denseVectors, sparseVectors] = await Promise.all([
      this.gateway.embed([req.query], 'dense', { signal: req.signal }),
      useSparse ? this.gateway.embed([req.query], 'sparse', { signal: req.signal }) : Promise.resolve<SparseVector[]>([]),
    ]);
    const [dense] = denseVectors;
    if (!dense) throw new ValidationError('Query embedding is empty');
    const [sparse] = sparseVectors;
    const embedMs = Date.now() - embedStart;

    // 2. Query each kind under the same compiled filter
    const queryStart = Date.now();
    const candidates = Math.max(topK, this.settings.rerankWindow) * this.settings.candidateMultiplier;
    const [denseHits, sparseScan] = await Promise.all([
      collection.query({ vector: dense, filter, topK: candidates, signal: req.signal }),
      sparse && Object.keys(sparse).length > 0
        ? collection.query({ sparseVector: sparse, filter, topK: candidates, signal: req.signal })
        : Promise.resolve<QueryHit[]>([]),
    ]);
    // zero overlap is no sparse match
    const sparseHits = sparseScan.filter(h => h.score > 0);
    const queryMs = Date.now() - queryStart;

    // 3. Fuse, group by resource, order
    const fused = fuseHits(denseHits, sparseHits, {
      strategy: this.settings.fusion,
      sparseWeight: this.settings.sparseWeight,
      rrfK: this.settings.rrfK,
    });
    let results = groupByResource(fused).sort(compareResults);

    // 4. Rerank a bounded window
    const rerankStart = Date.now();
    const reranked = this.gateway.capabilities().rerank && results.length > 0;
    if (reranked) {
      results = await this.rerank(req.query, results.slice(0, Math.max(this.settings.rerankWindow, topK)), req.signal);
    }
    const rerankMs = Date.now() - rerankStart;

    const { scoreThreshold } = req;
    const final = (scoreThreshold === undefined ? results : results.filter(r => r.score >= scoreThreshold)).slice(0, topK);
    const totalMs = Date.now() - startTime;
    log.debug({ topK, returned: final.length, totalMs }, 'Search complete');

    const debug: SearchDebug | undefined = req.debug ? {
      denseHits: denseHits.length,
      sparseHits: sparseHits.length,
      fusedCount: fused.length,
      resourceCount: results.length,
      reranked,
      timings: { embedMs, queryMs, rerankMs, totalMs },
    } : undefined;

    return { results: final, debug };
  }

  private async rerank(query: string, window: SearchResult[], signal?: AbortSignal): Promise<SearchResult[]> {
    const documents = window.map(r => {
      const content = str(r.fields['content']);
      return truncateToTokens(content || `${r.title}\n${r.abstract}`, 512);
    });
    const scores = await this.gateway.rerank(query, documents, { signal });
    const out: SearchResult[] = [];
    for (const s of scores) {
      const result = window[s.index];
      if (result) out.push({ ...result, score: s.score });
    }
    return out.sort(compareResults);
  }

  /**
   * Render results for an agent's context window: one line per resource with its L0
   * abstract, stopping before `maxTokens`.
   */
  formatForInjection(results: SearchResult[], maxTokens: number): string {
    if (results.length === 0) return '';

    const lines: string[] = ['<context>'];
    let tokens = estimateTokens(lines[0] ?? '');

    for (const r of results) {
      const line = `[L${r.layer}] ${r.uri} :: ${r.abstract}`;
      const lineTokens = estimateTokens(line);
      if (tokens + lineTokens > maxTokens - 20) break;
      lines.push(line);
      tokens += lineTokens;
    }

    lines.push('</context>');
    return lines.join('\n');
  }
}

import { z } from 'zod';
import {
  ConfigError,
  DimensionMismatchError,
  ModelUnavailableError,
  StrataError,
  type ModelCapability,
} from '../errors.js';
import { createLogger } from '../utils/logger.js';
import { ProviderError, RetryExhaustedError, withRetry } from '../utils/retry.js';
import { truncateToTokens } from '../utils/helpers.js';
import { extractiveAbstract, extractiveOverview } from '../context/extractive.js';
import { buildSummarizePrompt, buildSystemPrompt, type SummarizeMode } from '../context/prompts.js';
import type { EmbeddingProvider, SparseEmbeddingProvider, SparseVector } from '../embedding/interface.js';
import type { ImageInput, LLMProvider } from '../llm/interface.js';
import type { Reranker, RerankScore } from '../search/reranker.js';
import { AsyncSemaphore } from './semaphore.js';

const log = createLogger('gateway');

export type EmbeddingKind = 'dense' | 'sparse';

export interface GatewayProviders {
  dense?: EmbeddingProvider;
  sparse?: SparseEmbeddingProvider;
  vlm?: LLMProvider;
  rerank?: Reranker;
}

export interface GatewaySettings {
  concurrency: { embedding: number; vlm: number; rerank: number };
  retries: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  /** Default admission timeout for queued callers; unset means wait indefinitely. */
  queueTimeoutMs?: number;
  /** Dimension every dense vector must have. */
  dimension: number;
  abstractTokens: number;
  overviewTokens: number;
  vlmMaxTokens: number;
}

export interface GatewayCallOptions {
  signal?: AbortSignal;
  /** Admission timeout while queued for a slot. */
  timeoutMs?: number;
}

export interface SummarizeInput {
  text?: string;
  images?: ImageInput[];
  title?: string;
  mode?: SummarizeMode;
}

export interface Summary {
  abstract: string;
  overview: string;
  /** True when produced by the extractive fallback instead of a model. */
  degraded: boolean;
}

export interface GatewayCapabilities {
  dense: boolean;
  sparse: boolean;
  vlm: boolean;
  /** The VLM accepts image input. */
  vision: boolean;
  rerank: boolean;
}

export interface CapabilityStats {
  limit: number;
  inFlight: number;
  queued: number;
}

const SummarySchema = z.object({
  abstract: z.string(),
  overview: z.string(),
});

function qualified(name: string, model?: string): string {
  return model ? `${name}/${model}` : name;
}

function semaphoreStats(s: AsyncSemaphore): CapabilityStats {
  return { limit: s.limit, inFlight: s.inFlight, queued: s.queued };
}

/**
 * Bounded-concurrency front door to embedding, VLM and rerank providers.
 * Each capability has its own admission gate; excess callers queue.
 */
export class ModelGateway {
  private readonly gates: Record<'embedding' | 'vlm' | 'rerank', AsyncSemaphore>;
  private readonly settings: Readonly<GatewaySettings>;

  constructor(
    settings: GatewaySettings,
    private readonly providers: Readonly<GatewayProviders>,
  ) {
    this.settings = Object.freeze({ ...settings, concurrency: Object.freeze({ ...settings.concurrency }) });
    this.gates = {
      embedding: new AsyncSemaphore(settings.concurrency.embedding),
      vlm: new AsyncSemaphore(settings.concurrency.vlm),
      rerank: new AsyncSemaphore(settings.concurrency.rerank),
    };
  }

  get dimension(): number {
    return this.settings.dimension;
  }

  capabilities(): GatewayCapabilities {
    return {
      dense: this.providers.dense !== undefined,
      sparse: this.providers.sparse !== undefined,
      vlm: this.providers.vlm !== undefined,
      vision: this.providers.vlm?.supportsImages ?? false,
      rerank: this.providers.rerank !== undefined,
    };
  }

  /**
   * Identifies the model configuration that derived a layer. Content re-ingested under
   * the same signature and hash can reuse its stored layers.
   */
  signature(): string {
    const { dense, sparse, vlm } = this.providers;
    return [
      dense ? `${qualified(dense.name, dense.model)}:${dense.dimensions}` : 'none',
      sparse ? sparse.name : 'none',
      vlm ? qualified(vlm.name, vlm.model) : 'extractive',
      `${this.settings.abstractTokens}/${this.settings.overviewTokens}`,
    ].join('|');
  }

  stats(): Record<'embedding' | 'vlm' | 'rerank', CapabilityStats> {
    return {
      embedding: semaphoreStats(this.gates.embedding),
      vlm: semaphoreStats(this.gates.vlm),
      rerank: semaphoreStats(this.gates.rerank),
    };
  }

  embed(texts: string[], kind: 'dense', opts?: GatewayCallOptions): Promise<number[][]>;
  embed(texts: string[], kind: 'sparse', opts?: GatewayCallOptions): Promise<SparseVector[]>;
  async embed(texts: string[], kind: EmbeddingKind, opts: GatewayCallOptions = {}): Promise<number[][] | SparseVector[]> {
    if (texts.length === 0) return [];

    if (kind === 'sparse') {
      const sparse = this.providers.sparse;
      if (!sparse) throw new ConfigError('No sparse embedding provider configured');
      return this.call('sparse', this.gates.embedding, opts, signal => sparse.embedSparse(texts, { signal }));
    }

    const dense = this.providers.dense;
    if (!dense) throw new ConfigError('No dense embedding provider configured');
    const vectors = await this.call('embedding', this.gates.embedding, opts, signal => dense.embedBatch(texts, { signal }));
    if (vectors.length !== texts.length) {
      throw new ModelUnavailableError('embedding', 1, {
        cause: new Error(`provider returned ${vectors.length} vectors for ${texts.length} inputs`),
      });
    }
    for (const v of vectors) {
      if (v.length !== this.settings.dimension) {
        throw new DimensionMismatchError(this.settings.dimension, v.length, `embedding provider ${dense.name}`);
      }
    }
    return vectors;
  }

  /**
   * Produce an (L0, L1) pair. Without a VLM provider, or for images the provider
   * cannot see, this degrades to the extractive outline instead of failing.
   */
  async summarize(input: SummarizeInput, opts: GatewayCallOptions = {}): Promise<Summary> {
    const { abstractTokens, overviewTokens } = this.settings;
    const vlm = this.providers.vlm;
    const text = input.text ?? '';
    const hasImages = (input.images?.length ?? 0) > 0;

    if (!vlm || (hasImages && !vlm.supportsImages && !text)) {
      return this.extractive(text, input.title);
    }

    const mode: SummarizeMode = input.mode ?? (hasImages && !text ? 'image' : 'document');
    const prompt = buildSummarizePrompt(mode, text, input.title);
    const systemPrompt = buildSystemPrompt(abstractTokens, overviewTokens);

    const raw = await this.call('vlm', this.gates.vlm, opts, async signal => {
      const response = await vlm.complete(prompt, {
        systemPrompt,
        images: vlm.supportsImages ? input.images : undefined,
        maxTokens: this.settings.vlmMaxTokens,
        temperature: 0,
        signal,
      });
      if (!response.trim()) throw new ProviderError(`${vlm.name} returned an empty summary`, 502);
      return response;
    });

    return this.parseSummary(raw);
  }

  /**
   * Scores for `documents`, best first, ties broken by input position. Every index
   * refers to an input document and appears at most once.
   */
  async rerank(query: string, documents: string[], opts: GatewayCallOptions = {}): Promise<RerankScore[]> {
    const reranker = this.providers.rerank;
    if (!reranker) throw new ConfigError('No rerank provider configured');
    if (documents.length === 0) return [];

    const scores = await this.call('rerank', this.gates.rerank, opts, signal => reranker.rerank(query, documents, { signal }));
    const seen = new Set<number>();
    for (const s of scores) {
      if (!Number.isInteger(s.index) || s.index < 0 || s.index >= documents.length || seen.has(s.index)) {
        throw new ModelUnavailableError('rerank', 1, {
          cause: new Error(`reranker ${reranker.name} returned invalid index ${s.index}`),
        });
      }
      seen.add(s.index);
    }
    return [...scores].sort((a, b) => b.score - a.score || a.index - b.index);
  }

  private extractive(text: string, title?: string): Summary {
    const { abstractTokens, overviewTokens } = this.settings;
    const source = text || title || '';
    return {
      abstract: extractiveAbstract(source, abstractTokens),
      overview: extractiveOverview(source, overviewTokens),
      degraded: true,
    };
  }

  private parseSummary(raw: string): Summary {
    const { abstractTokens, overviewTokens } = this.settings;
    const jsonStr = raw.replace(/```(?:json)?\n?/g, '').replace(/```/g, '').trim();
    const start = jsonStr.indexOf('{');
    const end = jsonStr.lastIndexOf('}');

    if (start >= 0 && end > start) {
      try {
        const parsed = SummarySchema.safeParse(JSON.parse(jsonStr.slice(start, end + 1)));
        if (parsed.success && parsed.data.abstract.trim()) {
          return {
            abstract: truncateToTokens(parsed.data.abstract.trim(), abstractTokens),
            overview: truncateToTokens((parsed.data.overview || parsed.data.abstract).trim(), overviewTokens),
            degraded: false,
          };
        }
      } catch (e) {
        log.warn({ error: e instanceof Error ? e.message : String(e) }, 'Summary JSON unparseable, using raw text');
      }
    }

    // Free-form answer: keep it as the overview and distil the abstract from it.
    const overview = truncateToTokens(raw.trim(), overviewTokens);
    return { abstract: extractiveAbstract(overview, abstractTokens), overview, degraded: false };
  }

  private async call<T>(
    capability: ModelCapability,
    gate: AsyncSemaphore,
    opts: GatewayCallOptions,
    fn: (signal: AbortSignal | undefined) => Promise<T>,
  ): Promise<T> {
    const timeoutMs = opts.timeoutMs ?? this.settings.queueTimeoutMs;
    return gate.run(async () => {
      try {
        return await withRetry(() => fn(opts.signal), {
          retries: this.settings.retries,
          baseDelayMs: this.settings.backoffBaseMs,
          maxDelayMs: this.settings.backoffMaxMs,
          signal: opts.signal,
          label: capability,
        });
      } catch (e) {
        if (e instanceof StrataError) throw e;
        if (e instanceof RetryExhaustedError) {
          log.error({ capability, attempts: e.attempts, error: e.message }, 'Model provider unavailable');
          throw new ModelUnavailableError(capability, e.attempts, { cause: e.lastError });
        }
        throw new ModelUnavailableError(capability, 1, { cause: e });
      }
    }, { signal: opts.signal, timeoutMs });
  }
}

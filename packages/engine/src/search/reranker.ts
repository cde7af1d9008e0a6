import { z } from 'zod';
import { createLogger } from '../utils/logger.js';
import { ProviderError } from '../utils/retry.js';
import { withTimeoutSignal } from '../utils/helpers.js';
import type { LLMProvider } from '../llm/interface.js';

const log = createLogger('reranker');

export interface RerankScore {
  /** Position of the document in the input list. */
  index: number;
  score: number;
}

export interface RerankOptions {
  signal?: AbortSignal;
}

export interface Reranker {
  readonly name: string;
  /** Scores for the given documents, best first. May omit documents it considers irrelevant. */
  rerank(query: string, documents: string[], opts?: RerankOptions): Promise<RerankScore[]>;
}

interface CohereRerankResponse {
  results?: { index: number; relevance_score: number }[];
}

/**
 * Cohere Rerank API integration.
 */
export class CohereReranker implements Reranker {
  readonly name = 'cohere';
  private apiKey: string;
  private model: string;
  private baseUrl: string;
  private timeoutMs: number;

  constructor(opts: { apiKey?: string; model?: string; baseUrl?: string; timeoutMs?: number }) {
    this.apiKey = opts.apiKey || process.env.COHERE_API_KEY || '';
    this.model = opts.model || 'rerank-v3.5';
    this.baseUrl = (opts.baseUrl || 'https://api.cohere.com').replace(/\/+$/, '');
    this.timeoutMs = opts.timeoutMs || 10000;
  }

  async rerank(query: string, documents: string[], opts?: RerankOptions): Promise<RerankScore[]> {
    if (!this.apiKey) throw new ProviderError('Cohere API key not configured', 401);
    if (documents.length === 0) return [];

    const res = await fetch(`${this.baseUrl}/v2/rerank`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        model: this.model,
        query,
        documents,
        top_n: documents.length,
      }),
      signal: withTimeoutSignal(this.timeoutMs, opts?.signal),
    });

    if (!res.ok) throw await ProviderError.fromResponse('Cohere rerank', res);

    const data: CohereRerankResponse = await res.json();
    const scores = (data.results ?? []).map(r => ({ index: r.index, score: r.relevance_score }));
    log.debug({ query: query.slice(0, 50), input: documents.length, output: scores.length }, 'Reranked documents');
    return scores;
  }
}

const LLMScoresSchema = z.array(z.object({
  index: z.number().int(),
  score: z.number().min(0).max(1),
}));

/**
 * Asks a completion model to score each document's relevance to the query.
 */
export class LLMReranker implements Reranker {
  readonly name: string;

  constructor(private llm: LLMProvider) {
    this.name = `llm(${llm.name})`;
  }

  async rerank(query: string, documents: string[], opts?: RerankOptions): Promise<RerankScore[]> {
    if (documents.length === 0) return [];

    const listing = documents.map((d, i) => `[${i}] ${d}`).join('\n');
    const response = await this.llm.complete(
      `Rate how relevant each document is to the query. Output ONLY a JSON array of objects with "index" and "score" (0.0 to 1.0), sorted by score descending.

Scoring guide:
- 0.9-1.0: Directly answers the query
- 0.6-0.8: Useful background
- 0.3-0.5: Tangentially related
- 0.0-0.2: Irrelevant

Query: "${query}"

Documents:
${listing}

Output format: [{"index": 0, "score": 0.95}, {"index": 2, "score": 0.7}, ...]
Output ONLY valid JSON, no explanation.`,
      {
        maxTokens: 50 + documents.length * 20,
        temperature: 0,
        systemPrompt: 'You are a relevance scoring engine. Output only valid JSON.',
        signal: opts?.signal,
      },
    );

    // Parse JSON from response (handle markdown code blocks)
    const jsonStr = response.replace(/```(?:json)?\n?/g, '').replace(/```/g, '').trim();
    let raw: unknown;
    try {
      raw = JSON.parse(jsonStr);
    } catch (e) {
      throw new ProviderError('LLM reranker returned invalid JSON', 502, true, { cause: e });
    }
    const parsed = LLMScoresSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ProviderError(`LLM reranker returned unexpected shape: ${parsed.error.message}`, 502, true);
    }
    return parsed.data;
  }
}

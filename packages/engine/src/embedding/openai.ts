import type { EmbedCallOptions, EmbeddingProvider } from './interface.js';
import { ProviderError } from '../utils/retry.js';
import { withTimeoutSignal } from '../utils/helpers.js';

interface OpenAIEmbeddingResponse {
  data?: { index: number; embedding: number[] }[];
}

/**
 * OpenAI-compatible `/embeddings` endpoint (OpenAI, Azure-style gateways, vLLM, LiteLLM).
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'openai';
  readonly dimensions: number;
  private apiKey: string;
  readonly model: string;
  private baseUrl: string;
  private timeoutMs: number;

  constructor(opts: { apiKey?: string; model?: string; dimensions?: number; baseUrl?: string; timeoutMs?: number }) {
    this.apiKey = opts.apiKey || process.env.OPENAI_API_KEY || '';
    this.model = opts.model || 'text-embedding-3-small';
    this.dimensions = opts.dimensions || 1536;
    this.baseUrl = (opts.baseUrl || 'https://api.openai.com/v1').replace(/\/+$/, '');
    this.timeoutMs = opts.timeoutMs || 15000;
  }

  async embed(text: string, opts?: EmbedCallOptions): Promise<number[]> {
    const [first] = await this.embedBatch([text], opts);
    return first ?? [];
  }

  async embedBatch(texts: string[], opts?: EmbedCallOptions): Promise<number[][]> {
    if (!this.apiKey) throw new ProviderError('OpenAI API key not configured', 401);

    const res = await fetch(`${this.baseUrl}/embeddings`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        model: this.model,
        input: texts,
        dimensions: this.dimensions,
      }),
      signal: withTimeoutSignal(this.timeoutMs, opts?.signal),
    });

    if (!res.ok) throw await ProviderError.fromResponse('OpenAI Embedding', res);

    const data: OpenAIEmbeddingResponse = await res.json();
    const rows = [...(data.data ?? [])].sort((a, b) => a.index - b.index);
    if (rows.length !== texts.length) {
      throw new ProviderError(`OpenAI Embedding returned ${rows.length} vectors for ${texts.length} inputs`, 502);
    }
    return rows.map(d => d.embedding);
  }
}

import type { EmbedCallOptions, EmbeddingProvider } from './interface.js';
import { ProviderError } from '../utils/retry.js';
import { withTimeoutSignal } from '../utils/helpers.js';

export class OllamaEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'ollama';
  readonly dimensions: number;
  readonly model: string;
  private baseUrl: string;
  private timeoutMs: number;

  constructor(opts: { model?: string; dimensions?: number; baseUrl?: string; timeoutMs?: number }) {
    this.model = opts.model || 'bge-m3';
    this.dimensions = opts.dimensions || 1024;
    this.baseUrl = (opts.baseUrl || 'http://localhost:11434').replace(/\/+$/, '');
    this.timeoutMs = opts.timeoutMs || 30000;
  }

  async embed(text: string, opts?: EmbedCallOptions): Promise<number[]> {
    const [first] = await this.embedBatch([text], opts);
    return first ?? [];
  }

  async embedBatch(texts: string[], opts?: EmbedCallOptions): Promise<number[][]> {
    const res = await fetch(`${this.baseUrl}/api/embed`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ model: this.model, input: texts }),
      signal: withTimeoutSignal(this.timeoutMs, opts?.signal),
    });

    if (!res.ok) throw await ProviderError.fromResponse('Ollama Embedding', res);

    const data: { embeddings?: number[][] } = await res.json();
    const embeddings = data.embeddings ?? [];
    if (embeddings.length !== texts.length) {
      throw new ProviderError(`Ollama returned ${embeddings.length} vectors for ${texts.length} inputs`, 502);
    }
    return embeddings;
  }
}

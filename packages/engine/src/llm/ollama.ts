import type { LLMProvider, LLMCompletionOpts } from './interface.js';
import { ProviderError } from '../utils/retry.js';
import { withTimeoutSignal } from '../utils/helpers.js';

export class OllamaLLMProvider implements LLMProvider {
  readonly name = 'ollama';
  readonly supportsImages = true;
  readonly model: string;
  private baseUrl: string;
  private timeoutMs: number;

  constructor(opts: { model?: string; baseUrl?: string; timeoutMs?: number }) {
    this.model = opts.model || 'qwen2.5vl:3b';
    this.baseUrl = (opts.baseUrl || 'http://localhost:11434').replace(/\/+$/, '');
    this.timeoutMs = opts.timeoutMs || 60000;
  }

  async complete(prompt: string, opts?: LLMCompletionOpts): Promise<string> {
    const res = await fetch(`${this.baseUrl}/api/generate`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        model: this.model,
        prompt: opts?.systemPrompt ? `${opts.systemPrompt}\n\n${prompt}` : prompt,
        images: opts?.images?.length ? opts.images.map(img => img.data) : undefined,
        stream: false,
        options: {
          temperature: opts?.temperature ?? 0.3,
          num_predict: opts?.maxTokens || 500,
        },
      }),
      signal: withTimeoutSignal(this.timeoutMs, opts?.signal),
    });

    if (!res.ok) throw await ProviderError.fromResponse('Ollama API', res);

    const data: { response?: string } = await res.json();
    return data.response || '';
  }
}

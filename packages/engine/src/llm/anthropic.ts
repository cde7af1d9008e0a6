import type { LLMProvider, LLMCompletionOpts } from './interface.js';
import { ProviderError } from '../utils/retry.js';
import { withTimeoutSignal } from '../utils/helpers.js';

type ContentBlock =
  | { type: 'text'; text: string }
  | { type: 'image'; source: { type: 'base64'; media_type: string; data: string } };

export class AnthropicLLMProvider implements LLMProvider {
  readonly name = 'anthropic';
  readonly supportsImages = true;
  private apiKey: string;
  readonly model: string;
  private baseUrl: string;
  private timeoutMs: number;

  constructor(opts: { apiKey?: string; model?: string; baseUrl?: string; timeoutMs?: number }) {
    this.apiKey = opts.apiKey || process.env.ANTHROPIC_API_KEY || '';
    this.model = opts.model || 'claude-haiku-4-5';
    this.baseUrl = (opts.baseUrl || 'https://api.anthropic.com').replace(/\/+$/, '');
    this.timeoutMs = opts.timeoutMs || 60000;
  }

  async complete(prompt: string, opts?: LLMCompletionOpts): Promise<string> {
    if (!this.apiKey) throw new ProviderError('Anthropic API key not configured', 401);

    const content: ContentBlock[] = [
      ...(opts?.images ?? []).map((img): ContentBlock => ({
        type: 'image',
        source: { type: 'base64', media_type: img.mimeType, data: img.data },
      })),
      { type: 'text', text: prompt },
    ];

    const res = await fetch(`${this.baseUrl}/v1/messages`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'x-api-key': this.apiKey,
        'anthropic-version': '2023-06-01',
      },
      body: JSON.stringify({
        model: this.model,
        max_tokens: opts?.maxTokens || 500,
        temperature: opts?.temperature ?? 0.3,
        system: opts?.systemPrompt || undefined,
        messages: [{ role: 'user', content }],
      }),
      signal: withTimeoutSignal(this.timeoutMs, opts?.signal),
    });

    if (!res.ok) throw await ProviderError.fromResponse('Anthropic API', res);

    const data: { content?: { type: string; text?: string }[] } = await res.json();
    return data.content?.find(block => block.type === 'text')?.text || '';
  }
}

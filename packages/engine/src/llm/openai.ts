import type { LLMProvider, LLMCompletionOpts } from './interface.js';
import { ProviderError } from '../utils/retry.js';
import { withTimeoutSignal } from '../utils/helpers.js';

type ChatContentPart =
  | { type: 'text'; text: string }
  | { type: 'image_url'; image_url: { url: string } };

interface ChatMessage {
  role: 'system' | 'user';
  content: string | ChatContentPart[];
}

interface ChatCompletionResponse {
  choices?: { message?: { content?: string | null } }[];
}

/**
 * OpenAI-compatible chat completions. Works against OpenAI, OpenRouter, vLLM and
 * other servers speaking the same format; images travel as data URLs.
 */
export class OpenAILLMProvider implements LLMProvider {
  readonly name = 'openai';
  readonly supportsImages = true;
  private apiKey: string;
  readonly model: string;
  private baseUrl: string;
  private timeoutMs: number;

  constructor(opts: { apiKey?: string; model?: string; baseUrl?: string; timeoutMs?: number }) {
    this.apiKey = opts.apiKey || process.env.OPENAI_API_KEY || '';
    this.model = opts.model || 'gpt-4o-mini';
    this.baseUrl = (opts.baseUrl || 'https://api.openai.com/v1').replace(/\/+$/, '');
    this.timeoutMs = opts.timeoutMs || 60000;
  }

  async complete(prompt: string, opts?: LLMCompletionOpts): Promise<string> {
    if (!this.apiKey) throw new ProviderError('OpenAI API key not configured', 401);

    const messages: ChatMessage[] = [];
    if (opts?.systemPrompt) {
      messages.push({ role: 'system', content: opts.systemPrompt });
    }
    if (opts?.images?.length) {
      messages.push({
        role: 'user',
        content: [
          { type: 'text', text: prompt },
          ...opts.images.map((img): ChatContentPart => ({
            type: 'image_url',
            image_url: { url: `data:${img.mimeType};base64,${img.data}` },
          })),
        ],
      });
    } else {
      messages.push({ role: 'user', content: prompt });
    }

    const res = await fetch(`${this.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        model: this.model,
        messages,
        max_tokens: opts?.maxTokens || 500,
        temperature: opts?.temperature ?? 0.3,
      }),
      signal: withTimeoutSignal(this.timeoutMs, opts?.signal),
    });

    if (!res.ok) throw await ProviderError.fromResponse('OpenAI API', res);

    const data: ChatCompletionResponse = await res.json();
    return data.choices?.[0]?.message?.content || '';
  }
}

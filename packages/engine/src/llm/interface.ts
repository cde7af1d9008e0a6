export interface ImageInput {
  /** Base64-encoded bytes, no data: prefix. */
  data: string;
  mimeType: string;
}

export interface LLMCompletionOpts {
  maxTokens?: number;
  temperature?: number;
  systemPrompt?: string;
  images?: ImageInput[];
  signal?: AbortSignal;
}

export interface LLMProvider {
  readonly name: string;
  readonly model?: string;
  /** Whether `images` are forwarded to the model. */
  readonly supportsImages: boolean;
  complete(prompt: string, opts?: LLMCompletionOpts): Promise<string>;
}

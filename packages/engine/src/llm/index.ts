export type { LLMProvider, LLMCompletionOpts, ImageInput } from './interface.js';
export { OpenAILLMProvider } from './openai.js';
export { AnthropicLLMProvider } from './anthropic.js';
export { OllamaLLMProvider } from './ollama.js';

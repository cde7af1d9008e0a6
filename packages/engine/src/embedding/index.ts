export type { EmbeddingProvider, SparseEmbeddingProvider, SparseVector, EmbedCallOptions } from './interface.js';
export { OpenAIEmbeddingProvider } from './openai.js';
export { OllamaEmbeddingProvider } from './ollama.js';
export { LexicalSparseEmbedder, tokenize } from './lexical.js';

import { ConfigError } from '../errors.js';
import type { StrataConfig } from '../utils/config.js';
import { OpenAIEmbeddingProvider } from '../embedding/openai.js';
import { OllamaEmbeddingProvider } from '../embedding/ollama.js';
import { LexicalSparseEmbedder } from '../embedding/lexical.js';
import type { EmbeddingProvider, SparseEmbeddingProvider } from '../embedding/interface.js';
import { OpenAILLMProvider } from '../llm/openai.js';
import { AnthropicLLMProvider } from '../llm/anthropic.js';
import { OllamaLLMProvider } from '../llm/ollama.js';
import type { LLMProvider } from '../llm/interface.js';
import { CohereReranker, LLMReranker, type Reranker } from '../search/reranker.js';
import { ModelGateway, type GatewayProviders, type GatewaySettings } from './model-gateway.js';

export { ModelGateway } from './model-gateway.js';
export type {
  GatewayProviders,
  GatewaySettings,
  GatewayCallOptions,
  SummarizeInput,
  Summary,
  EmbeddingKind,
  CapabilityStats,
  GatewayCapabilities,
} from './model-gateway.js';
export { AsyncSemaphore } from './semaphore.js';

export function createEmbeddingProvider(config: StrataConfig['embedding']): EmbeddingProvider | undefined {
  switch (config.provider) {
    case 'openai':
      return new OpenAIEmbeddingProvider(config);
    case 'ollama':
      return new OllamaEmbeddingProvider(config);
    case 'none':
      return undefined;
  }
}

export function createSparseProvider(config: StrataConfig['sparse']): SparseEmbeddingProvider | undefined {
  return config.provider === 'lexical' ? new LexicalSparseEmbedder() : undefined;
}

export function createLLMProvider(config: StrataConfig['vlm']): LLMProvider | undefined {
  switch (config.provider) {
    case 'openai':
      return new OpenAILLMProvider(config);
    case 'anthropic':
      return new AnthropicLLMProvider(config);
    case 'ollama':
      return new OllamaLLMProvider(config);
    case 'none':
      return undefined;
  }
}

export function createReranker(config: StrataConfig['rerank'], llm?: LLMProvider): Reranker | undefined {
  switch (config.provider) {
    case 'cohere':
      return new CohereReranker(config);
    case 'llm':
      if (!llm) throw new ConfigError('LLM reranker requires a configured vlm provider');
      return new LLMReranker(llm);
    case 'none':
      return undefined;
  }
}

export function gatewaySettings(config: StrataConfig): GatewaySettings {
  return {
    concurrency: { ...config.gateway.concurrency },
    retries: config.gateway.retries,
    backoffBaseMs: config.gateway.backoffBaseMs,
    backoffMaxMs: config.gateway.backoffMaxMs,
    queueTimeoutMs: config.gateway.queueTimeoutMs,
    dimension: config.embedding.dimensions,
    abstractTokens: config.context.abstractTokens,
    overviewTokens: config.context.overviewTokens,
    vlmMaxTokens: config.vlm.maxTokens,
  };
}

/**
 * Build a gateway from configuration. Explicit `overrides` replace the providers the
 * configuration would create (tests and embedders of the library inject their own).
 */
export function createModelGateway(config: StrataConfig, overrides: GatewayProviders = {}): ModelGateway {
  const vlm = overrides.vlm ?? createLLMProvider(config.vlm);
  const providers: GatewayProviders = {
    dense: overrides.dense ?? createEmbeddingProvider(config.embedding),
    sparse: overrides.sparse ?? createSparseProvider(config.sparse),
    vlm,
    rerank: overrides.rerank ?? createReranker(config.rerank, vlm),
  };
  return new ModelGateway(gatewaySettings(config), providers);
}

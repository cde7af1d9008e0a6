export {
  KnowledgeStore,
  createKnowledgeStore,
  type IngestRequest,
  type IngestOptions,
  type IngestResult,
  type IngestOutcome,
  type LayerPayload,
  type KnowledgeStoreDeps,
  type KnowledgeStoreOverrides,
} from './app.js';
export * from './errors.js';
export * from './gateway/index.js';
export * from './vector/index.js';
export { ContextBuilder, type ContentType, type ResourceInput, type BuiltContext, type LoadedContent } from './context/builder.js';
export { chunkText, type Chunk } from './context/chunker.js';
export {
  HybridRetrievalCoordinator,
  compareResults,
  type ContextLevel,
  type SearchRequest,
  type SearchResult,
  type SearchResponse,
  type SearchDebug,
  type HybridSearchSettings,
} from './search/hybrid.js';
export { fuseHits, type FusionStrategy, type FusionOptions, type FusedHit } from './search/fusion.js';
export { CohereReranker, LLMReranker, type Reranker, type RerankScore } from './search/reranker.js';
export { TenantCollectionRegistry, type ResolveOptions, type TenantRegistryOptions } from './tenancy/registry.js';
export {
  collectionNameFor,
  tenantFilter,
  targetFilter,
  parentUri,
  resourceIdFor,
  recordIdFor,
  validateScope,
  type TenantScope,
} from './tenancy/scope.js';
export { InMemoryByteStore, type ByteStore, type FetchOptions } from './storage/byte-store.js';
export * from './embedding/index.js';
export * from './llm/index.js';
export { parseConfig, resolveConfig, parseBackendConfig, createLogger, type StrataConfig, type StrataConfigInput, type VectorDBBackendConfig } from './utils/index.js';

export {
  parseConfig,
  resolveConfig,
  parseBackendConfig,
  type StrataConfig,
  type StrataConfigInput,
  type VectorDBBackendConfig,
} from './config.js';
export { logger, createLogger, type Logger } from './logger.js';
export { generateId, stableId, contentHash, estimateTokens, truncateToTokens } from './helpers.js';
export { withRetry, ProviderError, RetryExhaustedError, isTransient } from './retry.js';

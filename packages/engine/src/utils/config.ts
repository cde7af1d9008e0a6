// Strata configuration schema
import { z } from 'zod';
import { ConfigError } from '../errors.js';

const EmbeddingProviderSchema = z.object({
  provider: z.enum(['openai', 'ollama', 'none']).default('openai'),
  model: z.string().optional(),
  dimensions: z.number().int().positive().default(1536),
  apiKey: z.string().optional(),
  baseUrl: z.string().optional(),
  timeoutMs: z.number().int().positive().default(15000),
});

const SparseProviderSchema = z.object({
  provider: z.enum(['lexical', 'none']).default('none'),
});

const VLMProviderSchema = z.object({
  provider: z.enum(['openai', 'anthropic', 'ollama', 'none']).default('none'),
  model: z.string().optional(),
  apiKey: z.string().optional(),
  baseUrl: z.string().optional(),
  timeoutMs: z.number().int().positive().default(60000),
  maxTokens: z.number().int().positive().default(2500),
});

const RerankSchema = z.object({
  provider: z.enum(['cohere', 'llm', 'none']).default('none'),
  model: z.string().optional(),
  apiKey: z.string().optional(),
  baseUrl: z.string().optional(),
  timeoutMs: z.number().int().positive().default(10000),
});

export const VectorDBBackendConfigSchema = z.object({
  backend: z.string().min(1).default('memory'),
  name: z.string().min(1).default('context'),
  url: z.string().optional(),
  apiKey: z.string().optional(),
  path: z.string().optional(),
  distance: z.enum(['cosine', 'dot', 'l2']).default('cosine'),
  sparseWeight: z.number().min(0).default(0),
  timeoutMs: z.number().int().positive().default(10000),
  indexName: z.string().default('default'),
  batchSize: z.number().int().positive().default(64),
  retries: z.number().int().min(0).default(2),
});

const GatewaySchema = z.object({
  concurrency: z.object({
    embedding: z.number().int().positive().default(10),
    vlm: z.number().int().positive().default(100),
    rerank: z.number().int().positive().default(10),
  }).default({}),
  retries: z.number().int().min(0).default(2),
  backoffBaseMs: z.number().int().min(0).default(250),
  backoffMaxMs: z.number().int().min(0).default(4000),
  queueTimeoutMs: z.number().int().positive().optional(),
});

const StrataConfigSchema = z.object({
  embedding: EmbeddingProviderSchema.default({}),
  sparse: SparseProviderSchema.default({}),
  vlm: VLMProviderSchema.default({}),
  rerank: RerankSchema.default({}),
  gateway: GatewaySchema.default({}),
  vectorBackend: VectorDBBackendConfigSchema.default({}),
  context: z.object({
    abstractTokens: z.number().int().positive().default(100),
    overviewTokens: z.number().int().positive().default(2000),
    chunkTokens: z.number().int().positive().default(6000),
    contentEmbedTokens: z.number().int().positive().default(2000),
    skipUnchanged: z.boolean().default(true),
  }).default({}),
  search: z.object({
    defaultTopK: z.number().int().positive().default(10),
    candidateMultiplier: z.number().int().positive().default(3),
    fusion: z.enum(['linear', 'rrf']).default('linear'),
    rrfK: z.number().positive().default(60),
    rerankWindow: z.number().int().positive().default(20),
  }).default({}),
  tenancy: z.object({
    recheckIntervalMs: z.number().int().min(0).default(60000),
  }).default({}),
});

export type StrataConfig = z.infer<typeof StrataConfigSchema>;
export type StrataConfigInput = z.input<typeof StrataConfigSchema>;
export type VectorDBBackendConfig = z.infer<typeof VectorDBBackendConfigSchema>;
export type VectorDBBackendConfigInput = z.input<typeof VectorDBBackendConfigSchema>;
export type EmbeddingConfig = StrataConfig['embedding'];
export type VLMConfig = StrataConfig['vlm'];
export type RerankConfig = StrataConfig['rerank'];
export type GatewayConfig = StrataConfig['gateway'];
export type ContextConfig = StrataConfig['context'];
export type SearchConfig = StrataConfig['search'];

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const inner of Object.values(value)) deepFreeze(inner);
    Object.freeze(value);
  }
  return value;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}

function envOverrides(env: Record<string, string | undefined>): Record<string, unknown> {
  const vectorBackend: Record<string, unknown> = {};
  if (env.STRATA_VECTOR_BACKEND) vectorBackend.backend = env.STRATA_VECTOR_BACKEND;
  if (env.STRATA_VECTOR_URL) vectorBackend.url = env.STRATA_VECTOR_URL;
  if (env.STRATA_VECTOR_API_KEY) vectorBackend.apiKey = env.STRATA_VECTOR_API_KEY;
  if (env.STRATA_COLLECTION) vectorBackend.name = env.STRATA_COLLECTION;
  if (env.STRATA_SPARSE_WEIGHT) vectorBackend.sparseWeight = Number(env.STRATA_SPARSE_WEIGHT);
  return Object.keys(vectorBackend).length > 0 ? { vectorBackend } : {};
}

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return v !== null && typeof v === 'object' && !Array.isArray(v);
}

function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };
  for (const [key, value] of Object.entries(source)) {
    const existing = result[key];
    result[key] = isPlainObject(existing) && isPlainObject(value) ? deepMerge(existing, value) : value;
  }
  return result;
}

/**
 * Validate an already-resolved configuration object. The result is deeply frozen.
 */
export function parseConfig(input: StrataConfigInput | Record<string, unknown> = {}): StrataConfig {
  const parsed = StrataConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }
  return deepFreeze(parsed.data);
}

/** Apply STRATA_* environment overrides on top of `input`, then validate. */
export function resolveConfig(
  input: StrataConfigInput = {},
  env: Record<string, string | undefined> = process.env,
): StrataConfig {
  const base: Record<string, unknown> = { ...input };
  return parseConfig(deepMerge(base, envOverrides(env)));
}

export function parseBackendConfig(input: unknown): VectorDBBackendConfig {
  const parsed = VectorDBBackendConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(`Invalid vector backend configuration: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

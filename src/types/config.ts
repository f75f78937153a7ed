import { z } from 'zod';
import { SIMILARITY_METRICS, VECTOR_PRECISIONS } from './search.js';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

export const INDEX_BACKENDS = ['memory', 'http'] as const;
export type IndexBackendKind = typeof INDEX_BACKENDS[number];

export const EMBEDDING_PROVIDERS = ['hash', 'openai', 'ollama'] as const;
export type EmbeddingProviderKind = typeof EMBEDDING_PROVIDERS[number];

const IndexConfigSchema = z.object({
  name: z.string().min(1).default('documents'),
  dimension: z.number().int().positive().default(384),
  metric: z.enum(SIMILARITY_METRICS).default('cosine'),
  precision: z.enum(VECTOR_PRECISIONS).default('int8')
});

const RetryConfigSchema = z.object({
  attempts: z.number().int().min(1).default(3),
  baseDelayMs: z.number().int().min(0).default(200),
  maxDelayMs: z.number().int().min(0).default(5000)
});

const BackendConfigSchema = z.object({
  provider: z.enum(INDEX_BACKENDS).default('memory'),
  baseUrl: z.string().url().default('http://localhost:8080/api/v1'),
  authToken: z.string().optional(),
  timeoutMs: z.number().int().positive().default(10000),
  retry: RetryConfigSchema.default({})
});

const EmbeddingConfigSchema = z.object({
  provider: z.enum(EMBEDDING_PROVIDERS).default('hash'),
  model: z.string().min(1).default('hash-v1'),
  dimension: z.number().int().positive().default(384),
  baseUrl: z.string().url().optional(),
  apiKey: z.string().optional(),
  batchSize: z.number().int().positive().default(32)
});

const IngestionConfigSchema = z.object({
  snippetLength: z.number().int().min(0).default(200)
});

const SearchConfigSchema = z.object({
  defaultTopK: z.number().int().positive().default(5),
  maxTopK: z.number().int().positive().default(50)
});

const ServerConfigSchema = z.object({
  host: z.string().default('0.0.0.0'),
  port: z.number().int().min(0).max(65535).default(8000),
  requestTimeoutMs: z.number().int().positive().default(30000),
  bodyLimit: z.number().int().positive().default(10 * 1024 * 1024),
  enableCors: z.boolean().default(true),
  corsOrigins: z.array(z.string()).default([])
});

export const AppConfigSchema = z.object({
  index: IndexConfigSchema.default({}),
  backend: BackendConfigSchema.default({}),
  embedding: EmbeddingConfigSchema.default({}),
  ingestion: IngestionConfigSchema.default({}),
  search: SearchConfigSchema.default({}),
  server: ServerConfigSchema.default({}),
  logLevel: z.enum(LOG_LEVELS).default('info'),
  logPretty: z.boolean().default(false)
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type AppConfigInput = z.input<typeof AppConfigSchema>;
export type BackendConfig = AppConfig['backend'];
export type EmbeddingConfig = AppConfig['embedding'];
export type RetryConfig = BackendConfig['retry'];

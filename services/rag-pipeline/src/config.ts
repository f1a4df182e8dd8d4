/**
 * Pipeline Configuration
 *
 * Every component takes its slice of PipelineConfig explicitly; nothing reads
 * process.env after loadPipelineConfig() has run.
 *
 * Environment Variables:
 *   RAG_CHUNK_MAX_SIZE=1000                 # characters per chunk before splitting
 *   RAG_CHUNK_OVERLAP=200                   # characters repeated from the previous chunk
 *   RAG_STRUCTURING_TIMEOUT_MS=60000
 *   RAG_STRUCTURING_MAX_ATTEMPTS=2
 *   RAG_EMBEDDING_MODEL=text-embedding-3-small
 *   RAG_EMBEDDING_DIMENSIONS=1536
 *   RAG_EMBEDDING_BATCH_SIZE=32
 *   RAG_EMBEDDING_TIMEOUT_MS=30000
 *   RAG_EMBEDDING_MAX_ATTEMPTS=3
 *   RAG_EMBED_WITH_HEADINGS=true            # prefix the hierarchy path to embedded text
 *   RAG_RETRY_BASE_DELAY_MS=1000
 *   RAG_RETRIEVAL_TOP_K=10
 *   RAG_RETRIEVAL_SIMILARITY_THRESHOLD=0.7
 *   RAG_QUERY_TIMEOUT_MS=10000
 *   RAG_HNSW_EF_SEARCH=                     # unset keeps the pgvector default (40)
 *   RAG_INGEST_CONCURRENCY=3
 *   RAG_DOCUMENT_TIMEOUT_MINUTES=10
 *   RAG_DOWNLOAD_TIMEOUT_MS=30000
 *   RAG_DOWNLOAD_MAX_ATTEMPTS=3
 *   RAG_SKIP_UNCHANGED=false                # skip documents whose content hash is unchanged
 *   RAG_DB_POOL_MAX=10
 *   RAG_DB_STATEMENT_TIMEOUT_MS=30000       # 0 disables the server-side statement timeout
 *   OPENAI_API_KEY / OPENAI_BASE_URL
 */

import { z } from 'zod'
import { ConfigurationError } from './errors.js'

const positiveInt = z.coerce.number().int().positive()
const nonNegativeInt = z.coerce.number().int().nonnegative()
const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1')

export const ChunkingConfigSchema = z
  .object({
    maxChunkSize: positiveInt.default(1000),
    overlap: nonNegativeInt.default(200),
    structuringTimeoutMs: positiveInt.default(60_000),
    structuringMaxAttempts: positiveInt.default(2),
    retryBaseDelayMs: nonNegativeInt.default(1000),
  })
  .refine((c) => c.overlap < c.maxChunkSize, {
    message: 'overlap must be smaller than maxChunkSize',
    path: ['overlap'],
  })

export const EmbeddingConfigSchema = z.object({
  model: z.string().min(1).default('text-embedding-3-small'),
  dimensions: positiveInt.default(1536),
  batchSize: positiveInt.default(32),
  timeoutMs: positiveInt.default(30_000),
  maxAttempts: positiveInt.default(3),
  retryBaseDelayMs: nonNegativeInt.default(1000),
  embedWithHeadings: z.boolean().default(true),
})

export const RetrievalConfigSchema = z.object({
  topK: positiveInt.default(10),
  similarityThreshold: z.coerce.number().min(-1).max(1).default(0.7),
  queryTimeoutMs: positiveInt.default(10_000),
  efSearch: positiveInt.optional(),
})

export const IngestionConfigSchema = z.object({
  concurrency: positiveInt.default(3),
  documentTimeoutMinutes: z.coerce.number().positive().default(10),
  downloadTimeoutMs: positiveInt.default(30_000),
  downloadMaxAttempts: positiveInt.default(3),
  skipUnchanged: z.boolean().default(false),
})

export const DatabaseConfigSchema = z.object({
  url: z.string().min(1).optional(),
  poolMax: positiveInt.default(10),
  /** Server-side limit on any single statement; 0 disables it */
  statementTimeoutMs: nonNegativeInt.default(30_000),
})

export const ProviderConfigSchema = z.object({
  apiKey: z.string().min(1).optional(),
  baseUrl: z.string().url().default('https://api.openai.com/v1'),
})

export const PipelineConfigSchema = z.object({
  chunking: ChunkingConfigSchema,
  embedding: EmbeddingConfigSchema,
  retrieval: RetrievalConfigSchema,
  ingestion: IngestionConfigSchema,
  database: DatabaseConfigSchema,
  provider: ProviderConfigSchema,
})

export type ChunkingConfig = z.infer<typeof ChunkingConfigSchema>
export type EmbeddingConfig = z.infer<typeof EmbeddingConfigSchema>
export type RetrievalConfig = z.infer<typeof RetrievalConfigSchema>
export type IngestionConfig = z.infer<typeof IngestionConfigSchema>
export type DatabaseConfig = z.infer<typeof DatabaseConfigSchema>
export type ProviderConfig = z.infer<typeof ProviderConfigSchema>
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>

type Env = Record<string, string | undefined>

/** Empty strings count as unset so `.env` placeholders fall back to defaults */
function read(env: Env, key: string): string | undefined {
  const value = env[key]?.trim()
  return value ? value : undefined
}

function parseSection<S extends z.ZodTypeAny>(
  section: string,
  schema: S,
  input: unknown
): z.infer<S> {
  const parsed = schema.safeParse(input)
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${section}.${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new ConfigurationError(`Invalid configuration: ${details}`)
  }
  return parsed.data
}

/**
 * Build the pipeline configuration from environment variables.
 *
 * @throws ConfigurationError when a value is malformed or out of range
 */
export function loadPipelineConfig(env: Env = process.env): PipelineConfig {
  const flag = (key: string) => {
    const raw = read(env, key)
    return raw === undefined
      ? undefined
      : parseSection(key, booleanFlag, raw.toLowerCase())
  }

  return {
    chunking: parseSection('chunking', ChunkingConfigSchema, {
      maxChunkSize: read(env, 'RAG_CHUNK_MAX_SIZE'),
      overlap: read(env, 'RAG_CHUNK_OVERLAP'),
      structuringTimeoutMs: read(env, 'RAG_STRUCTURING_TIMEOUT_MS'),
      structuringMaxAttempts: read(env, 'RAG_STRUCTURING_MAX_ATTEMPTS'),
      retryBaseDelayMs: read(env, 'RAG_RETRY_BASE_DELAY_MS'),
    }),
    embedding: parseSection('embedding', EmbeddingConfigSchema, {
      model: read(env, 'RAG_EMBEDDING_MODEL'),
      dimensions: read(env, 'RAG_EMBEDDING_DIMENSIONS'),
      batchSize: read(env, 'RAG_EMBEDDING_BATCH_SIZE'),
      timeoutMs: read(env, 'RAG_EMBEDDING_TIMEOUT_MS'),
      maxAttempts: read(env, 'RAG_EMBEDDING_MAX_ATTEMPTS'),
      retryBaseDelayMs: read(env, 'RAG_RETRY_BASE_DELAY_MS'),
      embedWithHeadings: flag('RAG_EMBED_WITH_HEADINGS'),
    }),
    retrieval: parseSection('retrieval', RetrievalConfigSchema, {
      topK: read(env, 'RAG_RETRIEVAL_TOP_K'),
      similarityThreshold: read(env, 'RAG_RETRIEVAL_SIMILARITY_THRESHOLD'),
      queryTimeoutMs: read(env, 'RAG_QUERY_TIMEOUT_MS'),
      efSearch: read(env, 'RAG_HNSW_EF_SEARCH'),
    }),
    ingestion: parseSection('ingestion', IngestionConfigSchema, {
      concurrency: read(env, 'RAG_INGEST_CONCURRENCY'),
      documentTimeoutMinutes: read(env, 'RAG_DOCUMENT_TIMEOUT_MINUTES'),
      downloadTimeoutMs: read(env, 'RAG_DOWNLOAD_TIMEOUT_MS'),
      downloadMaxAttempts: read(env, 'RAG_DOWNLOAD_MAX_ATTEMPTS'),
      skipUnchanged: flag('RAG_SKIP_UNCHANGED'),
    }),
    database: parseSection('database', DatabaseConfigSchema, {
      url: read(env, 'DATABASE_URL'),
      poolMax: read(env, 'RAG_DB_POOL_MAX'),
      statementTimeoutMs: read(env, 'RAG_DB_STATEMENT_TIMEOUT_MS'),
    }),
    provider: parseSection('provider', ProviderConfigSchema, {
      apiKey: read(env, 'OPENAI_API_KEY'),
      baseUrl: read(env, 'OPENAI_BASE_URL'),
    }),
  }
}

export type PipelineConfigOverrides = {
  [K in keyof PipelineConfig]?: Partial<PipelineConfig[K]>
}

/**
 * Defaults for every section, with per-section overrides (tests, dry runs)
 */
export function createPipelineConfig(overrides: PipelineConfigOverrides = {}): PipelineConfig {
  return {
    chunking: parseSection('chunking', ChunkingConfigSchema, overrides.chunking ?? {}),
    embedding: parseSection('embedding', EmbeddingConfigSchema, overrides.embedding ?? {}),
    retrieval: parseSection('retrieval', RetrievalConfigSchema, overrides.retrieval ?? {}),
    ingestion: parseSection('ingestion', IngestionConfigSchema, overrides.ingestion ?? {}),
    database: parseSection('database', DatabaseConfigSchema, overrides.database ?? {}),
    provider: parseSection('provider', ProviderConfigSchema, overrides.provider ?? {}),
  }
}

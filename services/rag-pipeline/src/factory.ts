/**
 * Wires the default providers into a pipeline and a retrieval engine
 */

import { createDb, type ConnectionOptions, type Database } from '@legal-rag/db'
import type { DatabaseConfig, PipelineConfig } from './config.js'
import { ConfigurationError } from './errors.js'
import { EmbeddingGenerator } from './embedding/embedding-generator.js'
import { OpenAIEmbeddingProvider } from './embedding/openai-provider.js'
import type { EmbeddingProvider } from './embedding/provider.js'
import { ChunkExtractor } from './extractor/chunk-extractor.js'
import { PdfStructurer } from './extractor/pdf-structurer.js'
import type { DocumentStructurer } from './extractor/structurer.js'
import { IngestionPipeline } from './pipeline/ingestion-pipeline.js'
import { RetrievalEngine } from './retrieval/retrieval-engine.js'
import { DefaultSourceLoader, type SourceLoader } from './sources/source-loader.js'
import { MemoryVectorStore } from './store/memory-vector-store.js'
import { PgVectorStore } from './store/pg-vector-store.js'
import type { VectorStore } from './store/vector-store.js'

/**
 * The embedding side (generator, pipeline, retrieval) is built on first
 * access, so store-only commands run without provider credentials.
 */
export interface RagServices {
  readonly store: VectorStore
  readonly generator: EmbeddingGenerator
  readonly pipeline: IngestionPipeline
  readonly retrieval: RetrievalEngine
  /** Releases the store's database connections */
  close(): Promise<void>
}

export interface CreateRagServicesOptions {
  /** Keep everything in memory instead of PostgreSQL */
  dryRun?: boolean
  /** Reuse an existing connection; it is not closed by close() */
  db?: Database
  /** Directory where downloaded sources are cached */
  cacheDir?: string
  structurer?: DocumentStructurer
  provider?: EmbeddingProvider
  loader?: SourceLoader
  store?: VectorStore
}

export function connectionOptions(url: string, database: DatabaseConfig): ConnectionOptions {
  return {
    databaseUrl: url,
    poolMax: database.poolMax,
    statementTimeoutMs: database.statementTimeoutMs,
  }
}

function lazy<T>(create: () => T): () => T {
  let value: { current: T } | null = null
  return () => {
    if (!value) {
      value = { current: create() }
    }
    return value.current
  }
}

function createStore(config: PipelineConfig, options: CreateRagServicesOptions): VectorStore {
  if (options.store) return options.store
  if (options.dryRun) return new MemoryVectorStore(config.embedding.dimensions)

  if (options.db) {
    return new PgVectorStore(options.db, { efSearch: config.retrieval.efSearch })
  }
  if (!config.database.url) {
    throw new ConfigurationError('DATABASE_URL is required unless running dry')
  }
  const db = createDb(connectionOptions(config.database.url, config.database))
  return new PgVectorStore(db, { efSearch: config.retrieval.efSearch, ownsConnection: true })
}

/**
 * @throws ConfigurationError when DATABASE_URL is missing; a missing API key
 *   surfaces on first use of the embedding side
 */
export function createRagServices(
  config: PipelineConfig,
  options: CreateRagServicesOptions = {}
): RagServices {
  const store = createStore(config, options)

  const generator = lazy(() => {
    const provider =
      options.provider ??
      new OpenAIEmbeddingProvider({
        apiKey: config.provider.apiKey,
        baseUrl: config.provider.baseUrl,
        model: config.embedding.model,
        dimensions: config.embedding.dimensions,
      })
    return new EmbeddingGenerator(provider, config.embedding)
  })

  const pipeline = lazy(() => {
    const extractor = new ChunkExtractor(options.structurer ?? new PdfStructurer(), config.chunking)
    const loader =
      options.loader ??
      new DefaultSourceLoader({
        downloadTimeoutMs: config.ingestion.downloadTimeoutMs,
        downloadMaxAttempts: config.ingestion.downloadMaxAttempts,
        retryBaseDelayMs: config.chunking.retryBaseDelayMs,
        cacheDir: options.cacheDir,
      })
    return new IngestionPipeline({ loader, extractor, generator: generator(), store, config })
  })

  const retrieval = lazy(() => new RetrievalEngine(generator(), store, config.retrieval))

  return {
    store,
    get generator() {
      return generator()
    },
    get pipeline() {
      return pipeline()
    },
    get retrieval() {
      return retrieval()
    },
    close: () => store.close(),
  }
}

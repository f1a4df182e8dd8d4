export * from './types/index.js'
export * from './errors.js'
export * from './config.js'
export { withRetry, withTimeout, backoffDelay, sleep, type RetryOptions } from './utils/retry.js'

export type {
  DocumentStructurer,
  StructuredBlock,
  StructuredDocument,
  HeadingBlock,
  TextBlock,
} from './extractor/structurer.js'
export { PdfStructurer, detectHeading, blocksFromPages, isPdf } from './extractor/pdf-structurer.js'
export { splitSection, overlapTail, type SectionPiece, type SectionUnit } from './extractor/text-splitter.js'
export {
  ChunkExtractor,
  chunkBlocks,
  sectionsFromBlocks,
  countCitations,
  countWords,
} from './extractor/chunk-extractor.js'

export type { EmbeddingProvider } from './embedding/provider.js'
export { OpenAIEmbeddingProvider, type OpenAIEmbeddingProviderOptions } from './embedding/openai-provider.js'
export { EmbeddingGenerator, embeddingText } from './embedding/embedding-generator.js'

export type { VectorStore } from './store/vector-store.js'
export { MemoryVectorStore } from './store/memory-vector-store.js'
export { PgVectorStore, type PgVectorStoreOptions } from './store/pg-vector-store.js'
export { cosineSimilarity, compareScored } from './store/similarity.js'

export { RetrievalEngine, rankResults } from './retrieval/retrieval-engine.js'
export { buildContext, citationLabel } from './retrieval/context.js'

export { WorkerPool, type WorkerPoolConfig, type WorkerStats } from './pipeline/worker-pool.js'
export { IngestionPipeline, sha256, type IngestionPipelineDeps } from './pipeline/ingestion-pipeline.js'

export {
  DefaultSourceLoader,
  filenameFor,
  isUrl,
  type LoadedSource,
  type SourceLoader,
  type SourceLoaderOptions,
} from './sources/source-loader.js'
export { loadManifest, parseManifest, sourcesFromDirectory } from './sources/manifest.js'

export { createRagServices, type RagServices, type CreateRagServicesOptions } from './factory.js'

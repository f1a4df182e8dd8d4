/**
 * Pipeline Types
 *
 * Core types shared by the extractor, embedding generator, vector stores,
 * retrieval engine and ingestion coordinator
 */

import type { ChunkMetadata, DocumentMetadata, EmbeddingStatus } from '@legal-rag/db'
import type { ErrorKind } from '../errors.js'

export type { ChunkMetadata, DocumentMetadata, EmbeddingStatus }

// ============================================================================
// Extraction
// ============================================================================

/**
 * Inclusive page range a chunk's text was taken from (1-based)
 */
export interface PageSpan {
  start: number
  end: number
}

/**
 * A chunk as produced by the extractor, before embedding
 */
export interface ExtractedChunk {
  position: number
  content: string
  hierarchyPath: string[]
  pageSpan: PageSpan
  metadata: ChunkMetadata
}

/**
 * Stable identity of the document being extracted (used for logging and
 * idempotent re-ingestion)
 */
export interface DocumentIdentity {
  sourceLocator: string
  filename: string
}

export type ExtractionResult =
  | {
      status: 'success'
      identity: DocumentIdentity
      chunks: ExtractedChunk[]
      pageCount: number
    }
  | {
      status: 'failed'
      identity: DocumentIdentity
      chunks: []
      errorKind: ErrorKind
      error: string
    }

// ============================================================================
// Embedding
// ============================================================================

/**
 * A batch that could not be embedded after all retry attempts
 */
export interface FailedBatch {
  /** 0-based batch number */
  batchIndex: number
  /** Index of the batch's first text in the input */
  startIndex: number
  size: number
  errorKind: ErrorKind
  error: string
}

export interface EmbeddingOutcome {
  /** vectors[i] belongs to texts[i]; null when its batch failed */
  vectors: (number[] | null)[]
  failedBatches: FailedBatch[]
  model: string
}

// ============================================================================
// Storage
// ============================================================================

export interface NewDocument {
  filename: string
  sourceLocator: string
  metadata?: DocumentMetadata
  sizeBytes?: number
}

/** Document fields written together with a new chunk set */
export type DocumentUpdate = Partial<Pick<NewDocument, 'filename' | 'metadata' | 'sizeBytes'>>

export interface StoreChunksOptions {
  /** sha-256 of the source bytes, recorded together with the new chunk set */
  contentHash?: string
  document?: DocumentUpdate
  /** Checked right before commit; an aborted write is rolled back */
  signal?: AbortSignal
}

export interface StoredDocument {
  id: number
  filename: string
  sourceLocator: string
  metadata: DocumentMetadata
  sizeBytes: number | null
  contentHash: string | null
  version: number
  chunkCount: number
  ingestedAt: Date
  updatedAt: Date
}

export interface StoreDocumentResult {
  id: number
  /** false when a row for the same source locator already existed */
  created: boolean
  /** Version of the chunk set currently committed for the document */
  version: number
}

/**
 * A chunk ready to be written: embedding is present only when
 * embeddingStatus is 'embedded'
 */
export interface ChunkWithEmbedding extends ExtractedChunk {
  embedding: number[] | null
  embeddingStatus: EmbeddingStatus
  embeddingModel: string | null
}

export interface StoredChunk extends ChunkWithEmbedding {
  id: number
  documentId: number
}

export interface StoreChunksResult {
  documentId: number
  version: number
  chunkCount: number
  embeddedCount: number
}

/**
 * Chunk returned by a similarity query, with its document context
 */
export interface ScoredChunk {
  chunkId: number
  documentId: number
  position: number
  content: string
  hierarchyPath: string[]
  pageSpan: PageSpan
  similarity: number
  document: {
    filename: string
    sourceLocator: string
    metadata: DocumentMetadata
  }
}

export interface PendingEmbedding {
  chunkId: number
  documentId: number
  position: number
  content: string
  hierarchyPath: string[]
}

export interface EmbeddingUpdate {
  chunkId: number
  embedding: number[]
  embeddingModel: string
}

// ============================================================================
// Retrieval
// ============================================================================

export interface RankedResult extends ScoredChunk {
  /** 1-based */
  rank: number
}

export type RetrievalResponse =
  | { status: 'ok'; query: string; results: RankedResult[] }
  | { status: 'no_results'; query: string; results: [] }
  | {
      status: 'error'
      query: string
      results: []
      error: { kind: ErrorKind; message: string }
    }

export interface RetrieveOptions {
  k?: number
  similarityThreshold?: number
}

// ============================================================================
// Ingestion
// ============================================================================

/**
 * One entry of an ingestion batch
 */
export interface DocumentSource {
  /** URL or filesystem path */
  locator: string
  filename?: string
  metadata?: DocumentMetadata
}

export type DocumentStatus = 'succeeded' | 'partial' | 'skipped' | 'failed'

export interface DocumentReport {
  locator: string
  filename: string
  status: DocumentStatus
  documentId?: number
  version?: number
  chunkCount: number
  embeddedCount: number
  failedEmbeddingCount: number
  /** Failure reason, or the embedding batch errors for partial documents */
  errors: { kind: ErrorKind; message: string }[]
  duration_ms: number
}

export interface IngestionReport {
  total: number
  succeeded: number
  partial: number
  skipped: number
  failed: number
  documents: DocumentReport[]
  duration_ms: number
}

export interface IngestOptions {
  /** Only the first N sources are processed (partial or test runs) */
  maxDocuments?: number
}

export interface ReembedOptions {
  documentId?: number
  limit?: number
}

export interface ReembedResult {
  attempted: number
  embedded: number
  failed: number
}

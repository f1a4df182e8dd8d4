import { ConfigurationError, ConsistencyError, ServiceUnavailableError } from '../errors.js'
import type { ChunkWithEmbedding, DocumentUpdate, StoredDocument } from '../types/index.js'

export function assertDimension(vector: number[], dimensions: number, label: string): void {
  if (vector.length !== dimensions) {
    throw new ConfigurationError(
      `${label}: embedding has ${vector.length} dimensions, store expects ${dimensions}`
    )
  }
}

/**
 * Checked before anything is written: positions are exactly 0..n-1 and an
 * embedding is present (with the store's dimension) iff the chunk is embedded.
 */
export function validateChunkSet(
  documentId: number,
  chunks: ChunkWithEmbedding[],
  dimensions: number
): void {
  chunks.forEach((chunk, index) => {
    const label = `Document ${documentId} chunk ${index}`
    if (chunk.position !== index) {
      throw new ConsistencyError(`${label}: expected position ${index}, got ${chunk.position}`)
    }
    if (chunk.embeddingStatus === 'embedded') {
      if (!chunk.embedding) {
        throw new ConsistencyError(`${label}: marked embedded without an embedding`)
      }
      assertDimension(chunk.embedding, dimensions, label)
    } else if (chunk.embedding) {
      throw new ConsistencyError(`${label}: has an embedding but status ${chunk.embeddingStatus}`)
    }
  })
}

/** The caller gave up on this write (document timeout) */
export function assertNotAborted(documentId: number, signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new ServiceUnavailableError(`Chunk write for document ${documentId} aborted`)
  }
}

type DocumentChanges = Partial<Pick<StoredDocument, 'filename' | 'metadata' | 'sizeBytes'>>

/** Undefined fields keep the stored value */
export function documentChanges(update: DocumentUpdate = {}): DocumentChanges {
  const changes: DocumentChanges = {}
  if (update.filename !== undefined) changes.filename = update.filename
  if (update.metadata !== undefined) changes.metadata = update.metadata
  if (update.sizeBytes !== undefined) changes.sizeBytes = update.sizeBytes
  return changes
}

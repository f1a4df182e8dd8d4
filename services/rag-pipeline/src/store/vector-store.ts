/**
 * Vector store contract
 *
 * Re-ingestion policy: a document row is keyed by its source locator and
 * updated in place. storeDocument only creates the row; storeChunks replaces
 * the whole chunk set together with the document's fields in one atomic step
 * and increments the version, so readers see either the previous document or
 * the new one.
 */

import type {
  ChunkWithEmbedding,
  DocumentMetadata,
  EmbeddingUpdate,
  NewDocument,
  PendingEmbedding,
  ScoredChunk,
  StoreChunksOptions,
  StoreChunksResult,
  StoreDocumentResult,
  StoredChunk,
  StoredDocument,
} from '../types/index.js'

export interface VectorStore {
  /** Dimension every stored embedding must have */
  readonly dimensions: number

  /** Create the row, or return the existing row for this source locator unchanged */
  storeDocument(input: NewDocument): Promise<StoreDocumentResult>

  /**
   * Atomically replace the document's chunk set, bumping the document
   * version and applying the content hash and document fields in the same
   * step.
   *
   * @throws ConsistencyError when positions are not 0..n-1, the document is
   *   missing, or the write fails and is rolled back
   * @throws ServiceUnavailableError when options.signal was aborted; nothing
   *   is written
   * @throws ConfigurationError when an embedding has the wrong dimension
   */
  storeChunks(
    documentId: number,
    chunks: ChunkWithEmbedding[],
    options?: StoreChunksOptions
  ): Promise<StoreChunksResult>

  /**
   * Embedded chunks with cosine similarity >= threshold, at most k, ordered by
   * similarity desc, document id asc, position asc.
   */
  query(vector: number[], k: number, threshold: number): Promise<ScoredChunk[]>

  /** Removes the document and its chunks; false when no row existed */
  deleteDocument(documentId: number): Promise<boolean>

  getDocument(documentId: number): Promise<StoredDocument | null>
  findDocumentBySource(sourceLocator: string): Promise<StoredDocument | null>
  listChunks(documentId: number): Promise<StoredChunk[]>
  updateDocumentMetadata(documentId: number, metadata: DocumentMetadata): Promise<boolean>

  /** Chunks whose status is pending or failed, by document id then position */
  listChunksNeedingEmbedding(limit: number, documentId?: number): Promise<PendingEmbedding[]>

  /** Set vectors and mark the chunks embedded; returns the number updated */
  attachEmbeddings(updates: EmbeddingUpdate[]): Promise<number>

  close(): Promise<void>
}

/**
 * MemoryVectorStore - in-process store with exact (full scan) search
 *
 * Used by dry runs and tests. A new chunk set is built on the side and
 * swapped in with a single assignment, which gives the same all-or-nothing
 * visibility as the PostgreSQL transaction.
 */

import { ConsistencyError, errorMessage } from '../errors.js'
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
import { compareScored, cosineSimilarity } from './similarity.js'
import {
  assertDimension,
  assertNotAborted,
  documentChanges,
  validateChunkSet,
} from './validation.js'
import type { VectorStore } from './vector-store.js'

export class MemoryVectorStore implements VectorStore {
  private readonly documents = new Map<number, StoredDocument>()
  private readonly chunkSets = new Map<number, StoredChunk[]>()
  private nextDocumentId = 1
  private nextChunkId = 1

  constructor(readonly dimensions: number) {}

  private documentBySource(sourceLocator: string): StoredDocument | null {
    for (const document of this.documents.values()) {
      if (document.sourceLocator === sourceLocator) return document
    }
    return null
  }

  // No await between lookup and insert, so concurrent calls share one row
  async storeDocument(input: NewDocument): Promise<StoreDocumentResult> {
    const now = new Date()
    const existing = this.documentBySource(input.sourceLocator)
    if (existing) {
      return { id: existing.id, created: false, version: existing.version }
    }

    const id = this.nextDocumentId++
    this.documents.set(id, {
      id,
      filename: input.filename,
      sourceLocator: input.sourceLocator,
      metadata: input.metadata ?? {},
      sizeBytes: input.sizeBytes ?? null,
      contentHash: null,
      version: 0,
      chunkCount: 0,
      ingestedAt: now,
      updatedAt: now,
    })
    return { id, created: true, version: 0 }
  }

  async storeChunks(
    documentId: number,
    chunks: ChunkWithEmbedding[],
    options: StoreChunksOptions = {}
  ): Promise<StoreChunksResult> {
    validateChunkSet(documentId, chunks, this.dimensions)

    const document = this.documents.get(documentId)
    if (!document) {
      throw new ConsistencyError(`Document ${documentId} does not exist`)
    }

    let replacement: StoredChunk[]
    let nextId = this.nextChunkId
    try {
      replacement = chunks.map((chunk) => ({
        id: nextId++,
        documentId,
        position: chunk.position,
        content: chunk.content,
        hierarchyPath: [...chunk.hierarchyPath],
        pageSpan: { ...chunk.pageSpan },
        metadata: { ...chunk.metadata },
        embedding: chunk.embedding ? [...chunk.embedding] : null,
        embeddingStatus: chunk.embeddingStatus,
        embeddingModel: chunk.embeddingModel,
      }))
    } catch (error) {
      throw new ConsistencyError(
        `Chunk write for document ${documentId} rolled back: ${errorMessage(error)}`,
        { cause: error }
      )
    }

    assertNotAborted(documentId, options.signal)

    this.nextChunkId = nextId
    this.chunkSets.set(documentId, replacement)
    const version = document.version + 1
    this.documents.set(documentId, {
      ...document,
      ...documentChanges(options.document),
      version,
      chunkCount: replacement.length,
      contentHash: options.contentHash ?? document.contentHash,
      updatedAt: new Date(),
    })

    return {
      documentId,
      version,
      chunkCount: replacement.length,
      embeddedCount: replacement.filter((c) => c.embeddingStatus === 'embedded').length,
    }
  }

  async query(vector: number[], k: number, threshold: number): Promise<ScoredChunk[]> {
    assertDimension(vector, this.dimensions, 'Query')

    const scored: ScoredChunk[] = []
    for (const [documentId, chunks] of this.chunkSets) {
      const document = this.documents.get(documentId)
      if (!document) continue

      for (const chunk of chunks) {
        if (chunk.embeddingStatus !== 'embedded' || !chunk.embedding) continue
        const similarity = cosineSimilarity(vector, chunk.embedding)
        if (similarity < threshold) continue
        scored.push({
          chunkId: chunk.id,
          documentId,
          position: chunk.position,
          content: chunk.content,
          hierarchyPath: [...chunk.hierarchyPath],
          pageSpan: { ...chunk.pageSpan },
          similarity,
          document: {
            filename: document.filename,
            sourceLocator: document.sourceLocator,
            metadata: document.metadata,
          },
        })
      }
    }

    return scored.sort(compareScored).slice(0, k)
  }

  async deleteDocument(documentId: number): Promise<boolean> {
    this.chunkSets.delete(documentId)
    return this.documents.delete(documentId)
  }

  async getDocument(documentId: number): Promise<StoredDocument | null> {
    return this.documents.get(documentId) ?? null
  }

  async findDocumentBySource(sourceLocator: string): Promise<StoredDocument | null> {
    return this.documentBySource(sourceLocator)
  }

  async listChunks(documentId: number): Promise<StoredChunk[]> {
    return [...(this.chunkSets.get(documentId) ?? [])]
  }

  async updateDocumentMetadata(documentId: number, metadata: DocumentMetadata): Promise<boolean> {
    const document = this.documents.get(documentId)
    if (!document) return false
    this.documents.set(documentId, { ...document, metadata, updatedAt: new Date() })
    return true
  }

  async listChunksNeedingEmbedding(limit: number, documentId?: number): Promise<PendingEmbedding[]> {
    const ids = [...this.chunkSets.keys()]
      .filter((id) => documentId === undefined || id === documentId)
      .sort((a, b) => a - b)

    const pending: PendingEmbedding[] = []
    for (const id of ids) {
      for (const chunk of this.chunkSets.get(id) ?? []) {
        if (chunk.embeddingStatus === 'embedded') continue
        if (pending.length >= limit) return pending
        pending.push({
          chunkId: chunk.id,
          documentId: id,
          position: chunk.position,
          content: chunk.content,
          hierarchyPath: [...chunk.hierarchyPath],
        })
      }
    }
    return pending
  }

  async attachEmbeddings(updates: EmbeddingUpdate[]): Promise<number> {
    updates.forEach((update) =>
      assertDimension(update.embedding, this.dimensions, `Chunk ${update.chunkId}`)
    )

    const byId = new Map(updates.map((update) => [update.chunkId, update]))
    let updated = 0
    for (const [documentId, chunks] of this.chunkSets) {
      const next = chunks.map((chunk) => {
        const update = byId.get(chunk.id)
        if (!update) return chunk
        updated++
        return {
          ...chunk,
          embedding: [...update.embedding],
          embeddingStatus: 'embedded' as const,
          embeddingModel: update.embeddingModel,
        }
      })
      this.chunkSets.set(documentId, next)
    }
    return updated
  }

  async close(): Promise<void> {}
}

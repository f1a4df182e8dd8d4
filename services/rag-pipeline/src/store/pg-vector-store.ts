/**
 * PgVectorStore - PostgreSQL + pgvector store built on Drizzle
 *
 * Chunk-set replacement runs in one transaction (delete, insert, version
 * bump), so concurrent readers see the old set until commit.
 *
 * Search uses the HNSW index on `embedding vector_cosine_ops`. HNSW is
 * approximate: `hnsw.ef_search` (pgvector default 40) bounds the candidate
 * list, so raising it trades latency for recall. The similarity threshold is
 * applied after the index scan, which means a query can return fewer than k
 * rows even when more qualifying rows exist. Equal-distance ties are
 * ordered in memory after the scan.
 */

import {
  type ChunkRow,
  type Database,
  type DocumentRow,
  EMBEDDING_DIMENSIONS,
  and,
  asc,
  chunks,
  closeDb,
  cosineDistance,
  documents,
  eq,
  inArray,
  isNotNull,
  lte,
  sql,
} from '@legal-rag/db'
import { ConsistencyError, ServiceUnavailableError, errorMessage } from '../errors.js'
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
import { compareScored } from './similarity.js'
import {
  assertDimension,
  assertNotAborted,
  documentChanges,
  validateChunkSet,
} from './validation.js'
import type { VectorStore } from './vector-store.js'

/** Rows per INSERT statement when writing a chunk set */
const INSERT_BATCH_SIZE = 500

export interface PgVectorStoreOptions {
  /** Sets `hnsw.ef_search` for each query; unset keeps the server default */
  efSearch?: number
  /** Close the connection pool in close() */
  ownsConnection?: boolean
}

function toStoredChunk(row: ChunkRow): StoredChunk {
  return {
    id: row.id,
    documentId: row.documentId,
    position: row.position,
    content: row.content,
    hierarchyPath: row.hierarchyPath,
    pageSpan: { start: row.pageStart, end: row.pageEnd },
    metadata: row.metadata,
    embedding: row.embedding,
    embeddingStatus: row.embeddingStatus,
    embeddingModel: row.embeddingModel,
  }
}

function toStoredDocument(row: DocumentRow): StoredDocument {
  return { ...row }
}

export class PgVectorStore implements VectorStore {
  readonly dimensions = EMBEDDING_DIMENSIONS

  constructor(
    private readonly db: Database,
    private readonly options: PgVectorStoreOptions = {}
  ) {}

  async storeDocument(input: NewDocument): Promise<StoreDocumentResult> {
    const now = new Date()
    const [row] = await this.db
      .insert(documents)
      .values({
        filename: input.filename,
        sourceLocator: input.sourceLocator,
        metadata: input.metadata ?? {},
        sizeBytes: input.sizeBytes,
        ingestedAt: now,
        updatedAt: now,
      })
      // No-op update so RETURNING yields the existing row; its fields change
      // only together with a new chunk set in storeChunks
      .onConflictDoUpdate({
        target: documents.sourceLocator,
        set: { sourceLocator: input.sourceLocator },
      })
      .returning({
        id: documents.id,
        version: documents.version,
        // xmax is 0 only for a freshly inserted tuple
        created: sql<boolean>`(xmax = 0)`,
      })

    return { id: row.id, created: row.created, version: row.version }
  }

  async storeChunks(
    documentId: number,
    chunkSet: ChunkWithEmbedding[],
    options: StoreChunksOptions = {}
  ): Promise<StoreChunksResult> {
    validateChunkSet(documentId, chunkSet, this.dimensions)

    try {
      return await this.db.transaction(async (tx) => {
        const [document] = await tx
          .select({ id: documents.id })
          .from(documents)
          .where(eq(documents.id, documentId))
          .limit(1)
        if (!document) {
          throw new ConsistencyError(`Document ${documentId} does not exist`)
        }

        await tx.delete(chunks).where(eq(chunks.documentId, documentId))

        const rows = chunkSet.map((chunk) => ({
          documentId,
          position: chunk.position,
          content: chunk.content,
          hierarchyPath: chunk.hierarchyPath,
          pageStart: chunk.pageSpan.start,
          pageEnd: chunk.pageSpan.end,
          metadata: chunk.metadata,
          embedding: chunk.embedding,
          embeddingStatus: chunk.embeddingStatus,
          embeddingModel: chunk.embeddingModel,
        }))
        for (let i = 0; i < rows.length; i += INSERT_BATCH_SIZE) {
          await tx.insert(chunks).values(rows.slice(i, i + INSERT_BATCH_SIZE))
        }

        const [updated] = await tx
          .update(documents)
          .set({
            ...documentChanges(options.document),
            version: sql`${documents.version} + 1`,
            chunkCount: rows.length,
            ...(options.contentHash ? { contentHash: options.contentHash } : {}),
            updatedAt: new Date(),
          })
          .where(eq(documents.id, documentId))
          .returning({ version: documents.version })

        // After the last statement and before commit; throwing rolls back
        assertNotAborted(documentId, options.signal)

        return {
          documentId,
          version: updated.version,
          chunkCount: rows.length,
          embeddedCount: chunkSet.filter((c) => c.embeddingStatus === 'embedded').length,
        }
      })
    } catch (error) {
      if (error instanceof ConsistencyError || error instanceof ServiceUnavailableError) throw error
      throw new ConsistencyError(
        `Chunk write for document ${documentId} rolled back: ${errorMessage(error)}`,
        { cause: error }
      )
    }
  }

  async query(vector: number[], k: number, threshold: number): Promise<ScoredChunk[]> {
    assertDimension(vector, this.dimensions, 'Query')

    const distance = cosineDistance(chunks.embedding, vector)
    const { efSearch } = this.options

    const rows = await this.db.transaction(async (tx) => {
      if (efSearch) {
        await tx.execute(sql.raw(`SET LOCAL hnsw.ef_search = ${Math.floor(efSearch)}`))
      }
      return tx
        .select({
          chunkId: chunks.id,
          documentId: chunks.documentId,
          position: chunks.position,
          content: chunks.content,
          hierarchyPath: chunks.hierarchyPath,
          pageStart: chunks.pageStart,
          pageEnd: chunks.pageEnd,
          distance: sql<number>`${distance}`.mapWith(Number),
          filename: documents.filename,
          sourceLocator: documents.sourceLocator,
          metadata: documents.metadata,
        })
        .from(chunks)
        .innerJoin(documents, eq(chunks.documentId, documents.id))
        .where(
          and(
            eq(chunks.embeddingStatus, 'embedded'),
            isNotNull(chunks.embedding),
            lte(distance, 1 - threshold)
          )
        )
        .orderBy(distance)
        .limit(k)
    })

    return rows
      .map(
        (row): ScoredChunk => ({
          chunkId: row.chunkId,
          documentId: row.documentId,
          position: row.position,
          content: row.content,
          hierarchyPath: row.hierarchyPath,
          pageSpan: { start: row.pageStart, end: row.pageEnd },
          similarity: 1 - row.distance,
          document: {
            filename: row.filename,
            sourceLocator: row.sourceLocator,
            metadata: row.metadata,
          },
        })
      )
      .filter((result) => result.similarity >= threshold)
      .sort(compareScored)
  }

  async deleteDocument(documentId: number): Promise<boolean> {
    const deleted = await this.db
      .delete(documents)
      .where(eq(documents.id, documentId))
      .returning({ id: documents.id })
    return deleted.length > 0
  }

  async getDocument(documentId: number): Promise<StoredDocument | null> {
    const [row] = await this.db
      .select()
      .from(documents)
      .where(eq(documents.id, documentId))
      .limit(1)
    return row ? toStoredDocument(row) : null
  }

  async findDocumentBySource(sourceLocator: string): Promise<StoredDocument | null> {
    const [row] = await this.db
      .select()
      .from(documents)
      .where(eq(documents.sourceLocator, sourceLocator))
      .limit(1)
    return row ? toStoredDocument(row) : null
  }

  async listChunks(documentId: number): Promise<StoredChunk[]> {
    const rows = await this.db
      .select()
      .from(chunks)
      .where(eq(chunks.documentId, documentId))
      .orderBy(asc(chunks.position))
    return rows.map(toStoredChunk)
  }

  async updateDocumentMetadata(documentId: number, metadata: DocumentMetadata): Promise<boolean> {
    const updated = await this.db
      .update(documents)
      .set({ metadata, updatedAt: new Date() })
      .where(eq(documents.id, documentId))
      .returning({ id: documents.id })
    return updated.length > 0
  }

  async listChunksNeedingEmbedding(limit: number, documentId?: number): Promise<PendingEmbedding[]> {
    return this.db
      .select({
        chunkId: chunks.id,
        documentId: chunks.documentId,
        position: chunks.position,
        content: chunks.content,
        hierarchyPath: chunks.hierarchyPath,
      })
      .from(chunks)
      .where(
        and(
          inArray(chunks.embeddingStatus, ['pending', 'failed']),
          documentId === undefined ? undefined : eq(chunks.documentId, documentId)
        )
      )
      .orderBy(asc(chunks.documentId), asc(chunks.position))
      .limit(limit)
  }

  async attachEmbeddings(updates: EmbeddingUpdate[]): Promise<number> {
    updates.forEach((update) =>
      assertDimension(update.embedding, this.dimensions, `Chunk ${update.chunkId}`)
    )
    if (updates.length === 0) return 0

    try {
      return await this.db.transaction(async (tx) => {
        let updated = 0
        for (const update of updates) {
          const rows = await tx
            .update(chunks)
            .set({
              embedding: update.embedding,
              embeddingStatus: 'embedded',
              embeddingModel: update.embeddingModel,
            })
            .where(eq(chunks.id, update.chunkId))
            .returning({ id: chunks.id })
          updated += rows.length
        }
        return updated
      })
    } catch (error) {
      throw new ConsistencyError(`Attaching embeddings rolled back: ${errorMessage(error)}`, {
        cause: error,
      })
    }
  }

  async close(): Promise<void> {
    if (this.options.ownsConnection) {
      await closeDb(this.db)
    }
  }
}

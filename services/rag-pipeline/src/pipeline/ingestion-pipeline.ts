/**
 * IngestionPipeline - sources to stored, embedded chunk sets
 *
 * Per document: load -> extract -> embed -> storeDocument -> storeChunks.
 * storeChunks also carries the document fields, so a failed re-ingest leaves
 * the previous row untouched.
 * Documents run concurrently on a WorkerPool; chunks inside a document keep
 * the positions the extractor assigned. One document's failure is recorded in
 * the report and the run goes on; a ConfigurationError aborts the run.
 */

import { createHash } from 'node:crypto'
import type { EmbeddingConfig, IngestionConfig } from '../config.js'
import { embeddingText, type EmbeddingGenerator } from '../embedding/embedding-generator.js'
import {
  ConfigurationError,
  ServiceUnavailableError,
  errorKindOf,
  errorMessage,
} from '../errors.js'
import type { ChunkExtractor } from '../extractor/chunk-extractor.js'
import { filenameFor, type SourceLoader } from '../sources/source-loader.js'
import type { VectorStore } from '../store/vector-store.js'
import type {
  ChunkWithEmbedding,
  DocumentReport,
  DocumentSource,
  IngestOptions,
  IngestionReport,
  ReembedOptions,
  ReembedResult,
} from '../types/index.js'
import { WorkerPool } from './worker-pool.js'

const DEFAULT_REEMBED_LIMIT = 1000

export interface IngestionPipelineDeps {
  loader: SourceLoader
  extractor: ChunkExtractor
  generator: EmbeddingGenerator
  store: VectorStore
  config: {
    ingestion: IngestionConfig
    embedding: Pick<EmbeddingConfig, 'embedWithHeadings'>
  }
}

export function sha256(bytes: Uint8Array): string {
  return createHash('sha256').update(bytes).digest('hex')
}

function safeFilename(source: DocumentSource): string {
  try {
    return filenameFor(source)
  } catch {
    return source.locator
  }
}

export class IngestionPipeline {
  private readonly loader: SourceLoader
  private readonly extractor: ChunkExtractor
  private readonly generator: EmbeddingGenerator
  private readonly store: VectorStore
  private readonly config: IngestionPipelineDeps['config']

  constructor(deps: IngestionPipelineDeps) {
    this.loader = deps.loader
    this.extractor = deps.extractor
    this.generator = deps.generator
    this.store = deps.store
    this.config = deps.config
  }

  private assertCompatible(): void {
    if (this.generator.dimensions !== this.store.dimensions) {
      throw new ConfigurationError(
        `Embedding dimension ${this.generator.dimensions} does not match the store (${this.store.dimensions})`
      )
    }
  }

  /**
   * Ingest a batch of sources.
   *
   * @throws ConfigurationError when the run has to stop
   */
  async ingest(sources: DocumentSource[], options: IngestOptions = {}): Promise<IngestionReport> {
    this.assertCompatible()
    const startTime = Date.now()

    const limit = options.maxDocuments
    const selected = limit === undefined ? sources : sources.slice(0, Math.max(0, limit))

    // A locator appearing twice would race with itself on the same document row
    const seen = new Set<string>()
    const unique: DocumentSource[] = []
    const duplicates: DocumentReport[] = []
    for (const source of selected) {
      if (seen.has(source.locator)) {
        console.warn(`[IngestionPipeline] Duplicate source skipped: ${source.locator}`)
        duplicates.push(
          this.report(source, 'skipped', 0, {
            errors: [{ kind: 'input', message: 'Duplicate source in batch' }],
          })
        )
        continue
      }
      seen.add(source.locator)
      unique.push(source)
    }

    console.log(
      `[IngestionPipeline] Ingesting ${unique.length} document(s) ` +
        `(concurrency ${this.config.ingestion.concurrency})`
    )

    const startedAt = new Map<number, number>()
    const pool = new WorkerPool({
      concurrency: this.config.ingestion.concurrency,
      taskTimeoutMinutes: this.config.ingestion.documentTimeoutMinutes,
    })

    const reports = await pool.executeAll(unique, {
      run: (source, index, signal) => {
        startedAt.set(index, Date.now())
        return this.ingestDocument(source, signal)
      },
      onFailure: (source, index, error) =>
        this.report(source, 'failed', startedAt.get(index) ?? Date.now(), {
          errors: [{ kind: errorKindOf(error), message: errorMessage(error) }],
        }),
      isFatal: (error) => error instanceof ConfigurationError,
      describe: (source) => source.locator,
    })

    const documents = [...reports, ...duplicates]
    const count = (status: DocumentReport['status']) =>
      documents.filter((d) => d.status === status).length

    const report: IngestionReport = {
      total: documents.length,
      succeeded: count('succeeded'),
      partial: count('partial'),
      skipped: count('skipped'),
      failed: count('failed'),
      documents,
      duration_ms: Date.now() - startTime,
    }

    console.log(
      `[IngestionPipeline] Done in ${report.duration_ms}ms: ${report.succeeded} succeeded, ` +
        `${report.partial} partial, ${report.skipped} skipped, ${report.failed} failed`
    )
    return report
  }

  /**
   * Run one document through the pipeline. Failures of the document itself
   * are returned as a failed report; ConfigurationError is thrown.
   */
  async ingestDocument(source: DocumentSource, signal?: AbortSignal): Promise<DocumentReport> {
    const started = Date.now()
    const filename = filenameFor(source)

    const loaded = await this.loader.load(source, signal)
    const contentHash = sha256(loaded.bytes)

    if (this.config.ingestion.skipUnchanged) {
      const existing = await this.store.findDocumentBySource(source.locator)
      if (existing && existing.version > 0 && existing.contentHash === contentHash) {
        console.log(`[IngestionPipeline] ${filename} unchanged, skipping`)
        return this.report(source, 'skipped', started, {
          documentId: existing.id,
          version: existing.version,
          chunkCount: existing.chunkCount,
        })
      }
    }

    const extraction = await this.extractor.extract(loaded.bytes, {
      sourceLocator: source.locator,
      filename: loaded.filename,
    })
    if (extraction.status === 'failed') {
      if (extraction.errorKind === 'configuration') {
        throw new ConfigurationError(extraction.error)
      }
      return this.report(source, 'failed', started, {
        errors: [{ kind: extraction.errorKind, message: extraction.error }],
      })
    }

    const { embedWithHeadings } = this.config.embedding
    const outcome = await this.generator.embed(
      extraction.chunks.map((chunk) => embeddingText(chunk, embedWithHeadings))
    )

    const chunks = extraction.chunks.map((chunk, i): ChunkWithEmbedding => {
      const embedding = outcome.vectors[i]
      return embedding
        ? { ...chunk, embedding, embeddingStatus: 'embedded', embeddingModel: outcome.model }
        : { ...chunk, embedding: null, embeddingStatus: 'failed', embeddingModel: null }
    })

    // The pool has already given up on this document; do not write late results
    if (signal?.aborted) {
      throw new ServiceUnavailableError(`Ingestion of ${filename} was aborted`)
    }

    const fields = {
      filename: loaded.filename,
      metadata: source.metadata,
      sizeBytes: loaded.sizeBytes,
    }
    const document = await this.store.storeDocument({ ...fields, sourceLocator: source.locator })
    // The document fields, chunk set and hash of an existing row change together
    const stored = await this.store.storeChunks(document.id, chunks, {
      contentHash,
      document: fields,
      signal,
    })

    const failedEmbeddingCount = stored.chunkCount - stored.embeddedCount
    const status = outcome.failedBatches.length > 0 ? 'partial' : 'succeeded'
    console.log(
      `[IngestionPipeline] ${filename}: ${status}, ${stored.chunkCount} chunks ` +
        `(${stored.embeddedCount} embedded), version ${stored.version}`
    )

    return this.report(source, status, started, {
      documentId: document.id,
      version: stored.version,
      chunkCount: stored.chunkCount,
      embeddedCount: stored.embeddedCount,
      failedEmbeddingCount,
      errors: outcome.failedBatches.map((batch) => ({
        kind: batch.errorKind,
        message:
          `Embedding batch ${batch.batchIndex + 1} (chunks ${batch.startIndex}-` +
          `${batch.startIndex + batch.size - 1}) failed: ${batch.error}`,
      })),
    })
  }

  /**
   * Embed chunks left pending or failed by earlier runs.
   *
   * @throws ConfigurationError on a dimension mismatch
   */
  async reembedPending(options: ReembedOptions = {}): Promise<ReembedResult> {
    this.assertCompatible()

    const pending = await this.store.listChunksNeedingEmbedding(
      options.limit ?? DEFAULT_REEMBED_LIMIT,
      options.documentId
    )
    if (pending.length === 0) {
      console.log('[IngestionPipeline] No chunks need embedding')
      return { attempted: 0, embedded: 0, failed: 0 }
    }

    const { embedWithHeadings } = this.config.embedding
    const outcome = await this.generator.embed(
      pending.map((chunk) => embeddingText(chunk, embedWithHeadings))
    )

    const updates = pending.flatMap((chunk, i) => {
      const embedding = outcome.vectors[i]
      return embedding ? [{ chunkId: chunk.chunkId, embedding, embeddingModel: outcome.model }] : []
    })
    const embedded = updates.length > 0 ? await this.store.attachEmbeddings(updates) : 0

    console.log(`[IngestionPipeline] Re-embedded ${embedded}/${pending.length} chunk(s)`)
    return { attempted: pending.length, embedded, failed: pending.length - embedded }
  }

  private report(
    source: DocumentSource,
    status: DocumentReport['status'],
    started: number,
    fields: Partial<Omit<DocumentReport, 'locator' | 'filename' | 'status' | 'duration_ms'>> = {}
  ): DocumentReport {
    return {
      locator: source.locator,
      filename: safeFilename(source),
      status,
      documentId: fields.documentId,
      version: fields.version,
      chunkCount: fields.chunkCount ?? 0,
      embeddedCount: fields.embeddedCount ?? 0,
      failedEmbeddingCount: fields.failedEmbeddingCount ?? 0,
      errors: fields.errors ?? [],
      duration_ms: started ? Date.now() - started : 0,
    }
  }
}

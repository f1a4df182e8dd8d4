/**
 * RetrievalEngine - query text to ranked, thresholded chunks
 *
 * Every call resolves to one of three statuses, so "nothing relevant" and
 * "retrieval failed" are never confused.
 */

import type { RetrievalConfig } from '../config.js'
import type { EmbeddingGenerator } from '../embedding/embedding-generator.js'
import { InputError, errorKindOf, errorMessage } from '../errors.js'
import { compareScored } from '../store/similarity.js'
import type { VectorStore } from '../store/vector-store.js'
import type {
  RankedResult,
  RetrievalResponse,
  RetrieveOptions,
  ScoredChunk,
} from '../types/index.js'
import { withTimeout } from '../utils/retry.js'

/**
 * Order by similarity desc, document id asc, position asc; drop duplicate
 * chunk ids and anything under the threshold; keep the first k.
 */
export function rankResults(
  candidates: ScoredChunk[],
  k: number,
  threshold: number
): RankedResult[] {
  const seen = new Set<number>()
  const unique: ScoredChunk[] = []
  for (const candidate of [...candidates].sort(compareScored)) {
    if (seen.has(candidate.chunkId) || candidate.similarity < threshold) continue
    seen.add(candidate.chunkId)
    unique.push(candidate)
  }
  return unique.slice(0, k).map((result, index) => ({ ...result, rank: index + 1 }))
}

export class RetrievalEngine {
  constructor(
    private readonly generator: EmbeddingGenerator,
    private readonly store: VectorStore,
    private readonly config: RetrievalConfig
  ) {}

  private resolveOptions(options: RetrieveOptions): { k: number; threshold: number } {
    const k = options.k ?? this.config.topK
    const threshold = options.similarityThreshold ?? this.config.similarityThreshold
    if (!Number.isInteger(k) || k < 1) {
      throw new InputError(`k must be a positive integer, got ${k}`)
    }
    if (!Number.isFinite(threshold) || threshold < -1 || threshold > 1) {
      throw new InputError(`similarityThreshold must be between -1 and 1, got ${threshold}`)
    }
    return { k, threshold }
  }

  async retrieve(queryText: string, options: RetrieveOptions = {}): Promise<RetrievalResponse> {
    const query = queryText.trim()

    try {
      if (!query) {
        throw new InputError('Query text is empty')
      }
      const { k, threshold } = this.resolveOptions(options)

      const vector = await this.generator.embedQuery(query, this.config.queryTimeoutMs)
      const candidates = await withTimeout(
        () => this.store.query(vector, k, threshold),
        this.config.queryTimeoutMs,
        'Vector search'
      )

      const results = rankResults(candidates, k, threshold)
      if (results.length === 0) {
        return { status: 'no_results', query, results: [] }
      }
      return { status: 'ok', query, results }
    } catch (error) {
      console.error(`[RetrievalEngine] Query failed: ${errorMessage(error)}`)
      return {
        status: 'error',
        query,
        results: [],
        error: { kind: errorKindOf(error), message: errorMessage(error) },
      }
    }
  }
}

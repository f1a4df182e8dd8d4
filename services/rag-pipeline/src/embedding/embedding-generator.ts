/**
 * EmbeddingGenerator - batched embedding with per-batch failure isolation
 *
 * Texts are cut into batches of at most batchSize. Each batch gets its own
 * timeout and retry budget; a batch that still fails leaves null slots and
 * the next batch proceeds. Dimension mismatches and configuration errors are
 * fatal.
 */

import type { EmbeddingConfig } from '../config.js'
import { ConfigurationError, errorKindOf, errorMessage } from '../errors.js'
import type { EmbeddingOutcome, ExtractedChunk, FailedBatch } from '../types/index.js'
import { withRetry, withTimeout } from '../utils/retry.js'
import type { EmbeddingProvider } from './provider.js'

/**
 * Text sent to the provider for a chunk. With headings enabled the hierarchy
 * path is prepended, so a chunk is retrievable by the section it sits in.
 */
export function embeddingText(
  chunk: Pick<ExtractedChunk, 'content' | 'hierarchyPath'>,
  withHeadings: boolean
): string {
  if (!withHeadings || chunk.hierarchyPath.length === 0) return chunk.content
  return `${chunk.hierarchyPath.join(' > ')}\n\n${chunk.content}`
}

export class EmbeddingGenerator {
  constructor(
    private readonly provider: EmbeddingProvider,
    private readonly config: EmbeddingConfig
  ) {}

  get model(): string {
    return this.provider.model
  }

  get dimensions(): number {
    return this.config.dimensions
  }

  private assertDimensions(vector: number[], index: number): void {
    if (vector.length !== this.config.dimensions) {
      throw new ConfigurationError(
        `Embedding dimension mismatch for input ${index}: expected ${this.config.dimensions}, got ${vector.length}`
      )
    }
  }

  private async callProvider(
    texts: string[],
    label: string,
    timeoutMs = this.config.timeoutMs
  ): Promise<number[][]> {
    return withRetry(
      () => withTimeout((signal) => this.provider.embed(texts, signal), timeoutMs, label),
      {
        maxAttempts: this.config.maxAttempts,
        baseDelayMs: this.config.retryBaseDelayMs,
        label,
      }
    )
  }

  /**
   * Embed texts in order. vectors[i] belongs to texts[i].
   *
   * @throws ConfigurationError on a dimension mismatch or a provider
   *   configuration failure
   */
  async embed(texts: string[]): Promise<EmbeddingOutcome> {
    const vectors: (number[] | null)[] = texts.map(() => null)
    const failedBatches: FailedBatch[] = []
    const { batchSize } = this.config
    const batchCount = Math.ceil(texts.length / batchSize)

    for (let batchIndex = 0; batchIndex < batchCount; batchIndex++) {
      const startIndex = batchIndex * batchSize
      const batch = texts.slice(startIndex, startIndex + batchSize)
      const label = `Embedding batch ${batchIndex + 1}/${batchCount}`

      let batchVectors: number[][]
      try {
        batchVectors = await this.callProvider(batch, label)
        if (batchVectors.length !== batch.length) {
          throw new ConfigurationError(
            `${label}: provider returned ${batchVectors.length} vectors for ${batch.length} texts`
          )
        }
      } catch (error) {
        if (error instanceof ConfigurationError) throw error

        console.error(`[EmbeddingGenerator] ${label} failed: ${errorMessage(error)}`)
        failedBatches.push({
          batchIndex,
          startIndex,
          size: batch.length,
          errorKind: errorKindOf(error),
          error: errorMessage(error),
        })
        continue
      }

      batchVectors.forEach((vector, offset) => {
        this.assertDimensions(vector, startIndex + offset)
        vectors[startIndex + offset] = vector
      })
    }

    return { vectors, failedBatches, model: this.provider.model }
  }

  /**
   * Embed a single query text.
   *
   * @throws the provider's error once retries are exhausted
   */
  async embedQuery(text: string, timeoutMs = this.config.timeoutMs): Promise<number[]> {
    const [vector] = await this.callProvider([text], 'Query embedding', timeoutMs)
    if (!vector) {
      throw new ConfigurationError('Provider returned no vector for the query')
    }
    this.assertDimensions(vector, 0)
    return vector
  }
}

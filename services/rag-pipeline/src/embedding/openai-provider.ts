/**
 * OpenAIEmbeddingProvider - client for OpenAI-compatible /embeddings endpoints
 */

import { z } from 'zod'
import {
  ConfigurationError,
  InputError,
  ServiceUnavailableError,
  errorMessage,
} from '../errors.js'
import type { EmbeddingProvider } from './provider.js'

const EmbeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      index: z.number().int().nonnegative(),
      embedding: z.array(z.number()),
    })
  ),
  model: z.string().optional(),
})

export interface OpenAIEmbeddingProviderOptions {
  apiKey?: string
  baseUrl: string
  model: string
  /** Sent as `dimensions`; text-embedding-3 models shorten their output to it */
  dimensions?: number
  fetch?: typeof fetch
}

async function safeText(response: Response): Promise<string> {
  try {
    return await response.text()
  } catch {
    return '<no body>'
  }
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly model: string
  private readonly apiKey: string
  private readonly url: string
  private readonly dimensions?: number
  private readonly fetchImpl: typeof fetch

  constructor(options: OpenAIEmbeddingProviderOptions) {
    if (!options.apiKey) {
      throw new ConfigurationError('OPENAI_API_KEY is required for embedding')
    }
    this.apiKey = options.apiKey
    this.model = options.model
    this.url = `${options.baseUrl.replace(/\/+$/, '')}/embeddings`
    this.dimensions = options.dimensions
    this.fetchImpl = options.fetch ?? fetch
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) return []

    let response: Response
    try {
      response = await this.fetchImpl(this.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({ model: this.model, input: texts, dimensions: this.dimensions }),
        signal,
      })
    } catch (error) {
      throw new ServiceUnavailableError(`Embedding request failed: ${errorMessage(error)}`, {
        cause: error,
      })
    }

    if (!response.ok) {
      const body = await safeText(response)
      const message = `Embedding failed: ${response.status} ${response.statusText} - ${body}`
      if (response.status === 401 || response.status === 403) {
        throw new ConfigurationError(message)
      }
      if (response.status === 408 || response.status === 429 || response.status >= 500) {
        throw new ServiceUnavailableError(message)
      }
      throw new InputError(message)
    }

    let body: unknown
    try {
      body = await response.json()
    } catch (error) {
      throw new ServiceUnavailableError(
        `Embedding response is not valid JSON: ${errorMessage(error)}`,
        { cause: error }
      )
    }

    const parsed = EmbeddingResponseSchema.safeParse(body)
    if (!parsed.success) {
      throw new ServiceUnavailableError(
        `Invalid embedding response shape: ${parsed.error.issues[0]?.message ?? 'unknown'}`
      )
    }

    const vectors: number[][] = new Array(texts.length)
    for (const item of parsed.data.data) {
      if (item.index < texts.length) {
        vectors[item.index] = item.embedding
      }
    }
    for (let i = 0; i < texts.length; i++) {
      if (!vectors[i]) {
        throw new ServiceUnavailableError(`Embedding response is missing input ${i}`)
      }
    }
    return vectors
  }
}

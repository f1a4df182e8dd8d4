/**
 * Embedding capability
 *
 * A provider turns texts into vectors, one per text, in input order. The
 * vector of a text must not depend on the other texts in the call.
 */

export interface EmbeddingProvider {
  readonly model: string

  /**
   * @throws ServiceUnavailableError when the service is unreachable, rate
   *   limited or too slow (retried by the caller)
   * @throws InputError when the service rejects the input
   * @throws ConfigurationError on bad credentials or an unknown model
   */
  embed(texts: string[], signal?: AbortSignal): Promise<number[][]>
}

/**
 * Pipeline error kinds
 *
 * - input: malformed or corrupt document, unparseable source. Not retried,
 *   reported per document.
 * - service_unavailable: structuring/embedding/download service unreachable
 *   or timed out. Retried with backoff, then reported.
 * - consistency: a partial write to the store was attempted and rolled back.
 * - configuration: dimension mismatch, missing required parameter. Fatal,
 *   aborts the whole run.
 * - internal: anything else thrown by a collaborator.
 */
export type ErrorKind =
  | 'input'
  | 'service_unavailable'
  | 'consistency'
  | 'configuration'
  | 'internal'

export abstract class RagError extends Error {
  abstract readonly kind: ErrorKind

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

export class InputError extends RagError {
  readonly kind = 'input' as const
}

export class ServiceUnavailableError extends RagError {
  readonly kind = 'service_unavailable' as const
}

export class ConsistencyError extends RagError {
  readonly kind = 'consistency' as const
}

export class ConfigurationError extends RagError {
  readonly kind = 'configuration' as const
}

export function isRagError(error: unknown): error is RagError {
  return error instanceof RagError
}

export function errorKindOf(error: unknown): ErrorKind {
  return isRagError(error) ? error.kind : 'internal'
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

export function isRetryable(error: unknown): boolean {
  return error instanceof ServiceUnavailableError
}

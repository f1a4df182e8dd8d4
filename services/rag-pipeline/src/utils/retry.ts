/**
 * Timeout and retry helpers for calls to external services
 * (structuring, embedding, downloads, store lookups)
 */

import { ServiceUnavailableError, errorMessage, isRetryable } from '../errors.js'

export interface RetryOptions {
  /** Total attempts including the first one */
  maxAttempts: number
  /** Delay before the second attempt; doubles on every further attempt */
  baseDelayMs: number
  maxDelayMs?: number
  /** Used in log lines */
  label: string
  shouldRetry?: (error: unknown) => boolean
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

export function backoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs = 30_000
): number {
  return Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs)
}

/**
 * Run fn, retrying retryable errors with exponential backoff.
 * Non-retryable errors and the last attempt's error are rethrown as is.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const shouldRetry = options.shouldRetry ?? isRetryable

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt)
    } catch (error) {
      if (attempt >= options.maxAttempts || !shouldRetry(error)) {
        throw error
      }

      const delayMs = backoffDelay(attempt, options.baseDelayMs, options.maxDelayMs)
      if (options.onRetry) {
        options.onRetry(attempt, error, delayMs)
      } else {
        console.warn(
          `[Retry] ${options.label} failed on attempt ${attempt}/${options.maxAttempts}: ` +
            `${errorMessage(error)}. Retrying in ${delayMs}ms...`
        )
      }
      await sleep(delayMs)
    }
  }
}

/**
 * Run fn with a deadline. The signal handed to fn is aborted when the deadline
 * passes, and the returned promise rejects with ServiceUnavailableError.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string
): Promise<T> {
  const controller = new AbortController()
  let timeoutId: ReturnType<typeof setTimeout> | null = null

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      controller.abort()
      reject(new ServiceUnavailableError(`${label} timed out after ${timeoutMs}ms`))
    }, timeoutMs)
  })

  try {
    return await Promise.race([fn(controller.signal), timeoutPromise])
  } finally {
    if (timeoutId) {
      clearTimeout(timeoutId)
    }
  }
}

import { setTimeout as sleep } from 'node:timers/promises'
import { isRetryable, type TidemarkError, toTidemarkError } from './errors.js'

export interface RetryInfo {
  /** 1 for the first retry. */
  attempt: number
  error: TidemarkError
  delayMs: number
}

export interface RetryOptions {
  maxRetries: number
  baseDelayMs: number
  /** Cap for the exponential delay. Default: 10 seconds. */
  maxDelayMs?: number
  /** Aborts the wait between attempts. */
  signal?: AbortSignal
  onRetry?: (info: RetryInfo) => void
}

const DEFAULT_MAX_DELAY_MS = 10_000

/**
 * Runs `fn` until it succeeds, retrying retryable {@link TransientFailure}s
 * with exponential backoff. Anything else, and the last failure once retries
 * run out, is rethrown as a classified tidemark error.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const maxDelayMs = options.maxDelayMs ?? DEFAULT_MAX_DELAY_MS

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt)
    } catch (err) {
      const error = toTidemarkError(err)
      if (!isRetryable(error) || attempt >= options.maxRetries) {
        throw error
      }
      const delayMs = Math.min(options.baseDelayMs * 2 ** attempt, maxDelayMs)
      options.onRetry?.({ attempt: attempt + 1, error, delayMs })
      await sleep(delayMs, undefined, { signal: options.signal })
    }
  }
}

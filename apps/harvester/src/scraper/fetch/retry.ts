/**
 * Retry combinator with exponential backoff.
 *
 * Wraps one fallible async operation. Transient FetchErrors are retried up to
 * policy.maxAttempts; permanent ones fail immediately. Exhausting the ceiling
 * surfaces a permanent RETRIES_EXHAUSTED error.
 */

import { FetchError, toFetchError } from '../errors.js'
import type { RetryPolicy } from '../types.js'

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: FetchError; attempts: number }

export interface RetryOptions {
  /** Sleep between attempts; replaced in tests */
  sleep?: (ms: number) => Promise<void>

  /** Called before each backoff sleep */
  onRetry?: (info: { attempt: number; delayMs: number; error: FetchError }) => void

  /** URL for error context */
  url?: string
}

/**
 * Backoff before the next attempt: base × 2^(attempt-1), capped at maxDelayMs.
 * attempt is the 1-based number of the attempt that just failed.
 */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.baseDelayMs * Math.pow(2, attempt - 1), policy.maxDelayMs)
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {}
): Promise<RetryOutcome<T>> {
  const wait = options.sleep ?? sleep
  const maxAttempts = Math.max(1, policy.maxAttempts)
  let lastError: FetchError | null = null

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      const value = await operation(attempt)
      return { ok: true, value, attempts: attempt }
    } catch (error) {
      const fetchError = toFetchError(error, options.url)
      fetchError.attempts = attempt
      lastError = fetchError

      if (!fetchError.isTransient) {
        return { ok: false, error: fetchError, attempts: attempt }
      }

      if (attempt < maxAttempts) {
        const delayMs = backoffDelay(policy, attempt)
        options.onRetry?.({ attempt, delayMs, error: fetchError })
        await wait(delayMs)
      }
    }
  }

  const exhausted = new FetchError(
    `Gave up after ${maxAttempts} attempts: ${lastError?.message ?? 'unknown error'}`,
    {
      kind: 'permanent',
      reason: 'RETRIES_EXHAUSTED',
      statusCode: lastError?.statusCode,
      url: options.url,
      attempts: maxAttempts,
      cause: lastError ?? undefined,
    }
  )
  return { ok: false, error: exhausted, attempts: maxAttempts }
}

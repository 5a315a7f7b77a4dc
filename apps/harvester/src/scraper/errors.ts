/**
 * Fetch-layer errors.
 *
 * transient: worth retrying (network, timeout, 408/429/5xx)
 * permanent: fail now (other 4xx, blocked, oversized, retries exhausted)
 */

export type FetchErrorKind = 'transient' | 'permanent'

export type FetchErrorReason =
  | 'NETWORK'
  | 'TIMEOUT'
  | 'HTTP_STATUS'
  | 'BLOCKED'
  | 'TOO_LARGE'
  | 'RETRIES_EXHAUSTED'

/** Status codes retried with backoff */
export const TRANSIENT_STATUS_CODES: ReadonlySet<number> = new Set([408, 429, 500, 502, 503, 504])

export class FetchError extends Error {
  readonly kind: FetchErrorKind
  readonly reason: FetchErrorReason
  readonly statusCode?: number
  readonly url?: string
  /** Attempts made before this error surfaced; set by the retry combinator */
  attempts: number

  constructor(
    message: string,
    init: {
      kind: FetchErrorKind
      reason: FetchErrorReason
      statusCode?: number
      url?: string
      attempts?: number
      cause?: unknown
    }
  ) {
    super(message, { cause: init.cause })
    this.name = 'FetchError'
    this.kind = init.kind
    this.reason = init.reason
    this.statusCode = init.statusCode
    this.url = init.url
    this.attempts = init.attempts ?? 1
  }

  get isTransient(): boolean {
    return this.kind === 'transient'
  }

  static fromStatus(statusCode: number, statusText: string, url: string): FetchError {
    return new FetchError(`HTTP ${statusCode}: ${statusText}`, {
      kind: TRANSIENT_STATUS_CODES.has(statusCode) ? 'transient' : 'permanent',
      reason: 'HTTP_STATUS',
      statusCode,
      url,
    })
  }
}

/**
 * Classify anything thrown by a fetch attempt.
 * Errors that are not FetchErrors are connection-level failures and count as transient.
 */
export function toFetchError(error: unknown, url?: string): FetchError {
  if (error instanceof FetchError) return error

  if (error instanceof Error && error.name === 'AbortError') {
    return new FetchError(error.message || 'Request aborted', {
      kind: 'transient',
      reason: 'TIMEOUT',
      url,
      cause: error,
    })
  }

  const message = error instanceof Error ? error.message : String(error)
  return new FetchError(message, { kind: 'transient', reason: 'NETWORK', url, cause: error })
}

/**
 * Thrown by a category walk when a listing page could not be fetched.
 * The walk stops; pages already yielded stay valid.
 */
export class CategoryFetchError extends Error {
  readonly category: string
  readonly page: number
  readonly fetchError: FetchError

  constructor(category: string, page: number, fetchError: FetchError) {
    super(`Failed to fetch ${category} page ${page}: ${fetchError.message}`, { cause: fetchError })
    this.name = 'CategoryFetchError'
    this.category = category
    this.page = page
    this.fetchError = fetchError
  }
}

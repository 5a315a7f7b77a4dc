/**
 * HTTP Fetcher
 *
 * Polite, failure-tolerant page fetching over native fetch:
 * - every attempt takes a slot from the shared RateLimiter first
 * - transient failures retry with exponential backoff (withRetry)
 * - a fixed politeness delay follows every successful response
 * - User-Agent rotates per request
 */

import type { ILogger } from '@fairway/logger'
import { createNoopLogger } from '@fairway/logger'
import { FetchError } from '../errors.js'
import type { Fetcher, FetchOptions, FetchResult, QueryParams, RateLimiter, RetryPolicy } from '../types.js'
import { DEFAULT_FETCH_HEADERS, DEFAULT_FETCH_OPTIONS, DEFAULT_RETRY_POLICY } from '../types.js'
import { withQueryParams } from '../utils/url.js'
import { sleep as defaultSleep, withRetry } from './retry.js'
import { pickUserAgent } from './user-agents.js'

export interface HttpFetcherOptions {
  /** Shared request budget; one instance per process */
  rateLimiter: RateLimiter

  /** Retry policy for transient failures */
  retryPolicy?: RetryPolicy

  /** Pause after each successful response in ms (default: 2000) */
  requestDelayMs?: number

  /** Defaults for timeout/size applied to every call */
  fetchOptions?: FetchOptions

  logger?: ILogger

  /** Sleep used for backoff and politeness delay (for testing) */
  sleep?: (ms: number) => Promise<void>

  /** Randomness for User-Agent rotation (for testing) */
  random?: () => number
}

export const DEFAULT_REQUEST_DELAY_MS = 2000

export class HttpFetcher implements Fetcher {
  private readonly rateLimiter: RateLimiter
  private readonly retryPolicy: RetryPolicy
  private readonly requestDelayMs: number
  private readonly defaults: FetchOptions
  private readonly logger: ILogger
  private readonly sleep: (ms: number) => Promise<void>
  private readonly random: () => number

  constructor(options: HttpFetcherOptions) {
    this.rateLimiter = options.rateLimiter
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY
    this.requestDelayMs = options.requestDelayMs ?? DEFAULT_REQUEST_DELAY_MS
    this.defaults = { ...DEFAULT_FETCH_OPTIONS, ...options.fetchOptions }
    this.logger = options.logger ?? createNoopLogger()
    this.sleep = options.sleep ?? defaultSleep
    this.random = options.random ?? Math.random
  }

  async fetch(url: string, params?: QueryParams, options?: FetchOptions): Promise<FetchResult> {
    const startTime = Date.now()
    const target = withQueryParams(url, params)
    const opts = { ...this.defaults, ...options }

    this.logger.debug('Fetching', { url: target })

    const outcome = await withRetry(
      async () => {
        await this.rateLimiter.acquire()
        return this.fetchOnce(target, opts)
      },
      this.retryPolicy,
      {
        url: target,
        sleep: this.sleep,
        onRetry: ({ attempt, delayMs, error }) => {
          this.logger.warn('Transient fetch failure, backing off', {
            url: target,
            attempt,
            delayMs,
            reason: error.reason,
            statusCode: error.statusCode,
          })
        },
      }
    )

    if (!outcome.ok) {
      this.logger.error('Fetch failed', {
        url: target,
        attempts: outcome.attempts,
        kind: outcome.error.kind,
        reason: outcome.error.reason,
        statusCode: outcome.error.statusCode,
      })
      return {
        ok: false,
        url: target,
        error: outcome.error,
        attempts: outcome.attempts,
        durationMs: Date.now() - startTime,
      }
    }

    if (this.requestDelayMs > 0) {
      await this.sleep(this.requestDelayMs)
    }

    return {
      ok: true,
      url: target,
      statusCode: outcome.value.statusCode,
      html: outcome.value.html,
      attempts: outcome.attempts,
      durationMs: Date.now() - startTime,
    }
  }

  /**
   * Single fetch attempt (no retries). Throws FetchError on any failure.
   */
  private async fetchOnce(url: string, opts: FetchOptions): Promise<{ statusCode: number; html: string }> {
    const controller = new AbortController()
    const timeoutMs = opts.timeoutMs ?? DEFAULT_FETCH_OPTIONS.timeoutMs
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs)

    const headers: Record<string, string> = {
      ...DEFAULT_FETCH_HEADERS,
      'User-Agent': pickUserAgent(this.random),
      ...(opts.headers ?? {}),
    }

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers,
        signal: controller.signal,
        redirect: 'follow',
      })

      // Captcha or access-denied interstitials are not worth retrying
      if (response.status === 403 || response.status === 503) {
        const text = await response.text()
        if (looksLikeBlockedPage(text)) {
          throw new FetchError('Request blocked (captcha or access denied)', {
            kind: 'permanent',
            reason: 'BLOCKED',
            statusCode: response.status,
            url,
          })
        }
      }

      if (!response.ok) {
        throw FetchError.fromStatus(response.status, response.statusText, url)
      }

      const maxBytes = opts.maxSizeBytes ?? DEFAULT_FETCH_OPTIONS.maxSizeBytes
      const contentLength = response.headers.get('content-length')
      if (contentLength && Number.parseInt(contentLength, 10) > maxBytes) {
        throw tooLarge(url, `Response too large: ${contentLength} bytes`, response.status)
      }

      const html = await readBodyWithLimit(response, maxBytes)
      if (html === null) {
        throw tooLarge(url, 'Response exceeded size limit', response.status)
      }

      return { statusCode: response.status, html }
    } catch (error) {
      if (controller.signal.aborted && !(error instanceof FetchError)) {
        throw new FetchError(`Request timed out after ${timeoutMs}ms`, {
          kind: 'transient',
          reason: 'TIMEOUT',
          url,
          cause: error,
        })
      }
      throw error
    } finally {
      clearTimeout(timeoutId)
    }
  }
}

function tooLarge(url: string, message: string, statusCode: number): FetchError {
  return new FetchError(message, { kind: 'permanent', reason: 'TOO_LARGE', statusCode, url })
}

/**
 * Read response body with size limit.
 * Returns null if size exceeds limit.
 */
async function readBodyWithLimit(response: Response, maxBytes: number): Promise<string | null> {
  const reader = response.body?.getReader()
  if (!reader) {
    return ''
  }

  const chunks: Uint8Array[] = []
  let totalSize = 0

  try {
    while (true) {
      const { done, value } = await reader.read()
      if (done) break

      totalSize += value.length
      if (totalSize > maxBytes) {
        await reader.cancel()
        return null
      }

      chunks.push(value)
    }

    return new TextDecoder('utf-8').decode(Buffer.concat(chunks))
  } finally {
    reader.releaseLock()
  }
}

const BLOCK_INDICATORS = [
  'captcha',
  'recaptcha',
  'hcaptcha',
  'challenge-form',
  'cf-browser-verification',
  'please verify you are a human',
  'access denied',
]

/**
 * Heuristic check for blocked/captcha pages.
 */
export function looksLikeBlockedPage(html: string): boolean {
  const lowerHtml = html.toLowerCase()
  return BLOCK_INDICATORS.some(indicator => lowerHtml.includes(indicator))
}

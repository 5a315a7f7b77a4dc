/**
 * Scraper Core Types
 *
 * Listing records, fetch/extract results and the SourceAdapter contract
 * every retailer implements.
 */

import type { ILogger } from '@fairway/logger'
import type { FetchError } from './errors.js'

// ═══════════════════════════════════════════════════════════════════════════════
// Listing Records
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * A normalized listing as scraped from one retailer.
 *
 * Ephemeral: produced per scrape, consumed by the reconciler in the same run,
 * never written as-is.
 */
export interface RawListing {
  /** Retailer display name (e.g. "Global Golf"), the provenance source name */
  source: string

  /** Brand as displayed, before resolution against known brands */
  brandText: string

  /** Model as displayed, brand prefix removed */
  modelText: string

  /** Category slug or type text (e.g. "drivers", "Fairway Wood") */
  clubType: string

  /** Price in dollars; null when the page price is missing or unparsable */
  price: number | null

  /** Absolute product URL */
  detailUrl: string

  inStock: boolean

  /** Release year when the page gives one; reconciler defaults it otherwise */
  yearReleased?: number
}

/**
 * Detail-page enrichment. Only fetchDetail produces these extra fields.
 */
export interface DetailListing extends RawListing {
  title: string
  description?: string
  specifications: Record<string, string>
  rating?: number
  reviewCount?: number
}

/**
 * Why a single item on a page was dropped before reconciliation.
 */
export type ExtractSkipReason =
  | 'TITLE_NOT_FOUND'
  | 'URL_NOT_FOUND'
  | 'BRAND_NOT_FOUND'
  | 'PARSE_ERROR'

export interface ExtractSkip {
  reason: ExtractSkipReason
  details?: string
}

export type ExtractResult<T> =
  | { ok: true; listing: T }
  | { ok: false; skip: ExtractSkip }

/**
 * One fetched category page.
 */
export interface CategoryPage {
  category: string
  page: number
  url: string
  listings: RawListing[]
  skipped: ExtractSkip[]
}

export type DetailResult =
  | { status: 'ok'; listing: DetailListing }
  | { status: 'not_found'; reason: string }
  | { status: 'error'; error: FetchError }

// ═══════════════════════════════════════════════════════════════════════════════
// Fetcher Interface
// ═══════════════════════════════════════════════════════════════════════════════

export type QueryParams = Record<string, string | number | undefined>

/**
 * Fetcher interface - adapters receive HTML regardless of how it was fetched.
 */
export interface Fetcher {
  fetch(url: string, params?: QueryParams, options?: FetchOptions): Promise<FetchResult>
}

export interface FetchOptions {
  /** Request timeout in ms (default: 30000) */
  timeoutMs?: number

  /** Maximum response size in bytes (default: 10MB) */
  maxSizeBytes?: number

  /** Extra headers, merged over the defaults */
  headers?: Record<string, string>
}

/**
 * Headers sent on every request; User-Agent is added per request from the rotation pool.
 */
export const DEFAULT_FETCH_HEADERS = {
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.5',
} as const

export const DEFAULT_FETCH_OPTIONS = {
  timeoutMs: 30000,
  maxSizeBytes: 10 * 1024 * 1024, // 10 MB
} as const satisfies FetchOptions

export type FetchResult =
  | {
      ok: true
      url: string
      statusCode: number
      html: string
      attempts: number
      durationMs: number
    }
  | {
      ok: false
      url: string
      error: FetchError
      attempts: number
      durationMs: number
    }

// ═══════════════════════════════════════════════════════════════════════════════
// Rate Limiting
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Global request budget shared by every adapter in the process (or, for the
 * Redis implementation, across processes).
 *
 * acquire() suspends until a slot is free; it never rejects for being over budget.
 */
export interface RateLimiter {
  acquire(): Promise<void>
}

export interface RateLimitConfig {
  /** Requests allowed per rolling window */
  maxRequests: number

  /** Window length in ms (default: 60000) */
  windowMs: number
}

export const DEFAULT_RATE_LIMIT: RateLimitConfig = {
  maxRequests: 30,
  windowMs: 60_000,
}

// ═══════════════════════════════════════════════════════════════════════════════
// Retry Policy
// ═══════════════════════════════════════════════════════════════════════════════

export interface RetryPolicy {
  maxAttempts: number // Default: 3
  baseDelayMs: number // Default: 4000
  maxDelayMs: number // Default: 10000
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 4000,
  maxDelayMs: 10000,
}

// ═══════════════════════════════════════════════════════════════════════════════
// SourceAdapter Interface
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Context passed to adapter calls.
 */
export interface ScrapeAdapterContext {
  fetcher: Fetcher
  logger: ILogger
}

export interface ListCategoryOptions {
  /** First page to fetch; lets a caller restart a walk (default: 1) */
  startPage?: number

  /** Hard ceiling on pages fetched in one walk (default: 10) */
  maxPages?: number

  /** Retailer-side brand filter */
  brand?: string
}

/**
 * Adapter interface for one retailer.
 *
 * Adapters are selected by configuration through the registry; adding a
 * retailer means implementing this contract and registering it.
 */
export interface SourceAdapter {
  /** Registry key (e.g. 'globalgolf') */
  readonly id: string

  /** Provenance source name written to product_sources (e.g. 'Global Golf') */
  readonly sourceName: string

  /** Semver version (increment on extraction logic changes) */
  readonly version: string

  readonly baseUrl: string

  /** Category slug → path under baseUrl */
  readonly categories: Readonly<Record<string, string>>

  /**
   * Fetch and extract a single category page.
   * @throws CategoryFetchError when the page cannot be fetched
   */
  fetchCategoryPage(
    category: string,
    page: number,
    ctx: ScrapeAdapterContext,
    options?: Pick<ListCategoryOptions, 'brand'>
  ): Promise<CategoryPage>

  /**
   * Walk a category in increasing page order until a page yields no items
   * or the page ceiling is hit.
   * @throws CategoryFetchError when a page cannot be fetched
   */
  listCategory(
    category: string,
    ctx: ScrapeAdapterContext,
    options?: ListCategoryOptions
  ): AsyncGenerator<CategoryPage, void, undefined>

  /**
   * Fetch one product page. Used for enrichment and refresh-only runs.
   */
  fetchDetail(url: string, ctx: ScrapeAdapterContext): Promise<DetailResult>
}

/**
 * Scraper Framework
 *
 * Polite fetching, the SourceAdapter contract and registered retailer adapters.
 */

// Core types
export * from './types.js'
export { CategoryFetchError, FetchError, toFetchError, TRANSIENT_STATUS_CODES } from './errors.js'
export type { FetchErrorKind, FetchErrorReason } from './errors.js'

// Registry
export { InMemoryAdapterRegistry } from './registry.js'
export { createAdapterRegistry, globalGolfAdapter, registerAllAdapters } from './adapters/index.js'

// Fetch layer
export { createFetchStack, createRateLimiter } from './fetch/fetcher.js'
export type { FetchStack, FetchStackOptions } from './fetch/fetcher.js'
export { HttpFetcher, looksLikeBlockedPage } from './fetch/http-fetcher.js'
export { SlidingWindowRateLimiter } from './fetch/rate-limiter.js'
export { RedisRateLimiter } from './fetch/redis-rate-limiter.js'
export { backoffDelay, withRetry } from './fetch/retry.js'

// Pagination
export { DEFAULT_MAX_PAGES, paginate } from './paginate.js'

// Utilities
export { canonicalizeUrl, resolveUrl, withQueryParams } from './utils/url.js'
export { normalizePrice, samePrice } from './utils/price.js'
export { cleanText, extractYear, splitBrandModel } from './utils/text.js'

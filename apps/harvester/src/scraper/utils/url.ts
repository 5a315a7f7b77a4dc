/**
 * URL Utilities
 *
 * Canonical form used for product_sources.product_url:
 * 1. Lowercase hostname
 * 2. Remove tracking parameters: utm_*, fbclid, gclid, ref, source, campaign
 * 3. Remove empty query parameters, sort the rest
 * 4. Remove fragment identifiers (#...)
 * 5. Remove trailing slash (except root path)
 */

import type { QueryParams } from '../types.js'

const TRACKING_PARAMS = new Set(['fbclid', 'gclid', 'ref', 'source', 'campaign'])

/**
 * Canonicalize a URL for provenance storage.
 * @throws TypeError if the URL is invalid
 */
export function canonicalizeUrl(url: string): string {
  const parsed = new URL(url)

  parsed.hostname = parsed.hostname.toLowerCase()

  const keysToDelete: string[] = []
  for (const [key, value] of parsed.searchParams.entries()) {
    if (TRACKING_PARAMS.has(key) || key.startsWith('utm_') || value === '') {
      keysToDelete.push(key)
    }
  }
  for (const key of keysToDelete) {
    parsed.searchParams.delete(key)
  }

  parsed.searchParams.sort()
  parsed.hash = ''

  if (parsed.pathname !== '/' && parsed.pathname.endsWith('/')) {
    parsed.pathname = parsed.pathname.slice(0, -1)
  }

  return parsed.toString()
}

/**
 * Resolve a possibly-relative href against the page it was found on.
 * Returns null for empty, javascript: or otherwise unusable hrefs.
 */
export function resolveUrl(href: string | undefined, base: string): string | null {
  const trimmed = href?.trim()
  if (!trimmed || trimmed.toLowerCase().startsWith('javascript:')) {
    return null
  }
  try {
    const resolved = new URL(trimmed, base)
    if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') {
      return null
    }
    return resolved.toString()
  } catch {
    return null
  }
}

/**
 * Append query parameters; undefined values are skipped, existing keys overwritten.
 */
export function withQueryParams(url: string, params?: QueryParams): string {
  if (!params) return url

  const parsed = new URL(url)
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) continue
    parsed.searchParams.set(key, String(value))
  }
  return parsed.toString()
}

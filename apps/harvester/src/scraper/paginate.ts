/**
 * Category pagination shared by adapters.
 *
 * Pages are fetched strictly in increasing order; some retailers treat the page
 * number as a true position, so pages are never fetched in parallel.
 */

import type { CategoryPage, ListCategoryOptions, ScrapeAdapterContext } from './types.js'

/** Per-walk page ceiling when the caller gives none */
export const DEFAULT_MAX_PAGES = 10

export type FetchCategoryPage = (
  category: string,
  page: number,
  ctx: ScrapeAdapterContext,
  options?: Pick<ListCategoryOptions, 'brand'>
) => Promise<CategoryPage>

/**
 * Walk a category from options.startPage until a page yields no items (listings
 * or skips) or options.maxPages pages have been fetched.
 *
 * Errors from fetchPage propagate to the consumer and end the walk.
 */
export async function* paginate(
  fetchPage: FetchCategoryPage,
  category: string,
  ctx: ScrapeAdapterContext,
  options: ListCategoryOptions = {}
): AsyncGenerator<CategoryPage, void, undefined> {
  const startPage = Math.max(1, options.startPage ?? 1)
  const maxPages = Math.max(0, options.maxPages ?? DEFAULT_MAX_PAGES)

  for (let page = startPage; page < startPage + maxPages; page++) {
    const result = await fetchPage(category, page, ctx, { brand: options.brand })

    if (result.listings.length === 0 && result.skipped.length === 0) {
      ctx.logger.debug('Empty page, stopping pagination', { category, page })
      return
    }

    yield result
  }

  ctx.logger.info('Page ceiling reached', { category, maxPages, startPage })
}

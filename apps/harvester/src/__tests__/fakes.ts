/**
 * In-process stand-ins for pipeline tests.
 */

import { CategoryFetchError, FetchError } from '../scraper/errors.js'
import { paginate } from '../scraper/paginate.js'
import type {
  CategoryPage,
  DetailResult,
  Fetcher,
  FetchResult,
  RawListing,
  ScrapeAdapterContext,
  SourceAdapter,
} from '../scraper/types.js'

export const SOURCE_NAME = 'Acme Golf'

export function rawListing(overrides: Partial<RawListing> = {}): RawListing {
  return {
    source: SOURCE_NAME,
    brandText: 'Titleist',
    modelText: 'TSR3 Driver',
    clubType: 'drivers',
    price: 599.99,
    detailUrl: 'https://acme.example/tsr3',
    inStock: true,
    ...overrides,
  }
}

/** Fetcher for code paths that must not touch the network */
export const unusedFetcher: Fetcher = {
  async fetch(url: string): Promise<FetchResult> {
    throw new Error(`Unexpected fetch of ${url}`)
  },
}

export function fetchFailure(statusCode: number): FetchError {
  return new FetchError(`Gave up after 3 attempts: HTTP ${statusCode}`, {
    kind: 'permanent',
    reason: 'RETRIES_EXHAUSTED',
    statusCode,
    attempts: 3,
  })
}

export interface FakeAdapterOptions {
  /** Category slug → pages of listings, or the error the first page fails with */
  categories: Record<string, RawListing[][] | FetchError>
  /** Detail URL → result; unknown URLs are not_found */
  details?: Record<string, DetailResult>
}

export interface FakeAdapter extends SourceAdapter {
  detailRequests: string[]
}

/**
 * SourceAdapter serving canned pages and detail results.
 */
export function fakeAdapter(options: FakeAdapterOptions): FakeAdapter {
  const detailRequests: string[] = []
  const categories: Record<string, string> = {}
  for (const slug of Object.keys(options.categories)) {
    categories[slug] = `/${slug}/`
  }

  async function fetchCategoryPage(category: string, page: number): Promise<CategoryPage> {
    const pages = options.categories[category]
    if (pages instanceof FetchError) {
      throw new CategoryFetchError(category, page, pages)
    }
    return {
      category,
      page,
      url: `https://acme.example/${category}/?page=${page}`,
      listings: pages?.[page - 1] ?? [],
      skipped: [],
    }
  }

  return {
    id: 'acme',
    sourceName: SOURCE_NAME,
    version: '0.0.1',
    baseUrl: 'https://acme.example',
    categories,
    detailRequests,
    fetchCategoryPage,
    listCategory(category: string, ctx: ScrapeAdapterContext, listOptions) {
      return paginate(fetchCategoryPage, category, ctx, listOptions)
    },
    async fetchDetail(url: string): Promise<DetailResult> {
      detailRequests.push(url)
      return options.details?.[url] ?? { status: 'not_found', reason: 'HTTP 404' }
    },
  }
}

export function detailOk(listing: RawListing): DetailResult {
  return {
    status: 'ok',
    listing: {
      ...listing,
      title: `${listing.brandText} ${listing.modelText}`,
      specifications: {},
    },
  }
}

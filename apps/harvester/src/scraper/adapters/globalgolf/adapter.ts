/**
 * Global Golf Adapter
 *
 * Static HTML catalog; no JS rendering needed.
 * Category pages: /golf-clubs/<category>/?page=N[&brand=X]
 * Product pages: title, price, stock, specifications table and review summary.
 */

import * as cheerio from 'cheerio'
import { CategoryFetchError } from '../../errors.js'
import { paginate } from '../../paginate.js'
import type {
  CategoryPage,
  DetailListing,
  DetailResult,
  ExtractResult,
  ExtractSkip,
  ListCategoryOptions,
  RawListing,
  ScrapeAdapterContext,
  SourceAdapter,
} from '../../types.js'
import { normalizePrice } from '../../utils/price.js'
import { cleanText, extractYear, splitBrandModel } from '../../utils/text.js'
import { canonicalizeUrl, resolveUrl } from '../../utils/url.js'
import { CATEGORY_PATHS, SELECTORS, TYPE_SPEC_KEYS, YEAR_SPEC_KEYS } from './selectors.js'

const ADAPTER_ID = 'globalgolf'
const ADAPTER_VERSION = '1.0.0'
const SOURCE_NAME = 'Global Golf'
const BASE_URL = 'https://www.globalgolf.com'

/**
 * Fields read off one product card, before validation.
 */
interface ListingCard {
  title: string
  priceText: string
  href: string | undefined
  outOfStock: boolean
}

/**
 * Turn one card into a listing. A card without a title or link is skipped;
 * a card without a usable price is kept with price null.
 */
function cardToListing(card: ListingCard, category: string, pageUrl: string): ExtractResult<RawListing> {
  if (!card.title) {
    return { ok: false, skip: { reason: 'TITLE_NOT_FOUND' } }
  }

  const detailUrl = resolveUrl(card.href, pageUrl)
  if (!detailUrl) {
    return { ok: false, skip: { reason: 'URL_NOT_FOUND', details: card.title } }
  }

  const names = splitBrandModel(card.title)
  if (!names) {
    return { ok: false, skip: { reason: 'BRAND_NOT_FOUND', details: card.title } }
  }

  return {
    ok: true,
    listing: {
      source: SOURCE_NAME,
      brandText: names.brand,
      modelText: names.model,
      clubType: category,
      price: normalizePrice(card.priceText),
      detailUrl: canonicalizeUrl(detailUrl),
      inStock: !card.outOfStock,
      yearReleased: extractYear(card.title),
    },
  }
}

/**
 * Extract every product card on a category page.
 * Items that fail extraction are reported in `skipped`, never thrown.
 */
export function extractCategoryPage(
  html: string,
  pageUrl: string,
  category: string
): { listings: RawListing[]; skipped: ExtractSkip[] } {
  const $ = cheerio.load(html)
  const listings: RawListing[] = []
  const skipped: ExtractSkip[] = []

  for (const element of $(SELECTORS.productItem).toArray()) {
    const item = $(element)
    try {
      const result = cardToListing(
        {
          title: cleanText(item.find(SELECTORS.itemTitle).first().text()),
          priceText: cleanText(item.find(SELECTORS.itemPrice).first().text()),
          href: item.find(SELECTORS.itemLink).first().attr('href'),
          outOfStock:
            item.find(SELECTORS.itemOutOfStock).length > 0 ||
            /out of stock|sold out/i.test(item.text()),
        },
        category,
        pageUrl
      )
      if (result.ok) {
        listings.push(result.listing)
      } else {
        skipped.push(result.skip)
      }
    } catch (error) {
      skipped.push({
        reason: 'PARSE_ERROR',
        details: error instanceof Error ? error.message : String(error),
      })
    }
  }

  return { listings, skipped }
}

function extractSpecifications($: cheerio.CheerioAPI): Record<string, string> {
  const specs: Record<string, string> = {}
  for (const row of $(SELECTORS.specRows).toArray()) {
    const key = cleanText($(row).find('th').first().text())
    const value = cleanText($(row).find('td').first().text())
    if (key && value) {
      specs[key] = value
    }
  }
  return specs
}

function specLookup(specs: Record<string, string>, keys: readonly string[]): string | undefined {
  for (const [key, value] of Object.entries(specs)) {
    if (keys.includes(key.toLowerCase())) return value
  }
  return undefined
}

/**
 * Club type from the specifications table, then from a breadcrumb link into a known
 * category path.
 */
function extractClubType($: cheerio.CheerioAPI, specs: Record<string, string>): string {
  const fromSpecs = specLookup(specs, TYPE_SPEC_KEYS)
  if (fromSpecs) return fromSpecs

  for (const link of $(SELECTORS.breadcrumbLinks).toArray()) {
    const href = $(link).attr('href') ?? ''
    for (const [category, path] of Object.entries(CATEGORY_PATHS)) {
      if (href.includes(path)) return category
    }
  }
  return 'unknown'
}

function parseNumber(text: string): number | undefined {
  const match = /\d+(?:\.\d+)?/.exec(text.replace(/,/g, ''))
  return match ? Number.parseFloat(match[0]) : undefined
}

/**
 * Extract a product page. Returns null when the page has no product title.
 */
export function extractDetailPage(html: string, url: string): DetailListing | null {
  const $ = cheerio.load(html)

  const title = cleanText($(SELECTORS.title).first().text())
  if (!title) return null

  const names = splitBrandModel(title)
  if (!names) return null

  const specifications = extractSpecifications($)
  const stockText = cleanText($(SELECTORS.stockStatus).first().text()).toLowerCase()
  const description = cleanText($(SELECTORS.description).first().text())
  const rating = parseNumber($(SELECTORS.rating).first().text())
  const reviewCount = parseNumber($(SELECTORS.reviewCount).first().text())

  return {
    source: SOURCE_NAME,
    title,
    brandText: names.brand,
    modelText: names.model,
    clubType: extractClubType($, specifications),
    price: normalizePrice(cleanText($(SELECTORS.price).first().text())),
    detailUrl: canonicalizeUrl(url),
    inStock: !/out of stock|sold out|unavailable/.test(stockText),
    yearReleased: extractYear(specLookup(specifications, YEAR_SPEC_KEYS)) ?? extractYear(title),
    description: description || undefined,
    specifications,
    rating,
    reviewCount: reviewCount === undefined ? undefined : Math.trunc(reviewCount),
  }
}

async function fetchCategoryPage(
  category: string,
  page: number,
  ctx: ScrapeAdapterContext,
  options: Pick<ListCategoryOptions, 'brand'> = {}
): Promise<CategoryPage> {
  const path = Object.hasOwn(CATEGORY_PATHS, category) ? globalGolfAdapter.categories[category] : undefined
  if (path === undefined) {
    throw new Error(`Unknown category '${category}' for ${SOURCE_NAME}`)
  }

  const url = `${BASE_URL}${path}`
  const result = await ctx.fetcher.fetch(url, { page, brand: options.brand })
  if (!result.ok) {
    throw new CategoryFetchError(category, page, result.error)
  }

  const { listings, skipped } = extractCategoryPage(result.html, result.url, category)

  for (const skip of skipped) {
    ctx.logger.warn('Skipped listing', { category, page, reason: skip.reason, details: skip.details })
  }
  ctx.logger.debug('Extracted category page', {
    category,
    page,
    listings: listings.length,
    skipped: skipped.length,
  })

  return { category, page, url: result.url, listings, skipped }
}

/**
 * Global Golf source adapter.
 */
export const globalGolfAdapter: SourceAdapter = {
  id: ADAPTER_ID,
  sourceName: SOURCE_NAME,
  version: ADAPTER_VERSION,
  baseUrl: BASE_URL,
  categories: CATEGORY_PATHS,

  fetchCategoryPage,

  listCategory(category, ctx, options) {
    return paginate(fetchCategoryPage, category, ctx, options)
  },

  async fetchDetail(url, ctx): Promise<DetailResult> {
    const result = await ctx.fetcher.fetch(url)

    if (!result.ok) {
      if (result.error.statusCode === 404 || result.error.statusCode === 410) {
        return { status: 'not_found', reason: `HTTP ${result.error.statusCode}` }
      }
      return { status: 'error', error: result.error }
    }

    const listing = extractDetailPage(result.html, url)
    if (!listing) {
      ctx.logger.warn('Product page has no title', { url })
      return { status: 'not_found', reason: 'TITLE_NOT_FOUND' }
    }

    return { status: 'ok', listing }
  },
}

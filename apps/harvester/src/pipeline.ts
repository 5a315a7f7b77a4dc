/**
 * Pipeline entry points.
 *
 * runFullCrawl: walk categories → reconcile each page → one ScrapeRun
 * runRefresh:   re-fetch stale provenance rows → one ScrapeRun
 *
 * Neither throws for anything that happens during the run; both always
 * finalize their run record. Only a store failure while opening or finalizing
 * the record itself propagates.
 */

import type { ILogger } from '@fairway/logger'
import type { CatalogStore } from './catalog/store.js'
import type { ScrapeRun, ScrapeType, TerminalRunStatus } from './catalog/types.js'
import { logger as rootLogger } from './config/logger.js'
import type { ReconcileCounts } from './reconcile/reconciler.js'
import { addCounts, emptyCounts, Reconciler } from './reconcile/reconciler.js'
import type { TaxonomyPolicy } from './reconcile/taxonomy.js'
import { DEFAULT_REFRESH_INTERVAL_MS, refreshStaleSources } from './refresh/scheduler.js'
import type { RunTally } from './runs/run-logger.js'
import { RunLogger } from './runs/run-logger.js'
import { CategoryFetchError } from './scraper/errors.js'
import { DEFAULT_MAX_PAGES } from './scraper/paginate.js'
import type { Fetcher, RawListing, ScrapeAdapterContext, SourceAdapter } from './scraper/types.js'

export interface RunSummary {
  recordsAdded: number
  recordsUpdated: number
  errors: number
  /** Items dropped before or during reconciliation; not failures */
  skipped: number
  status: TerminalRunStatus
  run: ScrapeRun
}

interface CommonRunOptions {
  adapter: SourceAdapter
  store: CatalogStore
  fetcher: Fetcher
  policy?: TaxonomyPolicy
  logger?: ILogger
  now?: () => Date
}

export interface FullCrawlOptions extends CommonRunOptions {
  /** One category slug; all of the adapter's categories when omitted */
  category?: string
  brandFilter?: string
  maxPagesPerCategory?: number
  /** Fetch each listing's product page to fill price, stock and year */
  enrichDetails?: boolean
}

export interface RefreshRunOptions extends CommonRunOptions {
  maxBatch: number
  refreshIntervalMs?: number
  concurrency?: number
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

async function finalizeOrThrow(
  runs: RunLogger,
  run: ScrapeRun,
  tally: RunTally,
  log: ILogger
): Promise<{ run: ScrapeRun; status: TerminalRunStatus }> {
  try {
    return await runs.finalize(run, tally)
  } catch (error) {
    log.error('Failed to finalize scrape run', { runId: run.id }, error)
    throw error
  }
}

/**
 * Merge a product page into its listing. A listing whose page cannot be
 * fetched is dropped.
 */
async function enrich(
  adapter: SourceAdapter,
  listings: readonly RawListing[],
  ctx: ScrapeAdapterContext
): Promise<{ listings: RawListing[]; dropped: number }> {
  const enriched: RawListing[] = []
  let dropped = 0

  for (const listing of listings) {
    const detail = await adapter.fetchDetail(listing.detailUrl, ctx)
    if (detail.status !== 'ok') {
      ctx.logger.warn('Detail fetch failed, listing skipped', {
        url: listing.detailUrl,
        reason: detail.status === 'error' ? detail.error.reason : detail.reason,
      })
      dropped += 1
      continue
    }
    enriched.push({
      ...listing,
      price: detail.listing.price ?? listing.price,
      inStock: detail.listing.inStock,
      yearReleased: detail.listing.yearReleased ?? listing.yearReleased,
    })
  }

  return { listings: enriched, dropped }
}

export async function runFullCrawl(options: FullCrawlOptions): Promise<RunSummary> {
  const { adapter, store } = options
  const baseLog = (options.logger ?? rootLogger).child('crawl', { source: adapter.id })
  const runs = new RunLogger({ store, logger: baseLog.child('runs'), now: options.now })

  const scrapeType: ScrapeType = options.category ? `filtered_${options.category}` : 'full'
  const run = await runs.open(adapter.sourceName, scrapeType)
  // Everything logged during the run carries its id
  const log = baseLog.child({ runId: run.id })

  const reconciler = new Reconciler({
    store,
    logger: log.child('reconcile'),
    policy: options.policy,
    now: options.now,
  })
  const ctx: ScrapeAdapterContext = {
    fetcher: options.fetcher,
    logger: log.child('adapter'),
  }

  const counts: ReconcileCounts = emptyCounts()
  let attempted = 0
  let pagesFetched = 0
  let categoryFailures = 0
  let lastCategoryError: string | null = null
  let abortReason: string | null = null

  try {
    const categories = options.category ? [options.category] : Object.keys(adapter.categories)
    const unknown = categories.find(category => !Object.hasOwn(adapter.categories, category))
    if (unknown !== undefined) {
      throw new Error(`Unknown category '${unknown}' for ${adapter.sourceName}`)
    }

    for (const category of categories) {
      try {
        const pages = adapter.listCategory(category, ctx, {
          brand: options.brandFilter,
          maxPages: options.maxPagesPerCategory ?? DEFAULT_MAX_PAGES,
        })

        for await (const page of pages) {
          pagesFetched += 1
          counts.skipped += page.skipped.length

          let listings = page.listings
          if (options.enrichDetails) {
            const result = await enrich(adapter, listings, ctx)
            listings = result.listings
            counts.skipped += result.dropped
          }

          attempted += listings.length
          addCounts(counts, await reconciler.reconcileBatch(listings))
          log.info('Page reconciled', {
            category,
            page: page.page,
            listings: page.listings.length,
            added: counts.added,
            updated: counts.updated,
          })
        }
      } catch (error) {
        if (!(error instanceof CategoryFetchError)) throw error
        // The rest of this category is lost; other categories still run
        categoryFailures += 1
        counts.errors += 1
        lastCategoryError = error.message
        log.error('Category crawl stopped', { category, page: error.page }, error)
      }
    }

    if (pagesFetched === 0 && categoryFailures > 0) {
      abortReason = `No category page could be fetched: ${lastCategoryError ?? 'unknown error'}`
    }
  } catch (error) {
    abortReason = errorMessage(error)
    log.error('Crawl aborted', {}, error)
  }

  const { run: finalized, status } = await finalizeOrThrow(
    runs,
    run,
    {
      recordsAdded: counts.added,
      recordsUpdated: counts.updated,
      errors: counts.errors,
      attempted: attempted + categoryFailures,
      abortReason,
    },
    log
  )

  return {
    recordsAdded: counts.added,
    recordsUpdated: counts.updated,
    errors: counts.errors,
    skipped: counts.skipped,
    status,
    run: finalized,
  }
}

export async function runRefresh(options: RefreshRunOptions): Promise<RunSummary> {
  const { adapter, store } = options
  const baseLog = (options.logger ?? rootLogger).child('refresh', { source: adapter.id })
  const runs = new RunLogger({ store, logger: baseLog.child('runs'), now: options.now })

  const run = await runs.open(adapter.sourceName, 'update_prices')
  const log = baseLog.child({ runId: run.id })

  const reconciler = new Reconciler({
    store,
    logger: log.child('reconcile'),
    policy: options.policy,
    now: options.now,
  })

  let refreshed = 0
  let skipped = 0
  let errors = 0
  let selected = 0
  let abortReason: string | null = null

  try {
    const counts = await refreshStaleSources({
      adapter,
      store,
      reconciler,
      ctx: { fetcher: options.fetcher, logger: log.child('adapter') },
      maxBatch: options.maxBatch,
      refreshIntervalMs: options.refreshIntervalMs ?? DEFAULT_REFRESH_INTERVAL_MS,
      concurrency: options.concurrency,
      now: options.now,
    })
    refreshed = counts.refreshed
    skipped = counts.skipped
    errors = counts.errors
    selected = counts.selected

    if (selected > 0 && errors === selected) {
      abortReason = `Source unreachable: all ${selected} refreshes failed`
    }
  } catch (error) {
    abortReason = errorMessage(error)
    log.error('Refresh aborted', {}, error)
  }

  const { run: finalized, status } = await finalizeOrThrow(
    runs,
    run,
    { recordsAdded: 0, recordsUpdated: refreshed, errors, attempted: selected, abortReason },
    log
  )

  return {
    recordsAdded: 0,
    recordsUpdated: refreshed,
    errors,
    skipped,
    status,
    run: finalized,
  }
}

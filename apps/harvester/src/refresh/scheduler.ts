/**
 * Staleness Scheduler
 *
 * Selects provenance rows not checked within the refresh interval, oldest
 * first, and re-fetches each through the owning adapter's detail path.
 *
 * Refreshes only ever touch existing rows: no clubs are created. A row whose
 * fetch fails is left as it was, so it stays eligible for the next run.
 */

import pLimit from 'p-limit'
import type { ILogger } from '@fairway/logger'
import type { CatalogStore } from '../catalog/store.js'
import type { ProductSource } from '../catalog/types.js'
import type { Reconciler } from '../reconcile/reconciler.js'
import type { ScrapeAdapterContext, SourceAdapter } from '../scraper/types.js'

export const DEFAULT_REFRESH_INTERVAL_MS = 24 * 60 * 60 * 1000
export const DEFAULT_REFRESH_BATCH_SIZE = 100

export interface RefreshCounts {
  selected: number
  refreshed: number
  /** Fetched fine but carried no price; row left untouched */
  skipped: number
  errors: number
}

export interface RefreshOptions {
  adapter: SourceAdapter
  store: CatalogStore
  reconciler: Reconciler
  ctx: ScrapeAdapterContext

  /** Most rows refreshed in one run */
  maxBatch: number

  /** Rows last checked longer ago than this are stale (default: 24h) */
  refreshIntervalMs?: number

  /** Parallel detail fetches; all share the fetcher's rate limiter (default: 1) */
  concurrency?: number

  now?: () => Date
}

type RowOutcome = 'refreshed' | 'skipped' | 'error'

/**
 * Provenance rows for a source whose lastChecked is older than now - interval.
 */
export function selectStaleSources(
  store: CatalogStore,
  sourceName: string,
  options: { now: Date; refreshIntervalMs: number; limit: number }
): Promise<ProductSource[]> {
  return store.findStaleProductSources({
    sourceName,
    olderThan: new Date(options.now.getTime() - options.refreshIntervalMs),
    limit: options.limit,
  })
}

export async function refreshStaleSources(options: RefreshOptions): Promise<RefreshCounts> {
  const now = options.now ?? (() => new Date())
  const log = options.ctx.logger

  const rows = await selectStaleSources(options.store, options.adapter.sourceName, {
    now: now(),
    refreshIntervalMs: options.refreshIntervalMs ?? DEFAULT_REFRESH_INTERVAL_MS,
    limit: options.maxBatch,
  })

  log.info('Selected stale product sources', {
    source: options.adapter.sourceName,
    count: rows.length,
    maxBatch: options.maxBatch,
  })

  const limit = pLimit(Math.max(1, options.concurrency ?? 1))
  const outcomes = await Promise.all(rows.map(row => limit(() => refreshOne(row, options, log))))

  return {
    selected: rows.length,
    refreshed: outcomes.filter(outcome => outcome === 'refreshed').length,
    skipped: outcomes.filter(outcome => outcome === 'skipped').length,
    errors: outcomes.filter(outcome => outcome === 'error').length,
  }
}

async function refreshOne(row: ProductSource, options: RefreshOptions, log: ILogger): Promise<RowOutcome> {
  const context = { productSourceId: row.id, clubId: row.clubId, url: row.productUrl }

  try {
    const result = await options.adapter.fetchDetail(row.productUrl, options.ctx)

    if (result.status === 'not_found') {
      log.warn('Product page not found, row left for next run', { ...context, reason: result.reason })
      return 'error'
    }

    if (result.status === 'error') {
      log.warn('Refresh fetch failed, row left for next run', {
        ...context,
        reason: result.error.reason,
        statusCode: result.error.statusCode,
        attempts: result.error.attempts,
      })
      return 'error'
    }

    if (result.listing.price === null) {
      log.warn('Product page has no price, row left unchanged', context)
      return 'skipped'
    }

    await options.reconciler.recordObservation({
      clubId: row.clubId,
      sourceName: row.sourceName,
      productUrl: row.productUrl,
      price: result.listing.price,
      inStock: result.listing.inStock,
    })
    log.debug('Refreshed product source', { ...context, price: result.listing.price })
    return 'refreshed'
  } catch (error) {
    log.error('Failed to refresh product source', context, error)
    return 'error'
  }
}

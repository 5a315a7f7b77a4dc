export { runFullCrawl, runRefresh } from './pipeline.js'
export type { FullCrawlOptions, RefreshRunOptions, RunSummary } from './pipeline.js'

export * from './scraper/index.js'

export * from './catalog/types.js'
export type { CatalogStore, UniqueEntity } from './catalog/store.js'
export { UniqueViolationError } from './catalog/store.js'
export { InMemoryCatalogStore } from './catalog/memory-store.js'
export { PgCatalogStore } from './catalog/pg-store.js'
export type { SqlClient } from './catalog/pg-store.js'

export { addCounts, emptyCounts, Reconciler } from './reconcile/reconciler.js'
export type { Observation, ObservationResult, ReconcileCounts, ReconcileOutcome } from './reconcile/reconciler.js'
export {
  CLUB_TYPE_VOCABULARY,
  isTaxonomyPolicy,
  matchBrand,
  normalizeClubType,
  TaxonomyResolver,
  UnknownTaxonomyError,
} from './reconcile/taxonomy.js'
export type { TaxonomyPolicy } from './reconcile/taxonomy.js'

export {
  DEFAULT_REFRESH_BATCH_SIZE,
  DEFAULT_REFRESH_INTERVAL_MS,
  refreshStaleSources,
  selectStaleSources,
} from './refresh/scheduler.js'
export type { RefreshCounts, RefreshOptions } from './refresh/scheduler.js'

export { deriveRunStatus, RunLogger } from './runs/run-logger.js'
export type { RunTally } from './runs/run-logger.js'

export { loadConfig } from './config/harvester-config.js'
export type { HarvesterConfig, RateLimitBackend } from './config/harvester-config.js'

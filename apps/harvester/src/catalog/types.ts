/**
 * Catalog Records
 *
 * The three entities collaborators read (clubs, provenance, runs) plus the
 * brand and club-type lookup tables behind them.
 */

export interface Brand {
  id: number
  name: string
}

export interface ClubType {
  id: number
  name: string
}

/**
 * One distinct product. Identity: (brandId, lower(modelName), yearReleased).
 * Never deleted by the pipeline.
 */
export interface CanonicalClub {
  id: number
  brandId: number
  clubTypeId: number
  modelName: string
  yearReleased: number
  msrp: number | null
  /** Most recent successfully fetched price from any source */
  currentPrice: number | null
  isCurrent: boolean
  createdAt: Date
  updatedAt: Date
}

export interface ClubKey {
  brandId: number
  modelName: string
  yearReleased: number
}

export interface NewClub extends ClubKey {
  clubTypeId: number
  msrp: number | null
  currentPrice: number | null
}

/**
 * Per-retailer observation of a club. At most one per (clubId, sourceName).
 */
export interface ProductSource {
  id: number
  clubId: number
  sourceName: string
  productUrl: string
  price: number | null
  inStock: boolean
  /** Drives staleness; advanced on every successful fetch */
  lastChecked: Date
}

export interface ProductSourceUpsert {
  clubId: number
  sourceName: string
  productUrl: string
  price: number | null
  inStock: boolean
  checkedAt: Date
}

export interface StaleSourceQuery {
  sourceName: string
  /** Rows with lastChecked strictly before this are stale */
  olderThan: Date
  limit: number
}

export type ScrapeType = 'full' | 'update_prices' | `filtered_${string}`

export type ScrapeRunStatus = 'running' | 'success' | 'partial' | 'failed'

export type TerminalRunStatus = Exclude<ScrapeRunStatus, 'running'>

/**
 * Audit record of one pipeline invocation. Written once at start and once at
 * completion; never touched after that.
 */
export interface ScrapeRun {
  id: number
  sourceName: string
  scrapeType: ScrapeType
  status: ScrapeRunStatus
  recordsAdded: number
  recordsUpdated: number
  errorMessage: string | null
  startedAt: Date
  completedAt: Date | null
}

export interface NewScrapeRun {
  sourceName: string
  scrapeType: ScrapeType
  startedAt: Date
}

export interface RunOutcome {
  status: TerminalRunStatus
  recordsAdded: number
  recordsUpdated: number
  errorMessage: string | null
  completedAt: Date
}

/**
 * CatalogStore
 *
 * Persistence contract for the reconciler, refresh scheduler and run logger.
 * Implementations must enforce the catalog's uniqueness rules themselves:
 * - brand and club type names are unique case-insensitively
 * - one club per (brandId, lower(modelName), yearReleased)
 * - one provenance row per (clubId, sourceName)
 */

import type {
  Brand,
  CanonicalClub,
  ClubKey,
  ClubType,
  NewClub,
  NewScrapeRun,
  ProductSource,
  ProductSourceUpsert,
  RunOutcome,
  ScrapeRun,
  StaleSourceQuery,
} from './types.js'

export type UniqueEntity = 'brand' | 'club_type' | 'club'

/**
 * Raised when an insert loses an identity race. The row now exists; callers
 * re-read it and continue as an update.
 */
export class UniqueViolationError extends Error {
  readonly entity: UniqueEntity

  constructor(entity: UniqueEntity, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'UniqueViolationError'
    this.entity = entity
  }
}

export interface CatalogStore {
  listBrands(): Promise<Brand[]>
  /** @throws UniqueViolationError if the name exists (any case) */
  createBrand(name: string): Promise<Brand>

  /** Case-insensitive exact match */
  findClubType(name: string): Promise<ClubType | null>
  /** @throws UniqueViolationError if the name exists (any case) */
  createClubType(name: string): Promise<ClubType>

  findClub(key: ClubKey): Promise<CanonicalClub | null>
  /** @throws UniqueViolationError if the identity key exists */
  insertClub(club: NewClub): Promise<CanonicalClub>

  /**
   * Set currentPrice and bump updatedAt when the price differs from the stored
   * one (or the stored one is null). Returns whether anything changed.
   */
  updateClubPrice(clubId: number, price: number, at: Date): Promise<boolean>

  findProductSource(clubId: number, sourceName: string): Promise<ProductSource | null>

  /**
   * Insert, or overwrite url/price/stock and advance lastChecked in place.
   */
  upsertProductSource(row: ProductSourceUpsert): Promise<{ source: ProductSource; created: boolean }>

  /** Oldest-first, capped at query.limit */
  findStaleProductSources(query: StaleSourceQuery): Promise<ProductSource[]>

  openRun(run: NewScrapeRun): Promise<ScrapeRun>
  finalizeRun(runId: number, outcome: RunOutcome): Promise<ScrapeRun>
}

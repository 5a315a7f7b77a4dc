/**
 * Reconciler
 *
 * Folds RawListings into the canonical catalog:
 * 1. resolve brand
 * 2. resolve club type
 * 3. look up or create the club by (brand, model, year)
 * 4. upsert provenance for (club, source)
 * 5. move the club's current price when the listing price differs
 *
 * Listings are independent: one failing never stops the rest of a batch.
 */

import type { ILogger } from '@fairway/logger'
import type { CatalogStore } from '../catalog/store.js'
import { UniqueViolationError } from '../catalog/store.js'
import type { CanonicalClub, NewClub, ProductSource } from '../catalog/types.js'
import type { RawListing } from '../scraper/types.js'
import { samePrice } from '../scraper/utils/price.js'
import { cleanText } from '../scraper/utils/text.js'
import type { TaxonomyPolicy } from './taxonomy.js'
import { TaxonomyResolver, UnknownTaxonomyError } from './taxonomy.js'

export type ReconcileOutcome = 'added' | 'updated' | 'unchanged' | 'skipped'

export interface ReconcileCounts {
  added: number
  updated: number
  unchanged: number
  skipped: number
  errors: number
}

export function emptyCounts(): ReconcileCounts {
  return { added: 0, updated: 0, unchanged: 0, skipped: 0, errors: 0 }
}

export function addCounts(into: ReconcileCounts, from: ReconcileCounts): ReconcileCounts {
  into.added += from.added
  into.updated += from.updated
  into.unchanged += from.unchanged
  into.skipped += from.skipped
  into.errors += from.errors
  return into
}

/**
 * Fields from one fetch of a product that steps 4-5 write.
 */
export interface Observation {
  clubId: number
  sourceName: string
  productUrl: string
  price: number | null
  inStock: boolean
}

export interface ObservationResult {
  source: ProductSource
  /** Provenance row was inserted, or its url/price/stock changed */
  provenanceChanged: boolean
  /** Club current price moved */
  priceChanged: boolean
}

export interface ReconcilerOptions {
  store: CatalogStore
  logger: ILogger

  /** Handling of unseen brands and club types (default: 'create') */
  policy?: TaxonomyPolicy

  /** Clock; also the source of the default release year */
  now?: () => Date
}

export class Reconciler {
  private readonly store: CatalogStore
  private readonly logger: ILogger
  private readonly taxonomy: TaxonomyResolver
  private readonly now: () => Date

  constructor(options: ReconcilerOptions) {
    this.store = options.store
    this.logger = options.logger
    this.now = options.now ?? (() => new Date())
    this.taxonomy = new TaxonomyResolver({
      store: options.store,
      policy: options.policy ?? 'create',
      logger: options.logger,
    })
  }

  /**
   * Reconcile a batch. Per-listing failures are logged and counted.
   */
  async reconcileBatch(listings: readonly RawListing[]): Promise<ReconcileCounts> {
    const counts = emptyCounts()

    for (const listing of listings) {
      try {
        const outcome = await this.reconcile(listing)
        counts[outcome] += 1
      } catch (error) {
        if (error instanceof UnknownTaxonomyError) {
          counts.skipped += 1
          continue
        }
        counts.errors += 1
        this.logger.error(
          'Failed to reconcile listing',
          { source: listing.source, brand: listing.brandText, model: listing.modelText, url: listing.detailUrl },
          error
        )
      }
    }

    return counts
  }

  /**
   * Reconcile one listing.
   * @throws UnknownTaxonomyError under the 'reject' policy
   */
  async reconcile(listing: RawListing): Promise<ReconcileOutcome> {
    const modelName = cleanText(listing.modelText)
    if (!modelName || !cleanText(listing.brandText)) {
      this.logger.warn('Listing without brand or model skipped', { url: listing.detailUrl })
      return 'skipped'
    }

    const brand = await this.taxonomy.resolveBrand(listing.brandText)
    const clubType = await this.taxonomy.resolveClubType(listing.clubType)

    // No year signal from the source: assume the current calendar year
    const yearReleased = listing.yearReleased ?? this.now().getFullYear()
    const key = { brandId: brand.id, modelName, yearReleased }

    let club = await this.store.findClub(key)
    let created = false
    if (!club) {
      const inserted = await this.insertOrReread({
        ...key,
        clubTypeId: clubType.id,
        msrp: null,
        currentPrice: listing.price,
      })
      club = inserted.club
      created = inserted.created
    }

    const observed = await this.recordObservation({
      clubId: club.id,
      sourceName: listing.source,
      productUrl: listing.detailUrl,
      price: listing.price,
      inStock: listing.inStock,
    })

    if (created) {
      this.logger.debug('Added club', { clubId: club.id, brand: brand.name, model: modelName, yearReleased })
      return 'added'
    }
    return observed.provenanceChanged || observed.priceChanged ? 'updated' : 'unchanged'
  }

  /**
   * Steps 4-5: upsert provenance and move the club's current price.
   * Shared with refresh runs, which never create clubs.
   */
  async recordObservation(observation: Observation): Promise<ObservationResult> {
    const at = this.now()
    const previous = await this.store.findProductSource(observation.clubId, observation.sourceName)

    const { source } = await this.store.upsertProductSource({ ...observation, checkedAt: at })

    const provenanceChanged =
      !previous ||
      previous.productUrl !== observation.productUrl ||
      previous.inStock !== observation.inStock ||
      !samePrice(previous.price, observation.price)

    const priceChanged =
      observation.price !== null && (await this.store.updateClubPrice(observation.clubId, observation.price, at))

    if (priceChanged) {
      this.logger.debug('Current price updated', { clubId: observation.clubId, price: observation.price })
    }

    return { source, provenanceChanged, priceChanged }
  }

  /**
   * Insert a club; if a concurrent writer got there first, read theirs.
   */
  private async insertOrReread(club: NewClub): Promise<{ club: CanonicalClub; created: boolean }> {
    try {
      return { club: await this.store.insertClub(club), created: true }
    } catch (error) {
      if (!(error instanceof UniqueViolationError)) throw error

      const existing = await this.store.findClub(club)
      if (!existing) throw error
      this.logger.debug('Club created concurrently, continuing as update', { clubId: existing.id })
      return { club: existing, created: false }
    }
  }
}

/**
 * Brand and club-type resolution.
 *
 * Brands match known rows case-insensitively, exact first, then partial.
 * Club types map through a fixed vocabulary. Anything still unknown is created
 * on first sighting under the 'create' policy, or rejected for review under
 * 'reject'.
 */

import type { ILogger } from '@fairway/logger'
import type { CatalogStore } from '../catalog/store.js'
import { UniqueViolationError } from '../catalog/store.js'
import type { Brand, ClubType } from '../catalog/types.js'
import { cleanText } from '../scraper/utils/text.js'

export type TaxonomyPolicy = 'create' | 'reject'

export const TAXONOMY_POLICIES: readonly TaxonomyPolicy[] = ['create', 'reject']

export function isTaxonomyPolicy(value: unknown): value is TaxonomyPolicy {
  return value === 'create' || value === 'reject'
}

export class UnknownTaxonomyError extends Error {
  readonly kind: 'brand' | 'club_type'
  readonly value: string

  constructor(kind: 'brand' | 'club_type', value: string) {
    super(`Unknown ${kind === 'brand' ? 'brand' : 'club type'} '${value}'`)
    this.name = 'UnknownTaxonomyError'
    this.kind = kind
    this.value = value
  }
}

/**
 * Controlled club-type vocabulary: category slugs and common spellings,
 * lowercased, to the canonical type name.
 */
export const CLUB_TYPE_VOCABULARY: Readonly<Record<string, string>> = {
  drivers: 'Driver',
  driver: 'Driver',
  'fairway-woods': 'Fairway Wood',
  'fairway woods': 'Fairway Wood',
  'fairway wood': 'Fairway Wood',
  hybrids: 'Hybrid',
  hybrid: 'Hybrid',
  irons: 'Iron',
  iron: 'Iron',
  'iron set': 'Iron',
  wedges: 'Wedge',
  wedge: 'Wedge',
  putters: 'Putter',
  putter: 'Putter',
}

function titleCase(text: string): string {
  return text
    .split(' ')
    .map(word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ')
}

/**
 * Canonical name for a club-type text. Unknown text is title-cased with
 * hyphens read as spaces ("travel-putters" → "Travel Putters").
 */
export function normalizeClubType(text: string): { name: string; known: boolean } {
  const cleaned = cleanText(text.replace(/[-_]+/g, ' '))
  const known = CLUB_TYPE_VOCABULARY[text.trim().toLowerCase()] ?? CLUB_TYPE_VOCABULARY[cleaned.toLowerCase()]
  if (known) {
    return { name: known, known: true }
  }
  return { name: titleCase(cleaned), known: false }
}

/**
 * Match brand text against known brands: exact (case-insensitive) first,
 * then the longest known name contained in the text or containing it.
 */
export function matchBrand(text: string, brands: readonly Brand[]): Brand | null {
  const needle = cleanText(text).toLowerCase()
  if (!needle) return null

  const exact = brands.find(brand => brand.name.toLowerCase() === needle)
  if (exact) return exact

  let best: Brand | null = null
  for (const brand of brands) {
    const name = brand.name.toLowerCase()
    if (!name) continue
    if (needle.includes(name) || name.includes(needle)) {
      if (!best || brand.name.length > best.name.length) {
        best = brand
      }
    }
  }
  return best
}

export interface TaxonomyResolverOptions {
  store: CatalogStore
  policy: TaxonomyPolicy
  logger: ILogger
}

/**
 * Resolves listing text to brand and club-type rows for one run.
 * Known brands are read once and cached; created rows join the cache.
 */
export class TaxonomyResolver {
  private readonly store: CatalogStore
  private readonly policy: TaxonomyPolicy
  private readonly logger: ILogger
  private brands: Brand[] | null = null
  private readonly clubTypes = new Map<string, ClubType>()

  constructor(options: TaxonomyResolverOptions) {
    this.store = options.store
    this.policy = options.policy
    this.logger = options.logger
  }

  async resolveBrand(text: string): Promise<Brand> {
    const name = cleanText(text)
    const known = matchBrand(name, await this.knownBrands())
    if (known) return known

    if (this.policy === 'reject') {
      this.logger.warn('Unknown brand held for review', { brand: name })
      throw new UnknownTaxonomyError('brand', name)
    }

    try {
      const created = await this.store.createBrand(name)
      this.logger.info('Created brand on first sighting', { brand: created.name, brandId: created.id })
      this.brands = [...(this.brands ?? []), created]
      return created
    } catch (error) {
      if (!(error instanceof UniqueViolationError)) throw error
      // Another writer created it; reload and match again
      this.brands = await this.store.listBrands()
      const existing = matchBrand(name, this.brands)
      if (!existing) throw error
      return existing
    }
  }

  async resolveClubType(text: string): Promise<ClubType> {
    const { name, known } = normalizeClubType(text)
    const cacheKey = name.toLowerCase()
    const cached = this.clubTypes.get(cacheKey)
    if (cached) return cached

    const existing = await this.store.findClubType(name)
    if (existing) {
      this.clubTypes.set(cacheKey, existing)
      return existing
    }

    if (!known && this.policy === 'reject') {
      this.logger.warn('Unknown club type held for review', { clubType: name, raw: text })
      throw new UnknownTaxonomyError('club_type', name)
    }

    try {
      const created = await this.store.createClubType(name)
      this.logger.info('Created club type', { clubType: created.name, clubTypeId: created.id })
      this.clubTypes.set(cacheKey, created)
      return created
    } catch (error) {
      if (!(error instanceof UniqueViolationError)) throw error
      const raced = await this.store.findClubType(name)
      if (!raced) throw error
      this.clubTypes.set(cacheKey, raced)
      return raced
    }
  }

  private async knownBrands(): Promise<Brand[]> {
    if (!this.brands) {
      this.brands = await this.store.listBrands()
    }
    return this.brands
  }
}

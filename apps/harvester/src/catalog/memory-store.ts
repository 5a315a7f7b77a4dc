/**
 * In-memory CatalogStore
 *
 * Same contract and uniqueness rules as the PostgreSQL store. Backs --dry-run
 * and tests. Every method completes its check-and-write without an await in
 * between, so concurrent callers see the same races a database would resolve.
 */

import type { CatalogStore } from './store.js'
import { UniqueViolationError } from './store.js'
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
import { samePrice } from '../scraper/utils/price.js'

function clubKeyOf(key: ClubKey): string {
  return `${key.brandId}|${key.modelName.toLowerCase()}|${key.yearReleased}`
}

function sourceKeyOf(clubId: number, sourceName: string): string {
  return `${clubId}|${sourceName}`
}

export class InMemoryCatalogStore implements CatalogStore {
  private readonly brands: Brand[] = []
  private readonly clubTypes: ClubType[] = []
  private readonly clubs = new Map<string, CanonicalClub>()
  private readonly sources = new Map<string, ProductSource>()
  private readonly runs = new Map<number, ScrapeRun>()
  private nextId = 1

  private id(): number {
    return this.nextId++
  }

  async listBrands(): Promise<Brand[]> {
    return this.brands.map(brand => ({ ...brand }))
  }

  async createBrand(name: string): Promise<Brand> {
    if (this.brands.some(brand => brand.name.toLowerCase() === name.toLowerCase())) {
      throw new UniqueViolationError('brand', `Brand '${name}' already exists`)
    }
    const brand = { id: this.id(), name }
    this.brands.push(brand)
    return { ...brand }
  }

  async findClubType(name: string): Promise<ClubType | null> {
    const found = this.clubTypes.find(type => type.name.toLowerCase() === name.toLowerCase())
    return found ? { ...found } : null
  }

  async createClubType(name: string): Promise<ClubType> {
    if (this.clubTypes.some(type => type.name.toLowerCase() === name.toLowerCase())) {
      throw new UniqueViolationError('club_type', `Club type '${name}' already exists`)
    }
    const clubType = { id: this.id(), name }
    this.clubTypes.push(clubType)
    return { ...clubType }
  }

  async findClub(key: ClubKey): Promise<CanonicalClub | null> {
    const club = this.clubs.get(clubKeyOf(key))
    return club ? { ...club } : null
  }

  async insertClub(club: NewClub): Promise<CanonicalClub> {
    const key = clubKeyOf(club)
    if (this.clubs.has(key)) {
      throw new UniqueViolationError(
        'club',
        `Club '${club.modelName}' (${club.yearReleased}) already exists for brand ${club.brandId}`
      )
    }
    const now = new Date()
    const created: CanonicalClub = {
      id: this.id(),
      brandId: club.brandId,
      clubTypeId: club.clubTypeId,
      modelName: club.modelName,
      yearReleased: club.yearReleased,
      msrp: club.msrp,
      currentPrice: club.currentPrice,
      isCurrent: true,
      createdAt: now,
      updatedAt: now,
    }
    this.clubs.set(key, created)
    return { ...created }
  }

  async updateClubPrice(clubId: number, price: number, at: Date): Promise<boolean> {
    for (const club of this.clubs.values()) {
      if (club.id !== clubId) continue
      if (samePrice(club.currentPrice, price)) return false
      club.currentPrice = price
      club.updatedAt = at
      return true
    }
    return false
  }

  async findProductSource(clubId: number, sourceName: string): Promise<ProductSource | null> {
    const source = this.sources.get(sourceKeyOf(clubId, sourceName))
    return source ? { ...source } : null
  }

  async upsertProductSource(row: ProductSourceUpsert): Promise<{ source: ProductSource; created: boolean }> {
    const key = sourceKeyOf(row.clubId, row.sourceName)
    const existing = this.sources.get(key)

    if (existing) {
      existing.productUrl = row.productUrl
      existing.price = row.price
      existing.inStock = row.inStock
      existing.lastChecked = row.checkedAt
      return { source: { ...existing }, created: false }
    }

    const source: ProductSource = {
      id: this.id(),
      clubId: row.clubId,
      sourceName: row.sourceName,
      productUrl: row.productUrl,
      price: row.price,
      inStock: row.inStock,
      lastChecked: row.checkedAt,
    }
    this.sources.set(key, source)
    return { source: { ...source }, created: true }
  }

  async findStaleProductSources(query: StaleSourceQuery): Promise<ProductSource[]> {
    return Array.from(this.sources.values())
      .filter(source => source.sourceName === query.sourceName)
      .filter(source => source.lastChecked.getTime() < query.olderThan.getTime())
      .sort((a, b) => a.lastChecked.getTime() - b.lastChecked.getTime() || a.id - b.id)
      .slice(0, Math.max(0, query.limit))
      .map(source => ({ ...source }))
  }

  async openRun(run: NewScrapeRun): Promise<ScrapeRun> {
    const opened: ScrapeRun = {
      id: this.id(),
      sourceName: run.sourceName,
      scrapeType: run.scrapeType,
      status: 'running',
      recordsAdded: 0,
      recordsUpdated: 0,
      errorMessage: null,
      startedAt: run.startedAt,
      completedAt: null,
    }
    this.runs.set(opened.id, opened)
    return { ...opened }
  }

  async finalizeRun(runId: number, outcome: RunOutcome): Promise<ScrapeRun> {
    const run = this.runs.get(runId)
    if (!run) {
      throw new Error(`Scrape run ${runId} not found`)
    }
    if (run.status !== 'running') {
      throw new Error(`Scrape run ${runId} is already finalized`)
    }
    const finalized: ScrapeRun = { ...run, ...outcome }
    this.runs.set(runId, finalized)
    return { ...finalized }
  }

  // ─── Inspection (dry-run summaries and tests) ──────────────────────────────

  listClubs(): CanonicalClub[] {
    return Array.from(this.clubs.values()).map(club => ({ ...club }))
  }

  listProductSources(): ProductSource[] {
    return Array.from(this.sources.values()).map(source => ({ ...source }))
  }

  listRuns(): ScrapeRun[] {
    return Array.from(this.runs.values()).map(run => ({ ...run }))
  }

  listClubTypes(): ClubType[] {
    return this.clubTypes.map(type => ({ ...type }))
  }
}

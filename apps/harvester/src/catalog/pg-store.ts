/**
 * PostgreSQL CatalogStore
 *
 * Plain SQL over a pg Pool. Uniqueness is enforced by the schema
 * (packages/db/sql/schema.sql); SQLSTATE 23505 surfaces as UniqueViolationError.
 */

import { isUniqueViolation } from '@fairway/db'
import type { CatalogStore, UniqueEntity } from './store.js'
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
  ScrapeRunStatus,
  ScrapeType,
  StaleSourceQuery,
} from './types.js'

/**
 * The part of pg.Pool the store uses. A Pool or PoolClient satisfies it.
 */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>
}

const CLUB_COLUMNS = `id, brand_id, club_type_id, model_name, year_released, msrp,
  current_price, is_current, created_at, updated_at`

const SOURCE_COLUMNS = `id, golf_club_id, source_name, product_url, price, in_stock, last_checked`

const RUN_COLUMNS = `id, source_name, scrape_type, status, records_added, records_updated,
  error_message, started_at, completed_at`

export class PgCatalogStore implements CatalogStore {
  constructor(private readonly db: SqlClient) {}

  async listBrands(): Promise<Brand[]> {
    const { rows } = await this.db.query('SELECT id, name FROM brands ORDER BY id')
    return rows.map(toNamed)
  }

  async createBrand(name: string): Promise<Brand> {
    const rows = await this.insert('brand', 'INSERT INTO brands (name) VALUES ($1) RETURNING id, name', [name])
    return toNamed(first(rows, 'brands'))
  }

  async findClubType(name: string): Promise<ClubType | null> {
    const { rows } = await this.db.query(
      'SELECT id, name FROM club_types WHERE lower(name) = lower($1) LIMIT 1',
      [name]
    )
    return rows.length > 0 ? toNamed(rows[0]) : null
  }

  async createClubType(name: string): Promise<ClubType> {
    const rows = await this.insert(
      'club_type',
      'INSERT INTO club_types (name) VALUES ($1) RETURNING id, name',
      [name]
    )
    return toNamed(first(rows, 'club_types'))
  }

  async findClub(key: ClubKey): Promise<CanonicalClub | null> {
    const { rows } = await this.db.query(
      `SELECT ${CLUB_COLUMNS} FROM golf_clubs
        WHERE brand_id = $1 AND lower(model_name) = lower($2) AND year_released = $3`,
      [key.brandId, key.modelName, key.yearReleased]
    )
    return rows.length > 0 ? toClub(rows[0]) : null
  }

  async insertClub(club: NewClub): Promise<CanonicalClub> {
    const rows = await this.insert(
      'club',
      `INSERT INTO golf_clubs (brand_id, club_type_id, model_name, year_released, msrp, current_price)
       VALUES ($1, $2, $3, $4, $5, $6)
       RETURNING ${CLUB_COLUMNS}`,
      [club.brandId, club.clubTypeId, club.modelName, club.yearReleased, club.msrp, club.currentPrice]
    )
    return toClub(first(rows, 'golf_clubs'))
  }

  async updateClubPrice(clubId: number, price: number, at: Date): Promise<boolean> {
    const { rows } = await this.db.query(
      `UPDATE golf_clubs SET current_price = $2, updated_at = $3
        WHERE id = $1 AND current_price IS DISTINCT FROM $2::numeric
        RETURNING id`,
      [clubId, price, at]
    )
    return rows.length > 0
  }

  async findProductSource(clubId: number, sourceName: string): Promise<ProductSource | null> {
    const { rows } = await this.db.query(
      `SELECT ${SOURCE_COLUMNS} FROM product_sources WHERE golf_club_id = $1 AND source_name = $2`,
      [clubId, sourceName]
    )
    return rows.length > 0 ? toProductSource(rows[0]) : null
  }

  async upsertProductSource(row: ProductSourceUpsert): Promise<{ source: ProductSource; created: boolean }> {
    const { rows } = await this.db.query(
      `INSERT INTO product_sources (golf_club_id, source_name, product_url, price, in_stock, last_checked)
       VALUES ($1, $2, $3, $4, $5, $6)
       ON CONFLICT (golf_club_id, source_name) DO UPDATE SET
         product_url = EXCLUDED.product_url,
         price = EXCLUDED.price,
         in_stock = EXCLUDED.in_stock,
         last_checked = EXCLUDED.last_checked
       RETURNING ${SOURCE_COLUMNS}, (xmax = 0) AS inserted`,
      [row.clubId, row.sourceName, row.productUrl, row.price, row.inStock, row.checkedAt]
    )
    const result = first(rows, 'product_sources')
    return { source: toProductSource(result), created: bool(result, 'inserted') }
  }

  async findStaleProductSources(query: StaleSourceQuery): Promise<ProductSource[]> {
    const { rows } = await this.db.query(
      `SELECT ${SOURCE_COLUMNS} FROM product_sources
        WHERE source_name = $1 AND last_checked < $2
        ORDER BY last_checked ASC, id ASC
        LIMIT $3`,
      [query.sourceName, query.olderThan, query.limit]
    )
    return rows.map(toProductSource)
  }

  async openRun(run: NewScrapeRun): Promise<ScrapeRun> {
    const { rows } = await this.db.query(
      `INSERT INTO scraping_logs (source_name, scrape_type, status, records_added, records_updated, started_at)
       VALUES ($1, $2, 'running', 0, 0, $3)
       RETURNING ${RUN_COLUMNS}`,
      [run.sourceName, run.scrapeType, run.startedAt]
    )
    return toRun(first(rows, 'scraping_logs'))
  }

  async finalizeRun(runId: number, outcome: RunOutcome): Promise<ScrapeRun> {
    const { rows } = await this.db.query(
      `UPDATE scraping_logs
          SET status = $2, records_added = $3, records_updated = $4, error_message = $5, completed_at = $6
        WHERE id = $1 AND status = 'running'
        RETURNING ${RUN_COLUMNS}`,
      [
        runId,
        outcome.status,
        outcome.recordsAdded,
        outcome.recordsUpdated,
        outcome.errorMessage,
        outcome.completedAt,
      ]
    )
    if (rows.length === 0) {
      throw new Error(`Scrape run ${runId} not found or already finalized`)
    }
    return toRun(rows[0])
  }

  private async insert(entity: UniqueEntity, sql: string, values: unknown[]): Promise<unknown[]> {
    try {
      const { rows } = await this.db.query(sql, values)
      return rows
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new UniqueViolationError(entity, `Duplicate ${entity}: ${String(values[0])}`, {
          cause: error,
        })
      }
      throw error
    }
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Row Mapping
// ═══════════════════════════════════════════════════════════════════════════════

function first(rows: unknown[], table: string): unknown {
  if (rows.length === 0) {
    throw new Error(`Expected a row from ${table}`)
  }
  return rows[0]
}

function column(row: unknown, name: string): unknown {
  if (typeof row !== 'object' || row === null || !(name in row)) {
    throw new Error(`Missing column '${name}'`)
  }
  return Reflect.get(row, name)
}

function int(row: unknown, name: string): number {
  const value = Number(column(row, name))
  if (!Number.isInteger(value)) {
    throw new Error(`Column '${name}' is not an integer`)
  }
  return value
}

/** numeric columns arrive as strings */
function numericOrNull(row: unknown, name: string): number | null {
  const value = column(row, name)
  if (value === null) return null
  const parsed = Number(value)
  if (!Number.isFinite(parsed)) {
    throw new Error(`Column '${name}' is not numeric`)
  }
  return parsed
}

function text(row: unknown, name: string): string {
  const value = column(row, name)
  if (typeof value !== 'string') {
    throw new Error(`Column '${name}' is not text`)
  }
  return value
}

function textOrNull(row: unknown, name: string): string | null {
  const value = column(row, name)
  return value === null ? null : text(row, name)
}

function bool(row: unknown, name: string): boolean {
  const value = column(row, name)
  if (typeof value !== 'boolean') {
    throw new Error(`Column '${name}' is not boolean`)
  }
  return value
}

function timestamp(row: unknown, name: string): Date {
  const value = column(row, name)
  const date = value instanceof Date ? value : new Date(String(value))
  if (Number.isNaN(date.getTime())) {
    throw new Error(`Column '${name}' is not a timestamp`)
  }
  return date
}

function timestampOrNull(row: unknown, name: string): Date | null {
  return column(row, name) === null ? null : timestamp(row, name)
}

function toNamed(row: unknown): { id: number; name: string } {
  return { id: int(row, 'id'), name: text(row, 'name') }
}

function toClub(row: unknown): CanonicalClub {
  return {
    id: int(row, 'id'),
    brandId: int(row, 'brand_id'),
    clubTypeId: int(row, 'club_type_id'),
    modelName: text(row, 'model_name'),
    yearReleased: int(row, 'year_released'),
    msrp: numericOrNull(row, 'msrp'),
    currentPrice: numericOrNull(row, 'current_price'),
    isCurrent: bool(row, 'is_current'),
    createdAt: timestamp(row, 'created_at'),
    updatedAt: timestamp(row, 'updated_at'),
  }
}

function toProductSource(row: unknown): ProductSource {
  return {
    id: int(row, 'id'),
    clubId: int(row, 'golf_club_id'),
    sourceName: text(row, 'source_name'),
    productUrl: text(row, 'product_url'),
    price: numericOrNull(row, 'price'),
    inStock: bool(row, 'in_stock'),
    lastChecked: timestamp(row, 'last_checked'),
  }
}

function toScrapeType(value: string): ScrapeType {
  if (value === 'full' || value === 'update_prices') return value
  if (value.startsWith('filtered_')) return `filtered_${value.slice('filtered_'.length)}`
  throw new Error(`Unknown scrape type '${value}'`)
}

function toRunStatus(value: string): ScrapeRunStatus {
  switch (value) {
    case 'running':
    case 'success':
    case 'partial':
    case 'failed':
      return value
    default:
      throw new Error(`Unknown run status '${value}'`)
  }
}

function toRun(row: unknown): ScrapeRun {
  return {
    id: int(row, 'id'),
    sourceName: text(row, 'source_name'),
    scrapeType: toScrapeType(text(row, 'scrape_type')),
    status: toRunStatus(text(row, 'status')),
    recordsAdded: int(row, 'records_added'),
    recordsUpdated: int(row, 'records_updated'),
    errorMessage: textOrNull(row, 'error_message'),
    startedAt: timestamp(row, 'started_at'),
    completedAt: timestampOrNull(row, 'completed_at'),
  }
}

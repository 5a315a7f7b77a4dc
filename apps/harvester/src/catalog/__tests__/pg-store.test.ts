import { describe, it, expect, vi } from 'vitest'
import { PgCatalogStore } from '../pg-store.js'
import type { SqlClient } from '../pg-store.js'
import { UniqueViolationError } from '../store.js'

function fakeDb(...results: Array<unknown[] | Error>) {
  const query = vi.fn(async (_text: string, _values?: unknown[]) => {
    const next = results.shift()
    if (next instanceof Error) throw next
    return { rows: next ?? [] }
  })
  const db: SqlClient = { query }
  return { db, query }
}

const sourceRow = {
  id: 7,
  golf_club_id: 3,
  source_name: 'Global Golf',
  product_url: 'https://www.globalgolf.com/golf-clubs/drivers/titleist-tsr3-driver',
  price: '549.99',
  in_stock: true,
  last_checked: new Date('2026-03-01T12:00:00Z'),
}

describe('PgCatalogStore', () => {
  it('maps unique violations on insert to UniqueViolationError', async () => {
    const pgError = Object.assign(new Error('duplicate key value violates unique constraint'), {
      code: '23505',
    })
    const { db } = fakeDb(pgError)
    const store = new PgCatalogStore(db)

    const attempt = store.createBrand('Titleist')

    await expect(attempt).rejects.toBeInstanceOf(UniqueViolationError)
    await expect(attempt).rejects.toMatchObject({ entity: 'brand', message: 'Duplicate brand: Titleist' })
  })

  it('rethrows other database errors unchanged', async () => {
    const failure = new Error('connection terminated')
    const { db } = fakeDb(failure)
    const store = new PgCatalogStore(db)

    await expect(store.createClubType('Driver')).rejects.toBe(failure)
  })

  it('parses numeric columns and reports whether the upsert inserted', async () => {
    const { db, query } = fakeDb([{ ...sourceRow, inserted: false }])
    const store = new PgCatalogStore(db)
    const checkedAt = new Date('2026-03-01T12:00:00Z')

    const result = await store.upsertProductSource({
      clubId: 3,
      sourceName: 'Global Golf',
      productUrl: sourceRow.product_url,
      price: 549.99,
      inStock: true,
      checkedAt,
    })

    expect(result).toEqual({
      created: false,
      source: {
        id: 7,
        clubId: 3,
        sourceName: 'Global Golf',
        productUrl: sourceRow.product_url,
        price: 549.99,
        inStock: true,
        lastChecked: checkedAt,
      },
    })
    expect(query.mock.calls[0]?.[0]).toContain('ON CONFLICT (golf_club_id, source_name) DO UPDATE')
    expect(query.mock.calls[0]?.[1]).toEqual([3, 'Global Golf', sourceRow.product_url, 549.99, true, checkedAt])
  })

  it('selects stale rows oldest-first with the batch cap', async () => {
    const { db, query } = fakeDb([sourceRow])
    const store = new PgCatalogStore(db)
    const olderThan = new Date('2026-03-02T00:00:00Z')

    const rows = await store.findStaleProductSources({ sourceName: 'Global Golf', olderThan, limit: 100 })

    expect(rows).toHaveLength(1)
    expect(rows[0]?.price).toBe(549.99)
    expect(query.mock.calls[0]?.[0]).toContain('ORDER BY last_checked ASC')
    expect(query.mock.calls[0]?.[1]).toEqual(['Global Golf', olderThan, 100])
  })

  it('reports whether a price update changed anything', async () => {
    const { db } = fakeDb([{ id: 3 }], [])
    const store = new PgCatalogStore(db)
    const at = new Date('2026-03-01T12:00:00Z')

    expect(await store.updateClubPrice(3, 549.99, at)).toBe(true)
    expect(await store.updateClubPrice(3, 549.99, at)).toBe(false)
  })

  it('refuses to finalize a run twice', async () => {
    const { db } = fakeDb([])
    const store = new PgCatalogStore(db)

    await expect(
      store.finalizeRun(12, {
        status: 'success',
        recordsAdded: 1,
        recordsUpdated: 0,
        errorMessage: null,
        completedAt: new Date('2026-03-01T12:00:00Z'),
      })
    ).rejects.toThrow('Scrape run 12 not found or already finalized')
  })

  it('maps run rows including filtered scrape types', async () => {
    const startedAt = new Date('2026-03-01T12:00:00Z')
    const { db } = fakeDb([
      {
        id: 12,
        source_name: 'Global Golf',
        scrape_type: 'filtered_drivers',
        status: 'running',
        records_added: 0,
        records_updated: 0,
        error_message: null,
        started_at: startedAt,
        completed_at: null,
      },
    ])
    const store = new PgCatalogStore(db)

    const run = await store.openRun({ sourceName: 'Global Golf', scrapeType: 'filtered_drivers', startedAt })

    expect(run).toEqual({
      id: 12,
      sourceName: 'Global Golf',
      scrapeType: 'filtered_drivers',
      status: 'running',
      recordsAdded: 0,
      recordsUpdated: 0,
      errorMessage: null,
      startedAt,
      completedAt: null,
    })
  })
})

import { describe, it, expect } from 'vitest'
import { createNoopLogger } from '@fairway/logger'
import { InMemoryCatalogStore } from '../../catalog/memory-store.js'
import { Reconciler } from '../../reconcile/reconciler.js'
import type { DetailResult, RawListing } from '../../scraper/types.js'
import { refreshStaleSources } from '../scheduler.js'
import type { RefreshOptions } from '../scheduler.js'
import { detailOk, fakeAdapter, fetchFailure, rawListing, unusedFetcher } from '../../__tests__/fakes.js'
import type { FakeAdapter } from '../../__tests__/fakes.js'

const NOW = new Date('2026-03-01T12:00:00Z')
const HOUR = 60 * 60 * 1000

function hoursAgo(hours: number): Date {
  return new Date(NOW.getTime() - hours * HOUR)
}

async function seed(store: InMemoryCatalogStore, listing: RawListing, checkedAt: Date): Promise<void> {
  await new Reconciler({ store, logger: createNoopLogger(), now: () => checkedAt }).reconcile(listing)
}

function refresh(
  store: InMemoryCatalogStore,
  adapter: FakeAdapter,
  overrides: Partial<RefreshOptions> = {}
) {
  return refreshStaleSources({
    adapter,
    store,
    reconciler: new Reconciler({ store, logger: createNoopLogger(), now: () => NOW }),
    ctx: { fetcher: unusedFetcher, logger: createNoopLogger() },
    maxBatch: 100,
    refreshIntervalMs: 24 * HOUR,
    now: () => NOW,
    ...overrides,
  })
}

const tsr3 = rawListing()
const g430 = rawListing({ brandText: 'Ping', modelText: 'G430 Max Driver', detailUrl: 'https://acme.example/g430' })

describe('refreshStaleSources', () => {
  it('refreshes rows older than the interval and leaves recent ones alone', async () => {
    const store = new InMemoryCatalogStore()
    await seed(store, tsr3, hoursAgo(48))
    await seed(store, g430, hoursAgo(1))
    const adapter = fakeAdapter({
      categories: {},
      details: { [tsr3.detailUrl]: detailOk({ ...tsr3, price: 549.99 }) },
    })

    const counts = await refresh(store, adapter)

    expect(counts).toEqual({ selected: 1, refreshed: 1, skipped: 0, errors: 0 })
    expect(adapter.detailRequests).toEqual([tsr3.detailUrl])
    const row = store.listProductSources().find(source => source.productUrl === tsr3.detailUrl)
    expect(row).toMatchObject({ price: 549.99, lastChecked: NOW })
    expect(store.listClubs().find(club => club.modelName === 'TSR3 Driver')?.currentPrice).toBe(549.99)
  })

  it('takes the oldest rows first, up to the batch size', async () => {
    const store = new InMemoryCatalogStore()
    await seed(store, rawListing({ modelText: 'A', detailUrl: 'https://acme.example/a' }), hoursAgo(72))
    await seed(store, rawListing({ modelText: 'B', detailUrl: 'https://acme.example/b' }), hoursAgo(96))
    await seed(store, rawListing({ modelText: 'C', detailUrl: 'https://acme.example/c' }), hoursAgo(48))
    const adapter = fakeAdapter({ categories: {} })

    const counts = await refresh(store, adapter, { maxBatch: 2 })

    expect(counts.selected).toBe(2)
    expect(adapter.detailRequests).toEqual(['https://acme.example/b', 'https://acme.example/a'])
  })

  it('leaves a row untouched when its fetch fails', async () => {
    const store = new InMemoryCatalogStore()
    await seed(store, tsr3, hoursAgo(30))
    const before = store.listProductSources()
    const adapter = fakeAdapter({
      categories: {},
      details: { [tsr3.detailUrl]: { status: 'error', error: fetchFailure(503) } },
    })

    const counts = await refresh(store, adapter)

    expect(counts).toEqual({ selected: 1, refreshed: 0, skipped: 0, errors: 1 })
    expect(store.listProductSources()).toEqual(before)
  })

  it('counts a missing product page as an error and keeps the row eligible', async () => {
    const store = new InMemoryCatalogStore()
    await seed(store, tsr3, hoursAgo(30))

    await refresh(store, fakeAdapter({ categories: {} }))
    const again = await refresh(store, fakeAdapter({ categories: {} }))

    expect(again).toEqual({ selected: 1, refreshed: 0, skipped: 0, errors: 1 })
  })

  it('skips product pages without a price', async () => {
    const store = new InMemoryCatalogStore()
    await seed(store, tsr3, hoursAgo(30))
    const adapter = fakeAdapter({
      categories: {},
      details: { [tsr3.detailUrl]: detailOk({ ...tsr3, price: null }) },
    })

    const counts = await refresh(store, adapter)

    expect(counts).toEqual({ selected: 1, refreshed: 0, skipped: 1, errors: 0 })
    expect(store.listProductSources()[0]?.lastChecked).toEqual(hoursAgo(30))
  })

  it('never creates clubs, whatever the product page says', async () => {
    const store = new InMemoryCatalogStore()
    await seed(store, tsr3, hoursAgo(30))
    const renamed = { ...tsr3, brandText: 'Callaway', modelText: 'Elyte Driver', price: 499.99 }
    const adapter = fakeAdapter({ categories: {}, details: { [tsr3.detailUrl]: detailOk(renamed) } })

    await refresh(store, adapter)

    const clubs = store.listClubs()
    expect(clubs).toHaveLength(1)
    expect(clubs[0]).toMatchObject({ modelName: 'TSR3 Driver', currentPrice: 499.99 })
    expect(await store.listBrands()).toHaveLength(1)
  })

  it('bounds parallel detail fetches by the concurrency setting', async () => {
    const store = new InMemoryCatalogStore()
    for (let i = 0; i < 5; i++) {
      const listing = rawListing({ modelText: `Model ${i}`, detailUrl: `https://acme.example/${i}` })
      await seed(store, listing, hoursAgo(30 + i))
    }
    let inFlight = 0
    let maxInFlight = 0
    const base = fakeAdapter({ categories: {} })
    const adapter: FakeAdapter = {
      ...base,
      async fetchDetail(url: string): Promise<DetailResult> {
        inFlight += 1
        maxInFlight = Math.max(maxInFlight, inFlight)
        await new Promise(resolve => setTimeout(resolve, 5))
        inFlight -= 1
        return detailOk(rawListing({ detailUrl: url, price: 10 }))
      },
    }

    const counts = await refresh(store, adapter, { concurrency: 2 })

    expect(counts.refreshed).toBe(5)
    expect(maxInFlight).toBe(2)
  })
})

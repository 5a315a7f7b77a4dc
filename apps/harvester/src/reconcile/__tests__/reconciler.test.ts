import { describe, it, expect, vi } from 'vitest'
import { createNoopLogger } from '@fairway/logger'
import { InMemoryCatalogStore } from '../../catalog/memory-store.js'
import type { CanonicalClub, ClubKey } from '../../catalog/types.js'
import type { RawListing } from '../../scraper/types.js'
import { Reconciler } from '../reconciler.js'
import type { ReconcilerOptions } from '../reconciler.js'

const NOW = new Date('2026-03-01T12:00:00Z')

function listing(overrides: Partial<RawListing> = {}): RawListing {
  return {
    source: 'Acme',
    brandText: 'Titleist',
    modelText: 'TSR3 Driver',
    clubType: 'drivers',
    price: 599.99,
    detailUrl: 'https://acme.example/tsr3',
    inStock: true,
    ...overrides,
  }
}

function reconciler(store: InMemoryCatalogStore, options: Partial<ReconcilerOptions> = {}) {
  return new Reconciler({ store, logger: createNoopLogger(), now: () => NOW, ...options })
}

const catalog = [
  listing(),
  listing({ brandText: 'Ping', modelText: 'G430 Max Driver', price: 499.99, detailUrl: 'https://acme.example/g430' }),
  listing({
    brandText: 'Cleveland',
    modelText: 'RTX 6 ZipCore Wedge',
    clubType: 'wedges',
    price: 159.99,
    detailUrl: 'https://acme.example/rtx6',
  }),
]

describe('Reconciler', () => {
  it('adds on the first run and changes nothing on an identical second run', async () => {
    const store = new InMemoryCatalogStore()

    const first = await reconciler(store).reconcileBatch(catalog)
    const second = await reconciler(store).reconcileBatch(catalog)

    expect(first).toEqual({ added: 3, updated: 0, unchanged: 0, skipped: 0, errors: 0 })
    expect(second).toEqual({ added: 0, updated: 0, unchanged: 3, skipped: 0, errors: 0 })
    expect(store.listClubs()).toHaveLength(3)
    expect(store.listProductSources()).toHaveLength(3)
  })

  it('moves the current price and the provenance row to the latest price', async () => {
    const store = new InMemoryCatalogStore()

    await reconciler(store).reconcileBatch([listing({ price: 599.99 })])
    const counts = await reconciler(store).reconcileBatch([listing({ price: 549.99 })])

    expect(counts.updated).toBe(1)
    const clubs = store.listClubs()
    expect(clubs).toHaveLength(1)
    expect(clubs[0]?.currentPrice).toBe(549.99)
    const sources = store.listProductSources()
    expect(sources).toHaveLength(1)
    expect(sources[0]).toMatchObject({ price: 549.99, sourceName: 'Acme', lastChecked: NOW })
  })

  it('keeps one club per brand, model and year regardless of case', async () => {
    const store = new InMemoryCatalogStore()

    await reconciler(store).reconcileBatch([
      listing(),
      listing({ brandText: 'TITLEIST', modelText: 'tsr3 driver', source: 'Other Shop' }),
    ])

    expect(store.listClubs()).toHaveLength(1)
    expect(await store.listBrands()).toEqual([{ id: expect.any(Number), name: 'Titleist' }])
    expect(store.listProductSources().map(s => s.sourceName)).toEqual(['Acme', 'Other Shop'])
  })

  it('separates clubs by release year and defaults missing years to the current year', async () => {
    const store = new InMemoryCatalogStore()

    await reconciler(store).reconcileBatch([
      listing(),
      listing({ yearReleased: 2022, detailUrl: 'https://acme.example/tsr3-2022' }),
    ])

    expect(store.listClubs().map(club => club.yearReleased).sort()).toEqual([2022, 2026])
  })

  it('matches brands partially against known names', async () => {
    const store = new InMemoryCatalogStore()
    const taylorMade = await store.createBrand('TaylorMade')

    await reconciler(store).reconcileBatch([listing({ brandText: 'TaylorMade Golf', modelText: 'Qi10 Driver' })])

    expect(store.listClubs()[0]?.brandId).toBe(taylorMade.id)
    expect(await store.listBrands()).toHaveLength(1)
  })

  it('maps category slugs through the club type vocabulary', async () => {
    const store = new InMemoryCatalogStore()

    await reconciler(store).reconcileBatch([
      listing({ clubType: 'fairway-woods', modelText: 'TSR2 Fairway' }),
      listing({ clubType: 'travel-putters', modelText: 'Scotty Mini' }),
    ])

    expect(store.listClubTypes().map(type => type.name)).toEqual(['Fairway Wood', 'Travel Putters'])
  })

  it('holds unknown brands and club types for review under the reject policy', async () => {
    const store = new InMemoryCatalogStore()
    await store.createBrand('Titleist')

    const counts = await reconciler(store, { policy: 'reject' }).reconcileBatch([
      listing(),
      listing({ brandText: 'Sale!!!', modelText: 'Mystery Driver' }),
      listing({ clubType: 'golf-bags', modelText: 'Players 4 Stand Bag' }),
    ])

    expect(counts).toEqual({ added: 1, updated: 0, unchanged: 0, skipped: 2, errors: 0 })
    expect(await store.listBrands()).toHaveLength(1)
    expect(store.listClubTypes().map(type => type.name)).toEqual(['Driver'])
  })

  it('counts a failing listing as an error and continues with the rest', async () => {
    const store = new InMemoryCatalogStore()
    vi.spyOn(store, 'upsertProductSource').mockRejectedValueOnce(new Error('disk full'))
    const error = vi.fn()
    const logger = { ...createNoopLogger(), error }

    const counts = await reconciler(store, { logger }).reconcileBatch(catalog)

    expect(counts.errors).toBe(1)
    expect(counts.added).toBe(2)
    expect(error).toHaveBeenCalledWith(
      'Failed to reconcile listing',
      expect.objectContaining({ url: 'https://acme.example/tsr3' }),
      expect.any(Error)
    )
  })

  it('continues as an update when another writer created the club first', async () => {
    // The next lookup misses, as if the other insert had not committed yet
    class RacingStore extends InMemoryCatalogStore {
      private armed = false

      arm(): void {
        this.armed = true
      }

      override async findClub(key: ClubKey): Promise<CanonicalClub | null> {
        if (this.armed) {
          this.armed = false
          return null
        }
        return super.findClub(key)
      }
    }
    const store = new RacingStore()
    await reconciler(store).reconcileBatch([listing({ source: 'Other Shop' })])
    store.arm()

    const outcome = await reconciler(store).reconcile(listing())

    expect(outcome).toBe('updated')
    expect(store.listClubs()).toHaveLength(1)
    expect(store.listProductSources()).toHaveLength(2)
  })

  it('creates one club when two reconcilers see a new model at once', async () => {
    const store = new InMemoryCatalogStore()

    const outcomes = await Promise.all([
      reconciler(store).reconcile(listing()),
      reconciler(store).reconcile(listing({ source: 'Other Shop' })),
    ])

    expect(outcomes.filter(outcome => outcome === 'added')).toHaveLength(1)
    expect(store.listClubs()).toHaveLength(1)
    expect(await store.listBrands()).toHaveLength(1)
    expect(store.listProductSources()).toHaveLength(2)
  })

  it('skips listings without a model', async () => {
    const store = new InMemoryCatalogStore()

    expect(await reconciler(store).reconcile(listing({ modelText: '  ' }))).toBe('skipped')
    expect(store.listClubs()).toEqual([])
  })
})

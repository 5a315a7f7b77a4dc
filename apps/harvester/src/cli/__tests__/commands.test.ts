import { createNoopLogger } from '@fairway/logger'
import { describe, expect, it } from 'vitest'
import { InMemoryCatalogStore } from '../../catalog/memory-store.js'
import { loadConfig } from '../../config/harvester-config.js'
import { InMemoryAdapterRegistry } from '../../scraper/registry.js'
import type { SourceAdapter } from '../../scraper/types.js'
import { fakeAdapter, fetchFailure, rawListing, unusedFetcher } from '../../__tests__/fakes.js'
import { runCrawlCommand } from '../commands/crawl.js'
import { runRefreshCommand } from '../commands/refresh.js'
import { runSourcesCommand } from '../commands/sources.js'
import type { CliContext } from '../context.js'

interface TestContext extends CliContext {
  store: InMemoryCatalogStore
  stdout: string[]
  stderr: string[]
  closed: string[]
  dryRuns: boolean[]
}

function testContext(adapter: SourceAdapter): TestContext {
  const registry = new InMemoryAdapterRegistry()
  registry.register(adapter)

  const store = new InMemoryCatalogStore()
  const stdout: string[] = []
  const stderr: string[] = []
  const closed: string[] = []
  const dryRuns: boolean[] = []

  return {
    config: loadConfig({}),
    registry,
    logger: createNoopLogger(),
    store,
    stdout,
    stderr,
    closed,
    dryRuns,
    openStore(dryRun) {
      dryRuns.push(dryRun)
      return { value: store, close: async () => void closed.push('store') }
    },
    openFetcher() {
      return { value: unusedFetcher, close: async () => void closed.push('fetcher') }
    },
    out: line => void stdout.push(line),
    err: line => void stderr.push(line),
  }
}

const driversOnly = () => fakeAdapter({ categories: { drivers: [[rawListing()]] } })

describe('crawl command', () => {
  it('rejects a missing source', async () => {
    const ctx = testContext(driversOnly())

    expect(await runCrawlCommand({ source: '', enrich: false, dryRun: true }, ctx)).toBe(2)
    expect(ctx.stderr).toEqual(['--source is required'])
  })

  it('rejects an unknown source without opening the store', async () => {
    const ctx = testContext(driversOnly())

    const result = await runCrawlCommand({ source: 'nope', enrich: false, dryRun: true }, ctx)

    expect(result).toBe(2)
    expect(ctx.stderr).toEqual(["Unknown source 'nope'. Known sources: acme"])
    expect(ctx.dryRuns).toEqual([])
  })

  it('rejects an unknown category', async () => {
    const ctx = testContext(driversOnly())

    const result = await runCrawlCommand(
      { source: 'acme', category: 'putters', enrich: false, dryRun: true },
      ctx
    )

    expect(result).toBe(2)
    expect(ctx.stderr).toEqual(["Unknown category 'putters' for Acme Golf. Categories: drivers"])
  })

  it('rejects a malformed page cap', async () => {
    const ctx = testContext(driversOnly())

    const result = await runCrawlCommand(
      { source: 'acme', maxPages: Number.NaN, enrich: false, dryRun: true },
      ctx
    )

    expect(result).toBe(2)
  })

  it('resolves the source by its display name and prints the run summary', async () => {
    const ctx = testContext(driversOnly())

    const result = await runCrawlCommand(
      { source: 'Acme Golf', category: 'drivers', enrich: false, dryRun: true },
      ctx
    )

    expect(result).toBe(0)
    expect(ctx.stdout).toEqual([
      'Run 1 (filtered_drivers) success: 1 added, 0 updated, 0 errors, 0 skipped',
    ])
    expect(ctx.dryRuns).toEqual([true])
    expect(ctx.store.listClubs()).toHaveLength(1)
    expect(ctx.closed).toEqual(['fetcher', 'store'])
  })

  it('exits 1 when the run fails', async () => {
    const ctx = testContext(fakeAdapter({ categories: { drivers: fetchFailure(503) } }))

    const result = await runCrawlCommand({ source: 'acme', enrich: false, dryRun: false }, ctx)

    expect(result).toBe(1)
    expect(ctx.stdout).toEqual(['Run 1 (full) failed: 0 added, 0 updated, 1 errors, 0 skipped'])
    expect(ctx.stderr).toEqual([
      '  No category page could be fetched: Failed to fetch drivers page 1: Gave up after 3 attempts: HTTP 503',
    ])
    expect(ctx.store.listRuns()[0]?.status).toBe('failed')
    expect(ctx.closed).toEqual(['fetcher', 'store'])
  })
})

describe('refresh command', () => {
  it('rejects a non-positive batch size', async () => {
    const ctx = testContext(driversOnly())

    expect(await runRefreshCommand({ source: 'acme', maxBatch: 0, dryRun: false }, ctx)).toBe(2)
    expect(ctx.stderr).toEqual(['--max-batch must be a positive integer'])
  })

  it('rejects --dry-run without opening a store', async () => {
    const ctx = testContext(driversOnly())

    const result = await runRefreshCommand({ source: 'acme', dryRun: true }, ctx)

    expect(result).toBe(2)
    expect(ctx.stderr).toEqual(['--dry-run is not supported for refresh: it reads stale rows from DATABASE_URL'])
    expect(ctx.dryRuns).toEqual([])
  })

  it('completes with nothing stale', async () => {
    const ctx = testContext(driversOnly())

    const result = await runRefreshCommand({ source: 'acme', dryRun: false }, ctx)

    expect(result).toBe(0)
    expect(ctx.dryRuns).toEqual([false])
    expect(ctx.stdout).toEqual([
      'Run 1 (update_prices) success: 0 added, 0 updated, 0 errors, 0 skipped',
    ])
  })
})

describe('sources command', () => {
  it('lists registered adapters with their categories', async () => {
    const ctx = testContext(driversOnly())

    expect(await runSourcesCommand(ctx)).toBe(0)
    expect(ctx.stdout).toEqual([
      'acme  Acme Golf  v0.0.1  https://acme.example',
      '  categories: drivers',
    ])
  })
})

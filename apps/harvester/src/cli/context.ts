/**
 * Everything a CLI command reaches outside itself. The real context opens
 * PostgreSQL and the HTTP fetch stack lazily; tests pass in-process stand-ins.
 */

import type { ILogger } from '@fairway/logger'
import { createPool } from '@fairway/db'
import { InMemoryCatalogStore } from '../catalog/memory-store.js'
import { PgCatalogStore } from '../catalog/pg-store.js'
import type { CatalogStore } from '../catalog/store.js'
import type { TerminalRunStatus } from '../catalog/types.js'
import type { HarvesterConfig } from '../config/harvester-config.js'
import { loadConfig } from '../config/harvester-config.js'
import { loggers } from '../config/logger.js'
import type { RunSummary } from '../pipeline.js'
import { createAdapterRegistry } from '../scraper/adapters/index.js'
import { createFetchStack } from '../scraper/fetch/fetcher.js'
import type { InMemoryAdapterRegistry } from '../scraper/registry.js'
import type { Fetcher } from '../scraper/types.js'

export interface Closeable<T> {
  value: T
  close(): Promise<void>
}

export interface CliContext {
  config: HarvesterConfig
  registry: InMemoryAdapterRegistry
  logger: ILogger
  /** --dry-run gets a throwaway in-memory store */
  openStore(dryRun: boolean): Closeable<CatalogStore>
  openFetcher(): Closeable<Fetcher>
  out(line: string): void
  err(line: string): void
}

export function createCliContext(env: NodeJS.ProcessEnv = process.env): CliContext {
  const config = loadConfig(env)

  return {
    config,
    registry: createAdapterRegistry(),
    logger: loggers.cli,
    openStore(dryRun) {
      if (dryRun) {
        return { value: new InMemoryCatalogStore(), close: async () => {} }
      }
      const pool = createPool(env)
      return { value: new PgCatalogStore(pool), close: () => pool.end() }
    },
    openFetcher() {
      const stack = createFetchStack({ config, logger: loggers.fetch, env })
      return { value: stack.fetcher, close: () => stack.close() }
    },
    out: line => console.log(line),
    err: line => console.error(line),
  }
}

/** success and partial runs exit 0; failed runs exit 1 */
export function exitCodeFor(status: TerminalRunStatus): number {
  return status === 'failed' ? 1 : 0
}

export function printSummary(ctx: CliContext, summary: RunSummary): void {
  const { run } = summary
  ctx.out(
    `Run ${run.id} (${run.scrapeType}) ${summary.status}: ` +
      `${summary.recordsAdded} added, ${summary.recordsUpdated} updated, ` +
      `${summary.errors} errors, ${summary.skipped} skipped`
  )
  if (run.errorMessage) {
    ctx.err(`  ${run.errorMessage}`)
  }
}

import { runRefresh } from '../../pipeline.js'
import type { CliContext } from '../context.js'
import { createCliContext, exitCodeFor, printSummary } from '../context.js'
import { resolveSource } from './resolve-source.js'

export interface RefreshCommandArgs {
  source: string
  /** Defaults to REFRESH_BATCH_SIZE */
  maxBatch?: number
  /** Always rejected with exit code 2 */
  dryRun: boolean
}

export async function runRefreshCommand(
  args: RefreshCommandArgs,
  ctx: CliContext = createCliContext()
): Promise<number> {
  const adapter = resolveSource(ctx, args.source)
  if (!adapter) {
    return 2
  }

  if (args.dryRun) {
    ctx.err('--dry-run is not supported for refresh: it reads stale rows from DATABASE_URL')
    return 2
  }

  const maxBatch = args.maxBatch ?? ctx.config.refresh.batchSize
  if (!(Number.isInteger(maxBatch) && maxBatch > 0)) {
    ctx.err('--max-batch must be a positive integer')
    return 2
  }

  const store = ctx.openStore(false)
  const fetcher = ctx.openFetcher()

  try {
    ctx.logger.info('Starting refresh', { source: adapter.id, maxBatch })

    const summary = await runRefresh({
      adapter,
      store: store.value,
      fetcher: fetcher.value,
      policy: ctx.config.unknownTaxonomyPolicy,
      logger: ctx.logger,
      maxBatch,
      refreshIntervalMs: ctx.config.refresh.intervalMs,
      concurrency: ctx.config.refresh.concurrency,
    })

    printSummary(ctx, summary)
    return exitCodeFor(summary.status)
  } finally {
    await fetcher.close()
    await store.close()
  }
}

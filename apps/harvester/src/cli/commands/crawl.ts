import { runFullCrawl } from '../../pipeline.js'
import type { CliContext } from '../context.js'
import { createCliContext, exitCodeFor, printSummary } from '../context.js'
import { resolveSource } from './resolve-source.js'

export interface CrawlCommandArgs {
  source: string
  category?: string
  brand?: string
  maxPages?: number
  enrich: boolean
  dryRun: boolean
}

export async function runCrawlCommand(
  args: CrawlCommandArgs,
  ctx: CliContext = createCliContext()
): Promise<number> {
  const adapter = resolveSource(ctx, args.source)
  if (!adapter) {
    return 2
  }

  if (args.category !== undefined && !Object.hasOwn(adapter.categories, args.category)) {
    ctx.err(
      `Unknown category '${args.category}' for ${adapter.sourceName}. ` +
        `Categories: ${Object.keys(adapter.categories).join(', ')}`
    )
    return 2
  }

  if (args.maxPages !== undefined && !(Number.isInteger(args.maxPages) && args.maxPages > 0)) {
    ctx.err('--max-pages must be a positive integer')
    return 2
  }

  const store = ctx.openStore(args.dryRun)
  const fetcher = ctx.openFetcher()

  try {
    ctx.logger.info('Starting crawl', {
      source: adapter.id,
      category: args.category ?? 'all',
      brand: args.brand,
      dryRun: args.dryRun,
    })

    const summary = await runFullCrawl({
      adapter,
      store: store.value,
      fetcher: fetcher.value,
      policy: ctx.config.unknownTaxonomyPolicy,
      logger: ctx.logger,
      category: args.category,
      brandFilter: args.brand,
      maxPagesPerCategory: args.maxPages ?? ctx.config.crawl.maxPagesPerCategory,
      enrichDetails: args.enrich,
    })

    printSummary(ctx, summary)
    return exitCodeFor(summary.status)
  } finally {
    await fetcher.close()
    await store.close()
  }
}

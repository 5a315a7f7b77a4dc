import '../env.js'

import { runCrawlCommand } from './commands/crawl.js'
import { runRefreshCommand } from './commands/refresh.js'
import { runSourcesCommand } from './commands/sources.js'
import { createCliContext } from './context.js'
import { asInteger, asOptionalString, asString, parseFlags } from './parse-flags.js'

function printHelp(): void {
  console.log('Harvester CLI')
  console.log('')
  console.log('Commands:')
  console.log('  crawl --source <id> [--category <slug>] [--brand <name>] [--max-pages <n>] [--enrich] [--dry-run]')
  console.log('  refresh --source <id> [--max-batch <n>]')
  console.log('  sources')
  console.log('')
  console.log('crawl --dry-run reconciles into a throwaway in-memory catalog instead of DATABASE_URL.')
  console.log('Exit codes: 0 success or partial run, 1 failed run, 2 usage error.')
}

async function main(): Promise<void> {
  const [, , command, ...rest] = process.argv
  if (!command || command === '--help' || command === '-h') {
    printHelp()
    process.exit(0)
  }

  const flags = parseFlags(rest)
  if (flags.help === true || flags.h === true) {
    printHelp()
    process.exit(0)
  }

  let exitCode = 2

  switch (command) {
    case 'crawl':
      exitCode = await runCrawlCommand(
        {
          source: asString(flags.source),
          category: asOptionalString(flags.category),
          brand: asOptionalString(flags.brand),
          maxPages: asInteger(flags['max-pages']),
          enrich: flags.enrich === true,
          dryRun: flags['dry-run'] === true,
        },
        createCliContext()
      )
      break
    case 'refresh':
      exitCode = await runRefreshCommand(
        {
          source: asString(flags.source),
          maxBatch: asInteger(flags['max-batch']),
          dryRun: flags['dry-run'] === true,
        },
        createCliContext()
      )
      break
    case 'sources':
      exitCode = await runSourcesCommand(createCliContext())
      break
    default:
      console.error(`Unknown command: ${command}`)
      printHelp()
      exitCode = 2
  }

  process.exit(exitCode)
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error))
  process.exit(1)
})

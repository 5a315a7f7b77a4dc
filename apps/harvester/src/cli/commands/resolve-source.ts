import type { SourceAdapter } from '../../scraper/types.js'
import type { CliContext } from '../context.js'

/**
 * Look up --source by adapter id or source name. Prints the problem and
 * returns null when it is missing or unknown.
 */
export function resolveSource(ctx: CliContext, source: string): SourceAdapter | null {
  if (!source.trim()) {
    ctx.err('--source is required')
    return null
  }

  const adapter = ctx.registry.resolve(source.trim())
  if (!adapter) {
    ctx.err(`Unknown source '${source}'. Known sources: ${ctx.registry.list().join(', ')}`)
    return null
  }
  return adapter
}

import type { CliContext } from '../context.js'
import { createCliContext } from '../context.js'

export async function runSourcesCommand(ctx: CliContext = createCliContext()): Promise<number> {
  for (const id of ctx.registry.list()) {
    const adapter = ctx.registry.get(id)
    if (!adapter) continue
    ctx.out(`${adapter.id}  ${adapter.sourceName}  v${adapter.version}  ${adapter.baseUrl}`)
    ctx.out(`  categories: ${Object.keys(adapter.categories).join(', ')}`)
  }
  return 0
}

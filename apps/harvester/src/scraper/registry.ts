/**
 * Adapter Registry
 *
 * Adapters must be explicitly registered; no auto-discovery.
 * Lookup by registry id ('globalgolf') or by provenance source name ('Global Golf').
 */

import type { SourceAdapter } from './types.js'

export class InMemoryAdapterRegistry {
  private readonly adapters = new Map<string, SourceAdapter>()
  private readonly bySourceName = new Map<string, SourceAdapter>()

  /**
   * Register an adapter.
   * @throws Error if the id or source name is already registered
   */
  register(adapter: SourceAdapter): void {
    if (this.adapters.has(adapter.id)) {
      throw new Error(`Adapter with ID '${adapter.id}' is already registered`)
    }

    const sourceKey = adapter.sourceName.toLowerCase()
    const existing = this.bySourceName.get(sourceKey)
    if (existing) {
      throw new Error(`Source '${adapter.sourceName}' is already registered as '${existing.id}'`)
    }

    this.adapters.set(adapter.id, adapter)
    this.bySourceName.set(sourceKey, adapter)
  }

  get(adapterId: string): SourceAdapter | undefined {
    return this.adapters.get(adapterId)
  }

  getBySourceName(sourceName: string): SourceAdapter | undefined {
    return this.bySourceName.get(sourceName.toLowerCase())
  }

  /**
   * Resolve a CLI/config selector: id first, then source name.
   */
  resolve(selector: string): SourceAdapter | undefined {
    return this.get(selector) ?? this.getBySourceName(selector)
  }

  list(): string[] {
    return Array.from(this.adapters.keys())
  }
}

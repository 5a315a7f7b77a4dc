/**
 * Adapter Registration
 *
 * Registers all production adapters with a registry.
 * Adapters are explicitly registered here - no auto-discovery.
 */

import { InMemoryAdapterRegistry } from '../registry.js'
import { globalGolfAdapter } from './globalgolf/index.js'

/**
 * Register all production adapters.
 */
export function registerAllAdapters(registry: InMemoryAdapterRegistry): InMemoryAdapterRegistry {
  registry.register(globalGolfAdapter)
  // Future retailers register here
  return registry
}

/**
 * Fresh registry with every production adapter.
 */
export function createAdapterRegistry(): InMemoryAdapterRegistry {
  return registerAllAdapters(new InMemoryAdapterRegistry())
}

// Re-export adapters for direct access (e.g., in tests)
export { globalGolfAdapter } from './globalgolf/index.js'

/**
 * Harvester loggers.
 *
 * One root `harvester` logger. Pipeline runs derive their own children from it
 * (crawl, refresh, reconcile, runs); the process-level pieces below are shared.
 */

import { createLogger } from '@fairway/logger'

export const logger = createLogger('harvester')

export const loggers = {
  fetch: logger.child('fetch'),
  cli: logger.child('cli'),
}

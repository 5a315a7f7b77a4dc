/**
 * Harvester configuration, read once from the environment.
 *
 * Malformed numbers fall back to their defaults; loadConfig never throws and
 * never logs, so it is safe to call before the logger exists.
 */

import type { TaxonomyPolicy } from '../reconcile/taxonomy.js'
import { isTaxonomyPolicy } from '../reconcile/taxonomy.js'

export type RateLimitBackend = 'memory' | 'redis'

export interface HarvesterConfig {
  databaseUrl: string | undefined

  rateLimit: {
    backend: RateLimitBackend
    requestsPerMinute: number
  }

  fetch: {
    requestDelayMs: number
    timeoutMs: number
    maxAttempts: number
    retryBaseDelayMs: number
    retryMaxDelayMs: number
  }

  crawl: {
    maxPagesPerCategory: number
  }

  refresh: {
    intervalMs: number
    batchSize: number
    concurrency: number
  }

  unknownTaxonomyPolicy: TaxonomyPolicy
}

const HOUR_MS = 60 * 60 * 1000

function positiveInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback
  const parsed = Number(value)
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback
}

function nonNegativeInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback
  const parsed = Number(value)
  return Number.isInteger(parsed) && parsed >= 0 ? parsed : fallback
}

function positiveNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback
  const parsed = Number(value)
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): HarvesterConfig {
  const policy = env.UNKNOWN_TAXONOMY_POLICY?.trim().toLowerCase()

  return {
    databaseUrl: env.DATABASE_URL || undefined,

    rateLimit: {
      backend: env.RATE_LIMIT_BACKEND?.trim().toLowerCase() === 'redis' ? 'redis' : 'memory',
      requestsPerMinute: positiveInt(env.RATE_LIMIT_PER_MINUTE, 30),
    },

    fetch: {
      requestDelayMs: nonNegativeInt(env.REQUEST_DELAY_MS, 2000),
      timeoutMs: positiveInt(env.FETCH_TIMEOUT_MS, 30000),
      maxAttempts: positiveInt(env.MAX_RETRIES, 3),
      retryBaseDelayMs: nonNegativeInt(env.RETRY_BASE_DELAY_MS, 4000),
      retryMaxDelayMs: nonNegativeInt(env.RETRY_MAX_DELAY_MS, 10000),
    },

    crawl: {
      maxPagesPerCategory: positiveInt(env.MAX_PAGES_PER_CATEGORY, 10),
    },

    refresh: {
      intervalMs: positiveNumber(env.REFRESH_INTERVAL_HOURS, 24) * HOUR_MS,
      batchSize: positiveInt(env.REFRESH_BATCH_SIZE, 100),
      concurrency: positiveInt(env.REFRESH_CONCURRENCY, 1),
    },

    unknownTaxonomyPolicy: isTaxonomyPolicy(policy) ? policy : 'create',
  }
}

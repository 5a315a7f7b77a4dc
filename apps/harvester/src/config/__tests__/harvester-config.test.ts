import { describe, it, expect } from 'vitest'
import { loadConfig } from '../harvester-config.js'

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    expect(loadConfig({})).toEqual({
      databaseUrl: undefined,
      rateLimit: { backend: 'memory', requestsPerMinute: 30 },
      fetch: {
        requestDelayMs: 2000,
        timeoutMs: 30000,
        maxAttempts: 3,
        retryBaseDelayMs: 4000,
        retryMaxDelayMs: 10000,
      },
      crawl: { maxPagesPerCategory: 10 },
      refresh: { intervalMs: 86_400_000, batchSize: 100, concurrency: 1 },
      unknownTaxonomyPolicy: 'create',
    })
  })

  it('reads overrides', () => {
    const config = loadConfig({
      DATABASE_URL: 'postgres://localhost/fairway_test',
      RATE_LIMIT_BACKEND: 'Redis',
      RATE_LIMIT_PER_MINUTE: '12',
      REQUEST_DELAY_MS: '0',
      REFRESH_INTERVAL_HOURS: '1.5',
      REFRESH_CONCURRENCY: '4',
      UNKNOWN_TAXONOMY_POLICY: 'reject',
    })

    expect(config.databaseUrl).toBe('postgres://localhost/fairway_test')
    expect(config.rateLimit).toEqual({ backend: 'redis', requestsPerMinute: 12 })
    expect(config.fetch.requestDelayMs).toBe(0)
    expect(config.refresh).toEqual({ intervalMs: 5_400_000, batchSize: 100, concurrency: 4 })
    expect(config.unknownTaxonomyPolicy).toBe('reject')
  })

  it('falls back on malformed values', () => {
    const config = loadConfig({
      RATE_LIMIT_PER_MINUTE: '0',
      MAX_RETRIES: 'three',
      REFRESH_BATCH_SIZE: '-5',
      RATE_LIMIT_BACKEND: 'memcached',
      UNKNOWN_TAXONOMY_POLICY: 'ignore',
    })

    expect(config.rateLimit).toEqual({ backend: 'memory', requestsPerMinute: 30 })
    expect(config.fetch.maxAttempts).toBe(3)
    expect(config.refresh.batchSize).toBe(100)
    expect(config.unknownTaxonomyPolicy).toBe('create')
  })
})

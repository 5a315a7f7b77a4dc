/**
 * Fetcher Factory
 *
 * Builds the process-wide rate limiter and the HttpFetcher on top of it from
 * HarvesterConfig. Every adapter in the process shares the one limiter.
 */

import type { ILogger } from '@fairway/logger'
import type { HarvesterConfig } from '../../config/harvester-config.js'
import { createRedisClient } from '../../config/redis.js'
import type { Fetcher, RateLimiter } from '../types.js'
import { HttpFetcher } from './http-fetcher.js'
import { SlidingWindowRateLimiter } from './rate-limiter.js'
import { RedisRateLimiter } from './redis-rate-limiter.js'

export type { Fetcher, FetchOptions, FetchResult } from '../types.js'

export interface FetchStack {
  fetcher: Fetcher
  rateLimiter: RateLimiter
  /** Releases the Redis connection when the redis backend is used */
  close(): Promise<void>
}

export interface FetchStackOptions {
  config: HarvesterConfig
  logger: ILogger
  env?: NodeJS.ProcessEnv
}

export function createRateLimiter(options: FetchStackOptions): { rateLimiter: RateLimiter; close(): Promise<void> } {
  const { config, logger } = options
  const limits = { maxRequests: config.rateLimit.requestsPerMinute, windowMs: 60_000 }

  if (config.rateLimit.backend === 'redis') {
    const client = createRedisClient(options.env ?? process.env, logger.child('redis'))
    const limiter = new RedisRateLimiter({
      ...limits,
      redis: {
        eval: (script, numKeys, ...args) => client.eval(script, numKeys, ...args),
        quit: () => client.quit(),
      },
      ownsClient: true,
    })
    return { rateLimiter: limiter, close: () => limiter.close() }
  }

  return { rateLimiter: new SlidingWindowRateLimiter(limits), close: async () => {} }
}

export function createFetchStack(options: FetchStackOptions): FetchStack {
  const { config, logger } = options
  const { rateLimiter, close } = createRateLimiter(options)

  const fetcher = new HttpFetcher({
    rateLimiter,
    retryPolicy: {
      maxAttempts: config.fetch.maxAttempts,
      baseDelayMs: config.fetch.retryBaseDelayMs,
      maxDelayMs: config.fetch.retryMaxDelayMs,
    },
    requestDelayMs: config.fetch.requestDelayMs,
    fetchOptions: { timeoutMs: config.fetch.timeoutMs },
    logger: logger.child('http'),
  })

  logger.debug('Fetch stack ready', {
    rateLimitBackend: config.rateLimit.backend,
    requestsPerMinute: config.rateLimit.requestsPerMinute,
  })

  return { fetcher, rateLimiter, close }
}

/**
 * Redis-backed Rate Limiter
 *
 * Same sliding-window contract as SlidingWindowRateLimiter, but the window
 * lives in a Redis sorted set so several harvester processes share one budget.
 * The prune/count/add step runs as a single Lua script, so it is atomic across
 * clients.
 */

import { randomUUID } from 'node:crypto'
import type { RateLimiter, RateLimitConfig } from '../types.js'
import { DEFAULT_RATE_LIMIT } from '../types.js'
import { sleep as defaultSleep } from './retry.js'

/** Key prefix for rate limiter state in Redis */
const REDIS_KEY_PREFIX = 'fairway:ratelimit:'

/** TTL for rate limit keys (prevents stale keys) */
const KEY_TTL_SECONDS = 3600

const ACQUIRE_SCRIPT = `
  local key = KEYS[1]
  local now = tonumber(ARGV[1])
  local windowMs = tonumber(ARGV[2])
  local maxRequests = tonumber(ARGV[3])
  local ttl = tonumber(ARGV[4])
  local member = ARGV[5]

  redis.call('ZREMRANGEBYSCORE', key, '-inf', now - windowMs)

  local count = redis.call('ZCARD', key)
  if count < maxRequests then
    redis.call('ZADD', key, now, member)
    redis.call('EXPIRE', key, ttl)
    return {1, 0}
  end

  local oldest = redis.call('ZRANGE', key, 0, 0, 'WITHSCORES')
  if #oldest >= 2 then
    return {0, tonumber(oldest[2]) + windowMs - now}
  end
  return {0, windowMs}
`

/**
 * The slice of a Redis client the limiter needs.
 * createRedisRateLimiter adapts an ioredis client to it.
 */
export interface RateLimitRedis {
  eval(script: string, numKeys: number, ...args: string[]): Promise<unknown>
  quit(): Promise<unknown>
}

export interface RedisRateLimiterOptions extends Partial<RateLimitConfig> {
  redis: RateLimitRedis

  /** Budget name; processes using the same name share a window (default: 'global') */
  bucket?: string

  /** Whether close() should quit the client */
  ownsClient?: boolean

  now?: () => number
  sleep?: (ms: number) => Promise<void>
}

export class RedisRateLimiter implements RateLimiter {
  private readonly redis: RateLimitRedis
  private readonly config: RateLimitConfig
  private readonly key: string
  private readonly ownsClient: boolean
  private readonly now: () => number
  private readonly sleep: (ms: number) => Promise<void>

  constructor(options: RedisRateLimiterOptions) {
    this.redis = options.redis
    this.config = {
      maxRequests: options.maxRequests ?? DEFAULT_RATE_LIMIT.maxRequests,
      windowMs: options.windowMs ?? DEFAULT_RATE_LIMIT.windowMs,
    }
    this.key = `${REDIS_KEY_PREFIX}${options.bucket ?? 'global'}`
    this.ownsClient = options.ownsClient ?? false
    this.now = options.now ?? Date.now
    this.sleep = options.sleep ?? defaultSleep
  }

  async acquire(): Promise<void> {
    while (true) {
      const result = await this.tryAcquire(this.now())
      if (result.acquired) {
        return
      }
      await this.sleep(Math.max(result.retryAfterMs, 1))
    }
  }

  private async tryAcquire(now: number): Promise<{ acquired: boolean; retryAfterMs: number }> {
    const raw = await this.redis.eval(
      ACQUIRE_SCRIPT,
      1,
      this.key,
      now.toString(),
      this.config.windowMs.toString(),
      this.config.maxRequests.toString(),
      KEY_TTL_SECONDS.toString(),
      `${now}:${randomUUID()}`
    )

    if (!Array.isArray(raw) || raw.length < 2) {
      throw new Error(`Unexpected rate limit script result: ${JSON.stringify(raw)}`)
    }

    const acquired = Number(raw[0]) === 1
    const retryAfterMs = Number(raw[1])
    return {
      acquired,
      retryAfterMs: Number.isFinite(retryAfterMs) ? retryAfterMs : this.config.windowMs,
    }
  }

  getConfig(): RateLimitConfig {
    return { ...this.config }
  }

  /**
   * Close the Redis connection (if owned by this instance).
   */
  async close(): Promise<void> {
    if (this.ownsClient) {
      await this.redis.quit()
    }
  }
}

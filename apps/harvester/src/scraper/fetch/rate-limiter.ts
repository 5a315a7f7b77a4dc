/**
 * In-process Rate Limiter
 *
 * Sliding-window log: at most maxRequests grants in any rolling windowMs.
 * Callers over budget wait for the oldest grant to age out; nothing is dropped.
 *
 * The check-and-record step runs without an await in between, so concurrent
 * callers in one process can share an instance without over-granting.
 */

import type { RateLimiter, RateLimitConfig } from '../types.js'
import { DEFAULT_RATE_LIMIT } from '../types.js'
import { sleep as defaultSleep } from './retry.js'

export interface SlidingWindowRateLimiterOptions extends Partial<RateLimitConfig> {
  /** Clock (for testing) */
  now?: () => number

  /** Sleep (for testing) */
  sleep?: (ms: number) => Promise<void>
}

export class SlidingWindowRateLimiter implements RateLimiter {
  private readonly config: RateLimitConfig
  private readonly grants: number[] = []
  private readonly now: () => number
  private readonly sleep: (ms: number) => Promise<void>

  constructor(options: SlidingWindowRateLimiterOptions = {}) {
    this.config = {
      maxRequests: options.maxRequests ?? DEFAULT_RATE_LIMIT.maxRequests,
      windowMs: options.windowMs ?? DEFAULT_RATE_LIMIT.windowMs,
    }
    if (!(this.config.maxRequests >= 1)) {
      throw new Error(`maxRequests must be at least 1, got ${this.config.maxRequests}`)
    }
    this.now = options.now ?? Date.now
    this.sleep = options.sleep ?? defaultSleep
  }

  async acquire(): Promise<void> {
    while (true) {
      const now = this.now()
      const retryAfterMs = this.tryAcquire(now)
      if (retryAfterMs === null) {
        return
      }
      await this.sleep(retryAfterMs)
    }
  }

  /**
   * Record a grant if the window has room.
   * Returns null on success, otherwise ms until the oldest grant expires.
   */
  private tryAcquire(now: number): number | null {
    this.evictExpired(now)

    if (this.grants.length < this.config.maxRequests) {
      this.grants.push(now)
      return null
    }

    const oldest = this.grants[0] ?? now
    return Math.max(oldest + this.config.windowMs - now, 1)
  }

  private evictExpired(now: number): void {
    while (this.grants.length > 0) {
      const oldest = this.grants[0]
      if (oldest === undefined || now - oldest < this.config.windowMs) break
      this.grants.shift()
    }
  }

  getConfig(): RateLimitConfig {
    return { ...this.config }
  }

  /**
   * Current window state (for debugging/monitoring).
   */
  getState(): { activeRequests: number; oldestTimestamp: number | null } {
    this.evictExpired(this.now())
    return {
      activeRequests: this.grants.length,
      oldestTimestamp: this.grants[0] ?? null,
    }
  }
}

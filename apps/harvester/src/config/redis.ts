import { Redis, type RedisOptions } from 'ioredis'
import type { ILogger } from '@fairway/logger'

// Support REDIS_URL (hosted) or individual HOST/PORT/PASSWORD (local dev)
export function redisOptionsFromEnv(env: NodeJS.ProcessEnv, log: ILogger): RedisOptions {
  const redisUrl = env.REDIS_URL
  let host = env.REDIS_HOST || 'localhost'
  let port = Number.parseInt(env.REDIS_PORT || '6379', 10)
  let password = env.REDIS_PASSWORD || undefined

  if (redisUrl) {
    try {
      const url = new URL(redisUrl)
      host = url.hostname
      port = Number.parseInt(url.port || '6379', 10)
      password = url.password || undefined
    } catch {
      log.warn('Failed to parse REDIS_URL, falling back to REDIS_HOST/PORT')
    }
  }

  return {
    host,
    port,
    password,
    maxRetriesPerRequest: 3,
    keepAlive: 10000,
    connectTimeout: 10000,
    commandTimeout: 30000,
    retryStrategy(times: number) {
      if (times > 20) {
        return null
      }
      const delay = Math.min(times * 500, 30000)
      log.info('Reconnecting', { attempt: times, delayMs: delay })
      return delay
    },
  }
}

export function createRedisClient(env: NodeJS.ProcessEnv, log: ILogger): Redis {
  const options = redisOptionsFromEnv(env, log)
  log.info('Connecting', { host: options.host, port: options.port })
  return new Redis(options)
}

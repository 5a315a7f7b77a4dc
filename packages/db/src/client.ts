import pg from 'pg'
import type { Pool, PoolConfig } from 'pg'

/**
 * Connection pool configuration
 *
 * Environment variables:
 * - DB_POOL_MAX: Maximum connections (default: 20)
 * - DB_POOL_MIN: Minimum idle connections (default: 2)
 * - DB_SERVICE_NAME: Application name for pg_stat_activity (default: fairway)
 */
export function getPoolConfig(
  connectionString: string,
  env: NodeJS.ProcessEnv = process.env
): PoolConfig {
  return {
    connectionString,

    // === Pool Size ===
    max: parseIntOr(env.DB_POOL_MAX, 20),
    min: parseIntOr(env.DB_POOL_MIN, 2),

    // === Timeouts ===
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,

    // === Connection Recycling ===
    maxUses: 7500,
    maxLifetimeSeconds: 1800,

    // === Keep-Alive ===
    keepAlive: true,
    keepAliveInitialDelayMillis: 10000,

    application_name: env.DB_SERVICE_NAME || 'fairway',
  }
}

function parseIntOr(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value ?? '', 10)
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback
}

/**
 * Creates a new pg Pool for the catalog database.
 * Callers own the pool and must `end()` it on shutdown.
 */
export function createPool(env: NodeJS.ProcessEnv = process.env): Pool {
  const connectionString = env.DATABASE_URL

  if (!connectionString) {
    throw new Error('DATABASE_URL environment variable is not set')
  }

  return new pg.Pool(getPoolConfig(connectionString, env))
}

/** PostgreSQL SQLSTATE for unique_violation */
export const UNIQUE_VIOLATION = '23505'

export function isUniqueViolation(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === UNIQUE_VIOLATION
  )
}

export type { Pool, PoolClient, PoolConfig, QueryResultRow } from 'pg'

export { createPool, getPoolConfig, isUniqueViolation, UNIQUE_VIOLATION } from './client.js'
export type { Pool, PoolClient, PoolConfig, QueryResultRow } from './client.js'

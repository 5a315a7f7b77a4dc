import { describe, it, expect } from 'vitest'
import { createPool, getPoolConfig, isUniqueViolation } from '../client.js'

describe('getPoolConfig', () => {
  it('uses defaults when pool variables are unset', () => {
    const config = getPoolConfig('postgres://localhost/fairway_test', {})

    expect(config.max).toBe(20)
    expect(config.min).toBe(2)
    expect(config.application_name).toBe('fairway')
    expect(config.connectionString).toBe('postgres://localhost/fairway_test')
  })

  it('reads pool sizing from the environment', () => {
    const config = getPoolConfig('postgres://localhost/fairway_test', {
      DB_POOL_MAX: '5',
      DB_POOL_MIN: '1',
      DB_SERVICE_NAME: 'fairway-harvester',
    })

    expect(config.max).toBe(5)
    expect(config.min).toBe(1)
    expect(config.application_name).toBe('fairway-harvester')
  })

  it('ignores unparsable sizes', () => {
    const config = getPoolConfig('postgres://localhost/fairway_test', { DB_POOL_MAX: 'lots' })
    expect(config.max).toBe(20)
  })
})

describe('createPool', () => {
  it('requires DATABASE_URL', () => {
    expect(() => createPool({})).toThrow('DATABASE_URL environment variable is not set')
  })
})

describe('isUniqueViolation', () => {
  it('matches SQLSTATE 23505 only', () => {
    expect(isUniqueViolation({ code: '23505' })).toBe(true)
    expect(isUniqueViolation({ code: '23503' })).toBe(false)
    expect(isUniqueViolation(new Error('boom'))).toBe(false)
    expect(isUniqueViolation(null)).toBe(false)
  })
})

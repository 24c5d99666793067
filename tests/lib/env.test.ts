import { afterEach, describe, expect, it } from 'vitest'
import { getSyncEnv, resetSyncEnvCache } from '@/lib/env'

describe('getSyncEnv', () => {
  afterEach(() => {
    resetSyncEnvCache()
  })

  it('applies defaults', () => {
    expect(getSyncEnv({})).toEqual({
      NODE_ENV: 'development',
      LOG_LEVEL: 'info',
      SYNC_TIMEZONE: 'Europe/Brussels',
      SYNC_DAYS_AHEAD: 20,
      SYNC_MIN_STAFF_PER_ROLE: 1,
      SYNC_ROOM_MATCH: 'lokaal FA1 (kooi van Faraday)',
      SYNC_ROOM_LABEL: 'lokaal FA1',
    })
  })

  it('coerces numeric settings', () => {
    const env = getSyncEnv({ SYNC_DAYS_AHEAD: '5', SYNC_MIN_STAFF_PER_ROLE: '2', SYNC_CONFIG_DIR: '/etc/free4booking' })

    expect(env.SYNC_DAYS_AHEAD).toBe(5)
    expect(env.SYNC_MIN_STAFF_PER_ROLE).toBe(2)
    expect(env.SYNC_CONFIG_DIR).toBe('/etc/free4booking')
  })

  it('treats an empty number as unset', () => {
    expect(getSyncEnv({ SYNC_DAYS_AHEAD: '' }).SYNC_DAYS_AHEAD).toBe(20)
  })

  it('rejects an unknown time zone', () => {
    expect(() => getSyncEnv({ SYNC_TIMEZONE: 'Europe/Atlantis' })).toThrow(
      'Environment validation failed:\n  - SYNC_TIMEZONE: must be an IANA time zone such as Europe/Brussels'
    )
  })

  it('rejects a window beyond sixty days', () => {
    expect(() => getSyncEnv({ SYNC_DAYS_AHEAD: '61' })).toThrow(/SYNC_DAYS_AHEAD: Number must be less than or equal to 60/)
  })

  it('rejects a zero staff minimum', () => {
    expect(() => getSyncEnv({ SYNC_MIN_STAFF_PER_ROLE: '0' })).toThrow(/SYNC_MIN_STAFF_PER_ROLE/)
  })
})

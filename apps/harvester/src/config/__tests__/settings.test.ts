import { describe, it, expect } from 'vitest'
import { loadHarvesterConfig, toHttpClientConfig } from '../settings.js'
import { DEFAULT_RETRY_POLICY } from '../../fetch/index.js'
import { ConfigError } from '../../errors.js'

describe('loadHarvesterConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadHarvesterConfig({})

    expect(config.ingest).toEqual({
      concurrency: 4,
      cron: '0 */3 * * *',
      trackRemovals: false,
      lockTtlMs: 900_000,
    })
    expect(config.watchers.concurrency).toBe(8)
    expect(config.dates.centuryPivot).toBeUndefined()
  })

  it('coerces numeric and boolean variables', () => {
    const config = loadHarvesterConfig({
      INGEST_CONCURRENCY: '12',
      INGEST_TRACK_REMOVALS: 'yes',
      FETCH_TIMEOUT_MS: '5000',
      DATE_CENTURY_PIVOT: '50',
    })

    expect(config.ingest.concurrency).toBe(12)
    expect(config.ingest.trackRemovals).toBe(true)
    expect(config.fetch.timeoutMs).toBe(5000)
    expect(config.dates.centuryPivot).toBe(50)
  })

  it('treats empty strings as unset', () => {
    expect(loadHarvesterConfig({ INGEST_CONCURRENCY: '' }).ingest.concurrency).toBe(4)
  })

  it('returns a frozen value', () => {
    const config = loadHarvesterConfig({})
    expect(Object.isFrozen(config)).toBe(true)
    expect(Object.isFrozen(config.fetch)).toBe(true)
  })

  it('reports every invalid variable', () => {
    let caught: unknown
    try {
      loadHarvesterConfig({ INGEST_CONCURRENCY: '0', INGEST_TRACK_REMOVALS: 'maybe' })
    } catch (error) {
      caught = error
    }

    expect(caught).toBeInstanceOf(ConfigError)
    expect(caught instanceof ConfigError ? caught.issues.map((i) => i.split(':')[0]) : []).toEqual([
      'INGEST_CONCURRENCY',
      'INGEST_TRACK_REMOVALS',
    ])
  })

  it('carries fetch settings into an HTTP client config', () => {
    const http = toHttpClientConfig(
      loadHarvesterConfig({ FETCH_USER_AGENT: 'test-agent/1.0', FETCH_TIMEOUT_MS: '2500', FETCH_MAX_BYTES: '1024' })
    )

    expect(http).toMatchObject({ userAgent: 'test-agent/1.0', timeoutMs: 2500, maxSizeBytes: 1024 })
    expect(http.retryPolicy).toEqual(DEFAULT_RETRY_POLICY)
    expect(Object.isFrozen(http)).toBe(true)
  })
})

import { describe, expect, it, vi } from 'vitest'
import type { ILogger } from '@regwatch/logger'
import { createWorkflowLogger, hashValue, sanitizeUrl } from '../structured-log.js'

function baseLogger() {
  const base = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), fatal: vi.fn(), child: vi.fn() }
  const logger: ILogger = base
  return { base, logger }
}

describe('sanitizeUrl', () => {
  it('drops the query string', () => {
    expect(sanitizeUrl('https://example.gov/news/item?token=test-secret')).toEqual({
      urlHost: 'example.gov',
      urlPath: '/news/item',
      urlHash: hashValue('example.gov/news/item'),
    })
  })

  it('hashes values that are not URLs', () => {
    expect(sanitizeUrl('not a url')).toEqual({ urlHash: hashValue('not a url') })
    expect(sanitizeUrl(null)).toEqual({})
  })
})

describe('createWorkflowLogger', () => {
  it('adds the event name and context, dropping empty values', () => {
    const { base, logger } = baseLogger()
    const log = createWorkflowLogger(logger, { workflow: 'ingest', jobId: undefined })

    log.child({ sourceId: 7 }).info('SOURCE_INGESTED', { items: 3, error: null })

    expect(base.info).toHaveBeenCalledWith('SOURCE_INGESTED', {
      event_name: 'SOURCE_INGESTED',
      workflow: 'ingest',
      sourceId: 7,
      items: 3,
    })
  })
})

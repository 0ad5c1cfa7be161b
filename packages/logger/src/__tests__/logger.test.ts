import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { createLogger, maskSecrets, resetLogSink, setLogSink, type LogEntry } from '../index.js'

describe('logger', () => {
  const entries: LogEntry[] = []
  const lines: string[] = []
  const originalLevel = process.env.LOG_LEVEL
  const originalFormat = process.env.LOG_FORMAT

  beforeEach(() => {
    entries.length = 0
    lines.length = 0
    process.env.LOG_LEVEL = 'info'
    process.env.LOG_FORMAT = 'json'
    setLogSink((entry, formatted) => {
      entries.push(entry)
      lines.push(formatted)
    })
  })

  afterEach(() => {
    resetLogSink()
    if (originalLevel === undefined) delete process.env.LOG_LEVEL
    else process.env.LOG_LEVEL = originalLevel
    if (originalFormat === undefined) delete process.env.LOG_FORMAT
    else process.env.LOG_FORMAT = originalFormat
  })

  it('drops entries below LOG_LEVEL', () => {
    const log = createLogger('harvester')
    log.debug('hidden')
    log.info('shown')

    expect(entries.map((e) => e.message)).toEqual(['shown'])
  })

  it('builds component paths for nested children', () => {
    const log = createLogger('harvester').child('ingest').child('feed', { sourceId: 7 })
    log.info('parsed', { items: 3 })

    expect(entries[0]).toMatchObject({
      service: 'harvester',
      component: 'ingest:feed',
      sourceId: 7,
      items: 3,
    })
  })

  it('attaches error details and codes', () => {
    const err = Object.assign(new Error('boom'), { code: 'FETCH_FAILED' })
    createLogger('harvester').error('failed', {}, err)

    expect(entries[0]?.error).toMatchObject({ name: 'Error', message: 'boom', code: 'FETCH_FAILED' })
  })

  it('writes JSON lines in json format', () => {
    createLogger('cli').warn('careful')

    const parsed: unknown = JSON.parse(lines[0] ?? '')
    expect(parsed).toMatchObject({ level: 'warn', service: 'cli', message: 'careful' })
  })

  it('masks credential-like keys', () => {
    expect(maskSecrets({ password: 'test-secret', host: 'localhost', apiToken: 'x' })).toEqual({
      password: '***',
      host: 'localhost',
      apiToken: '***',
    })
  })
})

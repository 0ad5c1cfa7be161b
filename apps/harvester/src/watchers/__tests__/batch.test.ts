import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { mkdtemp, readFile, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { FetchError } from '../../errors.js'
import type { FetchResponse } from '../../fetch/index.js'
import { filterWatchers, runStamp, runWatchers, type BatchRecord } from '../batch.js'
import type { WatcherDefinition } from '../types.js'

const WATCHERS: WatcherDefinition[] = [
  { id: 'tx-rrc-news', state: 'tx', url: 'https://tx.example.gov/news' },
  { id: 'co-ecmc-news', state: 'co', url: 'https://co.example.gov/news' },
  { id: 'co-ecmc-rules', state: 'co', url: 'https://co.example.gov/rules' },
  { id: 'us-osha-news', state: 'us', url: 'https://us.example.gov/news' },
]

describe('filterWatchers', () => {
  it('applies state, pattern and limit in that order', () => {
    expect(filterWatchers(WATCHERS, { states: ['CO'] }).map((w) => w.id)).toEqual(['co-ecmc-news', 'co-ecmc-rules'])
    expect(filterWatchers(WATCHERS, { pattern: 'NEWS' }).map((w) => w.id)).toEqual([
      'tx-rrc-news',
      'co-ecmc-news',
      'us-osha-news',
    ])
    expect(filterWatchers(WATCHERS, { states: ['co', 'us'], limit: 2 }).map((w) => w.id)).toEqual([
      'co-ecmc-news',
      'co-ecmc-rules',
    ])
  })
})

describe('runStamp', () => {
  it('formats a compact UTC timestamp', () => {
    expect(runStamp(new Date('2024-03-05T14:00:09.123Z'))).toBe('20240305T140009Z')
  })
})

describe('runWatchers', () => {
  let root: string
  const now = () => new Date('2024-03-05T14:00:00Z')

  function ok(url: string, headers: Record<string, string>, body = ''): FetchResponse {
    return { url, status: 200, contentType: 'text/html', headers, body, attempts: 1, durationMs: 0 }
  }

  const fetcher = {
    head: vi.fn(async (url: string) => {
      if (url.startsWith('https://co.example.gov/rules')) {
        throw new FetchError('HTTP 403 Forbidden', { kind: 'http', url, status: 403, attempts: 1 })
      }
      return ok(url, { etag: `"${url}"` })
    }),
    get: vi.fn(async (url: string) => ok(url, {}, `<main>${url}</main>`)),
  }

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'watch-batch-'))
  })

  afterEach(async () => {
    await rm(root, { recursive: true, force: true })
  })

  it('writes one JSON line per watcher and counts outcomes', async () => {
    const seen: BatchRecord[] = []

    const summary = await runWatchers(WATCHERS, {
      states: ['co', 'tx'],
      cacheRoot: join(root, 'cache'),
      outDir: join(root, 'runs'),
      fetcher,
      now,
      onRecord: (record) => seen.push(record),
    })

    expect(summary).toEqual({
      ok: 2,
      updated: 2,
      failed: 1,
      outFile: join(root, 'runs', 'scrape_20240305T140000Z.jsonl'),
    })

    const lines = (await readFile(join(root, 'runs', 'scrape_20240305T140000Z.jsonl'), 'utf8')).trim().split('\n')
    const records = lines.map((line): unknown => JSON.parse(line))
    expect(records).toHaveLength(3)
    expect(records).toContainEqual(
      expect.objectContaining({
        watcherId: 'co-ecmc-rules',
        state: 'co',
        runAt: '20240305T140000Z',
        ok: false,
        error: 'HTTP 403 Forbidden',
      })
    )
    expect(seen).toHaveLength(3)
  })

  it('only reports updated or failed watchers when asked', async () => {
    const options = {
      states: ['tx'],
      cacheRoot: join(root, 'cache'),
      outDir: join(root, 'runs'),
      fetcher,
      now,
    }
    await runWatchers(WATCHERS, options)

    const seen: BatchRecord[] = []
    const summary = await runWatchers(WATCHERS, { ...options, onlyUpdated: true, onRecord: (r) => seen.push(r) })

    expect(summary).toMatchObject({ ok: 1, updated: 0, failed: 0 })
    expect(seen).toEqual([])
  })

  it('does nothing when no watcher matches', async () => {
    const summary = await runWatchers(WATCHERS, {
      pattern: 'nowhere',
      cacheRoot: join(root, 'cache'),
      outDir: join(root, 'runs'),
      fetcher,
    })
    expect(summary).toEqual({ ok: 0, updated: 0, failed: 0, outFile: null })
  })
})

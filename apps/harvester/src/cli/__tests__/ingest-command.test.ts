import { beforeEach, describe, expect, it, vi } from 'vitest'
import { MemoryDocumentStore } from '@regwatch/db/testing'
import { FetchError } from '../../errors.js'
import type { FetchResponse } from '../../fetch/index.js'
import type { PageFetcher } from '../../ingest/index.js'
import { runBackfillCommand, runIngestCommand } from '../commands/ingest.js'

const FEED_URL = 'https://example.gov/feed.xml'

const FEED = `<?xml version="1.0"?><rss version="2.0"><channel><title>News</title>
<item><title>Rule proposed</title><link>https://example.gov/r/1</link><description>Comment period opens</description></item>
<item><title>Rule adopted</title><link>https://example.gov/r/2</link><description>Effective next month</description></item>
</channel></rss>`

describe('ingest command', () => {
  let store: MemoryDocumentStore
  const log = vi.spyOn(console, 'log').mockImplementation(() => undefined)

  beforeEach(() => {
    store = new MemoryDocumentStore()
    log.mockClear()
  })

  it('prints one line per source and a summary', async () => {
    await store.upsertSource({ name: 'Agency feed', url: FEED_URL, type: 'feed' })
    await store.upsertSource({ name: 'Paused page', url: 'https://example.gov/paused', type: 'html', active: false })
    const response: FetchResponse = {
      url: FEED_URL,
      status: 200,
      contentType: 'application/rss+xml',
      headers: {},
      body: FEED,
      attempts: 1,
      durationMs: 0,
    }
    const fetcher: PageFetcher = { get: vi.fn(async () => response) }

    expect(await runIngestCommand({ all: false }, { store, fetcher })).toBe(0)
    expect(log.mock.calls).toEqual([
      ['[skipped] #2 Paused page (inactive)'],
      ['[ok] #1 Agency feed via feed: 2 items (added 2, updated 0, unchanged 0, removed 0)'],
      ['Sources: 1 total, 1 ok, 0 failed, 1 skipped'],
    ])
  })

  it('exits 1 when a source fails', async () => {
    await store.upsertSource({ name: 'Agency feed', url: FEED_URL, type: 'feed' })
    const fetcher: PageFetcher = {
      get: vi.fn(async (url: string) => {
        throw new FetchError('HTTP 404 Not Found', { kind: 'http', url, status: 404, attempts: 1 })
      }),
    }

    expect(await runIngestCommand({ all: true }, { store, fetcher })).toBe(1)
    expect(log.mock.calls[0]).toEqual(['[error] #1 Agency feed: FetchError: HTTP 404 Not Found'])
  })
})

describe('backfill command', () => {
  const log = vi.spyOn(console, 'log').mockImplementation(() => undefined)

  it('adds first versions for untracked documents once', async () => {
    const store = new MemoryDocumentStore()
    const source = await store.upsertSource({ name: 'Agency news', url: 'https://example.gov/news', type: 'html' })
    await store.upsertDocument({ sourceId: source.id, url: 'https://example.gov/a', title: 'A', text: 'alpha' })
    await store.upsertDocument({ sourceId: source.id, url: 'https://example.gov/b', title: 'B' })
    log.mockClear()

    expect(await runBackfillCommand({}, { store })).toBe(0)
    expect(log).toHaveBeenLastCalledWith('Backfilled 2 documents: 2 added, 0 seeded, 0 skipped')
    expect(await store.listDocumentsMissingHash()).toEqual([])

    expect(await runBackfillCommand({}, { store })).toBe(0)
    expect(log).toHaveBeenLastCalledWith('Backfilled 0 documents: 0 added, 0 seeded, 0 skipped')
  })
})

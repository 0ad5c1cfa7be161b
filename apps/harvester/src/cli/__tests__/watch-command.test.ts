import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { mkdtemp, readdir, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import type { FetchResponse } from '../../fetch/index.js'
import { WatcherRegistry } from '../../watchers/index.js'
import { runWatchListCommand, runWatchRunAllCommand, runWatchRunCommand } from '../commands/watch.js'

function response(url: string, headers: Record<string, string>, body = ''): FetchResponse {
  return { url, status: 200, contentType: 'text/html', headers, body, attempts: 1, durationMs: 0 }
}

describe('watch commands', () => {
  let root: string
  let registry: WatcherRegistry
  const log = vi.spyOn(console, 'log').mockImplementation(() => undefined)
  const error = vi.spyOn(console, 'error').mockImplementation(() => undefined)
  const fetcher = {
    head: vi.fn(async (url: string) => response(url, { etag: '"v1"' })),
    get: vi.fn(async (url: string) => response(url, {}, '<main><p>Hearing notice</p></main>')),
  }

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'watch-cli-'))
    registry = new WatcherRegistry()
    registry.register({ id: 'tx-news', state: 'tx', url: 'https://tx.example.gov/news', selector: 'main' })
    registry.register({ id: 'co-news', state: 'co', url: 'https://co.example.gov/news' })
    log.mockClear()
    error.mockClear()
  })

  afterEach(async () => {
    await rm(root, { recursive: true, force: true })
  })

  it('lists watchers, optionally by state', async () => {
    expect(await runWatchListCommand({ states: ['TX'] }, { registry })).toBe(0)
    expect(log.mock.calls).toEqual([['tx-news\ttx\thttps://tx.example.gov/news']])
  })

  it('checks one watcher and prints the result', async () => {
    const code = await runWatchRunCommand({ id: 'tx-news' }, { registry, cacheRoot: root, fetcher })

    expect(code).toBe(0)
    const printed: unknown = JSON.parse(String(log.mock.calls[0]?.[0]))
    expect(printed).toMatchObject({
      url: 'https://tx.example.gov/news',
      updated: true,
      diffSummary: '--- previous\n+++ current\n@@ -0,0 +1,1 @@\n+Hearing notice',
      meta: { selector: 'main', signature: 'etag="v1"|lm=|cl=' },
    })
  })

  it('rejects unknown ids and mismatched states', async () => {
    expect(await runWatchRunCommand({ id: '' }, { registry, cacheRoot: root, fetcher })).toBe(2)
    expect(await runWatchRunCommand({ id: 'nope' }, { registry, cacheRoot: root, fetcher })).toBe(2)
    expect(error).toHaveBeenLastCalledWith('Unknown watcher: nope')
    expect(await runWatchRunCommand({ id: 'tx-news', state: 'CO' }, { registry, cacheRoot: root, fetcher })).toBe(2)
    expect(error).toHaveBeenLastCalledWith('Watcher tx-news belongs to tx, not co')
    expect(fetcher.head).not.toHaveBeenCalled()
  })

  it('runs every matching watcher into a JSONL file', async () => {
    const out = join(root, 'runs')
    const code = await runWatchRunAllCommand(
      { states: [], out, concurrency: 2 },
      { registry, cacheRoot: join(root, 'cache'), fetcher }
    )

    expect(code).toBe(0)
    expect(await readdir(out)).toHaveLength(1)
    expect(log.mock.calls).toHaveLength(3)
    expect(String(log.mock.calls[2]?.[0])).toMatch(/^Watchers: 2 ok, 2 updated, 0 failed → /)
  })
})

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { existsSync } from 'node:fs'
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { FetchError } from '../../errors.js'
import type { FetchResponse } from '../../fetch/index.js'
import { SiteWatcher, bodySignature, headerSignature } from '../site-watcher.js'
import type { WatcherDefinition } from '../types.js'

const URL_UNDER_WATCH = 'https://example.gov/news'

function response(headers: Record<string, string>, body = ''): FetchResponse {
  return { url: URL_UNDER_WATCH, status: 200, contentType: 'text/html', headers, body, attempts: 1, durationMs: 0 }
}

const definition: WatcherDefinition = { id: 'example-news', state: 'us', url: URL_UNDER_WATCH, selector: 'main' }

describe('signatures', () => {
  it('joins caching headers', () => {
    expect(headerSignature({ etag: '"v1"', 'last-modified': 'Tue, 05 Mar 2024 14:00:00 GMT' })).toBe(
      'etag="v1"|lm=Tue, 05 Mar 2024 14:00:00 GMT|cl='
    )
    expect(headerSignature({ 'content-length': '512' })).toBe('etag=|lm=|cl=512')
    expect(headerSignature({ 'content-type': 'text/html' })).toBeNull()
  })

  it('hashes the body with SHA-256', () => {
    expect(bodySignature('abc')).toBe('sha256=ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad')
  })
})

describe('SiteWatcher', () => {
  let cacheRoot: string
  const fetcher = { head: vi.fn(), get: vi.fn() }
  const now = () => new Date('2024-03-05T14:00:00Z')

  beforeEach(async () => {
    cacheRoot = await mkdtemp(join(tmpdir(), 'watchers-'))
    fetcher.head.mockReset()
    fetcher.get.mockReset()
  })

  afterEach(async () => {
    await rm(cacheRoot, { recursive: true, force: true })
  })

  it('stores the header signature and selected content on first check', async () => {
    fetcher.head.mockResolvedValue(response({ etag: '"v1"' }))
    fetcher.get.mockResolvedValue(response({}, '<html><body><nav>Menu</nav><main><p>Alpha</p></main></body></html>'))
    const watcher = new SiteWatcher(definition, { cacheRoot, fetcher, now })

    const result = await watcher.check()

    expect(result).toEqual({
      url: URL_UNDER_WATCH,
      updated: true,
      diffSummary: ['--- previous', '+++ current', '@@ -0,0 +1,1 @@', '+Alpha'].join('\n'),
      meta: { contentType: 'html', selector: 'main', signature: 'etag="v1"|lm=|cl=', fetchedAt: '2024-03-05T14:00:00.000Z' },
    })
    expect(JSON.parse(await readFile(join(cacheRoot, 'example-news', 'last_signature.json'), 'utf8'))).toEqual({
      signature: 'etag="v1"|lm=|cl=',
    })
    expect(await readFile(join(cacheRoot, 'example-news', 'last_content.txt'), 'utf8')).toBe('Alpha')
  })

  it('reports no change without downloading when the signature matches', async () => {
    fetcher.head.mockResolvedValue(response({ etag: '"v1"' }))
    fetcher.get.mockResolvedValue(response({}, '<main>Alpha</main>'))
    const watcher = new SiteWatcher(definition, { cacheRoot, fetcher, now })
    await watcher.check()

    const second = await watcher.check()

    expect(second.updated).toBe(false)
    expect(second.diffSummary).toBe('No change')
    expect(fetcher.get).toHaveBeenCalledTimes(1)
  })

  it('diffs the selected text against the previous content', async () => {
    const watcher = new SiteWatcher(definition, { cacheRoot, fetcher, now })
    fetcher.head.mockResolvedValueOnce(response({ etag: '"v1"' }))
    fetcher.get.mockResolvedValueOnce(response({}, '<main><p>Alpha</p></main>'))
    await watcher.check()

    fetcher.head.mockResolvedValueOnce(response({ etag: '"v2"' }))
    fetcher.get.mockResolvedValueOnce(response({}, '<main><p>Beta</p></main>'))
    const result = await watcher.check()

    expect(result.updated).toBe(true)
    expect(result.diffSummary).toBe(['--- previous', '+++ current', '@@ -1,1 +1,1 @@', '-Alpha', '+Beta'].join('\n'))
  })

  it('hashes the body once when the server sends no caching headers', async () => {
    const body = '<main>Alpha</main>'
    fetcher.head.mockResolvedValue(response({ 'content-type': 'text/html' }))
    fetcher.get.mockResolvedValue(response({}, body))

    const result = await new SiteWatcher(definition, { cacheRoot, fetcher, now }).check()

    expect(result.meta.signature).toBe(bodySignature(body))
    expect(fetcher.get).toHaveBeenCalledTimes(1)
  })

  it('falls back to GET when HEAD is not allowed', async () => {
    fetcher.head.mockRejectedValue(
      new FetchError('HTTP 405 Method Not Allowed', { kind: 'http', url: URL_UNDER_WATCH, status: 405, attempts: 1 })
    )
    fetcher.get.mockResolvedValue(response({}, '<main>Alpha</main>'))

    const result = await new SiteWatcher(definition, { cacheRoot, fetcher, now }).check()

    expect(result.updated).toBe(true)
    expect(result.meta.signature).toBe(bodySignature('<main>Alpha</main>'))
  })

  it('reports signature failures without throwing', async () => {
    fetcher.head.mockRejectedValue(
      new FetchError('connect ECONNREFUSED', { kind: 'network', url: URL_UNDER_WATCH, attempts: 4 })
    )

    const result = await new SiteWatcher(definition, { cacheRoot, fetcher, now }).check()

    expect(result).toEqual({
      url: URL_UNDER_WATCH,
      updated: false,
      diffSummary: 'Error getting signature: connect ECONNREFUSED',
      error: 'connect ECONNREFUSED',
      meta: { contentType: 'html', selector: 'main', signature: '', fetchedAt: null },
    })
    expect(fetcher.get).not.toHaveBeenCalled()
  })

  it('force clears only its own cache directory', async () => {
    const neighbour = join(cacheRoot, 'other-site')
    await mkdir(neighbour, { recursive: true })
    await writeFile(join(neighbour, 'last_signature.json'), JSON.stringify({ signature: 'etag="x"|lm=|cl=' }))

    fetcher.head.mockResolvedValue(response({ etag: '"v1"' }))
    fetcher.get.mockResolvedValue(response({}, '<main>Alpha</main>'))
    const watcher = new SiteWatcher(definition, { cacheRoot, fetcher, now })
    await watcher.check()

    const forced = await watcher.check({ force: true })

    expect(forced.updated).toBe(true)
    expect(existsSync(join(neighbour, 'last_signature.json'))).toBe(true)
  })

  it('lets the caller override the selector', async () => {
    fetcher.head.mockResolvedValue(response({ etag: '"v1"' }))
    fetcher.get.mockResolvedValue(response({}, '<main>Alpha</main><article>Notice</article>'))

    const result = await new SiteWatcher(definition, { cacheRoot, fetcher, now }).check({ selector: 'article' })

    expect(result.meta.selector).toBe('article')
    expect(await readFile(join(cacheRoot, 'example-news', 'last_content.txt'), 'utf8')).toBe('Notice')
  })
})

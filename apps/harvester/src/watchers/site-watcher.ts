/**
 * Site watcher
 *
 * Cheap change detection for one page. The signature comes from caching
 * headers on a HEAD request when the server sends any, else from a SHA-256
 * of the body. Each watcher keeps its state in `<cacheRoot>/<id>/` and
 * touches nothing outside it.
 */

import { createHash } from 'node:crypto'
import { mkdir, readFile, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { z } from 'zod'
import type { ILogger } from '@regwatch/logger'
import { logger } from '../config/logger.js'
import { FetchError, errorMessage } from '../errors.js'
import { selectText } from '../extract/index.js'
import { safeJsonParse } from '../extract/json.js'
import { DEFAULT_HTTP_CLIENT_CONFIG, getHttpFetcher, type HttpClientConfig } from '../fetch/index.js'
import { diffSummary } from '../tracking/index.js'
import type { CheckMeta, CheckOptions, CheckResult, WatcherDefinition, WatcherFetcher } from './types.js'

export const SIGNATURE_FILE = 'last_signature.json'
export const CONTENT_FILE = 'last_content.txt'

const signatureFileSchema = z.object({ signature: z.string() })

/** Servers that refuse HEAD get a GET-based signature instead. */
const HEAD_UNSUPPORTED = new Set([405, 501])

export interface SiteWatcherOptions {
  cacheRoot: string
  fetcher?: WatcherFetcher
  http?: HttpClientConfig
  now?: () => Date
  log?: ILogger
}

interface Signature {
  value: string
  /** Body fetched while computing the signature, reused for content. */
  body: string | null
}

export function headerSignature(headers: Readonly<Record<string, string>>): string | null {
  const etag = headers['etag'] ?? ''
  const lastModified = headers['last-modified'] ?? ''
  const contentLength = headers['content-length'] ?? ''
  if (!etag && !lastModified && !contentLength) return null
  return `etag=${etag}|lm=${lastModified}|cl=${contentLength}`
}

export function bodySignature(body: string): string {
  return `sha256=${createHash('sha256').update(body, 'utf8').digest('hex')}`
}

export class SiteWatcher {
  readonly cacheDir: string
  private readonly fetcher: WatcherFetcher
  private readonly http: HttpClientConfig
  private readonly now: () => Date
  private readonly log: ILogger

  constructor(
    readonly definition: WatcherDefinition,
    options: SiteWatcherOptions
  ) {
    this.cacheDir = join(options.cacheRoot, definition.id)
    this.fetcher = options.fetcher ?? getHttpFetcher()
    this.http = options.http ?? DEFAULT_HTTP_CLIENT_CONFIG
    this.now = options.now ?? (() => new Date())
    this.log = (options.log ?? logger.watchers).child({ watcherId: definition.id })
  }

  get id(): string {
    return this.definition.id
  }

  /**
   * Compare the page's current signature with the cached one. Fetch
   * failures come back as a result with `updated: false` and an `error`.
   */
  async check(options: CheckOptions = {}): Promise<CheckResult> {
    const selector = options.selector ?? this.definition.selector ?? null
    const url = this.definition.url

    if (options.force) {
      await this.clearCache()
    }
    await mkdir(this.cacheDir, { recursive: true })

    let signature: Signature
    try {
      signature = await this.computeSignature()
    } catch (error) {
      return this.failure(`Error getting signature: ${errorMessage(error)}`, error, { selector, signature: '' })
    }

    const previous = await this.readSignature()
    if (signature.value === previous) {
      return {
        url,
        updated: false,
        diffSummary: 'No change',
        meta: this.meta(selector, signature.value),
      }
    }

    let body = signature.body
    if (body === null) {
      try {
        body = (await this.fetcher.get(url, this.http)).body
      } catch (error) {
        return this.failure(`Error downloading page: ${errorMessage(error)}`, error, {
          selector,
          signature: signature.value,
        })
      }
    }

    const content = selectText(body, selector)
    const previousContent = await this.readContent()
    await writeFile(join(this.cacheDir, SIGNATURE_FILE), JSON.stringify({ signature: signature.value }), 'utf8')
    await writeFile(join(this.cacheDir, CONTENT_FILE), content, 'utf8')

    const summary = diffSummary(previousContent, content) || 'Signature changed; content unchanged'
    this.log.info('WATCHER_UPDATED', { signature: signature.value })
    return { url, updated: true, diffSummary: summary, meta: this.meta(selector, signature.value) }
  }

  /** Removes this watcher's directory only. */
  async clearCache(): Promise<void> {
    await rm(this.cacheDir, { recursive: true, force: true })
    this.log.debug('WATCHER_CACHE_CLEARED', { cacheDir: this.cacheDir })
  }

  private async computeSignature(): Promise<Signature> {
    try {
      const head = await this.fetcher.head(this.definition.url, this.http)
      const fromHeaders = headerSignature(head.headers)
      if (fromHeaders) {
        return { value: fromHeaders, body: null }
      }
    } catch (error) {
      if (error instanceof FetchError && error.status !== undefined && HEAD_UNSUPPORTED.has(error.status)) {
        this.log.debug('WATCHER_HEAD_UNSUPPORTED', { status: error.status })
      } else {
        throw error
      }
    }

    const response = await this.fetcher.get(this.definition.url, this.http)
    return { value: bodySignature(response.body), body: response.body }
  }

  private async readSignature(): Promise<string> {
    const raw = await this.readCacheFile(SIGNATURE_FILE)
    if (raw === null) return ''
    const json = safeJsonParse(raw)
    const parsed = json.ok ? signatureFileSchema.safeParse(json.value) : null
    if (parsed?.success) return parsed.data.signature
    this.log.warn('WATCHER_SIGNATURE_UNREADABLE', { file: SIGNATURE_FILE })
    return ''
  }

  private async readContent(): Promise<string> {
    return (await this.readCacheFile(CONTENT_FILE)) ?? ''
  }

  private async readCacheFile(name: string): Promise<string | null> {
    try {
      return await readFile(join(this.cacheDir, name), 'utf8')
    } catch (error) {
      if (isMissingFile(error)) return null
      throw error
    }
  }

  private meta(selector: string | null, signature: string): CheckMeta {
    return { contentType: 'html', selector, signature, fetchedAt: this.now().toISOString() }
  }

  private failure(summary: string, error: unknown, meta: { selector: string | null; signature: string }): CheckResult {
    this.log.warn('WATCHER_CHECK_FAILED', { summary }, error)
    return {
      url: this.definition.url,
      updated: false,
      diffSummary: summary,
      error: errorMessage(error),
      meta: { contentType: 'html', selector: meta.selector, signature: meta.signature, fetchedAt: null },
    }
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

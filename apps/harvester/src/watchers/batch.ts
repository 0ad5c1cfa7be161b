/**
 * Watcher batch runner
 *
 * Runs a filtered set of watchers on a bounded pool and appends one JSON
 * line per watcher to `<outDir>/scrape_<timestamp>.jsonl` as each finishes.
 */

import { once } from 'node:events'
import { createWriteStream } from 'node:fs'
import { mkdir } from 'node:fs/promises'
import { join } from 'node:path'
import pLimit from 'p-limit'
import { logger } from '../config/logger.js'
import { describeError } from '../errors.js'
import type { HttpClientConfig } from '../fetch/index.js'
import { SiteWatcher } from './site-watcher.js'
import type { CheckResult, WatcherDefinition, WatcherFetcher } from './types.js'

export const DEFAULT_WATCH_CONCURRENCY = 8

export interface WatcherFilters {
  states?: readonly string[]
  /** Case-insensitive substring of the watcher id. */
  pattern?: string
  /** 0 or unset means no limit. */
  limit?: number
}

export interface BatchOptions extends WatcherFilters {
  cacheRoot: string
  outDir: string
  concurrency?: number
  force?: boolean
  /** Only updated or failed records reach `onRecord`; the file gets all. */
  onlyUpdated?: boolean
  onRecord?: (record: BatchRecord) => void
  fetcher?: WatcherFetcher
  http?: HttpClientConfig
  now?: () => Date
}

export interface BatchRecord {
  watcherId: string
  state: string
  runAt: string
  ok: boolean
  error?: string
  result?: CheckResult
}

export interface BatchSummary {
  ok: number
  updated: number
  failed: number
  outFile: string | null
}

export function filterWatchers(watchers: readonly WatcherDefinition[], filters: WatcherFilters): WatcherDefinition[] {
  let selected = [...watchers]
  if (filters.states && filters.states.length > 0) {
    const wanted = new Set(filters.states.map((state) => state.toLowerCase()))
    selected = selected.filter((watcher) => wanted.has(watcher.state))
  }
  if (filters.pattern) {
    const pattern = filters.pattern.toLowerCase()
    selected = selected.filter((watcher) => watcher.id.includes(pattern))
  }
  if (filters.limit && filters.limit > 0) {
    selected = selected.slice(0, filters.limit)
  }
  return selected
}

/** Compact UTC stamp, e.g. 20240305T140000Z. */
export function runStamp(date: Date): string {
  return date.toISOString().replace(/[-:]/g, '').replace(/\.\d{3}/, '')
}

/**
 * Returns `outFile: null` when no watcher matched the filters.
 */
export async function runWatchers(watchers: readonly WatcherDefinition[], options: BatchOptions): Promise<BatchSummary> {
  const log = logger.watchers
  const now = options.now ?? (() => new Date())
  const selected = filterWatchers(watchers, options)
  if (selected.length === 0) {
    log.info('WATCH_BATCH_EMPTY', { states: options.states?.join(','), pattern: options.pattern })
    return { ok: 0, updated: 0, failed: 0, outFile: null }
  }

  await mkdir(options.outDir, { recursive: true })
  const runAt = runStamp(now())
  const outFile = join(options.outDir, `scrape_${runAt}.jsonl`)
  const out = createWriteStream(outFile, { encoding: 'utf8' })

  const summary: BatchSummary = { ok: 0, updated: 0, failed: 0, outFile }
  const limit = pLimit(options.concurrency ?? DEFAULT_WATCH_CONCURRENCY)

  log.info('WATCH_BATCH_START', { watchers: selected.length, outFile })

  const runOne = async (definition: WatcherDefinition): Promise<void> => {
    const watcher = new SiteWatcher(definition, {
      cacheRoot: options.cacheRoot,
      fetcher: options.fetcher,
      http: options.http,
      now,
    })

    let record: BatchRecord
    try {
      const result = await watcher.check({ force: options.force })
      record = result.error
        ? { watcherId: definition.id, state: definition.state, runAt, ok: false, error: result.error, result }
        : { watcherId: definition.id, state: definition.state, runAt, ok: true, result }
    } catch (error) {
      record = { watcherId: definition.id, state: definition.state, runAt, ok: false, error: describeError(error) }
    }

    if (record.ok) summary.ok++
    else summary.failed++
    if (record.result?.updated) summary.updated++

    out.write(`${JSON.stringify(record)}\n`)
    if (!options.onlyUpdated || record.result?.updated || !record.ok) {
      options.onRecord?.(record)
    }
  }

  try {
    await Promise.all(selected.map((definition) => limit(() => runOne(definition))))
  } finally {
    out.end()
    await once(out, 'finish')
  }

  log.info('WATCH_BATCH_COMPLETE', { ok: summary.ok, updated: summary.updated, failed: summary.failed, outFile })
  return summary
}

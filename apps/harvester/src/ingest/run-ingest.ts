/**
 * Batch orchestrator
 *
 * One pass over the configured sources. Sources run independently on a
 * bounded pool; a failing source is reported and the batch goes on. No
 * retries beyond the fetch layer's own.
 */

import pLimit from 'p-limit'
import type { DocumentStore } from '@regwatch/db'
import type { ILogger } from '@regwatch/logger'
import { logger } from '../config/logger.js'
import type { DateOptions } from '../extract/index.js'
import { DEFAULT_HTTP_CLIENT_CONFIG, getHttpFetcher, type HttpClientConfig } from '../fetch/index.js'
import { ChangeTracker } from '../tracking/index.js'
import { ingestSource, skippedReport } from './ingest-source.js'
import type { IngestContext, PageFetcher, SourceReport, Stats } from './types.js'

export const DEFAULT_INGEST_CONCURRENCY = 4

export interface RunIngestDeps {
  store: DocumentStore
  fetcher?: PageFetcher
  tracker?: ChangeTracker
  http?: HttpClientConfig
  dates?: DateOptions
  concurrency?: number
  trackRemovals?: boolean
  /** Called as each source finishes, in completion order. */
  onResult?: (report: SourceReport) => void
  log?: ILogger
}

export function summarize(perSource: SourceReport[]): Stats {
  return {
    total: perSource.filter((report) => report.status !== 'skipped').length,
    ok: perSource.filter((report) => report.status === 'ok' || report.status === 'empty').length,
    errors: perSource.filter((report) => report.status === 'error').length,
    skipped: perSource.filter((report) => report.status === 'skipped').length,
    perSource,
  }
}

/**
 * Ingest every source once. With `onlyActive`, inactive sources are listed
 * as skipped instead of fetched. `perSource` keeps source id order.
 */
export async function runIngestOnce(onlyActive: boolean, deps: RunIngestDeps): Promise<Stats> {
  const log = deps.log ?? logger.ingest
  const ctx: IngestContext = {
    store: deps.store,
    tracker: deps.tracker ?? new ChangeTracker(deps.store),
    fetcher: deps.fetcher ?? getHttpFetcher(),
    http: deps.http ?? DEFAULT_HTTP_CLIENT_CONFIG,
    dates: deps.dates ?? {},
    trackRemovals: deps.trackRemovals ?? false,
    log,
  }

  const sources = await deps.store.listSources()
  const started = Date.now()
  log.info('INGEST_CYCLE_START', { sources: sources.length, onlyActive })

  const limit = pLimit(deps.concurrency ?? DEFAULT_INGEST_CONCURRENCY)
  const emit = (report: SourceReport): SourceReport => {
    deps.onResult?.(report)
    return report
  }

  const perSource = await Promise.all(
    sources.map((source) => {
      if (onlyActive && !source.active) {
        return Promise.resolve(emit(skippedReport(source)))
      }
      return limit(async () => emit(await ingestSource(source, ctx)))
    })
  )

  const stats = summarize(perSource)
  log.info('INGEST_CYCLE_COMPLETE', {
    total: stats.total,
    ok: stats.ok,
    errors: stats.errors,
    skipped: stats.skipped,
    durationMs: Date.now() - started,
  })
  return stats
}

import type { DocumentStore, SourceRecord } from '@regwatch/db'
import type { ILogger } from '@regwatch/logger'
import type { ChainResult, DateOptions, StrategyName } from '../extract/index.js'
import type { FetchResponse, HttpClientConfig } from '../fetch/index.js'
import type { ChangeTracker } from '../tracking/index.js'

export type SourceStatus = 'ok' | 'empty' | 'error' | 'skipped'

export interface SourceReport {
  sourceId: number
  source: string
  type: string
  url: string
  ok: boolean
  status: SourceStatus
  /** "<ErrorName>: <message>"; also set for benign empty results. */
  error: string | null
  /** Strategy that produced the result, null when nothing ran. */
  strategy: StrategyName | null
  items: number
  added: number
  updated: number
  unchanged: number
  removed: number
}

export interface Stats {
  /** Sources actually run; skipped ones are counted only in `skipped`. */
  total: number
  ok: number
  errors: number
  skipped: number
  perSource: SourceReport[]
}

/** The part of HttpFetcher extractors need. */
export interface PageFetcher {
  get(url: string, config: HttpClientConfig): Promise<FetchResponse>
}

export interface IngestContext {
  store: DocumentStore
  tracker: ChangeTracker
  fetcher: PageFetcher
  http: HttpClientConfig
  dates: DateOptions
  trackRemovals: boolean
  log: ILogger
}

export interface ExtractorStrategy {
  /** Fetch the source once and run its extraction chain. */
  extract(source: SourceRecord, ctx: IngestContext): Promise<ChainResult>
}

import type { FetchResponse, HttpClientConfig } from '../fetch/index.js'

export interface WatcherDefinition {
  id: string
  /** Lower-case jurisdiction code, "us" for federal sites. */
  state: string
  url: string
  selector?: string
}

export interface WatcherFetcher {
  get(url: string, config: HttpClientConfig): Promise<FetchResponse>
  head(url: string, config: HttpClientConfig): Promise<FetchResponse>
}

export interface CheckOptions {
  /** Drop this watcher's cache before checking. */
  force?: boolean
  /** Overrides the watcher's own selector. */
  selector?: string | null
}

export interface CheckMeta {
  contentType: 'html'
  selector: string | null
  signature: string
  /** ISO timestamp; null when nothing was fetched. */
  fetchedAt: string | null
}

export interface CheckResult {
  url: string
  updated: boolean
  diffSummary: string
  error?: string
  meta: CheckMeta
}

/**
 * Fetch layer types.
 *
 * Configuration is an immutable value built once and passed into every
 * call; the fetcher itself keeps nothing between calls.
 */

// ═══════════════════════════════════════════════════════════════════════════════
// Retry Policy
// ═══════════════════════════════════════════════════════════════════════════════

export interface RetryPolicy {
  /** Total attempts, first try included. */
  readonly maxAttempts: number
  readonly initialDelayMs: number
  readonly maxDelayMs: number
  readonly backoffMultiplier: number
  readonly retryableStatusCodes: readonly number[]
}

/**
 * Three retries after the first attempt, waiting 500ms, 1s, 2s.
 */
export const DEFAULT_RETRY_POLICY: RetryPolicy = Object.freeze({
  maxAttempts: 4,
  initialDelayMs: 500,
  maxDelayMs: 8_000,
  backoffMultiplier: 2,
  retryableStatusCodes: Object.freeze([429, 500, 502, 503, 504]),
})

// ═══════════════════════════════════════════════════════════════════════════════
// Client Configuration
// ═══════════════════════════════════════════════════════════════════════════════

/** Only idempotent methods are ever issued, so every attempt is safe to repeat. */
export type HttpMethod = 'GET' | 'HEAD'

export interface HttpClientConfig {
  readonly userAgent: string
  readonly headers: Readonly<Record<string, string>>
  readonly timeoutMs: number
  readonly maxSizeBytes: number
  readonly retryPolicy: RetryPolicy
}

export const DEFAULT_FETCH_HEADERS = {
  Accept: 'application/rss+xml, application/atom+xml, application/xml;q=0.9, text/html;q=0.8, */*;q=0.5',
  'Accept-Language': 'en-US,en;q=0.9',
} as const

export const DEFAULT_USER_AGENT = 'regwatch/0.1 (+https://example.org/regwatch)'

// ═══════════════════════════════════════════════════════════════════════════════
// Responses
// ═══════════════════════════════════════════════════════════════════════════════

export interface FetchResponse {
  /** URL after redirects. */
  url: string
  status: number
  /** Lower-cased Content-Type header, '' when absent. */
  contentType: string
  /** Response headers with lower-cased names. */
  headers: Readonly<Record<string, string>>
  /** Decoded body; always '' for HEAD. */
  body: string
  attempts: number
  durationMs: number
}

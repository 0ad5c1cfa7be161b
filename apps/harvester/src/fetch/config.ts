import {
  DEFAULT_FETCH_HEADERS,
  DEFAULT_RETRY_POLICY,
  DEFAULT_USER_AGENT,
  type HttpClientConfig,
  type RetryPolicy,
} from './types.js'

export interface HttpClientConfigOverrides {
  userAgent?: string
  headers?: Record<string, string>
  timeoutMs?: number
  maxSizeBytes?: number
  retryPolicy?: Partial<RetryPolicy>
}

/**
 * Build a frozen client configuration. Header overrides merge over the
 * defaults; retry overrides merge over DEFAULT_RETRY_POLICY.
 */
export function createHttpClientConfig(overrides: HttpClientConfigOverrides = {}): HttpClientConfig {
  const retryPolicy: RetryPolicy = Object.freeze({
    ...DEFAULT_RETRY_POLICY,
    ...overrides.retryPolicy,
    retryableStatusCodes: Object.freeze([
      ...(overrides.retryPolicy?.retryableStatusCodes ?? DEFAULT_RETRY_POLICY.retryableStatusCodes),
    ]),
  })

  return Object.freeze({
    userAgent: overrides.userAgent ?? DEFAULT_USER_AGENT,
    headers: Object.freeze({ ...DEFAULT_FETCH_HEADERS, ...overrides.headers }),
    timeoutMs: overrides.timeoutMs ?? 30_000,
    maxSizeBytes: overrides.maxSizeBytes ?? 10 * 1024 * 1024,
    retryPolicy,
  })
}

export const DEFAULT_HTTP_CLIENT_CONFIG = createHttpClientConfig()

/**
 * HTTP fetcher
 *
 * Native fetch with timeout, body size limit and bounded retries. Retries
 * cover network errors, timeouts and the policy's retryable status codes;
 * anything else, and exhausted retries, surface as FetchError.
 *
 * TLS verification is Node's default and cannot be turned off here.
 */

import type { ILogger } from '@regwatch/logger'
import { logger } from '../config/logger.js'
import { sanitizeUrl } from '../config/structured-log.js'
import { FetchError, errorMessage, type FetchErrorKind } from '../errors.js'
import { DEFAULT_HTTP_CLIENT_CONFIG } from './config.js'
import type { FetchResponse, HttpClientConfig, HttpMethod, RetryPolicy } from './types.js'

export interface HttpFetcherOptions {
  /** Injected for tests; defaults to setTimeout. */
  sleep?: (ms: number) => Promise<void>
  log?: ILogger
}

type AttemptOutcome =
  | { ok: true; response: FetchResponse }
  | { ok: false; kind: FetchErrorKind; status?: number; message: string; retryable: boolean; cause?: unknown }

/**
 * Delay before retry number `attempt` (1-based).
 */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.initialDelayMs * Math.pow(policy.backoffMultiplier, attempt - 1), policy.maxDelayMs)
}

export class HttpFetcher {
  private readonly sleep: (ms: number) => Promise<void>
  private readonly log: ILogger

  constructor(options: HttpFetcherOptions = {}) {
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)))
    this.log = options.log ?? logger.fetch
  }

  async get(url: string, config: HttpClientConfig = DEFAULT_HTTP_CLIENT_CONFIG): Promise<FetchResponse> {
    return this.request('GET', url, config)
  }

  async head(url: string, config: HttpClientConfig = DEFAULT_HTTP_CLIENT_CONFIG): Promise<FetchResponse> {
    return this.request('HEAD', url, config)
  }

  private async request(method: HttpMethod, url: string, config: HttpClientConfig): Promise<FetchResponse> {
    const startTime = Date.now()
    const policy = config.retryPolicy
    const headers: Record<string, string> = { ...config.headers, 'User-Agent': config.userAgent }

    let last: Extract<AttemptOutcome, { ok: false }> | null = null
    let attemptsMade = 0

    for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
      attemptsMade = attempt
      const outcome = await this.attemptOnce(method, url, headers, config, policy)

      if (outcome.ok) {
        return { ...outcome.response, attempts: attempt, durationMs: Date.now() - startTime }
      }

      last = outcome
      if (!outcome.retryable || attempt === policy.maxAttempts) {
        break
      }

      const delayMs = backoffDelay(policy, attempt)
      this.log.warn('FETCH_RETRY', {
        ...sanitizeUrl(url),
        method,
        attempt,
        status: outcome.status,
        reason: outcome.message,
        delayMs,
      })
      await this.sleep(delayMs)
    }

    throw new FetchError(last?.message ?? `${method} ${url} failed`, {
      kind: last?.kind ?? 'network',
      url,
      status: last?.status,
      attempts: attemptsMade,
      cause: last?.cause,
    })
  }

  private retryableStatus(policy: RetryPolicy, status: number): boolean {
    return policy.retryableStatusCodes.includes(status)
  }

  /**
   * Single request, no retries. Never throws.
   */
  private async attemptOnce(
    method: HttpMethod,
    url: string,
    headers: Record<string, string>,
    config: HttpClientConfig,
    policy: RetryPolicy
  ): Promise<AttemptOutcome> {
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), config.timeoutMs)

    try {
      const response = await fetch(url, {
        method,
        headers,
        signal: controller.signal,
        redirect: 'follow',
      })

      if (!response.ok) {
        await response.body?.cancel()
        return {
          ok: false,
          kind: 'http',
          status: response.status,
          message: `HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ''}`,
          retryable: this.retryableStatus(policy, response.status),
        }
      }

      const contentLength = response.headers.get('content-length')
      if (method === 'GET' && contentLength && parseInt(contentLength, 10) > config.maxSizeBytes) {
        await response.body?.cancel()
        return {
          ok: false,
          kind: 'too_large',
          status: response.status,
          message: `Response too large: ${contentLength} bytes`,
          retryable: false,
        }
      }

      const body = method === 'HEAD' ? '' : await readBodyWithLimit(response, config.maxSizeBytes)
      if (body === null) {
        return {
          ok: false,
          kind: 'too_large',
          status: response.status,
          message: 'Response exceeded size limit',
          retryable: false,
        }
      }

      const responseHeaders: Record<string, string> = {}
      response.headers.forEach((value, key) => {
        responseHeaders[key.toLowerCase()] = value
      })

      return {
        ok: true,
        response: {
          url: response.url || url,
          status: response.status,
          contentType: (response.headers.get('content-type') ?? '').toLowerCase(),
          headers: responseHeaders,
          body,
          attempts: 1,
          durationMs: 0,
        },
      }
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        return {
          ok: false,
          kind: 'timeout',
          message: `Request timed out after ${config.timeoutMs}ms`,
          retryable: true,
          cause: error,
        }
      }
      return { ok: false, kind: 'network', message: errorMessage(error), retryable: true, cause: error }
    } finally {
      clearTimeout(timeoutId)
    }
  }
}

/**
 * Read a response body, giving up once it exceeds `maxBytes`.
 * Returns null when the limit is hit.
 */
async function readBodyWithLimit(response: Response, maxBytes: number): Promise<string | null> {
  const reader = response.body?.getReader()
  if (!reader) {
    return ''
  }

  const chunks: Uint8Array[] = []
  let totalSize = 0

  try {
    while (true) {
      const { done, value } = await reader.read()
      if (done) break

      totalSize += value.length
      if (totalSize > maxBytes) {
        await reader.cancel()
        return null
      }

      chunks.push(value)
    }

    return new TextDecoder('utf-8').decode(Buffer.concat(chunks))
  } finally {
    reader.releaseLock()
  }
}

let defaultFetcher: HttpFetcher | null = null

export function getHttpFetcher(): HttpFetcher {
  if (!defaultFetcher) {
    defaultFetcher = new HttpFetcher()
  }
  return defaultFetcher
}

/**
 * @regwatch/redis - shared Redis connection for the scheduler queue and
 * cycle locks.
 *
 * Always go through this package instead of constructing ioredis clients
 * directly so BullMQ and lock callers share the same retry settings.
 */

import { Redis, type RedisOptions } from 'ioredis'
import { createLogger } from '@regwatch/logger'

const log = createLogger('redis')

// =============================================================================
// Configuration Parsing
// =============================================================================

export interface RedisEndpoint {
  host: string
  port: number
  password: string | undefined
}

/**
 * Resolve host/port/password from REDIS_URL, or from REDIS_HOST, REDIS_PORT
 * and REDIS_PASSWORD when no URL is set or it does not parse.
 */
export function resolveRedisEndpoint(env: NodeJS.ProcessEnv = process.env): RedisEndpoint {
  const redisUrl = env.REDIS_URL

  if (redisUrl) {
    try {
      const url = new URL(redisUrl)
      return {
        host: url.hostname,
        port: parseInt(url.port || '6379', 10),
        password: url.password ? decodeURIComponent(url.password) : undefined,
      }
    } catch {
      log.warn('Failed to parse REDIS_URL, falling back to REDIS_HOST/PORT')
    }
  }

  return {
    host: env.REDIS_HOST || 'localhost',
    port: parseInt(env.REDIS_PORT || '6379', 10),
    password: env.REDIS_PASSWORD || undefined,
  }
}

const endpoint = resolveRedisEndpoint()
const redisLogInfo = `${endpoint.host}:${endpoint.port}`

// =============================================================================
// Connection Options
// =============================================================================

const RECONNECT_ERRORS = ['READONLY', 'ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'EHOSTUNREACH', 'ENETUNREACH', 'ENOTFOUND']
const CIRCUIT_BREAKER_ATTEMPTS = 20

let consecutiveFailures = 0
let lastCircuitBreakerLog = 0

/**
 * Reconnect delay: 500ms per attempt, capped at 30s. Past the circuit
 * breaker threshold the outage is logged at most once a minute.
 */
export function reconnectDelay(times: number, now = Date.now()): number {
  consecutiveFailures = times

  if (times > CIRCUIT_BREAKER_ATTEMPTS) {
    if (now - lastCircuitBreakerLog > 60_000) {
      lastCircuitBreakerLog = now
      log.error('Circuit breaker: prolonged outage', { attempts: times, connection: redisLogInfo })
    }
    return 30_000
  }

  const delay = Math.min(times * 500, 30_000)
  log.info('Reconnecting', { attempt: times, delayMs: delay })
  return delay
}

export const redisConnection: RedisOptions = {
  host: endpoint.host,
  port: endpoint.port,
  password: endpoint.password,

  // BullMQ workers require null here
  maxRetriesPerRequest: null,

  keepAlive: 10_000,
  connectTimeout: 10_000,
  commandTimeout: 30_000,
  enableOfflineQueue: true,

  retryStrategy: (times: number) => reconnectDelay(times),

  reconnectOnError(err: Error) {
    if (RECONNECT_ERRORS.some((code) => err.message.includes(code))) {
      if (consecutiveFailures <= CIRCUIT_BREAKER_ATTEMPTS) {
        log.warn('Reconnecting due to error', { error: err.message })
      }
      return true
    }
    return false
  },
}

// =============================================================================
// Client Factory Functions
// =============================================================================

let singletonClient: Redis | null = null

/**
 * Lazily created shared client for short commands such as lock calls.
 */
export function getRedisClient(): Redis {
  if (!singletonClient) {
    singletonClient = new Redis(redisConnection)

    singletonClient.on('error', (err: Error) => {
      log.error('Connection error', { connection: redisLogInfo }, err)
    })

    singletonClient.on('connect', () => {
      consecutiveFailures = 0
      log.info('Connected', { connection: redisLogInfo })
    })
  }
  return singletonClient
}

/**
 * Safe to call when no client was ever created.
 */
export async function disconnectRedis(): Promise<void> {
  if (singletonClient) {
    await singletonClient.quit()
    singletonClient = null
  }
}

export function getRedisConnectionInfo(): string {
  return redisLogInfo
}

export { Redis }
export type { RedisOptions }
export * from './lock.js'

import { randomUUID } from 'node:crypto'
import { createLogger } from '@regwatch/logger'

const log = createLogger('redis').child('lock')

const RELEASE_LUA = `
  if redis.call("get", KEYS[1]) == ARGV[1] then
    return redis.call("del", KEYS[1])
  else
    return 0
  end
`

const EXTEND_LUA = `
  if redis.call("get", KEYS[1]) == ARGV[1] then
    return redis.call("pexpire", KEYS[1], ARGV[2])
  else
    return 0
  end
`

export const DEFAULT_LOCK_TTL_MS = 120_000

/** The two ioredis commands the lock helpers call. */
export interface LockClient {
  set(key: string, value: string, px: 'PX', ttlMs: number, nx: 'NX'): Promise<string | null>
  eval(script: string, numKeys: number, ...args: string[]): Promise<unknown>
}

export interface RedisLockHandle {
  key: string
  token: string
}

/**
 * Acquire a lock with an owner token and TTL.
 * Returns null if the lock is already held.
 */
export async function acquireRedisLock(
  redis: LockClient,
  key: string,
  ttlMs = DEFAULT_LOCK_TTL_MS
): Promise<RedisLockHandle | null> {
  const token = randomUUID()
  const result = await redis.set(key, token, 'PX', ttlMs, 'NX')
  if (result !== 'OK') {
    return null
  }
  return { key, token }
}

/**
 * Release only if the token still matches the current owner.
 */
export async function releaseRedisLock(redis: LockClient, handle: RedisLockHandle): Promise<boolean> {
  const result = await redis.eval(RELEASE_LUA, 1, handle.key, handle.token)
  return Number(result) === 1
}

export async function extendRedisLock(
  redis: LockClient,
  handle: RedisLockHandle,
  ttlMs = DEFAULT_LOCK_TTL_MS
): Promise<boolean> {
  const result = await redis.eval(EXTEND_LUA, 1, handle.key, handle.token, ttlMs.toString())
  return Number(result) === 1
}

export type LockedRun<T> = { acquired: true; value: T } | { acquired: false }

/**
 * Run `fn` while holding `key`. The TTL is renewed every third of its
 * length until `fn` settles; the lock is released afterwards either way.
 */
export async function withRedisLock<T>(
  redis: LockClient,
  key: string,
  fn: () => Promise<T>,
  ttlMs = DEFAULT_LOCK_TTL_MS
): Promise<LockedRun<T>> {
  const handle = await acquireRedisLock(redis, key, ttlMs)
  if (!handle) {
    return { acquired: false }
  }

  const renewal = setInterval(() => {
    extendRedisLock(redis, handle, ttlMs)
      .then((extended) => {
        if (!extended) log.warn('Lock renewal lost ownership', { key })
      })
      .catch((error: unknown) => {
        log.warn('Lock renewal failed', { key }, error)
      })
  }, Math.max(1000, Math.floor(ttlMs / 3)))

  try {
    return { acquired: true, value: await fn() }
  } finally {
    clearInterval(renewal)
    const released = await releaseRedisLock(redis, handle)
    if (!released) {
      log.warn('Lock expired before release', { key })
    }
  }
}

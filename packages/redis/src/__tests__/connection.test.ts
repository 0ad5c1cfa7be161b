import { describe, expect, it } from 'vitest'
import { reconnectDelay, resolveRedisEndpoint } from '../index.js'

describe('resolveRedisEndpoint', () => {
  it('prefers REDIS_URL', () => {
    expect(resolveRedisEndpoint({ REDIS_URL: 'redis://:test%40secret@cache.internal:6380', REDIS_HOST: 'ignored' })).toEqual({
      host: 'cache.internal',
      port: 6380,
      password: 'test@secret',
    })
  })

  it('falls back to host, port and password variables', () => {
    expect(resolveRedisEndpoint({ REDIS_URL: 'not a url', REDIS_HOST: 'redis', REDIS_PASSWORD: 'test-secret' })).toEqual({
      host: 'redis',
      port: 6379,
      password: 'test-secret',
    })
    expect(resolveRedisEndpoint({})).toEqual({ host: 'localhost', port: 6379, password: undefined })
  })
})

describe('reconnectDelay', () => {
  it('grows by 500ms per attempt up to the cap', () => {
    expect(reconnectDelay(1)).toBe(500)
    expect(reconnectDelay(4)).toBe(2000)
    expect(reconnectDelay(20)).toBe(10_000)
    expect(reconnectDelay(21, 0)).toBe(30_000)
  })
})

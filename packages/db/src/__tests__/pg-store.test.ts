import { describe, it, expect, vi } from 'vitest'
import { PgDocumentStore } from '../pg-store.js'
import { PersistenceError } from '../errors.js'

const created = new Date('2024-05-01T00:00:00Z')

function documentRow(overrides: Record<string, unknown> = {}) {
  return {
    id: 11,
    source_id: 3,
    title: 'Final rule',
    url: 'https://example.gov/a',
    published_at: null,
    text: null,
    metadata: { entryId: 'x1' },
    jurisdiction: 'US',
    created_at: created,
    current_hash: null,
    first_seen_at: null,
    last_seen_at: null,
    last_changed_at: null,
    ...overrides,
  }
}

function fakePool() {
  const client = { query: vi.fn(), release: vi.fn() }
  const pool = { query: vi.fn(), connect: vi.fn(async () => client), end: vi.fn(async () => undefined) }
  return { pool, client }
}

describe('PgDocumentStore', () => {
  it('maps the upsert row and reports creation from xmax', async () => {
    const { pool } = fakePool()
    pool.query.mockResolvedValueOnce({ rows: [{ ...documentRow(), inserted: true }] })
    const store = new PgDocumentStore(pool)

    const result = await store.upsertDocument({
      sourceId: 3,
      url: 'https://example.gov/a',
      title: 'Final rule',
      metadata: { entryId: 'x1' },
      jurisdiction: 'US',
    })

    expect(result.created).toBe(true)
    expect(result.document).toMatchObject({ id: 11, sourceId: 3, metadata: { entryId: 'x1' }, jurisdiction: 'US' })
    const [sql, params] = pool.query.mock.calls[0] ?? []
    expect(sql).toContain('ON CONFLICT (url) DO UPDATE')
    expect(params).toEqual([3, 'Final rule', 'https://example.gov/a', null, null, '{"entryId":"x1"}', 'US'])
  })

  it('sends empty metadata as NULL', async () => {
    const { pool } = fakePool()
    pool.query.mockResolvedValueOnce({ rows: [{ ...documentRow({ metadata: null }), inserted: false }] })
    const store = new PgDocumentStore(pool)

    await store.upsertDocument({ sourceId: 3, url: 'https://example.gov/a', metadata: {} })

    expect(pool.query.mock.calls[0]?.[1]).toEqual([3, null, 'https://example.gov/a', null, null, null, null])
  })

  it('wraps unique violations in PersistenceError', async () => {
    const { pool } = fakePool()
    pool.query.mockRejectedValueOnce(
      Object.assign(new Error('duplicate key value'), { code: '23505', constraint: 'sources_name_key' })
    )
    const store = new PgDocumentStore(pool)

    const error = await store.upsertSource({ name: 'x', url: 'https://example.gov', type: 'feed' }).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(PersistenceError)
    expect(error).toMatchObject({ constraint: 'sources_name_key' })
  })

  it('filters active sources in SQL', async () => {
    const { pool } = fakePool()
    pool.query.mockResolvedValueOnce({ rows: [] })
    await new PgDocumentStore(pool).listSources({ onlyActive: true })

    expect(pool.query.mock.calls[0]?.[0]).toBe('SELECT * FROM sources WHERE active ORDER BY id')
  })

  describe('withDocumentLock', () => {
    it('locks the row and commits', async () => {
      const { pool, client } = fakePool()
      client.query
        .mockResolvedValueOnce({ rows: [] }) // BEGIN
        .mockResolvedValueOnce({ rows: [documentRow()] }) // SELECT FOR UPDATE
        .mockResolvedValueOnce({ rows: [{ max: 2 }] })
        .mockResolvedValueOnce({ rows: [] }) // COMMIT
      const store = new PgDocumentStore(pool)

      const max = await store.withDocumentLock(11, (tx) => tx.maxVersionNo())

      expect(max).toBe(2)
      expect(client.query.mock.calls.map((call) => call[0])).toEqual([
        'BEGIN',
        'SELECT * FROM documents WHERE id = $1 FOR UPDATE',
        'SELECT MAX(version_no) AS max FROM document_versions WHERE doc_id = $1',
        'COMMIT',
      ])
      expect(client.release).toHaveBeenCalledTimes(1)
    })

    it('rolls back and rethrows when the callback fails', async () => {
      const { pool, client } = fakePool()
      client.query.mockResolvedValueOnce({ rows: [] }).mockResolvedValueOnce({ rows: [documentRow()] })
      client.query.mockResolvedValue({ rows: [] })
      const store = new PgDocumentStore(pool)

      await expect(
        store.withDocumentLock(11, async () => {
          throw new Error('tracker failed')
        })
      ).rejects.toThrow('tracker failed')

      expect(client.query.mock.calls.at(-1)?.[0]).toBe('ROLLBACK')
      expect(client.release).toHaveBeenCalledTimes(1)
    })

    it('treats an empty max as version 0', async () => {
      const { pool, client } = fakePool()
      client.query
        .mockResolvedValueOnce({ rows: [] })
        .mockResolvedValueOnce({ rows: [documentRow()] })
        .mockResolvedValueOnce({ rows: [{ max: null }] })
        .mockResolvedValueOnce({ rows: [] })

      expect(await new PgDocumentStore(pool).withDocumentLock(11, (tx) => tx.maxVersionNo())).toBe(0)
    })
  })
})

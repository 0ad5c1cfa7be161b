import { describe, it, expect, beforeEach } from 'vitest'
import type { DocumentRecord } from '@regwatch/db'
import { MemoryDocumentStore } from '@regwatch/db/testing'
import { ChangeTracker } from '../change-tracker.js'
import { computeContentHash } from '../hash.js'

const START = Date.UTC(2024, 2, 1)

describe('ChangeTracker', () => {
  let ticks: number
  let store: MemoryDocumentStore
  let tracker: ChangeTracker
  let doc: DocumentRecord

  const clock = () => new Date(START + ticks++ * 60_000)

  beforeEach(async () => {
    ticks = 0
    store = new MemoryDocumentStore(clock)
    tracker = new ChangeTracker(store, { now: clock })
    const source = await store.upsertSource({ name: 'Agency news', url: 'https://example.gov/feed.xml', type: 'feed' })
    ;({ document: doc } = await store.upsertDocument({
      sourceId: source.id,
      url: 'https://example.gov/a',
      title: 'Permit notice',
    }))
  })

  async function reload(): Promise<DocumentRecord> {
    const current = await store.findDocumentByUrl(doc.url)
    if (!current) throw new Error('document vanished')
    return current
  }

  describe('recordVersion', () => {
    it('adds version 1 the first time a document is seen', async () => {
      expect(await tracker.recordVersion(doc, 'Body v1')).toBe('ADDED')

      const versions = await store.listVersions(doc.id)
      expect(versions).toHaveLength(1)
      expect(versions[0]).toMatchObject({
        versionNo: 1,
        changeType: 'ADDED',
        contentHash: computeContentHash('Body v1'),
        title: 'Permit notice',
        snapshot: 'Body v1',
      })

      const current = await reload()
      expect(current.currentHash).toBe(computeContentHash('Body v1'))
      expect(current.firstSeenAt).toEqual(current.lastChangedAt)
      expect(current.lastSeenAt).toEqual(current.firstSeenAt)
    })

    it('is idempotent for unchanged content, ignoring line endings and padding', async () => {
      await tracker.recordVersion(doc, 'Line one\nLine two')
      const first = await reload()

      expect(await tracker.recordVersion(doc, '  Line one\r\nLine two\r\n')).toBe('NOCHANGE')

      const current = await reload()
      expect(await store.listVersions(doc.id)).toHaveLength(1)
      expect(current.currentHash).toBe(first.currentHash)
      expect(current.lastChangedAt).toEqual(first.lastChangedAt)
      expect(current.lastSeenAt?.getTime()).toBeGreaterThan(first.lastSeenAt?.getTime() ?? Infinity)
    })

    it('appends the next version and refreshes the title on change', async () => {
      await tracker.recordVersion(doc, 'Body v1')
      expect(await tracker.recordVersion(doc, 'Body v2', 'Permit notice (amended)')).toBe('UPDATED')

      const versions = await store.listVersions(doc.id)
      expect(versions.map((version) => [version.versionNo, version.changeType])).toEqual([
        [1, 'ADDED'],
        [2, 'UPDATED'],
      ])
      expect(versions[1]?.title).toBe('Permit notice (amended)')

      const current = await reload()
      expect(current.title).toBe('Permit notice (amended)')
      expect(current.currentHash).toBe(computeContentHash('Body v2'))
    })

    it('hashes title and url when there is no text', async () => {
      await tracker.recordVersion(doc, null)
      const current = await reload()
      expect(current.currentHash).toBe(computeContentHash('Permit notice\nhttps://example.gov/a'))
    })

    it('allocates distinct, gapless version numbers under concurrency', async () => {
      await tracker.recordVersion(doc, 'Body v1')

      const results = await Promise.all(
        ['v2', 'v3', 'v4', 'v5', 'v6'].map((label) => tracker.recordVersion(doc, `Body ${label}`))
      )

      expect(results).toEqual(['UPDATED', 'UPDATED', 'UPDATED', 'UPDATED', 'UPDATED'])
      const numbers = (await store.listVersions(doc.id)).map((version) => version.versionNo)
      expect(numbers).toEqual([1, 2, 3, 4, 5, 6])
    })
  })

  describe('recordRemoved', () => {
    it('appends REMOVED after the last version and keeps the hash', async () => {
      await tracker.recordVersion(doc, 'Body v1')
      await tracker.recordVersion(doc, 'Body v2')
      const before = await reload()

      const version = await tracker.recordRemoved(doc, 'absent from source')

      expect(version).toMatchObject({
        versionNo: 3,
        changeType: 'REMOVED',
        contentHash: before.currentHash,
        snapshot: '(Document marked removed: absent from source)',
      })
      const after = await reload()
      expect(after.currentHash).toBe(before.currentHash)
      expect(after.lastChangedAt?.getTime()).toBeGreaterThan(before.lastChangedAt?.getTime() ?? Infinity)
    })

    it('writes nothing for a document that was never tracked', async () => {
      expect(await tracker.recordRemoved(doc)).toBeNull()
      expect(await store.listVersions(doc.id)).toEqual([])

      expect(await tracker.recordVersion(doc, null, 'Permit notice')).toBe('ADDED')
      expect((await store.listVersions(doc.id)).map((v) => [v.versionNo, v.changeType])).toEqual([[1, 'ADDED']])
    })

    it('marks a document removed only once', async () => {
      await tracker.recordVersion(doc, 'Body v1')

      expect(await tracker.recordRemoved(doc)).not.toBeNull()
      expect(await tracker.recordRemoved(doc)).toBeNull()

      expect((await store.listVersions(doc.id)).map((v) => v.changeType)).toEqual(['ADDED', 'REMOVED'])
    })

    it('appends a single REMOVED version under concurrent callers', async () => {
      await tracker.recordVersion(doc, 'Body v1')

      const results = await Promise.all([
        tracker.recordRemoved(doc, 'absent from source'),
        tracker.recordRemoved(doc, 'absent from source'),
        tracker.recordRemoved(doc, 'absent from source'),
      ])

      expect(results.filter((result) => result !== null)).toHaveLength(1)
      expect((await store.listVersions(doc.id)).map((v) => [v.versionNo, v.changeType])).toEqual([
        [1, 'ADDED'],
        [2, 'REMOVED'],
      ])
    })
  })

  describe('seedIfMissing', () => {
    it('skips documents that already have a hash', async () => {
      await tracker.recordVersion(doc, 'Body v1')
      expect(await tracker.seedIfMissing(doc, 'Other body')).toBe('SKIP')
      expect(await store.listVersions(doc.id)).toHaveLength(1)
    })

    it('adds the first version for an untracked document', async () => {
      expect(await tracker.seedIfMissing(doc)).toBe('ADDED')
      expect((await store.listVersions(doc.id)).map((version) => version.changeType)).toEqual(['ADDED'])
    })

    it('only fills tracking fields when versions already exist', async () => {
      // A version written before hashes were tracked on the document row
      await store.withDocumentLock(doc.id, (tx) =>
        tx.insertVersion({
          versionNo: 1,
          contentHash: computeContentHash('Archived body'),
          title: 'Permit notice',
          snapshot: 'Archived body',
          changeType: 'ADDED',
          fetchedAt: new Date(START),
        })
      )

      expect(await tracker.seedIfMissing(doc, 'Archived body')).toBe('SEEDED')

      expect(await store.listVersions(doc.id)).toHaveLength(1)
      const current = await reload()
      expect(current.currentHash).toBe(computeContentHash('Archived body'))
      expect(current.firstSeenAt).not.toBeNull()
    })
  })
})

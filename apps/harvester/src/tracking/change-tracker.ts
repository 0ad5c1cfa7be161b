/**
 * Change tracker
 *
 * Hashes each fetched document and appends to its version history when the
 * content changes. Every operation runs under the store's per-document lock,
 * so version numbers are allocated once and never reused.
 */

import type { ILogger } from '@regwatch/logger'
import type { DocumentRecord, DocumentStore, DocumentTransaction, DocumentVersionRecord, TrackingPatch } from '@regwatch/db'
import { logger } from '../config/logger.js'
import { computeContentHash, hashBasis, toSnapshot } from './hash.js'

export type RecordResult = 'ADDED' | 'UPDATED' | 'NOCHANGE'

export type SeedResult = 'SKIP' | 'SEEDED' | 'ADDED'

export interface ChangeTrackerOptions {
  now?: () => Date
  log?: ILogger
}

interface Basis {
  title: string
  hash: string
  snapshot: string
}

export class ChangeTracker {
  private readonly now: () => Date
  private readonly log: ILogger

  constructor(
    private readonly store: DocumentStore,
    options: ChangeTrackerOptions = {}
  ) {
    this.now = options.now ?? (() => new Date())
    this.log = options.log ?? logger.tracker
  }

  /**
   * Compare the fetched content with the stored hash and record the result.
   * `title`, when given, refreshes the document title on UPDATED.
   */
  async recordVersion(doc: DocumentRecord, text?: string | null, title?: string | null): Promise<RecordResult> {
    return this.store.withDocumentLock(doc.id, async (tx) => {
      const basis = this.basis(tx.document, text, title)
      const now = this.now()

      let previousHash = tx.document.currentHash
      if (!previousHash) {
        const latest = await tx.latestVersion()
        if (!latest) {
          await this.addFirstVersion(tx, basis, now)
          return 'ADDED'
        }
        previousHash = latest.contentHash
      }

      if (previousHash === basis.hash) {
        await tx.updateTracking({
          lastSeenAt: now,
          ...(tx.document.currentHash ? {} : { currentHash: basis.hash }),
        })
        return 'NOCHANGE'
      }

      const versionNo = (await tx.maxVersionNo()) + 1
      await tx.insertVersion({
        versionNo,
        contentHash: basis.hash,
        title: basis.title,
        snapshot: basis.snapshot,
        changeType: 'UPDATED',
        fetchedAt: now,
      })

      const patch: TrackingPatch = { currentHash: basis.hash, lastSeenAt: now, lastChangedAt: now }
      const refreshed = title?.trim()
      if (refreshed && refreshed !== tx.document.title) {
        patch.title = refreshed
      }
      await tx.updateTracking(patch)

      this.log.info('DOCUMENT_UPDATED', { docId: doc.id, versionNo })
      return 'UPDATED'
    })
  }

  /**
   * Append a REMOVED version. The stored hash is left as it was. Returns
   * null without writing when the document has no history yet or its
   * latest version is already REMOVED.
   */
  async recordRemoved(doc: DocumentRecord, reason = 'removed'): Promise<DocumentVersionRecord | null> {
    return this.store.withDocumentLock(doc.id, async (tx) => {
      const latest = await tx.latestVersion()
      if (!latest || latest.changeType === 'REMOVED') return null

      const current = tx.document
      const now = this.now()
      const versionNo = (await tx.maxVersionNo()) + 1

      const version = await tx.insertVersion({
        versionNo,
        contentHash: current.currentHash ?? latest.contentHash,
        title: current.title,
        snapshot: `(Document marked removed: ${reason})`,
        changeType: 'REMOVED',
        fetchedAt: now,
      })
      await tx.updateTracking({ lastSeenAt: now, lastChangedAt: now })

      this.log.info('DOCUMENT_REMOVED', { docId: doc.id, versionNo, reason })
      return version
    })
  }

  /**
   * Give a document without a hash its tracking fields. Documents that
   * already have versions only get the missing fields filled.
   */
  async seedIfMissing(doc: DocumentRecord, text?: string | null, title?: string | null): Promise<SeedResult> {
    return this.store.withDocumentLock(doc.id, async (tx) => {
      const current = tx.document
      if (current.currentHash) return 'SKIP'

      const basis = this.basis(current, text, title)
      const now = this.now()

      if ((await tx.maxVersionNo()) > 0) {
        await tx.updateTracking({
          currentHash: basis.hash,
          firstSeenAt: current.firstSeenAt ?? now,
          lastSeenAt: current.lastSeenAt ?? now,
          lastChangedAt: current.lastChangedAt ?? now,
        })
        return 'SEEDED'
      }

      await this.addFirstVersion(tx, basis, now)
      return 'ADDED'
    })
  }

  private basis(document: DocumentRecord, text: string | null | undefined, title: string | null | undefined): Basis {
    const effectiveTitle = title?.trim() || document.title
    const basis = hashBasis(text, effectiveTitle, document.url)
    return { title: effectiveTitle, hash: computeContentHash(basis), snapshot: toSnapshot(basis) }
  }

  private async addFirstVersion(tx: DocumentTransaction, basis: Basis, now: Date): Promise<void> {
    await tx.insertVersion({
      versionNo: 1,
      contentHash: basis.hash,
      title: basis.title,
      snapshot: basis.snapshot,
      changeType: 'ADDED',
      fetchedAt: now,
    })
    await tx.updateTracking({
      currentHash: basis.hash,
      firstSeenAt: now,
      lastSeenAt: now,
      lastChangedAt: now,
    })
    this.log.debug('DOCUMENT_ADDED', { docId: tx.document.id })
  }
}

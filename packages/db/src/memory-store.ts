import { PersistenceError } from './errors.js'
import type { DocumentStore, DocumentTransaction, ListSourcesOptions } from './store.js'
import {
  UNTITLED,
  type DocumentRecord,
  type DocumentVersionRecord,
  type NewVersionInput,
  type SourceRecord,
  type TrackingPatch,
  type UpsertDocumentInput,
  type UpsertDocumentResult,
  type UpsertSourceInput,
} from './types.js'

function isBlank(value: string | null | undefined): boolean {
  return value === null || value === undefined || value === ''
}

function hasMetadata(value: Record<string, unknown> | null | undefined): value is Record<string, unknown> {
  return value !== null && value !== undefined && Object.keys(value).length > 0
}

/** Yield so concurrent callers interleave the way they would against a database. */
const tick = (): Promise<void> => new Promise((resolve) => setImmediate(resolve))

class MemoryDocumentTransaction implements DocumentTransaction {
  readonly pending: DocumentVersionRecord[] = []
  patch: TrackingPatch = {}

  constructor(
    readonly document: DocumentRecord,
    private readonly committed: DocumentVersionRecord[],
    private readonly nextVersionId: () => number
  ) {}

  private all(): DocumentVersionRecord[] {
    return [...this.committed, ...this.pending]
  }

  async maxVersionNo(): Promise<number> {
    await tick()
    return this.all().reduce((max, version) => Math.max(max, version.versionNo), 0)
  }

  async latestVersion(): Promise<DocumentVersionRecord | null> {
    await tick()
    const versions = this.all()
    if (versions.length === 0) return null
    return versions.reduce((latest, version) => (version.versionNo > latest.versionNo ? version : latest))
  }

  async insertVersion(input: NewVersionInput): Promise<DocumentVersionRecord> {
    await tick()
    if (this.all().some((version) => version.versionNo === input.versionNo)) {
      throw new PersistenceError(
        `duplicate version_no ${input.versionNo} for document ${this.document.id}`,
        { constraint: 'document_versions_doc_id_version_no_key' }
      )
    }
    const record: DocumentVersionRecord = { id: this.nextVersionId(), docId: this.document.id, ...input }
    this.pending.push(record)
    return { ...record }
  }

  async updateTracking(patch: TrackingPatch): Promise<DocumentRecord> {
    await tick()
    this.patch = { ...this.patch, ...patch }
    return { ...this.document, ...this.patch }
  }
}

/**
 * In-process DocumentStore with the same upsert rules and per-document
 * locking as the PostgreSQL store. Writes made inside `withDocumentLock`
 * are applied only when the callback resolves.
 */
export class MemoryDocumentStore implements DocumentStore {
  private readonly sources = new Map<number, SourceRecord>()
  private readonly documents = new Map<number, DocumentRecord>()
  private readonly versions = new Map<number, DocumentVersionRecord[]>()
  private readonly locks = new Map<number, Promise<void>>()
  private sequence = { source: 0, document: 0, version: 0 }

  constructor(private readonly now: () => Date = () => new Date()) {}

  async listSources(options: ListSourcesOptions = {}): Promise<SourceRecord[]> {
    return [...this.sources.values()]
      .filter((source) => !options.onlyActive || source.active)
      .sort((a, b) => a.id - b.id)
      .map((source) => ({ ...source }))
  }

  async getSource(id: number): Promise<SourceRecord | null> {
    const source = this.sources.get(id)
    return source ? { ...source } : null
  }

  async upsertSource(input: UpsertSourceInput): Promise<SourceRecord> {
    const timestamp = this.now()
    const existing = [...this.sources.values()].find((source) => source.name === input.name)
    if (existing) {
      const updated: SourceRecord = {
        ...existing,
        url: input.url,
        type: input.type,
        jurisdiction: input.jurisdiction ?? null,
        active: input.active ?? existing.active,
        updatedAt: timestamp,
      }
      this.sources.set(existing.id, updated)
      return { ...updated }
    }
    const created: SourceRecord = {
      id: ++this.sequence.source,
      name: input.name,
      url: input.url,
      type: input.type,
      jurisdiction: input.jurisdiction ?? null,
      active: input.active ?? true,
      createdAt: timestamp,
      updatedAt: timestamp,
    }
    this.sources.set(created.id, created)
    return { ...created }
  }

  async setSourceActive(id: number, active: boolean): Promise<SourceRecord | null> {
    const source = this.sources.get(id)
    if (!source) return null
    const updated = { ...source, active, updatedAt: this.now() }
    this.sources.set(id, updated)
    return { ...updated }
  }

  async deleteSource(id: number): Promise<boolean> {
    if (!this.sources.delete(id)) return false
    for (const doc of [...this.documents.values()]) {
      if (doc.sourceId === id) {
        this.documents.delete(doc.id)
        this.versions.delete(doc.id)
      }
    }
    return true
  }

  async upsertDocument(input: UpsertDocumentInput): Promise<UpsertDocumentResult> {
    const existing = await this.findDocumentByUrl(input.url)
    if (existing) {
      const updated: DocumentRecord = {
        ...existing,
        title: isBlank(input.title) ? existing.title : String(input.title),
        publishedAt: input.publishedAt ?? existing.publishedAt,
        text: isBlank(existing.text) && !isBlank(input.text) ? String(input.text) : existing.text,
        metadata: !hasMetadata(existing.metadata) && hasMetadata(input.metadata) ? { ...input.metadata } : existing.metadata,
        jurisdiction: input.jurisdiction ?? existing.jurisdiction,
      }
      this.documents.set(existing.id, updated)
      return { document: { ...updated }, created: false }
    }

    if (!this.sources.has(input.sourceId)) {
      throw new PersistenceError(`source ${input.sourceId} does not exist`, { constraint: 'documents_source_id_fkey' })
    }

    const created: DocumentRecord = {
      id: ++this.sequence.document,
      sourceId: input.sourceId,
      title: isBlank(input.title) ? UNTITLED : String(input.title),
      url: input.url,
      publishedAt: input.publishedAt ?? null,
      text: isBlank(input.text) ? null : String(input.text),
      metadata: hasMetadata(input.metadata) ? { ...input.metadata } : null,
      jurisdiction: input.jurisdiction ?? null,
      createdAt: this.now(),
      currentHash: null,
      firstSeenAt: null,
      lastSeenAt: null,
      lastChangedAt: null,
    }
    this.documents.set(created.id, created)
    this.versions.set(created.id, [])
    return { document: { ...created }, created: true }
  }

  async findDocumentByUrl(url: string): Promise<DocumentRecord | null> {
    const doc = [...this.documents.values()].find((candidate) => candidate.url === url)
    return doc ? { ...doc } : null
  }

  async listDocumentsForSource(sourceId: number): Promise<DocumentRecord[]> {
    return [...this.documents.values()]
      .filter((doc) => doc.sourceId === sourceId)
      .sort((a, b) => a.id - b.id)
      .map((doc) => ({ ...doc }))
  }

  async listDocumentsMissingHash(limit = 1000): Promise<DocumentRecord[]> {
    return [...this.documents.values()]
      .filter((doc) => doc.currentHash === null)
      .sort((a, b) => a.id - b.id)
      .slice(0, limit)
      .map((doc) => ({ ...doc }))
  }

  async listVersions(docId: number): Promise<DocumentVersionRecord[]> {
    return (this.versions.get(docId) ?? [])
      .slice()
      .sort((a, b) => a.versionNo - b.versionNo)
      .map((version) => ({ ...version }))
  }

  async withDocumentLock<T>(docId: number, fn: (tx: DocumentTransaction) => Promise<T>): Promise<T> {
    const previous = this.locks.get(docId) ?? Promise.resolve()
    let release: () => void = () => undefined
    const held = new Promise<void>((resolve) => {
      release = resolve
    })
    const tail = previous.then(() => held)
    this.locks.set(docId, tail)

    await previous
    try {
      const doc = this.documents.get(docId)
      if (!doc) {
        throw new Error(`Document ${docId} not found`)
      }
      const committed = this.versions.get(docId) ?? []
      const tx = new MemoryDocumentTransaction({ ...doc }, committed, () => ++this.sequence.version)
      const value = await fn(tx)

      this.versions.set(docId, [...committed, ...tx.pending])
      const current = this.documents.get(docId)
      if (current) {
        this.documents.set(docId, { ...current, ...tx.patch })
      }
      return value
    } finally {
      release()
      if (this.locks.get(docId) === tail) {
        this.locks.delete(docId)
      }
    }
  }

  async close(): Promise<void> {
    this.locks.clear()
  }
}

import type {
  DocumentRecord,
  DocumentVersionRecord,
  NewVersionInput,
  SourceRecord,
  TrackingPatch,
  UpsertDocumentInput,
  UpsertDocumentResult,
  UpsertSourceInput,
} from './types.js'

/**
 * Handle passed to `withDocumentLock` callbacks. Every read and write goes
 * through the same transaction, and the document row stays locked until the
 * callback settles.
 */
export interface DocumentTransaction {
  /** Row as read under the lock. Not refreshed by `updateTracking`. */
  readonly document: DocumentRecord
  /** 0 when the document has no versions. */
  maxVersionNo(): Promise<number>
  latestVersion(): Promise<DocumentVersionRecord | null>
  insertVersion(input: NewVersionInput): Promise<DocumentVersionRecord>
  updateTracking(patch: TrackingPatch): Promise<DocumentRecord>
}

export interface ListSourcesOptions {
  onlyActive?: boolean
}

export interface DocumentStore {
  listSources(options?: ListSourcesOptions): Promise<SourceRecord[]>
  getSource(id: number): Promise<SourceRecord | null>
  /** Keyed by name. */
  upsertSource(input: UpsertSourceInput): Promise<SourceRecord>
  setSourceActive(id: number, active: boolean): Promise<SourceRecord | null>
  /** Cascades to the source's documents and their versions. */
  deleteSource(id: number): Promise<boolean>

  /**
   * URL-keyed create-or-update. Title and publishedAt refresh when given;
   * text and metadata are only filled while still empty.
   */
  upsertDocument(input: UpsertDocumentInput): Promise<UpsertDocumentResult>
  findDocumentByUrl(url: string): Promise<DocumentRecord | null>
  listDocumentsForSource(sourceId: number): Promise<DocumentRecord[]>
  listDocumentsMissingHash(limit?: number): Promise<DocumentRecord[]>
  listVersions(docId: number): Promise<DocumentVersionRecord[]>

  /**
   * Serialize all version bookkeeping for one document. Rejects with the
   * callback's error after rolling back its writes.
   */
  withDocumentLock<T>(docId: number, fn: (tx: DocumentTransaction) => Promise<T>): Promise<T>

  close(): Promise<void>
}

// ═══════════════════════════════════════════════════════════════════════════════
// Sources
// ═══════════════════════════════════════════════════════════════════════════════

export const SOURCE_TYPES = ['feed', 'html'] as const

/** Source types the dispatcher knows how to ingest. */
export type SourceType = (typeof SOURCE_TYPES)[number]

export function isSourceType(value: string): value is SourceType {
  return SOURCE_TYPES.some((type) => type === value)
}

/**
 * `type` is stored as free text; rows carrying an unknown type are reported
 * by the dispatcher rather than rejected at load.
 */
export interface SourceRecord {
  id: number
  name: string
  url: string
  jurisdiction: string | null
  type: string
  active: boolean
  createdAt: Date
  updatedAt: Date
}

export interface UpsertSourceInput {
  name: string
  url: string
  type: string
  jurisdiction?: string | null
  /** Left unchanged on update when omitted; new sources default to active. */
  active?: boolean
}

// ═══════════════════════════════════════════════════════════════════════════════
// Documents
// ═══════════════════════════════════════════════════════════════════════════════

export type DocumentMetadata = Record<string, unknown>

export const UNTITLED = '(untitled)'

export interface DocumentRecord {
  id: number
  sourceId: number
  title: string
  url: string
  publishedAt: Date | null
  text: string | null
  metadata: DocumentMetadata | null
  jurisdiction: string | null
  createdAt: Date
  currentHash: string | null
  firstSeenAt: Date | null
  lastSeenAt: Date | null
  lastChangedAt: Date | null
}

export interface UpsertDocumentInput {
  sourceId: number
  url: string
  title?: string | null
  publishedAt?: Date | null
  text?: string | null
  metadata?: DocumentMetadata | null
  jurisdiction?: string | null
}

export interface UpsertDocumentResult {
  document: DocumentRecord
  created: boolean
}

// ═══════════════════════════════════════════════════════════════════════════════
// Versions
// ═══════════════════════════════════════════════════════════════════════════════

export type ChangeType = 'ADDED' | 'UPDATED' | 'REMOVED'

export interface DocumentVersionRecord {
  id: number
  docId: number
  versionNo: number
  contentHash: string
  title: string | null
  snapshot: string | null
  changeType: ChangeType
  fetchedAt: Date
}

export interface NewVersionInput {
  versionNo: number
  contentHash: string
  title: string | null
  snapshot: string | null
  changeType: ChangeType
  fetchedAt: Date
}

/** Fields the change tracker writes back onto a document. Omitted keys are untouched. */
export interface TrackingPatch {
  currentHash?: string
  title?: string
  firstSeenAt?: Date
  lastSeenAt?: Date
  lastChangedAt?: Date
}

import type { QueryResult, QueryResultRow } from 'pg'
import { toPersistenceError } from './errors.js'
import type { DocumentStore, DocumentTransaction, ListSourcesOptions } from './store.js'
import {
  UNTITLED,
  type ChangeType,
  type DocumentMetadata,
  type DocumentRecord,
  type DocumentVersionRecord,
  type NewVersionInput,
  type SourceRecord,
  type TrackingPatch,
  type UpsertDocumentInput,
  type UpsertDocumentResult,
  type UpsertSourceInput,
} from './types.js'

// ═══════════════════════════════════════════════════════════════════════════════
// Connection seams (pg.Pool and pg.PoolClient satisfy these)
// ═══════════════════════════════════════════════════════════════════════════════

export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>
}

export interface PgClientLike extends Queryable {
  release(): void
}

export interface PgPoolLike extends Queryable {
  connect(): Promise<PgClientLike>
  end(): Promise<void>
}

// ═══════════════════════════════════════════════════════════════════════════════
// Row shapes
// ═══════════════════════════════════════════════════════════════════════════════

interface SourceRow {
  id: number
  name: string
  url: string
  jurisdiction: string | null
  type: string
  active: boolean
  created_at: Date
  updated_at: Date
}

interface DocumentRow {
  id: number
  source_id: number
  title: string
  url: string
  published_at: Date | null
  text: string | null
  metadata: unknown
  jurisdiction: string | null
  created_at: Date
  current_hash: string | null
  first_seen_at: Date | null
  last_seen_at: Date | null
  last_changed_at: Date | null
}

interface VersionRow {
  id: number
  doc_id: number
  version_no: number
  content_hash: string
  title: string | null
  snapshot: string | null
  change_type: string
  fetched_at: Date
}

function isMetadata(value: unknown): value is DocumentMetadata {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function toChangeType(value: string): ChangeType {
  if (value === 'ADDED' || value === 'UPDATED' || value === 'REMOVED') {
    return value
  }
  throw new Error(`Unexpected change_type in document_versions: ${value}`)
}

export function mapSourceRow(row: SourceRow): SourceRecord {
  return {
    id: row.id,
    name: row.name,
    url: row.url,
    jurisdiction: row.jurisdiction,
    type: row.type,
    active: row.active,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  }
}

export function mapDocumentRow(row: DocumentRow): DocumentRecord {
  return {
    id: row.id,
    sourceId: row.source_id,
    title: row.title,
    url: row.url,
    publishedAt: row.published_at,
    text: row.text,
    metadata: isMetadata(row.metadata) ? row.metadata : null,
    jurisdiction: row.jurisdiction,
    createdAt: row.created_at,
    currentHash: row.current_hash,
    firstSeenAt: row.first_seen_at,
    lastSeenAt: row.last_seen_at,
    lastChangedAt: row.last_changed_at,
  }
}

export function mapVersionRow(row: VersionRow): DocumentVersionRecord {
  return {
    id: row.id,
    docId: row.doc_id,
    versionNo: row.version_no,
    contentHash: row.content_hash,
    title: row.title,
    snapshot: row.snapshot,
    changeType: toChangeType(row.change_type),
    fetchedAt: row.fetched_at,
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// SQL
// ═══════════════════════════════════════════════════════════════════════════════

const UPSERT_SOURCE_SQL = `
  INSERT INTO sources (name, url, type, jurisdiction, active)
  VALUES ($1, $2, $3, $4, COALESCE($5, TRUE))
  ON CONFLICT (name) DO UPDATE SET
    url = EXCLUDED.url,
    type = EXCLUDED.type,
    jurisdiction = EXCLUDED.jurisdiction,
    active = COALESCE($5, sources.active),
    updated_at = now()
  RETURNING *`

// xmax = 0 only on the freshly inserted tuple
const UPSERT_DOCUMENT_SQL = `
  INSERT INTO documents (source_id, title, url, published_at, text, metadata, jurisdiction)
  VALUES ($1, COALESCE(NULLIF($2::text, ''), '${UNTITLED}'), $3, $4, NULLIF($5::text, ''), $6::jsonb, $7)
  ON CONFLICT (url) DO UPDATE SET
    title = COALESCE(NULLIF($2::text, ''), documents.title),
    published_at = COALESCE(EXCLUDED.published_at, documents.published_at),
    text = CASE
      WHEN documents.text IS NULL OR documents.text = '' THEN COALESCE(EXCLUDED.text, documents.text)
      ELSE documents.text
    END,
    metadata = CASE
      WHEN documents.metadata IS NULL OR documents.metadata = '{}'::jsonb THEN COALESCE(EXCLUDED.metadata, documents.metadata)
      ELSE documents.metadata
    END,
    jurisdiction = COALESCE(EXCLUDED.jurisdiction, documents.jurisdiction)
  RETURNING *, (xmax = 0) AS inserted`

const INSERT_VERSION_SQL = `
  INSERT INTO document_versions (doc_id, version_no, content_hash, title, snapshot, change_type, fetched_at)
  VALUES ($1, $2, $3, $4, $5, $6, $7)
  RETURNING *`

const UPDATE_TRACKING_SQL = `
  UPDATE documents SET
    current_hash = COALESCE($2, current_hash),
    title = COALESCE($3, title),
    first_seen_at = COALESCE($4, first_seen_at),
    last_seen_at = COALESCE($5, last_seen_at),
    last_changed_at = COALESCE($6, last_changed_at)
  WHERE id = $1
  RETURNING *`

function metadataParam(metadata: DocumentMetadata | null | undefined): string | null {
  if (!metadata || Object.keys(metadata).length === 0) {
    return null
  }
  return JSON.stringify(metadata)
}

// ═══════════════════════════════════════════════════════════════════════════════
// Store
// ═══════════════════════════════════════════════════════════════════════════════

class PgDocumentTransaction implements DocumentTransaction {
  constructor(
    private readonly client: PgClientLike,
    readonly document: DocumentRecord
  ) {}

  async maxVersionNo(): Promise<number> {
    const result = await this.client.query<{ max: number | null }>(
      'SELECT MAX(version_no) AS max FROM document_versions WHERE doc_id = $1',
      [this.document.id]
    )
    return result.rows[0]?.max ?? 0
  }

  async latestVersion(): Promise<DocumentVersionRecord | null> {
    const result = await this.client.query<VersionRow>(
      'SELECT * FROM document_versions WHERE doc_id = $1 ORDER BY version_no DESC LIMIT 1',
      [this.document.id]
    )
    const row = result.rows[0]
    return row ? mapVersionRow(row) : null
  }

  async insertVersion(input: NewVersionInput): Promise<DocumentVersionRecord> {
    const result = await this.client.query<VersionRow>(INSERT_VERSION_SQL, [
      this.document.id,
      input.versionNo,
      input.contentHash,
      input.title,
      input.snapshot,
      input.changeType,
      input.fetchedAt,
    ])
    const row = result.rows[0]
    if (!row) {
      throw new Error(`Version insert returned no row for document ${this.document.id}`)
    }
    return mapVersionRow(row)
  }

  async updateTracking(patch: TrackingPatch): Promise<DocumentRecord> {
    const result = await this.client.query<DocumentRow>(UPDATE_TRACKING_SQL, [
      this.document.id,
      patch.currentHash ?? null,
      patch.title ?? null,
      patch.firstSeenAt ?? null,
      patch.lastSeenAt ?? null,
      patch.lastChangedAt ?? null,
    ])
    const row = result.rows[0]
    if (!row) {
      throw new Error(`Document ${this.document.id} disappeared during tracking update`)
    }
    return mapDocumentRow(row)
  }
}

export class PgDocumentStore implements DocumentStore {
  constructor(private readonly pool: PgPoolLike) {}

  async listSources(options: ListSourcesOptions = {}): Promise<SourceRecord[]> {
    const result = options.onlyActive
      ? await this.pool.query<SourceRow>('SELECT * FROM sources WHERE active ORDER BY id')
      : await this.pool.query<SourceRow>('SELECT * FROM sources ORDER BY id')
    return result.rows.map(mapSourceRow)
  }

  async getSource(id: number): Promise<SourceRecord | null> {
    const result = await this.pool.query<SourceRow>('SELECT * FROM sources WHERE id = $1', [id])
    const row = result.rows[0]
    return row ? mapSourceRow(row) : null
  }

  async upsertSource(input: UpsertSourceInput): Promise<SourceRecord> {
    try {
      const result = await this.pool.query<SourceRow>(UPSERT_SOURCE_SQL, [
        input.name,
        input.url,
        input.type,
        input.jurisdiction ?? null,
        input.active ?? null,
      ])
      const row = result.rows[0]
      if (!row) {
        throw new Error(`Source upsert returned no row for ${input.name}`)
      }
      return mapSourceRow(row)
    } catch (error) {
      throw toPersistenceError(error, 'upsertSource')
    }
  }

  async setSourceActive(id: number, active: boolean): Promise<SourceRecord | null> {
    const result = await this.pool.query<SourceRow>(
      'UPDATE sources SET active = $2, updated_at = now() WHERE id = $1 RETURNING *',
      [id, active]
    )
    const row = result.rows[0]
    return row ? mapSourceRow(row) : null
  }

  async deleteSource(id: number): Promise<boolean> {
    const result = await this.pool.query('DELETE FROM sources WHERE id = $1', [id])
    return (result.rowCount ?? 0) > 0
  }

  async upsertDocument(input: UpsertDocumentInput): Promise<UpsertDocumentResult> {
    try {
      const result = await this.pool.query<DocumentRow & { inserted: boolean }>(UPSERT_DOCUMENT_SQL, [
        input.sourceId,
        input.title ?? null,
        input.url,
        input.publishedAt ?? null,
        input.text ?? null,
        metadataParam(input.metadata),
        input.jurisdiction ?? null,
      ])
      const row = result.rows[0]
      if (!row) {
        throw new Error(`Document upsert returned no row for ${input.url}`)
      }
      return { document: mapDocumentRow(row), created: row.inserted }
    } catch (error) {
      throw toPersistenceError(error, 'upsertDocument')
    }
  }

  async findDocumentByUrl(url: string): Promise<DocumentRecord | null> {
    const result = await this.pool.query<DocumentRow>('SELECT * FROM documents WHERE url = $1', [url])
    const row = result.rows[0]
    return row ? mapDocumentRow(row) : null
  }

  async listDocumentsForSource(sourceId: number): Promise<DocumentRecord[]> {
    const result = await this.pool.query<DocumentRow>(
      'SELECT * FROM documents WHERE source_id = $1 ORDER BY id',
      [sourceId]
    )
    return result.rows.map(mapDocumentRow)
  }

  async listDocumentsMissingHash(limit = 1000): Promise<DocumentRecord[]> {
    const result = await this.pool.query<DocumentRow>(
      'SELECT * FROM documents WHERE current_hash IS NULL ORDER BY id LIMIT $1',
      [limit]
    )
    return result.rows.map(mapDocumentRow)
  }

  async listVersions(docId: number): Promise<DocumentVersionRecord[]> {
    const result = await this.pool.query<VersionRow>(
      'SELECT * FROM document_versions WHERE doc_id = $1 ORDER BY version_no',
      [docId]
    )
    return result.rows.map(mapVersionRow)
  }

  async withDocumentLock<T>(docId: number, fn: (tx: DocumentTransaction) => Promise<T>): Promise<T> {
    const client = await this.pool.connect()
    try {
      await client.query('BEGIN')
      const locked = await client.query<DocumentRow>('SELECT * FROM documents WHERE id = $1 FOR UPDATE', [docId])
      const row = locked.rows[0]
      if (!row) {
        throw new Error(`Document ${docId} not found`)
      }
      const value = await fn(new PgDocumentTransaction(client, mapDocumentRow(row)))
      await client.query('COMMIT')
      return value
    } catch (error) {
      await client.query('ROLLBACK')
      throw toPersistenceError(error, `document ${docId}`)
    } finally {
      client.release()
    }
  }

  async close(): Promise<void> {
    await this.pool.end()
  }
}

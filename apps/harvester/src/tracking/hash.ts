import { createHash } from 'node:crypto'

/** Version snapshots keep at most this many characters of the hash basis. */
export const SNAPSHOT_MAX_CHARS = 20_000

/**
 * Unify line endings and trim. Null and undefined normalize to ''.
 */
export function normalizeText(text: string | null | undefined): string {
  if (!text) return ''
  return text.replace(/\r\n?/g, '\n').trim()
}

/**
 * Text the content hash is computed over: the normalized extracted text,
 * or "title\nurl" when there is none.
 */
export function hashBasis(text: string | null | undefined, title: string, url: string): string {
  return normalizeText(text) || normalizeText(`${title}\n${url}`)
}

/**
 * SHA-1 hex digest of the UTF-8 bytes.
 */
export function computeContentHash(basis: string): string {
  return createHash('sha1').update(basis, 'utf8').digest('hex')
}

export function toSnapshot(basis: string): string {
  return basis.slice(0, SNAPSHOT_MAX_CHARS)
}

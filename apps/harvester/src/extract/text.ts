import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'

export const MAX_TITLE_LENGTH = 1024

const NAV_TITLES_PATH = fileURLToPath(new URL('../../data/nav-titles.json', import.meta.url))

const NAV_TITLES: ReadonlySet<string> = new Set(
  z.array(z.string()).parse(JSON.parse(readFileSync(NAV_TITLES_PATH, 'utf8')))
)

const ENTITY_MAP: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
  rsquo: "'",
  lsquo: "'",
  rdquo: '"',
  ldquo: '"',
  mdash: '-',
  ndash: '-',
}

const PUNCTUATION_MAP: Record<string, string> = {
  '\u2019': "'",
  '\u2018': "'",
  '\u201c': '"',
  '\u201d': '"',
  '\u2014': '-',
  '\u2013': '-',
  '\u00a0': ' ',
}

export function decodeEntities(value: string): string {
  return value.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, body: string) => {
    if (body.startsWith('#x') || body.startsWith('#X')) {
      return String.fromCodePoint(parseInt(body.slice(2), 16))
    }
    if (body.startsWith('#')) {
      return String.fromCodePoint(parseInt(body.slice(1), 10))
    }
    return ENTITY_MAP[body.toLowerCase()] ?? match
  })
}

/**
 * ASCII-punctuated, whitespace-collapsed title capped at MAX_TITLE_LENGTH
 * characters. Entities are left alone; callers holding raw feed or JSON-LD
 * strings run `decodeEntities` first.
 */
export function cleanTitle(raw: string | null | undefined): string {
  const ascii = (raw ?? '').replace(/[\u2018\u2019\u201c\u201d\u2013\u2014\u00a0]/g, (ch) => PUNCTUATION_MAP[ch] ?? ch)
  return ascii.replace(/\s+/g, ' ').trim().slice(0, MAX_TITLE_LENGTH)
}

export function isNavigationTitle(title: string): boolean {
  return NAV_TITLES.has(title.toLowerCase().replace(/[^a-z ]/g, '').trim())
}

// ═══════════════════════════════════════════════════════════════════════════════
// Dates
// ═══════════════════════════════════════════════════════════════════════════════

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec']

const TEXT_DATE_PATTERN = /\b(Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec)[a-z]*\.?\s+(\d{1,2}),\s+(\d{4})\b/

/**
 * UTC midnight for a calendar date, or null when the date does not exist.
 */
export function utcDate(year: number, month: number, day: number): Date | null {
  if (month < 1 || month > 12 || day < 1 || day > 31) return null
  const date = new Date(Date.UTC(year, month - 1, day))
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null
  }
  return date
}

/**
 * First "Month DD, YYYY" in free text. Abbreviated and full month names
 * both match.
 */
export function parseTextDate(text: string | null | undefined): Date | null {
  const match = TEXT_DATE_PATTERN.exec(text ?? '')
  if (!match) return null
  const [, month = '', day = '', year = ''] = match
  return utcDate(Number(year), MONTHS.indexOf(month.toLowerCase()) + 1, Number(day))
}

/**
 * Date portion (before "T") of an ISO-8601 timestamp.
 */
export function parseIsoDate(value: string | null | undefined): Date | null {
  const match = /^(\d{4})-(\d{2})-(\d{2})/.exec((value ?? '').trim().split('T')[0] ?? '')
  if (!match) return null
  const [, year = '', month = '', day = ''] = match
  return utcDate(Number(year), Number(month), Number(day))
}

/**
 * Feed timestamps: RFC 822 or ISO 8601. Null when unparseable.
 */
export function parseFeedDate(value: string | null | undefined): Date | null {
  if (!value) return null
  const parsed = new Date(value.trim())
  return Number.isNaN(parsed.getTime()) ? null : parsed
}

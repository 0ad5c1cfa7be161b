/**
 * Feed extractor
 *
 * RSS 2.0, RSS 1.0 (RDF) and Atom. Structural problems raise ParseError so
 * the fallback chain can hand the response to the HTML extractor.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser'
import { UNTITLED, type DocumentMetadata } from '@regwatch/db'
import { ParseError, errorMessage } from '../errors.js'
import { looksLikeHtml } from '../fetch/sniff.js'
import { isRecord } from './json.js'
import { cleanTitle, decodeEntities, parseFeedDate } from './text.js'
import type { ExtractedItem, ExtractionAttempt } from './types.js'
import { normalizeHref } from './urls.js'

export type FeedFormat = 'rss' | 'rdf' | 'atom'

export interface ParsedFeed {
  format: FeedFormat
  title: string | null
  entries: Record<string, unknown>[]
}

const ARRAY_PATHS = new Set([
  'rss.channel.item',
  'rss.channel.item.category',
  'rdf:RDF.item',
  'rdf:RDF.item.dc:subject',
  'feed.entry',
  'feed.entry.link',
  'feed.entry.category',
])

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '',
  textNodeName: '_text',
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  htmlEntities: true,
  isArray: (_tagName: string, jPath: string) => ARRAY_PATHS.has(jPath),
})

// ═══════════════════════════════════════════════════════════════════════════════
// Value helpers
// ═══════════════════════════════════════════════════════════════════════════════

function asArray(value: unknown): unknown[] {
  if (value === undefined || value === null) return []
  return Array.isArray(value) ? value : [value]
}

function textOf(value: unknown): string | null {
  if (typeof value === 'string') {
    const trimmed = value.trim()
    return trimmed || null
  }
  if (typeof value === 'number') return String(value)
  if (Array.isArray(value)) return textOf(value[0])
  if (isRecord(value)) return textOf(value._text)
  return null
}

function firstText(entry: Record<string, unknown>, keys: string[]): string | null {
  for (const key of keys) {
    const value = textOf(entry[key])
    if (value) return value
  }
  return null
}

function recordsOf(value: unknown): Record<string, unknown>[] {
  return asArray(value).filter(isRecord)
}

// ═══════════════════════════════════════════════════════════════════════════════
// Parsing
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * @throws ParseError for malformed XML or a document that is not a feed
 */
export function parseFeed(body: string): ParsedFeed {
  const validation = XMLValidator.validate(body)
  if (validation !== true) {
    throw new ParseError(`Malformed feed XML: ${validation.err.msg} (line ${validation.err.line})`, 'feed')
  }

  let document: unknown
  try {
    document = parser.parse(body)
  } catch (error) {
    throw new ParseError(`Malformed feed XML: ${errorMessage(error)}`, 'feed', { cause: error })
  }
  if (!isRecord(document)) {
    throw new ParseError('Empty feed document', 'feed')
  }

  const rss = document.rss
  if (isRecord(rss)) {
    const channel = isRecord(rss.channel) ? rss.channel : {}
    return { format: 'rss', title: textOf(channel.title), entries: recordsOf(channel.item) }
  }

  const rdf = document['rdf:RDF']
  if (isRecord(rdf)) {
    const channel = isRecord(rdf.channel) ? rdf.channel : {}
    return { format: 'rdf', title: textOf(channel.title), entries: recordsOf(rdf.item) }
  }

  const atom = document.feed
  if (isRecord(atom)) {
    return { format: 'atom', title: textOf(atom.title), entries: recordsOf(atom.entry) }
  }

  const root = Object.keys(document).find((key) => !key.startsWith('?')) ?? '(none)'
  throw new ParseError(`Not a feed: unexpected root element <${root}>`, 'feed')
}

function atomLink(entry: Record<string, unknown>): string | null {
  const links = asArray(entry.link)
  const alternate =
    links.find((link) => isRecord(link) && (link.rel === undefined || link.rel === 'alternate')) ?? links[0]
  return isRecord(alternate) ? textOf(alternate.href) : textOf(alternate)
}

function rssLink(entry: Record<string, unknown>): string | null {
  const link = textOf(entry.link)
  if (link) return link
  const guid = entry.guid
  const permalink = !isRecord(guid) || guid.isPermaLink !== 'false'
  const guidText = textOf(guid)
  return permalink && guidText && /^https?:\/\//i.test(guidText) ? guidText : null
}

function tagsOf(entry: Record<string, unknown>, format: FeedFormat): string[] {
  if (format === 'atom') {
    return recordsOf(entry.category).flatMap((category) => {
      const term = textOf(category.term) ?? textOf(category.label)
      return term ? [term] : []
    })
  }
  const raw = [...asArray(entry.category), ...asArray(entry['dc:subject'])]
  return raw.flatMap((tag) => {
    const text = textOf(tag)
    return text ? [text] : []
  })
}

function entryMetadata(entry: Record<string, unknown>, format: FeedFormat): DocumentMetadata | null {
  const entryId =
    format === 'atom'
      ? textOf(entry.id)
      : format === 'rdf'
        ? textOf(entry['rdf:about'])
        : textOf(entry.guid)
  const tags = tagsOf(entry, format)

  const metadata: DocumentMetadata = {}
  if (entryId) metadata.entryId = entryId
  if (tags.length > 0) metadata.tags = tags
  return Object.keys(metadata).length > 0 ? metadata : null
}

/**
 * Project entries to items. Entries without a usable link are dropped.
 */
export function feedItems(feed: ParsedFeed, feedUrl: string): ExtractedItem[] {
  const items: ExtractedItem[] = []

  for (const entry of feed.entries) {
    const rawLink = feed.format === 'atom' ? atomLink(entry) : rssLink(entry)
    const url = normalizeHref(rawLink, feedUrl)
    if (!url) continue

    const published =
      feed.format === 'atom'
        ? firstText(entry, ['published', 'updated'])
        : firstText(entry, ['pubDate', 'dc:date', 'published'])
    const summary =
      feed.format === 'atom'
        ? firstText(entry, ['summary', 'content'])
        : firstText(entry, ['description', 'content:encoded'])

    items.push({
      title: cleanTitle(decodeEntities(textOf(entry.title) ?? '')) || UNTITLED,
      url,
      publishedAt: parseFeedDate(published),
      text: summary,
      metadata: entryMetadata(entry, feed.format),
    })
  }

  return items
}

export interface FetchedBody {
  url: string
  contentType: string
  body: string
}

/**
 * Feed as the first step of the fallback chain. HTML responses and parse
 * failures come back as recoverable errors.
 */
export function feedAttempt(response: FetchedBody): ExtractionAttempt {
  return {
    name: 'feed',
    run: () => {
      if (looksLikeHtml(response.contentType, response.body)) {
        return {
          kind: 'error',
          strategy: 'feed',
          error: new ParseError(`Expected a feed but received HTML (${response.contentType || 'no content-type'})`, 'feed'),
          recoverable: true,
        }
      }

      let feed: ParsedFeed
      try {
        feed = parseFeed(response.body)
      } catch (error) {
        if (error instanceof ParseError) {
          return { kind: 'error', strategy: 'feed', error, recoverable: true }
        }
        throw error
      }

      const items = feedItems(feed, response.url)
      if (items.length === 0) {
        return { kind: 'empty', strategy: 'feed', reason: `${feed.format} feed has no linked entries` }
      }
      return { kind: 'items', strategy: 'feed', items }
    },
  }
}

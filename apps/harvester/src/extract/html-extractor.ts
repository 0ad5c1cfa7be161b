/**
 * Generic HTML extractor
 *
 * 1. JSON-LD article nodes (headline + url).
 * 2. Only when step 1 yields nothing: same-host anchors with visible text,
 *    dated from a "Month DD, YYYY" in the anchor's parent block.
 *
 * A matching site override filters both passes and supplies URL-embedded
 * dates ahead of any other date source.
 */

import type { CheerioAPI } from 'cheerio'
import type { DocumentMetadata } from '@regwatch/db'
import { loadHtml, spacedText } from './html.js'
import { isArticle, scanJsonLd } from './jsonld.js'
import { dateFromUrl, findSiteOverride, overrideAccepts, type DateOptions, type SiteOverride } from './overrides.js'
import { cleanTitle, decodeEntities, isNavigationTitle, parseIsoDate, parseTextDate } from './text.js'
import type { ExtractedItem, ExtractionAttempt, StructuredArticle } from './types.js'
import { isHomepage, normalizeHref, sameHost } from './urls.js'

export interface HtmlExtractOptions {
  /** URL the page was served from; relative links resolve against it. */
  baseUrl: string
  /** Configured source URL, filtered out as a homepage link. Defaults to baseUrl. */
  sourceUrl?: string
  overrides?: readonly SiteOverride[]
  dates?: DateOptions
}

export interface HtmlExtraction {
  strategy: 'json-ld' | 'anchors'
  items: ExtractedItem[]
  overrideId: string | null
  invalidJsonLdBlocks: number
}

interface FilterContext {
  baseUrl: string
  sourceUrl: string
  override: SiteOverride | null
  seen: Set<string>
}

/**
 * The "real document" filter shared by both passes. Returns the cleaned
 * title and resolved URL, or null when the candidate is rejected.
 */
function acceptCandidate(
  rawTitle: string | null | undefined,
  rawHref: string | null | undefined,
  ctx: FilterContext
): { title: string; url: string } | null {
  const title = cleanTitle(rawTitle)
  if (!title || isNavigationTitle(title)) return null

  const url = normalizeHref(rawHref, ctx.baseUrl)
  if (!url) return null
  if (!sameHost(url, ctx.baseUrl)) return null
  if (isHomepage(url, ctx.sourceUrl)) return null
  if (ctx.override && !overrideAccepts(ctx.override, url)) return null

  if (ctx.seen.has(url)) return null
  ctx.seen.add(url)

  return { title, url }
}

function structuredDate(article: StructuredArticle): Date | null {
  return parseIsoDate(article.datePublished) ?? parseIsoDate(article.dateCreated) ?? parseIsoDate(article.dateModified)
}

function structuredMetadata(article: StructuredArticle): DocumentMetadata {
  return {
    schemaType: article.kind,
    ...(article.description ? { description: article.description } : {}),
    ...(article.keywords.length > 0 ? { keywords: article.keywords } : {}),
  }
}

function fromJsonLd(articles: StructuredArticle[], ctx: FilterContext, dates: DateOptions): ExtractedItem[] {
  const items: ExtractedItem[] = []
  for (const article of articles) {
    const accepted = acceptCandidate(decodeEntities(article.headline ?? ''), article.url, ctx)
    if (!accepted) continue

    const urlDate = ctx.override ? dateFromUrl(ctx.override, accepted.url, dates) : null
    items.push({
      ...accepted,
      publishedAt: urlDate ?? structuredDate(article),
      text: null,
      metadata: structuredMetadata(article),
    })
  }
  return items
}

function fromAnchors($: CheerioAPI, ctx: FilterContext, dates: DateOptions): ExtractedItem[] {
  const items: ExtractedItem[] = []
  $('a[href]').each((_, element) => {
    const anchor = $(element)
    const accepted = acceptCandidate(spacedText(anchor.html()), anchor.attr('href'), ctx)
    if (!accepted) return

    const urlDate = ctx.override ? dateFromUrl(ctx.override, accepted.url, dates) : null
    const block = spacedText(anchor.parent().html())
    items.push({
      ...accepted,
      publishedAt: urlDate ?? parseTextDate(block || accepted.title),
      text: null,
      metadata: null,
    })
  })
  return items
}

export function extractHtml(body: string, options: HtmlExtractOptions): HtmlExtraction {
  const $ = loadHtml(body)
  const sourceUrl = options.sourceUrl ?? options.baseUrl
  const override = findSiteOverride(sourceUrl, options.overrides)
  const dates = options.dates ?? {}

  const scan = scanJsonLd($)
  const structured = fromJsonLd(
    scan.nodes.filter(isArticle),
    { baseUrl: options.baseUrl, sourceUrl, override, seen: new Set() },
    dates
  )

  if (structured.length > 0) {
    return { strategy: 'json-ld', items: structured, overrideId: override?.id ?? null, invalidJsonLdBlocks: scan.invalidBlocks }
  }

  const anchors = fromAnchors($, { baseUrl: options.baseUrl, sourceUrl, override, seen: new Set() }, dates)
  return { strategy: 'anchors', items: anchors, overrideId: override?.id ?? null, invalidJsonLdBlocks: scan.invalidBlocks }
}

/**
 * HTML as one step of the fallback chain.
 */
export function htmlAttempt(body: string, options: HtmlExtractOptions): ExtractionAttempt {
  return {
    name: 'html',
    run: () => {
      const extraction = extractHtml(body, options)
      if (extraction.items.length === 0) {
        return { kind: 'empty', strategy: 'html', reason: 'no document links on page' }
      }
      return { kind: 'items', strategy: extraction.strategy, items: extraction.items }
    },
  }
}

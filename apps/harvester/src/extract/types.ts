/**
 * Extraction types
 *
 * Every strategy reports a typed outcome; the fallback chain decides what
 * runs next from the outcome alone.
 */

import type { DocumentMetadata } from '@regwatch/db'
import type { ParseError } from '../errors.js'

// ═══════════════════════════════════════════════════════════════════════════════
// Items
// ═══════════════════════════════════════════════════════════════════════════════

export interface ExtractedItem {
  title: string
  url: string
  publishedAt: Date | null
  /** Body or summary text; null when the strategy only sees a link. */
  text: string | null
  metadata: DocumentMetadata | null
}

// ═══════════════════════════════════════════════════════════════════════════════
// Structured data (JSON-LD)
// ═══════════════════════════════════════════════════════════════════════════════

export const ARTICLE_KINDS = ['NewsArticle', 'BlogPosting', 'Article', 'Report', 'TechArticle', 'ScholarlyArticle'] as const

export type ArticleKind = (typeof ARTICLE_KINDS)[number]

export interface ArticleFields {
  headline: string | null
  url: string | null
  datePublished: string | null
  dateCreated: string | null
  dateModified: string | null
  description: string | null
  keywords: string[]
}

/**
 * A structured-data node: one of the article shapes we ingest, or any
 * other typed node kept as raw fields.
 */
export type StructuredNode =
  | ({ kind: ArticleKind } & ArticleFields)
  | { kind: 'raw'; types: string[]; fields: Record<string, unknown> }

export type StructuredArticle = Extract<StructuredNode, { kind: ArticleKind }>

// ═══════════════════════════════════════════════════════════════════════════════
// Outcomes
// ═══════════════════════════════════════════════════════════════════════════════

export type StrategyName = 'feed' | 'json-ld' | 'anchors' | 'html'

export type ExtractionOutcome =
  | { kind: 'items'; strategy: StrategyName; items: ExtractedItem[] }
  | { kind: 'empty'; strategy: StrategyName; reason: string }
  /** `recoverable` errors let the chain try the next attempt. */
  | { kind: 'error'; strategy: StrategyName; error: ParseError | Error; recoverable: boolean }

export interface ExtractionAttempt {
  name: StrategyName
  run(): ExtractionOutcome | Promise<ExtractionOutcome>
}

export interface ChainResult {
  outcome: ExtractionOutcome
  /** Strategies that ran, in order, with their outcome kind. */
  trail: Array<{ strategy: StrategyName; kind: ExtractionOutcome['kind'] }>
}

import type { CheerioAPI } from 'cheerio'
import { isRecord, safeJsonParse } from './json.js'
import { ARTICLE_KINDS, type ArticleKind, type StructuredArticle, type StructuredNode } from './types.js'

const JSON_LD_SELECTOR = 'script[type="application/ld+json"]'

function asArray<T>(value: T | T[] | null | undefined): T[] {
  if (value === null || value === undefined) return []
  return Array.isArray(value) ? value : [value]
}

function asString(value: unknown): string | null {
  if (typeof value === 'string') {
    const trimmed = value.trim()
    return trimmed || null
  }
  if (typeof value === 'number') {
    return String(value)
  }
  return null
}

function typesOf(node: Record<string, unknown>): string[] {
  return asArray(node['@type']).filter((value): value is string => typeof value === 'string')
}

function articleKind(types: string[]): ArticleKind | null {
  for (const type of types) {
    const match = ARTICLE_KINDS.find((kind) => kind.toLowerCase() === type.toLowerCase())
    if (match) return match
  }
  return null
}

/** `url`, else `mainEntityOfPage` as a string or an `{ "@id" }` reference. */
function nodeUrl(node: Record<string, unknown>): string | null {
  const direct = asString(node.url)
  if (direct) return direct
  const page = node.mainEntityOfPage
  if (isRecord(page)) {
    return asString(page['@id']) ?? asString(page.url)
  }
  return asString(page)
}

function keywordsOf(value: unknown): string[] {
  if (typeof value === 'string') {
    return value
      .split(',')
      .map((keyword) => keyword.trim())
      .filter(Boolean)
  }
  return asArray(value).flatMap((keyword) => {
    const text = asString(keyword)
    return text ? [text] : []
  })
}

export function toStructuredNode(node: Record<string, unknown>): StructuredNode {
  const types = typesOf(node)
  const kind = articleKind(types)
  if (!kind) {
    return { kind: 'raw', types, fields: node }
  }
  return {
    kind,
    headline: asString(node.headline) ?? asString(node.name),
    url: nodeUrl(node),
    datePublished: asString(node.datePublished),
    dateCreated: asString(node.dateCreated),
    dateModified: asString(node.dateModified),
    description: asString(node.description),
    keywords: keywordsOf(node.keywords),
  }
}

/**
 * Every object reachable from a parsed JSON-LD value, depth first.
 * Covers `@graph`, `itemListElement` and any other nesting.
 */
export function walkJsonLd(value: unknown): Record<string, unknown>[] {
  const nodes: Record<string, unknown>[] = []
  const stack: unknown[] = [value]

  while (stack.length > 0) {
    const current = stack.pop()
    if (Array.isArray(current)) {
      for (let i = current.length - 1; i >= 0; i--) stack.push(current[i])
      continue
    }
    if (!isRecord(current)) continue

    nodes.push(current)
    const children = Object.values(current)
    for (let i = children.length - 1; i >= 0; i--) stack.push(children[i])
  }

  return nodes
}

export interface JsonLdScan {
  nodes: StructuredNode[]
  /** Script blocks that were not valid JSON. */
  invalidBlocks: number
}

export function scanJsonLd($: CheerioAPI): JsonLdScan {
  const nodes: StructuredNode[] = []
  let invalidBlocks = 0

  $(JSON_LD_SELECTOR).each((_, element) => {
    const raw = $(element).text().trim()
    if (!raw) return

    const parsed = safeJsonParse(raw)
    if (!parsed.ok) {
      invalidBlocks++
      return
    }
    for (const node of walkJsonLd(parsed.value)) {
      if (typesOf(node).length > 0) {
        nodes.push(toStructuredNode(node))
      }
    }
  })

  return { nodes, invalidBlocks }
}

export function isArticle(node: StructuredNode): node is StructuredArticle {
  return node.kind !== 'raw'
}

import type { DocumentRecord, SourceRecord } from '@regwatch/db'
import { sanitizeUrl } from '../config/structured-log.js'
import { ExtractionError, describeError } from '../errors.js'
import type { ExtractedItem } from '../extract/index.js'
import { resolveExtractor } from './dispatcher.js'
import type { IngestContext, SourceReport } from './types.js'

export const REMOVAL_REASON = 'absent from source'

export function emptyReport(source: SourceRecord): SourceReport {
  return {
    sourceId: source.id,
    source: source.name,
    type: source.type,
    url: source.url,
    ok: false,
    status: 'error',
    error: null,
    strategy: null,
    items: 0,
    added: 0,
    updated: 0,
    unchanged: 0,
    removed: 0,
  }
}

export function skippedReport(source: SourceRecord): SourceReport {
  return { ...emptyReport(source), ok: true, status: 'skipped' }
}

async function storeItem(source: SourceRecord, item: ExtractedItem, ctx: IngestContext, report: SourceReport): Promise<DocumentRecord> {
  const { document } = await ctx.store.upsertDocument({
    sourceId: source.id,
    url: item.url,
    title: item.title,
    publishedAt: item.publishedAt,
    text: item.text,
    metadata: item.metadata,
    jurisdiction: source.jurisdiction,
  })

  const result = await ctx.tracker.recordVersion(document, item.text, item.title)
  if (result === 'ADDED') report.added++
  else if (result === 'UPDATED') report.updated++
  else report.unchanged++
  report.items++

  return document
}

/**
 * Documents seen in earlier cycles but missing from this one get a REMOVED
 * version, once.
 */
async function markRemoved(source: SourceRecord, seen: ReadonlySet<string>, ctx: IngestContext): Promise<number> {
  let removed = 0
  for (const doc of await ctx.store.listDocumentsForSource(source.id)) {
    if (seen.has(doc.url)) continue
    if (await ctx.tracker.recordRemoved(doc, REMOVAL_REASON)) removed++
  }
  return removed
}

/**
 * Run one source end to end. Never throws: every failure lands in the
 * returned report.
 */
export async function ingestSource(source: SourceRecord, ctx: IngestContext): Promise<SourceReport> {
  const report = emptyReport(source)
  const log = ctx.log.child({ sourceId: source.id, sourceName: source.name })
  const started = Date.now()

  try {
    const extractor = resolveExtractor(source.type)
    const { outcome, trail } = await extractor.extract(source, ctx)
    report.strategy = outcome.strategy

    switch (outcome.kind) {
      case 'items': {
        const seen = new Set<string>()
        for (const item of outcome.items) {
          if (seen.has(item.url)) continue
          seen.add(item.url)
          await storeItem(source, item, ctx, report)
        }
        if (ctx.trackRemovals) {
          report.removed = await markRemoved(source, seen, ctx)
        }
        report.ok = true
        report.status = 'ok'
        break
      }
      case 'empty':
        report.ok = true
        report.status = 'empty'
        report.error = describeError(new ExtractionError(outcome.reason, outcome.strategy))
        break
      case 'error':
        report.error = describeError(outcome.error)
        break
    }

    log.info('SOURCE_INGESTED', {
      ...sanitizeUrl(source.url),
      status: report.status,
      strategies: trail.map((step) => `${step.strategy}:${step.kind}`).join(','),
      items: report.items,
      added: report.added,
      updated: report.updated,
      removed: report.removed,
      durationMs: Date.now() - started,
    })
  } catch (error) {
    report.ok = false
    report.status = 'error'
    report.error = describeError(error)
    log.warn('SOURCE_FAILED', { ...sanitizeUrl(source.url), durationMs: Date.now() - started }, error)
  }

  return report
}

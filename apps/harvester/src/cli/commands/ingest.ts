import type { DocumentStore } from '@regwatch/db'
import { runIngestOnce, type RunIngestDeps, type SourceReport } from '../../ingest/index.js'
import { ChangeTracker, type SeedResult } from '../../tracking/index.js'

export function formatReport(report: SourceReport): string {
  const head = `[${report.status}] #${report.sourceId} ${report.source}`
  if (report.status === 'skipped') return `${head} (inactive)`
  if (report.status === 'error') return `${head}: ${report.error ?? 'unknown error'}`

  const counts = `added ${report.added}, updated ${report.updated}, unchanged ${report.unchanged}, removed ${report.removed}`
  return `${head} via ${report.strategy ?? '-'}: ${report.items} items (${counts})`
}

/**
 * One synchronous cycle. Exits 1 when any source failed.
 */
export async function runIngestCommand(args: { all: boolean }, deps: RunIngestDeps): Promise<number> {
  const stats = await runIngestOnce(!args.all, {
    ...deps,
    onResult: (report) => console.log(formatReport(report)),
  })
  console.log(`Sources: ${stats.total} total, ${stats.ok} ok, ${stats.errors} failed, ${stats.skipped} skipped`)
  return stats.errors > 0 ? 1 : 0
}

/** Seed first versions for documents stored before change tracking. */
export async function runBackfillCommand(
  args: { limit?: number },
  deps: { store: DocumentStore; tracker?: ChangeTracker }
): Promise<number> {
  const tracker = deps.tracker ?? new ChangeTracker(deps.store)
  const documents = await deps.store.listDocumentsMissingHash(args.limit)

  const counts: Record<SeedResult, number> = { SEEDED: 0, ADDED: 0, SKIP: 0 }
  for (const document of documents) {
    counts[await tracker.seedIfMissing(document, document.text, document.title)]++
  }

  console.log(
    `Backfilled ${documents.length} documents: ${counts.ADDED} added, ${counts.SEEDED} seeded, ${counts.SKIP} skipped`
  )
  return 0
}

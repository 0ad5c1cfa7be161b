import { readFile } from 'node:fs/promises'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import { SOURCE_TYPES, type DocumentStore, type SourceRecord } from '@regwatch/db'
import { safeJsonParse } from '../../extract/json.js'

export const DEFAULT_SOURCES_FILE = fileURLToPath(new URL('../../../data/sources.json', import.meta.url))

const sourceInputSchema = z.object({
  name: z.string().trim().min(1),
  url: z.string().url(),
  type: z.enum(SOURCE_TYPES),
  jurisdiction: z.string().trim().min(1).nullish(),
  active: z.boolean().optional(),
})

type SourceInput = z.infer<typeof sourceInputSchema>

interface SourcesDeps {
  store: DocumentStore
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')
}

export function formatSourceRow(source: SourceRecord): string {
  return [
    `#${source.id}`,
    source.type,
    source.active ? 'active' : 'inactive',
    source.jurisdiction ?? '-',
    source.name,
    source.url,
  ].join('\t')
}

export async function runSourcesListCommand(args: { onlyActive: boolean }, deps: SourcesDeps): Promise<number> {
  const sources = await deps.store.listSources({ onlyActive: args.onlyActive })
  if (sources.length === 0) {
    console.log('No sources configured')
    return 0
  }
  for (const source of sources) {
    console.log(formatSourceRow(source))
  }
  return 0
}

/**
 * Upsert every entry of a JSON array of sources, keyed by name. Re-running
 * a seed file changes nothing it has already written.
 */
export async function runSourcesSeedCommand(args: { file?: string }, deps: SourcesDeps): Promise<number> {
  const file = args.file || DEFAULT_SOURCES_FILE
  const json = safeJsonParse(await readFile(file, 'utf8'))
  if (!json.ok) {
    console.error(`${file}: ${json.error}`)
    return 2
  }

  const parsed = z.array(sourceInputSchema).safeParse(json.value)
  if (!parsed.success) {
    console.error(`${file}: ${formatIssues(parsed.error)}`)
    return 2
  }

  for (const entry of parsed.data) {
    await deps.store.upsertSource(entry)
  }
  console.log(`Seeded ${parsed.data.length} sources from ${file}`)
  return 0
}

export async function runSourcesUpsertCommand(
  args: { name: string; url: string; type: string; jurisdiction?: string; inactive?: boolean },
  deps: SourcesDeps
): Promise<number> {
  const input: Record<keyof SourceInput, unknown> = {
    name: args.name,
    url: args.url,
    type: args.type,
    jurisdiction: args.jurisdiction || null,
    active: args.inactive ? false : undefined,
  }
  const parsed = sourceInputSchema.safeParse(input)
  if (!parsed.success) {
    console.error(`Invalid source: ${formatIssues(parsed.error)}`)
    return 2
  }

  const source = await deps.store.upsertSource(parsed.data)
  console.log(`Saved ${formatSourceRow(source)}`)
  return 0
}

export async function runSourcesToggleCommand(args: { id?: number; active: string }, deps: SourcesDeps): Promise<number> {
  if (args.id === undefined || args.id <= 0) {
    console.error('--id must be a positive source id')
    return 2
  }
  if (args.active !== 'true' && args.active !== 'false') {
    console.error('--active must be true or false')
    return 2
  }

  const source = await deps.store.setSourceActive(args.id, args.active === 'true')
  if (!source) {
    console.error(`Source #${args.id} not found`)
    return 1
  }
  console.log(`Saved ${formatSourceRow(source)}`)
  return 0
}

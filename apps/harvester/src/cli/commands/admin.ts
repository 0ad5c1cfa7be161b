import { runMigrations, type PgPoolLike } from '@regwatch/db'
import { scheduleIngestCycle, triggerIngestNow, type IngestQueue } from '../../scheduler/index.js'

export async function runMigrateCommand(deps: { pool: PgPoolLike; dir?: string }): Promise<number> {
  const applied = await runMigrations(deps.pool, {
    dir: deps.dir,
    onApplied: (name) => console.log(`Applied ${name}`),
  })
  console.log(applied.length === 0 ? 'Database is up to date' : `Applied ${applied.length} migrations`)
  return 0
}

export async function runScheduleCommand(args: { cron: string }, deps: { queue: IngestQueue }): Promise<number> {
  await scheduleIngestCycle(deps.queue, args.cron)
  console.log(`Ingest cycle scheduled: ${args.cron}`)
  return 0
}

export async function runTriggerCommand(args: { all: boolean }, deps: { queue: IngestQueue }): Promise<number> {
  const jobId = await triggerIngestNow(deps.queue, !args.all)
  console.log(`Ingest cycle queued (job ${jobId ?? 'unknown'})`)
  return 0
}

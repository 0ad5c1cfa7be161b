/**
 * Ingest scheduler
 *
 * A BullMQ job scheduler enqueues `ingest-cycle` on the configured cron;
 * one worker runs each cycle under a Redis lock so cycles never overlap,
 * however many workers are up.
 */

import { Worker, type Job, type Queue } from 'bullmq'
import type { DocumentStore } from '@regwatch/db'
import { redisConnection, withRedisLock, type LockClient } from '@regwatch/redis'
import { logger } from '../config/logger.js'
import { INGEST_CYCLE_JOB, QUEUE_NAMES, type IngestJobData } from '../config/queues.js'
import { createWorkflowLogger } from '../config/structured-log.js'
import { errorMessage } from '../errors.js'
import { runIngestOnce, type RunIngestDeps, type Stats } from '../ingest/index.js'

export const INGEST_LOCK_KEY = 'regwatch:lock:ingest-cycle'

export type IngestJobResult = { ran: true; stats: Omit<Stats, 'perSource'> } | { ran: false; reason: 'locked' }

/** Queue calls the scheduler makes. */
export type IngestQueue = Pick<Queue<IngestJobData>, 'add' | 'upsertJobScheduler'>

export interface IngestJobDeps extends Omit<RunIngestDeps, 'store' | 'log'> {
  store: DocumentStore
  lock: LockClient
  lockTtlMs: number
}

/**
 * Register (or move) the repeatable cycle. Calling it again with another
 * cron replaces the previous pattern.
 */
export async function scheduleIngestCycle(queue: IngestQueue, cron: string): Promise<void> {
  await queue.upsertJobScheduler(
    INGEST_CYCLE_JOB,
    { pattern: cron },
    { name: INGEST_CYCLE_JOB, data: { onlyActive: true, trigger: 'schedule' } }
  )
  logger.scheduler.info('INGEST_CYCLE_SCHEDULED', { cron })
}

/**
 * Enqueue a one-shot cycle. Returns the job id.
 */
export async function triggerIngestNow(queue: IngestQueue, onlyActive = true): Promise<string | undefined> {
  const job = await queue.add(INGEST_CYCLE_JOB, { onlyActive, trigger: 'manual' })
  logger.scheduler.info('INGEST_CYCLE_TRIGGERED', { jobId: job.id, onlyActive })
  return job.id
}

export async function processIngestJob(
  job: Pick<Job<IngestJobData>, 'id' | 'data'>,
  deps: IngestJobDeps
): Promise<IngestJobResult> {
  const log = createWorkflowLogger(logger.scheduler, {
    workflow: 'ingest',
    jobId: job.id,
    trigger: job.data.trigger,
  })

  const { store, lock, lockTtlMs, ...ingest } = deps
  const run = await withRedisLock(
    lock,
    INGEST_LOCK_KEY,
    () => runIngestOnce(job.data.onlyActive, { ...ingest, store }),
    lockTtlMs
  )

  if (!run.acquired) {
    log.warn('INGEST_CYCLE_SKIPPED', { reason: 'previous cycle still running' })
    return { ran: false, reason: 'locked' }
  }

  const { total, ok, errors, skipped } = run.value
  const stats = { total, ok, errors, skipped }
  log.info('INGEST_CYCLE_DONE', { ...stats })
  return { ran: true, stats }
}

export function createIngestWorker(deps: IngestJobDeps): Worker<IngestJobData, IngestJobResult> {
  const worker = new Worker<IngestJobData, IngestJobResult>(
    QUEUE_NAMES.INGEST,
    (job) => processIngestJob(job, deps),
    { connection: redisConnection, concurrency: 1 }
  )

  worker.on('failed', (job, error) => {
    logger.scheduler.error('INGEST_JOB_FAILED', { jobId: job?.id, error: errorMessage(error) }, error)
  })

  return worker
}

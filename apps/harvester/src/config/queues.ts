import { Queue } from 'bullmq'
import { redisConnection } from '@regwatch/redis'

export const QUEUE_NAMES = {
  INGEST: 'ingest',
} as const

/** Job name shared by the repeatable schedule and one-shot triggers. */
export const INGEST_CYCLE_JOB = 'ingest-cycle'

export interface IngestJobData {
  onlyActive: boolean
  trigger: 'schedule' | 'manual'
}

let ingestQueue: Queue<IngestJobData> | null = null

export function getIngestQueue(): Queue<IngestJobData> {
  if (!ingestQueue) {
    ingestQueue = new Queue<IngestJobData>(QUEUE_NAMES.INGEST, {
      connection: redisConnection,
      defaultJobOptions: {
        removeOnComplete: 100,
        removeOnFail: 500,
      },
    })
  }
  return ingestQueue
}

export async function closeQueues(): Promise<void> {
  if (ingestQueue) {
    await ingestQueue.close()
    ingestQueue = null
  }
}

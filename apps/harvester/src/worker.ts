#!/usr/bin/env node

/**
 * Harvester Worker
 * Registers the ingest schedule and runs ingest cycles as they come due.
 */

// Load environment variables first, before any other imports
import './env.js'

import { createPool, PgDocumentStore } from '@regwatch/db'
import { disconnectRedis, getRedisClient, getRedisConnectionInfo } from '@regwatch/redis'
import type { Pool } from 'pg'
import { logger } from './config/logger.js'
import { closeQueues, getIngestQueue } from './config/queues.js'
import { loadHarvesterConfig, toHttpClientConfig } from './config/settings.js'
import { errorMessage } from './errors.js'
import { createIngestWorker, scheduleIngestCycle } from './scheduler/index.js'

const log = logger.scheduler

/**
 * Warm up database connection with retries
 */
async function warmupDatabase(pool: Pool, maxAttempts = 5): Promise<boolean> {
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      log.info('DB_CONNECT_ATTEMPT', { attempt, maxAttempts })
      await pool.query('SELECT 1')
      log.info('DB_CONNECTED')
      return true
    } catch (error) {
      log.warn('DB_CONNECT_FAILED', { attempt, error: errorMessage(error) })

      if (attempt < maxAttempts) {
        const delayMs = Math.min(2000 * Math.pow(2, attempt - 1), 30000)
        await new Promise((resolve) => setTimeout(resolve, delayMs))
      }
    }
  }

  log.error('DB_UNAVAILABLE', { maxAttempts })
  return false
}

async function main(): Promise<void> {
  const config = loadHarvesterConfig()
  const pool = createPool(config.databaseUrl)
  const store = new PgDocumentStore(pool)

  if (!(await warmupDatabase(pool))) {
    log.warn('WORKER_STARTING_WITHOUT_DB')
  }

  await scheduleIngestCycle(getIngestQueue(), config.ingest.cron)

  const worker = createIngestWorker({
    store,
    lock: getRedisClient(),
    lockTtlMs: config.ingest.lockTtlMs,
    http: toHttpClientConfig(config),
    dates: config.dates,
    concurrency: config.ingest.concurrency,
    trackRemovals: config.ingest.trackRemovals,
  })

  log.info('WORKER_STARTED', {
    cron: config.ingest.cron,
    concurrency: config.ingest.concurrency,
    redis: getRedisConnectionInfo(),
  })

  // Track if shutdown is in progress to prevent double-shutdown
  let isShuttingDown = false

  const shutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) {
      log.info('SHUTDOWN_IN_PROGRESS', { signal })
      return
    }
    isShuttingDown = true
    const shutdownStart = Date.now()
    log.info('SHUTDOWN_START', { signal })

    try {
      // Waits for the running cycle to finish
      await worker.close()
      await closeQueues()
      await disconnectRedis()
      await store.close()

      log.info('SHUTDOWN_COMPLETE', { durationMs: Date.now() - shutdownStart })
      process.exit(0)
    } catch (error) {
      log.error('SHUTDOWN_FAILED', {}, error)
      process.exit(1)
    }
  }

  process.on('SIGTERM', () => void shutdown('SIGTERM'))
  process.on('SIGINT', () => void shutdown('SIGINT'))
}

main().catch((error: unknown) => {
  log.error('WORKER_START_FAILED', { error: errorMessage(error) }, error)
  process.exit(1)
})

import { createPool, PgDocumentStore, type DocumentStore, type PgPoolLike } from '@regwatch/db'
import type { Pool } from 'pg'
import { closeQueues, getIngestQueue } from '../config/queues.js'
import { toHttpClientConfig, type HarvesterConfig } from '../config/settings.js'
import type { HttpClientConfig } from '../fetch/index.js'
import type { IngestQueue } from '../scheduler/index.js'
import { getWatcherRegistry, type WatcherRegistry } from '../watchers/index.js'

/** What commands draw on; tests substitute in-process stand-ins. */
export interface CliResources {
  readonly config: HarvesterConfig
  readonly http: HttpClientConfig
  getPool(): PgPoolLike
  getStore(): DocumentStore
  getQueue(): IngestQueue
  getWatcherRegistry(): WatcherRegistry
  close(): Promise<void>
}

/**
 * Resources a CLI invocation may need. Nothing connects until a command
 * asks for it, so `watch:list` runs without a database or Redis.
 */
export class CliRuntime implements CliResources {
  readonly http: HttpClientConfig
  private pool: Pool | null = null
  private store: DocumentStore | null = null
  private queueOpened = false

  constructor(readonly config: HarvesterConfig) {
    this.http = toHttpClientConfig(config)
  }

  getPool(): Pool {
    if (!this.pool) {
      this.pool = createPool(this.config.databaseUrl)
    }
    return this.pool
  }

  getStore(): DocumentStore {
    if (!this.store) {
      this.store = new PgDocumentStore(this.getPool())
    }
    return this.store
  }

  getQueue(): IngestQueue {
    this.queueOpened = true
    return getIngestQueue()
  }

  getWatcherRegistry(): WatcherRegistry {
    return getWatcherRegistry()
  }

  async close(): Promise<void> {
    if (this.queueOpened) {
      await closeQueues()
    }
    if (this.pool) {
      await this.pool.end()
      this.pool = null
      this.store = null
    }
  }
}

import { createLogger } from '@regwatch/logger'

export const rootLogger = createLogger('harvester')

export const logger = {
  fetch: rootLogger.child('fetch'),
  extract: rootLogger.child('extract'),
  tracker: rootLogger.child('tracker'),
  ingest: rootLogger.child('ingest'),
  scheduler: rootLogger.child('scheduler'),
  watchers: rootLogger.child('watchers'),
  db: rootLogger.child('db'),
  cli: rootLogger.child('cli'),
}

export * from './types.js'
export { WatcherRegistry, getWatcherRegistry, loadWatcherRegistry, parseWatcherTable, WATCHERS_PATH } from './registry.js'
export { SiteWatcher, CONTENT_FILE, SIGNATURE_FILE, bodySignature, headerSignature, type SiteWatcherOptions } from './site-watcher.js'
export {
  DEFAULT_WATCH_CONCURRENCY,
  filterWatchers,
  runStamp,
  runWatchers,
  type BatchOptions,
  type BatchRecord,
  type BatchSummary,
  type WatcherFilters,
} from './batch.js'

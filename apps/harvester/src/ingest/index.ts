export * from './types.js'
export { EXTRACTORS, resolveExtractor } from './dispatcher.js'
export { REMOVAL_REASON, ingestSource } from './ingest-source.js'
export { DEFAULT_INGEST_CONCURRENCY, runIngestOnce, summarize, type RunIngestDeps } from './run-ingest.js'

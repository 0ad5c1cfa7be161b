import type { HttpClientConfig } from '../../fetch/index.js'
import { SiteWatcher, runWatchers, type WatcherFetcher, type WatcherRegistry } from '../../watchers/index.js'

interface WatchDeps {
  registry: WatcherRegistry
  cacheRoot: string
  fetcher?: WatcherFetcher
  http?: HttpClientConfig
}

export async function runWatchListCommand(args: { states: string[] }, deps: Pick<WatchDeps, 'registry'>): Promise<number> {
  const watchers = deps.registry.list(args.states)
  if (watchers.length === 0) {
    console.log('No watchers registered')
    return 0
  }
  for (const watcher of watchers) {
    console.log([watcher.id, watcher.state, watcher.url].join('\t'))
  }
  return 0
}

/**
 * Check one watcher and print its result as JSON. `--state` only
 * disambiguates: a watcher registered for another state is a usage error.
 */
export async function runWatchRunCommand(
  args: { id: string; state?: string; force?: boolean; selector?: string },
  deps: WatchDeps
): Promise<number> {
  if (!args.id) {
    console.error('--id is required')
    return 2
  }

  const definition = deps.registry.get(args.id)
  if (!definition) {
    console.error(`Unknown watcher: ${args.id}`)
    return 2
  }
  if (args.state && definition.state !== args.state.toLowerCase()) {
    console.error(`Watcher ${args.id} belongs to ${definition.state}, not ${args.state.toLowerCase()}`)
    return 2
  }

  const watcher = new SiteWatcher(definition, { cacheRoot: deps.cacheRoot, fetcher: deps.fetcher, http: deps.http })
  const result = await watcher.check({ force: args.force, selector: args.selector || undefined })
  console.log(JSON.stringify(result, null, 2))
  return result.error ? 1 : 0
}

export async function runWatchRunAllCommand(
  args: {
    states: string[]
    pattern?: string
    limit?: number
    onlyUpdated?: boolean
    force?: boolean
    out: string
    concurrency: number
  },
  deps: WatchDeps
): Promise<number> {
  const summary = await runWatchers(deps.registry.list(), {
    states: args.states,
    pattern: args.pattern || undefined,
    limit: args.limit,
    onlyUpdated: args.onlyUpdated,
    force: args.force,
    outDir: args.out,
    concurrency: args.concurrency,
    cacheRoot: deps.cacheRoot,
    fetcher: deps.fetcher,
    http: deps.http,
    onRecord: (record) => console.log(JSON.stringify(record)),
  })

  if (summary.outFile === null) {
    console.log('No watchers matched')
    return 0
  }
  console.log(`Watchers: ${summary.ok} ok, ${summary.updated} updated, ${summary.failed} failed → ${summary.outFile}`)
  return summary.failed > 0 ? 1 : 0
}

import { logger } from '../config/logger.js'
import { asList, asNumber, asString, parseFlags } from './parse-flags.js'
import type { CliResources } from './runtime.js'
import { runMigrateCommand, runScheduleCommand, runTriggerCommand } from './commands/admin.js'
import { runBackfillCommand, runIngestCommand } from './commands/ingest.js'
import {
  runSourcesListCommand,
  runSourcesSeedCommand,
  runSourcesToggleCommand,
  runSourcesUpsertCommand,
} from './commands/sources.js'
import { runWatchListCommand, runWatchRunAllCommand, runWatchRunCommand } from './commands/watch.js'

export function printHelp(): void {
  console.log('regwatch <command> [flags]')
  console.log('')
  console.log('Commands:')
  console.log('  migrate')
  console.log('  ingest [--all]')
  console.log('  sources:list [--all]')
  console.log('  sources:seed [--file <path>]')
  console.log('  sources:upsert --name "<name>" --url <url> --type feed|html [--jurisdiction <code>] [--inactive]')
  console.log('  sources:toggle --id <id> --active true|false')
  console.log('  backfill [--limit <n>]')
  console.log('  watch:list [--state <code> ...]')
  console.log('  watch:run --id <watcher> [--state <code>] [--force] [--selector "<css>"]')
  console.log('  watch:run-all [--state <code> ...] [--pattern <text>] [--limit <n>] [--only-updated] [--force] [--out <dir>]')
  console.log('  schedule [--cron "<pattern>"]')
  console.log('  trigger [--all]')
}

/**
 * Run one command. Returns the process exit code: 0 success, 1 failure,
 * 2 usage error. The runtime is only built for known commands and is
 * always closed afterwards.
 */
export async function runCli(argv: string[], createRuntime: () => CliResources): Promise<number> {
  const [command, ...rest] = argv
  if (!command || command === '--help' || command === '-h') {
    printHelp()
    return command ? 0 : 2
  }

  const flags = parseFlags(rest)
  if (flags.help === true || flags.h === true) {
    printHelp()
    return 0
  }

  if (!KNOWN_COMMANDS.has(command)) {
    console.error(`Unknown command: ${command}`)
    printHelp()
    return 2
  }

  const runtime = createRuntime()
  const { config } = runtime
  logger.cli.debug('CLI_COMMAND', { command })

  try {
    switch (command) {
      case 'migrate':
        return await runMigrateCommand({ pool: runtime.getPool() })
      case 'ingest':
        return await runIngestCommand(
          { all: flags.all === true },
          {
            store: runtime.getStore(),
            http: runtime.http,
            dates: config.dates,
            concurrency: config.ingest.concurrency,
            trackRemovals: config.ingest.trackRemovals,
          }
        )
      case 'sources:list':
        return await runSourcesListCommand({ onlyActive: flags.all !== true }, { store: runtime.getStore() })
      case 'sources:seed':
        return await runSourcesSeedCommand({ file: asString(flags.file) }, { store: runtime.getStore() })
      case 'sources:upsert':
        return await runSourcesUpsertCommand(
          {
            name: asString(flags.name),
            url: asString(flags.url),
            type: asString(flags.type),
            jurisdiction: asString(flags.jurisdiction),
            inactive: flags.inactive === true,
          },
          { store: runtime.getStore() }
        )
      case 'sources:toggle':
        return await runSourcesToggleCommand(
          { id: asNumber(flags.id), active: asString(flags.active) },
          { store: runtime.getStore() }
        )
      case 'backfill':
        return await runBackfillCommand({ limit: asNumber(flags.limit) }, { store: runtime.getStore() })
      case 'watch:list':
        return await runWatchListCommand({ states: asList(flags.state) }, { registry: runtime.getWatcherRegistry() })
      case 'watch:run':
        return await runWatchRunCommand(
          {
            id: asString(flags.id),
            state: asString(flags.state),
            force: flags.force === true,
            selector: asString(flags.selector),
          },
          { registry: runtime.getWatcherRegistry(), cacheRoot: config.watchers.cacheDir, http: runtime.http }
        )
      case 'watch:run-all':
        return await runWatchRunAllCommand(
          {
            states: asList(flags.state),
            pattern: asString(flags.pattern),
            limit: asNumber(flags.limit),
            onlyUpdated: flags['only-updated'] === true,
            force: flags.force === true,
            out: asString(flags.out) || config.watchers.outDir,
            concurrency: config.watchers.concurrency,
          },
          { registry: runtime.getWatcherRegistry(), cacheRoot: config.watchers.cacheDir, http: runtime.http }
        )
      case 'schedule':
        return await runScheduleCommand(
          { cron: asString(flags.cron) || config.ingest.cron },
          { queue: runtime.getQueue() }
        )
      case 'trigger':
        return await runTriggerCommand({ all: flags.all === true }, { queue: runtime.getQueue() })
      default:
        return 2
    }
  } finally {
    await runtime.close()
  }
}

const KNOWN_COMMANDS = new Set([
  'migrate',
  'ingest',
  'sources:list',
  'sources:seed',
  'sources:upsert',
  'sources:toggle',
  'backfill',
  'watch:list',
  'watch:run',
  'watch:run-all',
  'schedule',
  'trigger',
])

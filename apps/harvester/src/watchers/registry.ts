/**
 * Watcher registry
 *
 * Watchers are registered explicitly from the bundled table; nothing is
 * discovered at run time. Ids must be unique.
 */

import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import type { WatcherDefinition } from './types.js'

const watcherSchema = z.object({
  id: z
    .string()
    .regex(/^[a-z0-9][a-z0-9-]*$/, 'ids are lower-case slugs; they name the cache directory'),
  state: z.string().min(2).transform((value) => value.toLowerCase()),
  url: z.string().url(),
  selector: z.string().min(1).optional(),
})

export const WATCHERS_PATH = fileURLToPath(new URL('../../data/site-watchers.json', import.meta.url))

export class WatcherRegistry {
  private readonly watchers = new Map<string, WatcherDefinition>()

  /**
   * @throws Error if the id is already registered
   */
  register(watcher: WatcherDefinition): void {
    if (this.watchers.has(watcher.id)) {
      throw new Error(`Watcher '${watcher.id}' is already registered`)
    }
    this.watchers.set(watcher.id, Object.freeze({ ...watcher }))
  }

  get(id: string): WatcherDefinition | undefined {
    return this.watchers.get(id)
  }

  /** Registration order, optionally narrowed to some states. */
  list(states?: readonly string[]): WatcherDefinition[] {
    const all = [...this.watchers.values()]
    if (!states || states.length === 0) return all
    const wanted = new Set(states.map((state) => state.toLowerCase()))
    return all.filter((watcher) => wanted.has(watcher.state))
  }

  size(): number {
    return this.watchers.size
  }
}

export function parseWatcherTable(raw: unknown): WatcherDefinition[] {
  return z.array(watcherSchema).parse(raw)
}

export function loadWatcherRegistry(path = WATCHERS_PATH): WatcherRegistry {
  const registry = new WatcherRegistry()
  for (const watcher of parseWatcherTable(JSON.parse(readFileSync(path, 'utf8')))) {
    registry.register(watcher)
  }
  return registry
}

let globalRegistry: WatcherRegistry | null = null

export function getWatcherRegistry(): WatcherRegistry {
  if (!globalRegistry) {
    globalRegistry = loadWatcherRegistry()
  }
  return globalRegistry
}

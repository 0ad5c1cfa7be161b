import { z } from 'zod'
import { ConfigError } from '../errors.js'
import { createHttpClientConfig, type HttpClientConfig } from '../fetch/index.js'

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes')

const envSchema = z.object({
  DATABASE_URL: z.string().url().optional(),

  INGEST_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(4),
  INGEST_CRON: z.string().min(1).default('0 */3 * * *'),
  INGEST_TRACK_REMOVALS: booleanFlag.default('false'),
  INGEST_LOCK_TTL_MS: z.coerce.number().int().min(10_000).default(15 * 60_000),

  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  FETCH_MAX_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),
  FETCH_USER_AGENT: z.string().min(1).default('regwatch/0.1 (+https://example.org/regwatch)'),

  WATCH_CACHE_DIR: z.string().min(1).default('.cache/watchers'),
  WATCH_OUT_DIR: z.string().min(1).default('data/runs'),
  WATCH_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(8),

  DATE_CENTURY_PIVOT: z.coerce.number().int().min(0).max(99).optional(),
})

export interface HarvesterConfig {
  readonly databaseUrl?: string
  readonly ingest: {
    readonly concurrency: number
    readonly cron: string
    readonly trackRemovals: boolean
    readonly lockTtlMs: number
  }
  readonly fetch: {
    readonly timeoutMs: number
    readonly maxSizeBytes: number
    readonly userAgent: string
  }
  readonly watchers: {
    readonly cacheDir: string
    readonly outDir: string
    readonly concurrency: number
  }
  readonly dates: {
    /**
     * Two-digit years above the pivot are read as 19xx. Unset keeps every
     * two-digit year in the 2000s.
     */
    readonly centuryPivot?: number
  }
}

/**
 * Validate and freeze harvester settings. Empty variables count as unset.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadHarvesterConfig(env: NodeJS.ProcessEnv = process.env): HarvesterConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''))
  const parsed = envSchema.safeParse(present)

  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`))
  }

  const vars = parsed.data
  return Object.freeze({
    databaseUrl: vars.DATABASE_URL,
    ingest: Object.freeze({
      concurrency: vars.INGEST_CONCURRENCY,
      cron: vars.INGEST_CRON,
      trackRemovals: vars.INGEST_TRACK_REMOVALS,
      lockTtlMs: vars.INGEST_LOCK_TTL_MS,
    }),
    fetch: Object.freeze({
      timeoutMs: vars.FETCH_TIMEOUT_MS,
      maxSizeBytes: vars.FETCH_MAX_BYTES,
      userAgent: vars.FETCH_USER_AGENT,
    }),
    watchers: Object.freeze({
      cacheDir: vars.WATCH_CACHE_DIR,
      outDir: vars.WATCH_OUT_DIR,
      concurrency: vars.WATCH_CONCURRENCY,
    }),
    dates: Object.freeze({ centuryPivot: vars.DATE_CENTURY_PIVOT }),
  })
}

/** Fetch-layer settings as the immutable client config the fetcher takes. */
export function toHttpClientConfig(config: HarvesterConfig): HttpClientConfig {
  return createHttpClientConfig({
    userAgent: config.fetch.userAgent,
    timeoutMs: config.fetch.timeoutMs,
    maxSizeBytes: config.fetch.maxSizeBytes,
  })
}

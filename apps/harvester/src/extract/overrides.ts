/**
 * Site-specific overrides
 *
 * Static table matched by host suffix. An override narrows the generic
 * extractor's candidates to one path prefix, drops deny-listed prefixes, and
 * reads the publish date from digits in the URL path before any text date.
 */

import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import { utcDate } from './text.js'
import { urlPath } from './urls.js'

const siteOverrideSchema = z.object({
  id: z.string().min(1),
  hostSuffix: z.string().min(1),
  pathPrefix: z.string().startsWith('/').optional(),
  denyPathPrefixes: z.array(z.string().startsWith('/')).default([]),
  /** Path segment that precedes the YYYYMMDD- or MMDDYY- date. */
  urlDatePrefix: z.string().startsWith('/').optional(),
})

export type SiteOverride = z.infer<typeof siteOverrideSchema>

export interface DateOptions {
  /**
   * Two-digit years greater than the pivot read as 19yy; unset reads every
   * two-digit year as 20yy.
   */
  centuryPivot?: number
}

const OVERRIDES_PATH = fileURLToPath(new URL('../../data/site-overrides.json', import.meta.url))

export const SITE_OVERRIDES: readonly SiteOverride[] = Object.freeze(
  z.array(siteOverrideSchema).parse(JSON.parse(readFileSync(OVERRIDES_PATH, 'utf8')))
)

export function findSiteOverride(
  sourceUrl: string,
  overrides: readonly SiteOverride[] = SITE_OVERRIDES
): SiteOverride | null {
  let host: string
  try {
    host = new URL(sourceUrl).hostname.toLowerCase()
  } catch {
    return null
  }
  return overrides.find((override) => host === override.hostSuffix || host.endsWith(`.${override.hostSuffix}`)) ?? null
}

/**
 * False when the override excludes the URL.
 */
export function overrideAccepts(override: SiteOverride, url: string): boolean {
  const path = urlPath(url)
  if (!path || path === '/') return false
  if (override.denyPathPrefixes.some((prefix) => path.startsWith(prefix))) return false
  if (override.pathPrefix && !path.startsWith(override.pathPrefix)) return false
  return true
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/**
 * Publish date embedded in the path: `<prefix>YYYYMMDD-...` first, then
 * `<prefix>MMDDYY-...`. Null when neither matches a real calendar date.
 */
export function dateFromUrl(override: SiteOverride, url: string, options: DateOptions = {}): Date | null {
  if (!override.urlDatePrefix) return null
  const path = urlPath(url)
  const prefix = escapeRegExp(override.urlDatePrefix)

  const eight = new RegExp(`${prefix}(\\d{8})-`).exec(path)?.[1]
  if (eight) {
    return utcDate(Number(eight.slice(0, 4)), Number(eight.slice(4, 6)), Number(eight.slice(6, 8)))
  }

  const six = new RegExp(`${prefix}(\\d{6})-`).exec(path)?.[1]
  if (six) {
    const yy = Number(six.slice(4, 6))
    const century = options.centuryPivot !== undefined && yy > options.centuryPivot ? 1900 : 2000
    return utcDate(century + yy, Number(six.slice(0, 2)), Number(six.slice(2, 4)))
  }

  return null
}

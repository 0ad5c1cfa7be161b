/**
 * Structured logging helpers for ingestion workflows.
 *
 * Events use UPPER_SNAKE names. URLs are logged as host + path (+ a short
 * hash), never with query strings.
 */

import { createHash } from 'node:crypto'
import type { ILogger, LogContext } from '@regwatch/logger'

export interface WorkflowContext {
  workflow: string
  stage?: string
  runId?: string
  sourceId?: number
  sourceName?: string
  watcherId?: string
  jobId?: string
  [key: string]: unknown
}

export interface WorkflowLogger {
  debug(event: string, meta?: LogContext): void
  info(event: string, meta?: LogContext): void
  warn(event: string, meta?: LogContext, err?: unknown): void
  error(event: string, meta?: LogContext, err?: unknown): void
  child(extra: Partial<WorkflowContext>): WorkflowLogger
}

export function createWorkflowLogger(base: ILogger, context: WorkflowContext): WorkflowLogger {
  const baseContext = compact(context)

  const payload = (event: string, meta?: LogContext): LogContext => ({
    event_name: event,
    ...baseContext,
    ...(meta ? compact(meta) : {}),
  })

  return {
    debug: (event, meta) => base.debug(event, payload(event, meta)),
    info: (event, meta) => base.info(event, payload(event, meta)),
    warn: (event, meta, err) => base.warn(event, payload(event, meta), err),
    error: (event, meta, err) => base.error(event, payload(event, meta), err),
    child: (extra) => createWorkflowLogger(base, { ...context, ...compact(extra) }),
  }
}

export function sanitizeUrl(url?: string | null): {
  urlHost?: string
  urlPath?: string
  urlHash?: string
} {
  if (!url) return {}
  try {
    const parsed = new URL(url)
    return {
      urlHost: parsed.host,
      urlPath: parsed.pathname,
      urlHash: hashValue(`${parsed.host}${parsed.pathname}`),
    }
  } catch {
    return { urlHash: hashValue(url) }
  }
}

export function hashValue(value: string): string {
  return createHash('sha256').update(value).digest('hex').slice(0, 16)
}

function compact(value: Record<string, unknown>): Record<string, unknown> {
  const next: Record<string, unknown> = {}
  for (const [key, val] of Object.entries(value)) {
    if (val === undefined || val === null) continue
    next[key] = val
  }
  return next
}

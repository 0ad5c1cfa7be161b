/**
 * Error taxonomy for the ingestion pipeline.
 *
 * Fetch, parse and extraction errors for one source are caught at the
 * dispatcher boundary and land in the batch report. PersistenceError comes
 * from @regwatch/db and points at a logic defect when it surfaces.
 */

export { PersistenceError } from '@regwatch/db'

export type FetchErrorKind = 'http' | 'network' | 'timeout' | 'too_large'

export class FetchError extends Error {
  readonly code = 'FETCH_ERROR'
  readonly kind: FetchErrorKind
  readonly url: string
  /** Last HTTP status seen, if any response arrived. */
  readonly status?: number
  readonly attempts: number

  constructor(
    message: string,
    details: { kind: FetchErrorKind; url: string; status?: number; attempts: number; cause?: unknown }
  ) {
    super(message, { cause: details.cause })
    this.name = 'FetchError'
    this.kind = details.kind
    this.url = details.url
    this.status = details.status
    this.attempts = details.attempts
  }
}

export type ParseFormat = 'feed' | 'html' | 'json-ld'

/** Malformed input. Triggers the next extraction attempt, never fatal on its own. */
export class ParseError extends Error {
  readonly code = 'PARSE_ERROR'
  readonly format: ParseFormat

  constructor(message: string, format: ParseFormat, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause })
    this.name = 'ParseError'
    this.format = format
  }
}

/** A strategy ran but produced no valid items. Informational. */
export class ExtractionError extends Error {
  readonly code = 'EXTRACTION_EMPTY'
  readonly strategy: string

  constructor(message: string, strategy: string) {
    super(message)
    this.name = 'ExtractionError'
    this.strategy = strategy
  }
}

export class UnsupportedSourceTypeError extends Error {
  readonly code = 'UNSUPPORTED_SOURCE_TYPE'
  readonly sourceType: string

  constructor(sourceType: string) {
    super(`Unsupported source type: ${sourceType}`)
    this.name = 'UnsupportedSourceTypeError'
    this.sourceType = sourceType
  }
}

export class ConfigError extends Error {
  readonly code = 'CONFIG_INVALID'
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`)
    this.name = 'ConfigError'
    this.issues = issues
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * "<Name>: <message>" for batch reports.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`
  }
  return `Error: ${String(error)}`
}

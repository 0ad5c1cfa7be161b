/**
 * A write the schema rejected. URL-keyed upserts should make these
 * impossible, so one reaching a caller points at a logic defect.
 */
export class PersistenceError extends Error {
  readonly code = 'PERSISTENCE_ERROR'
  readonly constraint?: string

  constructor(message: string, options?: { cause?: unknown; constraint?: string }) {
    super(message, { cause: options?.cause })
    this.name = 'PersistenceError'
    this.constraint = options?.constraint
  }
}

const UNIQUE_VIOLATION = '23505'
const FOREIGN_KEY_VIOLATION = '23503'

/**
 * Wrap pg constraint violations; anything else is rethrown untouched.
 */
export function toPersistenceError(error: unknown, operation: string): unknown {
  if (!(error instanceof Error) || !('code' in error)) {
    return error
  }
  if (error.code !== UNIQUE_VIOLATION && error.code !== FOREIGN_KEY_VIOLATION) {
    return error
  }
  const constraint = 'constraint' in error && typeof error.constraint === 'string' ? error.constraint : undefined
  return new PersistenceError(`${operation}: ${error.message}`, { cause: error, constraint })
}

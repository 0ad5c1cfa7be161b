import { readdir, readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { fileURLToPath } from 'node:url'
import type { PgPoolLike } from './pg-store.js'

export const DEFAULT_MIGRATIONS_DIR = fileURLToPath(new URL('../migrations/', import.meta.url))

const CREATE_LEDGER_SQL = `
  CREATE TABLE IF NOT EXISTS schema_migrations (
    name        TEXT PRIMARY KEY,
    applied_at  TIMESTAMPTZ NOT NULL DEFAULT now()
  )`

export interface MigrationOptions {
  dir?: string
  onApplied?: (name: string) => void
}

/**
 * Apply every `*.sql` file in `dir` not yet recorded in schema_migrations,
 * in file-name order, each inside its own transaction.
 *
 * @returns names of the files applied by this call
 */
export async function runMigrations(pool: PgPoolLike, options: MigrationOptions = {}): Promise<string[]> {
  const dir = options.dir ?? DEFAULT_MIGRATIONS_DIR
  await pool.query(CREATE_LEDGER_SQL)

  const appliedRows = await pool.query<{ name: string }>('SELECT name FROM schema_migrations')
  const alreadyApplied = new Set(appliedRows.rows.map((row) => row.name))

  const files = (await readdir(dir)).filter((file) => file.endsWith('.sql')).sort()
  const applied: string[] = []

  for (const file of files) {
    if (alreadyApplied.has(file)) continue

    const sql = await readFile(join(dir, file), 'utf8')
    const client = await pool.connect()
    try {
      await client.query('BEGIN')
      await client.query(sql)
      await client.query('INSERT INTO schema_migrations (name) VALUES ($1)', [file])
      await client.query('COMMIT')
    } catch (error) {
      await client.query('ROLLBACK')
      throw new Error(`Migration ${file} failed`, { cause: error })
    } finally {
      client.release()
    }

    applied.push(file)
    options.onApplied?.(file)
  }

  return applied
}

export * from './types.js'
export * from './errors.js'
export * from './store.js'
export { createPool, getPoolConfig } from './client.js'
export { PgDocumentStore, type PgPoolLike, type PgClientLike, type Queryable } from './pg-store.js'
export { runMigrations, DEFAULT_MIGRATIONS_DIR, type MigrationOptions } from './migrate.js'

import pg from 'pg'
import type { Pool, PoolConfig } from 'pg'

/**
 * Connection pool configuration
 *
 * Environment variables:
 * - DB_POOL_MAX: Maximum connections (default: 10)
 * - DB_POOL_MIN: Minimum idle connections (default: 0)
 * - DB_SERVICE_NAME: Application name for pg_stat_activity (default: regwatch)
 */
export function getPoolConfig(connectionString: string, env: NodeJS.ProcessEnv = process.env): PoolConfig {
  return {
    connectionString,

    max: parseInt(env.DB_POOL_MAX || '10', 10),
    min: parseInt(env.DB_POOL_MIN || '0', 10),

    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,

    // Recycle connections after N queries
    maxUses: 7500,

    // Keep NAT/firewalls from dropping idle TCP connections
    keepAlive: true,
    keepAliveInitialDelayMillis: 10000,

    application_name: env.DB_SERVICE_NAME || 'regwatch',
  }
}

/**
 * Creates a pool for DATABASE_URL (or the given connection string).
 */
export function createPool(connectionString = process.env.DATABASE_URL): Pool {
  if (!connectionString) {
    throw new Error('DATABASE_URL environment variable is not set')
  }
  return new pg.Pool(getPoolConfig(connectionString))
}

/**
 * Environment loader - import first, before modules that read process.env.
 *
 * Loads apps/harvester/.env and then .env.local outside production;
 * production injects variables directly.
 */
import { config } from 'dotenv'
import { fileURLToPath } from 'node:url'

if (process.env.NODE_ENV !== 'production') {
  config({ path: fileURLToPath(new URL('../.env.local', import.meta.url)) })
  config({ path: fileURLToPath(new URL('../.env', import.meta.url)) })
}

/**
 * Environment loader - import before anything that reads settings.
 *
 * Loads apps/harvester/.env.local outside production. Production relies on
 * variables injected by the platform.
 */
import { config } from 'dotenv'
import { fileURLToPath } from 'node:url'

if (process.env.NODE_ENV !== 'production') {
  config({ path: fileURLToPath(new URL('../.env.local', import.meta.url)) })
}

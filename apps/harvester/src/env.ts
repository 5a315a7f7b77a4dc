/**
 * Environment loader - must be imported first before any other modules
 *
 * This uses an explicit path to load from apps/harvester/.env.local
 * Only loads in development - production uses platform-injected env vars
 */
import { config } from 'dotenv'
import { fileURLToPath } from 'node:url'

if (process.env.NODE_ENV !== 'production') {
  config({ path: fileURLToPath(new URL('../.env.local', import.meta.url)) })
}

/**
 * Environment loader - import first, before any module that reads process.env
 *
 * Loads apps/harvester/.env.local for local runs only. The scheduler that
 * invokes the job in production injects env vars directly.
 */
import { config } from 'dotenv'
import { fileURLToPath } from 'node:url'

if (process.env.NODE_ENV !== 'production') {
  config({ path: fileURLToPath(new URL('../.env.local', import.meta.url)) })
}

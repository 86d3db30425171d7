/**
 * Scheduled entry point. The event and context carry nothing the job uses.
 */

import './env.js'
import { loadConfig } from './config/config.js'
import { loggers } from './config/logger.js'
import { classifyError, formatErrorForLog } from './lib/errors.js'
import { createOrchestrator } from './bootstrap.js'

const log = loggers.handler

export interface HandlerResponse {
  statusCode: number
  body: string
}

export async function handler(_event?: unknown, _context?: unknown): Promise<HandlerResponse> {
  try {
    const config = loadConfig()
    const summary = await createOrchestrator(config).run()

    return {
      statusCode: 200,
      body: JSON.stringify({
        message: summary.message,
        searched_count: summary.searchedCount,
      }),
    }
  } catch (error) {
    log.error('Price sync run failed', formatErrorForLog(classifyError(error)), error)
    throw error
  }
}

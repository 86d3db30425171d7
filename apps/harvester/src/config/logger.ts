/**
 * Harvester Logger Configuration
 *
 * Pre-configured loggers for price sync components
 */

import { createLogger } from '@partprice/logger'

export const rootLogger = createLogger('harvester')

export const loggers = {
  handler: rootLogger.child('handler'),
  warehouse: rootLogger.child('warehouse'),
  pricing: rootLogger.child('pricing'),
  sync: rootLogger.child('sync'),
  storage: rootLogger.child('storage'),
  cli: rootLogger.child('cli'),
}

/**
 * Price Sync Orchestrator
 *
 * One run:
 * 1. Reset every output object to its header row
 * 2. Read part numbers from the warehouse
 * 3. Price each part number (sequential, throttled)
 * 4. Write error logs, raw prices, cleaned prices
 *
 * Any failure outside per-part lookups aborts the run. Objects reset in
 * step 1 stay header-only when a later step fails.
 */

import type { ILogger } from '@partprice/logger'
import { createRunId, createRunLogger, type RunLogger } from './config/run-log.js'
import { CsvWriter } from './storage/csv-writer.js'
import type { ObjectStore } from './storage/object-store.js'
import { collectPrices, type Sleep } from './sync/aggregate.js'
import {
  CLEANED_PRICE_TABLE,
  MULTI_RESULT_LOG,
  NOT_FOUND_LOG,
  OUTPUT_LAYOUTS,
  PRICE_TABLE,
} from './sync/layouts.js'
import type { PartSource, PriceLookup, PriceSyncResults, RunSummary } from './types.js'

export const RUN_COMPLETE_MESSAGE = 'Price scrape complete'

export interface PriceSyncDependencies {
  partSource: PartSource
  priceLookup: PriceLookup
  store: ObjectStore
  logger: ILogger
  /** Wait after each lookup, in ms */
  delayMs: number
  vendorId?: string
  sleep?: Sleep
}

export class PriceSyncOrchestrator {
  private readonly deps: PriceSyncDependencies
  private readonly writer: CsvWriter

  constructor(deps: PriceSyncDependencies) {
    this.deps = deps
    this.writer = new CsvWriter(deps.store, deps.logger.child('storage'))
  }

  async run(runId: string = createRunId()): Promise<RunSummary> {
    const log = createRunLogger(this.deps.logger, {
      workflow: 'price-sync',
      runId,
      vendorId: this.deps.vendorId,
    })
    const startTime = Date.now()
    log.info('RUN_START')

    await this.resetOutputs(log.child({ stage: 'reset' }))

    const records = await this.deps.partSource.fetchPartRecords()
    log.info('PARTS_LOADED', { stage: 'read', count: records.length })

    const results = await collectPrices(records, {
      lookup: this.deps.priceLookup,
      delayMs: this.deps.delayMs,
      logger: log,
      sleep: this.deps.sleep,
    })

    await this.writeResults(results, log.child({ stage: 'write' }))

    const summary: RunSummary = {
      message: RUN_COMPLETE_MESSAGE,
      searchedCount: records.length,
      pricedCount: results.cleanedResults.length,
      notFoundCount: results.notFound.length,
    }
    log.info('RUN_COMPLETE', { ...summary, durationMs: Date.now() - startTime })
    return summary
  }

  private async resetOutputs(log: RunLogger): Promise<void> {
    for (const layout of OUTPUT_LAYOUTS) {
      await this.writer.reset(layout.key, layout.columns)
    }
    log.info('OUTPUTS_RESET', { keys: OUTPUT_LAYOUTS.map(layout => layout.key) })
  }

  private async writeResults(results: PriceSyncResults, log: RunLogger): Promise<void> {
    // Empty error logs keep their reset header-only contents
    if (results.multipleResults.length > 0) {
      await this.writer.write(MULTI_RESULT_LOG.key, MULTI_RESULT_LOG.columns, results.multipleResults)
    }
    if (results.notFound.length > 0) {
      await this.writer.write(NOT_FOUND_LOG.key, NOT_FOUND_LOG.columns, results.notFound)
    }

    await this.writer.write(PRICE_TABLE.key, PRICE_TABLE.columns, results.rawResults)
    await this.writer.write(CLEANED_PRICE_TABLE.key, CLEANED_PRICE_TABLE.columns, results.cleanedResults)

    log.info('RESULTS_WRITTEN', {
      rawCount: results.rawResults.length,
      cleanedCount: results.cleanedResults.length,
      notFoundCount: results.notFound.length,
      multipleResultsCount: results.multipleResults.length,
    })
  }
}

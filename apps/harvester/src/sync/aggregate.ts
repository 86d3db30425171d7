/**
 * Result Aggregator
 *
 * Prices each part record in input order, one lookup at a time, waiting a
 * fixed delay after every lookup.
 */

import type { RunLogger } from '../config/run-log.js'
import {
  ERROR_REASONS,
  NOT_FOUND_COST,
  type ErrorEntry,
  type PartRecord,
  type PriceLookup,
  type PriceResult,
  type PriceSyncResults,
} from '../types.js'
import { cleanPriceResults } from './clean.js'

export type Sleep = (ms: number) => Promise<void>

export const sleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms))

export interface CollectPricesOptions {
  lookup: PriceLookup
  /** Wait after each lookup, in ms. 0 disables the wait. */
  delayMs: number
  logger: RunLogger
  sleep?: Sleep
}

export async function collectPrices(
  records: readonly PartRecord[],
  options: CollectPricesOptions
): Promise<PriceSyncResults> {
  const wait = options.sleep ?? sleep
  const log = options.logger.child({ stage: 'fetch' })

  const rawResults: PriceResult[] = []
  const notFound: ErrorEntry[] = []
  // Reserved: nothing detects ambiguous search results yet
  const multipleResults: ErrorEntry[] = []

  for (const [index, record] of records.entries()) {
    const price = await options.lookup.lookupPrice(record.vendorPartNumber)

    if (price === null) {
      notFound.push({ vendorPartNumber: record.vendorPartNumber, errorReason: ERROR_REASONS.NO_RESULTS })
      rawResults.push({ ...record, cost: NOT_FOUND_COST })
    } else {
      rawResults.push({ ...record, cost: price })
    }

    log.debug('PART_PRICED', {
      vendorPartNumber: record.vendorPartNumber,
      position: index + 1,
      total: records.length,
      found: price !== null,
    })

    if (options.delayMs > 0) {
      await wait(options.delayMs)
    }
  }

  const cleanedResults = cleanPriceResults(rawResults)

  log.info('PRICING_COMPLETE', {
    searchedCount: records.length,
    pricedCount: cleanedResults.length,
    notFoundCount: notFound.length,
  })

  return { rawResults, cleanedResults, notFound, multipleResults }
}

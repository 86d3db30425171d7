/**
 * Price Fetcher
 *
 * Builds the search URL for a vendor part number, fetches it, and extracts
 * the displayed price. Every failure (network, HTTP status, timeout, missing
 * element, no number) collapses to null.
 */

import type { ILogger } from '@partprice/logger'
import { sanitizeUrl } from '../config/run-log.js'
import type { PriceLookup } from '../types.js'
import { extractPrice } from './extract.js'
import { SEARCH_PATH } from './selectors.js'
import type { Fetcher, FetchResult } from './types.js'

export interface PriceFetcherOptions {
  fetcher: Fetcher
  baseUrl: string
  timeoutMs: number
  logger: ILogger
}

export function buildSearchUrl(baseUrl: string, vendorPartNumber: string): string {
  const url = new URL(SEARCH_PATH, baseUrl)
  url.searchParams.set('partnum', vendorPartNumber)
  return url.toString()
}

export class PriceFetcher implements PriceLookup {
  private readonly fetcher: Fetcher
  private readonly baseUrl: string
  private readonly timeoutMs: number
  private readonly log: ILogger

  constructor(options: PriceFetcherOptions) {
    this.fetcher = options.fetcher
    this.baseUrl = options.baseUrl
    this.timeoutMs = options.timeoutMs
    this.log = options.logger
  }

  async lookupPrice(vendorPartNumber: string): Promise<string | null> {
    const url = buildSearchUrl(this.baseUrl, vendorPartNumber)
    let result: FetchResult
    try {
      result = await this.fetcher.fetch(url, { timeoutMs: this.timeoutMs })
    } catch (error) {
      this.log.warn('Search page fetch threw', { vendorPartNumber, ...sanitizeUrl(url) }, error)
      return null
    }

    if (result.status !== 'ok') {
      this.log.warn('Search page fetch failed', {
        vendorPartNumber,
        status: result.status,
        statusCode: result.status === 'error' ? result.statusCode : undefined,
        fetchError: result.error,
        durationMs: result.durationMs,
        ...sanitizeUrl(url),
      })
      return null
    }

    const price = extractPrice(result.html)
    if (price === null) {
      this.log.debug('No displayed price on search page', { vendorPartNumber, durationMs: result.durationMs })
    }
    return price
  }
}

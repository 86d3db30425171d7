/**
 * Price Sync Core Types
 */

/** One warehouse row: the retailer's part number and our catalog number. */
export interface PartRecord {
  vendorPartNumber: string
  internalPartNumber: string
}

/** Cost sentinel for lookups that produced no usable price. */
export const NOT_FOUND_COST = 'Not Found'

export interface PriceResult {
  vendorPartNumber: string
  internalPartNumber: string
  /** Decimal string such as "42.95", or NOT_FOUND_COST */
  cost: string
}

export const ERROR_REASONS = {
  NO_RESULTS: 'No results found',
  // Reserved: the fetcher takes the first matching element and never reports ambiguity
  MULTIPLE_RESULTS: 'Multiple results found',
} as const

export type ErrorReason = (typeof ERROR_REASONS)[keyof typeof ERROR_REASONS]

export interface ErrorEntry {
  vendorPartNumber: string
  errorReason: ErrorReason
}

export interface PriceSyncResults {
  rawResults: PriceResult[]
  cleanedResults: PriceResult[]
  notFound: ErrorEntry[]
  multipleResults: ErrorEntry[]
}

export interface RunSummary {
  message: string
  searchedCount: number
  pricedCount: number
  notFoundCount: number
}

/**
 * Looks up the current price for one vendor part number.
 * Resolves to a decimal string, or null when no usable price was found.
 * Never rejects for per-part failures.
 */
export interface PriceLookup {
  lookupPrice(vendorPartNumber: string): Promise<string | null>
}

/** Source of the part numbers to price. */
export interface PartSource {
  fetchPartRecords(): Promise<PartRecord[]>
}

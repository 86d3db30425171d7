/**
 * CSV output layouts: object key plus ordered columns.
 */

import type { ErrorEntry, PriceResult } from '../types.js'

export interface CsvColumn<T> {
  header: string
  value: (row: T) => string
}

export interface CsvLayout<T> {
  key: string
  columns: ReadonlyArray<CsvColumn<T>>
}

const errorColumns: ReadonlyArray<CsvColumn<ErrorEntry>> = [
  { header: 'VendorPartNumber', value: row => row.vendorPartNumber },
  { header: 'Error', value: row => row.errorReason },
]

const priceColumns: ReadonlyArray<CsvColumn<PriceResult>> = [
  { header: 'SupplierPartNumber', value: row => row.vendorPartNumber },
  { header: 'Partnumber', value: row => row.internalPartNumber },
  { header: 'Cost', value: row => row.cost },
]

export const MULTI_RESULT_LOG: CsvLayout<ErrorEntry> = {
  key: 'multi_result_error_log.csv',
  columns: errorColumns,
}

export const NOT_FOUND_LOG: CsvLayout<ErrorEntry> = {
  key: 'not_found_error_log.csv',
  columns: errorColumns,
}

export const PRICE_TABLE: CsvLayout<PriceResult> = {
  key: 'part_numbers_with_prices.csv',
  columns: priceColumns,
}

export const CLEANED_PRICE_TABLE: CsvLayout<PriceResult> = {
  key: 'cleaned_part_numbers_with_prices.csv',
  columns: priceColumns,
}

/** Every object a run owns, in reset order. */
export const OUTPUT_LAYOUTS = [MULTI_RESULT_LOG, NOT_FOUND_LOG, PRICE_TABLE, CLEANED_PRICE_TABLE] as const

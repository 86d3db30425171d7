import { matchDecimal } from '../pricing/extract.js'
import type { PriceResult } from '../types.js'

/**
 * Priced-only view of the raw results: each cost is re-matched against the
 * decimal pattern and rows without a match (the "Not Found" sentinel) are
 * dropped. Numeric costs pass through unchanged.
 */
export function cleanPriceResults(rawResults: readonly PriceResult[]): PriceResult[] {
  const cleaned: PriceResult[] = []
  for (const row of rawResults) {
    const cost = matchDecimal(row.cost)
    if (cost === null) continue
    cleaned.push({ ...row, cost })
  }
  return cleaned
}

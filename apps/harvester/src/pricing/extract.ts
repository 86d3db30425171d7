/**
 * Price extraction from search result HTML.
 *
 * Kept free of network and storage concerns so selector drift can be
 * fixed and tested in one place.
 */

import * as cheerio from 'cheerio'
import { PRICE_PATTERN, SELECTORS } from './selectors.js'

/**
 * First decimal number in `text`, e.g. "$42.95 each" → "42.95".
 */
export function matchDecimal(text: string): string | null {
  const match = PRICE_PATTERN.exec(text)
  return match ? match[0] : null
}

/**
 * Displayed price of the first listing on a search page, or null when the
 * page has no price element or the element holds no number.
 */
export function extractPrice(html: string): string | null {
  const $ = cheerio.load(html)
  const priceEl = $(SELECTORS.displayedPrice).first()
  if (priceEl.length === 0) {
    return null
  }

  return matchDecimal(priceEl.text())
}

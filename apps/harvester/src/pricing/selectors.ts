/**
 * Search Results Selectors
 *
 * The search page renders each listing's displayed price inside a span whose
 * id starts with "dprice"; the amount text sits in a nested span.
 */

export const SELECTORS = {
  displayedPrice: "span[id^='dprice'] span",
} as const

export const SEARCH_PATH = '/en/partsearch/'

/** First decimal number in a string: digits with an optional fractional part */
export const PRICE_PATTERN = /\d+(\.\d+)?/

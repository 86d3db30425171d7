/**
 * Fetcher Types
 *
 * Abstraction over the HTTP GET used for search pages, so lookups can be
 * tested without a network.
 */

export interface Fetcher {
  fetch(url: string, options?: FetchOptions): Promise<FetchResult>
}

export interface FetchOptions {
  /** Request timeout in ms */
  timeoutMs?: number

  /** Custom headers (merged with defaults) */
  headers?: Record<string, string>
}

export const DEFAULT_FETCH_HEADERS = {
  Accept: 'text/html,application/xhtml+xml',
  'Accept-Language': 'en-US,en;q=0.9',
} as const

export const DEFAULT_FETCH_OPTIONS = {
  timeoutMs: 10_000,
} as const satisfies FetchOptions

export type FetchResult =
  | { status: 'ok'; statusCode: number; html: string; durationMs: number }
  | { status: 'error'; statusCode?: number; error: string; durationMs: number }
  | { status: 'timeout'; error: string; durationMs: number }

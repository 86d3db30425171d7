/**
 * HTTP Fetcher
 *
 * Single GET per call using native fetch. One attempt only: a failure is
 * reported in the result and left to the caller.
 */

import type { Fetcher, FetchOptions, FetchResult } from './types.js'
import { DEFAULT_FETCH_HEADERS, DEFAULT_FETCH_OPTIONS } from './types.js'

export interface HttpFetcherOptions {
  /** Headers sent with every request, e.g. User-Agent */
  headers?: Record<string, string>

  /** Default timeout when the call does not pass one */
  timeoutMs?: number
}

export class HttpFetcher implements Fetcher {
  private readonly headers: Record<string, string>
  private readonly timeoutMs: number

  constructor(options: HttpFetcherOptions = {}) {
    this.headers = { ...DEFAULT_FETCH_HEADERS, ...(options.headers ?? {}) }
    this.timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_OPTIONS.timeoutMs
  }

  async fetch(url: string, options: FetchOptions = {}): Promise<FetchResult> {
    const startTime = Date.now()
    const timeoutMs = options.timeoutMs ?? this.timeoutMs
    const headers = { ...this.headers, ...(options.headers ?? {}) }

    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs)

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers,
        signal: controller.signal,
        redirect: 'follow',
      })

      if (!response.ok) {
        // Drain the body so the connection can be reused
        await response.body?.cancel()
        return {
          status: 'error',
          statusCode: response.status,
          durationMs: Date.now() - startTime,
          error: `HTTP ${response.status}: ${response.statusText}`,
        }
      }

      const html = await response.text()
      return {
        status: 'ok',
        statusCode: response.status,
        html,
        durationMs: Date.now() - startTime,
      }
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        return {
          status: 'timeout',
          durationMs: Date.now() - startTime,
          error: `Request timed out after ${timeoutMs}ms`,
        }
      }

      return {
        status: 'error',
        durationMs: Date.now() - startTime,
        error: error instanceof Error ? error.message : String(error),
      }
    } finally {
      clearTimeout(timeoutId)
    }
  }
}

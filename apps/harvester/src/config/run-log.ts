/**
 * Structured logging helpers for price sync runs.
 *
 * Every entry carries the run envelope (workflow, runId, stage) plus an
 * event_name. Full scrape URLs are reported as host/path/hash.
 */

import { createHash } from 'node:crypto'
import type { ILogger, LogContext } from '@partprice/logger'

export type RunLogContext = {
  workflow: string
  runId?: string
  stage?: string
  vendorId?: string
  vendorPartNumber?: string
  key?: string
  [key: string]: unknown
}

type LogMeta = Record<string, unknown>

export interface RunLogger {
  debug(event: string, meta?: LogMeta): void
  info(event: string, meta?: LogMeta): void
  warn(event: string, meta?: LogMeta, err?: unknown): void
  error(event: string, meta?: LogMeta, err?: unknown): void
  child(extra: Partial<RunLogContext>): RunLogger
}

export function createRunLogger(base: ILogger, context: RunLogContext): RunLogger {
  const baseContext = compact(context)

  const payload = (event: string, meta?: LogMeta): LogContext => ({
    event_name: event,
    ...baseContext,
    ...(meta ? compact(meta) : {}),
  })

  return {
    debug: (event, meta) => base.debug(event, payload(event, meta)),
    info: (event, meta) => base.info(event, payload(event, meta)),
    warn: (event, meta, err) => base.warn(event, payload(event, meta), err),
    error: (event, meta, err) => base.error(event, payload(event, meta), err),
    child: extra => createRunLogger(base, { ...context, ...extra }),
  }
}

export function sanitizeUrl(url?: string | null): {
  urlHost?: string
  urlPath?: string
  urlHash?: string
} {
  if (!url) return {}
  try {
    const parsed = new URL(url)
    return {
      urlHost: parsed.host,
      urlPath: parsed.pathname,
      urlHash: hashValue(`${parsed.host}${parsed.pathname}${parsed.search}`),
    }
  } catch {
    return { urlHash: hashValue(url) }
  }
}

export function hashValue(value: string): string {
  return createHash('sha256').update(value).digest('hex').slice(0, 16)
}

export function createRunId(now: Date = new Date()): string {
  return `run_${now.toISOString().replace(/[-:.]/g, '')}_${hashValue(`${now.getTime()}:${Math.random()}`).slice(0, 6)}`
}

function compact(value: LogMeta): LogMeta {
  const next: LogMeta = {}
  for (const [key, val] of Object.entries(value)) {
    if (val === undefined || val === null) continue
    next[key] = val
  }
  return next
}

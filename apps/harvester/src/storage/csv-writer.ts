/**
 * Storage Writer
 *
 * Serializes rows to CSV (header row first, columns in layout order) and
 * overwrites the object at the layout's key.
 */

import { stringify } from 'csv-stringify/sync'
import type { ILogger } from '@partprice/logger'
import type { CsvColumn } from '../sync/layouts.js'
import type { ObjectStore } from './object-store.js'

export const CSV_CONTENT_TYPE = 'text/csv; charset=utf-8'

export function serializeCsv<T>(columns: ReadonlyArray<CsvColumn<T>>, rows: readonly T[]): string {
  const headers = columns.map(column => column.header)
  const records = rows.map(row => {
    const record: Record<string, string> = {}
    for (const column of columns) {
      record[column.header] = column.value(row)
    }
    return record
  })

  return stringify(records, { header: true, columns: headers })
}

export class CsvWriter {
  constructor(
    private readonly store: ObjectStore,
    private readonly log: ILogger
  ) {}

  async write<T>(key: string, columns: ReadonlyArray<CsvColumn<T>>, rows: readonly T[]): Promise<void> {
    await this.store.putObject(key, serializeCsv(columns, rows), CSV_CONTENT_TYPE)
    this.log.info('CSV written', { key, rows: rows.length })
  }

  /** Overwrite the object with the header row only. */
  async reset(key: string, columns: ReadonlyArray<{ header: string }>): Promise<void> {
    const body = stringify([], { header: true, columns: columns.map(column => column.header) })
    await this.store.putObject(key, body, CSV_CONTENT_TYPE)
    this.log.debug('CSV reset', { key })
  }
}

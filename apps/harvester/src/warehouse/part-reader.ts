/**
 * Warehouse Reader
 *
 * Reads the vendor → internal part number mapping for one vendor.
 * The session is closed on every exit path.
 */

import type { ILogger } from '@partprice/logger'
import { ERROR_CODES, WarehouseError, describeCause } from '../lib/errors.js'
import type { PartRecord, PartSource } from '../types.js'

export const PART_NUMBER_QUERY = `
  SELECT VENDOR_PART_NUMBER, PART_NUMBER
    FROM SHARED_VELOCITY.ERP_COMPLETE.PRODUCT_TO_VENDOR
   WHERE vendor_id = ?
`

export type WarehouseRow = Record<string, unknown>

export interface WarehouseSession {
  query(sqlText: string, binds: string[]): Promise<WarehouseRow[]>
  close(): Promise<void>
}

export type WarehouseSessionFactory = () => Promise<WarehouseSession>

export interface WarehousePartReaderOptions {
  openSession: WarehouseSessionFactory
  vendorId: string
  logger: ILogger
}

export class WarehousePartReader implements PartSource {
  private readonly openSession: WarehouseSessionFactory
  private readonly vendorId: string
  private readonly log: ILogger

  constructor(options: WarehousePartReaderOptions) {
    this.openSession = options.openSession
    this.vendorId = options.vendorId
    this.log = options.logger
  }

  async fetchPartRecords(): Promise<PartRecord[]> {
    let session: WarehouseSession
    try {
      session = await this.openSession()
    } catch (error) {
      if (error instanceof WarehouseError) throw error
      throw new WarehouseError(
        `Failed to connect to warehouse: ${describeCause(error)}`,
        ERROR_CODES.WAREHOUSE_CONNECT_FAILED,
        error
      )
    }

    let rows: WarehouseRow[]
    try {
      rows = await session.query(PART_NUMBER_QUERY, [this.vendorId])
    } catch (error) {
      await this.closeAfterFailure(session)
      if (error instanceof WarehouseError) throw error
      throw new WarehouseError(
        `Part number query failed: ${describeCause(error)}`,
        ERROR_CODES.WAREHOUSE_QUERY_FAILED,
        error
      )
    }

    try {
      await session.close()
    } catch (error) {
      // Rows are already in memory
      this.log.warn('Failed to close warehouse session', { vendorId: this.vendorId }, error)
    }

    const records = rows.map(toPartRecord)
    this.log.info('Fetched part numbers', { vendorId: this.vendorId, count: records.length })
    return records
  }

  private async closeAfterFailure(session: WarehouseSession): Promise<void> {
    try {
      await session.close()
    } catch (closeError) {
      this.log.warn('Failed to close warehouse session after query error', { vendorId: this.vendorId }, closeError)
    }
  }
}

function columnText(row: WarehouseRow, column: string): string {
  const value = row[column]
  return value === undefined || value === null ? '' : String(value)
}

export function toPartRecord(row: WarehouseRow): PartRecord {
  return {
    vendorPartNumber: columnText(row, 'VENDOR_PART_NUMBER'),
    internalPartNumber: columnText(row, 'PART_NUMBER'),
  }
}

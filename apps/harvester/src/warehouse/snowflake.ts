/**
 * Snowflake-backed warehouse session.
 */

import snowflake from 'snowflake-sdk'
import type { Connection } from 'snowflake-sdk'
import type { WarehouseCredentials } from '../config/config.js'
import { ERROR_CODES, WarehouseError } from '../lib/errors.js'
import type { WarehouseRow, WarehouseSession, WarehouseSessionFactory } from './part-reader.js'

class SnowflakeSession implements WarehouseSession {
  constructor(private readonly connection: Connection) {}

  query(sqlText: string, binds: string[]): Promise<WarehouseRow[]> {
    return new Promise((resolve, reject) => {
      this.connection.execute({
        sqlText,
        binds,
        complete: (err, _stmt, rows) => {
          if (err) {
            reject(new WarehouseError(`Part number query failed: ${err.message}`, ERROR_CODES.WAREHOUSE_QUERY_FAILED, err))
            return
          }
          resolve(rows ?? [])
        },
      })
    })
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.connection.destroy(err => {
        if (err) {
          reject(err)
          return
        }
        resolve()
      })
    })
  }
}

export function snowflakeSessionFactory(credentials: WarehouseCredentials): WarehouseSessionFactory {
  return () =>
    new Promise((resolve, reject) => {
      const connection = snowflake.createConnection({
        account: credentials.account,
        username: credentials.username,
        password: credentials.password,
        warehouse: credentials.warehouse,
        role: credentials.role,
      })

      connection.connect(err => {
        if (err) {
          reject(new WarehouseError(`Failed to connect to warehouse: ${err.message}`, ERROR_CODES.WAREHOUSE_CONNECT_FAILED, err))
          return
        }
        resolve(new SnowflakeSession(connection))
      })
    })
}

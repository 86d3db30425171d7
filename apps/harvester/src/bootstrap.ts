/**
 * Wires production clients into the orchestrator and price fetcher.
 */

import type { PriceSyncConfig, ScrapeConfig } from './config/config.js'
import { loggers, rootLogger } from './config/logger.js'
import { PriceSyncOrchestrator } from './orchestrator.js'
import { HttpFetcher } from './pricing/http-fetcher.js'
import { PriceFetcher } from './pricing/price-fetcher.js'
import { S3ObjectStore } from './storage/s3-object-store.js'
import { WarehousePartReader } from './warehouse/part-reader.js'
import { snowflakeSessionFactory } from './warehouse/snowflake.js'

export function createPriceFetcher(scrape: ScrapeConfig): PriceFetcher {
  return new PriceFetcher({
    fetcher: new HttpFetcher({
      headers: { 'User-Agent': scrape.userAgent },
      timeoutMs: scrape.timeoutMs,
    }),
    baseUrl: scrape.baseUrl,
    timeoutMs: scrape.timeoutMs,
    logger: loggers.pricing,
  })
}

export function createOrchestrator(config: PriceSyncConfig): PriceSyncOrchestrator {
  return new PriceSyncOrchestrator({
    partSource: new WarehousePartReader({
      openSession: snowflakeSessionFactory(config.warehouse),
      vendorId: config.vendorId,
      logger: loggers.warehouse,
    }),
    priceLookup: createPriceFetcher(config.scrape),
    store: new S3ObjectStore({ bucket: config.bucket, region: config.region }),
    logger: rootLogger,
    delayMs: config.scrape.delayMs,
    vendorId: config.vendorId,
  })
}

/**
 * Job configuration, read from the environment.
 *
 * Credentials are provisioned outside the job; this module only validates
 * that they are present.
 */

import { z } from 'zod'
import { ConfigError } from '../lib/errors.js'

export const DEFAULT_VENDOR_ID = '70084'
export const DEFAULT_SCRAPE_BASE_URL = 'https://www.rockauto.com'
export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64)'
export const DEFAULT_TIMEOUT_MS = 10_000
export const DEFAULT_DELAY_MS = 1_000

const required = (name: string) => z.string({ required_error: `${name} is required` }).trim().min(1, `${name} is required`)

const scrapeEnvSchema = z.object({
  SCRAPE_BASE_URL: z.string().url().default(DEFAULT_SCRAPE_BASE_URL),
  SCRAPE_USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
  SCRAPE_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  SCRAPE_DELAY_MS: z.coerce.number().int().nonnegative().default(DEFAULT_DELAY_MS),
})

const envSchema = scrapeEnvSchema.extend({
  SNOWFLAKE_ACCOUNT: required('SNOWFLAKE_ACCOUNT'),
  SNOWFLAKE_USERNAME: required('SNOWFLAKE_USERNAME'),
  SNOWFLAKE_PASSWORD: required('SNOWFLAKE_PASSWORD'),
  SNOWFLAKE_WAREHOUSE: required('SNOWFLAKE_WAREHOUSE'),
  SNOWFLAKE_ROLE: required('SNOWFLAKE_ROLE'),
  PRICE_VENDOR_ID: z.string().trim().min(1).default(DEFAULT_VENDOR_ID),
  PRICE_BUCKET: required('PRICE_BUCKET'),
  AWS_REGION: z.string().trim().min(1).default('us-east-1'),
})

export interface WarehouseCredentials {
  account: string
  username: string
  password: string
  warehouse: string
  role: string
}

export interface ScrapeConfig {
  baseUrl: string
  userAgent: string
  timeoutMs: number
  delayMs: number
}

export interface PriceSyncConfig {
  warehouse: WarehouseCredentials
  vendorId: string
  bucket: string
  region: string
  scrape: ScrapeConfig
}

function toConfigError(error: z.ZodError): ConfigError {
  return new ConfigError(
    error.issues.map(issue => {
      const path = issue.path.join('.')
      return issue.message.startsWith(path) ? issue.message : `${path}: ${issue.message}`
    })
  )
}

function toScrapeConfig(values: z.infer<typeof scrapeEnvSchema>): ScrapeConfig {
  return {
    baseUrl: values.SCRAPE_BASE_URL.replace(/\/+$/, ''),
    userAgent: values.SCRAPE_USER_AGENT,
    timeoutMs: values.SCRAPE_TIMEOUT_MS,
    delayMs: values.SCRAPE_DELAY_MS,
  }
}

/**
 * Scrape settings only, for tools that never touch the warehouse or bucket.
 */
export function loadScrapeConfig(env: NodeJS.ProcessEnv = process.env): ScrapeConfig {
  const parsed = scrapeEnvSchema.safeParse(env)
  if (!parsed.success) {
    throw toConfigError(parsed.error)
  }
  return toScrapeConfig(parsed.data)
}

/**
 * Validate env vars and shape them into PriceSyncConfig.
 * Throws ConfigError listing every failing variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PriceSyncConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    throw toConfigError(parsed.error)
  }

  const values = parsed.data
  return {
    warehouse: {
      account: values.SNOWFLAKE_ACCOUNT,
      username: values.SNOWFLAKE_USERNAME,
      password: values.SNOWFLAKE_PASSWORD,
      warehouse: values.SNOWFLAKE_WAREHOUSE,
      role: values.SNOWFLAKE_ROLE,
    },
    vendorId: values.PRICE_VENDOR_ID,
    bucket: values.PRICE_BUCKET,
    region: values.AWS_REGION,
    scrape: toScrapeConfig(values),
  }
}

import { describe, it, expect } from 'vitest'
import { loadConfig, loadScrapeConfig } from '../config.js'
import { ConfigError } from '../../lib/errors.js'

const baseEnv = {
  SNOWFLAKE_ACCOUNT: 'test-account',
  SNOWFLAKE_USERNAME: 'test-user',
  SNOWFLAKE_PASSWORD: 'test-secret',
  SNOWFLAKE_WAREHOUSE: 'PIPELINE',
  SNOWFLAKE_ROLE: 'test-role',
  PRICE_BUCKET: 'test-bucket',
}

describe('loadConfig', () => {
  it('applies defaults for optional settings', () => {
    expect(loadConfig(baseEnv)).toEqual({
      warehouse: {
        account: 'test-account',
        username: 'test-user',
        password: 'test-secret',
        warehouse: 'PIPELINE',
        role: 'test-role',
      },
      vendorId: '70084',
      bucket: 'test-bucket',
      region: 'us-east-1',
      scrape: {
        baseUrl: 'https://www.rockauto.com',
        userAgent: 'Mozilla/5.0 (Windows NT 10.0; Win64; x64)',
        timeoutMs: 10000,
        delayMs: 1000,
      },
    })
  })

  it('reads overrides and coerces numbers', () => {
    const config = loadConfig({
      ...baseEnv,
      PRICE_VENDOR_ID: '12',
      AWS_REGION: 'us-east-2',
      SCRAPE_BASE_URL: 'https://parts.example.com/',
      SCRAPE_TIMEOUT_MS: '2500',
      SCRAPE_DELAY_MS: '0',
    })

    expect(config.vendorId).toBe('12')
    expect(config.region).toBe('us-east-2')
    expect(config.scrape).toMatchObject({ baseUrl: 'https://parts.example.com', timeoutMs: 2500, delayMs: 0 })
  })

  it('lists every missing credential', () => {
    const { SNOWFLAKE_PASSWORD: _password, PRICE_BUCKET: _bucket, ...env } = baseEnv

    let caught: unknown
    try {
      loadConfig(env)
    } catch (error) {
      caught = error
    }

    expect(caught).toBeInstanceOf(ConfigError)
    if (!(caught instanceof ConfigError)) return
    expect(caught.issues).toEqual(['SNOWFLAKE_PASSWORD is required', 'PRICE_BUCKET is required'])
    expect(caught.code).toBe('CONFIG_INVALID')
  })

  it('treats blank values as missing', () => {
    expect(() => loadConfig({ ...baseEnv, SNOWFLAKE_ROLE: '   ' })).toThrow('SNOWFLAKE_ROLE is required')
  })

  it('rejects a negative delay', () => {
    expect(() => loadConfig({ ...baseEnv, SCRAPE_DELAY_MS: '-5' })).toThrow(ConfigError)
  })
})

describe('loadScrapeConfig', () => {
  it('needs no warehouse or bucket settings', () => {
    expect(loadScrapeConfig({ SCRAPE_DELAY_MS: '250' })).toEqual({
      baseUrl: 'https://www.rockauto.com',
      userAgent: 'Mozilla/5.0 (Windows NT 10.0; Win64; x64)',
      timeoutMs: 10000,
      delayMs: 250,
    })
  })

  it('rejects an invalid base URL', () => {
    expect(() => loadScrapeConfig({ SCRAPE_BASE_URL: 'not a url' })).toThrow(ConfigError)
  })
})

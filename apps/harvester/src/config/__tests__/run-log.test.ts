import { describe, it, expect } from 'vitest'
import { createRunId, createRunLogger, hashValue, sanitizeUrl } from '../run-log.js'
import { createMockLogger } from '../../__tests__/helpers/logger.js'

describe('createRunLogger', () => {
  it('adds the run envelope and drops empty fields', () => {
    const base = createMockLogger()
    const log = createRunLogger(base, { workflow: 'price-sync', runId: 'run_1', vendorId: undefined })

    log.info('RUN_START', { count: 2, skipped: null })

    expect(base.info).toHaveBeenCalledWith('RUN_START', {
      event_name: 'RUN_START',
      workflow: 'price-sync',
      runId: 'run_1',
      count: 2,
    })
  })

  it('merges child context over the parent', () => {
    const base = createMockLogger()
    const log = createRunLogger(base, { workflow: 'price-sync', stage: 'reset' }).child({ stage: 'write' })

    log.warn('SLOW_WRITE', undefined, new Error('slow'))

    expect(base.warn).toHaveBeenCalledWith(
      'SLOW_WRITE',
      { event_name: 'SLOW_WRITE', workflow: 'price-sync', stage: 'write' },
      expect.any(Error)
    )
  })
})

describe('sanitizeUrl', () => {
  it('reports host and path without the query', () => {
    const sanitized = sanitizeUrl('https://parts.example.com/en/partsearch/?partnum=ABC')

    expect(sanitized.urlHost).toBe('parts.example.com')
    expect(sanitized.urlPath).toBe('/en/partsearch/')
    expect(sanitized.urlHash).toBe(hashValue('parts.example.com/en/partsearch/?partnum=ABC'))
  })

  it('hashes values that are not URLs', () => {
    expect(sanitizeUrl('not a url')).toEqual({ urlHash: hashValue('not a url') })
    expect(sanitizeUrl(undefined)).toEqual({})
  })
})

describe('createRunId', () => {
  it('embeds the compact timestamp', () => {
    expect(createRunId(new Date('2026-03-01T12:30:45.123Z'))).toMatch(/^run_20260301T123045123Z_[0-9a-f]{6}$/)
  })
})

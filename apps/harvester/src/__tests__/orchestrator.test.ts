import { describe, it, expect, vi } from 'vitest'
import { PriceSyncOrchestrator } from '../orchestrator.js'
import { WarehouseError } from '../lib/errors.js'
import type { PartRecord, PartSource, PriceLookup } from '../types.js'
import { MemoryObjectStore } from './helpers/object-store.js'
import { createMockLogger } from './helpers/logger.js'

const PRICE_HEADER = 'SupplierPartNumber,Partnumber,Cost\n'
const ERROR_HEADER = 'VendorPartNumber,Error\n'

function partSourceOf(records: PartRecord[]): PartSource {
  return { fetchPartRecords: vi.fn<PartSource['fetchPartRecords']>().mockResolvedValue(records) }
}

function lookupOf(prices: Record<string, string | null>): PriceLookup {
  return {
    lookupPrice: vi.fn<PriceLookup['lookupPrice']>(async vendorPartNumber => prices[vendorPartNumber] ?? null),
  }
}

function createOrchestrator(partSource: PartSource, priceLookup: PriceLookup, store = new MemoryObjectStore()) {
  const orchestrator = new PriceSyncOrchestrator({
    partSource,
    priceLookup,
    store,
    logger: createMockLogger(),
    delayMs: 0,
    vendorId: '70084',
  })
  return { orchestrator, store }
}

describe('PriceSyncOrchestrator', () => {
  it('writes raw prices, cleaned prices and the not-found log', async () => {
    const { orchestrator, store } = createOrchestrator(
      partSourceOf([
        { vendorPartNumber: 'V-1', internalPartNumber: 'P-1' },
        { vendorPartNumber: 'V-2', internalPartNumber: 'P-2' },
        { vendorPartNumber: 'V-3', internalPartNumber: 'P-3' },
      ]),
      lookupOf({ 'V-1': '19.99', 'V-2': null, 'V-3': '5' })
    )

    const summary = await orchestrator.run('run_test')

    expect(summary).toEqual({
      message: 'Price scrape complete',
      searchedCount: 3,
      pricedCount: 2,
      notFoundCount: 1,
    })
    expect(store.objects.get('part_numbers_with_prices.csv')).toBe(
      `${PRICE_HEADER}V-1,P-1,19.99\nV-2,P-2,Not Found\nV-3,P-3,5\n`
    )
    expect(store.objects.get('cleaned_part_numbers_with_prices.csv')).toBe(
      `${PRICE_HEADER}V-1,P-1,19.99\nV-3,P-3,5\n`
    )
    expect(store.objects.get('not_found_error_log.csv')).toBe(`${ERROR_HEADER}V-2,No results found\n`)
    expect(store.objects.get('multi_result_error_log.csv')).toBe(ERROR_HEADER)
  })

  it('resets all four objects before reading the warehouse', async () => {
    const store = new MemoryObjectStore()
    const partSource: PartSource = {
      fetchPartRecords: vi.fn(async () => {
        expect(store.puts.map(put => [put.key, put.body])).toEqual([
          ['multi_result_error_log.csv', ERROR_HEADER],
          ['not_found_error_log.csv', ERROR_HEADER],
          ['part_numbers_with_prices.csv', PRICE_HEADER],
          ['cleaned_part_numbers_with_prices.csv', PRICE_HEADER],
        ])
        return []
      }),
    }
    const { orchestrator } = createOrchestrator(partSource, lookupOf({}), store)

    await orchestrator.run('run_test')

    expect(partSource.fetchPartRecords).toHaveBeenCalledTimes(1)
  })

  it('writes in order and skips empty error logs after the reset', async () => {
    const { orchestrator, store } = createOrchestrator(
      partSourceOf([{ vendorPartNumber: 'V-1', internalPartNumber: 'P-1' }]),
      lookupOf({ 'V-1': '3.25' })
    )

    await orchestrator.run('run_test')

    expect(store.puts.slice(4).map(put => put.key)).toEqual([
      'part_numbers_with_prices.csv',
      'cleaned_part_numbers_with_prices.csv',
    ])
    expect(store.objects.get('not_found_error_log.csv')).toBe(ERROR_HEADER)
  })

  it('leaves header-only objects when the warehouse read fails', async () => {
    const store = new MemoryObjectStore()
    store.objects.set('part_numbers_with_prices.csv', `${PRICE_HEADER}OLD,OLD,1\n`)
    const failure = new WarehouseError('Failed to connect to warehouse: refused', 'WAREHOUSE_CONNECT_FAILED')
    const partSource: PartSource = {
      fetchPartRecords: vi.fn<PartSource['fetchPartRecords']>().mockRejectedValue(failure),
    }
    const lookup = lookupOf({})
    const { orchestrator } = createOrchestrator(partSource, lookup, store)

    await expect(orchestrator.run('run_test')).rejects.toBe(failure)

    expect(store.objects.get('part_numbers_with_prices.csv')).toBe(PRICE_HEADER)
    expect(store.objects.get('cleaned_part_numbers_with_prices.csv')).toBe(PRICE_HEADER)
    expect(store.objects.get('not_found_error_log.csv')).toBe(ERROR_HEADER)
    expect(store.objects.get('multi_result_error_log.csv')).toBe(ERROR_HEADER)
    expect(lookup.lookupPrice).not.toHaveBeenCalled()
  })

  it('aborts without reading the warehouse when the reset fails', async () => {
    const store = new MemoryObjectStore()
    store.failOn('not_found_error_log.csv')
    const partSource = partSourceOf([])
    const { orchestrator } = createOrchestrator(partSource, lookupOf({}), store)

    await expect(orchestrator.run('run_test')).rejects.toThrow('simulated write failure for not_found_error_log.csv')
    expect(partSource.fetchPartRecords).not.toHaveBeenCalled()
  })

  it('propagates a write failure after pricing', async () => {
    const store = new MemoryObjectStore()
    const { orchestrator } = createOrchestrator(
      partSourceOf([{ vendorPartNumber: 'V-1', internalPartNumber: 'P-1' }]),
      lookupOf({ 'V-1': '1.00' }),
      store
    )
    // Reset succeeds; fail the first data write instead
    const putObject = store.putObject.bind(store)
    let calls = 0
    vi.spyOn(store, 'putObject').mockImplementation(async (key, body, contentType) => {
      calls++
      if (calls > 4 && key === 'cleaned_part_numbers_with_prices.csv') {
        throw new Error('bucket unavailable')
      }
      return putObject(key, body, contentType)
    })

    await expect(orchestrator.run('run_test')).rejects.toThrow('bucket unavailable')
    expect(store.objects.get('part_numbers_with_prices.csv')).toBe(`${PRICE_HEADER}V-1,P-1,1.00\n`)
    expect(store.objects.get('cleaned_part_numbers_with_prices.csv')).toBe(PRICE_HEADER)
  })

  it('passes the configured delay to the aggregator', async () => {
    const sleep = vi.fn(async (_ms: number) => {})
    const orchestrator = new PriceSyncOrchestrator({
      partSource: partSourceOf([
        { vendorPartNumber: 'V-1', internalPartNumber: 'P-1' },
        { vendorPartNumber: 'V-2', internalPartNumber: 'P-2' },
      ]),
      priceLookup: lookupOf({}),
      store: new MemoryObjectStore(),
      logger: createMockLogger(),
      delayMs: 1000,
      sleep,
    })

    await orchestrator.run('run_test')

    expect(sleep.mock.calls).toEqual([[1000], [1000]])
  })
})

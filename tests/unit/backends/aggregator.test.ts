/**
 * Tests for the memory aggregator
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { MemoryBackend } from '../../../src/backends/memory'
import { requireAggregator } from '../../../src/backends/capabilities'
import type { Aggregator } from '../../../src/backends/types'
import { Collection } from '../../../src/schema/collection'
import { DataRecord } from '../../../src/record/record'
import { parseFilter } from '../../../src/filter/parser'

const orders = new Collection({
  name: 'orders',
  fields: [
    { name: 'region', type: 'str' },
    { name: 'status', type: 'str' },
    { name: 'total', type: 'float' },
  ],
})

describe('MemoryAggregator', () => {
  let aggregator: Aggregator

  beforeEach(async () => {
    const backend = new MemoryBackend()
    await backend.initialize()
    await backend.createCollection(orders)
    await backend.insert('orders', [
      new DataRecord(1, { region: 'north', status: 'paid', total: 10 }),
      new DataRecord(2, { region: 'north', status: 'open', total: 30 }),
      new DataRecord(3, { region: 'south', status: 'paid', total: 5 }),
      new DataRecord(4, { region: 'south', status: 'paid' }),
    ])
    aggregator = requireAggregator(backend)
  })

  it('should count matching records', async () => {
    expect(await aggregator.count(orders)).toBe(4)
    expect(await aggregator.count(orders, parseFilter('status/paid'))).toBe(3)
  })

  it('should compute numeric aggregates, skipping missing values', async () => {
    expect(await aggregator.sum(orders, 'total')).toBe(45)
    expect(await aggregator.minimum(orders, 'total')).toBe(5)
    expect(await aggregator.maximum(orders, 'total')).toBe(30)
    expect(await aggregator.average(orders, 'total')).toBe(15)
  })

  it('should return 0 when nothing matches', async () => {
    const none = parseFilter('region/west')

    expect(await aggregator.sum(orders, 'total', none)).toBe(0)
    expect(await aggregator.average(orders, 'total', none)).toBe(0)
  })

  it('should group by one field', async () => {
    const rs = await aggregator.groupBy(orders, ['region'], [
      { aggregation: 'sum', field: 'total' },
      { aggregation: 'count', field: 'total' },
    ])

    expect(rs.ids()).toEqual(['north', 'south'])
    expect(rs.records[0]?.fields).toEqual({ region: 'north', sum_total: 40, count_total: 2 })
    expect(rs.records[1]?.fields).toEqual({ region: 'south', sum_total: 5, count_total: 1 })
  })

  it('should group by several fields with a filter', async () => {
    const rs = await aggregator.groupBy(
      orders,
      ['region', 'status'],
      [{ aggregation: 'first', field: 'total' }],
      parseFilter('region/north')
    )

    expect(rs.ids()).toEqual([
      ['north', 'paid'],
      ['north', 'open'],
    ])
    expect(rs.records[1]?.get('first_total')).toBe(30)
  })
})

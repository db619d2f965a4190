/**
 * Tests for the pagination bridge
 *
 * Adapters serve one page per call; paginate() must assemble the requested
 * window across page boundaries and fill in the paging details.
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { MemoryBackend } from '../../../src/backends/memory'
import { paginate, populateRecordSetPageDetails, projectRecord } from '../../../src/backends/pagination'
import type { Indexer, PageResult } from '../../../src/backends/types'
import { Collection } from '../../../src/schema/collection'
import { DataRecord } from '../../../src/record/record'
import { RecordSet } from '../../../src/record/recordset'
import { Filter } from '../../../src/filter/filter'

const items = new Collection({
  name: 'items',
  identityFieldType: 'str',
  fields: [{ name: 'n', type: 'int' }],
})

async function seededBackend(options: { pageSize?: number; reportTotals?: boolean } = {}): Promise<MemoryBackend> {
  const backend = new MemoryBackend('memory://localhost/paging', options)
  await backend.initialize()
  await backend.createCollection(items)

  const records: DataRecord[] = []
  for (let n = 0; n <= 20; n++) {
    records.push(new DataRecord(String(n).padStart(2, '0'), { n }))
  }
  await backend.insert('items', records)

  return backend
}

/**
 * Wraps an indexer and records the window of every page request
 */
function spyIndexer(inner: Indexer): Indexer & { calls: Array<[number, number]> } {
  const calls: Array<[number, number]> = []
  return {
    calls,
    pageSize: inner.pageSize,
    queryPage(collection: Collection, filter: Filter): Promise<PageResult> {
      calls.push([filter.limit, filter.offset])
      return inner.queryPage(collection, filter)
    },
    query: (collection, filter) => inner.query(collection, filter),
    queryFunc: (collection, filter, fn) => inner.queryFunc(collection, filter, fn),
    listValues: (collection, fields, filter) => inner.listValues(collection, fields, filter),
    deleteQuery: (collection, filter) => inner.deleteQuery(collection, filter),
  }
}

describe('paginate', () => {
  let backend: MemoryBackend

  describe('with a page size of 5', () => {
    beforeEach(async () => {
      backend = await seededBackend({ pageSize: 5 })
    })

    it('should assemble a limit of 9 at offset 3 from two page requests', async () => {
      const indexer = spyIndexer(backend.withSearch())
      const rs = await paginate(indexer, items, new Filter().boundedBy(9, 3))

      expect(indexer.calls).toEqual([
        [5, 3],
        [4, 8],
      ])
      expect(rs.records).toHaveLength(9)
      expect(rs.records[0]?.id).toBe('03')
      expect(rs.records[8]?.id).toBe('11')
      expect(rs.resultCount).toBe(21)
      expect(rs.totalPages).toBe(3)
      expect(rs.page).toBe(1)
      expect(rs.recordsPerPage).toBe(9)
      expect(rs.unbounded).toBe(false)
    })

    it('should fetch every page when unlimited', async () => {
      const indexer = spyIndexer(backend.withSearch())
      const rs = await paginate(indexer, items, Filter.all())

      expect(indexer.calls.map(([, offset]) => offset)).toEqual([0, 5, 10, 15, 20])
      expect(rs.records).toHaveLength(21)
      expect(rs.totalPages).toBe(1)
      expect(rs.recordsPerPage).toBe(21)
    })

    it('should stop at the end of the matches', async () => {
      const rs = await paginate(backend.withSearch(), items, new Filter().boundedBy(10, 18))

      expect(rs.ids()).toEqual(['18', '19', '20'])
      expect(rs.resultCount).toBe(21)
      expect(rs.page).toBe(2)
    })

    it('should honour a per-call page size', async () => {
      const indexer = spyIndexer(backend.withSearch())
      await paginate(indexer, items, new Filter().boundedBy(6), { pageSize: 2 })

      expect(indexer.calls).toEqual([
        [2, 0],
        [2, 2],
        [2, 4],
      ])
    })

    it('should keep fetching when the adapter caps pages below the requested size', async () => {
      const indexer = spyIndexer(backend.withSearch())
      const rs = await paginate(indexer, items, new Filter().boundedBy(9, 3), { pageSize: 10 })

      expect(indexer.calls).toEqual([
        [9, 3],
        [4, 8],
      ])
      expect(rs.ids()).toEqual(['03', '04', '05', '06', '07', '08', '09', '10', '11'])
      expect(rs.resultCount).toBe(21)
    })

    it('should return an empty page for an offset beyond the total', async () => {
      const rs = await paginate(backend.withSearch(), items, new Filter().boundedBy(5, 30))

      expect(rs.records).toEqual([])
      expect(rs.resultCount).toBe(21)
      expect(rs.totalPages).toBe(5)
      expect(rs.page).toBe(7)
    })

    it('should stream without keeping records when collect is off', async () => {
      const ids: unknown[] = []
      const rs = await paginate(backend.withSearch(), items, Filter.all(), {
        collect: false,
        onRecord: record => {
          ids.push(record.id)
        },
      })

      expect(ids).toHaveLength(21)
      expect(ids[20]).toBe('20')
      expect(rs.records).toEqual([])
      expect(rs.resultCount).toBe(21)
    })

    it('should hand page details to the callback and stop on false', async () => {
      const pages: number[] = []
      const rs = await paginate(backend.withSearch(), items, Filter.all(), {
        onRecord: (record, page) => {
          pages.push(page.page)
          return record.id !== '06'
        },
      })

      expect(pages).toEqual([1, 1, 1, 1, 1, 2, 2])
      expect(rs.records).toHaveLength(7)
      expect(rs.resultCount).toBe(21)
    })
  })

  it('should give the same window for every page size', async () => {
    const windows: unknown[][] = []

    for (const pageSize of [1, 2, 4, 9, 21, 50]) {
      const seeded = await seededBackend({ pageSize })
      const rs = await paginate(seeded.withSearch(), items, new Filter().boundedBy(9, 3))
      windows.push(rs.ids())
    }

    const expected = ['03', '04', '05', '06', '07', '08', '09', '10', '11']
    for (const ids of windows) {
      expect(ids).toEqual(expected)
    }
  })

  it('should fetch everything in one call when the page size equals the match count', async () => {
    const seeded = await seededBackend({ pageSize: 21 })
    const indexer = spyIndexer(seeded.withSearch())
    const rs = await paginate(indexer, items, Filter.all())

    expect(indexer.calls).toEqual([[21, 0]])
    expect(rs.records).toHaveLength(21)
    expect(rs.totalPages).toBe(1)
  })

  it('should mark results unbounded when the adapter cannot count', async () => {
    backend = await seededBackend({ pageSize: 5, reportTotals: false })
    const rs = await paginate(backend.withSearch(), items, new Filter().boundedBy(9, 3))

    expect(rs.records).toHaveLength(9)
    expect(rs.unbounded).toBe(true)
    expect(rs.resultCount).toBe(9)
    expect(rs.totalPages).toBeUndefined()
  })
})

describe('populateRecordSetPageDetails', () => {
  it('should derive the page from offset and limit', () => {
    const rs = new RecordSet()
    rs.resultCount = 95

    populateRecordSetPageDetails(rs, new Filter().boundedBy(10, 40))

    expect(rs.page).toBe(5)
    expect(rs.totalPages).toBe(10)
    expect(rs.recordsPerPage).toBe(10)
  })

  it('should report no pages for an empty unlimited result', () => {
    const rs = populateRecordSetPageDetails(new RecordSet(), new Filter())

    expect(rs.page).toBe(1)
    expect(rs.totalPages).toBe(0)
    expect(rs.recordsPerPage).toBe(0)
  })
})

describe('projectRecord', () => {
  it('should keep the identity and the requested fields', () => {
    const record = new DataRecord(1, { a: 1, b: 2, nested: { c: 3, d: 4 } })
    const projected = projectRecord(record, new Filter({ fields: ['id', 'b', 'nested.c'] }))

    expect(projected.id).toBe(1)
    expect(projected.fields).toEqual({ b: 2, nested: { c: 3 } })
  })

  it('should return the record itself without a projection', () => {
    const record = new DataRecord(1, { a: 1 })
    expect(projectRecord(record, new Filter())).toBe(record)
  })
})

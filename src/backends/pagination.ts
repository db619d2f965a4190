/**
 * Pagination bridging
 *
 * Adapters serve at most one page per call. `paginate` stitches successive
 * pages into the single result a caller asked for, honouring the filter's
 * limit and offset, and fills in the paging details of the RecordSet.
 *
 * @module backends/pagination
 */

import { DEFAULT_INDEXER_PAGE_SIZE } from '../constants'
import type { Filter } from '../filter/filter'
import { DataRecord } from '../record/record'
import { RecordSet } from '../record/recordset'
import type { Collection } from '../schema/collection'
import { logger } from '../utils/logger'
import type { IndexPage, Indexer, ResultFunc } from './types'

export interface PaginateOptions {
  /** Overrides the indexer's page size */
  pageSize?: number | undefined
  /** Called for every record in the window; return `false` to stop */
  onRecord?: ResultFunc | undefined
  /**
   * Keep records in the returned set. Defaults to true; streaming callers
   * turn it off and receive records through `onRecord` only.
   */
  collect?: boolean | undefined
}

/**
 * Collect the records `filter` selects by calling `indexer.queryPage` until
 * the limit is met or the matches run out. With a reported total the loop
 * runs to that total or an empty page, since adapters may cap pages below
 * the requested size; without one a short page ends it.
 *
 * @example
 * ```typescript
 * const rs = await paginate(indexer, users, parseFilter('role/admin').boundedBy(9, 3))
 * rs.resultCount // total matches, not just the 9 returned
 * ```
 */
export async function paginate(
  indexer: Indexer,
  collection: Collection,
  filter: Filter,
  options: PaginateOptions = {}
): Promise<RecordSet> {
  const pageSize = resolvePageSize(options.pageSize ?? indexer.pageSize)
  const limit = Math.max(filter.limit, 0)
  const offset = Math.max(filter.offset, 0)
  const collect = options.collect ?? true
  const result = new RecordSet()

  let total: number | undefined
  let totalsReported = true
  let position = offset
  let page = 0
  let seen = 0

  for (;;) {
    const wanted = limit > 0 ? Math.min(pageSize, limit - seen) : pageSize
    if (wanted <= 0) break

    const pageFilter = filter.copy()
    pageFilter.limit = wanted
    pageFilter.offset = position

    const response = await indexer.queryPage(collection, pageFilter)
    const records = response.records.slice(0, wanted)
    page += 1

    if (response.total === undefined) {
      totalsReported = false
    } else {
      total = response.total
    }

    logger.debug(`paginate ${collection.name}: page ${page} offset=${position} got ${records.length}/${wanted}`)

    const details: IndexPage = { page, limit: wanted, offset: position, total }

    for (const record of records) {
      const projected = projectRecord(record, filter, collection)
      seen += 1
      if (collect) result.records.push(projected)

      if (options.onRecord && (await options.onRecord(projected, details)) === false) {
        return finish(result, filter, totalsReported ? total : undefined, seen)
      }
    }

    position += records.length

    if (records.length === 0) break
    if (total === undefined) {
      if (records.length < wanted) break
    } else if (position >= total) {
      break
    }
  }

  return finish(result, filter, totalsReported ? total : undefined, seen)
}

function finish(result: RecordSet, filter: Filter, total: number | undefined, seen: number): RecordSet {
  if (total === undefined) {
    result.resultCount = seen
    result.unbounded = true
  } else {
    result.resultCount = total
  }
  populateRecordSetPageDetails(result, filter)
  return result
}

function resolvePageSize(size: number | undefined): number {
  if (size === undefined || !Number.isFinite(size) || size <= 0) return DEFAULT_INDEXER_PAGE_SIZE
  return Math.floor(size)
}

/**
 * Set `page`, `totalPages` and `recordsPerPage` from the filter's limit and
 * offset. Unbounded results get no page count.
 */
export function populateRecordSetPageDetails(result: RecordSet, filter: Filter): RecordSet {
  const limit = Math.max(filter.limit, 0)
  const perPage = Math.max(limit, 1)

  result.page = Math.floor(Math.max(filter.offset, 0) / perPage) + 1
  result.recordsPerPage = limit > 0 ? limit : result.records.length

  if (result.unbounded) {
    result.totalPages = undefined
  } else if (limit === 0) {
    result.totalPages = result.resultCount > 0 ? 1 : 0
  } else {
    result.totalPages = Math.ceil(result.resultCount / perPage)
  }

  return result
}

/**
 * Trim a record to the filter's projection. The identity is always kept.
 */
export function projectRecord(record: DataRecord, filter: Filter, collection?: Collection): DataRecord {
  if (filter.fields.length === 0) return record

  const identityField = collection?.identityField ?? filter.identityField
  const projected = new DataRecord(record.id)

  for (const name of filter.fields) {
    if (name === identityField) continue

    if (Object.prototype.hasOwnProperty.call(record.fields, name)) {
      projected.set(name, record.fields[name])
      continue
    }

    const value = record.getNested(name)
    if (value !== undefined) projected.setNested(name, value)
  }

  return projected
}

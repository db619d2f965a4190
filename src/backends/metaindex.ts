/**
 * MetaIndex
 *
 * A read-only Indexer joining two collections, possibly held by different
 * backends, on `left.field = right.field`.
 *
 * @module backends/metaindex
 */

import { DEFAULT_IDENTITY_FIELD, FIELD_NESTING_SEPARATOR } from '../constants'
import { CapabilityUnsupportedError } from '../errors'
import { Filter } from '../filter/filter'
import { filterFromMap } from '../filter/structured'
import { DataRecord } from '../record/record'
import { RecordSet } from '../record/recordset'
import type { Collection } from '../schema/collection'
import { deepEqual, isNullish } from '../utils/comparison'
import { logger } from '../utils/logger'
import { populateRecordSetPageDetails } from './pagination'
import type { Indexer, PageResult, ResultFunc } from './types'

export interface JoinSide {
  indexer: Indexer
  collection: Collection
  field: string
}

export interface MetaIndexOptions {
  left: JoinSide
  right: JoinSide
}

function fieldValue(record: DataRecord, field: string, collection: Collection): unknown {
  if (field === collection.identityField || field === DEFAULT_IDENTITY_FIELD) return record.id
  return record.get(field)
}

/**
 * Split `collection.field` at the last separator
 */
function splitQualified(entry: string): [string, string] {
  const index = entry.lastIndexOf(FIELD_NESTING_SEPARATOR)
  if (index === -1) return ['', entry]
  return [entry.slice(0, index), entry.slice(index + 1)]
}

export class MetaIndex implements Indexer {
  private readonly left: JoinSide
  private readonly right: JoinSide

  constructor(options: MetaIndexOptions) {
    this.left = options.left
    this.right = options.right
  }

  /** Key the right-hand fields are stored under; self joins get a suffix */
  get rightName(): string {
    const name = this.right.collection.name
    return name === this.left.collection.name ? `${name}_right` : name
  }

  /**
   * Every joined record for `filter`, ignoring limit and offset. Criteria and
   * sort apply to the left collection.
   */
  async join(filter: Filter = Filter.all()): Promise<DataRecord[]> {
    const projection = filter.fields

    const leftFilter = filter.copy()
    leftFilter.fields = []
    leftFilter.limit = 0
    leftFilter.offset = 0
    leftFilter.identityField = this.left.collection.identityField

    const leftRecords: DataRecord[] = []
    const leftValues: unknown[] = []

    await this.left.indexer.queryFunc(this.left.collection, leftFilter, record => {
      leftRecords.push(record)
      const value = fieldValue(record, this.left.field, this.left.collection)
      if (!isNullish(value) && !leftValues.some(seen => deepEqual(seen, value))) {
        leftValues.push(value)
      }
    })

    if (leftValues.length === 0) return []

    const rightFilter = filterFromMap(
      { [this.right.field]: leftValues },
      { identityField: this.right.collection.identityField }
    )

    const joined: DataRecord[] = []
    const leftByValue = new Map<string, DataRecord[]>()

    await this.right.indexer.queryFunc(this.right.collection, rightFilter, rightRecord => {
      const shared = fieldValue(rightRecord, this.right.field, this.right.collection)
      const cacheKey = JSON.stringify(shared)

      let matches = leftByValue.get(cacheKey)
      if (!matches) {
        matches = leftRecords.filter(record =>
          deepEqual(fieldValue(record, this.left.field, this.left.collection), shared)
        )
        leftByValue.set(cacheKey, matches)
      }

      for (const leftRecord of matches) {
        joined.push(this.combine(leftRecord, rightRecord, projection))
      }
    })

    logger.debug(
      `metaindex ${this.left.collection.name}+${this.right.collection.name}: ${leftRecords.length} left, ${joined.length} joined`
    )

    return joined
  }

  async queryPage(_collection: Collection, filter: Filter): Promise<PageResult> {
    const joined = await this.join(filter)
    return { records: window(joined, filter), total: joined.length }
  }

  async query(_collection: Collection, filter: Filter): Promise<RecordSet> {
    const joined = await this.join(filter)
    const result = new RecordSet(...window(joined, filter))
    result.resultCount = joined.length
    return populateRecordSetPageDetails(result, filter)
  }

  async queryFunc(_collection: Collection, filter: Filter, fn: ResultFunc): Promise<void> {
    const joined = await this.join(filter)
    const limit = Math.max(filter.limit, 0)
    const offset = Math.max(filter.offset, 0)

    for (const record of window(joined, filter)) {
      if ((await fn(record, { page: 1, limit, offset, total: joined.length })) === false) return
    }
  }

  async listValues(): Promise<Record<string, unknown[]>> {
    throw new CapabilityUnsupportedError('listValues', 'metaindex', 'MetaIndex only supports querying')
  }

  async deleteQuery(): Promise<void> {
    throw new CapabilityUnsupportedError('deleteQuery', 'metaindex', 'MetaIndex only supports querying')
  }

  private combine(leftRecord: DataRecord, rightRecord: DataRecord, projection: string[]): DataRecord {
    let leftFields: Record<string, unknown> = {}
    let rightFields: Record<string, unknown> = {}

    if (projection.length === 0) {
      leftFields = { ...leftRecord.fields }
      rightFields = { ...rightRecord.fields }
    } else {
      for (const entry of projection) {
        const [qualifier, field] = splitQualified(entry)

        if (qualifier === this.left.collection.name) {
          leftFields[field] = fieldValue(leftRecord, field, this.left.collection)
        } else if (qualifier === this.rightName) {
          rightFields[field] = fieldValue(rightRecord, field, this.right.collection)
        } else {
          leftFields[entry] = fieldValue(leftRecord, entry, this.left.collection)
          rightFields[entry] = fieldValue(rightRecord, entry, this.right.collection)
        }
      }
    }

    return new DataRecord([leftRecord.id, rightRecord.id], {
      [this.left.collection.name]: leftFields,
      [this.rightName]: rightFields,
    })
  }
}

function window(records: DataRecord[], filter: Filter): DataRecord[] {
  const offset = Math.max(filter.offset, 0)
  return filter.limit > 0 ? records.slice(offset, offset + filter.limit) : records.slice(offset)
}

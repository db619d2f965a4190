/**
 * RecordSet
 *
 * An ordered result of a query, with paging details.
 *
 * @module record/recordset
 */

import { ValidationError } from '../errors'
import { isPlainObject, stringify } from '../utils/comparison'
import { DataRecord, type RecordDocument } from './record'

export interface RecordSetDocument {
  result_count: number
  page?: number
  total_pages?: number
  records_per_page?: number
  records: RecordDocument[]
  options: Record<string, unknown>
  unbounded: boolean
}

export class RecordSet {
  records: DataRecord[]
  /** Total number of matches, or the number pushed so far */
  resultCount: number
  /** The backend could not report a total */
  unbounded: boolean
  totalPages: number | undefined
  page: number | undefined
  recordsPerPage: number | undefined
  options: Record<string, unknown>

  constructor(...records: DataRecord[]) {
    this.records = records
    this.resultCount = records.length
    this.unbounded = false
    this.totalPages = undefined
    this.page = undefined
    this.recordsPerPage = undefined
    this.options = {}
  }

  get size(): number {
    return this.records.length
  }

  push(record: DataRecord): this {
    this.records.push(record)
    this.resultCount += 1
    return this
  }

  append(other: RecordSet): this {
    for (const record of other.records) {
      this.push(record)
    }
    return this
  }

  getRecord(index: number): DataRecord | undefined {
    return this.records[index]
  }

  /** Ids are compared by their string form */
  getRecordById(id: unknown): DataRecord | undefined {
    const wanted = stringify(id)
    return this.records.find(record => stringify(record.id) === wanted)
  }

  pluck(field: string, fallback?: unknown): unknown[] {
    return this.records.map(record => record.get(field, fallback))
  }

  ids(): unknown[] {
    return this.records.map(record => record.id)
  }

  isEmpty(): boolean {
    return this.resultCount === 0
  }

  toJSON(): RecordSetDocument {
    const doc: RecordSetDocument = {
      result_count: this.resultCount,
      records: this.records.map(record => record.toJSON()),
      options: this.options,
      unbounded: this.unbounded,
    }

    if (this.page !== undefined) doc.page = this.page
    if (this.totalPages !== undefined) doc.total_pages = this.totalPages
    if (this.recordsPerPage !== undefined) doc.records_per_page = this.recordsPerPage

    return doc
  }

  static fromJSON(doc: unknown): RecordSet {
    if (!isPlainObject(doc)) {
      throw new ValidationError('RecordSet document must be an object')
    }

    const records = Array.isArray(doc.records) ? doc.records.map(item => DataRecord.fromJSON(item)) : []
    const set = new RecordSet(...records)

    if (typeof doc.result_count === 'number') set.resultCount = doc.result_count
    if (typeof doc.page === 'number') set.page = doc.page
    if (typeof doc.total_pages === 'number') set.totalPages = doc.total_pages
    if (typeof doc.records_per_page === 'number') set.recordsPerPage = doc.records_per_page
    if (isPlainObject(doc.options)) set.options = { ...doc.options }
    set.unbounded = doc.unbounded === true

    return set
  }
}

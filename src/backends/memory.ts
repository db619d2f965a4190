/**
 * In-memory backend
 *
 * Reference adapter keeping every collection in process. It implements the
 * Backend, Indexer and Aggregator contracts with the same semantics a real
 * engine is expected to follow, and backs the test suite.
 *
 * @module backends/memory
 */

import type { ConnectionString } from '../connection'
import { DEFAULT_CONNECTION_STRING, DEFAULT_IDENTITY_FIELD, MAX_FACET_CARDINALITY } from '../constants'
import {
  CollectionExistsError,
  CollectionNotFoundError,
  RecordExistsError,
  RecordNotFoundError,
  RequiredFieldError,
} from '../errors'
import type { Aggregate, Aggregation } from '../filter/criterion'
import { Filter } from '../filter/filter'
import { DataRecord } from '../record/record'
import { RecordSet } from '../record/recordset'
import { Collection } from '../schema/collection'
import { coerceValue, isZero } from '../types/field-type'
import { compareValues, deepEqual, isNullish, stringify } from '../utils/comparison'
import { BaseBackend } from './base'
import { paginate, projectRecord } from './pagination'
import type { Aggregator, BackendOptions, Indexer, PageResult, ResultFunc } from './types'

export interface MemoryBackendOptions extends BackendOptions {
  /** Report match totals; when false results come back unbounded (`report_totals`) */
  reportTotals?: boolean | undefined
}

interface StoredCollection {
  definition: Collection
  /** Keyed by the string form of the identity, in insertion order */
  records: Map<string, DataRecord>
  nextId: number
}

// =============================================================================
// Backend
// =============================================================================

export class MemoryBackend extends BaseBackend {
  readonly name = 'memory'
  readonly pageSize: number
  readonly reportTotals: boolean

  private readonly store = new Map<string, StoredCollection>()
  private readonly indexer: MemoryIndexer
  private readonly aggregator: MemoryAggregator

  constructor(connectionString: ConnectionString | string = DEFAULT_CONNECTION_STRING, options: MemoryBackendOptions = {}) {
    super(connectionString, options)
    this.pageSize = options.pageSize ?? this.connectionString.optInt('page_size', 0)
    this.reportTotals = options.reportTotals ?? this.connectionString.optBool('report_totals', true)
    this.indexer = new MemoryIndexer(this)
    this.aggregator = new MemoryAggregator(this)
  }

  override withSearch(): Indexer {
    return this.externalIndexer ?? this.indexer
  }

  override withAggregator(): Aggregator {
    return this.aggregator
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  protected async connectInternal(): Promise<void> {}

  protected override knownCollections(): string[] {
    return [...new Set([...this.store.keys(), ...this.registered.keys()])]
  }

  protected override statusInfo(): Record<string, unknown> {
    let records = 0
    for (const stored of this.store.values()) records += stored.records.size
    return { pageSize: this.pageSize, reportTotals: this.reportTotals, records }
  }

  // ===========================================================================
  // Collections
  // ===========================================================================

  protected async createCollectionInternal(definition: Collection): Promise<void> {
    if (this.store.has(definition.name)) {
      throw new CollectionExistsError(definition.name)
    }
    this.store.set(definition.name, { definition, records: new Map(), nextId: 1 })
  }

  protected async deleteCollectionInternal(name: string): Promise<void> {
    this.stored(name)
    this.store.delete(name)
  }

  /** A detached copy, as a real engine would report its schema */
  protected async getCollectionInternal(name: string): Promise<Collection> {
    return Collection.fromJSON(this.stored(name).definition.toJSON())
  }

  protected async listCollectionsInternal(): Promise<string[]> {
    return [...this.store.keys()]
  }

  // ===========================================================================
  // Records
  // ===========================================================================

  /**
   * Integer identities left empty or zero are assigned from a per-collection
   * counter and written back to the given records
   */
  protected async insertInternal(name: string, records: DataRecord[]): Promise<void> {
    const stored = this.stored(name)
    const { definition } = stored

    for (const input of records) {
      const record = definition.makeRecord(input)

      if (isZero(record.id)) {
        if (definition.identityFieldType !== 'int') {
          throw new RequiredFieldError(definition.identityField, name)
        }
        while (stored.records.has(String(stored.nextId))) stored.nextId += 1
        record.id = stored.nextId
      }

      const key = keyOf(definition, record.id)
      if (stored.records.has(key)) {
        throw new RecordExistsError(name, record.id)
      }

      if (typeof record.id === 'number' && record.id >= stored.nextId) {
        stored.nextId = record.id + 1
      }

      stored.records.set(key, record)
      input.id = record.id
    }
  }

  /** Given fields replace stored ones; unmentioned fields are kept */
  protected async updateInternal(name: string, records: DataRecord[]): Promise<void> {
    const stored = this.stored(name)
    const { definition } = stored

    for (const input of records) {
      const key = keyOf(definition, input.id)
      const existing = stored.records.get(key)
      if (!existing) {
        throw new RecordNotFoundError(name, input.id)
      }

      const merged = new DataRecord(existing.id, { ...existing.fields, ...input.fields })
      merged.data = input.data ?? existing.data
      stored.records.set(key, definition.makeRecord(merged))
    }
  }

  protected async deleteInternal(name: string, ids: unknown[]): Promise<void> {
    const stored = this.stored(name)

    for (const id of ids) {
      if (!stored.records.delete(keyOf(stored.definition, id))) {
        throw new RecordNotFoundError(name, id)
      }
    }
  }

  protected async retrieveInternal(name: string, id: unknown, fields: string[]): Promise<DataRecord> {
    const stored = this.stored(name)
    const record = stored.records.get(keyOf(stored.definition, id))
    if (!record) {
      throw new RecordNotFoundError(name, id)
    }

    const copy = record.copy()
    if (fields.length === 0) return copy
    return projectRecord(copy, new Filter({ fields }), stored.definition)
  }

  protected async existsInternal(name: string, id: unknown): Promise<boolean> {
    const stored = this.stored(name)
    return stored.records.has(keyOf(stored.definition, id))
  }

  // ===========================================================================
  // Shared with the indexer and aggregator
  // ===========================================================================

  /**
   * Matching records in result order: sorted when the filter asks for it,
   * otherwise in insertion order. The filter's identity field is bound to
   * the collection's.
   *
   * @internal
   */
  scan(operation: string, collection: Collection, filter: Filter = Filter.all()): DataRecord[] {
    this.assertAvailable(operation)
    const stored = this.stored(collection.name)

    const bound = filter.copy()
    bound.identityField = stored.definition.identityField

    const matched = [...stored.records.values()].filter(record => bound.matches(record))
    const sort = bound.getSort()

    if (sort.length > 0) {
      matched.sort((a, b) => {
        for (const { field, descending } of sort) {
          const order = compareValues(valueOf(a, field, bound.identityField), valueOf(b, field, bound.identityField))
          if (order !== 0) return descending ? -order : order
        }
        return 0
      })
    }

    return matched
  }

  /** @internal */
  remove(collection: Collection, records: DataRecord[]): void {
    const stored = this.stored(collection.name)
    for (const record of records) {
      stored.records.delete(keyOf(stored.definition, record.id))
    }
  }

  private stored(name: string): StoredCollection {
    const stored = this.store.get(name)
    if (!stored) {
      throw new CollectionNotFoundError(name)
    }
    return stored
  }
}

function keyOf(definition: Collection, id: unknown): string {
  return stringify(coerceValue(definition.identityFieldType, id, definition.identityField))
}

function valueOf(record: DataRecord, field: string, identityField: string): unknown {
  return field === identityField || field === DEFAULT_IDENTITY_FIELD ? record.id : record.get(field)
}

// =============================================================================
// Indexer
// =============================================================================

export class MemoryIndexer implements Indexer {
  private readonly backend: MemoryBackend

  constructor(backend: MemoryBackend) {
    this.backend = backend
  }

  get pageSize(): number | undefined {
    return this.backend.pageSize > 0 ? this.backend.pageSize : undefined
  }

  async queryPage(collection: Collection, filter: Filter): Promise<PageResult> {
    const matched = this.backend.scan('query', collection, filter)
    const offset = Math.max(filter.offset, 0)

    let size = filter.limit > 0 ? filter.limit : matched.length
    if (this.pageSize !== undefined) size = Math.min(size, this.pageSize)

    return {
      records: matched.slice(offset, offset + size).map(record => record.copy()),
      total: this.backend.reportTotals ? matched.length : undefined,
    }
  }

  async query(collection: Collection, filter: Filter): Promise<RecordSet> {
    return paginate(this, collection, filter)
  }

  async queryFunc(collection: Collection, filter: Filter, fn: ResultFunc): Promise<void> {
    await paginate(this, collection, filter, { onRecord: fn, collect: false })
  }

  async listValues(collection: Collection, fields: string[], filter: Filter): Promise<Record<string, unknown[]>> {
    const matched = this.backend.scan('listValues', collection, filter)
    const out: Record<string, unknown[]> = {}

    for (const field of fields) {
      const values: unknown[] = []

      for (const record of matched) {
        if (values.length >= MAX_FACET_CARDINALITY) break

        const value = valueOf(record, field, collection.identityField)
        if (isNullish(value)) continue
        if (!values.some(seen => deepEqual(seen, value))) values.push(value)
      }

      out[field] = values
    }

    return out
  }

  async deleteQuery(collection: Collection, filter: Filter): Promise<void> {
    this.backend.remove(collection, this.backend.scan('deleteQuery', collection, filter))
  }
}

// =============================================================================
// Aggregator
// =============================================================================

function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number') return Number.isNaN(value) ? undefined : value
  if (value instanceof Date) return value.getTime()
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value)
    return Number.isNaN(n) ? undefined : n
  }
  return undefined
}

function aggregate(aggregation: Aggregation, values: unknown[]): unknown {
  if (aggregation === 'count') return values.length
  if (aggregation === 'first') return values[0] ?? null
  if (aggregation === 'last') return values[values.length - 1] ?? null

  const numbers: number[] = []
  for (const value of values) {
    const n = toNumber(value)
    if (n !== undefined) numbers.push(n)
  }

  switch (aggregation) {
    case 'sum':
      return numbers.reduce((acc, n) => acc + n, 0)
    case 'avg':
      return numbers.length === 0 ? 0 : numbers.reduce((acc, n) => acc + n, 0) / numbers.length
    case 'min':
      return numbers.length === 0 ? 0 : Math.min(...numbers)
    case 'max':
      return numbers.length === 0 ? 0 : Math.max(...numbers)
  }
}

/**
 * Numeric aggregates skip values that are not numbers. With nothing to
 * aggregate every function returns 0.
 */
export class MemoryAggregator implements Aggregator {
  private readonly backend: MemoryBackend

  constructor(backend: MemoryBackend) {
    this.backend = backend
  }

  async count(collection: Collection, filter?: Filter): Promise<number> {
    return this.backend.scan('count', collection, filter).length
  }

  async sum(collection: Collection, field: string, filter?: Filter): Promise<number> {
    return this.numeric('sum', collection, field, filter)
  }

  async minimum(collection: Collection, field: string, filter?: Filter): Promise<number> {
    return this.numeric('min', collection, field, filter)
  }

  async maximum(collection: Collection, field: string, filter?: Filter): Promise<number> {
    return this.numeric('max', collection, field, filter)
  }

  async average(collection: Collection, field: string, filter?: Filter): Promise<number> {
    return this.numeric('avg', collection, field, filter)
  }

  async groupBy(
    collection: Collection,
    groupFields: string[],
    aggregates: Aggregate[],
    filter?: Filter
  ): Promise<RecordSet> {
    const groups = new Map<string, { values: unknown[]; records: DataRecord[] }>()

    for (const record of this.backend.scan('groupBy', collection, filter)) {
      const values = groupFields.map(field => valueOf(record, field, collection.identityField) ?? null)
      const key = JSON.stringify(values.map(value => stringify(value)))

      const group = groups.get(key)
      if (group) {
        group.records.push(record)
      } else {
        groups.set(key, { values, records: [record] })
      }
    }

    const result = new RecordSet()

    for (const { values, records } of groups.values()) {
      const out = new DataRecord(values.length === 1 ? values[0] : values)

      groupFields.forEach((field, i) => out.set(field, values[i]))

      for (const { aggregation, field } of aggregates) {
        const fieldValues = records
          .map(record => valueOf(record, field, collection.identityField))
          .filter(value => !isNullish(value))
        out.set(`${aggregation}_${field}`, aggregate(aggregation, fieldValues))
      }

      result.push(out)
    }

    return result
  }

  private async numeric(aggregation: Aggregation, collection: Collection, field: string, filter?: Filter): Promise<number> {
    const values = this.backend
      .scan(aggregation, collection, filter)
      .map(record => valueOf(record, field, collection.identityField))
    const value = aggregate(aggregation, values)
    return typeof value === 'number' ? value : 0
  }
}

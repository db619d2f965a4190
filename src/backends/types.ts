/**
 * Backend Capability Contract
 *
 * Every storage adapter implements `Backend`. Search and aggregation are
 * optional capabilities: `withSearch` and `withAggregator` hand back `null`
 * when the adapter has none, which callers treat as "unsupported" rather than
 * as a failed query.
 *
 * @module backends/types
 */

import type { ConnectionString } from '../connection'
import type { Aggregate } from '../filter/criterion'
import type { Filter } from '../filter/filter'
import type { DataRecord } from '../record/record'
import type { RecordSet } from '../record/recordset'
import type { Collection } from '../schema/collection'
import type { Logger } from '../utils/logger'

// =============================================================================
// Status
// =============================================================================

/**
 * Read-only snapshot of a backend's state
 */
export interface BackendStatus {
  readonly name: string
  /** Backend type, i.e. the connection scheme */
  readonly type: string
  readonly available: boolean
  readonly connected: boolean
  /** Connection string without credentials */
  readonly connectionString: string
  readonly collections: readonly string[]
  readonly info: Readonly<Record<string, unknown>>
}

// =============================================================================
// Backend
// =============================================================================

/**
 * Options shared by every backend. Values set here override the matching
 * connection string options.
 */
export interface BackendOptions {
  logger?: Logger | undefined
  /** Connection attempts before connect() fails (`connect_attempts`) */
  connectAttempts?: number | undefined
  /** Time allowed per attempt in ms (`connect_timeout`) */
  connectTimeoutMs?: number | undefined
  /** Health check period in ms; 0 disables the monitor (`refresh_interval`) */
  refreshIntervalMs?: number | undefined
  /** Time allowed per health check in ms (`refresh_timeout`) */
  refreshTimeoutMs?: number | undefined
  /** Consecutive failed checks tolerated before disconnecting (`refresh_failures`) */
  refreshMaxFailures?: number | undefined
  /** Create registered collections that do not exist yet during initialize() */
  autocreate?: boolean | undefined
  /** Most records the backend's indexer returns per call (`page_size`) */
  pageSize?: number | undefined
  /** Serves withSearch() in place of the backend's own indexer */
  indexer?: Indexer | undefined
}

export interface Backend {
  /** Backend type, i.e. the connection scheme */
  readonly name: string
  readonly connectionString: ConnectionString

  /** Connect, then create registered collections when autocreate is set */
  initialize(): Promise<void>
  connect(): Promise<void>
  disconnect(): Promise<void>
  suspend(reason?: Error): void
  resume(): void
  isAvailable(): boolean
  isConnected(): boolean
  status(): BackendStatus
  /** Health probe; rejects when the backend cannot be reached */
  refresh(): Promise<void>

  createCollection(definition: Collection): Promise<void>
  deleteCollection(name: string): Promise<void>
  /** @throws CollectionNotFoundError */
  getCollection(name: string): Promise<Collection>
  registerCollection(definition: Collection): void
  listCollections(): Promise<string[]>

  insert(collection: string, records: RecordSet | DataRecord[]): Promise<void>
  update(collection: string, records: RecordSet | DataRecord[]): Promise<void>
  delete(collection: string, ...ids: unknown[]): Promise<void>
  /** @throws RecordNotFoundError */
  retrieve(collection: string, id: unknown, ...fields: string[]): Promise<DataRecord>
  exists(collection: string, id: unknown): Promise<boolean>

  withSearch(collection?: Collection | string, filter?: Filter): Indexer | null
  withAggregator(collection?: Collection | string): Aggregator | null
  flush(): Promise<void>
}

// =============================================================================
// Indexer
// =============================================================================

/**
 * Paging details passed to streaming callbacks
 */
export interface IndexPage {
  /** 1-based page number of the adapter call the record came from */
  page: number
  limit: number
  offset: number
  /** Total matches, when the adapter reports one */
  total: number | undefined
}

/**
 * One adapter page. `total` is undefined when the engine cannot count.
 */
export interface PageResult {
  records: DataRecord[]
  total: number | undefined
}

/** Return `false` to stop the stream */
export type ResultFunc = (record: DataRecord, page: IndexPage) => void | boolean | Promise<void | boolean>

export interface Indexer {
  /** Most records the adapter returns from one queryPage call */
  readonly pageSize?: number | undefined

  /** One page honouring `filter.limit` and `filter.offset` */
  queryPage(collection: Collection, filter: Filter): Promise<PageResult>
  query(collection: Collection, filter: Filter): Promise<RecordSet>
  queryFunc(collection: Collection, filter: Filter, fn: ResultFunc): Promise<void>
  /** Distinct values per field, in first-seen order */
  listValues(collection: Collection, fields: string[], filter: Filter): Promise<Record<string, unknown[]>>
  deleteQuery(collection: Collection, filter: Filter): Promise<void>
}

// =============================================================================
// Aggregator
// =============================================================================

export interface Aggregator {
  count(collection: Collection, filter?: Filter): Promise<number>
  sum(collection: Collection, field: string, filter?: Filter): Promise<number>
  minimum(collection: Collection, field: string, filter?: Filter): Promise<number>
  maximum(collection: Collection, field: string, filter?: Filter): Promise<number>
  average(collection: Collection, field: string, filter?: Filter): Promise<number>
  /**
   * One record per distinct combination of `groupFields`, carrying the group
   * values plus `<aggregation>_<field>` for every aggregate
   */
  groupBy(collection: Collection, groupFields: string[], aggregates: Aggregate[], filter?: Filter): Promise<RecordSet>
}

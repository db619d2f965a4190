/**
 * Base Backend
 *
 * Abstract base class holding the lifecycle shared by every adapter:
 * connection attempts with a deadline, availability state, the health
 * monitor, collection registration, and uniform error wrapping around the
 * data operations.
 */

import { ConnectionString } from '../connection'
import {
  DEFAULT_CONNECT_ATTEMPTS,
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_REFRESH_MAX_FAILURES,
  DEFAULT_REFRESH_TIMEOUT_MS,
} from '../constants'
import { BackendUnavailableError, toError, wrapBackendError } from '../errors'
import type { Filter } from '../filter/filter'
import type { DataRecord } from '../record/record'
import { RecordSet } from '../record/recordset'
import type { Collection } from '../schema/collection'
import { withDeadline } from '../utils/deadline'
import { type Logger, logger as defaultLogger } from '../utils/logger'
import { HealthMonitor } from './monitor'
import type { Aggregator, Backend, BackendOptions, BackendStatus, Indexer } from './types'

// =============================================================================
// Abstract Base Backend
// =============================================================================

/**
 * Abstract base class for backends
 *
 * Subclasses must implement:
 * - connectInternal()
 * - Collection methods: createCollectionInternal(), deleteCollectionInternal(),
 *   getCollectionInternal(), listCollectionsInternal()
 * - Record methods: insertInternal(), updateInternal(), deleteInternal(),
 *   retrieveInternal(), existsInternal()
 * - Optional: disconnectInternal(), refreshInternal(), flushInternal(),
 *   withSearch(), withAggregator(), statusInfo()
 */
export abstract class BaseBackend implements Backend {
  // ===========================================================================
  // Metadata
  // ===========================================================================

  abstract readonly name: string
  readonly connectionString: ConnectionString

  // ===========================================================================
  // Protected State
  // ===========================================================================

  protected readonly logger: Logger
  protected readonly registered = new Map<string, Collection>()
  protected readonly externalIndexer: Indexer | undefined
  protected available = false
  protected connected = false

  private readonly connectAttempts: number
  private readonly connectTimeoutMs: number
  private readonly autocreate: boolean
  private readonly monitor: HealthMonitor | undefined

  // ===========================================================================
  // Constructor
  // ===========================================================================

  constructor(connectionString: ConnectionString | string, options: BackendOptions = {}) {
    this.connectionString =
      typeof connectionString === 'string' ? ConnectionString.parse(connectionString) : connectionString

    const cs = this.connectionString
    this.logger = options.logger ?? defaultLogger
    this.connectAttempts = Math.max(
      1,
      options.connectAttempts ?? cs.optInt('connect_attempts', DEFAULT_CONNECT_ATTEMPTS)
    )
    this.connectTimeoutMs = options.connectTimeoutMs ?? cs.optInt('connect_timeout', DEFAULT_CONNECT_TIMEOUT_MS)
    this.autocreate = options.autocreate ?? cs.optBool('autocreate', false)
    this.externalIndexer = options.indexer

    const refreshIntervalMs = options.refreshIntervalMs ?? cs.optInt('refresh_interval', 0)
    this.monitor =
      refreshIntervalMs > 0
        ? new HealthMonitor(this, {
            intervalMs: refreshIntervalMs,
            timeoutMs: options.refreshTimeoutMs ?? cs.optInt('refresh_timeout', DEFAULT_REFRESH_TIMEOUT_MS),
            maxFailures: options.refreshMaxFailures ?? cs.optInt('refresh_failures', DEFAULT_REFRESH_MAX_FAILURES),
            logger: this.logger,
          })
        : undefined
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Connect, then create any registered collection the backend lacks when
   * autocreate is enabled. Idempotent.
   */
  async initialize(): Promise<void> {
    if (!this.connected) {
      await this.connect()
    }

    if (!this.autocreate || this.registered.size === 0) return

    const existing = new Set(await this.listCollections())
    for (const definition of this.registered.values()) {
      if (existing.has(definition.name)) continue
      this.logger.info(`${this.name}: creating registered collection ${definition.name}`)
      await this.createCollection(definition)
    }
  }

  /**
   * Attempt `connectInternal()` up to `connect_attempts` times, each bounded by
   * `connect_timeout`
   *
   * @throws the last attempt's failure, wrapped as a BackendError
   */
  async connect(): Promise<void> {
    if (this.connected) return

    let lastError: Error | undefined

    for (let attempt = 1; attempt <= this.connectAttempts; attempt++) {
      try {
        await withDeadline(this.connectInternal(), this.connectTimeoutMs, `connect ${this.name}`)
        this.connected = true
        this.available = true
        this.monitor?.start()
        this.logger.info(`${this.name}: connected to ${this.connectionString.toString()}`)
        return
      } catch (err) {
        lastError = toError(err)
        this.logger.warn(
          `${this.name}: connection attempt ${attempt}/${this.connectAttempts} failed: ${lastError.message}`
        )
      }
    }

    throw wrapBackendError(lastError, { backend: this.name, operation: 'connect' })
  }

  async disconnect(): Promise<void> {
    this.monitor?.stop()
    if (!this.connected) return

    this.available = false
    this.connected = false
    await this.disconnectInternal()
    this.logger.info(`${this.name}: disconnected`)
  }

  suspend(reason?: Error): void {
    if (!this.available) return
    this.available = false
    this.logger.warn(`${this.name}: suspended${reason ? `: ${reason.message}` : ''}`)
  }

  resume(): void {
    if (!this.connected || this.available) return
    this.available = true
    this.logger.info(`${this.name}: resumed`)
  }

  isAvailable(): boolean {
    return this.available
  }

  isConnected(): boolean {
    return this.connected
  }

  status(): BackendStatus {
    return Object.freeze({
      name: this.connectionString.dataset || this.name,
      type: this.name,
      available: this.available,
      connected: this.connected,
      connectionString: this.connectionString.toString(),
      collections: Object.freeze(this.knownCollections()),
      info: Object.freeze(this.statusInfo()),
    })
  }

  /**
   * @throws BackendUnavailableError when disconnected
   */
  async refresh(): Promise<void> {
    if (!this.connected) {
      throw new BackendUnavailableError(this.name, 'refresh')
    }
    await this.refreshInternal()
  }

  async flush(): Promise<void> {
    await this.guard('flush', {}, () => this.flushInternal())
  }

  // ===========================================================================
  // Collections
  // ===========================================================================

  registerCollection(definition: Collection): void {
    this.registered.set(definition.name, definition)
  }

  async createCollection(definition: Collection): Promise<void> {
    definition.validate()
    await this.guard('createCollection', { collection: definition.name }, () =>
      this.createCollectionInternal(definition)
    )
    this.registered.set(definition.name, definition)
  }

  async deleteCollection(name: string): Promise<void> {
    await this.guard('deleteCollection', { collection: name }, () => this.deleteCollectionInternal(name))
    this.registered.delete(name)
  }

  async getCollection(name: string): Promise<Collection> {
    return this.guard('getCollection', { collection: name }, () => this.getCollectionInternal(name))
  }

  async listCollections(): Promise<string[]> {
    return this.guard('listCollections', {}, () => this.listCollectionsInternal())
  }

  // ===========================================================================
  // Records
  // ===========================================================================

  async insert(collection: string, records: RecordSet | DataRecord[]): Promise<void> {
    const list = toRecordList(records)
    await this.guard('insert', { collection }, () => this.insertInternal(collection, list))
  }

  async update(collection: string, records: RecordSet | DataRecord[]): Promise<void> {
    const list = toRecordList(records)
    await this.guard('update', { collection }, () => this.updateInternal(collection, list))
  }

  async delete(collection: string, ...ids: unknown[]): Promise<void> {
    await this.guard('delete', { collection }, () => this.deleteInternal(collection, ids))
  }

  async retrieve(collection: string, id: unknown, ...fields: string[]): Promise<DataRecord> {
    return this.guard('retrieve', { collection, id }, () => this.retrieveInternal(collection, id, fields))
  }

  async exists(collection: string, id: unknown): Promise<boolean> {
    return this.guard('exists', { collection, id }, () => this.existsInternal(collection, id))
  }

  // ===========================================================================
  // Capabilities
  // ===========================================================================

  /** The indexer given in the options, if any */
  withSearch(_collection?: Collection | string, _filter?: Filter): Indexer | null {
    return this.externalIndexer ?? null
  }

  withAggregator(_collection?: Collection | string): Aggregator | null {
    return null
  }

  // ===========================================================================
  // Protected Helpers
  // ===========================================================================

  /**
   * @throws BackendUnavailableError while suspended or disconnected
   */
  protected assertAvailable(operation: string): void {
    if (!this.available) {
      throw new BackendUnavailableError(this.name, operation)
    }
  }

  /**
   * Run a data operation: check availability, then pass polydal errors
   * through and wrap anything else in a BackendError
   */
  protected async guard<T>(operation: string, context: Record<string, unknown>, work: () => Promise<T>): Promise<T> {
    this.assertAvailable(operation)
    try {
      return await work()
    } catch (err) {
      throw wrapBackendError(err, { backend: this.name, operation, ...context })
    }
  }

  protected knownCollections(): string[] {
    return [...this.registered.keys()]
  }

  protected statusInfo(): Record<string, unknown> {
    return {}
  }

  // ===========================================================================
  // Abstract Methods
  // ===========================================================================

  protected abstract connectInternal(): Promise<void>

  protected async disconnectInternal(): Promise<void> {}

  protected async refreshInternal(): Promise<void> {}

  protected async flushInternal(): Promise<void> {}

  protected abstract createCollectionInternal(definition: Collection): Promise<void>
  protected abstract deleteCollectionInternal(name: string): Promise<void>
  protected abstract getCollectionInternal(name: string): Promise<Collection>
  protected abstract listCollectionsInternal(): Promise<string[]>

  protected abstract insertInternal(collection: string, records: DataRecord[]): Promise<void>
  protected abstract updateInternal(collection: string, records: DataRecord[]): Promise<void>
  protected abstract deleteInternal(collection: string, ids: unknown[]): Promise<void>
  protected abstract retrieveInternal(collection: string, id: unknown, fields: string[]): Promise<DataRecord>
  protected abstract existsInternal(collection: string, id: unknown): Promise<boolean>
}

function toRecordList(records: RecordSet | DataRecord[]): DataRecord[] {
  return records instanceof RecordSet ? records.records : records
}

/**
 * Backends
 *
 * The capability contract every storage adapter implements, the shared
 * lifecycle base class, pagination bridging, joins across collections,
 * migration checks and the in-memory reference adapter.
 *
 * @example
 * ```typescript
 * import { defaultRegistry, migrate, requireSearch } from 'polydal/backends'
 *
 * const backend = defaultRegistry.create('memory://localhost/app?page_size=50')
 * await backend.initialize()
 * const users = await migrate(backend, usersCollection)
 * const admins = await requireSearch(backend, users).query(users, parseFilter('role/admin'))
 * ```
 */

// =============================================================================
// Types
// =============================================================================

export type {
  Aggregator,
  Backend,
  BackendOptions,
  BackendStatus,
  IndexPage,
  Indexer,
  PageResult,
  ResultFunc,
} from './types'

// =============================================================================
// Implementations
// =============================================================================

export { BaseBackend } from './base'
export { MemoryAggregator, MemoryBackend, MemoryIndexer } from './memory'
export type { MemoryBackendOptions } from './memory'
export { MetaIndex } from './metaindex'
export type { JoinSide, MetaIndexOptions } from './metaindex'

// =============================================================================
// Utilities
// =============================================================================

export { requireAggregator, requireSearch } from './capabilities'
export { paginate, populateRecordSetPageDetails, projectRecord } from './pagination'
export type { PaginateOptions } from './pagination'
export { migrate, migrateAll } from './migrate'
export { HealthMonitor } from './monitor'
export type { HealthMonitorOptions, MonitoredBackend } from './monitor'
export { BackendRegistry, defaultRegistry } from './registry'
export type { BackendFactory } from './registry'

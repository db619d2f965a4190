/**
 * polydal - one schema model, filter language and backend contract across
 * storage engines
 *
 * @example
 * ```typescript
 * import { Collection, connect, migrate, parseFilter, requireSearch } from 'polydal'
 *
 * const backend = await connect('memory://localhost/app')
 * const users = await migrate(
 *   backend,
 *   new Collection({ name: 'users', fields: [{ name: 'name', type: 'str', required: true }] })
 * )
 *
 * await backend.insert('users', [new DataRecord(null, { name: 'First' })])
 * const found = await requireSearch(backend, users).query(users, parseFilter('name/prefix:fi'))
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// Errors
// =============================================================================

export * from './errors'

// =============================================================================
// Types and Schema
// =============================================================================

export * from './types'
export * from './schema'

// =============================================================================
// Records
// =============================================================================

export * from './record'

// =============================================================================
// Filters
// =============================================================================

export * from './filter'

// =============================================================================
// Connections and Backends
// =============================================================================

export { ConnectionString, parseConnectionString, makeConnectionString } from './connection'
export type { Credentials } from './connection'
export * from './backends'

// =============================================================================
// Configuration
// =============================================================================

export * from './config'

// =============================================================================
// Utilities
// =============================================================================

export * from './utils'
export * from './constants'

/**
 * polydal Constants
 *
 * Centralized constants used throughout the codebase.
 */

// =============================================================================
// Schema
// =============================================================================

/** Identity field name used when a collection does not declare one */
export const DEFAULT_IDENTITY_FIELD = 'id'

/** Joiner used to build compound index keys */
export const DEFAULT_COMPOUND_KEY_JOINER = ':'

/** Separator for nested field paths in records (`address.city`) */
export const FIELD_NESTING_SEPARATOR = '.'

/**
 * Integers below this are read as epoch seconds when coerced to time,
 * anything at or above as epoch milliseconds
 */
export const EPOCH_SECONDS_THRESHOLD = 4294967296

// =============================================================================
// Query
// =============================================================================

/**
 * Default maximum page size an indexer services per call
 * Used by the pagination bridge when neither the call nor the indexer sets one
 */
export const DEFAULT_INDEXER_PAGE_SIZE = 100

/** Upper bound on distinct values returned by listValues */
export const MAX_FACET_CARDINALITY = 10000

// =============================================================================
// Backend Lifecycle
// =============================================================================

/** Connection attempts made by connect() before giving up */
export const DEFAULT_CONNECT_ATTEMPTS = 1

/** Time allowed for one connection attempt in milliseconds */
export const DEFAULT_CONNECT_TIMEOUT_MS = 15000

/** Time allowed for one health-check refresh in milliseconds */
export const DEFAULT_REFRESH_TIMEOUT_MS = 10000

/** Consecutive failed health checks tolerated before disconnecting */
export const DEFAULT_REFRESH_MAX_FAILURES = 5

// =============================================================================
// Configuration
// =============================================================================

/** Connection string used when none is configured */
export const DEFAULT_CONNECTION_STRING = 'memory://localhost/default'

/** Prefix of recognised environment variables */
export const ENV_PREFIX = 'POLYDAL_'

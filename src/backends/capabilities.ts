/**
 * Capability lookups that fail loudly
 *
 * @module backends/capabilities
 */

import { CapabilityUnsupportedError } from '../errors'
import type { Filter } from '../filter/filter'
import type { Collection } from '../schema/collection'
import type { Aggregator, Backend, Indexer } from './types'

/**
 * @throws CapabilityUnsupportedError when the backend has no indexer
 */
export function requireSearch(backend: Backend, collection?: Collection | string, filter?: Filter): Indexer {
  const indexer = backend.withSearch(collection, filter)
  if (!indexer) {
    throw new CapabilityUnsupportedError('search', backend.name)
  }
  return indexer
}

/**
 * @throws CapabilityUnsupportedError when the backend has no aggregator
 */
export function requireAggregator(backend: Backend, collection?: Collection | string): Aggregator {
  const aggregator = backend.withAggregator(collection)
  if (!aggregator) {
    throw new CapabilityUnsupportedError('aggregation', backend.name)
  }
  return aggregator
}

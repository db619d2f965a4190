/**
 * Schema migration checks
 *
 * Reconciles a desired collection definition with what a backend actually
 * holds. Missing collections are created; anything else that differs is
 * reported as drift and left for the operator to resolve.
 *
 * @example
 * ```typescript
 * const users = await migrate(backend, new Collection({ name: 'users', fields: [...] }))
 * ```
 */

import { SchemaDriftError, isCollectionNotFoundError } from '../errors'
import type { Collection } from '../schema/collection'
import { logger } from '../utils/logger'
import type { Backend } from './types'

/**
 * Create `desired` when the backend lacks it, otherwise compare the two
 *
 * @returns the backend's collection with the desired definition's behaviour
 * (defaults, formatters, validators) applied
 * @throws SchemaDriftError carrying every difference
 */
export async function migrate(backend: Backend, desired: Collection): Promise<Collection> {
  let actual: Collection

  try {
    actual = await backend.getCollection(desired.name)
  } catch (err) {
    if (!isCollectionNotFoundError(err)) throw err

    logger.info(`migrate: creating collection ${desired.name} on ${backend.name}`)
    await backend.createCollection(desired)
    actual = await backend.getCollection(desired.name)
  }

  const deltas = desired.diff(actual)
  if (deltas.length > 0) {
    logger.warn(`migrate: collection ${desired.name} has drifted (${deltas.length} differences)`)
    throw new SchemaDriftError(desired.name, deltas)
  }

  logger.info(`migrate: collection ${desired.name} is up to date`)
  return actual.applyDefinition(desired)
}

/**
 * Migrate every collection in order, stopping at the first failure
 */
export async function migrateAll(backend: Backend, collections: Collection[]): Promise<Collection[]> {
  const migrated: Collection[] = []

  for (const collection of collections) {
    migrated.push(await migrate(backend, collection))
  }

  return migrated
}

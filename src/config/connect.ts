/**
 * Connecting from configuration
 */

import { requireSearch } from '../backends/capabilities'
import { type BackendRegistry, defaultRegistry } from '../backends/registry'
import type { Backend, Indexer } from '../backends/types'
import { ConnectionString } from '../connection'
import { createLevelLogger, setLogger } from '../utils/logger'
import { type PolydalConfig, getConfig } from './loader'

export interface ConnectOptions {
  /** Connection string of a backend whose indexer serves all searches */
  indexer?: string | undefined
  /** Return the backend without connecting it */
  skipInitialize?: boolean | undefined
  /** Overrides the configuration's autocreate setting */
  autocreateCollections?: boolean | undefined
  registry?: BackendRegistry | undefined
}

/**
 * Create the configured backend and initialize it
 *
 * A connection string may be given in place of a configuration; the rest of
 * the configuration then comes from the environment.
 *
 * @throws UnknownBackendError when no backend handles the scheme
 *
 * @example
 * ```typescript
 * const backend = await connect('memory://localhost/app?page_size=50')
 * ```
 */
export async function connect(config?: PolydalConfig | string, options: ConnectOptions = {}): Promise<Backend> {
  const resolved: PolydalConfig =
    typeof config === 'string' ? { ...getConfig(), connection: config } : config ?? getConfig()
  const registry = options.registry ?? defaultRegistry

  if (resolved.logLevel !== undefined) {
    setLogger(createLevelLogger(resolved.logLevel))
  }

  const cs = ConnectionString.parse(resolved.connection)

  let indexBackend: Backend | undefined
  let indexer: Indexer | undefined
  if (options.indexer) {
    indexBackend = registry.create(options.indexer)
    await indexBackend.connect()
  }

  try {
    if (indexBackend) indexer = requireSearch(indexBackend)

    const backend = registry.create(cs, {
      // an explicit page_size in the connection string wins
      pageSize: cs.hasOpt('page_size') ? undefined : resolved.pageSize,
      connectTimeoutMs: resolved.connectTimeoutMs,
      autocreate: options.autocreateCollections ?? (resolved.autocreate ? true : undefined),
      indexer,
    })

    if (!options.skipInitialize) {
      await backend.initialize()
    }

    return backend
  } catch (err) {
    await indexBackend?.disconnect()
    throw err
  }
}

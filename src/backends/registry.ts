/**
 * Backend registry
 *
 * Maps connection schemes to backend factories. Adapters register themselves
 * here instead of being hard-wired into the core.
 *
 * @module backends/registry
 */

import { ConnectionString } from '../connection'
import { UnknownBackendError } from '../errors'
import { MemoryBackend } from './memory'
import type { Backend, BackendOptions } from './types'

export type BackendFactory = (connectionString: ConnectionString, options: BackendOptions) => Backend

export class BackendRegistry {
  private readonly factories = new Map<string, BackendFactory>()

  /** Later registrations replace earlier ones for the same scheme */
  register(scheme: string, factory: BackendFactory): this {
    this.factories.set(scheme.toLowerCase(), factory)
    return this
  }

  unregister(scheme: string): boolean {
    return this.factories.delete(scheme.toLowerCase())
  }

  has(scheme: string): boolean {
    return this.factories.has(scheme.toLowerCase())
  }

  schemes(): string[] {
    return [...this.factories.keys()].sort()
  }

  /**
   * Instantiate the backend for a connection string. The full scheme
   * (`backend+protocol`) is tried before the bare backend name.
   *
   * @throws ConnectionStringError for malformed strings
   * @throws UnknownBackendError when no factory handles the scheme
   */
  create(connectionString: ConnectionString | string, options: BackendOptions = {}): Backend {
    const cs = typeof connectionString === 'string' ? ConnectionString.parse(connectionString) : connectionString
    const factory = this.factories.get(cs.scheme) ?? this.factories.get(cs.backend)

    if (!factory) {
      throw new UnknownBackendError(cs.scheme)
    }

    return factory(cs, options)
  }
}

/**
 * Registry used by `connect()`; comes with the `memory` backend
 */
export const defaultRegistry = new BackendRegistry().register('memory', (cs, options) => new MemoryBackend(cs, options))

/**
 * Tests for the backend registry and capability lookups
 */

import { describe, it, expect } from 'vitest'
import { BackendRegistry, defaultRegistry } from '../../../src/backends/registry'
import { MemoryBackend } from '../../../src/backends/memory'
import { requireAggregator, requireSearch } from '../../../src/backends/capabilities'
import { BaseBackend } from '../../../src/backends/base'
import { Collection } from '../../../src/schema/collection'
import { DataRecord } from '../../../src/record/record'
import { CapabilityUnsupportedError, UnknownBackendError } from '../../../src/errors'

/**
 * An adapter with no search or aggregation support
 */
class BareBackend extends BaseBackend {
  readonly name = 'bare'

  protected async connectInternal(): Promise<void> {}
  protected async createCollectionInternal(): Promise<void> {}
  protected async deleteCollectionInternal(): Promise<void> {}
  protected async getCollectionInternal(name: string): Promise<Collection> {
    return new Collection({ name })
  }
  protected async listCollectionsInternal(): Promise<string[]> {
    return []
  }
  protected async insertInternal(): Promise<void> {}
  protected async updateInternal(): Promise<void> {}
  protected async deleteInternal(): Promise<void> {}
  protected async retrieveInternal(_collection: string, id: unknown): Promise<DataRecord> {
    return new DataRecord(id)
  }
  protected async existsInternal(): Promise<boolean> {
    return false
  }
}

describe('BackendRegistry', () => {
  it('should create memory backends from the default registry', () => {
    const backend = defaultRegistry.create('memory://localhost/test?page_size=25')

    expect(backend).toBeInstanceOf(MemoryBackend)
    expect(backend.name).toBe('memory')
    expect(backend.withSearch()?.pageSize).toBe(25)
  })

  it('should reject unknown schemes', () => {
    expect(() => defaultRegistry.create('mongodb://localhost/test')).toThrow(UnknownBackendError)
    expect(() => defaultRegistry.create('mongodb://localhost/test')).toThrow('Unknown backend type "mongodb"')
  })

  it('should prefer the full scheme over the backend name', () => {
    const registry = new BackendRegistry()
      .register('memory', cs => new MemoryBackend(cs, { pageSize: 1 }))
      .register('memory+fast', cs => new MemoryBackend(cs, { pageSize: 2 }))

    expect(registry.create('memory+fast://localhost/x').withSearch()?.pageSize).toBe(2)
    expect(registry.create('memory+slow://localhost/x').withSearch()?.pageSize).toBe(1)
  })

  it('should pass options to the factory', () => {
    const backend = defaultRegistry.create('memory://localhost/x', { pageSize: 7 })
    expect(backend.withSearch()?.pageSize).toBe(7)
  })

  it('should list and remove schemes', () => {
    const registry = new BackendRegistry().register('Memory', cs => new MemoryBackend(cs))

    expect(registry.schemes()).toEqual(['memory'])
    expect(registry.has('MEMORY')).toBe(true)
    expect(registry.unregister('memory')).toBe(true)
    expect(registry.has('memory')).toBe(false)
  })
})

describe('capabilities', () => {
  it('should hand back the memory indexer and aggregator', () => {
    const backend = new MemoryBackend()

    expect(requireSearch(backend)).toBe(backend.withSearch())
    expect(requireAggregator(backend)).toBe(backend.withAggregator())
  })

  it('should fail with CapabilityUnsupportedError when a capability is missing', () => {
    const registry = new BackendRegistry().register('bare', cs => new BareBackend(cs))
    const backend = registry.create('bare://localhost/x')

    expect(() => requireSearch(backend)).toThrow(CapabilityUnsupportedError)
    expect(() => requireAggregator(backend)).toThrow('Backend "bare" does not support aggregation')
  })
})

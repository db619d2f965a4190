/**
 * Tests for the error hierarchy
 */

import { describe, it, expect } from 'vitest'
import {
  BackendError,
  BackendUnavailableError,
  CapabilityUnsupportedError,
  CollectionNotFoundError,
  ErrorCode,
  NotFoundError,
  PolydalError,
  RecordNotFoundError,
  RequiredFieldError,
  SchemaDriftError,
  UnknownBackendError,
  ValidationError,
  isCollectionNotFoundError,
  isNotFoundError,
  isPolydalError,
  isValidationError,
  toError,
  wrapBackendError,
} from '../../../src/errors'

describe('errors', () => {
  describe('hierarchy', () => {
    it('should keep instanceof working through subclasses', () => {
      const err = new CollectionNotFoundError('users')

      expect(err).toBeInstanceOf(CollectionNotFoundError)
      expect(err).toBeInstanceOf(NotFoundError)
      expect(err).toBeInstanceOf(PolydalError)
      expect(err).toBeInstanceOf(Error)
      expect(err.name).toBe('CollectionNotFoundError')
      expect(err.message).toBe('Collection not found: users')
    })

    it('should distinguish unsupported capabilities from backend failures', () => {
      const unsupported = new CapabilityUnsupportedError('search', 'memory')

      expect(unsupported).not.toBeInstanceOf(BackendError)
      expect(unsupported.message).toBe('Backend "memory" does not support search')
      expect(new UnknownBackendError('mongo')).toBeInstanceOf(CapabilityUnsupportedError)
      expect(new UnknownBackendError('mongo').message).toBe('Unknown backend type "mongo"')
    })

    it('should describe unavailability with the operation', () => {
      expect(new BackendUnavailableError('memory', 'insert').message).toBe('Backend "memory" is unavailable (insert)')
    })

    it('should list every drift delta', () => {
      const err = new SchemaDriftError('users', [
        { name: 'email', toString: () => "Field 'email': is missing" },
        { name: 'age', toString: () => "Field 'age': is missing" },
      ])

      expect(err.message).toBe(
        "Actual schema for collection 'users' differs from desired schema\n- Field 'email': is missing\n- Field 'age': is missing"
      )
      expect(err.context).toEqual({ collection: 'users', fields: ['email', 'age'] })
    })
  })

  describe('codes', () => {
    it('should match codes and categories', () => {
      const err = new RecordNotFoundError('users', 3)

      expect(err.is(ErrorCode.RECORD_NOT_FOUND)).toBe(true)
      expect(err.isCategory('NOT_FOUND')).toBe(true)
      expect(err.isCategory('VALIDATION')).toBe(false)
    })
  })

  describe('serialization', () => {
    it('should round-trip through JSON with its cause', () => {
      const cause = new ValidationError('bad value', { field: 'age' })
      const err = new PolydalError('write failed', ErrorCode.INTERNAL, { collection: 'users' }, cause)

      const copy = PolydalError.fromJSON(err.toJSON())

      expect(copy.message).toBe('write failed')
      expect(copy.code).toBe(ErrorCode.INTERNAL)
      expect(copy.context).toEqual({ collection: 'users' })
      expect(copy.cause?.message).toBe('bad value')
    })
  })

  describe('helpers', () => {
    it('should pass polydal errors through wrapBackendError', () => {
      const original = new RecordNotFoundError('users', 1)
      expect(wrapBackendError(original)).toBe(original)
    })

    it('should wrap foreign errors with the cause attached', () => {
      const cause = new Error('socket closed')
      const wrapped = wrapBackendError(cause, { backend: 'memory', operation: 'insert' })

      expect(wrapped).toBeInstanceOf(BackendError)
      expect(wrapped.message).toBe('socket closed')
      expect(wrapped.cause).toBe(cause)
      expect(wrapped.context).toEqual({ backend: 'memory', operation: 'insert' })
    })

    it('should normalize thrown values', () => {
      expect(toError('boom').message).toBe('boom')
      expect(isPolydalError(new Error('x'))).toBe(false)
      expect(isNotFoundError(new RecordNotFoundError('a', 1))).toBe(true)
      expect(isCollectionNotFoundError(new RecordNotFoundError('a', 1))).toBe(false)
      expect(isValidationError(new RequiredFieldError('name'))).toBe(true)
      expect(isValidationError(new RecordNotFoundError('a', 1))).toBe(false)
    })
  })
})

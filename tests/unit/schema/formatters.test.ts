/**
 * Tests for built-in field formatters
 */

import { afterEach, describe, it, expect, vi } from 'vitest'
import {
  changeCase,
  currentTimeIfUnset,
  deriveFromFields,
  formatAll,
  formatterFromConfig,
  generateEncodedId,
  generateUUID,
  nowPlusDuration,
  replace,
  trimSpace,
} from '../../../src/schema/formatters'
import { DataRecord } from '../../../src/record/record'
import { SchemaDefinitionError } from '../../../src/errors'

describe('formatters', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  describe('identifier generators', () => {
    it('should fill unset values with a UUID on persist only', () => {
      const id = generateUUID('', 'persist')

      expect(String(id)).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/)
      expect(generateUUID('', 'retrieve')).toBe('')
      expect(generateUUID('keep', 'persist')).toBe('keep')
    })

    it('should generate distinct encoded ids of at least the minimum length', () => {
      const format = generateEncodedId({ minLength: 10 })
      const a = String(format(null, 'persist'))
      const b = String(format(null, 'persist'))

      expect(a.length).toBeGreaterThanOrEqual(10)
      expect(a).not.toBe(b)
      expect(format('set', 'persist')).toBe('set')
    })
  })

  describe('text formatters', () => {
    it('should trim whitespace and pass null through', () => {
      expect(trimSpace('  a b  ', 'persist')).toBe('a b')
      expect(trimSpace(null, 'persist')).toBeNull()
    })

    it('should change case', () => {
      expect(changeCase('underscore')('FirstName', 'persist')).toBe('first_name')
      expect(changeCase('camelize')('first_name', 'persist')).toBe('FirstName')
      expect(changeCase('upper')('abc', 'persist')).toBe('ABC')
      expect(changeCase('title')('hello there', 'persist')).toBe('Hello There')
    })

    it('should reject unknown case styles', () => {
      expect(() => changeCase('sideways')).toThrow("Unsupported case 'sideways'")
    })

    it('should apply replacements in order', () => {
      expect(replace([['\\s+', '-'], ['-+$', '']])('a b  c ', 'persist')).toBe('a-b-c')
    })
  })

  describe('time formatters', () => {
    it('should stamp the time only when unset', () => {
      vi.useFakeTimers()
      vi.setSystemTime(new Date('2024-05-01T00:00:00Z'))

      const existing = new Date('2020-01-01T00:00:00Z')
      expect(currentTimeIfUnset(null, 'persist')).toEqual(new Date('2024-05-01T00:00:00Z'))
      expect(currentTimeIfUnset(existing, 'persist')).toBe(existing)
    })

    it('should add a fixed offset to now', () => {
      vi.useFakeTimers()
      vi.setSystemTime(new Date('2024-05-01T00:00:00Z'))

      expect(nowPlusDuration(60000)(null, 'persist')).toEqual(new Date('2024-05-01T00:01:00Z'))
      expect(nowPlusDuration(0)('kept', 'persist')).toBe('kept')
    })
  })

  describe('deriveFromFields', () => {
    it('should fill the template from the record', () => {
      const format = deriveFromFields('%v-%v', 'group', 'name')
      const record = new DataRecord(1, { group: 'a', name: 'b' })

      expect(format(null, 'persist', record)).toBe('a-b')
    })

    it('should fail without a record', () => {
      expect(() => deriveFromFields('%v', 'x')(null, 'persist')).toThrow('deriveFromFields requires the record')
    })
  })

  describe('composition', () => {
    it('should chain formatters left to right', () => {
      expect(formatAll(trimSpace, changeCase('upper'))(' hi ', 'persist')).toBe('HI')
    })

    it('should build chains from configuration', () => {
      const format = formatterFromConfig({ 'trim-space': true, replace: [['o', '0']] })
      expect(format(' foo ', 'persist')).toBe('f00')
    })

    it('should reject unknown formatter names', () => {
      expect(() => formatterFromConfig({ sparkle: true })).toThrow(SchemaDefinitionError)
      expect(() => formatterFromConfig({ replace: 'x' })).toThrow(
        "'replace' formatter requires an argument of [[FINDPATTERN, REPLACEWITH], ..]"
      )
    })
  })
})

/**
 * Tests for the textual filter grammar
 */

import { describe, it, expect } from 'vitest'
import { parseFilter } from '../../../src/filter/parser'
import { Filter } from '../../../src/filter/filter'
import { SPACED_SYNTAX, defineSyntax } from '../../../src/filter/syntax'
import { FilterParseError } from '../../../src/errors'

describe('parseFilter', () => {
  // ===========================================================================
  // Basic forms
  // ===========================================================================

  describe('basic forms', () => {
    it('should parse the match-all literal', () => {
      const filter = parseFilter('all')

      expect(filter.isMatchAll()).toBe(true)
      expect(filter.criteria).toEqual([])
      expect(filter.toString()).toBe('all')
    })

    it('should parse an empty spec as a filter that is not match-all', () => {
      const filter = parseFilter('')

      expect(filter.isMatchAll()).toBe(false)
      expect(filter.criteria).toEqual([])
    })

    it('should parse a bare equality', () => {
      const [criterion] = parseFilter('name/Bob').criteria

      expect(criterion).toEqual({
        field: 'name',
        type: 'auto',
        length: 0,
        operator: '',
        values: ['Bob'],
        sort: undefined,
      })
    })

    it('should ignore a leading separator', () => {
      expect(parseFilter('/name/Bob').criteria[0]?.field).toBe('name')
    })

    it('should keep values as text', () => {
      expect(parseFilter('int:age/gt:21').criteria[0]?.values).toEqual(['21'])
    })
  })

  // ===========================================================================
  // Modifiers
  // ===========================================================================

  describe('modifiers', () => {
    it('should parse types, lengths and operators', () => {
      const [criterion] = parseFilter('str#16:code/prefix:ab').criteria

      expect(criterion?.type).toBe('str')
      expect(criterion?.length).toBe(16)
      expect(criterion?.operator).toBe('prefix')
      expect(criterion?.values).toEqual(['ab'])
    })

    it('should split alternative values', () => {
      expect(parseFilter('status/is:active|pending').criteria[0]?.values).toEqual(['active', 'pending'])
    })

    it('should record sort directions', () => {
      const filter = parseFilter('-int:age/gt:21/+name/prefix:a')

      expect(filter.sort).toEqual(['-age', 'name'])
      expect(filter.getSort()).toEqual([
        { field: 'age', descending: true },
        { field: 'name', descending: false },
      ])
    })

    it('should keep prefixes that are not operator-shaped as part of the value', () => {
      expect(parseFilter('clock/10:30').criteria[0]?.values).toEqual(['10:30'])
      expect(parseFilter('label/Key:Value').criteria[0]?.operator).toBe('')
    })

    it('should resolve relative times for time criteria', () => {
      const before = Date.now()
      const [value] = parseFilter('time:created/gt:-1h').criteria[0]?.values ?? []
      const after = Date.now()

      expect(value).toBeInstanceOf(Date)
      if (!(value instanceof Date)) return
      expect(value.getTime()).toBeGreaterThanOrEqual(before - 3600000)
      expect(value.getTime()).toBeLessThanOrEqual(after - 3600000)
    })
  })

  // ===========================================================================
  // Errors
  // ===========================================================================

  describe('errors', () => {
    it('should reject a field without a value', () => {
      expect(() => parseFilter('name/Bob/age')).toThrow(FilterParseError)
      expect(() => parseFilter('name/Bob/age')).toThrow('Field has no value')
    })

    it('should reject unknown operators', () => {
      expect(() => parseFilter('name/near:Bob')).toThrow('Unknown operator "near"')
    })

    it('should reject unknown types', () => {
      expect(() => parseFilter('uuid:id/1')).toThrow('Unknown type "uuid"')
    })

    it('should reject empty field names', () => {
      expect(() => parseFilter('int:/1')).toThrow('Empty field name')
    })

    it('should reject unterminated value lists', () => {
      expect(() => parseFilter('name/a|')).toThrow('Unterminated value list')
    })

    it('should reject invalid lengths', () => {
      expect(() => parseFilter('str#0:code/x')).toThrow('Invalid length "0"')
    })

    it('should report the offending token and its position', () => {
      let caught: unknown
      try {
        parseFilter('name/Bob/age/near:1')
      } catch (err) {
        caught = err
      }

      expect(caught).toBeInstanceOf(FilterParseError)
      if (!(caught instanceof FilterParseError)) return
      expect(caught.token).toBe('near:1')
      expect(caught.position).toBe(13)
    })
  })

  // ===========================================================================
  // Alternate syntax
  // ===========================================================================

  describe('alternate syntax', () => {
    it('should parse space-separated criteria', () => {
      const filter = parseFilter('  name=contains:ir   int:age=gt:21 ', { syntax: SPACED_SYNTAX })

      expect(filter.criteria.map(c => [c.field, c.operator, c.values])).toEqual([
        ['name', 'contains', ['ir']],
        ['age', 'gt', ['21']],
      ])
      expect(filter.toString()).toBe('name=contains:ir int:age=gt:21')
    })

    it('should reject a criterion without a term separator', () => {
      expect(() => parseFilter('name', { syntax: SPACED_SYNTAX })).toThrow('Criterion "name" has no value')
    })

    it('should unescape values when asked', () => {
      const syntax = defineSyntax({ unescapeValues: true })
      const filter = parseFilter('path/a%2Fb', { syntax })

      expect(filter.criteria[0]?.values).toEqual(['a/b'])
      expect(filter.toString()).toBe('path/a%2Fb')
    })
  })

  // ===========================================================================
  // Serialization
  // ===========================================================================

  describe('serialization', () => {
    it('should round-trip typed, sorted and multi-valued criteria', () => {
      for (const spec of ['name/Bob', '-int:age/gt:21', 'str#8:code/prefix:a|b', 'name/contains:ir/name/prefix:f']) {
        expect(parseFilter(spec).toString()).toBe(spec)
      }
    })

    it('should round-trip time criteria by their source text', () => {
      for (const spec of ['time:created/gt:-1h', 'time:created/2020-01-01']) {
        const filter = parseFilter(spec)

        expect(filter.toString()).toBe(spec)
        expect(filter.copy().toString()).toBe(spec)
      }
      expect(parseFilter('time:created/gt:-1h').criteria[0]?.values[0]).toBeInstanceOf(Date)
    })

    it('should bind the identity field', () => {
      const filter = parseFilter('uid/7', { identityField: 'uid' })

      expect(filter.identityField).toBe('uid')
      expect(filter.getIdentityValue()).toBe('7')
    })
  })
})

describe('Filter', () => {
  it('should extend itself from specs and maps', () => {
    const base = parseFilter('name/Bob')

    expect(base.newFromSpec('int:age/gt:21').toString()).toBe('name/Bob/int:age/gt:21')
    expect(base.newFromMap({ status: ['a', 'b'] }).toString()).toBe('name/Bob/status/a|b')
  })

  it('should leave limit and offset alone for negative bounds', () => {
    const filter = new Filter().boundedBy(10, 5).boundedBy(-1)

    expect(filter.limit).toBe(10)
    expect(filter.offset).toBe(5)
  })

  it('should copy independently', () => {
    const original = parseFilter('name/Bob')
    const copy = original.copy()
    copy.criteria[0]?.values.push('Al')
    copy.limit = 3

    expect(original.criteria[0]?.values).toEqual(['Bob'])
    expect(original.limit).toBe(0)
  })

  it('should recognize identity-only projections', () => {
    expect(new Filter({ fields: ['id'] }).idOnly()).toBe(true)
    expect(new Filter({ fields: ['id', 'name'] }).idOnly()).toBe(false)
  })
})

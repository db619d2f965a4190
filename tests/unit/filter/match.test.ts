/**
 * Tests for in-process record matching
 */

import { describe, it, expect } from 'vitest'
import { parseFilter } from '../../../src/filter/parser'
import { Filter } from '../../../src/filter/filter'
import { DataRecord } from '../../../src/record/record'

const people = [
  new DataRecord(1, { name: 'First', age: 20, joined: new Date('2020-01-01T00:00:00Z') }),
  new DataRecord(2, { name: 'Second', age: 35, joined: new Date('2022-06-01T00:00:00Z') }),
  new DataRecord(3, { name: 'Third', age: 41, nickname: null }),
]

function matchingIds(spec: string): unknown[] {
  const filter = parseFilter(spec)
  return people.filter(record => filter.matches(record)).map(record => record.id)
}

describe('matchesRecord', () => {
  it('should match everything with all', () => {
    expect(matchingIds('all')).toEqual([1, 2, 3])
  })

  it('should match a missing record only with all', () => {
    expect(Filter.all().matches(undefined)).toBe(true)
    expect(parseFilter('name/First').matches(null)).toBe(false)
  })

  it('should join criteria with and', () => {
    expect(matchingIds('name/contains:ir/name/prefix:f')).toEqual([1])
  })

  it('should join criteria with or when asked', () => {
    const filter = parseFilter('name/First/name/Third')
    filter.conjunction = 'or'

    expect(people.filter(record => filter.matches(record)).map(record => record.id)).toEqual([1, 3])
  })

  it('should compare auto-typed equality loosely', () => {
    expect(matchingIds('age/35')).toEqual([2])
    expect(matchingIds('id/3')).toEqual([3])
  })

  it('should treat values as alternatives', () => {
    expect(matchingIds('name/First|Third')).toEqual([1, 3])
  })

  it('should compare normalized strings for like', () => {
    expect(matchingIds('name/like:SECOND')).toEqual([2])
    expect(matchingIds('name/suffix:rd')).toEqual([3])
  })

  it('should order numbers numerically', () => {
    expect(matchingIds('int:age/gt:21')).toEqual([2, 3])
    expect(matchingIds('age/lte:35')).toEqual([1, 2])
  })

  it('should order times by instant', () => {
    expect(matchingIds('time:joined/gte:2021-01-01T00:00:00Z')).toEqual([2])
  })

  it('should invert negated operators across all values', () => {
    expect(matchingIds('name/not:First|Second')).toEqual([3])
    expect(matchingIds('name/notcontains:ir')).toEqual([2])
    expect(matchingIds('name/notprefix:s')).toEqual([1, 3])
  })

  it('should match missing values with null', () => {
    expect(matchingIds('nickname/null')).toEqual([1, 2, 3])
    expect(matchingIds('joined/null')).toEqual([3])
    expect(matchingIds('joined/not:null')).toEqual([1, 2])
  })

  it('should never match a missing value with a range operator', () => {
    expect(matchingIds('time:joined/lt:2030-01-01T00:00:00Z')).toEqual([1, 2])
  })
})

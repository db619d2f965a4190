/**
 * Tests for DataRecord and RecordSet
 */

import { describe, it, expect } from 'vitest'
import { DataRecord } from '../../../src/record/record'
import { RecordSet } from '../../../src/record/recordset'
import { Collection } from '../../../src/schema/collection'

describe('DataRecord', () => {
  describe('field access', () => {
    it('should read the identity through id', () => {
      expect(new DataRecord(5, { name: 'a' }).get('id')).toBe(5)
    })

    it('should prefer flat keys over nested paths', () => {
      const record = new DataRecord(1, { 'a.b': 'flat', a: { b: 'nested' } })
      expect(record.get('a.b')).toBe('flat')
      expect(record.getNested('a.b')).toBe('nested')
    })

    it('should read nested values and fall back', () => {
      const record = new DataRecord(1, { address: { city: 'Oslo' }, tags: ['x', 'y'] })

      expect(record.get('address.city')).toBe('Oslo')
      expect(record.get('tags.1')).toBe('y')
      expect(record.get('address.zip', 'none')).toBe('none')
      expect(record.getString('missing', '-')).toBe('-')
    })

    it('should write nested values, creating parents', () => {
      const record = new DataRecord(1).setNested('a.b.c', 3)
      expect(record.fields).toEqual({ a: { b: { c: 3 } } })
    })

    it('should append to lists, promoting scalars', () => {
      const record = new DataRecord(1, { tags: 'a' })
      record.append('tags', 'b', 'c')
      record.append('new', 1)

      expect(record.fields).toEqual({ tags: ['a', 'b', 'c'], new: [1] })
    })
  })

  describe('keys', () => {
    const edges = new Collection({
      name: 'edges',
      fields: [
        { name: 'from', type: 'str', key: true },
        { name: 'weight', type: 'float' },
        { name: 'to', type: 'str', key: true },
      ],
    })

    it('should list the identity then key fields in declaration order', () => {
      const record = new DataRecord(1, { from: 'a', to: 'b', weight: 2 })
      expect(record.keys(edges)).toEqual([1, 'a', 'b'])
      expect(record.keys()).toEqual([1])
    })

    it('should assign keys back with conversion', () => {
      const record = new DataRecord().setKeys(edges, 'persist', '7', 'x', 'y')

      expect(record.id).toBe(7)
      expect(record.fields).toEqual({ from: 'x', to: 'y' })
    })
  })

  describe('interchange', () => {
    it('should copy fields shallowly', () => {
      const original = new DataRecord(1, { a: 1 })
      const copy = original.copy()
      copy.set('a', 2)

      expect(original.get('a')).toBe(1)
    })

    it('should encode data as base64', () => {
      const record = new DataRecord(1, { a: 1 }).setData(new Uint8Array([1, 2, 3]))
      const doc = record.toJSON()

      expect(doc).toEqual({ id: 1, fields: { a: 1 }, data: 'AQID' })
      expect(DataRecord.fromJSON(doc).data).toEqual(new Uint8Array([1, 2, 3]))
    })
  })
})

describe('RecordSet', () => {
  it('should count pushed records', () => {
    const set = new RecordSet(new DataRecord(1))
    set.push(new DataRecord(2))

    expect(set.resultCount).toBe(2)
    expect(set.size).toBe(2)
    expect(set.ids()).toEqual([1, 2])
  })

  it('should find records by the string form of their id', () => {
    const set = new RecordSet(new DataRecord(10, { name: 'a' }), new DataRecord('x', { name: 'b' }))

    expect(set.getRecordById('10')?.get('name')).toBe('a')
    expect(set.getRecordById('x')?.get('name')).toBe('b')
    expect(set.getRecordById(3)).toBeUndefined()
  })

  it('should pluck values with a fallback', () => {
    const set = new RecordSet(new DataRecord(1, { n: 1 }), new DataRecord(2))
    expect(set.pluck('n', 0)).toEqual([1, 0])
  })

  it('should serialize paging details', () => {
    const set = new RecordSet(new DataRecord(1))
    set.resultCount = 30
    set.page = 2
    set.totalPages = 3
    set.recordsPerPage = 10

    const copy = RecordSet.fromJSON(JSON.parse(JSON.stringify(set)))

    expect(copy.resultCount).toBe(30)
    expect(copy.page).toBe(2)
    expect(copy.totalPages).toBe(3)
    expect(copy.recordsPerPage).toBe(10)
    expect(copy.records[0]?.id).toBe(1)
    expect(copy.unbounded).toBe(false)
  })
})

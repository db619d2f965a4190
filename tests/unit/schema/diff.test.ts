/**
 * Tests for schema comparison
 */

import { describe, it, expect } from 'vitest'
import { Collection } from '../../../src/schema/collection'
import { SchemaDelta, diffCollections } from '../../../src/schema/diff'

describe('diffCollections', () => {
  const desired = new Collection({
    name: 'users',
    fields: [
      { name: 'name', type: 'str' },
      { name: 'email', type: 'str' },
    ],
  })

  it('should return nothing when the actual schema satisfies the desired one', () => {
    const actual = new Collection({
      name: 'users',
      fields: [
        { name: 'name', type: 'str' },
        { name: 'email', type: 'str' },
        { name: 'extra', type: 'int' },
      ],
    })

    expect(diffCollections(desired, actual)).toEqual([])
  })

  it('should report missing fields', () => {
    const actual = new Collection({ name: 'users', fields: [{ name: 'name', type: 'str' }] })
    const deltas = diffCollections(desired, actual)

    expect(deltas).toHaveLength(1)
    expect(deltas[0]?.issue).toBe('field-missing')
    expect(deltas[0]?.collection).toBe('users')
    expect(deltas[0]?.toString()).toBe("Field 'email': is missing")
  })

  it('should report identity differences', () => {
    const actual = new Collection({
      name: 'users',
      identityField: 'uid',
      identityFieldType: 'str',
      fields: [
        { name: 'name', type: 'str' },
        { name: 'email', type: 'str' },
      ],
    })

    expect(diffCollections(desired, actual).map(d => d.toString())).toEqual([
      "Collection 'users', parameter 'identity_field': values do not match (desired: id, actual: uid)",
      "Collection 'users', parameter 'identity_field_type': values do not match (desired: int, actual: str)",
    ])
  })

  it('should leave long values out of the description', () => {
    const delta = new SchemaDelta({
      type: 'field',
      issue: 'field-property',
      name: 'bio',
      parameter: 'default',
      desired: 'a rather long default',
      actual: 'x',
      message: 'values do not match',
    })

    expect(delta.toString()).toBe("Field 'bio', parameter 'default': values do not match")
  })
})

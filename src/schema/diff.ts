/**
 * Schema differences
 *
 * Compares a desired collection definition against the one a backend reports
 * and lists every discrepancy. Nothing here changes either schema.
 *
 * @module schema/diff
 */

import type { DriftEntry } from '../errors'
import type { Collection } from './collection'

export type DeltaType = 'collection' | 'field'

export type DeltaIssue =
  | 'collection-name'
  | 'collection-key-name'
  | 'collection-key-type'
  | 'field-missing'
  | 'field-length'
  | 'field-type'
  | 'field-property'

/**
 * One difference between a desired and an actual schema
 */
export class SchemaDelta implements DriftEntry {
  readonly type: DeltaType
  readonly issue: DeltaIssue
  readonly message: string
  readonly collection: string | undefined
  readonly name: string
  readonly parameter: string | undefined
  readonly desired: unknown
  readonly actual: unknown

  constructor(init: {
    type: DeltaType
    issue: DeltaIssue
    message: string
    name: string
    collection?: string | undefined
    parameter?: string | undefined
    desired?: unknown
    actual?: unknown
  }) {
    this.type = init.type
    this.issue = init.issue
    this.message = init.message
    this.name = init.name
    this.collection = init.collection
    this.parameter = init.parameter
    this.desired = init.desired
    this.actual = init.actual
  }

  /**
   * @example
   * "Field 'email': is missing"
   * "Field 'age', parameter 'type': values do not match (desired: int, actual: str)"
   */
  toString(): string {
    const subject = this.type === 'field' ? 'Field' : 'Collection'
    let out = `${subject} '${this.name}'`

    if (this.parameter === undefined) {
      return `${out}: ${this.message}`
    }

    out += `, parameter '${this.parameter}': ${this.message}`

    const desired = describe(this.desired)
    const actual = describe(this.actual)
    if (desired.length <= 12 && actual.length <= 12) {
      out += ` (desired: ${desired}, actual: ${actual})`
    }

    return out
  }
}

function describe(value: unknown): string {
  if (value === undefined) return '<none>'
  if (typeof value === 'function') return '<function>'
  if (typeof value === 'object' && value !== null && !(value instanceof Date)) return JSON.stringify(value)
  return String(value)
}

/** Build a field-level delta */
export function fieldDelta(
  issue: DeltaIssue,
  name: string,
  parameter: string | undefined,
  desired: unknown,
  actual: unknown,
  message: string
): SchemaDelta {
  return new SchemaDelta({ type: 'field', issue, name, parameter, desired, actual, message })
}

/**
 * Compare two collections. Returns an empty list when `actual` satisfies
 * `desired`. Fields present only in `actual` are ignored.
 */
export function diffCollections(desired: Collection, actual: Collection): SchemaDelta[] {
  const deltas: SchemaDelta[] = []
  const collection = desired.name

  if (desired.name !== actual.name) {
    deltas.push(
      new SchemaDelta({
        type: 'collection',
        issue: 'collection-name',
        name: desired.name,
        collection,
        parameter: 'name',
        desired: desired.name,
        actual: actual.name,
        message: 'values do not match',
      })
    )
  }

  if (desired.identityField !== actual.identityField) {
    deltas.push(
      new SchemaDelta({
        type: 'collection',
        issue: 'collection-key-name',
        name: desired.name,
        collection,
        parameter: 'identity_field',
        desired: desired.identityField,
        actual: actual.identityField,
        message: 'values do not match',
      })
    )
  }

  if (desired.identityFieldType !== actual.identityFieldType) {
    deltas.push(
      new SchemaDelta({
        type: 'collection',
        issue: 'collection-key-type',
        name: desired.name,
        collection,
        parameter: 'identity_field_type',
        desired: desired.identityFieldType,
        actual: actual.identityFieldType,
        message: 'values do not match',
      })
    )
  }

  for (const wanted of desired.fields) {
    const have = actual.getField(wanted.name)

    if (!have) {
      deltas.push(
        new SchemaDelta({ type: 'field', issue: 'field-missing', name: wanted.name, collection, message: 'is missing' })
      )
      continue
    }

    for (const delta of wanted.diff(have)) {
      deltas.push(
        new SchemaDelta({
          type: delta.type,
          issue: delta.issue,
          name: delta.name,
          collection,
          parameter: delta.parameter,
          desired: delta.desired,
          actual: delta.actual,
          message: delta.message,
        })
      )
    }
  }

  return deltas
}

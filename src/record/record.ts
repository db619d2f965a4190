/**
 * Record
 *
 * One item of a collection: an identity value plus a flat map of field values
 * (nested values are reached with dotted paths).
 *
 * @module record/record
 */

import { DEFAULT_IDENTITY_FIELD, FIELD_NESTING_SEPARATOR } from '../constants'
import { ValidationError } from '../errors'
import type { Collection } from '../schema/collection'
import type { FieldDirection } from '../schema/field'
import { getNestedValue, isNullish, isPlainObject, setNestedValue, stringify } from '../utils/comparison'

/**
 * Serialized record
 */
export interface RecordDocument {
  id: unknown
  fields?: Record<string, unknown>
  /** base64 */
  data?: string
  error?: string
}

export class DataRecord {
  id: unknown
  fields: Record<string, unknown>
  data: Uint8Array | undefined
  /** Per-record failure reported by a backend */
  error: Error | undefined

  constructor(id: unknown = null, fields: Record<string, unknown> = {}, error?: Error) {
    this.id = id
    this.fields = fields
    this.data = undefined
    this.error = error
  }

  /**
   * Read a value. `id` returns the identity; dotted keys read nested values.
   */
  get(key: string, fallback?: unknown): unknown {
    if (key === DEFAULT_IDENTITY_FIELD) return this.id

    if (Object.prototype.hasOwnProperty.call(this.fields, key)) {
      return this.fields[key]
    }

    return this.getNested(key, fallback)
  }

  getNested(key: string, fallback?: unknown): unknown {
    const value = getNestedValue(this.fields, key, FIELD_NESTING_SEPARATOR)
    return value === undefined ? fallback : value
  }

  getString(key: string, fallback = ''): string {
    const value = this.get(key)
    return isNullish(value) ? fallback : stringify(value)
  }

  set(key: string, value: unknown): this {
    this.fields[key] = value
    return this
  }

  setNested(key: string, value: unknown): this {
    setNestedValue(this.fields, key, value, FIELD_NESTING_SEPARATOR)
    return this
  }

  setFields(values: Record<string, unknown>): this {
    for (const [key, value] of Object.entries(values)) {
      this.set(key, value)
    }
    return this
  }

  setData(data: Uint8Array | undefined): this {
    this.data = data
    return this
  }

  /** Append values to the list stored at `key`, promoting a scalar to a list */
  append(key: string, ...values: unknown[]): this {
    return this.set(key, [...toList(this.get(key)), ...values])
  }

  appendNested(key: string, ...values: unknown[]): this {
    return this.setNested(key, [...toList(this.getNested(key)), ...values])
  }

  /**
   * The identity followed by the values of the collection's key fields, for
   * compound-key collections
   */
  keys(collection?: Collection): unknown[] {
    const values: unknown[] = [this.id]
    if (!collection) return values

    const keyCount = collection.keyCount()
    for (const field of collection.fields) {
      if (values.length >= keyCount) break
      if (!field.key) continue

      const value = this.get(field.name)
      if (!isNullish(value)) values.push(value)
    }

    return values
  }

  /**
   * Inverse of `keys`: assign the identity then each key field in declaration
   * order, converting and formatting values for the given direction
   *
   * @throws ValidationError when a key value is rejected
   */
  setKeys(collection: Collection, direction: FieldDirection, ...keys: unknown[]): this {
    if (keys.length === 0) return this

    this.id = collection.convertValue(collection.identityField, keys[0])

    let i = 1
    for (const field of collection.fields) {
      if (i >= keys.length) break
      if (!field.key) continue

      const converted = field.convertValue(field.format(keys[i], direction, this))
      field.validate(converted)
      this.set(field.name, converted)
      i += 1
    }

    return this
  }

  /** Shallow-copied fields; nested objects are shared */
  copy(): DataRecord {
    const out = new DataRecord(this.id, { ...this.fields }, this.error)
    out.data = this.data
    return out
  }

  toJSON(): RecordDocument {
    const doc: RecordDocument = { id: this.id }
    if (Object.keys(this.fields).length > 0) doc.fields = this.fields
    if (this.data) doc.data = Buffer.from(this.data).toString('base64')
    if (this.error) doc.error = this.error.message
    return doc
  }

  toString(): string {
    try {
      return JSON.stringify(this)
    } catch {
      return `Record<${String(this.id)} + ${Object.keys(this.fields).length} fields>`
    }
  }

  static fromJSON(doc: unknown): DataRecord {
    if (!isPlainObject(doc)) {
      throw new ValidationError('Record document must be an object')
    }

    const fields = isPlainObject(doc.fields) ? { ...doc.fields } : {}
    const record = new DataRecord(doc.id ?? null, fields)

    if (typeof doc.data === 'string') {
      record.data = new Uint8Array(Buffer.from(doc.data, 'base64'))
    }
    if (typeof doc.error === 'string') {
      record.error = new Error(doc.error)
    }

    return record
  }
}

function toList(value: unknown): unknown[] {
  if (isNullish(value)) return []
  return Array.isArray(value) ? value : [value]
}

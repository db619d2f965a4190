/**
 * Record mapping
 *
 * An explicit, build-once table describing how the properties of an
 * application object map onto the fields of a record.
 *
 * @example
 * ```typescript
 * interface User { id: number; name: string; nickname?: string }
 *
 * const users = RecordMapping.builder<User>()
 *   .identity('id')
 *   .field('name', { as: 'full_name' })
 *   .field('nickname', { skipEmpty: true })
 *   .build()
 *
 * const record = users.toRecord({ id: 1, name: 'Ada' })
 * // record.id === 1, record.fields === { full_name: 'Ada' }
 * ```
 *
 * @module record/mapping
 */

import { SchemaDefinitionError } from '../errors'
import type { Collection } from '../schema/collection'
import { isZero } from '../types/field-type'
import { DataRecord } from './record'

export interface MappingEntry {
  /** Property on the application object */
  property: string
  /** Field name in the record */
  field: string
  identity: boolean
  /** Leave the field out of the record when the property holds a zero value */
  skipEmpty: boolean
}

export interface FieldMappingOptions {
  as?: string | undefined
  skipEmpty?: boolean | undefined
}

export class RecordMapping<T extends object> {
  private readonly table: readonly MappingEntry[]

  constructor(entries: readonly MappingEntry[]) {
    const seen = new Set<string>()
    let identities = 0

    for (const entry of entries) {
      if (seen.has(entry.field)) {
        throw new SchemaDefinitionError(`Field "${entry.field}" is mapped more than once`, { field: entry.field })
      }
      seen.add(entry.field)
      if (entry.identity) identities++
    }

    if (identities > 1) {
      throw new SchemaDefinitionError('A record mapping may declare at most one identity property')
    }

    this.table = entries
  }

  static builder<T extends object>(): RecordMappingBuilder<T> {
    return new RecordMappingBuilder<T>()
  }

  entries(): readonly MappingEntry[] {
    return this.table
  }

  identityEntry(): MappingEntry | undefined {
    return this.table.find(entry => entry.identity)
  }

  /** Entry for a record field name */
  entryForField(field: string): MappingEntry | undefined {
    return this.table.find(entry => entry.field === field)
  }

  /**
   * Convert an application object to a record. With a collection, the record
   * also goes through the collection's write path.
   */
  toRecord(instance: T, collection?: Collection): DataRecord {
    const record = new DataRecord()

    for (const entry of this.table) {
      const value: unknown = Reflect.get(instance, entry.property)

      if (entry.identity) {
        record.id = value ?? null
        continue
      }
      if (value === undefined) continue
      if (entry.skipEmpty && isZero(value)) continue

      record.set(entry.field, value)
    }

    return collection ? collection.makeRecord(record) : record
  }

  /**
   * Copy a record's values onto an application object. With a collection,
   * values are converted and formatted for the retrieve direction, and fields
   * flagged `validateOnPopulate` are validated.
   *
   * @throws ValidationError when a populated value is rejected
   */
  fromRecord(record: DataRecord, target: T, collection?: Collection): T {
    for (const entry of this.table) {
      let value: unknown

      if (entry.identity) {
        value = collection ? collection.formatAndValidateId(record.id, 'retrieve', record) : record.id
      } else {
        value = record.get(entry.field)
        const field = collection?.getField(entry.field)

        if (field) {
          value = field.convertValue(field.format(value, 'retrieve', record))
          if (field.validateOnPopulate) field.validate(value)
        }
      }

      Reflect.set(target, entry.property, value)
    }

    return target
  }

  /** Pair an instance with this mapping, so it can be told apart from a plain map */
  wrap(instance: T): MappedInstance<T> {
    return new MappedInstance(instance, this)
  }
}

/**
 * An application object tagged with the mapping that describes it
 */
export class MappedInstance<T extends object> {
  constructor(
    readonly instance: T,
    readonly mapping: RecordMapping<T>
  ) {}
}

export class RecordMappingBuilder<T extends object> {
  private readonly list: MappingEntry[] = []

  identity(property: keyof T & string, options: { as?: string } = {}): this {
    this.list.push({ property, field: options.as ?? property, identity: true, skipEmpty: false })
    return this
  }

  field(property: keyof T & string, options: FieldMappingOptions = {}): this {
    this.list.push({
      property,
      field: options.as ?? property,
      identity: false,
      skipEmpty: options.skipEmpty ?? false,
    })
    return this
  }

  build(): RecordMapping<T> {
    return new RecordMapping<T>([...this.list])
  }
}

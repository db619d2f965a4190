/**
 * Field definitions
 *
 * A Field describes one named, typed attribute of a Collection together with
 * the rules applied on its write path: default values, formatters and
 * validators.
 *
 * @module schema/field
 */

import type { DataRecord } from '../record/record'
import { SchemaDefinitionError, ValidationError, RequiredFieldError, toError } from '../errors'
import { type FieldType, coerceValue, isFieldType, zeroValue } from '../types/field-type'
import { deepEqual, isNullish, isPlainObject } from '../utils/comparison'
import { formatterFromConfig } from './formatters'
import { validatorFromConfig } from './validators'
import { type SchemaDelta, fieldDelta } from './diff'

// =============================================================================
// Formatter / Validator Types
// =============================================================================

/** Direction a value travels: into the backend, or out of it */
export type FieldDirection = 'persist' | 'retrieve'

/**
 * A pure transformation applied to a field value. Throwing rejects the value.
 * `record` is the record being written or read, when there is one.
 */
export type FieldFormatter = (value: unknown, direction: FieldDirection, record?: DataRecord) => unknown

/** A predicate over a write value. Throwing rejects the value. */
export type FieldValidator = (value: unknown) => void

/** A default value, either static or computed on write */
export type DefaultValue = unknown | (() => unknown)

/** Declarative formatter/validator configuration: name -> arguments */
export type RuleConfig = Record<string, unknown>

/** "Belongs to" reference to another collection. Recorded, not enforced. */
export interface FieldReference {
  collection: string
  field?: string | undefined
}

// =============================================================================
// Field Definition
// =============================================================================

/**
 * Plain description of a field, as written by schema authors
 */
export interface FieldDefinition {
  name: string
  type: FieldType
  description?: string | undefined
  /** Element type of `array` fields */
  subtype?: FieldType | undefined
  /** Length constraint used by fixed-width backends */
  length?: number | undefined
  precision?: number | undefined
  required?: boolean | undefined
  unique?: boolean | undefined
  /** Member of a compound key */
  key?: boolean | undefined
  defaultValue?: DefaultValue
  /** Native type reported by a backend (read only) */
  nativeType?: string | undefined
  notUserEditable?: boolean | undefined
  /** Also validate values read back from the backend */
  validateOnPopulate?: boolean | undefined
  validator?: FieldValidator | undefined
  formatter?: FieldFormatter | undefined
  validators?: RuleConfig | undefined
  formatters?: RuleConfig | undefined
  belongsTo?: FieldReference | undefined
  /** Position of the field in the source database */
  index?: number | undefined
}

/**
 * Serialized field, as found in schema documents
 */
export interface FieldDocument {
  name: string
  type: string
  description?: string
  subtype?: string
  length?: number
  precision?: number
  required?: boolean
  unique?: boolean
  key?: boolean
  default?: unknown
  native_type?: string
  not_user_editable?: boolean
  validate_on_populate?: boolean
  validators?: RuleConfig
  formatters?: RuleConfig
  belongs_to?: FieldReference
  index?: number
}

// =============================================================================
// Field
// =============================================================================

export class Field {
  readonly name: string
  type: FieldType
  description: string | undefined
  subtype: FieldType | undefined
  length: number
  precision: number
  required: boolean
  unique: boolean
  key: boolean
  defaultValue: DefaultValue
  nativeType: string | undefined
  notUserEditable: boolean
  validateOnPopulate: boolean
  validator: FieldValidator | undefined
  formatter: FieldFormatter | undefined
  validators: RuleConfig | undefined
  formatters: RuleConfig | undefined
  belongsTo: FieldReference | undefined
  index: number

  constructor(def: FieldDefinition) {
    if (!def.name) {
      throw new SchemaDefinitionError('Field name cannot be empty')
    }
    if (!isFieldType(def.type)) {
      throw new SchemaDefinitionError(`Field "${def.name}" has unknown type "${String(def.type)}"`, {
        field: def.name,
        type: def.type,
      })
    }

    this.name = def.name
    this.type = def.type
    this.description = def.description
    this.subtype = def.subtype
    this.length = def.length ?? 0
    this.precision = def.precision ?? 0
    this.required = def.required ?? false
    this.unique = def.unique ?? false
    this.key = def.key ?? false
    this.defaultValue = def.defaultValue
    this.nativeType = def.nativeType
    this.notUserEditable = def.notUserEditable ?? false
    this.validateOnPopulate = def.validateOnPopulate ?? false
    this.validators = def.validators
    this.formatters = def.formatters
    this.belongsTo = def.belongsTo
    this.index = def.index ?? 0

    // explicit functions win over declarative configuration
    this.formatter = def.formatter ?? (def.formatters ? formatterFromConfig(def.formatters) : undefined)
    this.validator = def.validator ?? (def.validators ? validatorFromConfig(def.validators) : undefined)
  }

  /** Whether the default is computed on each write */
  get hasComputedDefault(): boolean {
    return isComputedDefault(this.defaultValue)
  }

  /**
   * Resolve the default value: call a computed default, then coerce.
   * Returns undefined when no default is declared.
   */
  getDefaultValue(): unknown {
    if (this.defaultValue === undefined) return undefined
    const raw = isComputedDefault(this.defaultValue) ? this.defaultValue() : this.defaultValue
    return this.coerce(raw)
  }

  /** The zero instance of this field's type */
  getTypeInstance(): unknown {
    return zeroValue(this.type)
  }

  /**
   * Coerce a value to the field's canonical type
   *
   * @throws InvalidTypeError
   */
  coerce(value: unknown): unknown {
    const converted = coerceValue(this.type, value, this.name)
    if (this.type === 'array' && this.subtype && Array.isArray(converted)) {
      const subtype = this.subtype
      return converted.map(item => coerceValue(subtype, item, this.name))
    }
    return converted
  }

  /**
   * Coerce a value and fill absent values: the default if declared, the
   * zero instance for required fields, null otherwise.
   */
  convertValue(value: unknown): unknown {
    const converted = this.coerce(value)

    if (isNullish(converted)) {
      const fallback = this.getDefaultValue()
      if (fallback !== undefined) return fallback
      if (this.required) return this.getTypeInstance()
    }

    return converted
  }

  /**
   * Run the formatter, if any
   *
   * @throws ValidationError wrapping the formatter's failure
   */
  format(value: unknown, direction: FieldDirection, record?: DataRecord): unknown {
    if (!this.formatter) return value

    try {
      return this.formatter(value, direction, record)
    } catch (err) {
      const cause = toError(err)
      throw new ValidationError(`field "${this.name}": formatter error: ${cause.message}`, { field: this.name, value }, cause)
    }
  }

  /**
   * Check required-ness, then run the validator, if any
   *
   * @throws RequiredFieldError | ValidationError
   */
  validate(value: unknown): void {
    if (this.required && isNullish(value)) {
      throw new RequiredFieldError(this.name)
    }

    if (!this.validator) return

    try {
      this.validator(value)
    } catch (err) {
      const cause = toError(err)
      throw new ValidationError(`field "${this.name}": validation error: ${cause.message}`, { field: this.name, value }, cause)
    }
  }

  /**
   * Compare this (desired) field against the field a backend reports
   */
  diff(actual: Field): SchemaDelta[] {
    const deltas: SchemaDelta[] = []

    if (this.type !== actual.type) {
      // objects may be stored as raw blobs, times as integers
      const tolerated =
        (this.type === 'object' && actual.type === 'raw') || (this.type === 'time' && actual.type === 'int')

      if (!tolerated) {
        deltas.push(fieldDelta('field-type', this.name, 'type', this.type, actual.type, 'values do not match'))
      }
    }

    // longer than desired is fine, shorter is not
    if (this.length > 0 && actual.length > 0 && actual.length < this.length) {
      deltas.push(fieldDelta('field-length', this.name, 'length', this.length, actual.length, 'length is shorter than desired'))
    }

    for (const property of ['required', 'unique', 'key'] as const) {
      if (this[property] !== actual[property]) {
        deltas.push(fieldDelta('field-property', this.name, property, this[property], actual[property], 'values do not match'))
      }
    }

    if (this.subtype !== undefined && actual.subtype !== undefined && this.subtype !== actual.subtype) {
      deltas.push(fieldDelta('field-type', this.name, 'subtype', this.subtype, actual.subtype, 'values do not match'))
    }

    if (
      this.defaultValue !== undefined &&
      actual.defaultValue !== undefined &&
      !this.hasComputedDefault &&
      !actual.hasComputedDefault &&
      !deepEqual(this.getDefaultValue(), actual.getDefaultValue())
    ) {
      deltas.push(
        fieldDelta('field-property', this.name, 'default', this.defaultValue, actual.defaultValue, 'values do not match')
      )
    }

    return deltas
  }

  /** Copy with overrides */
  with(overrides: Partial<FieldDefinition>): Field {
    return new Field({ ...this.toDefinition(), ...overrides })
  }

  toDefinition(): FieldDefinition {
    return {
      name: this.name,
      type: this.type,
      description: this.description,
      subtype: this.subtype,
      length: this.length,
      precision: this.precision,
      required: this.required,
      unique: this.unique,
      key: this.key,
      defaultValue: this.defaultValue,
      nativeType: this.nativeType,
      notUserEditable: this.notUserEditable,
      validateOnPopulate: this.validateOnPopulate,
      validator: this.validator,
      formatter: this.formatter,
      validators: this.validators,
      formatters: this.formatters,
      belongsTo: this.belongsTo,
      index: this.index,
    }
  }

  // ===========================================================================
  // Interchange
  // ===========================================================================

  toJSON(): FieldDocument {
    const doc: FieldDocument = { name: this.name, type: this.type }

    if (this.description) doc.description = this.description
    if (this.subtype) doc.subtype = this.subtype
    if (this.length > 0) doc.length = this.length
    if (this.precision > 0) doc.precision = this.precision
    if (this.required) doc.required = true
    if (this.unique) doc.unique = true
    if (this.key) doc.key = true
    // computed defaults have no serialized form
    if (this.defaultValue !== undefined && !this.hasComputedDefault) doc.default = this.defaultValue
    if (this.nativeType) doc.native_type = this.nativeType
    if (this.notUserEditable) doc.not_user_editable = true
    if (this.validateOnPopulate) doc.validate_on_populate = true
    if (this.validators) doc.validators = this.validators
    if (this.formatters) doc.formatters = this.formatters
    if (this.belongsTo) doc.belongs_to = this.belongsTo
    if (this.index > 0) doc.index = this.index

    return doc
  }

  static fromJSON(doc: unknown): Field {
    if (!isPlainObject(doc)) {
      throw new SchemaDefinitionError('Field document must be an object')
    }

    const name = doc.name
    const type = doc.type
    if (typeof name !== 'string' || name === '') {
      throw new SchemaDefinitionError('Field document is missing "name"')
    }
    if (!isFieldType(type)) {
      throw new SchemaDefinitionError(`Field "${name}" has unknown type "${String(type)}"`, { field: name, type })
    }

    let subtype: FieldType | undefined
    if (doc.subtype !== undefined) {
      if (!isFieldType(doc.subtype)) {
        throw new SchemaDefinitionError(`Field "${name}" has unknown subtype "${String(doc.subtype)}"`, { field: name })
      }
      subtype = doc.subtype
    }

    return new Field({
      name,
      type,
      subtype,
      description: optionalString(doc.description),
      length: optionalNumber(doc.length),
      precision: optionalNumber(doc.precision),
      required: doc.required === true,
      unique: doc.unique === true,
      key: doc.key === true,
      defaultValue: doc.default,
      nativeType: optionalString(doc.native_type),
      notUserEditable: doc.not_user_editable === true,
      validateOnPopulate: doc.validate_on_populate === true,
      validators: isPlainObject(doc.validators) ? doc.validators : undefined,
      formatters: isPlainObject(doc.formatters) ? doc.formatters : undefined,
      belongsTo: parseReference(doc.belongs_to),
      index: optionalNumber(doc.index),
    })
  }
}

function isComputedDefault(value: unknown): value is () => unknown {
  return typeof value === 'function'
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined
}

function parseReference(value: unknown): FieldReference | undefined {
  if (!isPlainObject(value) || typeof value.collection !== 'string') return undefined
  return { collection: value.collection, field: optionalString(value.field) }
}

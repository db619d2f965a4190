/**
 * Collections
 *
 * A Collection is the schema of one table, bucket or index: an identity
 * field plus an ordered list of Fields. Every record written through a
 * backend passes through `makeRecord`.
 *
 * @module schema/collection
 */

import {
  DEFAULT_COMPOUND_KEY_JOINER,
  DEFAULT_IDENTITY_FIELD,
} from '../constants'
import {
  FieldNotFoundError,
  RecordValidationError,
  SchemaDefinitionError,
  ValidationError,
  isValidationError,
  toError,
} from '../errors'
import type { RecordMapping } from '../record/mapping'
import { DataRecord } from '../record/record'
import { type FieldType, FieldTypes, coerceValue, isFieldType, isZero } from '../types/field-type'
import { isNullish, isPlainObject, stringify } from '../utils/comparison'
import { type SchemaDelta, diffCollections } from './diff'
import {
  Field,
  type FieldDefinition,
  type FieldDirection,
  type FieldDocument,
  type FieldFormatter,
  type FieldValidator,
  type RuleConfig,
} from './field'
import { formatterFromConfig } from './formatters'
import { validatorFromConfig } from './validators'

// =============================================================================
// Definition Types
// =============================================================================

export interface CollectionDefinition {
  name: string
  fields?: Array<Field | FieldDefinition> | undefined
  /** Defaults to `id` */
  identityField?: string | undefined
  /** Defaults to `int` */
  identityFieldType?: FieldType | undefined
  identityFieldFormatter?: FieldFormatter | undefined
  identityFieldValidator?: FieldValidator | undefined
  identityFieldFormatters?: RuleConfig | undefined
  identityFieldValidators?: RuleConfig | undefined
  indexName?: string | undefined
  /** Fields whose values form the compound index key */
  indexCompoundFields?: string[] | undefined
  indexCompoundFieldJoiner?: string | undefined
  /** Keep keys that are not declared as fields */
  schemaless?: boolean | undefined
}

export interface CollectionDocument {
  name: string
  identity_field?: string
  identity_field_type?: string
  identity_field_formatters?: RuleConfig
  identity_field_validators?: RuleConfig
  fields: FieldDocument[]
  index_name?: string
  index_compound_fields?: string[]
  index_compound_field_joiner?: string
  schemaless?: boolean
}

// =============================================================================
// Collection
// =============================================================================

export class Collection {
  readonly name: string
  fields: Field[]
  identityField: string
  identityFieldType: FieldType
  identityFieldFormatter: FieldFormatter | undefined
  identityFieldValidator: FieldValidator | undefined
  identityFieldFormatters: RuleConfig | undefined
  identityFieldValidators: RuleConfig | undefined
  indexName: string | undefined
  indexCompoundFields: string[]
  indexCompoundFieldJoiner: string
  schemaless: boolean

  constructor(definition: CollectionDefinition | string) {
    const def: CollectionDefinition = typeof definition === 'string' ? { name: definition } : definition

    this.name = def.name
    this.fields = []
    this.identityField = def.identityField ?? DEFAULT_IDENTITY_FIELD
    this.identityFieldType = def.identityFieldType ?? FieldTypes.Integer
    this.identityFieldFormatters = def.identityFieldFormatters
    this.identityFieldValidators = def.identityFieldValidators
    this.identityFieldFormatter =
      def.identityFieldFormatter ??
      (def.identityFieldFormatters ? formatterFromConfig(def.identityFieldFormatters) : undefined)
    this.identityFieldValidator =
      def.identityFieldValidator ??
      (def.identityFieldValidators ? validatorFromConfig(def.identityFieldValidators) : undefined)
    this.indexName = def.indexName
    this.indexCompoundFields = def.indexCompoundFields ?? []
    this.indexCompoundFieldJoiner = def.indexCompoundFieldJoiner ?? DEFAULT_COMPOUND_KEY_JOINER
    this.schemaless = def.schemaless ?? false

    if (def.fields) this.addFields(...def.fields)

    this.validate()
  }

  // ===========================================================================
  // Fields
  // ===========================================================================

  addFields(...fields: Array<Field | FieldDefinition>): this {
    for (const field of fields) {
      this.fields.push(field instanceof Field ? field : new Field(field))
    }
    return this
  }

  getField(name: string): Field | undefined {
    return this.fields.find(field => field.name === name)
  }

  /** Field at a source-database position */
  getFieldByIndex(index: number): Field | undefined {
    return this.fields.find(field => field.index === index)
  }

  fieldNames(): string[] {
    return this.fields.map(field => field.name)
  }

  isIdentityField(name: string): boolean {
    return name === this.identityField
  }

  /** The identity plus every key field */
  keyCount(): number {
    return 1 + this.fields.filter(field => field.key).length
  }

  /**
   * Convert a value for the named field (or the identity)
   *
   * @throws FieldNotFoundError for undeclared fields of non-schemaless collections
   */
  convertValue(name: string, value: unknown): unknown {
    if (this.isIdentityField(name)) {
      return coerceValue(this.identityFieldType, value, name)
    }

    const field = this.getField(name)
    if (field) return field.convertValue(value)
    if (this.schemaless) return value

    throw new FieldNotFoundError(name, this.name)
  }

  /**
   * Set declared defaults for every field the record leaves unset
   */
  fillDefaults(record: DataRecord): DataRecord {
    for (const field of this.fields) {
      if (!isNullish(record.fields[field.name])) continue

      const fallback = field.getDefaultValue()
      if (fallback !== undefined) record.set(field.name, fallback)
    }
    return record
  }

  /**
   * Run the identity formatter and validator, then coerce to the identity type.
   * Empty identities come back as null so backends can assign one.
   *
   * @throws ValidationError
   */
  formatAndValidateId(id: unknown, direction: FieldDirection, record?: DataRecord): unknown {
    let value = id

    if (this.identityFieldFormatter) {
      try {
        value = this.identityFieldFormatter(value, direction, record)
      } catch (err) {
        throw this.wrapFieldError(this.identityField, value, err, 'formatter')
      }
    }

    if (this.identityFieldValidator) {
      try {
        this.identityFieldValidator(value)
      } catch (err) {
        throw this.wrapFieldError(this.identityField, value, err, 'validation')
      }
    }

    if (isNullish(value) || value === '') return null
    return coerceValue(this.identityFieldType, value, this.identityField)
  }

  // ===========================================================================
  // Records
  // ===========================================================================

  /**
   * Build a record ready for writing from an existing record, a plain map, or
   * an application object described by a mapping.
   *
   * For every declared field: fill the default when unset, run the formatter,
   * coerce to the field's type, then validate. Every failure is collected; the
   * record is rejected whole.
   *
   * @throws RecordValidationError
   */
  makeRecord<T extends object>(input: DataRecord | T, mapping?: RecordMapping<T>): DataRecord {
    const source = this.toSourceRecord(input, mapping)
    const out = new DataRecord()
    const errors: ValidationError[] = []

    out.data = source.data

    try {
      out.id = this.formatAndValidateId(source.id, 'persist', source)
    } catch (err) {
      errors.push(this.wrapFieldError(this.identityField, source.id, err, 'validation'))
    }

    for (const field of this.fields) {
      let value = source.fields[field.name]

      try {
        if (isNullish(value)) {
          const fallback = field.getDefaultValue()
          if (fallback !== undefined) value = fallback
        }

        value = field.coerce(field.format(value, 'persist', source))
        field.validate(value)
      } catch (err) {
        errors.push(this.wrapFieldError(field.name, value, err, 'validation'))
        continue
      }

      if (!isNullish(value)) out.set(field.name, value)
    }

    if (this.schemaless) {
      for (const [key, value] of Object.entries(source.fields)) {
        if (!this.getField(key) && !this.isIdentityField(key)) out.set(key, value)
      }
    }

    if (errors.length > 0) {
      throw new RecordValidationError(this.name, out.id ?? source.id, errors)
    }

    return out
  }

  /**
   * Check an already-built record against the field rules without changing it
   *
   * @throws RecordValidationError
   */
  validateRecord(record: DataRecord): void {
    const errors: ValidationError[] = []

    for (const field of this.fields) {
      const value = record.fields[field.name]
      try {
        field.validate(value)
      } catch (err) {
        errors.push(this.wrapFieldError(field.name, value, err, 'validation'))
      }
    }

    if (errors.length > 0) {
      throw new RecordValidationError(this.name, record.id, errors)
    }
  }

  /**
   * Index key for a record: the compound key fields joined by the joiner, or
   * the identity when no compound key is declared
   */
  getIndexKey(record: DataRecord): string {
    if (this.indexCompoundFields.length === 0) {
      return stringify(record.id)
    }

    return this.indexCompoundFields
      .map(name => stringify(this.isIdentityField(name) ? record.id : record.get(name)))
      .join(this.indexCompoundFieldJoiner)
  }

  private toSourceRecord<T extends object>(input: DataRecord | T, mapping?: RecordMapping<T>): DataRecord {
    let record: DataRecord

    if (input instanceof DataRecord) {
      record = input.copy()
    } else if (mapping) {
      record = mapping.toRecord(input)
    } else {
      record = new DataRecord()
      const entries: Array<[string, unknown]> = Object.entries(input)
      for (const [key, value] of entries) {
        if (value !== undefined) record.set(key, value)
      }
    }

    // no explicit identity: try the identity field name, then `id`, then `ID`
    if (isZero(record.id)) {
      for (const key of [this.identityField, 'id', 'ID']) {
        const candidate = record.fields[key]
        if (!isZero(candidate) && !this.getField(key)) {
          record.id = candidate
          delete record.fields[key]
          break
        }
      }
    }

    return record
  }

  private wrapFieldError(field: string, value: unknown, err: unknown, stage: string): ValidationError {
    if (isValidationError(err)) return err
    const cause = toError(err)
    return new ValidationError(
      `field "${field}": ${stage} error: ${cause.message}`,
      { collection: this.name, field, value },
      cause
    )
  }

  // ===========================================================================
  // Schema Comparison
  // ===========================================================================

  /**
   * Differences between this (desired) schema and the backend's actual one
   */
  diff(actual: Collection): SchemaDelta[] {
    return diffCollections(this, actual)
  }

  /**
   * Overlay the desired definition's behaviour (formatters, validators,
   * defaults, descriptions) onto this backend-reported schema
   */
  applyDefinition(desired: Collection): this {
    for (const wanted of desired.fields) {
      const field = this.getField(wanted.name)
      if (!field) continue

      field.formatter = wanted.formatter ?? field.formatter
      field.validator = wanted.validator ?? field.validator
      field.formatters = wanted.formatters ?? field.formatters
      field.validators = wanted.validators ?? field.validators
      field.description = wanted.description ?? field.description
      field.belongsTo = wanted.belongsTo ?? field.belongsTo
      field.subtype = field.subtype ?? wanted.subtype
      field.validateOnPopulate = field.validateOnPopulate || wanted.validateOnPopulate
      field.notUserEditable = field.notUserEditable || wanted.notUserEditable

      if (wanted.defaultValue !== undefined) {
        field.defaultValue = wanted.defaultValue
      }
    }

    this.identityFieldFormatter = desired.identityFieldFormatter ?? this.identityFieldFormatter
    this.identityFieldValidator = desired.identityFieldValidator ?? this.identityFieldValidator
    this.indexName = this.indexName ?? desired.indexName

    if (this.indexCompoundFields.length === 0) {
      this.indexCompoundFields = [...desired.indexCompoundFields]
      this.indexCompoundFieldJoiner = desired.indexCompoundFieldJoiner
    }

    return this
  }

  /**
   * Check the definition itself
   *
   * @throws SchemaDefinitionError
   */
  validate(): void {
    if (!this.name) {
      throw new SchemaDefinitionError('Collection name cannot be empty')
    }
    if (!this.identityField) {
      throw new SchemaDefinitionError(`Collection "${this.name}" has an empty identity field name`, {
        collection: this.name,
      })
    }
    if (!isFieldType(this.identityFieldType)) {
      throw new SchemaDefinitionError(
        `Collection "${this.name}" has unknown identity type "${String(this.identityFieldType)}"`,
        { collection: this.name }
      )
    }

    const seen = new Set<string>()
    for (const field of this.fields) {
      if (field.name === this.identityField) {
        throw new SchemaDefinitionError(
          `Collection "${this.name}" redeclares identity field "${field.name}" as a regular field`,
          { collection: this.name, field: field.name }
        )
      }
      if (seen.has(field.name)) {
        throw new SchemaDefinitionError(`Collection "${this.name}" declares field "${field.name}" more than once`, {
          collection: this.name,
          field: field.name,
        })
      }
      seen.add(field.name)
    }

    for (const name of this.indexCompoundFields) {
      if (!seen.has(name) && name !== this.identityField) {
        throw new SchemaDefinitionError(`Compound key field "${name}" is not declared`, {
          collection: this.name,
          field: name,
        })
      }
    }
  }

  // ===========================================================================
  // Interchange
  // ===========================================================================

  toJSON(): CollectionDocument {
    const doc: CollectionDocument = {
      name: this.name,
      identity_field: this.identityField,
      identity_field_type: this.identityFieldType,
      fields: this.fields.map(field => field.toJSON()),
    }

    if (this.identityFieldFormatters) doc.identity_field_formatters = this.identityFieldFormatters
    if (this.identityFieldValidators) doc.identity_field_validators = this.identityFieldValidators
    if (this.indexName) doc.index_name = this.indexName
    if (this.indexCompoundFields.length > 0) {
      doc.index_compound_fields = this.indexCompoundFields
      doc.index_compound_field_joiner = this.indexCompoundFieldJoiner
    }
    if (this.schemaless) doc.schemaless = true

    return doc
  }

  /**
   * @throws SchemaDefinitionError for malformed documents
   */
  static fromJSON(doc: unknown): Collection {
    if (!isPlainObject(doc)) {
      throw new SchemaDefinitionError('Collection document must be an object')
    }
    if (typeof doc.name !== 'string') {
      throw new SchemaDefinitionError('Collection document is missing "name"')
    }

    const identityType = doc.identity_field_type
    let identityFieldType: FieldType | undefined
    if (identityType !== undefined) {
      if (!isFieldType(identityType)) {
        throw new SchemaDefinitionError(`Collection "${doc.name}" has unknown identity type "${String(identityType)}"`, {
          collection: doc.name,
        })
      }
      identityFieldType = identityType
    }

    const rawFields = doc.fields ?? []
    if (!Array.isArray(rawFields)) {
      throw new SchemaDefinitionError(`Collection "${doc.name}": "fields" must be a list`, { collection: doc.name })
    }

    const compound = doc.index_compound_fields

    return new Collection({
      name: doc.name,
      identityField: typeof doc.identity_field === 'string' ? doc.identity_field : undefined,
      identityFieldType,
      identityFieldFormatters: isPlainObject(doc.identity_field_formatters) ? doc.identity_field_formatters : undefined,
      identityFieldValidators: isPlainObject(doc.identity_field_validators) ? doc.identity_field_validators : undefined,
      fields: rawFields.map(item => Field.fromJSON(item)),
      indexName: typeof doc.index_name === 'string' ? doc.index_name : undefined,
      indexCompoundFields: Array.isArray(compound) ? compound.map(stringify) : undefined,
      indexCompoundFieldJoiner:
        typeof doc.index_compound_field_joiner === 'string' ? doc.index_compound_field_joiner : undefined,
      schemaless: doc.schemaless === true,
    })
  }
}

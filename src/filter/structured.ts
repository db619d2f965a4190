/**
 * Structured filter input
 *
 * Builds Filters from maps, from application objects described by a
 * RecordMapping, or from whatever a caller hands over.
 *
 * @module filter/structured
 */

import { DEFAULT_IDENTITY_FIELD } from '../constants'
import { FilterParseError } from '../errors'
import { MappedInstance, type RecordMapping } from '../record/mapping'
import { AUTO_TYPE, type CriterionType, isZero, parseFieldType } from '../types/field-type'
import { isNullish, isPlainObject, stringify } from '../utils/comparison'
import { createCriterion, type Criterion } from './criterion'
import { Filter } from './filter'
import { type CriterionOperator, isOperator } from './operators'
import { type ParseOptions, parseFilter, splitModifierToken } from './parser'
import { DEFAULT_SYNTAX } from './syntax'

const OPERATOR_SHAPE = /^[a-z]+$/

function keyType(key: string, typeName: string): CriterionType {
  if (typeName === '' || typeName === AUTO_TYPE) return AUTO_TYPE
  const type = parseFieldType(typeName)
  if (type === undefined) {
    throw new FilterParseError(`Unknown type "${typeName}"`, key)
  }
  return type
}

/**
 * Build a filter from `{ '[type:]field': value }` entries. String values may
 * carry an `operator:` prefix and `|`-joined alternatives; arrays are
 * alternatives. The `id` key targets the identity field.
 *
 * @throws FilterParseError
 *
 * @example
 * filterFromMap({ name: 'contains:ir', 'int:age': ['30', '40'] })
 */
export function filterFromMap(map: Record<string, unknown>, options: ParseOptions = {}): Filter {
  const syntax = options.syntax ?? DEFAULT_SYNTAX
  const identityField = options.identityField ?? DEFAULT_IDENTITY_FIELD
  const criteria: Criterion[] = []

  for (const [key, raw] of Object.entries(map)) {
    const [typeName, name] = splitModifierToken(key, syntax)
    if (name === '') {
      throw new FilterParseError('Empty field name', key)
    }

    const field = name === DEFAULT_IDENTITY_FIELD ? identityField : name
    let operator: CriterionOperator = ''
    let values: unknown[]

    if (typeof raw === 'string') {
      let text = raw
      const [prefix, rest] = splitModifierToken(raw, syntax)

      if (prefix !== '' && OPERATOR_SHAPE.test(prefix)) {
        if (!isOperator(prefix)) {
          throw new FilterParseError(`Unknown operator "${prefix}"`, raw)
        }
        operator = prefix
        text = rest
      }

      values = text.split(syntax.valueSeparator)
    } else if (Array.isArray(raw)) {
      values = [...raw]
    } else {
      values = [isNullish(raw) ? null : raw]
    }

    criteria.push(createCriterion(field, values, { type: keyType(key, typeName), operator }))
  }

  const filter = new Filter({ criteria, syntax, identityField })
  filter.spec = filter.toString()
  return filter
}

/**
 * Build an equality filter from an application object: one criterion per
 * mapped property, skipping zero values of `skipEmpty` properties
 */
export function filterFromInstance<T extends object>(
  instance: T,
  mapping: RecordMapping<T>,
  options: ParseOptions = {}
): Filter {
  const identityField = options.identityField ?? DEFAULT_IDENTITY_FIELD
  const criteria: Criterion[] = []

  for (const entry of mapping.entries()) {
    const value: unknown = Reflect.get(instance, entry.property)

    if (value === undefined) continue
    if (entry.skipEmpty && isZero(value)) continue

    criteria.push(createCriterion(entry.identity ? identityField : entry.field, [value]))
  }

  const filter = new Filter({ criteria, syntax: options.syntax, identityField })
  filter.spec = filter.toString()
  return filter
}

export type ParseResult = { success: true; filter: Filter } | { success: false; error: FilterParseError }

/**
 * Turn any supported input into a Filter: a Filter (returned as is), a
 * textual spec, a mapped application object, or a plain map
 */
export function parse(input: unknown, options: ParseOptions = {}): ParseResult {
  try {
    if (input instanceof Filter) {
      return { success: true, filter: input }
    }
    if (typeof input === 'string') {
      return { success: true, filter: parseFilter(input, options) }
    }
    if (input instanceof MappedInstance) {
      return { success: true, filter: filterFromInstance(input.instance, input.mapping, options) }
    }
    if (isPlainObject(input)) {
      return { success: true, filter: filterFromMap(input, options) }
    }
  } catch (err) {
    if (err instanceof FilterParseError) return { success: false, error: err }
    throw err
  }

  return {
    success: false,
    error: new FilterParseError(`Expected a Filter, map or string; got ${describe(input)}`, stringify(input)),
  }
}

/**
 * Like `parse`, but throws the parse error
 *
 * @throws FilterParseError
 */
export function mustParse(input: unknown, options: ParseOptions = {}): Filter {
  const result = parse(input, options)
  if (!result.success) throw result.error
  return result.filter
}

function describe(value: unknown): string {
  if (value === null) return 'null'
  if (Array.isArray(value)) return 'array'
  return typeof value
}

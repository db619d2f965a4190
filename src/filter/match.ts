/**
 * In-process record matching
 *
 * Evaluates a Filter against a single Record. Backends without a native query
 * engine (and the memory adapter) use this directly. `like`, `contains`,
 * `prefix` and `suffix` compare normalized strings.
 *
 * @module filter/match
 */

import { DEFAULT_IDENTITY_FIELD } from '../constants'
import type { DataRecord } from '../record/record'
import { AUTO_TYPE, type CriterionType, coerceValue } from '../types/field-type'
import { compareValues, deepEqual, isNullish, relaxedEqual, stringify } from '../utils/comparison'
import type { Criterion } from './criterion'
import type { Filter, Normalizer } from './filter'
import { isInvertingOperator, positiveOperator } from './operators'

/**
 * Whether a record satisfies a filter. Criteria are joined by the filter's
 * conjunction; the values of one criterion are alternatives.
 */
export function matchesRecord(filter: Filter, record: DataRecord | null | undefined): boolean {
  if (filter.isMatchAll()) return true
  if (!record) return false

  if (filter.conjunction === 'or' && filter.criteria.length > 0) {
    return filter.criteria.some(criterion => matchesCriterion(filter, criterion, record))
  }

  return filter.criteria.every(criterion => matchesCriterion(filter, criterion, record))
}

/**
 * Whether one criterion holds. An inverting operator holds when no value
 * matches its positive counterpart.
 */
export function matchesCriterion(filter: Filter, criterion: Criterion, record: DataRecord): boolean {
  const actual =
    criterion.field === filter.identityField || criterion.field === DEFAULT_IDENTITY_FIELD
      ? record.id
      : record.get(criterion.field)

  const anyMatched = criterion.values.some(value => matchesValue(criterion, value, actual, filter.normalizer))

  return isInvertingOperator(criterion.operator) ? !anyMatched : anyMatched
}

function isNullLiteral(value: unknown): boolean {
  return isNullish(value) || value === '' || value === 'null'
}

function matchesValue(criterion: Criterion, wanted: unknown, actual: unknown, normalize: Normalizer): boolean {
  const operator = positiveOperator(criterion.operator)

  // "null" or an empty literal stands for a missing value
  if (isNullLiteral(wanted)) {
    switch (operator) {
      case '':
      case 'is':
      case 'like':
        return isNullish(actual) || actual === ''
      default:
        return false
    }
  }

  switch (operator) {
    case '':
    case 'is':
      return typedEqual(criterion.type, wanted, actual)

    case 'like':
      return !isNullish(actual) && normalize(stringify(wanted)) === normalize(stringify(actual))

    case 'contains':
    case 'prefix':
    case 'suffix': {
      if (isNullish(actual)) return false
      const needle = normalize(stringify(wanted))
      const haystack = normalize(stringify(actual))
      if (operator === 'contains') return haystack.includes(needle)
      if (operator === 'prefix') return haystack.startsWith(needle)
      return haystack.endsWith(needle)
    }

    case 'gt':
    case 'gte':
    case 'lt':
    case 'lte': {
      const order = rangeCompare(criterion.type, actual, wanted)
      if (order === undefined) return false
      if (operator === 'gt') return order > 0
      if (operator === 'gte') return order >= 0
      if (operator === 'lt') return order < 0
      return order <= 0
    }

    default:
      return false
  }
}

/**
 * Equality under the criterion's type: `auto` compares loosely ("21" equals
 * 21), explicit types coerce both sides first
 */
function typedEqual(type: CriterionType, wanted: unknown, actual: unknown): boolean {
  if (type === AUTO_TYPE) {
    return relaxedEqual(wanted, actual)
  }

  try {
    return deepEqual(coerceValue(type, wanted), coerceValue(type, actual))
  } catch {
    return false
  }
}

function toOrderedNumber(value: unknown): number | undefined {
  if (typeof value === 'number') return Number.isNaN(value) ? undefined : value
  if (value instanceof Date) return value.getTime()
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value)
    return Number.isNaN(n) ? undefined : n
  }
  return undefined
}

/**
 * Order the record value against the criterion value: times by instant,
 * numbers numerically, anything else by string
 */
function rangeCompare(type: CriterionType, actual: unknown, wanted: unknown): number | undefined {
  if (isNullish(actual)) return undefined

  if (type === 'time' || actual instanceof Date || wanted instanceof Date) {
    try {
      const a = coerceValue('time', actual)
      const b = coerceValue('time', wanted)
      if (a instanceof Date && b instanceof Date) return Math.sign(a.getTime() - b.getTime())
    } catch {
      return undefined
    }
    return undefined
  }

  const a = toOrderedNumber(actual)
  const b = toOrderedNumber(wanted)
  if (a !== undefined && b !== undefined) return Math.sign(a - b)

  return compareValues(stringify(actual), stringify(wanted))
}

/**
 * Canonical Field Types and Value Coercion
 *
 * Every storage engine maps its native column types onto this small closed
 * set. Values entering or leaving a backend are coerced with `coerceValue`.
 *
 * @module types/field-type
 */

import { EPOCH_SECONDS_THRESHOLD } from '../constants'
import { InvalidTypeError } from '../errors'
import { isNullish, isPlainObject, stringify } from '../utils/comparison'

// =============================================================================
// Type Identifiers
// =============================================================================

/** Canonical field kinds, keyed by their textual token */
export const FieldTypes = {
  String: 'str',
  Integer: 'int',
  Float: 'float',
  Boolean: 'bool',
  Time: 'time',
  Raw: 'raw',
  Object: 'object',
  Array: 'array',
} as const

export type FieldType = (typeof FieldTypes)[keyof typeof FieldTypes]

/** Pseudo-type used by filter criteria: detect from the literal's shape */
export const AUTO_TYPE = 'auto'

export type CriterionType = FieldType | typeof AUTO_TYPE

const FIELD_TYPE_SET: ReadonlySet<string> = new Set(Object.values(FieldTypes))

/**
 * Check whether a token names a canonical field type
 */
export function isFieldType(value: unknown): value is FieldType {
  return typeof value === 'string' && FIELD_TYPE_SET.has(value)
}

/**
 * Parse a textual type token
 *
 * @returns the canonical type, or undefined for unknown tokens
 */
export function parseFieldType(token: string): FieldType | undefined {
  return isFieldType(token) ? token : undefined
}

// =============================================================================
// Zero Values
// =============================================================================

/**
 * The zero instance of a type
 */
export function zeroValue(type: FieldType): unknown {
  switch (type) {
    case 'str':
      return ''
    case 'int':
    case 'float':
      return 0
    case 'bool':
      return false
    case 'time':
      return new Date(0)
    case 'object':
      return {}
    case 'array':
      return []
    case 'raw':
      return new Uint8Array(0)
  }
}

/**
 * Whether a value is its type's zero value (or absent)
 */
export function isZero(value: unknown): boolean {
  if (isNullish(value)) return true
  if (value === '' || value === 0 || value === false) return true
  if (value instanceof Date) return Number.isNaN(value.getTime()) || value.getTime() === 0
  if (value instanceof Uint8Array) return value.length === 0
  if (Array.isArray(value)) return value.length === 0
  if (isPlainObject(value)) return Object.keys(value).length === 0
  return false
}

// =============================================================================
// Coercion
// =============================================================================

const TRUE_STRINGS = new Set(['true', 't', 'yes', 'y', 'on', '1'])
const FALSE_STRINGS = new Set(['false', 'f', 'no', 'n', 'off', '0', ''])

function toNumber(value: unknown, type: FieldType, field?: string): number {
  const n = numberOf(value)
  if (n === undefined || !Number.isFinite(n)) throw new InvalidTypeError(type, value, field)
  return n
}

function numberOf(value: unknown): number | undefined {
  if (typeof value === 'number') return value
  if (typeof value === 'bigint') return Number(value)
  if (typeof value === 'boolean') return value ? 1 : 0
  if (value instanceof Date) return value.getTime()
  if (typeof value === 'string') {
    const trimmed = value.trim()
    if (trimmed === '') return 0
    return Number(trimmed)
  }
  return undefined
}

/** Integers outside the safe range would silently lose precision */
function toInteger(value: unknown, field?: string): number {
  const n = Math.trunc(toNumber(value, 'int', field))
  if (!Number.isSafeInteger(n)) throw new InvalidTypeError('int', value, field)
  return n
}

function toBoolean(value: unknown, field?: string): boolean {
  if (typeof value === 'boolean') return value
  if (typeof value === 'number') return value !== 0
  if (typeof value === 'string') {
    const lowered = value.trim().toLowerCase()
    if (TRUE_STRINGS.has(lowered)) return true
    if (FALSE_STRINGS.has(lowered)) return false
  }
  throw new InvalidTypeError('bool', value, field)
}

function toTime(value: unknown, field?: string): Date | null {
  if (isNullish(value)) return null
  if (value instanceof Date) return new Date(value.getTime())
  if (typeof value === 'number' || typeof value === 'bigint') {
    const n = Number(value)
    return n < EPOCH_SECONDS_THRESHOLD ? new Date(n * 1000) : new Date(n)
  }
  if (typeof value === 'string') {
    const trimmed = value.trim()
    if (trimmed === '') return null
    if (/^-?\d+$/.test(trimmed)) return toTime(Number(trimmed), field)
    const parsed = new Date(trimmed)
    if (!Number.isNaN(parsed.getTime())) return parsed
  }
  throw new InvalidTypeError('time', value, field)
}

function parseJson(value: string, type: FieldType, field?: string): unknown {
  try {
    return JSON.parse(value)
  } catch {
    throw new InvalidTypeError(type, value, field)
  }
}

/**
 * Convert an arbitrary input value to a canonical type
 *
 * null and undefined pass through as null for every type except `bool`,
 * which never stores null.
 *
 * @throws InvalidTypeError when the value cannot be represented
 *
 * @example
 * coerceValue('int', '42') // 42
 * coerceValue('time', 1700000000) // Date (epoch seconds)
 * coerceValue('object', '{"a":1}') // { a: 1 }
 */
export function coerceValue(type: FieldType, value: unknown, field?: string): unknown {
  if (isNullish(value)) {
    return type === 'bool' ? false : null
  }

  switch (type) {
    case 'str':
      return stringify(value)

    case 'int':
      return toInteger(value, field)

    case 'float':
      return toNumber(value, type, field)

    case 'bool':
      return toBoolean(value, field)

    case 'time':
      return toTime(value, field)

    case 'raw':
      if (value instanceof Uint8Array) return value
      if (typeof value === 'string') return new TextEncoder().encode(value)
      if (Array.isArray(value) && value.every(b => typeof b === 'number')) return Uint8Array.from(value)
      throw new InvalidTypeError(type, value, field)

    case 'object':
      if (isPlainObject(value)) return value
      if (typeof value === 'string') {
        const parsed = parseJson(value, type, field)
        if (isPlainObject(parsed)) return parsed
      }
      if (value instanceof Uint8Array) {
        return coerceValue(type, new TextDecoder().decode(value), field)
      }
      throw new InvalidTypeError(type, value, field)

    case 'array':
      if (Array.isArray(value)) return value
      if (typeof value === 'string' && value.trim().startsWith('[')) {
        const parsed = parseJson(value, type, field)
        if (Array.isArray(parsed)) return parsed
      }
      return [value]
  }
}

// =============================================================================
// Auto Detection
// =============================================================================

const INTEGER_LITERAL = /^[-+]?\d+$/
const FLOAT_LITERAL = /^[-+]?(\d+\.\d*|\.\d+|\d+)([eE][-+]?\d+)?$/

/**
 * Detect a type from a textual literal's shape
 *
 * @example
 * detectType('42') // 'int'
 * detectType('4.2') // 'float'
 * detectType('true') // 'bool'
 * detectType('Bob') // 'str'
 */
export function detectType(literal: string): FieldType {
  if (INTEGER_LITERAL.test(literal)) return 'int'
  if (FLOAT_LITERAL.test(literal)) return 'float'
  if (literal === 'true' || literal === 'false') return 'bool'
  return 'str'
}

/**
 * Convert a filter literal to a typed value. `auto` uses `detectType`.
 */
export function autotype(literal: string, type: CriterionType = AUTO_TYPE): unknown {
  if (literal === 'null') return null
  const resolved = type === AUTO_TYPE ? detectType(literal) : type
  return coerceValue(resolved, literal)
}

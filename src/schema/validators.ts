/**
 * Field validators
 *
 * @module schema/validators
 */

import { SchemaDefinitionError } from '../errors'
import { coerceValue, isZero } from '../types/field-type'
import { isNullish, isPlainObject, relaxedEqual, stringify } from '../utils/comparison'
import type { FieldValidator, RuleConfig } from './field'

/**
 * Run validators in order; the first failure wins
 */
export function validateAll(...validators: FieldValidator[]): FieldValidator {
  return value => {
    for (const validator of validators) {
      validator(value)
    }
  }
}

/**
 * Accept only values loosely equal to one of the choices ("1" matches 1)
 */
export function validateIsOneOf(...choices: unknown[]): FieldValidator {
  return value => {
    if (!choices.some(choice => relaxedEqual(choice, value))) {
      throw new Error(`value must be one of: ${choices.map(stringify).join(', ')}`)
    }
  }
}

export const validateNonZero: FieldValidator = value => {
  if (isZero(value)) {
    throw new Error(`expected non-zero value, got: ${stringify(value)}`)
  }
}

/** Rejects null, empty strings (including whitespace), empty arrays and maps */
export const validateNotEmpty: FieldValidator = value => {
  const empty =
    isNullish(value) ||
    (typeof value === 'string' && value.trim() === '') ||
    (Array.isArray(value) && value.length === 0) ||
    (isPlainObject(value) && Object.keys(value).length === 0)

  if (empty) {
    throw new Error(`expected non-empty value, got: ${stringify(value)}`)
  }
}

export const validatePositiveInteger: FieldValidator = value => {
  const n = coerceValue('int', value)
  if (typeof n !== 'number' || n <= 0) {
    throw new Error(`expected value > 0, got: ${stringify(value)}`)
  }
}

export const validatePositiveOrZeroInteger: FieldValidator = value => {
  const n = coerceValue('int', value)
  if (typeof n !== 'number' || n < 0) {
    throw new Error(`expected value >= 0, got: ${stringify(value)}`)
  }
}

/**
 * Require the string form of the value to match a pattern
 */
export function validateMatches(pattern: string | RegExp): FieldValidator {
  const rx = typeof pattern === 'string' ? new RegExp(pattern) : pattern
  return value => {
    if (!rx.test(stringify(value))) {
      throw new Error(`value ${JSON.stringify(stringify(value))} does not match ${rx.source}`)
    }
  }
}

// =============================================================================
// Declarative Configuration
// =============================================================================

/**
 * Resolve one named built-in validator
 *
 * @throws SchemaDefinitionError for unknown names
 */
export function getValidator(name: string, args: unknown): FieldValidator {
  switch (name) {
    case 'one-of':
      return validateIsOneOf(...(Array.isArray(args) ? args : [args]))
    case 'not-zero':
      return validateNonZero
    case 'not-empty':
      return validateNotEmpty
    case 'positive-integer':
      return validatePositiveInteger
    case 'positive-or-zero-integer':
      return validatePositiveOrZeroInteger
    case 'matches':
      if (typeof args !== 'string') {
        throw new SchemaDefinitionError("'matches' validator requires a pattern string")
      }
      try {
        return validateMatches(args)
      } catch (err) {
        throw new SchemaDefinitionError(`invalid pattern ${JSON.stringify(args)}: ${String(err)}`)
      }
    default:
      throw new SchemaDefinitionError(`Unknown validator "${name}"`, { validator: name })
  }
}

/**
 * Turn a `{ name: args }` map into a single validator
 */
export function validatorFromConfig(config: RuleConfig): FieldValidator {
  return validateAll(...Object.entries(config).map(([name, args]) => getValidator(name, args)))
}

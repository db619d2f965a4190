/**
 * Field formatters
 *
 * Built-in value transformations and the declarative configuration that
 * selects them. Generators (`uuid`, `encoded-id`, the time formatters) only
 * act on the persist path; text formatters act in both directions.
 *
 * @module schema/formatters
 */

import { randomUUID } from 'node:crypto'
import Sqids from 'sqids'
import { SchemaDefinitionError } from '../errors'
import type { DataRecord } from '../record/record'
import { isZero } from '../types/field-type'
import { isNullish, isPlainObject, stringify } from '../utils/comparison'
import type { FieldDirection, FieldFormatter, RuleConfig } from './field'

// =============================================================================
// Composition
// =============================================================================

/**
 * Chain formatters left to right; the first failure stops the chain
 */
export function formatAll(...formatters: FieldFormatter[]): FieldFormatter {
  return (value: unknown, direction: FieldDirection, record?: DataRecord) => {
    let current = value
    for (const formatter of formatters) {
      current = formatter(current, direction, record)
    }
    return current
  }
}

// =============================================================================
// Identifier Generators
// =============================================================================

/** Fill an unset value with a random UUID */
export const generateUUID: FieldFormatter = (value, direction) => {
  if (direction === 'persist' && isZero(value)) {
    return randomUUID()
  }
  return value
}

export interface EncodedIdOptions {
  alphabet?: string | undefined
  minLength?: number | undefined
}

/**
 * Fill an unset value with a short opaque id, encoded from the current time,
 * a per-process counter and a random component
 */
export function generateEncodedId(options: EncodedIdOptions = {}): FieldFormatter {
  const sqids = new Sqids({
    ...(options.alphabet ? { alphabet: options.alphabet } : {}),
    minLength: options.minLength ?? 8,
  })
  let counter = 0

  return (value, direction) => {
    if (direction !== 'persist' || !isZero(value)) return value

    counter = (counter + 1) % 0x10000
    const encoded = sqids.encode([Date.now(), counter, Math.floor(Math.random() * 0x10000)])

    if (encoded === '') {
      throw new Error('id encoder produced a zero-length result')
    }
    return encoded
  }
}

// =============================================================================
// Text Formatters
// =============================================================================

export const trimSpace: FieldFormatter = value => {
  if (isNullish(value)) return value
  return stringify(value).trim()
}

export type CaseStyle = 'upper' | 'lower' | 'title' | 'camelize' | 'hyphenate' | 'underscore'

const CASE_STYLES: ReadonlySet<string> = new Set(['upper', 'lower', 'title', 'camelize', 'hyphenate', 'underscore'])

function isCaseStyle(value: string): value is CaseStyle {
  return CASE_STYLES.has(value)
}

function words(value: string): string[] {
  return value
    .replace(/([a-z\d])([A-Z])/g, '$1 $2')
    .split(/[\s_-]+/)
    .filter(Boolean)
}

function applyCase(value: string, style: CaseStyle): string {
  switch (style) {
    case 'upper':
      return value.toUpperCase()
    case 'lower':
      return value.toLowerCase()
    case 'title':
      return value.replace(/\b\w/g, c => c.toUpperCase())
    case 'camelize':
      return words(value)
        .map(w => w.charAt(0).toUpperCase() + w.slice(1).toLowerCase())
        .join('')
    case 'hyphenate':
      return words(value).map(w => w.toLowerCase()).join('-')
    case 'underscore':
      return words(value).map(w => w.toLowerCase()).join('_')
  }
}

/**
 * Apply one or more case conversions in order
 *
 * @example
 * changeCase('underscore')('FirstName', 'persist') // 'first_name'
 */
export function changeCase(...styles: string[]): FieldFormatter {
  for (const style of styles) {
    if (!isCaseStyle(style)) {
      throw new SchemaDefinitionError(`Unsupported case '${style}'`, { formatter: 'change-case' })
    }
  }

  return value => {
    if (isNullish(value)) return value
    let out = stringify(value)
    for (const style of styles) {
      if (isCaseStyle(style)) out = applyCase(out, style)
    }
    return out
  }
}

/**
 * Apply regular expression replacements in order
 *
 * @example
 * replace([['\\s+', '-']])('a b  c', 'persist') // 'a-b-c'
 */
export function replace(pairs: ReadonlyArray<readonly [string, string]>): FieldFormatter {
  const compiled = pairs.map(([find, replacement]) => {
    try {
      return { rx: new RegExp(find, 'g'), replacement }
    } catch (err) {
      throw new SchemaDefinitionError(`invalid find pattern ${JSON.stringify(find)}: ${String(err)}`)
    }
  })

  return value => {
    if (isNullish(value)) return value
    let out = stringify(value)
    for (const { rx, replacement } of compiled) {
      out = out.replace(rx, replacement)
    }
    return out
  }
}

// =============================================================================
// Time Formatters
// =============================================================================

/** Always stamp the current time on write */
export const currentTime: FieldFormatter = (value, direction) => (direction === 'persist' ? new Date() : value)

/** Stamp the current time on write only when no value is set */
export const currentTimeIfUnset: FieldFormatter = (value, direction) =>
  direction === 'persist' && isZero(value) ? new Date() : value

/**
 * Stamp the current time plus a fixed offset on write. A zero offset leaves
 * the value as is.
 */
export function nowPlusDuration(durationMs: number): FieldFormatter {
  return (value, direction) => {
    if (direction !== 'persist' || durationMs === 0) return value
    return new Date(Date.now() + durationMs)
  }
}

// =============================================================================
// Derived Values
// =============================================================================

/**
 * Build a value from other fields of the record being written. Each `%v` in
 * the template is replaced by the next field's value.
 *
 * @example
 * deriveFromFields('%v-%v', 'group', 'name') // { group: 'a', name: 'b' } -> 'a-b'
 */
export function deriveFromFields(template: string, ...fields: string[]): FieldFormatter {
  return (_value, _direction, record) => {
    if (!record) {
      throw new Error('deriveFromFields requires the record being formatted')
    }

    let index = 0
    return template.replace(/%v/g, () => {
      const field = fields[index++]
      return field === undefined ? '' : stringify(record.get(field))
    })
  }
}

// =============================================================================
// Declarative Configuration
// =============================================================================

function toStringList(args: unknown): string[] {
  if (Array.isArray(args)) return args.map(stringify)
  if (isNullish(args)) return []
  return [stringify(args)]
}

function toPairs(args: unknown): Array<[string, string]> {
  if (!Array.isArray(args)) {
    throw new SchemaDefinitionError("'replace' formatter requires an argument of [[FINDPATTERN, REPLACEWITH], ..]")
  }

  return args.map(pair => {
    const parts = toStringList(pair)
    const [find, replacement] = parts
    if (parts.length !== 2 || find === undefined || replacement === undefined) {
      throw new SchemaDefinitionError("'replace' formatter requires an argument of [[FINDPATTERN, REPLACEWITH], ..]")
    }
    return [find, replacement]
  })
}

/**
 * Resolve one named built-in formatter
 *
 * @throws SchemaDefinitionError for unknown names or malformed arguments
 */
export function getFormatter(name: string, args: unknown): FieldFormatter {
  switch (name) {
    case 'uuid':
      return generateUUID

    case 'encoded-id':
      if (isPlainObject(args)) {
        return generateEncodedId({
          alphabet: typeof args.alphabet === 'string' ? args.alphabet : undefined,
          minLength: typeof args.min_length === 'number' ? args.min_length : undefined,
        })
      }
      return generateEncodedId()

    case 'trim-space':
      return trimSpace

    case 'change-case':
      return changeCase(...toStringList(args))

    case 'replace':
      return replace(toPairs(args))

    case 'current-time':
      return currentTime

    case 'current-time-if-unset':
      return currentTimeIfUnset

    case 'now-plus-duration': {
      const ms = typeof args === 'number' ? args : Number(args)
      if (!Number.isFinite(ms)) {
        throw new SchemaDefinitionError(`'now-plus-duration' requires a duration in milliseconds, got ${stringify(args)}`)
      }
      return nowPlusDuration(ms)
    }

    default:
      throw new SchemaDefinitionError(`Unknown formatter "${name}"`, { formatter: name })
  }
}

/**
 * Turn a `{ name: args }` map into a single formatter, applied in key order
 */
export function formatterFromConfig(config: RuleConfig): FieldFormatter {
  const formatters = Object.entries(config).map(([name, args]) => getFormatter(name, args))
  return formatAll(...formatters)
}

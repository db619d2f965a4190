/**
 * Filter Parser
 *
 * Parses the textual grammar:
 *
 *   [+|-][type[#length]:]field<sep>[operator:]value[|value...]
 *
 * repeated and joined by the criteria separator. `all` matches everything.
 *
 * @module filter/parser
 */

import { FilterParseError } from '../errors'
import { AUTO_TYPE, type CriterionType, parseFieldType } from '../types/field-type'
import { createCriterion, type Criterion, type SortDirection } from './criterion'
import { resolveTimeLiteral } from './duration'
import { Filter } from './filter'
import { type CriterionOperator, isOperator } from './operators'
import { DEFAULT_SYNTAX, type FilterSyntax } from './syntax'

export interface ParseOptions {
  syntax?: FilterSyntax | undefined
  /** Identity field bound from the target collection */
  identityField?: string | undefined
}

interface Token {
  text: string
  position: number
}

interface FieldToken {
  field: string
  type: CriterionType
  length: number
  sort: SortDirection | undefined
}

interface ValueToken {
  operator: CriterionOperator
  values: string[]
}

// =============================================================================
// Tokenizing
// =============================================================================

function splitTokens(text: string, separator: string, base: number): Token[] {
  const tokens: Token[] = []
  let start = 0

  for (;;) {
    const index = text.indexOf(separator, start)
    if (index === -1) {
      tokens.push({ text: text.slice(start), position: base + start })
      return tokens
    }
    tokens.push({ text: text.slice(start, index), position: base + start })
    start = index + separator.length
  }
}

/**
 * Split a spec into alternating field and value tokens
 */
function tokenize(text: string, base: number, syntax: FilterSyntax): Token[] {
  if (syntax.criteriaSeparator === syntax.fieldTermSeparator) {
    return splitTokens(text, syntax.criteriaSeparator, base)
  }

  const tokens: Token[] = []
  const blankSeparator = syntax.criteriaSeparator.trim() === ''

  for (const criterion of splitTokens(text, syntax.criteriaSeparator, base)) {
    // runs of whitespace separators are one separator
    if (blankSeparator && criterion.text === '') continue

    const index = criterion.text.indexOf(syntax.fieldTermSeparator)
    if (index === -1) {
      throw new FilterParseError(
        `Criterion "${criterion.text}" has no value`,
        criterion.text,
        criterion.position
      )
    }

    tokens.push({ text: criterion.text.slice(0, index), position: criterion.position })
    tokens.push({
      text: criterion.text.slice(index + syntax.fieldTermSeparator.length),
      position: criterion.position + index + syntax.fieldTermSeparator.length,
    })
  }

  return tokens
}

// =============================================================================
// Token Parsing
// =============================================================================

/**
 * Split `prefix:rest` at the first modifier delimiter
 */
export function splitModifierToken(token: string, syntax: FilterSyntax = DEFAULT_SYNTAX): [string, string] {
  const index = token.indexOf(syntax.modifierDelimiter)
  if (index === -1) return ['', token]
  return [token.slice(0, index), token.slice(index + syntax.modifierDelimiter.length)]
}

function parseFieldToken(token: Token, syntax: FilterSyntax): FieldToken {
  let text = token.text
  let sort: SortDirection | undefined

  if (text.startsWith(syntax.sortAscending)) {
    sort = 'asc'
    text = text.slice(syntax.sortAscending.length)
  } else if (text.startsWith(syntax.sortDescending)) {
    sort = 'desc'
    text = text.slice(syntax.sortDescending.length)
  }

  const [modifier, field] = splitModifierToken(text, syntax)

  if (field === '') {
    throw new FilterParseError('Empty field name', token.text, token.position)
  }

  if (modifier === '') {
    return { field, type: AUTO_TYPE, length: 0, sort }
  }

  const lengthAt = modifier.indexOf(syntax.lengthDelimiter)
  const typeName = lengthAt === -1 ? modifier : modifier.slice(0, lengthAt)
  const type: CriterionType | undefined = typeName === AUTO_TYPE ? AUTO_TYPE : parseFieldType(typeName)

  if (type === undefined) {
    throw new FilterParseError(`Unknown type "${typeName}"`, token.text, token.position)
  }

  if (lengthAt === -1) {
    return { field, type, length: 0, sort }
  }

  const lengthText = modifier.slice(lengthAt + syntax.lengthDelimiter.length)
  const length = /^\d+$/.test(lengthText) ? parseInt(lengthText, 10) : NaN

  if (!Number.isInteger(length) || length <= 0) {
    throw new FilterParseError(`Invalid length "${lengthText}"`, token.text, token.position)
  }

  return { field, type, length, sort }
}

const OPERATOR_SHAPE = /^[a-z]+$/

/**
 * Split `[operator:]v1|v2`. A prefix shaped like an operator must be one.
 */
function parseValueToken(token: Token, syntax: FilterSyntax): ValueToken {
  let operator: CriterionOperator = ''
  let text = token.text

  const [prefix, rest] = splitModifierToken(text, syntax)
  if (prefix !== '' && OPERATOR_SHAPE.test(prefix)) {
    if (!isOperator(prefix)) {
      throw new FilterParseError(`Unknown operator "${prefix}"`, token.text, token.position)
    }
    operator = prefix
    text = rest
  }

  const values = text.split(syntax.valueSeparator)

  if (values.length > 1 && values.some(value => value === '')) {
    throw new FilterParseError('Unterminated value list', token.text, token.position)
  }

  if (!syntax.unescapeValues) {
    return { operator, values }
  }

  return {
    operator,
    values: values.map(value => {
      try {
        return decodeURIComponent(value)
      } catch (err) {
        throw new FilterParseError(
          `Cannot unescape value "${value}"`,
          token.text,
          token.position,
          err instanceof Error ? err : undefined
        )
      }
    }),
  }
}

function resolveValues(type: CriterionType, literals: string[]): unknown[] {
  if (type !== 'time') return literals
  return literals.map(literal => resolveTimeLiteral(literal) ?? literal)
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parse a textual filter
 *
 * @throws FilterParseError identifying the offending token
 *
 * @example
 * parseFilter('name/contains:ir/name/prefix:f')
 * parseFilter('all').isMatchAll() // true
 * parseFilter('-int:age/gt:21').sort // ['-age']
 */
export function parseFilter(spec: string, options: ParseOptions = {}): Filter {
  const syntax = options.syntax ?? DEFAULT_SYNTAX
  const identityField = options.identityField

  let text = spec
  let base = 0

  if (syntax.criteriaSeparator.trim() === '') {
    const trimmed = text.trimStart()
    base = text.length - trimmed.length
    text = trimmed.trimEnd()
  } else if (text.startsWith(syntax.criteriaSeparator)) {
    text = text.slice(syntax.criteriaSeparator.length)
    base = syntax.criteriaSeparator.length
  }

  if (text === '') {
    return new Filter({ spec: '', matchAll: false, syntax, identityField })
  }

  if (text === syntax.allValue) {
    return new Filter({ spec: text, matchAll: true, syntax, identityField })
  }

  const tokens = tokenize(text, base, syntax)

  if (tokens.length % 2 !== 0) {
    const last = tokens[tokens.length - 1]
    throw new FilterParseError('Field has no value', last?.text ?? text, last?.position)
  }

  const criteria: Criterion[] = []
  const sort: string[] = []

  for (let i = 0; i < tokens.length; i += 2) {
    const fieldToken = tokens[i]
    const valueToken = tokens[i + 1]
    if (!fieldToken || !valueToken) break

    const field = parseFieldToken(fieldToken, syntax)
    const value = parseValueToken(valueToken, syntax)

    if (field.sort === 'asc') sort.push(field.field)
    if (field.sort === 'desc') sort.push(syntax.sortDescending + field.field)

    criteria.push(
      createCriterion(field.field, resolveValues(field.type, value.values), {
        type: field.type,
        length: field.length,
        operator: value.operator,
        sort: field.sort,
        literals: field.type === 'time' ? value.values : undefined,
      })
    )
  }

  return new Filter({ spec: text, matchAll: false, criteria, sort, syntax, identityField })
}

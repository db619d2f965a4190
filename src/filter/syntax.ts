/**
 * Filter syntax
 *
 * The delimiters of the textual filter grammar. Parsers and serializers take
 * a syntax so alternate delimiter sets can coexist in one process.
 *
 * @module filter/syntax
 */

export interface FilterSyntax {
  /** Between criteria */
  criteriaSeparator: string
  /** Between a field token and its value token */
  fieldTermSeparator: string
  /** Between a type and its length (`str#16`) */
  lengthDelimiter: string
  /** After a type or operator prefix (`int:age`, `gt:5`) */
  modifierDelimiter: string
  /** Between alternative values (`a|b`) */
  valueSeparator: string
  /** Reserved literal matching every record */
  allValue: string
  sortAscending: string
  sortDescending: string
  /** URL-decode values when parsing, encode them when serializing */
  unescapeValues: boolean
}

/**
 * `name/contains:ir/-int:age/gt:21`
 */
export const DEFAULT_SYNTAX: Readonly<FilterSyntax> = Object.freeze({
  criteriaSeparator: '/',
  fieldTermSeparator: '/',
  lengthDelimiter: '#',
  modifierDelimiter: ':',
  valueSeparator: '|',
  allValue: 'all',
  sortAscending: '+',
  sortDescending: '-',
  unescapeValues: false,
})

/**
 * `name=contains:ir -int:age=gt:21`
 */
export const SPACED_SYNTAX: Readonly<FilterSyntax> = Object.freeze({
  ...DEFAULT_SYNTAX,
  criteriaSeparator: ' ',
  fieldTermSeparator: '=',
})

/**
 * Build a syntax from the default with overrides
 */
export function defineSyntax(overrides: Partial<FilterSyntax>): Readonly<FilterSyntax> {
  return Object.freeze({ ...DEFAULT_SYNTAX, ...overrides })
}

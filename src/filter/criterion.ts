/**
 * Criteria
 *
 * One field/operator/values clause of a Filter. Values within a criterion
 * are alternatives: the criterion holds when any of them matches.
 *
 * @module filter/criterion
 */

import { AUTO_TYPE, type CriterionType } from '../types/field-type'
import { isNullish, stringify } from '../utils/comparison'
import type { CriterionOperator } from './operators'
import { DEFAULT_SYNTAX, type FilterSyntax } from './syntax'

export type SortDirection = 'asc' | 'desc'

export type Aggregation = 'first' | 'last' | 'min' | 'max' | 'sum' | 'avg' | 'count'

/** An aggregate computed per group by `groupBy` */
export interface Aggregate {
  aggregation: Aggregation
  field: string
}

export interface Criterion {
  field: string
  /** `auto` detects the type from each value's shape */
  type: CriterionType
  /** Fixed length for fixed-width backends; 0 when unset */
  length: number
  operator: CriterionOperator
  values: unknown[]
  /** Source text of each value, kept where parsing resolved it (relative times) */
  literals?: string[] | undefined
  /** Sort direction given as a prefix on the field token */
  sort?: SortDirection | undefined
  aggregation?: Aggregation | undefined
}

export interface CriterionOptions {
  type?: CriterionType | undefined
  length?: number | undefined
  operator?: CriterionOperator | undefined
  sort?: SortDirection | undefined
  literals?: string[] | undefined
}

export function createCriterion(field: string, values: unknown[], options: CriterionOptions = {}): Criterion {
  return {
    field,
    type: options.type ?? AUTO_TYPE,
    length: options.length ?? 0,
    operator: options.operator ?? '',
    values,
    literals: options.literals,
    sort: options.sort,
  }
}

/** Exact-match criteria use `is` or no operator */
export function isExactMatch(criterion: Criterion): boolean {
  return criterion.operator === '' || criterion.operator === 'is'
}

function formatValue(value: unknown, syntax: FilterSyntax): string {
  const text = isNullish(value) ? 'null' : stringify(value)
  return syntax.unescapeValues ? encodeURIComponent(text) : text
}

/**
 * Serialize one criterion
 *
 * @example
 * criterionToString({ field: 'age', type: 'int', length: 0, operator: 'gt', values: [21] }) // 'int:age/gt:21'
 */
export function criterionToString(criterion: Criterion, syntax: FilterSyntax = DEFAULT_SYNTAX): string {
  let out = ''

  if (criterion.sort === 'asc') out += syntax.sortAscending
  if (criterion.sort === 'desc') out += syntax.sortDescending

  if (criterion.type !== AUTO_TYPE) {
    out += criterion.type
    if (criterion.length > 0) out += syntax.lengthDelimiter + String(criterion.length)
    out += syntax.modifierDelimiter
  }

  out += criterion.field + syntax.fieldTermSeparator

  if (criterion.operator !== '') {
    out += criterion.operator + syntax.modifierDelimiter
  }

  const literals = criterion.literals
  const values = literals !== undefined && literals.length === criterion.values.length ? literals : criterion.values
  out += values.map(value => formatValue(value, syntax)).join(syntax.valueSeparator)

  return out
}

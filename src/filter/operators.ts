/**
 * Criterion operators
 *
 * @module filter/operators
 */

export const OPERATORS = [
  'is',
  'not',
  'like',
  'unlike',
  'contains',
  'notcontains',
  'prefix',
  'notprefix',
  'suffix',
  'notsuffix',
  'gt',
  'gte',
  'lt',
  'lte',
] as const

export type Operator = (typeof OPERATORS)[number]

/** `''` is the implicit equality operator: the token carried no prefix */
export type CriterionOperator = Operator | ''

const OPERATOR_SET: ReadonlySet<string> = new Set(OPERATORS)

export function isOperator(value: string): value is Operator {
  return OPERATOR_SET.has(value)
}

/**
 * Exact-match operators compare values as given; all others compare
 * normalized strings
 */
export function isExactMatchOperator(operator: CriterionOperator): boolean {
  switch (operator) {
    case '':
    case 'is':
    case 'not':
    case 'gt':
    case 'gte':
    case 'lt':
    case 'lte':
      return true
    default:
      return false
  }
}

/**
 * Operators that match when their positive counterpart does not
 */
export function isInvertingOperator(operator: CriterionOperator): boolean {
  switch (operator) {
    case 'not':
    case 'unlike':
    case 'notcontains':
    case 'notprefix':
    case 'notsuffix':
      return true
    default:
      return false
  }
}

const COMPLEMENTS: Readonly<Record<Operator, Operator>> = {
  is: 'not',
  not: 'is',
  like: 'unlike',
  unlike: 'like',
  contains: 'notcontains',
  notcontains: 'contains',
  prefix: 'notprefix',
  notprefix: 'prefix',
  suffix: 'notsuffix',
  notsuffix: 'suffix',
  gt: 'lte',
  lte: 'gt',
  gte: 'lt',
  lt: 'gte',
}

/**
 * The operator matching exactly the records this one does not
 *
 * @example
 * complementOperator('gt') // 'lte'
 * complementOperator('') // 'not'
 */
export function complementOperator(operator: CriterionOperator): Operator {
  return COMPLEMENTS[operator === '' ? 'is' : operator]
}

/**
 * The positive operator behind an inverting one (`notprefix` -> `prefix`)
 */
export function positiveOperator(operator: CriterionOperator): CriterionOperator {
  return isInvertingOperator(operator) ? complementOperator(operator) : operator
}

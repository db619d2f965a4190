/**
 * Filter language
 *
 * @module filter
 */

export { Filter, DEFAULT_NORMALIZER } from './filter'
export type { Conjunction, FilterInit, Normalizer, SortBy } from './filter'
export { createCriterion, criterionToString, isExactMatch } from './criterion'
export type { Aggregate, Aggregation, Criterion, CriterionOptions, SortDirection } from './criterion'
export {
  OPERATORS,
  complementOperator,
  isExactMatchOperator,
  isInvertingOperator,
  isOperator,
  positiveOperator,
} from './operators'
export type { CriterionOperator, Operator } from './operators'
export { DEFAULT_SYNTAX, SPACED_SYNTAX, defineSyntax } from './syntax'
export type { FilterSyntax } from './syntax'
export { parseFilter, splitModifierToken } from './parser'
export type { ParseOptions } from './parser'
export { filterFromInstance, filterFromMap, mustParse, parse } from './structured'
export type { ParseResult } from './structured'
export { matchesCriterion, matchesRecord } from './match'
export { parseDuration, resolveTimeLiteral } from './duration'

/**
 * Filter
 *
 * Parsed, backend-independent representation of a query: criteria plus sort,
 * limit, offset, projection and conjunction directives.
 *
 * @module filter/filter
 */

import { DEFAULT_IDENTITY_FIELD } from '../constants'
import type { DataRecord } from '../record/record'
import { type Criterion, criterionToString } from './criterion'
import { matchesRecord } from './match'
import { parseFilter } from './parser'
import { DEFAULT_SYNTAX, type FilterSyntax } from './syntax'

export type Conjunction = 'and' | 'or'

/** Normalizes strings compared by non-exact operators */
export type Normalizer = (input: string) => string

export const DEFAULT_NORMALIZER: Normalizer = input => input.toLowerCase().replace(/[\W\s_]+/g, '')

export interface SortBy {
  field: string
  descending: boolean
}

export interface FilterInit {
  spec?: string | undefined
  matchAll?: boolean | undefined
  criteria?: Criterion[] | undefined
  sort?: string[] | undefined
  fields?: string[] | undefined
  limit?: number | undefined
  offset?: number | undefined
  conjunction?: Conjunction | undefined
  identityField?: string | undefined
  options?: Record<string, unknown> | undefined
  paginate?: boolean | undefined
  normalizer?: Normalizer | undefined
  syntax?: FilterSyntax | undefined
}

export class Filter {
  /** Text the filter was parsed from */
  spec: string
  matchAll: boolean
  criteria: Criterion[]
  /** Field names; a leading sort-descending marker means descending */
  sort: string[]
  /** Projection; empty means every field */
  fields: string[]
  /** 0 means unlimited */
  limit: number
  offset: number
  conjunction: Conjunction
  identityField: string
  options: Record<string, unknown>
  paginate: boolean
  normalizer: Normalizer
  syntax: FilterSyntax

  constructor(init: FilterInit = {}) {
    this.syntax = init.syntax ?? DEFAULT_SYNTAX
    this.spec = init.spec ?? ''
    this.matchAll = init.matchAll ?? this.spec === this.syntax.allValue
    this.criteria = init.criteria ?? []
    this.sort = init.sort ?? []
    this.fields = init.fields ?? []
    this.limit = init.limit ?? 0
    this.offset = init.offset ?? 0
    this.conjunction = init.conjunction ?? 'and'
    this.identityField = init.identityField ?? DEFAULT_IDENTITY_FIELD
    this.options = init.options ?? {}
    this.paginate = init.paginate ?? true
    this.normalizer = init.normalizer ?? DEFAULT_NORMALIZER
  }

  /** A filter matching every record */
  static all(syntax: FilterSyntax = DEFAULT_SYNTAX): Filter {
    return new Filter({ spec: syntax.allValue, matchAll: true, syntax })
  }

  /** A filter with no criteria that is not match-all */
  static null(): Filter {
    return new Filter()
  }

  addCriteria(...criteria: Criterion[]): this {
    this.matchAll = false
    this.criteria.push(...criteria)
    return this
  }

  sortBy(...fields: string[]): this {
    if (fields.length > 0) this.sort = fields
    return this
  }

  withFields(...fields: string[]): this {
    this.fields.push(...fields)
    return this
  }

  /** Negative arguments leave the current value unchanged */
  boundedBy(limit: number, offset = -1): this {
    if (limit >= 0) this.limit = limit
    if (offset >= 0) this.offset = offset
    return this
  }

  criteriaFields(): string[] {
    return this.criteria.map(criterion => criterion.field)
  }

  /** Projection asks for nothing but the identity */
  idOnly(): boolean {
    return this.fields.length === 1 && this.fields[0] === this.identityField
  }

  /** Values of the first criterion on `field` */
  getValues(field: string): unknown[] | undefined {
    return this.criteria.find(criterion => criterion.field === field)?.values
  }

  getFirstValue(): unknown {
    return this.criteria[0]?.values[0]
  }

  getIdentityValue(): unknown {
    return this.getValues(this.identityField)?.[0]
  }

  isMatchAll(): boolean {
    if (this.criteria.length > 0) return false
    if (this.matchAll || this.spec === this.syntax.allValue) {
      this.matchAll = true
      return true
    }
    return false
  }

  getSort(): SortBy[] {
    return this.sort.map(entry => {
      const descending = entry.startsWith(this.syntax.sortDescending)
      let field = entry
      if (descending) field = field.slice(this.syntax.sortDescending.length)
      else if (field.startsWith(this.syntax.sortAscending)) field = field.slice(this.syntax.sortAscending.length)
      return { field, descending }
    })
  }

  copy(): Filter {
    return new Filter({
      spec: this.spec,
      matchAll: this.matchAll,
      criteria: this.criteria.map(criterion => ({
        ...criterion,
        values: [...criterion.values],
        literals: criterion.literals && [...criterion.literals],
      })),
      sort: [...this.sort],
      fields: [...this.fields],
      limit: this.limit,
      offset: this.offset,
      conjunction: this.conjunction,
      identityField: this.identityField,
      options: { ...this.options },
      paginate: this.paginate,
      normalizer: this.normalizer,
      syntax: this.syntax,
    })
  }

  /**
   * A new filter with this filter's criteria followed by the given ones
   *
   * @throws FilterParseError
   */
  newFromSpec(...specs: string[]): Filter {
    const parts = this.criteria.map(criterion => criterionToString(criterion, this.syntax))
    parts.push(...specs)
    return parseFilter(parts.join(this.syntax.criteriaSeparator), {
      syntax: this.syntax,
      identityField: this.identityField,
    })
  }

  /**
   * A new filter with this filter's criteria plus one per map entry
   * (`{ 'int:age': 'gt:21' }`)
   *
   * @throws FilterParseError
   */
  newFromMap(map: Record<string, unknown>): Filter {
    const specs = Object.entries(map).map(([key, value]) => {
      const text = Array.isArray(value) ? value.map(String).join(this.syntax.valueSeparator) : String(value)
      return key + this.syntax.fieldTermSeparator + text
    })
    return this.newFromSpec(...specs)
  }

  /**
   * Serialize back to the textual grammar
   */
  toString(syntax: FilterSyntax = this.syntax): string {
    if (this.isMatchAll()) return syntax.allValue
    return this.criteria.map(criterion => criterionToString(criterion, syntax)).join(syntax.criteriaSeparator)
  }

  matches(record: DataRecord | null | undefined): boolean {
    return matchesRecord(this, record)
  }
}

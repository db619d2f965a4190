/**
 * Schema model
 *
 * @module schema
 */

export { Field } from './field'
export type {
  DefaultValue,
  FieldDefinition,
  FieldDirection,
  FieldDocument,
  FieldFormatter,
  FieldReference,
  FieldValidator,
  RuleConfig,
} from './field'
export { Collection } from './collection'
export type { CollectionDefinition, CollectionDocument } from './collection'
export { SchemaDelta, diffCollections } from './diff'
export type { DeltaIssue, DeltaType } from './diff'
export {
  changeCase,
  currentTime,
  currentTimeIfUnset,
  deriveFromFields,
  formatAll,
  formatterFromConfig,
  generateEncodedId,
  generateUUID,
  getFormatter,
  nowPlusDuration,
  replace,
  trimSpace,
} from './formatters'
export type { CaseStyle, EncodedIdOptions } from './formatters'
export {
  getValidator,
  validateAll,
  validateIsOneOf,
  validateMatches,
  validateNonZero,
  validateNotEmpty,
  validatePositiveInteger,
  validatePositiveOrZeroInteger,
  validatorFromConfig,
} from './validators'

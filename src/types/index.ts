/**
 * Field types and value coercion
 *
 * @module types
 */

export {
  FieldTypes,
  AUTO_TYPE,
  isFieldType,
  parseFieldType,
  zeroValue,
  isZero,
  coerceValue,
  detectType,
  autotype,
} from './field-type'

export type { FieldType, CriterionType } from './field-type'

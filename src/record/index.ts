/**
 * Record model
 *
 * @module record
 */

export { DataRecord } from './record'
export type { RecordDocument } from './record'
export { RecordSet } from './recordset'
export type { RecordSetDocument } from './recordset'
export { RecordMapping, RecordMappingBuilder, MappedInstance } from './mapping'
export type { MappingEntry, FieldMappingOptions } from './mapping'

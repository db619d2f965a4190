/**
 * Shared utilities
 *
 * @module utils
 */

export {
  isNullish,
  isPlainObject,
  deepEqual,
  relaxedEqual,
  compareValues,
  getNestedValue,
  setNestedValue,
  stringify,
} from './comparison'

export {
  type Logger,
  type LogLevel,
  consoleLogger,
  noopLogger,
  createLevelLogger,
  isLogLevel,
  logger,
  setLogger,
} from './logger'

export { withDeadline } from './deadline'

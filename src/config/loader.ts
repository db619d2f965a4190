/**
 * Configuration Loader
 *
 * Reads `POLYDAL_*` environment variables, after loading any `.env` file in
 * the working directory with dotenv. Variables already set in the
 * environment win over the file.
 */

import { config as loadDotenv } from 'dotenv'
import { DEFAULT_CONNECTION_STRING, DEFAULT_INDEXER_PAGE_SIZE, ENV_PREFIX } from '../constants'
import { ConnectionString } from '../connection'
import { ConfigurationError, toError } from '../errors'
import { type LogLevel, isLogLevel } from '../utils/logger'

/**
 * polydal configuration
 */
export interface PolydalConfig {
  /** Connection string of the primary backend (`POLYDAL_CONNECTION`) */
  connection: string
  /** Indexer page size (`POLYDAL_PAGE_SIZE`) */
  pageSize: number
  /** Log level; unset leaves the current logger alone (`POLYDAL_LOG_LEVEL`) */
  logLevel?: LogLevel | undefined
  /** Create registered collections on initialize (`POLYDAL_AUTOCREATE`) */
  autocreate: boolean
  /** Connection attempt timeout in ms (`POLYDAL_CONNECT_TIMEOUT_MS`) */
  connectTimeoutMs?: number | undefined
}

export type Environment = Record<string, string | undefined>

export interface LoadConfigOptions {
  /** Load `.env` into process.env first; only applies when reading process.env */
  dotenv?: boolean | undefined
}

// =============================================================================
// Parsing Helpers
// =============================================================================

function variable(name: string): string {
  return ENV_PREFIX + name
}

function readString(env: Environment, name: string): string | undefined {
  const value = env[variable(name)]?.trim()
  return value === undefined || value === '' ? undefined : value
}

function readPositiveInt(env: Environment, name: string): number | undefined {
  const value = readString(env, name)
  if (value === undefined) return undefined

  if (!/^\d+$/.test(value) || Number(value) <= 0) {
    throw new ConfigurationError(`${variable(name)} must be a positive integer, got "${value}"`, {
      key: variable(name),
      value,
    })
  }
  return Number(value)
}

function readBool(env: Environment, name: string): boolean | undefined {
  const value = readString(env, name)?.toLowerCase()
  if (value === undefined) return undefined

  if (['1', 'true', 'yes', 'on'].includes(value)) return true
  if (['0', 'false', 'no', 'off'].includes(value)) return false

  throw new ConfigurationError(`${variable(name)} must be a boolean, got "${value}"`, {
    key: variable(name),
    value,
  })
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Build a configuration from environment variables
 *
 * @throws ConfigurationError for malformed values
 *
 * @example
 * ```typescript
 * const config = loadConfig({ POLYDAL_CONNECTION: 'memory://localhost/test', POLYDAL_PAGE_SIZE: '25' })
 * config.pageSize // 25
 * ```
 */
export function loadConfig(env?: Environment, options: LoadConfigOptions = {}): PolydalConfig {
  if (env === undefined && options.dotenv !== false) {
    loadDotenv()
  }

  const source = env ?? process.env
  const connection = readString(source, 'CONNECTION') ?? DEFAULT_CONNECTION_STRING

  try {
    ConnectionString.parse(connection)
  } catch (err) {
    throw new ConfigurationError(`${variable('CONNECTION')} is invalid: ${toError(err).message}`, {
      key: variable('CONNECTION'),
      value: connection,
    })
  }

  const level = readString(source, 'LOG_LEVEL')?.toLowerCase()
  let logLevel: LogLevel | undefined

  if (level !== undefined) {
    if (!isLogLevel(level)) {
      throw new ConfigurationError(`${variable('LOG_LEVEL')} must be one of silent, debug, info, warn, error`, {
        key: variable('LOG_LEVEL'),
        value: level,
      })
    }
    logLevel = level
  }

  return {
    connection,
    pageSize: readPositiveInt(source, 'PAGE_SIZE') ?? DEFAULT_INDEXER_PAGE_SIZE,
    logLevel,
    autocreate: readBool(source, 'AUTOCREATE') ?? false,
    connectTimeoutMs: readPositiveInt(source, 'CONNECT_TIMEOUT_MS'),
  }
}

// =============================================================================
// Global Config
// =============================================================================

let _config: PolydalConfig | null = null

/**
 * The configuration set with setConfig, or one loaded from the environment
 */
export function getConfig(): PolydalConfig {
  if (_config === null) {
    _config = loadConfig()
  }
  return _config
}

export function setConfig(config: PolydalConfig): void {
  _config = config
}

export function clearConfig(): void {
  _config = null
}

/**
 * Connection strings
 *
 * `scheme[+protocol]://[user:pass@]host[:port]/dataset[?options]`
 *
 * The scheme picks the backend, the optional protocol a transport variant
 * (`sqlite+wal`, `redis+tls`), and the query string carries auto-typed
 * options (`?page_size=50&verbose=true`).
 *
 * @module connection
 */

import { homedir } from 'node:os'
import { resolve } from 'node:path'
import { ConnectionStringError } from '../errors'
import { autotype, coerceValue } from '../types/field-type'
import { isNullish, stringify } from '../utils/comparison'

export interface Credentials {
  username: string
  password: string
}

const CONNECTION_STRING =
  /^([a-zA-Z][a-zA-Z0-9.-]*)(?:\+([a-zA-Z0-9.-]+))?:\/\/(?:([^@/?#]*)@)?([^/?#]*)(\/[^?#]*)?(?:\?([^#]*))?(?:#.*)?$/

/**
 * Expand `/./` against the working directory and `/~/` against the home
 * directory. Other paths are returned unchanged.
 */
function expandPath(path: string): { path: string; expanded: boolean } {
  if (path === '/.' || path.startsWith('/./')) {
    return { path: resolve(process.cwd(), path.slice(3)), expanded: true }
  }
  if (path === '/~' || path.startsWith('/~/')) {
    return { path: resolve(homedir(), path.slice(3)), expanded: true }
  }
  return { path, expanded: false }
}

function decode(value: string, connectionString: string): string {
  try {
    return decodeURIComponent(value)
  } catch (err) {
    throw new ConnectionStringError(
      `Invalid percent-encoding in "${value}"`,
      connectionString,
      err instanceof Error ? err : undefined
    )
  }
}

export class ConnectionString {
  readonly backend: string
  readonly protocol: string
  readonly hostname: string
  readonly port: number | undefined
  /** Path with any `/./` or `/~/` prefix expanded */
  readonly path: string
  readonly options: Record<string, unknown>
  private readonly query: string
  private readonly expanded: boolean
  private user: Credentials | undefined

  private constructor(init: {
    backend: string
    protocol: string
    hostname: string
    port: number | undefined
    path: string
    expanded: boolean
    query: string
    options: Record<string, unknown>
    credentials: Credentials | undefined
  }) {
    this.backend = init.backend
    this.protocol = init.protocol
    this.hostname = init.hostname
    this.port = init.port
    this.path = init.path
    this.expanded = init.expanded
    this.query = init.query
    this.options = init.options
    this.user = init.credentials
  }

  /**
   * @throws ConnectionStringError
   *
   * @example
   * const cs = ConnectionString.parse('sqlite+wal://localhost/./data/app.db?timeout=5')
   * cs.backend // 'sqlite'
   * cs.protocol // 'wal'
   * cs.optInt('timeout', 0) // 5
   */
  static parse(input: string): ConnectionString {
    const match = CONNECTION_STRING.exec(input.trim())
    if (!match) {
      throw new ConnectionStringError(`Invalid connection string "${input}"`, input)
    }

    const [, backend = '', protocol = '', userinfo, host = '', rawPath = '', query = ''] = match

    let hostname = host
    let port: number | undefined
    const portAt = host.lastIndexOf(':')

    if (portAt !== -1 && !host.endsWith(']')) {
      const portText = host.slice(portAt + 1)
      if (!/^\d+$/.test(portText) || Number(portText) > 65535) {
        throw new ConnectionStringError(`Invalid port "${portText}"`, input)
      }
      hostname = host.slice(0, portAt)
      port = Number(portText)
    }

    let credentials: Credentials | undefined
    if (userinfo !== undefined) {
      const sep = userinfo.indexOf(':')
      credentials =
        sep === -1
          ? { username: decode(userinfo, input), password: '' }
          : { username: decode(userinfo.slice(0, sep), input), password: decode(userinfo.slice(sep + 1), input) }
    }

    const { path, expanded } = expandPath(decode(rawPath, input))

    return new ConnectionString({
      backend: backend.toLowerCase(),
      protocol,
      hostname,
      port,
      path,
      expanded,
      query,
      options: optionsFromQuery(query),
      credentials,
    })
  }

  /** `backend+protocol`, or just the backend */
  get scheme(): string {
    return this.protocol ? `${this.backend}+${this.protocol}` : this.backend
  }

  /** Hostname with port */
  get host(): string {
    return this.port === undefined ? this.hostname : `${this.hostname}:${this.port}`
  }

  /** Path without surrounding slashes; absolute when the path was expanded */
  get dataset(): string {
    if (this.expanded) return this.path
    return this.path.replace(/^\/+/, '').replace(/\/+$/, '')
  }

  credentials(): Credentials | undefined {
    return this.user ? { ...this.user } : undefined
  }

  setCredentials(username: string, password: string): void {
    this.user = { username, password }
  }

  hasOpt(key: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.options, key)
  }

  optString(key: string, fallback = ''): string {
    const value = this.options[key]
    return isNullish(value) ? fallback : stringify(value)
  }

  optBool(key: string, fallback = false): boolean {
    const value = this.convertOpt(key, 'bool')
    return typeof value === 'boolean' ? value : fallback
  }

  optInt(key: string, fallback = 0): number {
    const value = this.convertOpt(key, 'int')
    return typeof value === 'number' ? value : fallback
  }

  optFloat(key: string, fallback = 0): number {
    const value = this.convertOpt(key, 'float')
    return typeof value === 'number' ? value : fallback
  }

  /** Converted option value, or undefined when unset or not convertible */
  private convertOpt(key: string, type: 'bool' | 'int' | 'float'): unknown {
    const value = this.options[key]
    if (isNullish(value)) return undefined

    try {
      return coerceValue(type, value)
    } catch {
      return undefined
    }
  }

  /** Credentials are never included */
  toString(): string {
    const path = this.path.startsWith('/') ? this.path : `/${this.path}`
    return `${this.scheme}://${this.host}${path}${this.query ? `?${this.query}` : ''}`
  }
}

/**
 * Auto-type every query option; repeated keys become lists
 */
function optionsFromQuery(query: string): Record<string, unknown> {
  const options: Record<string, unknown> = {}
  const params = new URLSearchParams(query)

  for (const key of new Set(params.keys())) {
    const values = params.getAll(key).map(value => autotype(value))
    options[key] = values.length === 1 ? values[0] : values
  }

  return options
}

export function parseConnectionString(input: string): ConnectionString {
  return ConnectionString.parse(input)
}

/**
 * Build a connection string from parts. Option values containing commas, and
 * lists, become repeated keys.
 *
 * @throws ConnectionStringError
 */
export function makeConnectionString(
  scheme: string,
  host: string,
  dataset: string,
  options: Record<string, unknown> = {}
): ConnectionString {
  const params = new URLSearchParams()

  for (const [key, value] of Object.entries(options)) {
    const list: unknown[] = Array.isArray(value) ? value : stringify(value).split(',')
    for (const item of list) {
      params.append(key, stringify(item))
    }
  }

  const query = params.toString()
  const path = dataset.startsWith('/') ? dataset : `/${dataset}`
  return ConnectionString.parse(`${scheme}://${host}${path}${query ? `?${query}` : ''}`)
}

/**
 * polydal Configuration
 *
 * Environment-driven configuration and connecting from it.
 */

export {
  loadConfig,
  getConfig,
  setConfig,
  clearConfig,
  type Environment,
  type LoadConfigOptions,
  type PolydalConfig,
} from './loader'

export { connect, type ConnectOptions } from './connect'

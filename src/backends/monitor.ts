/**
 * Backend health monitor
 *
 * Periodically probes a backend with `refresh()`. A failed probe suspends the
 * backend, a later success resumes it, and too many consecutive failures
 * disconnect it for good.
 *
 * @module backends/monitor
 */

import { DEFAULT_REFRESH_MAX_FAILURES, DEFAULT_REFRESH_TIMEOUT_MS } from '../constants'
import { toError } from '../errors'
import { withDeadline } from '../utils/deadline'
import { type Logger, logger as defaultLogger } from '../utils/logger'

/**
 * The part of a backend the monitor drives
 */
export interface MonitoredBackend {
  readonly name: string
  refresh(): Promise<void>
  suspend(reason?: Error): void
  resume(): void
  disconnect(): Promise<void>
  isAvailable(): boolean
}

export interface HealthMonitorOptions {
  intervalMs: number
  timeoutMs?: number | undefined
  /** Consecutive failures tolerated; one more disconnects */
  maxFailures?: number | undefined
  logger?: Logger | undefined
}

export class HealthMonitor {
  private readonly target: MonitoredBackend
  private readonly intervalMs: number
  private readonly timeoutMs: number
  private readonly maxFailures: number
  private readonly logger: Logger
  private timer: ReturnType<typeof setInterval> | undefined
  private checking = false
  private consecutiveFailures = 0

  constructor(target: MonitoredBackend, options: HealthMonitorOptions) {
    this.target = target
    this.intervalMs = options.intervalMs
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REFRESH_TIMEOUT_MS
    this.maxFailures = options.maxFailures ?? DEFAULT_REFRESH_MAX_FAILURES
    this.logger = options.logger ?? defaultLogger
  }

  get failures(): number {
    return this.consecutiveFailures
  }

  get running(): boolean {
    return this.timer !== undefined
  }

  start(): void {
    if (this.timer !== undefined || this.intervalMs <= 0) return

    this.timer = setInterval(() => {
      if (this.checking) return
      this.check().catch((err: unknown) => {
        this.logger.error(`health check of ${this.target.name} failed unexpectedly`, err)
      })
    }, this.intervalMs)

    // a running monitor must not keep the process alive
    this.timer.unref()
  }

  stop(): void {
    if (this.timer === undefined) return
    clearInterval(this.timer)
    this.timer = undefined
  }

  /**
   * Run one probe. Resolves `true` when the backend answered.
   */
  async check(): Promise<boolean> {
    this.checking = true

    try {
      await withDeadline(this.target.refresh(), this.timeoutMs, `refresh ${this.target.name}`)
    } catch (err) {
      this.consecutiveFailures += 1
      return await this.onFailure(toError(err))
    } finally {
      this.checking = false
    }

    if (this.consecutiveFailures > 0 || !this.target.isAvailable()) {
      this.logger.info(`backend ${this.target.name} recovered after ${this.consecutiveFailures} failed checks`)
      this.target.resume()
    }
    this.consecutiveFailures = 0
    return true
  }

  private async onFailure(reason: Error): Promise<boolean> {
    if (this.consecutiveFailures > this.maxFailures) {
      this.logger.error(
        `backend ${this.target.name} failed ${this.consecutiveFailures} consecutive checks, disconnecting`,
        reason
      )
      this.stop()
      await this.target.disconnect()
      return false
    }

    this.logger.warn(`backend ${this.target.name} failed a health check: ${reason.message}`)
    this.target.suspend(reason)
    return false
  }
}

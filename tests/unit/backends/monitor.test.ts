/**
 * Tests for the backend health monitor
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { HealthMonitor, type MonitoredBackend } from '../../../src/backends/monitor'
import { noopLogger } from '../../../src/utils/logger'

class FakeBackend implements MonitoredBackend {
  readonly name = 'fake'
  healthy = true
  available = true
  disconnected = false
  suspensions: string[] = []

  async refresh(): Promise<void> {
    if (!this.healthy) throw new Error('connection refused')
  }

  suspend(reason?: Error): void {
    this.available = false
    this.suspensions.push(reason?.message ?? '')
  }

  resume(): void {
    this.available = true
  }

  async disconnect(): Promise<void> {
    this.available = false
    this.disconnected = true
  }

  isAvailable(): boolean {
    return this.available
  }
}

describe('HealthMonitor', () => {
  let target: FakeBackend
  let monitor: HealthMonitor

  beforeEach(() => {
    target = new FakeBackend()
    monitor = new HealthMonitor(target, { intervalMs: 1000, maxFailures: 2, logger: noopLogger })
  })

  it('should report a healthy backend', async () => {
    expect(await monitor.check()).toBe(true)
    expect(monitor.failures).toBe(0)
    expect(target.available).toBe(true)
  })

  it('should suspend on a failed check and resume on the next success', async () => {
    target.healthy = false
    expect(await monitor.check()).toBe(false)

    expect(monitor.failures).toBe(1)
    expect(target.available).toBe(false)
    expect(target.suspensions).toEqual(['connection refused'])

    target.healthy = true
    expect(await monitor.check()).toBe(true)

    expect(monitor.failures).toBe(0)
    expect(target.available).toBe(true)
  })

  it('should resume a backend suspended elsewhere', async () => {
    target.suspend(new Error('manual'))

    await monitor.check()
    expect(target.available).toBe(true)
  })

  it('should disconnect after too many consecutive failures', async () => {
    monitor.start()
    target.healthy = false

    await monitor.check()
    await monitor.check()
    expect(target.disconnected).toBe(false)

    await monitor.check()
    expect(monitor.failures).toBe(3)
    expect(target.disconnected).toBe(true)
    expect(target.suspensions).toHaveLength(2)
    expect(monitor.running).toBe(false)
  })

  it('should finish disconnecting before the failing check resolves', async () => {
    let release = (): void => {}
    const slow = new FakeBackend()
    slow.healthy = false
    slow.disconnect = async () => {
      await new Promise<void>(resolve => {
        release = resolve
      })
      slow.disconnected = true
    }
    const strict = new HealthMonitor(slow, { intervalMs: 1000, maxFailures: 0, logger: noopLogger })

    let settled = false
    const pending = strict.check().then(result => {
      settled = true
      return result
    })

    await new Promise(resolve => setImmediate(resolve))
    expect(settled).toBe(false)

    release()
    expect(await pending).toBe(false)
    expect(slow.disconnected).toBe(true)
  })

  it('should start and stop its timer', () => {
    monitor.start()
    expect(monitor.running).toBe(true)

    monitor.stop()
    expect(monitor.running).toBe(false)
  })

  it('should not start without an interval', () => {
    const idle = new HealthMonitor(target, { intervalMs: 0 })
    idle.start()

    expect(idle.running).toBe(false)
  })
})

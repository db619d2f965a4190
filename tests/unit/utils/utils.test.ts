/**
 * Tests for shared utilities
 */

import { afterEach, describe, it, expect, vi } from 'vitest'
import { compareValues, deepEqual, relaxedEqual, stringify } from '../../../src/utils/comparison'
import { withDeadline } from '../../../src/utils/deadline'
import { type Logger, createLevelLogger, isLogLevel, noopLogger } from '../../../src/utils/logger'
import { TimeoutError } from '../../../src/errors'

function recordingLogger(): Logger & { lines: string[] } {
  const lines: string[] = []
  return {
    lines,
    debug: message => lines.push(`debug ${message}`),
    info: message => lines.push(`info ${message}`),
    warn: message => lines.push(`warn ${message}`),
    error: message => lines.push(`error ${message}`),
  }
}

describe('comparison', () => {
  it('should compare values deeply', () => {
    expect(deepEqual({ a: [1, { b: 2 }] }, { a: [1, { b: 2 }] })).toBe(true)
    expect(deepEqual(new Date(5), new Date(5))).toBe(true)
    expect(deepEqual(null, undefined)).toBe(true)
    expect(deepEqual({ a: 1 }, { a: 1, b: 2 })).toBe(false)
  })

  it('should compare loosely across string forms', () => {
    expect(relaxedEqual('1', 1)).toBe(true)
    expect(relaxedEqual('1.0', 1)).toBe(true)
    expect(relaxedEqual('true', true)).toBe(true)
    expect(relaxedEqual('', 0)).toBe(false)
    expect(relaxedEqual(null, '')).toBe(false)
  })

  it('should order nulls first and numbers numerically', () => {
    expect([3, null, 10, 2].sort(compareValues)).toEqual([null, 2, 3, 10])
    expect(compareValues('b', 'a')).toBe(1)
  })

  it('should stringify for display', () => {
    expect(stringify(null)).toBe('')
    expect(stringify([1, 'a'])).toBe('[1,"a"]')
    expect(stringify(new Date(0))).toBe('1970-01-01T00:00:00.000Z')
  })
})

describe('withDeadline', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it('should resolve work that finishes in time', async () => {
    await expect(withDeadline(Promise.resolve(5), 100)).resolves.toBe(5)
  })

  it('should reject with TimeoutError when the deadline passes', async () => {
    vi.useFakeTimers()
    const pending = withDeadline(new Promise<never>(() => {}), 50, 'slow query')
    const assertion = expect(pending).rejects.toThrow('Operation "slow query" timed out after 50ms')

    await vi.advanceTimersByTimeAsync(50)
    await assertion
    await expect(pending).rejects.toBeInstanceOf(TimeoutError)
  })

  it('should not time out without a positive deadline', async () => {
    await expect(withDeadline(Promise.resolve('ok'), 0)).resolves.toBe('ok')
  })
})

describe('logger', () => {
  it('should drop messages below the level', () => {
    const target = recordingLogger()
    const log = createLevelLogger('warn', target)

    log.debug('a')
    log.info('b')
    log.warn('c')
    log.error('d')

    expect(target.lines).toEqual(['warn c', 'error d'])
  })

  it('should silence everything at silent', () => {
    expect(createLevelLogger('silent')).toBe(noopLogger)
  })

  it('should recognise level names', () => {
    expect(isLogLevel('info')).toBe(true)
    expect(isLogLevel('verbose')).toBe(false)
  })
})

/**
 * Caller-supplied deadlines
 *
 * A deadline wraps a whole operation. The wrapped work keeps running to
 * completion in the background; only the caller stops waiting.
 *
 * @module utils/deadline
 */

import { TimeoutError } from '../errors'

/**
 * Race `work` against a timer of `timeoutMs`
 *
 * @example
 * ```typescript
 * const rs = await withDeadline(indexer.query(items, parseFilter('status/open')), 5000, 'query items')
 * ```
 */
export async function withDeadline<T>(work: Promise<T>, timeoutMs: number, operation = 'operation'): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return work
  }

  let timer: ReturnType<typeof setTimeout> | undefined

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(operation, timeoutMs)), timeoutMs)
  })

  try {
    return await Promise.race([work, timeout])
  } finally {
    if (timer !== undefined) clearTimeout(timer)
  }
}

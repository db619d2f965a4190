/**
 * Relative durations for time criteria
 *
 * @module filter/duration
 */

const UNIT_MS: Readonly<Record<string, number>> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
  w: 7 * 24 * 60 * 60 * 1000,
  y: 365 * 24 * 60 * 60 * 1000,
}

const DURATION = /^(?:\d+(?:\.\d+)?(?:ms|s|m|h|d|w|y))+$/
const COMPONENT = /(\d+(?:\.\d+)?)(ms|s|m|h|d|w|y)/g

/**
 * Parse a duration such as `30m`, `1h30m` or `2d`
 *
 * @returns milliseconds, or undefined when the text is not a duration
 */
export function parseDuration(text: string): number | undefined {
  if (!DURATION.test(text)) return undefined

  let total = 0
  for (const match of text.matchAll(COMPONENT)) {
    const amount = Number(match[1])
    const unit = UNIT_MS[match[2] ?? '']
    if (unit === undefined) return undefined
    total += amount * unit
  }
  return total
}

/**
 * Resolve a time criterion literal: `-1h` is an hour ago, `30m` half an hour
 * from now, anything else is read as a date
 *
 * @returns the resolved time, or undefined when the literal is neither
 */
export function resolveTimeLiteral(literal: string, now: number = Date.now()): Date | undefined {
  const negative = literal.startsWith('-')
  const ms = parseDuration(negative ? literal.slice(1) : literal)

  if (ms !== undefined) {
    return new Date(now + (negative ? -ms : ms))
  }

  if (/^-?\d+$/.test(literal)) return undefined

  const parsed = new Date(literal)
  return Number.isNaN(parsed.getTime()) ? undefined : parsed
}

/**
 * Shared Comparison and Value Utilities for polydal
 *
 * Canonical implementations of value comparison, equality checking and
 * nested value access, shared by the record model, filter matching and the
 * memory adapter.
 */

// =============================================================================
// Null/Undefined Helpers
// =============================================================================

/**
 * Check if a value is null or undefined (nullish)
 *
 * @example
 * isNullish(null) // true
 * isNullish(0) // false
 */
export function isNullish(value: unknown): value is null | undefined {
  return value === null || value === undefined
}

/**
 * Check if a value is a plain object (not an array, Date or byte buffer)
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date) &&
    !(value instanceof Uint8Array)
  )
}

// =============================================================================
// Deep Equality
// =============================================================================

/**
 * Deep equality check for two values
 *
 * Dates compare by timestamp, byte buffers byte-wise, arrays element-wise
 * and objects key-wise. null and undefined are equivalent.
 *
 * @example
 * deepEqual({ a: 1 }, { a: 1 }) // true
 * deepEqual(new Date(0), new Date(0)) // true
 */
export function deepEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true
  if (isNullish(a)) return isNullish(b)

  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime()
  }

  if (a instanceof Uint8Array && b instanceof Uint8Array) {
    if (a.length !== b.length) return false
    return a.every((v, i) => v === b[i])
  }

  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length !== b.length) return false
    return a.every((v, i) => deepEqual(v, b[i]))
  }

  if (isPlainObject(a) && isPlainObject(b)) {
    const aKeys = Object.keys(a)
    const bKeys = Object.keys(b)
    if (aKeys.length !== bKeys.length) return false
    return aKeys.every(k => deepEqual(a[k], b[k]))
  }

  return false
}

/**
 * Equality after converting both sides to their string form, with numeric
 * and boolean strings compared by value ("1" equals 1, "true" equals true).
 */
export function relaxedEqual(a: unknown, b: unknown): boolean {
  if (deepEqual(a, b)) return true
  if (isNullish(a) || isNullish(b)) return false

  const aStr = stringify(a)
  const bStr = stringify(b)
  if (aStr === bStr) return true

  const aNum = Number(aStr)
  const bNum = Number(bStr)
  if (aStr.trim() !== '' && bStr.trim() !== '' && !Number.isNaN(aNum) && !Number.isNaN(bNum)) {
    return aNum === bNum
  }

  return false
}

// =============================================================================
// Value Comparison for Ordering
// =============================================================================

/**
 * Compare two values for ordering
 *
 * null/undefined sort first; numbers, strings, dates and booleans compare
 * natively; mixed types fall back to string comparison.
 *
 * @returns negative if a < b, 0 if equal, positive if a > b
 *
 * @example
 * compareValues(1, 2) // -1
 * compareValues(null, 1) // -1
 */
export function compareValues(a: unknown, b: unknown): number {
  if (isNullish(a)) {
    return isNullish(b) ? 0 : -1
  }
  if (isNullish(b)) return 1

  if (typeof a === 'number' && typeof b === 'number') {
    if (Number.isNaN(a) || Number.isNaN(b)) {
      return Number.isNaN(a) === Number.isNaN(b) ? 0 : Number.isNaN(a) ? -1 : 1
    }
    return a === b ? 0 : a < b ? -1 : 1
  }
  if (typeof a === 'string' && typeof b === 'string') {
    if (a < b) return -1
    if (a > b) return 1
    return 0
  }
  if (a instanceof Date && b instanceof Date) return Math.sign(a.getTime() - b.getTime())
  if (typeof a === 'boolean' && typeof b === 'boolean') return (a ? 1 : 0) - (b ? 1 : 0)

  const aStr = stringify(a)
  const bStr = stringify(b)
  if (aStr < bStr) return -1
  if (aStr > bStr) return 1
  return 0
}

// =============================================================================
// Nested Value Access
// =============================================================================

/**
 * Get a nested value from an object using dot notation
 *
 * @example
 * getNestedValue({ a: { b: 1 } }, 'a.b') // 1
 * getNestedValue({ items: [{ x: 1 }] }, 'items.0.x') // 1
 */
export function getNestedValue(obj: Record<string, unknown>, path: string, separator = '.'): unknown {
  const parts = path.split(separator)
  let current: unknown = obj

  for (const part of parts) {
    if (isNullish(current) || typeof current !== 'object') return undefined

    if (Array.isArray(current)) {
      const index = parseInt(part, 10)
      if (isNaN(index)) return undefined
      current = current[index]
    } else if (isPlainObject(current)) {
      current = current[part]
    } else {
      return undefined
    }
  }

  return current
}

/**
 * Set a nested value, creating intermediate objects as needed
 */
export function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown, separator = '.'): void {
  const parts = path.split(separator)
  const last = parts.pop()
  if (last === undefined) return

  let current = obj
  for (const part of parts) {
    const next = current[part]
    if (isPlainObject(next)) {
      current = next
    } else {
      const created: Record<string, unknown> = {}
      current[part] = created
      current = created
    }
  }

  current[last] = value
}

// =============================================================================
// String Conversion
// =============================================================================

/**
 * Convert any value to its display string: dates as ISO, objects as JSON,
 * null/undefined as the empty string.
 */
export function stringify(value: unknown): string {
  if (isNullish(value)) return ''
  if (typeof value === 'string') return value
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? '' : value.toISOString()
  if (value instanceof Uint8Array) return new TextDecoder().decode(value)
  if (typeof value === 'object') return JSON.stringify(value)
  return String(value)
}

/**
 * Conditions
 *
 * Pure predicates that validate a candidate setting value. A condition is a
 * plain function with an optional description, which error messages use to
 * say which condition failed.
 */

import { valuesEqual } from '../setting/value-kinds'
import { formatValue } from '../utils/format-value'

export interface Condition<T = unknown> {
  (value: T): boolean
  readonly description?: string
}

/** Values the ordering conditions compare */
export type Comparable = number | bigint | string

/** Attach a human-readable description to a predicate. */
export function defineCondition<T = unknown>(
  description: string,
  predicate: (value: T) => boolean,
): Condition<T> {
  return Object.assign((value: T) => predicate(value), { description })
}

/** Description used in messages for a condition */
export function describeCondition<T>(condition: Condition<T>): string {
  return condition.description ?? (condition.name || 'anonymous condition')
}

// ============================================================================
// Comparison
// ============================================================================

function isNumeric(value: unknown): value is number | bigint {
  return (typeof value === 'number' && !Number.isNaN(value)) || typeof value === 'bigint'
}

/**
 * Compare two values of compatible kinds.
 * Returns undefined when the kinds cannot be ordered against each other.
 */
function compare(a: unknown, b: Comparable): number | undefined {
  if (isNumeric(a) && isNumeric(b)) {
    return a < b ? -1 : a > b ? 1 : 0
  }
  if (typeof a === 'string' && typeof b === 'string') {
    return a < b ? -1 : a > b ? 1 : 0
  }
  return undefined
}

// ============================================================================
// Built-in Conditions
// ============================================================================

export const isPositive: Condition = defineCondition('value must be positive', (value) => {
  return isNumeric(value) && value > 0
})

export const isNegative: Condition = defineCondition('value must be negative', (value) => {
  return isNumeric(value) && value < 0
})

export function greaterThan(low: Comparable): Condition {
  return defineCondition(`value must be greater than ${formatValue(low)}`, (value) => {
    const order = compare(value, low)
    return order !== undefined && order > 0
  })
}

export function lesserThan(high: Comparable): Condition {
  return defineCondition(`value must be lesser than ${formatValue(high)}`, (value) => {
    const order = compare(value, high)
    return order !== undefined && order < 0
  })
}

/** Exclusive on both ends. */
export function within(low: Comparable, high: Comparable): Condition {
  const above = greaterThan(low)
  const below = lesserThan(high)
  return defineCondition(
    `value must be within ${formatValue(low)} and ${formatValue(high)}`,
    (value) => above(value) && below(value),
  )
}

export function allowed(...values: readonly unknown[]): Condition {
  return defineCondition(
    `value must be one of the following: ${values.map((v) => formatValue(v)).join(', ')}`,
    (value) => values.some((candidate) => valuesEqual(candidate, value)),
  )
}

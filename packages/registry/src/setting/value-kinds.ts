/**
 * Setting Value Kinds
 *
 * Setting values are immutable: scalars, deep-frozen arrays (tuples) and
 * deep-frozen plain objects (frozen mappings). Each kind has a type tag used
 * by Setting.allowedTypes and by the coercion table.
 */

// ============================================================================
// Value Types
// ============================================================================

export type SettingScalar = null | boolean | number | string | bigint

export type SettingTuple = readonly SettingValue[]

export interface SettingMapping {
  readonly [key: string]: SettingValue
}

export type SettingValue = SettingScalar | SettingTuple | SettingMapping

export const TYPE_TAGS = [
  'null',
  'boolean',
  'integer',
  'number',
  'string',
  'bigint',
  'tuple',
  'mapping',
] as const

export type TypeTag = (typeof TYPE_TAGS)[number]

export function isTypeTag(value: unknown): value is TypeTag {
  return TYPE_TAGS.some((tag) => tag === value)
}

// ============================================================================
// Kind Inspection
// ============================================================================

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/**
 * Tag of a supported value, or undefined for unsupported kinds
 * (undefined, functions, symbols, non-finite numbers, class instances).
 */
export function typeTagOf(value: unknown): TypeTag | undefined {
  if (value === null) return 'null'
  switch (typeof value) {
    case 'boolean':
      return 'boolean'
    case 'number':
      if (!Number.isFinite(value)) return undefined
      return Number.isInteger(value) ? 'integer' : 'number'
    case 'string':
      return 'string'
    case 'bigint':
      return 'bigint'
    case 'object':
      if (Array.isArray(value)) return 'tuple'
      if (isPlainObject(value)) return 'mapping'
      return undefined
    default:
      return undefined
  }
}

/** Whether value is of the kind named by tag ('number' also covers integers) */
export function matchesTag(value: unknown, tag: TypeTag): value is SettingValue {
  const actual = typeTagOf(value)
  if (actual === undefined) return false
  if (tag === 'number') return actual === 'number' || actual === 'integer'
  return actual === tag
}

/**
 * Whether value is a supported, deeply immutable setting value.
 * Arrays and plain objects must be frozen all the way down.
 */
export function isImmutableValue(value: unknown): value is SettingValue {
  const tag = typeTagOf(value)
  if (tag === undefined) return false
  if (tag !== 'tuple' && tag !== 'mapping') return true
  if (!Object.isFrozen(value)) return false

  const children: readonly unknown[] = Array.isArray(value)
    ? value
    : isPlainObject(value)
      ? Object.values(value)
      : []
  return children.every((child) => isImmutableValue(child))
}

// ============================================================================
// Freezing Helpers
// ============================================================================

/** Freeze arrays and plain objects recursively, in place. */
export function deepFreeze<T>(value: T): T {
  if (Array.isArray(value) || isPlainObject(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child)
    }
    Object.freeze(value)
  }
  return value
}

/** Build a frozen tuple. */
export function tuple<T extends SettingValue>(...items: T[]): readonly T[] {
  return deepFreeze(items)
}

/** Build a frozen copy of a plain object. */
export function frozenMapping<T extends SettingMapping>(mapping: T): Readonly<T> {
  return deepFreeze({ ...mapping })
}

// ============================================================================
// Equality
// ============================================================================

/** Deep equality for setting values (handles tuples and mappings) */
export function valuesEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true
  if (a === null || b === null) return false
  if (typeof a !== typeof b) return false

  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length !== b.length) return false
    return a.every((v, i) => valuesEqual(v, b[i]))
  }
  if (Array.isArray(a) || Array.isArray(b)) return false

  if (isPlainObject(a) && isPlainObject(b)) {
    const keysA = Object.keys(a)
    const keysB = Object.keys(b)
    if (keysA.length !== keysB.length) return false
    return keysA.every((k) => Object.hasOwn(b, k) && valuesEqual(a[k], b[k]))
  }

  return false
}

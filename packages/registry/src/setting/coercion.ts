/**
 * Type Coercion
 *
 * Explicit conversions tried, in declaration order, when a new value matches
 * none of a setting's allowed types. Each converter either returns a
 * converted value or NOT_CONVERTIBLE.
 */

import { TypeConversionError } from '../errors'
import { matchesTag, type SettingValue, type TypeTag } from './value-kinds'

const NOT_CONVERTIBLE: unique symbol = Symbol('not-convertible')

type Converted = SettingValue | typeof NOT_CONVERTIBLE

type Converter = (value: unknown) => Converted

const INTEGER_PATTERN = /^[+-]?\d+$/
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/

function safeBigIntToNumber(value: bigint): Converted {
  const n = Number(value)
  return Number.isSafeInteger(n) ? n : NOT_CONVERTIBLE
}

const converters: Record<TypeTag, Converter> = {
  integer: (value) => {
    if (typeof value === 'string' && INTEGER_PATTERN.test(value.trim())) {
      const n = Number(value.trim())
      return Number.isSafeInteger(n) ? n : NOT_CONVERTIBLE
    }
    if (typeof value === 'bigint') return safeBigIntToNumber(value)
    return NOT_CONVERTIBLE
  },

  number: (value) => {
    if (typeof value === 'string' && DECIMAL_PATTERN.test(value.trim())) {
      const n = Number(value.trim())
      return Number.isFinite(n) ? n : NOT_CONVERTIBLE
    }
    if (typeof value === 'bigint') return safeBigIntToNumber(value)
    return NOT_CONVERTIBLE
  },

  string: (value) => {
    if (typeof value === 'number' && Number.isFinite(value)) return String(value)
    if (typeof value === 'boolean' || typeof value === 'bigint') return String(value)
    return NOT_CONVERTIBLE
  },

  boolean: (value) => {
    if (typeof value !== 'string') return NOT_CONVERTIBLE
    const lowered = value.trim().toLowerCase()
    if (lowered === 'true') return true
    if (lowered === 'false') return false
    return NOT_CONVERTIBLE
  },

  bigint: (value) => {
    if (typeof value === 'number' && Number.isInteger(value)) return BigInt(value)
    if (typeof value === 'string' && INTEGER_PATTERN.test(value.trim())) {
      return BigInt(value.trim())
    }
    return NOT_CONVERTIBLE
  },

  null: () => NOT_CONVERTIBLE,
  tuple: () => NOT_CONVERTIBLE,
  mapping: () => NOT_CONVERTIBLE,
}

/**
 * Return value unchanged when it matches one of the allowed tags, otherwise
 * the first successful conversion in declaration order.
 *
 * @throws {TypeConversionError} naming every attempted tag
 */
export function coerceToAllowed(value: unknown, allowedTypes: readonly TypeTag[]): SettingValue {
  for (const tag of allowedTypes) {
    if (matchesTag(value, tag)) return value
  }

  for (const tag of allowedTypes) {
    const converted = converters[tag](value)
    if (converted !== NOT_CONVERTIBLE) return converted
  }

  throw new TypeConversionError(value, allowedTypes)
}

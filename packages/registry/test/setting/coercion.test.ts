import { describe, it, expect } from 'vitest'
import { coerceToAllowed } from '../../src/setting/coercion'
import { TypeConversionError } from '../../src/errors'

describe('coerceToAllowed', () => {
  it('should return matching values unchanged', () => {
    expect(coerceToAllowed(3, ['integer'])).toBe(3)
    expect(coerceToAllowed(3, ['number'])).toBe(3)
    expect(coerceToAllowed('hello', ['integer', 'string'])).toBe('hello')
  })

  it('should prefer a direct match over an earlier conversion', () => {
    // '5' converts to integer, but it is already a string
    expect(coerceToAllowed('5', ['integer', 'string'])).toBe('5')
  })

  it('should convert integer strings', () => {
    expect(coerceToAllowed('42', ['integer'])).toBe(42)
    expect(coerceToAllowed(' -3 ', ['integer'])).toBe(-3)
  })

  it('should not truncate fractional strings into integers', () => {
    expect(() => coerceToAllowed('4.5', ['integer'])).toThrow(TypeConversionError)
    expect(coerceToAllowed('4.5', ['integer', 'number'])).toBe(4.5)
  })

  it('should only read decimal strings as numbers', () => {
    expect(coerceToAllowed('1.5e3', ['number'])).toBe(1500)
    expect(coerceToAllowed('-.5', ['number'])).toBe(-0.5)
    expect(() => coerceToAllowed('0x10', ['number'])).toThrow(TypeConversionError)
    expect(() => coerceToAllowed('0b101', ['number'])).toThrow(TypeConversionError)
    expect(() => coerceToAllowed('0o7', ['number'])).toThrow(TypeConversionError)
    expect(() => coerceToAllowed('Infinity', ['number'])).toThrow(TypeConversionError)
  })

  it('should convert safe bigints to numbers', () => {
    expect(coerceToAllowed(7n, ['integer'])).toBe(7)
    expect(() => coerceToAllowed(2n ** 64n, ['integer'])).toThrow(TypeConversionError)
  })

  it('should convert to bigint', () => {
    expect(coerceToAllowed(7, ['bigint'])).toBe(7n)
    expect(coerceToAllowed('12345678901234567890', ['bigint'])).toBe(12345678901234567890n)
  })

  it('should convert scalars to strings', () => {
    expect(coerceToAllowed(42, ['string'])).toBe('42')
    expect(coerceToAllowed(false, ['string'])).toBe('false')
    expect(coerceToAllowed(9n, ['string'])).toBe('9')
  })

  it('should convert boolean words', () => {
    expect(coerceToAllowed('TRUE', ['boolean'])).toBe(true)
    expect(coerceToAllowed(' false ', ['boolean'])).toBe(false)
    expect(() => coerceToAllowed('yes', ['boolean'])).toThrow(TypeConversionError)
  })

  it('should try allowed types in declaration order', () => {
    expect(coerceToAllowed(5, ['boolean', 'string'])).toBe('5')
    expect(coerceToAllowed('8', ['bigint', 'integer'])).toBe(8n)
    expect(coerceToAllowed('8', ['integer', 'bigint'])).toBe(8)
  })

  it('should name every attempted type when nothing converts', () => {
    try {
      coerceToAllowed('hello', ['integer', 'boolean'])
      expect.unreachable()
    } catch (e) {
      expect(e).toBeInstanceOf(TypeConversionError)
      if (e instanceof TypeConversionError) {
        expect(e.attemptedTypes).toEqual(['integer', 'boolean'])
        expect(e.value).toBe('hello')
        expect(e.message).toBe('Could not convert "hello" into any of the following types: integer, boolean')
      }
    }
  })

  it('should never convert into structured kinds', () => {
    expect(() => coerceToAllowed('[]', ['tuple'])).toThrow(TypeConversionError)
    expect(() => coerceToAllowed('null', ['null'])).toThrow(TypeConversionError)
  })
})

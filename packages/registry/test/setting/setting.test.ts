import { describe, it, expect, vi, afterEach } from 'vitest'
import { Setting, isSetting, settingLocations } from '../../src/setting/setting'
import { defineCondition, isPositive, within } from '../../src/conditions'
import { TypeConversionError, ValidationError } from '../../src/errors'
import { frozenMapping, tuple } from '../../src/setting/value-kinds'

describe('Setting', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('construction', () => {
    it('should start at its default', () => {
      const setting = new Setting(5, { description: 'Retry count' })
      expect(setting.value).toBe(5)
      expect(setting.defaultValue).toBe(5)
      expect(setting.description).toBe('Retry count')
      expect(setting.isDefault()).toBe(true)
    })

    it('should infer allowed types from the default', () => {
      expect(new Setting(5).allowedTypes).toEqual(['integer'])
      expect(new Setting(0.5).allowedTypes).toEqual(['number'])
      expect(new Setting('x').allowedTypes).toEqual(['string'])
      expect(new Setting(tuple(1, 2)).allowedTypes).toEqual(['tuple'])
      expect(new Setting(null).allowedTypes).toEqual(['null'])
    })

    it('should keep declared allowed types in order without duplicates', () => {
      const setting = new Setting<number | string>(5, { allowedTypes: ['integer', 'string', 'integer'] })
      expect(setting.allowedTypes).toEqual(['integer', 'string'])
      expect(Object.isFrozen(setting.allowedTypes)).toBe(true)
    })

    it('should default to an empty description and no conditions', () => {
      const setting = new Setting(true)
      expect(setting.description).toBe('')
      expect(setting.conditions).toEqual([])
      expect(setting.declaredAt).toBeUndefined()
    })

    it('should reject mutable defaults', () => {
      expect(() => new Setting([1, 2])).toThrow(ValidationError)
      expect(() => new Setting({ host: 'localhost' })).toThrow(ValidationError)
    })

    it('should accept frozen structures', () => {
      const setting = new Setting(frozenMapping({ host: 'localhost', ports: tuple(80, 443) }))
      expect(setting.allowedTypes).toEqual(['mapping'])
    })

    it('should reject a default outside its allowed types', () => {
      expect(() => new Setting<number | string>(5, { allowedTypes: ['string'] })).toThrow(TypeConversionError)
    })

    it('should reject a default that fails a condition', () => {
      expect(() => new Setting(-1, { conditions: [isPositive] })).toThrow(ValidationError)
    })

    it('should record its declaration site', () => {
      const setting = new Setting(1, { declaredAt: 'setting.test#declared' })
      expect(setting.declaredAt).toBe('setting.test#declared')
      expect(settingLocations.locationsOf(setting)).toEqual(['setting.test#declared'])
      expect(settingLocations.settingsAt('setting.test#declared')).toContain(setting)
    })
  })

  describe('setValue', () => {
    it('should store values of an allowed type', () => {
      const setting = new Setting(5)
      expect(setting.setValue(8)).toBe(8)
      expect(setting.value).toBe(8)
      expect(setting.isDefault()).toBe(false)
    })

    it('should coerce values of another type', () => {
      const setting = new Setting(5)
      setting.setValue('12')
      expect(setting.value).toBe(12)
    })

    it('should accept any declared type', () => {
      const setting = new Setting<number | string>(5, { allowedTypes: ['integer', 'string'] })
      setting.setValue('hello')
      expect(setting.value).toBe('hello')
    })

    it('should keep its value when conversion fails', () => {
      const setting = new Setting(6)
      expect(() => setting.setValue('hello')).toThrow(TypeConversionError)
      expect(setting.value).toBe(6)
    })

    it('should run conditions on the coerced value', () => {
      const setting = new Setting(5, { conditions: [within(0, 10)] })
      setting.setValue('7')
      expect(setting.value).toBe(7)

      expect(() => setting.setValue(11)).toThrow('Value 11 failed condition: value must be within 0 and 10')
      expect(setting.value).toBe(7)
    })

    it('should combine conditions with AND', () => {
      const isEven = defineCondition('value must be even', (value) => typeof value === 'number' && value % 2 === 0)
      const setting = new Setting(2, { conditions: [isPositive, isEven] })

      expect(() => setting.setValue(3)).toThrow('value must be even')
      expect(() => setting.setValue(-2)).toThrow('value must be positive')
      setting.setValue(4)
      expect(setting.value).toBe(4)
    })

    it('should report the failing condition on the error', () => {
      const setting = new Setting(1, { conditions: [isPositive] })
      try {
        setting.setValue(0)
        expect.unreachable()
      } catch (e) {
        expect(e).toBeInstanceOf(ValidationError)
        if (e instanceof ValidationError) {
          expect(e.condition).toBe('value must be positive')
          expect(e.value).toBe(0)
        }
      }
    })

    it('should turn a throwing condition into a ValidationError', () => {
      const failure = new Error('boom')
      const exploding = defineCondition('never decides', () => {
        throw failure
      })
      expect(() => new Setting(1, { conditions: [exploding] })).toThrow("Condition 'never decides' threw for 1")
      try {
        new Setting(1, { conditions: [exploding] })
      } catch (e) {
        expect(e).toBeInstanceOf(ValidationError)
        if (e instanceof ValidationError) {
          expect(e.cause).toBe(failure)
        }
      }
    })

    it('should reject mutable values', () => {
      const setting = new Setting(tuple(1))
      expect(() => setting.setValue([2])).toThrow(ValidationError)
      expect(() => setting.setValue(new Map())).toThrow('Unsupported setting value Map(0)')
      setting.setValue(tuple(2, 3))
      expect(setting.value).toEqual([2, 3])
    })

    it('should reject mutable values before trying conversion', () => {
      const setting = new Setting('x')
      expect(() => setting.setValue(['x'])).toThrow(ValidationError)
    })
  })

  describe('check', () => {
    it('should validate without storing', () => {
      const setting = new Setting(5)
      expect(setting.check('9')).toBe(9)
      expect(setting.value).toBe(5)
    })
  })

  describe('restoreDefault', () => {
    it('should go back to the default', () => {
      const setting = new Setting('info')
      setting.setValue('debug')
      setting.restoreDefault()
      expect(setting.value).toBe('info')
      expect(setting.isDefault()).toBe(true)
    })
  })

  describe('subscribe', () => {
    it('should notify with new and old values', () => {
      const setting = new Setting(5)
      const callback = vi.fn()
      setting.subscribe(callback)

      setting.setValue(6)

      expect(callback).toHaveBeenCalledWith(6, 5)
    })

    it('should not notify when the value is unchanged', () => {
      const setting = new Setting(tuple('a'))
      const callback = vi.fn()
      setting.subscribe(callback)

      setting.setValue(tuple('a'))

      expect(callback).not.toHaveBeenCalled()
    })

    it('should stop after unsubscribe', () => {
      const setting = new Setting(5)
      const callback = vi.fn()
      const unsubscribe = setting.subscribe(callback)

      unsubscribe()
      setting.setValue(6)

      expect(callback).not.toHaveBeenCalled()
    })

    it('should isolate subscriber errors', () => {
      const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {})
      const setting = new Setting(5)
      const healthy = vi.fn()
      setting.subscribe(() => {
        throw new Error('subscriber failed')
      })
      setting.subscribe(healthy)

      expect(() => setting.setValue(6)).not.toThrow()
      expect(setting.value).toBe(6)
      expect(healthy).toHaveBeenCalledWith(6, 5)
      expect(consoleError).toHaveBeenCalledTimes(1)
    })
  })

  describe('helpers', () => {
    it('should render with its value', () => {
      expect(new Setting(5).toString()).toBe('Setting(5)')
      expect(new Setting('x').toString()).toBe('Setting("x")')
    })

    it('should recognise settings', () => {
      expect(isSetting(new Setting(1))).toBe(true)
      expect(isSetting(1)).toBe(false)
    })
  })
})

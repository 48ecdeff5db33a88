/**
 * Setting
 *
 * A named, typed, described and optionally validated configuration cell.
 * allowedTypes and conditions are fixed at construction; only the current
 * value changes, and only through setValue().
 */

import { describeCondition, type Condition } from '../conditions/conditions'
import { TypeConversionError, ValidationError } from '../errors'
import { LocationTracker } from '../location/location-tracker'
import { basicLogger } from '../logging/logger'
import { formatValue } from '../utils/format-value'
import { coerceToAllowed } from './coercion'
import {
  isImmutableValue,
  isTypeTag,
  matchesTag,
  typeTagOf,
  valuesEqual,
  type SettingValue,
  type TypeTag,
} from './value-kinds'

/** Unsubscribe function returned by subscribe methods */
export type Unsubscribe = () => void

/**
 * Callback for setting changes.
 * @param value - The new value
 * @param oldValue - The previous value
 */
export type SettingChangeCallback<T> = (value: T, oldValue: T) => void

/** Method syntax keeps Setting<number> assignable to Setting */
interface Subscription<T> {
  notify(value: T, oldValue: T): void
}

export interface SettingOptions {
  /** Human description, written as a comment when the tree is encoded */
  description?: string
  /** Accepted kinds, tried in order when coercing. Defaults to the default value's kind. */
  allowedTypes?: readonly TypeTag[]
  /** All must pass for a value to be accepted; they see the value after coercion */
  conditions?: ReadonlyArray<Condition<SettingValue>>
  /** Diagnostic declaration-site tag, recorded in settingLocations */
  declaredAt?: string
}

export class Setting<T extends SettingValue = SettingValue> {
  readonly defaultValue: T
  readonly description: string
  readonly allowedTypes: readonly TypeTag[]
  readonly conditions: ReadonlyArray<Condition<SettingValue>>
  readonly declaredAt: string | undefined

  private current: T
  private subscribers = new Set<Subscription<T>>()

  constructor(defaultValue: T, options: SettingOptions = {}) {
    this.description = options.description ?? ''
    this.declaredAt = options.declaredAt
    this.conditions = Object.freeze([...(options.conditions ?? [])])

    assertImmutable(defaultValue)
    this.allowedTypes = Object.freeze(resolveAllowedTypes(defaultValue, options.allowedTypes))
    if (!this.allowedTypes.some((tag) => matchesTag(defaultValue, tag))) {
      throw new TypeConversionError(defaultValue, this.allowedTypes)
    }
    this.assertConditions(defaultValue)

    this.defaultValue = defaultValue
    this.current = defaultValue

    if (this.declaredAt !== undefined) {
      settingLocations.record(this.declaredAt, this)
    }
  }

  /** The current value (the declared default until a successful setValue) */
  get value(): T {
    return this.current
  }

  /**
   * Run the acceptance pipeline without storing the result:
   * immutability, type check or ordered coercion, then every condition.
   *
   * @returns The accepted (possibly coerced) value
   * @throws {ValidationError} for mutable or unsupported values and failed conditions
   * @throws {TypeConversionError} when no allowed type matches or converts
   */
  check(newValue: unknown): T {
    assertImmutable(newValue)
    const accepted = coerceToAllowed(newValue, this.allowedTypes)
    if (!this.accepts(accepted)) {
      throw new TypeConversionError(newValue, this.allowedTypes)
    }
    this.assertConditions(accepted)
    assertImmutable(accepted)
    return accepted
  }

  /**
   * Validate and store a new value, then notify subscribers if it changed.
   * This is the only way a setting's value changes.
   */
  setValue(newValue: unknown): T {
    const accepted = this.check(newValue)
    const oldValue = this.current
    this.current = accepted

    if (!valuesEqual(accepted, oldValue)) {
      this.notifySubscribers(accepted, oldValue)
    }
    return accepted
  }

  /** Set the value back to the declared default. */
  restoreDefault(): T {
    return this.setValue(this.defaultValue)
  }

  isDefault(): boolean {
    return valuesEqual(this.current, this.defaultValue)
  }

  subscribe(callback: SettingChangeCallback<T>): Unsubscribe {
    const subscription: Subscription<T> = { notify: callback }
    this.subscribers.add(subscription)
    return () => {
      this.subscribers.delete(subscription)
    }
  }

  toString(): string {
    return `Setting(${formatValue(this.current)})`
  }

  /** Whether value is of one of allowedTypes (conditions are not run) */
  accepts(value: unknown): value is T {
    return this.allowedTypes.some((tag) => matchesTag(value, tag))
  }

  private assertConditions(value: SettingValue): void {
    for (const condition of this.conditions) {
      const description = describeCondition(condition)
      let passed: boolean
      try {
        passed = condition(value)
      } catch (e) {
        throw new ValidationError(`Condition '${description}' threw for ${formatValue(value)}`, {
          value,
          condition: description,
          cause: e,
        })
      }
      if (!passed) {
        throw new ValidationError(`Value ${formatValue(value)} failed condition: ${description}`, {
          value,
          condition: description,
        })
      }
    }
  }

  private notifySubscribers(value: T, oldValue: T): void {
    for (const subscription of this.subscribers) {
      try {
        subscription.notify(value, oldValue)
      } catch (e) {
        basicLogger().error('[Setting] Subscriber error:', e)
      }
    }
  }
}

/** Process-wide record of where settings were declared */
export const settingLocations = new LocationTracker<Setting>()

export function isSetting(value: unknown): value is Setting {
  return value instanceof Setting
}

function assertImmutable(value: unknown): asserts value is SettingValue {
  if (typeTagOf(value) === undefined) {
    throw new ValidationError(`Unsupported setting value ${formatValue(value)}`, { value })
  }
  if (!isImmutableValue(value)) {
    throw new ValidationError(
      `Setting values must be immutable, got ${formatValue(value)}; ` +
        `use tuple() or frozenMapping() for structured values`,
      { value },
    )
  }
}

function resolveAllowedTypes(defaultValue: SettingValue, declared?: readonly TypeTag[]): TypeTag[] {
  if (declared === undefined || declared.length === 0) {
    const inferred = typeTagOf(defaultValue)
    return inferred === undefined ? [] : [inferred]
  }

  for (const tag of declared) {
    if (!isTypeTag(tag)) {
      throw new ValidationError(`Unknown type tag ${formatValue(tag)}`, { value: tag })
    }
  }
  // Drop duplicates, keep declaration order
  return Array.from(new Set(declared))
}

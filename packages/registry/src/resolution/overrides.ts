/**
 * Resolution Engine
 *
 * Effective value of a setting for a host object:
 *   1. an override recorded for that host,
 *   2. otherwise the setting's registry value (its default until changed).
 *
 * Overrides live in a side table keyed weakly by host, so they end with the
 * host. Neither Setting nor Registry ever holds them.
 */

import type { Setting } from '../setting/setting'
import type { SettingValue } from '../setting/value-kinds'

const overrides = new WeakMap<object, Map<Setting, SettingValue>>()

export function resolve<T extends SettingValue>(setting: Setting<T>, host?: object): T {
  if (host !== undefined) {
    const table = overrides.get(host)
    if (table?.has(setting)) {
      const value = table.get(setting)
      if (setting.accepts(value)) return value
    }
  }
  return setting.value
}

/**
 * Record value for host only, after the setting's full acceptance check.
 * @returns The accepted (possibly coerced) value
 */
export function setOverride<T extends SettingValue>(host: object, setting: Setting<T>, value: unknown): T {
  const accepted = setting.check(value)
  let table = overrides.get(host)
  if (!table) {
    table = new Map()
    overrides.set(host, table)
  }
  table.set(setting, accepted)
  return accepted
}

/** Remove host's override; reports whether there was one. */
export function clearOverride(host: object, setting: Setting): boolean {
  const table = overrides.get(host)
  if (!table) return false
  const removed = table.delete(setting)
  if (table.size === 0) overrides.delete(host)
  return removed
}

export function hasOverride(host: object, setting: Setting): boolean {
  return overrides.get(host)?.has(setting) ?? false
}

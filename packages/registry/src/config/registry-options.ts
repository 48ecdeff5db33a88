/**
 * Registry Options Schema
 *
 * Single source of truth for the options a Registry accepts: type, default,
 * and validation bounds for each.
 */

import { LOG_LEVELS, type LogLevel } from '../logging/logger'

// ============================================================================
// Schema Definition Types
// ============================================================================

interface NumberOptionDef {
  type: 'number'
  default: number
  min?: number
  max?: number
}

interface StringOptionDef {
  type: 'string'
  default: string
  /** Empty strings fall back to the default */
  nonEmpty?: boolean
}

interface EnumOptionDef<T extends readonly string[]> {
  type: 'enum'
  values: T
  default: T[number]
}

// ============================================================================
// The Schema
// ============================================================================

export interface RegistryOptionsSchema {
  separator: StringOptionDef
  logLevel: EnumOptionDef<readonly LogLevel[]>
  yamlIndent: NumberOptionDef
}

export const registryOptionsSchema: RegistryOptionsSchema = {
  /** Separator between path segments, e.g. "server.http.port". */
  separator: {
    type: 'string',
    default: '.',
    nonEmpty: true,
  },

  /** Minimum level of registry log messages. */
  logLevel: {
    type: 'enum',
    values: LOG_LEVELS,
    default: 'warn',
  },

  /** Indentation width of encoded YAML. */
  yamlIndent: {
    type: 'number',
    default: 2,
    min: 1,
    max: 8,
  },
}

export type RegistryOptionKey = keyof RegistryOptionsSchema

export interface RegistryOptions {
  separator: string
  logLevel: LogLevel
  yamlIndent: number
}

// ============================================================================
// Schema Utilities
// ============================================================================

export function getOptionDefaults(): RegistryOptions {
  return {
    separator: registryOptionsSchema.separator.default,
    logLevel: registryOptionsSchema.logLevel.default,
    yamlIndent: registryOptionsSchema.yamlIndent.default,
  }
}

function validateNumber(def: NumberOptionDef, value: unknown): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) return def.default
  let v = Math.round(value)
  if (def.min !== undefined) v = Math.max(def.min, v)
  if (def.max !== undefined) v = Math.min(def.max, v)
  return v
}

function validateString(def: StringOptionDef, value: unknown): string {
  if (typeof value !== 'string') return def.default
  if (def.nonEmpty && value.length === 0) return def.default
  return value
}

function validateEnum<T extends readonly string[]>(def: EnumOptionDef<T>, value: unknown): T[number] {
  return def.values.find((candidate) => candidate === value) ?? def.default
}

/**
 * Validate and coerce a single option.
 * Out-of-range numbers are clamped, anything else invalid falls back to the default.
 */
export function validateOption<K extends RegistryOptionKey>(key: K, value: unknown): RegistryOptions[K]
export function validateOption(key: RegistryOptionKey, value: unknown): RegistryOptions[RegistryOptionKey] {
  switch (key) {
    case 'separator':
      return validateString(registryOptionsSchema.separator, value)
    case 'logLevel':
      return validateEnum(registryOptionsSchema.logLevel, value)
    case 'yamlIndent':
      return validateNumber(registryOptionsSchema.yamlIndent, value)
  }
}

/** Merge partial options over the defaults, validating each provided value. */
export function resolveRegistryOptions(options: Partial<RegistryOptions> = {}): RegistryOptions {
  const resolved = getOptionDefaults()
  if (options.separator !== undefined) resolved.separator = validateOption('separator', options.separator)
  if (options.logLevel !== undefined) resolved.logLevel = validateOption('logLevel', options.logLevel)
  if (options.yamlIndent !== undefined) resolved.yamlIndent = validateOption('yamlIndent', options.yamlIndent)
  return resolved
}

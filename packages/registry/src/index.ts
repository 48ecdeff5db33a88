// Conditions
export type { Condition, Comparable } from './conditions'
export {
  defineCondition,
  describeCondition,
  isPositive,
  isNegative,
  greaterThan,
  lesserThan,
  within,
  allowed,
} from './conditions'

// Settings
export { Setting, isSetting, settingLocations } from './setting/setting'
export type { SettingOptions, SettingChangeCallback, Unsubscribe } from './setting/setting'
export {
  TYPE_TAGS,
  deepFreeze,
  frozenMapping,
  isImmutableValue,
  isTypeTag,
  matchesTag,
  tuple,
  typeTagOf,
  valuesEqual,
} from './setting/value-kinds'
export type { SettingMapping, SettingScalar, SettingTuple, SettingValue, TypeTag } from './setting/value-kinds'
export { coerceToAllowed } from './setting/coercion'

// Tree
export { NamespaceNode } from './namespace/namespace-node'
export type { BindOptions, NamespaceEntry, ResolvedPath } from './namespace/namespace-node'
export { Registry, getRegistry, resetRegistry } from './namespace/registry'
export type { RegistryInit } from './namespace/registry'

// Resolution
export { resolve, setOverride, clearOverride, hasOverride } from './resolution/overrides'
export { defineSettings } from './resolution/define-settings'
export type { DefineSettingsOptions, HostClass, SettingsDeclaration } from './resolution/define-settings'

// Bulk update and IO
export { SettingsLoader } from './bulk/loader'
export type { UpdateFailure, UpdateOptions, UpdateResult } from './bulk/loader'
export {
  SETTINGS_FORMATS,
  decodeDocument,
  encodeTree,
  formatFromPath,
  isSettingsFormat,
} from './io/codecs'
export type { EncodeOptions, SettingsFormat } from './io/codecs'
export { loadFile, saveFile } from './io/files'

// Diagnostics
export { LocationTracker } from './location/location-tracker'

// Options
export {
  registryOptionsSchema,
  getOptionDefaults,
  validateOption,
  resolveRegistryOptions,
} from './config/registry-options'
export type { RegistryOptions, RegistryOptionKey } from './config/registry-options'

// Logging
export {
  LOG_LEVELS,
  RegistryComponent,
  basicLogger,
  createFilter,
  silentLogger,
  withScopeAndFiltering,
} from './logging/logger'
export type {
  ILoggableComponent,
  ILoggingRegistry,
  LogContext,
  LogEntry,
  LogLevel,
  Logger,
  LoggingConfig,
  ShouldLogFn,
} from './logging/logger'

// Errors
export {
  RegistryError,
  NotASettingError,
  AlreadyBoundError,
  PathConflictError,
  UnknownSettingError,
  TypeConversionError,
  ValidationError,
  FormatError,
} from './errors'

/**
 * Registry Errors
 *
 * Every failure raised by the registry is a RegistryError subclass carrying
 * the offending path or value as structured fields.
 */

import { formatValue } from './utils/format-value'

export class RegistryError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'RegistryError'
  }
}

/** A non-Setting value was bound where only Settings are accepted. */
export class NotASettingError extends RegistryError {
  constructor(
    public readonly path: string,
    public readonly value: unknown,
  ) {
    super(`Only Settings can be inserted in the registry (got ${formatValue(value)} at '${path}')`)
    this.name = 'NotASettingError'
  }
}

/** A name already bound to a Setting was bound again. */
export class AlreadyBoundError extends RegistryError {
  constructor(public readonly path: string) {
    super(`'${path}' is already in the registry; use update or load to change its value`)
    this.name = 'AlreadyBoundError'
  }
}

/** A namespace was used where a Setting was expected, or the reverse. */
export class PathConflictError extends RegistryError {
  constructor(
    public readonly path: string,
    reason: string,
  ) {
    super(`Path conflict at '${path}': ${reason}`)
    this.name = 'PathConflictError'
  }
}

/** An update or load referenced a path that is not in the tree. */
export class UnknownSettingError extends RegistryError {
  constructor(public readonly path: string) {
    super(`Setting '${path}' does not exist in the registry`)
    this.name = 'UnknownSettingError'
  }
}

/** A value matched no allowed type and no conversion succeeded. */
export class TypeConversionError extends RegistryError {
  constructor(
    public readonly value: unknown,
    public readonly attemptedTypes: readonly string[],
  ) {
    super(
      `Could not convert ${formatValue(value)} into any of the following types: ` +
        attemptedTypes.join(', '),
    )
    this.name = 'TypeConversionError'
  }
}

/** A value failed a condition or the immutability check. */
export class ValidationError extends RegistryError {
  public readonly value: unknown
  public readonly condition: string | undefined

  constructor(message: string, details: { value: unknown; condition?: string; cause?: unknown }) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause })
    this.name = 'ValidationError'
    this.value = details.value
    this.condition = details.condition
  }
}

/** Structured text could not be decoded into a settings mapping. */
export class FormatError extends RegistryError {
  constructor(
    public readonly format: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`Invalid ${format}: ${message}`, options)
    this.name = 'FormatError'
  }
}

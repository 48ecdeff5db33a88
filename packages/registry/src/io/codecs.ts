import { FormatError } from '../errors'
import type { Logger } from '../logging/logger'
import type { NamespaceNode } from '../namespace/namespace-node'
import { deepFreeze, isPlainObject } from '../setting/value-kinds'
import { decodeToml, encodeToml } from './toml-codec'
import { decodeYaml, encodeYaml } from './yaml-codec'

export type SettingsFormat = 'yaml' | 'toml'

export const SETTINGS_FORMATS: readonly SettingsFormat[] = ['yaml', 'toml']

const FORMAT_LABELS: Record<SettingsFormat, string> = {
  yaml: 'YAML',
  toml: 'TOML',
}

const EXTENSIONS: Record<string, SettingsFormat> = {
  '.yaml': 'yaml',
  '.yml': 'yaml',
  '.toml': 'toml',
}

export interface EncodeOptions {
  /** YAML indentation width */
  indent?: number
  logger?: Logger
}

export function isSettingsFormat(value: unknown): value is SettingsFormat {
  return value === 'yaml' || value === 'toml'
}

/** Format implied by a file name's extension, if it has a known one */
export function formatFromPath(filePath: string): SettingsFormat | undefined {
  const match = /\.[^./\\]+$/.exec(filePath)
  return match ? EXTENSIONS[match[0].toLowerCase()] : undefined
}

export function encodeTree(root: NamespaceNode, format: SettingsFormat, options: EncodeOptions = {}): string {
  switch (format) {
    case 'yaml':
      return encodeYaml(root, { indent: options.indent })
    case 'toml':
      return encodeToml(root, { logger: options.logger })
  }
}

/**
 * Decode text into a deep-frozen nested mapping (sequences become tuples),
 * ready for update(). An empty document is an empty mapping.
 *
 * @throws {FormatError} on syntax errors or when the root is not a mapping
 */
export function decodeDocument(source: string, format: SettingsFormat): Readonly<Record<string, unknown>> {
  const data = format === 'yaml' ? decodeYaml(source) : decodeToml(source)
  if (data === null || data === undefined) {
    return Object.freeze({})
  }
  if (!isPlainObject(data)) {
    throw new FormatError(FORMAT_LABELS[format], 'the document root must be a mapping')
  }
  return deepFreeze(data)
}

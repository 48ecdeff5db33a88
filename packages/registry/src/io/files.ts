import * as fs from 'fs/promises'
import type { UpdateOptions, UpdateResult } from '../bulk/loader'
import { FormatError } from '../errors'
import type { Registry } from '../namespace/registry'
import { formatFromPath, type SettingsFormat } from './codecs'

function pickFormat(filePath: string, format: SettingsFormat | undefined): SettingsFormat {
  const resolved = format ?? formatFromPath(filePath)
  if (!resolved) {
    throw new FormatError('file', `cannot infer a format from '${filePath}'; pass 'yaml' or 'toml'`)
  }
  return resolved
}

/**
 * Read a YAML or TOML file and apply it to registry.
 * The format is taken from the extension unless given.
 */
export async function loadFile(
  registry: Registry,
  filePath: string,
  format?: SettingsFormat,
  options?: UpdateOptions,
): Promise<UpdateResult> {
  const resolved = pickFormat(filePath, format)
  const source = await fs.readFile(filePath, 'utf8')
  return registry.load(source, resolved, options)
}

/** Write the registry's current values to a YAML or TOML file. */
export async function saveFile(registry: Registry, filePath: string, format?: SettingsFormat): Promise<void> {
  const resolved = pickFormat(filePath, format)
  await fs.writeFile(filePath, registry.encode(resolved), 'utf8')
}

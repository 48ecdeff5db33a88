/**
 * Settings Loader
 *
 * Bulk update of existing settings from a nested or dotted mapping, and
 * load() on top of it for YAML/TOML text. Nothing is ever created here:
 * unknown paths fail, and entries applied before a failure stay applied.
 */

import { PathConflictError, RegistryError, UnknownSettingError } from '../errors'
import { decodeDocument, type SettingsFormat } from '../io/codecs'
import { RegistryComponent, type ILoggingRegistry } from '../logging/logger'
import { NamespaceNode } from '../namespace/namespace-node'
import { isPlainObject } from '../setting/value-kinds'
import { formatValue } from '../utils/format-value'

export interface UpdateOptions {
  /** Attempt every entry and report failures instead of stopping at the first */
  collectErrors?: boolean
}

export interface UpdateFailure {
  path: string
  error: RegistryError
}

export interface UpdateResult {
  /** Paths whose setting accepted its new value, in application order */
  applied: string[]
  failed: UpdateFailure[]
}

export class SettingsLoader extends RegistryComponent {
  static logName = 'loader'

  constructor(
    registryHost: ILoggingRegistry,
    private readonly root: NamespaceNode,
  ) {
    super(registryHost)
  }

  /**
   * Apply mapping to the tree, in insertion order.
   *
   * @throws {UnknownSettingError} for a path with no binding
   * @throws {PathConflictError} when a namespace receives a non-mapping value
   * @throws the Setting's TypeConversionError or ValidationError
   */
  update(mapping: Readonly<Record<string, unknown>>, options: UpdateOptions = {}): UpdateResult {
    const result: UpdateResult = { applied: [], failed: [] }
    this.applyMapping(this.root, mapping, options.collectErrors ?? false, result)

    if (result.failed.length > 0) {
      this.logger.warn(`Update finished with ${result.failed.length} failed entries`)
    }
    return result
  }

  /**
   * Decode source and apply it with update().
   * @throws {FormatError} when the text is not a valid mapping document
   */
  load(source: string, format: SettingsFormat, options: UpdateOptions = {}): UpdateResult {
    const document = decodeDocument(source, format)
    const result = this.update(document, options)
    this.logger.info(`Loaded ${format} document: ${result.applied.length} settings applied`)
    return result
  }

  private applyMapping(
    node: NamespaceNode,
    mapping: Readonly<Record<string, unknown>>,
    collectErrors: boolean,
    result: UpdateResult,
  ): void {
    for (const [key, value] of Object.entries(mapping)) {
      const path = node.qualify(key)
      try {
        this.applyEntry(node, key, value, collectErrors, result)
      } catch (e) {
        if (!collectErrors || !(e instanceof RegistryError)) throw e
        this.logger.warn(`Update of ${path} failed: ${e.message}`)
        result.failed.push({ path, error: e })
      }
    }
  }

  private applyEntry(
    node: NamespaceNode,
    key: string,
    value: unknown,
    collectErrors: boolean,
    result: UpdateResult,
  ): void {
    const path = node.qualify(key)
    const resolved = node.resolvePath(key, false)
    const entry = resolved?.parent.lookup(resolved.name)
    if (entry === undefined) {
      throw new UnknownSettingError(path)
    }

    if (entry instanceof NamespaceNode) {
      if (!isPlainObject(value)) {
        throw new PathConflictError(path, `a namespace cannot take the value ${formatValue(value)}`)
      }
      this.applyMapping(entry, value, collectErrors, result)
      return
    }

    entry.setValue(value)
    result.applied.push(path)
    this.logger.debug(`Updated ${path} = ${formatValue(entry.value)}`)
  }
}

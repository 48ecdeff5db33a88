import { AlreadyBoundError } from '../errors'
import { getRegistry, type Registry } from '../namespace/registry'
import { isSetting, settingLocations, type Setting } from '../setting/setting'
import { resolve, setOverride } from './overrides'

/** Any class, abstract or not */
export type HostClass = abstract new (...args: never[]) => object

export type SettingsDeclaration = Record<string, Setting>

export interface DefineSettingsOptions {
  /** Defaults to the process-wide registry */
  registry?: Registry
  /** Path prefix placed before the class name */
  namespace?: string
}

/**
 * Declare settings on a host class.
 *
 * Each Setting is bound at `[namespace.]ClassName.attribute` and an accessor
 * is installed on the class prototype: reading resolves the effective value
 * for the instance, assigning a plain value records an instance override,
 * and assigning a Setting fails with AlreadyBoundError.
 *
 * Declare the attributes on the class with `declare` so no instance field
 * shadows the accessor:
 *
 *   class Database {
 *     declare port: number
 *   }
 *   defineSettings(Database, { port: new Setting(5432) })
 */
export function defineSettings<D extends SettingsDeclaration>(
  host: HostClass,
  declarations: D,
  options: DefineSettingsOptions = {},
): D {
  const registry = options.registry ?? getRegistry()
  const prefix = options.namespace ? `${options.namespace}${registry.separator}${host.name}` : host.name
  const node = registry.namespaceAt(prefix)

  for (const [attribute, setting] of Object.entries(declarations)) {
    node.bind(attribute, setting, { redeclaredBy: host })
    settingLocations.record(`${host.name}#${attribute}`, setting)
    installAccessor(host, attribute, setting, node.qualify(attribute))
  }
  return declarations
}

function installAccessor(host: HostClass, attribute: string, setting: Setting, path: string): void {
  Object.defineProperty(host.prototype, attribute, {
    configurable: true,
    enumerable: true,
    get(this: object) {
      return resolve(setting, this)
    },
    set(this: object, value: unknown) {
      if (isSetting(value)) {
        throw new AlreadyBoundError(path)
      }
      setOverride(this, setting, value)
    },
  })
}

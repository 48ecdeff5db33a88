/**
 * Namespace Node
 *
 * One level of the settings tree: a mapping from name to a child namespace
 * or a Setting. Child namespaces are created lazily and are referentially
 * stable. A name bound to a Setting is never rebound (values change in
 * place through update/load), and names never switch between namespace and
 * Setting.
 */

import { AlreadyBoundError, NotASettingError, PathConflictError, UnknownSettingError } from '../errors'
import { isSetting, type Setting } from '../setting/setting'
import type { SettingValue } from '../setting/value-kinds'

export type NamespaceEntry = Setting | NamespaceNode

export interface ResolvedPath {
  /** Namespace that holds (or would hold) the last segment */
  parent: NamespaceNode
  /** Last path segment */
  name: string
}

export interface BindOptions {
  /**
   * Host class declaring the setting. A class may replace a Setting it
   * declared itself, so that redefinitions of the same class rebind cleanly.
   */
  redeclaredBy?: object
}

export class NamespaceNode {
  /** Full path of this node from the root ('' for the root itself) */
  readonly path: string
  readonly separator: string

  private readonly entryMap = new Map<string, NamespaceEntry>()
  private readonly owners = new Map<string, object>()
  private readonly root: NamespaceNode

  constructor(separator: string, path: string = '', root?: NamespaceNode) {
    this.separator = separator
    this.path = path
    this.root = root ?? this
  }

  // ==========================================================================
  // Single-segment operations
  // ==========================================================================

  /**
   * Get or create the child namespace called name.
   * @throws {PathConflictError} if name is bound to a Setting
   */
  child(name: string): NamespaceNode {
    this.assertSegment(name)
    const existing = this.entryMap.get(name)
    if (existing instanceof NamespaceNode) return existing
    if (existing !== undefined) {
      throw new PathConflictError(this.qualify(name), 'a setting cannot be used as a namespace')
    }

    const node = new NamespaceNode(this.separator, this.qualify(name), this.root)
    this.entryMap.set(name, node)
    return node
  }

  /**
   * Bind a Setting under name.
   *
   * Rebinding the same Setting object is a no-op. A different Setting fails
   * with AlreadyBoundError unless options.redeclaredBy owns the current one.
   */
  bind<S extends Setting>(name: string, value: S, options?: BindOptions): S
  bind(name: string, value: unknown, options?: BindOptions): Setting
  bind(name: string, value: unknown, options: BindOptions = {}): Setting {
    const path = this.qualify(name)
    if (!isSetting(value)) {
      throw new NotASettingError(path, value)
    }
    this.assertSegment(name)

    const existing = this.entryMap.get(name)
    if (existing instanceof NamespaceNode) {
      throw new PathConflictError(path, 'a namespace cannot be replaced by a setting')
    }
    if (existing === value) return value

    const owner = this.owners.get(name)
    if (existing !== undefined) {
      if (options.redeclaredBy === undefined || options.redeclaredBy !== owner) {
        throw new AlreadyBoundError(path)
      }
    }

    this.entryMap.set(name, value)
    if (options.redeclaredBy !== undefined) {
      this.owners.set(name, options.redeclaredBy)
    } else {
      this.owners.delete(name)
    }
    this.root.didBind(path, value, existing)
    return value
  }

  lookup(name: string): NamespaceEntry | undefined {
    return this.entryMap.get(name)
  }

  has(name: string): boolean {
    return this.entryMap.has(name)
  }

  /** Host class that declared the Setting bound at name, if any */
  ownerOf(name: string): object | undefined {
    return this.owners.get(name)
  }

  get size(): number {
    return this.entryMap.size
  }

  isEmpty(): boolean {
    return this.entryMap.size === 0
  }

  names(): string[] {
    return Array.from(this.entryMap.keys())
  }

  entries(): Array<[string, NamespaceEntry]> {
    return Array.from(this.entryMap.entries())
  }

  // ==========================================================================
  // Path operations
  // ==========================================================================

  /**
   * Split a separated path and walk to the namespace holding its last segment.
   *
   * With createMissing, intermediate namespaces are created on the way;
   * otherwise undefined is returned when one is missing.
   *
   * @throws {PathConflictError} for empty segments, or when an intermediate
   * segment is bound to a Setting
   */
  resolvePath(dottedName: string, createMissing?: true): ResolvedPath
  resolvePath(dottedName: string, createMissing: boolean): ResolvedPath | undefined
  resolvePath(dottedName: string, createMissing: boolean = true): ResolvedPath | undefined {
    const segments = dottedName.split(this.separator)
    for (const segment of segments) {
      if (segment.length === 0) {
        throw new PathConflictError(this.qualify(dottedName), 'empty path segment')
      }
    }

    const name = segments.pop() ?? dottedName
    let parent: NamespaceNode = this
    for (const segment of segments) {
      const entry = parent.lookup(segment)
      if (entry instanceof NamespaceNode) {
        parent = entry
      } else if (entry !== undefined) {
        throw new PathConflictError(parent.qualify(segment), 'a setting cannot be used as a namespace')
      } else if (createMissing) {
        parent = parent.child(segment)
      } else {
        return undefined
      }
    }
    return { parent, name }
  }

  /** Get or create the namespace at a separated path. */
  namespaceAt(dottedName: string): NamespaceNode {
    const { parent, name } = this.resolvePath(dottedName)
    return parent.child(name)
  }

  /** Create the intermediate namespaces of path and bind setting at its end. */
  register<S extends Setting>(dottedName: string, setting: S, options?: BindOptions): S {
    const { parent, name } = this.resolvePath(dottedName)
    return parent.bind(name, setting, options)
  }

  /** Entry at a separated path, or undefined when any segment is missing. */
  find(dottedName: string): NamespaceEntry | undefined {
    const resolved = this.resolvePath(dottedName, false)
    return resolved?.parent.lookup(resolved.name)
  }

  /**
   * The Setting at a separated path.
   * @throws {UnknownSettingError} when nothing is bound there
   * @throws {PathConflictError} when the path names a namespace
   */
  getSetting(dottedName: string): Setting {
    const entry = this.find(dottedName)
    if (entry === undefined) {
      throw new UnknownSettingError(this.qualify(dottedName))
    }
    if (entry instanceof NamespaceNode) {
      throw new PathConflictError(entry.path, 'a namespace is not a setting')
    }
    return entry
  }

  // ==========================================================================
  // Traversal
  // ==========================================================================

  /** Depth-first [path, Setting] pairs, in binding order */
  *walk(): Generator<[string, Setting]> {
    for (const [name, entry] of this.entryMap) {
      if (entry instanceof NamespaceNode) {
        yield* entry.walk()
      } else {
        yield [this.qualify(name), entry]
      }
    }
  }

  /** Nested plain mapping of current values */
  toValues(): Record<string, SettingValue> {
    const values: Record<string, SettingValue> = {}
    for (const [name, entry] of this.entryMap) {
      values[name] = entry instanceof NamespaceNode ? entry.toValues() : entry.value
    }
    return values
  }

  /** Full path of a name bound directly under this node */
  qualify(name: string): string {
    return this.path === '' ? name : `${this.path}${this.separator}${name}`
  }

  toString(): string {
    return `NamespaceNode(${this.path === '' ? '<root>' : this.path})`
  }

  // ==========================================================================
  // Hooks
  // ==========================================================================

  /** Called on the root after every successful bind */
  protected didBind(_path: string, _setting: Setting, _replaced: Setting | undefined): void {}

  /** Drop every binding below this node */
  protected clearEntries(): void {
    this.entryMap.clear()
    this.owners.clear()
  }

  private assertSegment(name: string): void {
    if (name.length === 0) {
      throw new PathConflictError(this.qualify(name), 'empty path segment')
    }
    if (name.includes(this.separator)) {
      throw new PathConflictError(this.qualify(name), `names cannot contain '${this.separator}'`)
    }
  }
}

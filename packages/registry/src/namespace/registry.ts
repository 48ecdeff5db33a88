import { resolveRegistryOptions, type RegistryOptions } from '../config/registry-options'
import { SettingsLoader, type UpdateOptions, type UpdateResult } from '../bulk/loader'
import { encodeTree, type SettingsFormat } from '../io/codecs'
import {
  basicLogger,
  createFilter,
  randomRegistryId,
  withScopeAndFiltering,
  type ILoggableComponent,
  type ILoggingRegistry,
  type LogEntry,
  type Logger,
  type LoggingConfig,
  type ShouldLogFn,
} from '../logging/logger'
import { settingLocations, type Setting } from '../setting/setting'
import { formatValue } from '../utils/format-value'
import { NamespaceNode } from './namespace-node'

export interface RegistryInit extends Partial<RegistryOptions> {
  /** Sink for log lines (defaults to console) */
  logger?: Logger
  /** Restrict logging to some component names */
  includeComponents?: string[]
  excludeComponents?: string[]
  /** Called for every log entry that passes the filter */
  onLog?: (entry: LogEntry) => void
}

/**
 * Root of the settings tree.
 *
 * A process normally has one, obtained through getRegistry(); tests and
 * embedders can construct their own and pass it where a registry is taken.
 */
export class Registry extends NamespaceNode implements ILoggingRegistry, ILoggableComponent {
  readonly registryId: string
  readonly options: RegistryOptions

  private readonly baseLogger: Logger
  private filterFn: ShouldLogFn
  private onLogCallback?: (entry: LogEntry) => void
  private readonly logger: Logger
  private readonly loader: SettingsLoader

  // ILoggableComponent implementation
  static logName = 'registry'
  getLogName(): string {
    return Registry.logName
  }
  getStaticLogName(): string {
    return Registry.logName
  }
  get registryInstance(): ILoggingRegistry {
    return this
  }

  constructor(init: RegistryInit = {}) {
    const options = resolveRegistryOptions(init)
    super(options.separator)
    this.options = options

    this.registryId = randomRegistryId()
    this.baseLogger = init.logger ?? basicLogger()
    this.onLogCallback = init.onLog
    this.filterFn = createFilter({
      level: options.logLevel,
      includeComponents: init.includeComponents,
      excludeComponents: init.excludeComponents,
    })

    this.logger = this.scopedLoggerFor(this)
    this.loader = new SettingsLoader(this, this)
  }

  scopedLoggerFor(component: ILoggableComponent): Logger {
    // Wrapper reads the current filterFn so setLoggingConfig applies to existing loggers
    return withScopeAndFiltering(this.baseLogger, component, (level, ctx) => this.filterFn(level, ctx), {
      onCapture: (entry) => this.onLogCallback?.(entry),
    })
  }

  /**
   * Update logging configuration dynamically.
   * Takes effect immediately for all components.
   */
  setLoggingConfig(config: LoggingConfig): void {
    this.filterFn = createFilter(config)
    this.logger.info('Logging config updated', { level: config.level })
  }

  // ==========================================================================
  // Bulk operations
  // ==========================================================================

  /**
   * Apply a mapping of values to existing settings.
   * Keys are separated paths or nested mappings shaped like the tree.
   */
  update(mapping: Readonly<Record<string, unknown>>, options?: UpdateOptions): UpdateResult {
    return this.loader.update(mapping, options)
  }

  /** Decode a YAML or TOML document and apply it with update(). */
  load(source: string, format: SettingsFormat, options?: UpdateOptions): UpdateResult {
    return this.loader.load(source, format, options)
  }

  /** Current values as a YAML or TOML document, descriptions as comments. */
  encode(format: SettingsFormat): string {
    return encodeTree(this, format, { indent: this.options.yamlIndent, logger: this.logger })
  }

  /** Discard every namespace and setting, with their recorded locations. */
  reset(): void {
    const count = this.size
    for (const [, setting] of this.walk()) {
      settingLocations.forget(setting)
    }
    this.clearEntries()
    this.logger.info(`Registry reset (${count} top-level entries dropped)`)
  }

  toString(): string {
    return `Registry(${this.registryId})`
  }

  protected didBind(path: string, setting: Setting, replaced: Setting | undefined): void {
    if (replaced) {
      settingLocations.forget(replaced)
      this.logger.info(`Redeclared ${path}: ${formatValue(replaced.value)} -> ${formatValue(setting.value)}`)
    } else {
      this.logger.debug(`Bound ${path} = ${formatValue(setting.value)}`)
    }
  }
}

// ============================================================================
// Process-wide instance
// ============================================================================

let globalRegistry: Registry | undefined

/** The process-wide registry, created on first use. */
export function getRegistry(): Registry {
  if (!globalRegistry) {
    globalRegistry = new Registry()
  }
  return globalRegistry
}

/** Empty the process-wide registry. Mainly for tests. */
export function resetRegistry(): void {
  globalRegistry?.reset()
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
}

export interface LogEntry {
  timestamp: number
  level: LogLevel
  message: string
  args: unknown[]
}

export interface LoggingConfig {
  level: LogLevel
  includeComponents?: string[] // e.g. ["registry", "loader"]
  excludeComponents?: string[]
}

export interface LogContext {
  component: string
  name: string
  registryId: string
}

export type ShouldLogFn = (level: LogLevel, context: LogContext) => boolean

export interface ILoggableComponent {
  getLogName(): string
  getStaticLogName(): string
  registryInstance: ILoggingRegistry
}

export interface ILoggingRegistry {
  registryId: string
  scopedLoggerFor(component: ILoggableComponent): Logger
}

export class RegistryComponent implements ILoggableComponent {
  protected registryHost: ILoggingRegistry

  public get registryInstance(): ILoggingRegistry {
    return this.registryHost
  }

  // Required: stable identifier for each component class
  static logName: string = 'component'

  // Optional per-instance override
  protected instanceLogName?: string
  private _logger?: Logger

  constructor(registryHost: ILoggingRegistry) {
    this.registryHost = registryHost

    if (!this.componentClass.logName) {
      throw new Error(`RegistryComponent subclass missing static logName: ${this.componentClass.name}`)
    }
  }

  protected get logger(): Logger {
    if (!this._logger) {
      this._logger = this.registryHost.scopedLoggerFor(this)
    }
    return this._logger
  }

  getLogName(): string {
    return this.instanceLogName ?? this.getStaticLogName()
  }

  getStaticLogName(): string {
    return this.componentClass.logName ?? 'component'
  }

  private get componentClass(): { logName?: string; name: string } {
    return this.constructor
  }
}

export function buildInjectedContext(component: ILoggableComponent): LogContext {
  return {
    component: component.getStaticLogName(),
    name: component.getLogName(),
    registryId: component.registryInstance.registryId,
  }
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

export function passesLevel(msgLevel: LogLevel, configLevel: LogLevel): boolean {
  return LEVEL_PRIORITY[msgLevel] >= LEVEL_PRIORITY[configLevel]
}

export function createFilter(cfg: LoggingConfig): ShouldLogFn {
  return (level, ctx) => {
    if (!passesLevel(level, cfg.level)) return false

    const comp = ctx.component
    if (cfg.excludeComponents?.includes(comp)) return false
    if (cfg.includeComponents && !cfg.includeComponents.includes(comp)) return false

    return true
  }
}

const NOOP = () => {}

export interface ScopedLoggerOptions {
  /** Receives every entry that passes the filter */
  onCapture?: (entry: LogEntry) => void
}

export function withScopeAndFiltering(
  base: Logger,
  component: ILoggableComponent,
  shouldLog: ShouldLogFn,
  options: ScopedLoggerOptions = {},
): Logger {
  const getLogger = (level: LogLevel) => {
    const ctx = buildInjectedContext(component)
    if (!shouldLog(level, ctx)) return NOOP

    const prefix = formatPrefix(ctx)
    const capture = options.onCapture

    // Bound function keeps the caller's frame as the reported call site
    if (!capture) return base[level].bind(base, prefix)

    return (message: string, ...args: unknown[]) => {
      capture({ timestamp: Date.now(), level, message: `${prefix} ${message}`, args })
      base[level](prefix, message, ...args)
    }
  }

  return {
    get debug() {
      return getLogger('debug')
    },
    get info() {
      return getLogger('info')
    },
    get warn() {
      return getLogger('warn')
    },
    get error() {
      return getLogger('error')
    },
  }
}

export function basicLogger(): Logger {
  return console
}

/** Logger that drops everything, for embedding registries quietly */
export function silentLogger(): Logger {
  return { debug: NOOP, info: NOOP, warn: NOOP, error: NOOP }
}

function formatPrefix(ctx: LogContext): string {
  const parts: string[] = []

  let compStr = ctx.component
  compStr = compStr.charAt(0).toUpperCase() + compStr.slice(1)
  parts.push(`${compStr}[${ctx.registryId.slice(0, 4)}]`)

  if (ctx.name && ctx.name !== ctx.component) {
    parts.push(ctx.name)
  }

  return `[${parts.join(':')}]`
}

export function randomRegistryId(): string {
  return Math.random().toString(36).substring(2, 15)
}

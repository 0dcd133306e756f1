/**
 * Loggers for ledger operations
 * @module utils/logger
 */

import type { Logger } from '../types/logger.js'

export type LogLevel = keyof Logger

type LogContext = Record<string, unknown>

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 }

const COMMIT_ID = /^[0-9a-f]{64}$/

/**
 * Shortens commit ids in a log context to their first 12 characters
 */
function compactIds(context: LogContext): LogContext {
  const compact: LogContext = {}
  for (const [key, value] of Object.entries(context)) {
    if (typeof value === 'string' && COMMIT_ID.test(value)) {
      compact[key] = value.slice(0, 12)
    } else if (Array.isArray(value)) {
      compact[key] = value.map((item) => (typeof item === 'string' && COMMIT_ID.test(item) ? item.slice(0, 12) : item))
    } else {
      compact[key] = value
    }
  }
  return compact
}

export interface ConsoleLoggerOptions {
  /** Lowest level written (default: `debug`) */
  level?: LogLevel
}

/**
 * Logger writing `[LEVEL] message` lines to the console, commit ids shortened
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'debug']
  const write =
    (level: LogLevel, sink: (...args: unknown[]) => void) =>
    (message: string, context?: LogContext) => {
      if (LEVEL_ORDER[level] < threshold) return
      const line = `[${level.toUpperCase()}] ${message}`
      if (context === undefined) {
        sink(line)
      } else {
        sink(line, compactIds(context))
      }
    }
  return {
    debug: write('debug', (...args) => console.log(...args)),
    info: write('info', (...args) => console.log(...args)),
    warn: write('warn', (...args) => console.warn(...args)),
    error: write('error', (...args) => console.error(...args)),
  }
}

export const defaultLogger: Logger = createConsoleLogger()

export function createSilentLogger(): Logger {
  const noop = () => {}
  return { debug: noop, info: noop, warn: noop, error: noop }
}

/**
 * Tags messages with the component that wrote them, e.g. `[merge] Merged`
 */
export function createPrefixedLogger(component: string, base: Logger): Logger {
  const prefix = `[${component}]`
  return {
    debug: (message, context) => base.debug(`${prefix} ${message}`, context),
    info: (message, context) => base.info(`${prefix} ${message}`, context),
    warn: (message, context) => base.warn(`${prefix} ${message}`, context),
    error: (message, context) => base.error(`${prefix} ${message}`, context),
  }
}

/**
 * Adds fixed fields, such as the operation id, to every entry. Fields given
 * with an entry take precedence.
 */
export function withLogContext(base: Logger, fields: LogContext): Logger {
  const merge = (context?: LogContext): LogContext => ({ ...fields, ...context })
  return {
    debug: (message, context) => base.debug(message, merge(context)),
    info: (message, context) => base.info(message, merge(context)),
    warn: (message, context) => base.warn(message, merge(context)),
    error: (message, context) => base.error(message, merge(context)),
  }
}

/**
 * Logger that keeps entries in memory, for inspecting what a run reported
 */
export interface RecordingLogger extends Logger {
  entries: Array<{ level: LogLevel; message: string; context?: LogContext }>
}

export function createRecordingLogger(): RecordingLogger {
  const entries: RecordingLogger['entries'] = []
  const push = (level: LogLevel) => (message: string, context?: LogContext) => {
    entries.push({ level, message, context })
  }
  return {
    entries,
    debug: push('debug'),
    info: push('info'),
    warn: push('warn'),
    error: push('error'),
  }
}

import pino from 'pino'

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error'

const LEVEL_ORDER: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
}

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LEVEL_ORDER, value)
}

function resolveLevel(): LogLevel {
  const raw = process.env['LOG_LEVEL'] ?? process.env['PINO_LEVEL']
  return isLogLevel(raw) ? raw : 'info'
}

/**
 * LoggerProvider is a class that provides logging functionality.
 * It is a wrapper around the pino logger.
 * It is a singleton class.
 * @description Before using the logger, it must be initialized with `init()` at the top of the entry point file.
 *
 * Every record goes to stderr: stdout belongs to the running program.
 */
export class LoggerProvider {
  private pino = pino(
    {
      level: resolveLevel(),
    },
    pino.destination({ fd: 2, sync: true }),
  )
  private hasBeenInitialized = false

  get level(): LogLevel {
    return resolveLevel()
  }

  init(level?: LogLevel) {
    if (level) {
      this.pino.level = level
    }
    this.pino.debug('LoggerProvider initialized')
    this.hasBeenInitialized = true
  }

  isLevelEnabled(level: LogLevel): boolean {
    const active = this.hasBeenInitialized ? this.pino.level : this.level
    const threshold = isLogLevel(active) ? LEVEL_ORDER[active] : LEVEL_ORDER.info
    return LEVEL_ORDER[level] >= threshold
  }

  info(message: string, ...args: unknown[]) {
    this._safeLog('info', message, args)
  }

  debug(message: string, ...args: unknown[]) {
    this._safeLog('debug', message, args)
  }

  warn(message: string, ...args: unknown[]) {
    this._safeLog('warn', message, args)
  }

  error(message: string, error?: unknown, ..._args: unknown[]) {
    this._safeLog('error', message, [error, ..._args])
  }

  /**
   * Falls back to console output, filtered by LOG_LEVEL, until init() is called
   */
  private _safeLog(
    level: 'info' | 'debug' | 'warn' | 'error',
    message: string,
    args: unknown[],
  ) {
    if (!this.isLevelEnabled(level)) {
      return
    }

    if (!this.hasBeenInitialized) {
      const timestamp = new Date().toISOString()
      const logMessage = `[${timestamp}] [${level.toUpperCase()}] ${message}`
      console.error(logMessage, ...args)
      return
    }

    if (level === 'error') {
      this.pino.error({ err: args[0], args: args.slice(1) }, message)
    } else {
      this.pino[level]({ args }, message)
    }
  }
}

export const logger = new LoggerProvider()

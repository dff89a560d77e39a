import pino from 'pino'
import { baseEnvSchema, type LogLevel } from '../env'

const LEVEL_ORDER: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
}

function resolveLogLevel(): LogLevel {
  const parsed = baseEnvSchema.safeParse(process.env)
  return parsed.success ? parsed.data.LOG_LEVEL : 'info'
}

/**
 * LoggerProvider is a class that provides logging functionality.
 * It is a wrapper around the pino logger.
 * It is a singleton class.
 * @description Call `init()` once at the top of the entry point of the embedding
 * application. Until then messages go to the console, filtered by `LOG_LEVEL`.
 */
export class LoggerProvider {
  private currentLevel: LogLevel = resolveLogLevel()
  private pino = this.createPino(this.currentLevel)
  private hasBeenInitialized = false

  get hasBeenInitializedValue() {
    return this.hasBeenInitialized
  }

  get level(): LogLevel {
    return this.currentLevel
  }

  init(level?: LogLevel) {
    if (level && level !== this.currentLevel) {
      this.currentLevel = level
      this.pino = this.createPino(level)
    }
    this.pino.info('LoggerProvider initialized')
    this.hasBeenInitialized = true
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.currentLevel]
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

  private createPino(level: LogLevel) {
    return pino(
      { level },
      pino.multistream([
        { level: 'error', stream: process.stderr },
        { level: 'fatal', stream: process.stderr },
        { level: 'trace', stream: process.stdout },
      ]),
    )
  }

  private _safeLog(
    level: 'info' | 'debug' | 'warn' | 'error',
    message: string,
    args: unknown[],
  ) {
    if (!this.hasBeenInitialized) {
      if (!this.isLevelEnabled(level)) return

      const timestamp = new Date().toISOString()
      const logMessage = `[${timestamp}] [${level.toUpperCase()}] ${message}`

      if (level === 'error') {
        console.error(logMessage, ...args)
      } else if (level === 'warn') {
        console.warn(logMessage, ...args)
      } else if (level === 'debug') {
        console.debug(logMessage, ...args)
      } else {
        console.log(logMessage, ...args)
      }
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

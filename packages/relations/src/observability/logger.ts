/**
 * Structured logging for collection and relation construction
 */

import { LOG_LEVELS, loadConfigOrDefault, type LogLevel, type TransitModelConfig } from '../config'

export interface LogEntry {
  timestamp: string
  level: LogLevel
  event: string
  /** Collection or relation the event is about */
  subject?: string
  message?: string
  details?: Record<string, unknown>
}

export class Logger {
  #minLevel: LogLevel
  #enabled: boolean

  constructor(config: Partial<TransitModelConfig> = {}) {
    this.#minLevel = config.logLevel ?? 'info'
    this.#enabled = config.logEnabled ?? true
  }

  /**
   * Create a logger configured from environment variables.
   * Invalid settings are reported once and replaced by defaults.
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): Logger {
    const { config, error } = loadConfigOrDefault(env)
    const logger = new Logger(config)
    if (error) {
      logger.warn('config.invalid', { message: error.message })
    }
    return logger
  }

  private shouldLog(level: LogLevel): boolean {
    return this.#enabled && LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.#minLevel)
  }

  log(level: LogLevel, event: string, data?: Partial<LogEntry>): void {
    if (!this.shouldLog(level)) return

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      event,
      ...data,
    }

    const parts = [`[${entry.timestamp}] [${level.toUpperCase()}] [${event}]`]
    if (entry.subject) {
      parts.push(entry.subject)
    }
    if (entry.message) {
      parts.push(entry.message)
    }
    if (entry.details) {
      parts.push(JSON.stringify(entry.details))
    }

    const line = parts.join(' ')
    switch (level) {
      case 'debug':
        console.debug(line)
        break
      case 'info':
        console.log(line)
        break
      case 'warn':
        console.warn(line)
        break
      case 'error':
        console.error(line)
        break
    }
  }

  debug(event: string, data?: Partial<LogEntry>): void {
    this.log('debug', event, data)
  }

  info(event: string, data?: Partial<LogEntry>): void {
    this.log('info', event, data)
  }

  warn(event: string, data?: Partial<LogEntry>): void {
    this.log('warn', event, data)
  }

  error(event: string, data?: Partial<LogEntry>): void {
    this.log('error', event, data)
  }

  setLevel(level: LogLevel): void {
    this.#minLevel = level
  }

  setEnabled(enabled: boolean): void {
    this.#enabled = enabled
  }
}

/**
 * Global logger instance
 */
export const logger = Logger.fromEnv()

/**
 * Simple Frontend Logger
 *
 * Writes structured entries to the browser console. Debug entries are only
 * emitted in development.
 */

export type LogLevel = 'debug' | 'info' | 'warning' | 'error'

export interface LogEntry {
  level: LogLevel
  category: string
  action: string
  message: string
  error?: {
    type: string
    message: string
    stack?: string
  }
  details?: Record<string, unknown>
  sessionId: string
  timestamp: string
}

export interface LogOptions {
  error?: LogEntry['error']
  details?: LogEntry['details']
}

type ConsoleSink = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>

const SINK_METHOD: Record<LogLevel, keyof ConsoleSink> = {
  debug: 'debug',
  info: 'info',
  warning: 'warn',
  error: 'error',
}

export class FrontendLogger {
  readonly sessionId: string

  constructor(
    private readonly sink: ConsoleSink = console,
    private readonly verbose: boolean = import.meta.env.DEV
  ) {
    this.sessionId = `session-${Date.now()}-${Math.random().toString(36).slice(2, 11)}`
  }

  log(level: LogLevel, category: string, action: string, message: string, options?: LogOptions): LogEntry {
    const entry: LogEntry = {
      level,
      category,
      action,
      message,
      sessionId: this.sessionId,
      timestamp: new Date().toISOString(),
      ...options,
    }

    if (level !== 'debug' || this.verbose) {
      this.sink[SINK_METHOD[level]](`[${level}] [${category}] ${message}`, entry)
    }

    return entry
  }

  error(category: string, action: string, message: string, options?: LogOptions): LogEntry {
    return this.log('error', category, action, message, options)
  }

  info(category: string, action: string, message: string, options?: Pick<LogOptions, 'details'>): LogEntry {
    return this.log('info', category, action, message, options)
  }

  warning(category: string, action: string, message: string, options?: Pick<LogOptions, 'details'>): LogEntry {
    return this.log('warning', category, action, message, options)
  }

  debug(category: string, action: string, message: string, options?: Pick<LogOptions, 'details'>): LogEntry {
    return this.log('debug', category, action, message, options)
  }
}

export const logger = new FrontendLogger()

/**
 * Debug logging utility for canopy
 *
 * Enable with CANOPY_DEBUG=true (or `debug: true` in .canopyrc).
 * Set CANOPY_LOG_FILE to send every line to a file instead of the console,
 * which keeps the full-screen UI intact.
 */

import * as fs from 'fs'

type LogLevel = 'debug' | 'info' | 'warn' | 'error'

interface DebugOptions {
  /** Component/module name for prefixing */
  prefix: string
  /** Whether to include timestamps */
  timestamp?: boolean
}

export interface LoggingSettings {
  debug: boolean
  logFile: string | null
}

const settings: LoggingSettings = {
  debug: process.env['CANOPY_DEBUG'] === 'true',
  logFile: process.env['CANOPY_LOG_FILE'] ?? null,
}

/** Environment variables win over whatever is passed here */
export function configureLogging(next: Partial<LoggingSettings>): void {
  if (next.debug !== undefined && process.env['CANOPY_DEBUG'] === undefined) {
    settings.debug = next.debug
  }
  if (next.logFile !== undefined && process.env['CANOPY_LOG_FILE'] === undefined) {
    settings.logFile = next.logFile
  }
}

class DebugLogger {
  private prefix: string
  private timestamp: boolean

  constructor(options: DebugOptions) {
    this.prefix = options.prefix
    this.timestamp = options.timestamp ?? true
  }

  private formatMessage(level: LogLevel, message: string, data?: unknown): string {
    const ts = this.timestamp ? `[${new Date().toISOString()}]` : ''
    const levelTag = `[${level.toUpperCase()}]`
    const prefixTag = `[${this.prefix}]`

    let formatted = `${ts}${levelTag}${prefixTag} ${message}`
    if (data !== undefined) {
      try {
        const dataStr = data instanceof Error
          ? data.stack ?? data.message
          : typeof data === 'object' ? JSON.stringify(data, null, 2) : String(data)
        formatted += `\n${dataStr}`
      } catch {
        formatted += `\n[Unserializable data]`
      }
    }
    return formatted
  }

  private write(level: LogLevel, message: string, data?: unknown): void {
    const line = this.formatMessage(level, message, data)
    if (settings.logFile) {
      fs.appendFileSync(settings.logFile, `${line}\n`)
      return
    }
    if (level === 'warn') console.warn(line)
    else if (level === 'error') console.error(line)
    else console.log(line)
  }

  debug(message: string, data?: unknown): void {
    if (!settings.debug) return
    this.write('debug', message, data)
  }

  info(message: string, data?: unknown): void {
    if (!settings.debug) return
    this.write('info', message, data)
  }

  warn(message: string, data?: unknown): void {
    this.write('warn', message, data)
  }

  error(message: string, data?: unknown): void {
    this.write('error', message, data)
  }

  /** Log a state change */
  state(stateName: string, oldValue: unknown, newValue: unknown): void {
    if (!settings.debug) return
    this.debug(`State change: ${stateName}`, { old: oldValue, new: newValue })
  }

  /** Create a child logger with additional prefix */
  child(childPrefix: string): DebugLogger {
    return new DebugLogger({
      prefix: `${this.prefix}:${childPrefix}`,
      timestamp: this.timestamp,
    })
  }
}

/** Create a debug logger for a component/module */
export function createDebugLogger(prefix: string): DebugLogger {
  return new DebugLogger({ prefix })
}

export type { DebugLogger }

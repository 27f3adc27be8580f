/**
 * Leveled logger writing through the console, with an optional log file.
 * Library code takes a Logger argument and defaults to the silent one.
 */

import { appendFileSync, writeFileSync } from 'node:fs'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const LEVEL_ORDER: LogLevel[] = ['debug', 'info', 'warn', 'error']

export interface Logger {
  debug(message: string): void
  info(message: string): void
  warn(message: string): void
  error(message: string): void
}

export interface LoggerOptions {
  level: LogLevel
  /** Log file, truncated when the logger is created */
  filePath?: string
  /** Defaults to the global console */
  console?: Pick<Console, 'debug' | 'info' | 'warn' | 'error'>
  now?: () => Date
}

const pad = (n: number) => String(n).padStart(2, '0')

function clockTime(d: Date): string {
  return `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`
}

function fullTime(d: Date): string {
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ${clockTime(d)}`
}

/** "12:04:31 | WARN     | message" */
export function formatLogLine(level: LogLevel, message: string, time: string): string {
  return `${time} | ${level.toUpperCase().padEnd(8)} | ${message}`
}

export function createLogger(options: LoggerOptions): Logger {
  const out = options.console ?? console
  const now = options.now ?? (() => new Date())
  const threshold = LEVEL_ORDER.indexOf(options.level)
  const filePath = options.filePath
  if (filePath) writeFileSync(filePath, '', 'utf-8')

  const write = (level: LogLevel, message: string) => {
    if (LEVEL_ORDER.indexOf(level) < threshold) return
    const time = now()
    out[level](formatLogLine(level, message, clockTime(time)))
    if (filePath) appendFileSync(filePath, formatLogLine(level, message, fullTime(time)) + '\n', 'utf-8')
  }

  return {
    debug: (m) => write('debug', m),
    info: (m) => write('info', m),
    warn: (m) => write('warn', m),
    error: (m) => write('error', m),
  }
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
}

/**
 * @file logging.ts
 * @description
 * Console logging with timestamps, elapsed time since the previous line and
 * per-scope switches. A logger created without a level is silent.
 */

import type { LogLevel } from './types.js'

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
}

let lastLogTime = performance.now()

// Per-scope overrides; scopes not listed follow `default`
const loggingConfig: { [scope: string]: boolean } = { default: true }

export function configureLogging(overrides: { [scope: string]: boolean }): void {
  Object.assign(loggingConfig, overrides)
}

export interface Logger {
  debug: (message: string, ...args: unknown[]) => void
  info: (message: string, ...args: unknown[]) => void
  warn: (message: string, ...args: unknown[]) => void
  error: (message: string, ...args: unknown[]) => void
}

const safeFormat = (val: unknown): unknown => {
  if (typeof val === 'bigint') return `${val}n`
  if (typeof val === 'object' && val !== null) {
    try {
      return JSON.stringify(val)
    } catch {
      return '[unserializable object]'
    }
  }
  return val
}

export function createLogger(scope: string, level?: LogLevel): Logger {
  const emit = (at: LogLevel, message: string, args: unknown[]): void => {
    if (level === undefined || LEVEL_ORDER[at] < LEVEL_ORDER[level]) return
    const enabled = loggingConfig[scope] ?? loggingConfig.default
    if (!enabled) return

    const now = performance.now()
    const elapsed = (now - lastLogTime) / 1000
    lastLogTime = now

    const line = `[${new Date().toISOString()}] [${elapsed.toFixed(3)}s] [${scope}] [${at}] ${message}`
    const sink = at === 'error' ? console.error : at === 'warn' ? console.warn : console.log
    sink(line, ...args.map(safeFormat))
  }

  return {
    debug: (message, ...args) => emit('debug', message, args),
    info: (message, ...args) => emit('info', message, args),
    warn: (message, ...args) => emit('warn', message, args),
    error: (message, ...args) => emit('error', message, args)
  }
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const styles: Record<LogLevel, { label: string; ansi: string; rank: number }> = {
  debug: { label: 'DEBUG', ansi: '\x1b[34m', rank: 10 },
  info: { label: 'INFO', ansi: '\x1b[32m', rank: 20 },
  warn: { label: 'WARN', ansi: '\x1b[33m', rank: 30 },
  error: { label: 'ERROR', ansi: '\x1b[31m', rank: 40 }
}

let minimumLevel: LogLevel = 'info'

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(styles, value)
}

/**
 * Sets the lowest level that reaches the console. Called once at startup
 * with the resolved run configuration.
 */
export function setLogLevel(level: LogLevel): void {
  minimumLevel = level
}

function enabled(level: LogLevel): boolean {
  return styles[level].rank >= styles[minimumLevel].rank
}

function format(level: LogLevel, message: unknown, args: unknown[]): unknown[] {
  const style = styles[level]
  return [`${style.ansi}[${style.label}]\x1b[0m`, message, ...args]
}

export const log = {
  info: (message: unknown, ...args: unknown[]) => {
    if (enabled('info')) console.info(...format('info', message, args))
  },
  warn: (message: unknown, ...args: unknown[]) => {
    if (enabled('warn')) console.warn(...format('warn', message, args))
  },
  error: (message: unknown, ...args: unknown[]) => {
    if (enabled('error')) console.error(...format('error', message, args))
  },
  debug: (message: unknown, ...args: unknown[]) => {
    if (enabled('debug')) console.debug(...format('debug', message, args))
  }
}

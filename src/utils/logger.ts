export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

let currentLevel: LogLevel = 'info'

export function setLogLevel(level: LogLevel): void {
  currentLevel = level
}

export function getLogLevel(): LogLevel {
  return currentLevel
}

function shouldLog(level: LogLevel): boolean {
  return LEVELS[level] >= LEVELS[currentLevel]
}

function timestamp(): string {
  return new Date().toISOString()
}

export interface Logger {
  debug(msg: string, data?: unknown): void
  info(msg: string, data?: unknown): void
  warn(msg: string, data?: unknown): void
  error(msg: string, data?: unknown): void
  child(component: string): Logger
}

// stdout belongs to the MCP stdio transport, so everything goes to stderr
function write(level: LogLevel, scope: string | null, msg: string, data: unknown): void {
  if (!shouldLog(level)) return
  const prefix = scope ? `[${timestamp()}] ${level.toUpperCase()} (${scope}):` : `[${timestamp()}] ${level.toUpperCase()}:`
  console.error(`${prefix} ${msg}`, data !== undefined ? data : '')
}

function createLogger(scope: string | null): Logger {
  return {
    debug: (msg, data) => write('debug', scope, msg, data),
    info: (msg, data) => write('info', scope, msg, data),
    warn: (msg, data) => write('warn', scope, msg, data),
    error: (msg, data) => write('error', scope, msg, data),
    child: (component) => createLogger(scope ? `${scope}.${component}` : component),
  }
}

export const logger: Logger = createLogger(null)

// ============================================================================
// Logging
// ============================================================================

export type LogMeta = Record<string, unknown>

/** Four-level logger injected by the caller. */
export interface Logger {
  debug(message: string, meta?: LogMeta): void
  info(message: string, meta?: LogMeta): void
  warn(message: string, meta?: LogMeta): void
  error(message: string, meta?: LogMeta): void
}

export type LogLevel = keyof Logger

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

export const nopLogger: Logger = {
  debug() { },
  info() { },
  warn() { },
  error() { },
}

export function isLogLevel(value: string): value is LogLevel {
  return (LEVELS as readonly string[]).includes(value)
}

function formatMeta(meta: LogMeta | undefined): string {
  if (!meta) return ''
  const parts = Object.entries(meta).map(([key, value]) =>
    `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`)
  return parts.length > 0 ? ` ${parts.join(' ')}` : ''
}

/**
 * Line logger that writes `[LEVEL] message key=value ...` to stderr, dropping
 * anything below `minLevel`.
 */
export function consoleLogger(
  minLevel: LogLevel = 'info',
  write: (line: string) => void = (line) => { process.stderr.write(line) },
): Logger {
  const threshold = LEVELS.indexOf(minLevel)
  const emit = (level: LogLevel) => (message: string, meta?: LogMeta) => {
    if (LEVELS.indexOf(level) < threshold) return
    write(`[${level.toUpperCase()}] ${message}${formatMeta(meta)}\n`)
  }
  return {
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
  }
}

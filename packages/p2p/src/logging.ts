import { createLogger, format, type Logger, transports } from 'winston'

export type { Logger }

export type LogLevel = 'error' | 'warn' | 'info' | 'debug'

export interface LoggerOptions {
  logLevel?: LogLevel
  /** Label prefixed to each line */
  label?: string
  silent?: boolean
}

const lineFormat = format.printf(({ level, message, timestamp, label }) => {
  const prefix = typeof label === 'string' ? `[${label}] ` : ''
  return `${String(timestamp)} ${level} ${prefix}${String(message)}`
})

/**
 * Console logger used by the coordinator and the CLI. Module internals log
 * through `debug` namespaces instead.
 */
export function getLogger(options: LoggerOptions = {}): Logger {
  return createLogger({
    level: options.logLevel ?? 'info',
    silent: options.silent ?? false,
    format: format.combine(
      format.label({ label: options.label ?? 'p2p' }),
      format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      format.errors({ stack: false }),
      lineFormat,
    ),
    transports: [new transports.Console()],
  })
}

import pino, { type Logger } from 'pino'
import type { LoggingConfig } from '../schemas/app-config.js'

export type { Logger } from 'pino'

export function createLogger(config: LoggingConfig): Logger {
  const usePretty =
    config.pretty || process.env.NODE_ENV !== 'production'

  return pino({
    name: 'idmatch',
    level: config.level,
    ...(usePretty && config.level !== 'silent'
      ? { transport: { target: 'pino-pretty' } }
      : {}),
  })
}

/** Logger that discards everything; used where a caller supplies none. */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' })
}

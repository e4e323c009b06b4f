import pino, { type Logger } from 'pino'
import type { LoggingConfig } from '../schemas/index-config.js'

export type { Logger } from 'pino'

export function createLogger(
  config: LoggingConfig,
  bindings?: Record<string, unknown>,
): Logger {
  const usePretty =
    config.pretty || process.env.NODE_ENV !== 'production'

  const logger = pino({
    level: config.level,
    ...(usePretty
      ? { transport: { target: 'pino-pretty' } }
      : {}),
  })

  return bindings ? logger.child(bindings) : logger
}

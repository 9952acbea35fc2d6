import pino, { type Logger } from 'pino'
import type { LoggingConfig } from '../schemas/server-config.js'

export type { Logger } from 'pino'

export function createLogger(
  config: LoggingConfig,
  bindings?: Record<string, string>,
): Logger {
  const usePretty =
    config.pretty || process.env.NODE_ENV !== 'production'

  return pino({
    level: config.level,
    ...(bindings ? { base: { pid: process.pid, ...bindings } } : {}),
    ...(usePretty
      ? { transport: { target: 'pino-pretty' } }
      : {}),
  })
}

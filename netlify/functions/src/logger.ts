import winston from 'winston'
import { loadConfig } from './config.js'
import type { LogLevel } from './config.js'

const levels = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
}

const format = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf((info) => {
    const { timestamp, level, message, ...meta } = info
    const extra = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : ''
    return `${String(timestamp)} ${level}: ${String(message)}${extra}`
  }),
)

/**
 * Level from the environment. A bad configuration must not stop the logger
 * from loading, so it falls back to `info`; the request path reports the
 * configuration error itself.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  try {
    return loadConfig(env).logLevel
  } catch {
    return 'info'
  }
}

const logger = winston.createLogger({
  level: resolveLogLevel(),
  levels,
  format,
  transports: [new winston.transports.Console()],
  silent: process.env.NODE_ENV === 'test',
})

export interface Logger {
  error: (message: string, meta?: Record<string, unknown>) => void
  warn: (message: string, meta?: Record<string, unknown>) => void
  info: (message: string, meta?: Record<string, unknown>) => void
  debug: (message: string, meta?: Record<string, unknown>) => void
}

/**
 * Logger scoped to one module; messages are prefixed with the service name.
 */
export function createLogger(service: string): Logger {
  return {
    error: (message, meta) => {
      logger.error(`${service}: ${message}`, meta)
    },
    warn: (message, meta) => {
      logger.warn(`${service}: ${message}`, meta)
    },
    info: (message, meta) => {
      logger.info(`${service}: ${message}`, meta)
    },
    debug: (message, meta) => {
      logger.debug(`${service}: ${message}`, meta)
    },
  }
}

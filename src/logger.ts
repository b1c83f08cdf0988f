import { pino, type Logger as PinoLogger } from 'pino'

export interface Logger {
  info(obj: object, msg?: string): void
  warn(obj: object, msg?: string): void
  error(obj: object, msg?: string): void
  debug(obj: object, msg?: string): void
}

export type { PinoLogger }

const noopFn = () => {}

const noopLogger: Logger = {
  info: noopFn,
  warn: noopFn,
  error: noopFn,
  debug: noopFn
}

export function createNoopLogger(): Logger {
  return noopLogger
}

export function createLogger(name: string, level: string = process.env.LOG_LEVEL ?? 'info'): PinoLogger {
  return pino({
    name,
    level,
    formatters: {
      level: (label: string) => ({ level: label })
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: {
      paths: [
        'authToken',
        '*.authToken',
        '*.*.authToken',
        '*.token',
        '*.authorization',
        '*.Authorization',
        '*.apiKey',
        '*.secret',
        '*.password'
      ],
      censor: '[REDACTED]'
    }
  })
}

export const logger = createLogger('credex-chat-agent')

/**
 * Structured logging via pino for mcpmux services.
 */
import pino from 'pino'

export type Logger = pino.Logger

function isTestRun(): boolean {
  return process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined
}

export function createLogger(options: {
  service: string
  level?: string
  pretty?: boolean
}): Logger {
  const level = options.level || process.env.LOG_LEVEL || (isTestRun() ? 'silent' : 'info')
  const pretty = options.pretty ?? (process.env.NODE_ENV !== 'production' && !isTestRun())

  return pino({
    name: options.service,
    level,
    ...(pretty ? { transport: { target: 'pino-pretty', options: { colorize: true } } } : {}),
    base: {
      service: options.service,
      env: process.env.MCPMUX_ENV || process.env.NODE_ENV || 'development',
    },
    redact: {
      paths: ['req.headers.authorization', 'req.headers.cookie', 'headers.authorization', 'env'],
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
      req: pino.stdSerializers.req,
      res: pino.stdSerializers.res,
    },
  })
}

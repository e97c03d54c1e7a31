/**
 * Sentry integration for mcpmux services.
 * Disabled unless a DSN is configured; every helper degrades to console output.
 */
import * as Sentry from '@sentry/node'
import { getMuxEnv, SAMPLING_DEFAULTS } from './conventions'
import { sanitizeErrorForTelemetry } from './sanitize'

let _initialized = false

export interface SentryInitOptions {
  dsn?: string
  serviceName: string
  release?: string
  environment?: string
  tracesSampleRate?: number
}

export function initSentry(options: SentryInitOptions): void {
  if (_initialized) return

  const dsn = options.dsn || process.env.SENTRY_DSN
  if (!dsn) {
    console.warn(`[sentry] No SENTRY_DSN - error tracking disabled for ${options.serviceName}`)
    return
  }

  const environment = options.environment || getMuxEnv()
  const tracesSampleRate = options.tracesSampleRate ?? SAMPLING_DEFAULTS[environment] ?? 0.1

  Sentry.init({
    dsn,
    environment,
    release: options.release || process.env.npm_package_version || 'dev',
    serverName: options.serviceName,
    tracesSampleRate,
    sendDefaultPii: false,

    beforeSend(event) {
      if (event.request?.headers) {
        delete event.request.headers['authorization']
        delete event.request.headers['cookie']
      }
      if (event.breadcrumbs) {
        for (const bc of event.breadcrumbs) {
          if (bc.data) {
            for (const key of Object.keys(bc.data)) {
              const lower = key.toLowerCase()
              if (lower.includes('key') || lower.includes('token') || lower.includes('secret')) {
                bc.data[key] = '[REDACTED]'
              }
            }
          }
        }
      }
      return event
    },
  })

  _initialized = true
  console.log(`[sentry] Initialized for ${options.serviceName} (env=${environment}, sampling=${tracesSampleRate})`)
}

export function captureError(
  error: unknown,
  context?: { service?: string; operation?: string; [key: string]: unknown },
): void {
  if (!_initialized) {
    console.error('[sentry-fallback]', error, context)
    return
  }

  Sentry.withScope((scope) => {
    if (context) {
      if (context.service) scope.setTag('service', context.service)
      if (context.operation) scope.setTag('operation', context.operation)
      scope.setContext('custom', context)
    }
    Sentry.captureException(sanitizeErrorForTelemetry(error))
  })
}

export async function flushSentry(timeoutMs = 2000): Promise<void> {
  if (!_initialized) return
  await Sentry.flush(timeoutMs)
}

export { createLogger } from './logger'
export type { Logger } from './logger'
export { sanitizeErrorForTelemetry, classifyError } from './sanitize'
export { configureHashSalt, hashForTelemetry } from './hash'
export {
  SERVICE_NAMESPACE,
  SERVICE_NAMES,
  SPAN_NAMES,
  ATTR_KEYS,
  SAMPLING_DEFAULTS,
  getMuxEnv,
} from './conventions'
export type { MuxEnvironment } from './conventions'
export { initTracing, getTracer, withSpan, shutdownTracing, SpanStatusCode } from './tracing'
export type { Span } from './tracing'
export { initSentry, captureError, flushSentry } from './sentry'
export type { SentryInitOptions } from './sentry'

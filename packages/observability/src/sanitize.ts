/**
 * Error sanitization for telemetry - strips response bodies and classifies errors safely.
 */

const DANGEROUS_PROPS = ['response', 'data', 'body', 'cause', 'config'] as const

export function sanitizeErrorForTelemetry(err: unknown): Error {
  if (!(err instanceof Error)) return new Error(String(err))

  for (const prop of DANGEROUS_PROPS) {
    if (prop in err && !Reflect.deleteProperty(err, prop)) {
      const safe = new Error(err.message)
      safe.name = err.name
      safe.stack = err.stack
      return safe
    }
  }
  return err
}

export function classifyError(err: unknown): string {
  if (!(err instanceof Error)) return 'unknown_error'
  const msg = err.message.toLowerCase()
  if (msg.includes('timeout') || msg.includes('timed out') || msg.includes('abort')) return 'timeout'
  const status = msg.match(/\b(\d{3})\b/)?.[1]
  if (status) return `status_${status}`
  if (msg.includes('econnrefused') || msg.includes('enotfound') || msg.includes('fetch failed')) return 'network_error'
  if (msg.includes('not connected') || msg.includes('connection closed')) return 'connection_closed'
  if (msg.includes('enoent') || msg.includes('spawn')) return 'process_error'
  if (msg.includes('unauthorized')) return 'auth_error'
  return 'provider_error'
}

import { describe, it, expect } from 'vitest'
import { classifyError, sanitizeErrorForTelemetry } from '../sanitize'

describe('classifyError', () => {
  it('returns unknown_error for non-Error values', () => {
    expect(classifyError('boom')).toBe('unknown_error')
  })

  it('classifies timeouts before status codes', () => {
    expect(classifyError(new Error('Request timed out after 500 ms'))).toBe('timeout')
  })

  it('extracts HTTP status codes', () => {
    expect(classifyError(new Error('Server responded with 502 Bad Gateway'))).toBe('status_502')
  })

  it('classifies network and connection failures', () => {
    expect(classifyError(new Error('connect ECONNREFUSED 127.0.0.1:9'))).toBe('network_error')
    expect(classifyError(new Error('Not connected'))).toBe('connection_closed')
    expect(classifyError(new Error('spawn missing-binary ENOENT'))).toBe('process_error')
  })

  it('falls back to provider_error', () => {
    expect(classifyError(new Error('something odd'))).toBe('provider_error')
  })
})

describe('sanitizeErrorForTelemetry', () => {
  it('wraps non-errors', () => {
    const err = sanitizeErrorForTelemetry(42)
    expect(err).toBeInstanceOf(Error)
    expect(err.message).toBe('42')
  })

  it('strips response bodies from errors', () => {
    const err = Object.assign(new Error('upstream failed'), { body: 'secret payload', response: { status: 500 } })
    const clean = sanitizeErrorForTelemetry(err)
    expect(clean.message).toBe('upstream failed')
    expect('body' in clean).toBe(false)
    expect('response' in clean).toBe(false)
  })
})

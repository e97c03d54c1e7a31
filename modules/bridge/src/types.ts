/**
 * Shared shapes passed between the bridge components.
 */

import type { ParameterSpec } from './capabilities/parameter-spec'

export type SessionState = 'disconnected' | 'connecting' | 'connected' | 'degraded' | 'closed'

export type JsonSchema = Record<string, unknown>

/** A capability as the server advertises it. */
export interface CapabilityInfo {
  name: string
  description: string
  inputSchema: JsonSchema
}

/** A capability as exposed to callers, under its qualified name. */
export interface CapabilityDescriptor {
  qualifiedName: string
  server: string
  name: string
  description: string
  inputSchema: JsonSchema
  parameters: ParameterSpec[]
}

/** Receives capability registrations as servers connect, refresh and go away. */
export interface CapabilitySink {
  register(descriptor: CapabilityDescriptor): void
  unregister(qualifiedNames: string[]): void
}

export type InvokeFailureReason = 'timeout' | 'protocol' | 'transport' | 'unavailable'

export type InvokeOutcome =
  | { ok: true; payload: string }
  | { ok: false; reason: InvokeFailureReason; message: string }

// ── Post-processing ────────────────────────────────────────────────────

export interface PostProcessContext {
  threshold: number
  maxOutputSize: number
  capability: string
  signal: AbortSignal
}

export type PostProcessor = (raw: string, context: PostProcessContext) => Promise<string>

// ── Call trace ─────────────────────────────────────────────────────────

export type CallOutcome = 'success' | 'denied' | 'error'

export interface CallRecord {
  id: string
  capability: string
  server: string | null
  rawCapability: string | null
  identities: string[]
  args: Record<string, unknown>
  startedAt: number
  finishedAt: number
  durationMs: number
  outcome: CallOutcome
  success: boolean
  cacheHit: boolean
  postProcessed: boolean
  errorKind: string | null
  error: string | null
  rawResult: string | null
  processedResult: string | null
}

export interface TraceSink {
  append(record: Readonly<CallRecord>): Promise<void>
}

// ── Pipeline result ────────────────────────────────────────────────────

export interface ToolCallResult {
  capability: string
  server: string | null
  content: string
  cacheHit: boolean
  postProcessed: boolean
  durationMs: number
  traceId: string
}

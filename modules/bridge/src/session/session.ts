/**
 * Session: the single transport connection to one configured server.
 *
 * disconnected ──connect ok──▶ connected ──probe/transport failure──▶ degraded
 *      ▲                           ▲                                     │
 *      │                           └──────────────probe ok───────────────┤
 *      └─────────────────reconnect attempts exhausted────────────────────┘
 *
 * Any state ──disconnect──▶ closed (terminal).
 */

import { ATTR_KEYS, SPAN_NAMES, withSpan } from '@mcpmux/observability'
import type { Logger } from '@mcpmux/observability'

import { errorMessage } from '../errors'
import type { ServerDescriptor } from '../schemas/config'
import type { CapabilityInfo, InvokeOutcome, SessionState } from '../types'
import { TimeoutError, withTimeout } from '../util/timing'
import { CallStatsTable } from './call-stats'
import { ConnectionError } from './connection'
import type { ConnectionFactory, ServerConnection } from './connection'

export interface SessionCounters {
  connects: number
  disconnects: number
  reconnects: number
  lastConnectedAt: number | null
  lastDisconnectedAt: number | null
  lastHeartbeatAt: number | null
}

export interface SessionOptions {
  connectTimeoutMs: number
  connectionFactory: ConnectionFactory
  logger?: Logger
  /** Called once per settled invoke, after the session's own counters are updated. */
  onCallSettled?: (success: boolean) => void
}

function sameCapabilities(a: readonly CapabilityInfo[], b: readonly CapabilityInfo[]): boolean {
  if (a.length !== b.length) return false
  return a.every(
    (cap, i) =>
      cap.name === b[i].name &&
      cap.description === b[i].description &&
      JSON.stringify(cap.inputSchema) === JSON.stringify(b[i].inputSchema),
  )
}

export class Session {
  readonly descriptor: Readonly<ServerDescriptor>
  readonly callStats = new CallStatsTable()

  private _state: SessionState = 'disconnected'
  private _capabilities: readonly CapabilityInfo[] = []
  private _capabilityRevision = 0
  private _consecutiveFailures = 0
  private _lastError: string | null = null
  private readonly _counters: SessionCounters = {
    connects: 0,
    disconnects: 0,
    reconnects: 0,
    lastConnectedAt: null,
    lastDisconnectedAt: null,
    lastHeartbeatAt: null,
  }

  private connection: ServerConnection | null = null
  private connecting: Promise<boolean> | null = null
  // Bumped by disconnect(); an attempt started under an older generation is discarded.
  private generation = 0

  private readonly connectTimeoutMs: number
  private readonly connectionFactory: ConnectionFactory
  private readonly logger?: Logger
  private readonly onCallSettled?: (success: boolean) => void

  constructor(descriptor: ServerDescriptor, options: SessionOptions) {
    this.descriptor = Object.freeze({ ...descriptor })
    this.connectTimeoutMs = options.connectTimeoutMs
    this.connectionFactory = options.connectionFactory
    this.logger = options.logger?.child({ component: 'session', server: descriptor.name })
    this.onCallSettled = options.onCallSettled
  }

  get name(): string {
    return this.descriptor.name
  }

  get state(): SessionState {
    return this._state
  }

  /** Connected or degraded: the connection exists and may serve calls. */
  get isLive(): boolean {
    return this._state === 'connected' || this._state === 'degraded'
  }

  get capabilities(): readonly CapabilityInfo[] {
    return this._capabilities
  }

  /** Changes whenever a connect or probe observes a different capability list. */
  get capabilityRevision(): number {
    return this._capabilityRevision
  }

  get consecutiveFailures(): number {
    return this._consecutiveFailures
  }

  get lastError(): string | null {
    return this._lastError
  }

  get counters(): Readonly<SessionCounters> {
    return { ...this._counters }
  }

  resetFailures(): void {
    this._consecutiveFailures = 0
  }

  /**
   * Open the connection and discover capabilities. Concurrent callers share
   * one attempt. With `force`, a live connection is replaced.
   */
  connect(options: { force?: boolean } = {}): Promise<boolean> {
    if (this._state === 'closed') return Promise.resolve(false)
    if (this.connecting) return this.connecting
    if (this._state === 'connected' && !options.force) return Promise.resolve(true)

    this.connecting = this.attemptConnect().finally(() => {
      this.connecting = null
    })
    return this.connecting
  }

  private async attemptConnect(): Promise<boolean> {
    const generation = this.generation
    const isReconnect = this._counters.connects > 0

    await this.release()
    if (generation !== this.generation) return false
    this._state = 'connecting'

    const connection = this.connectionFactory(this.descriptor)
    const timeoutMs = this.connectTimeoutMs
    try {
      const capabilities = await withSpan(
        SPAN_NAMES.SERVER_CONNECT,
        { [ATTR_KEYS.SERVER_NAME]: this.name, [ATTR_KEYS.SERVER_TRANSPORT]: this.descriptor.transport },
        () =>
          withTimeout(timeoutMs, async (signal) => {
            await connection.open({ signal, timeoutMs })
            return connection.listCapabilities({ signal, timeoutMs })
          }),
      )

      if (generation !== this.generation) {
        await this.closeConnection(connection)
        return false
      }

      this.connection = connection
      this.setCapabilities(capabilities)
      this._state = 'connected'
      this._consecutiveFailures = 0
      this._lastError = null
      this._counters.connects++
      if (isReconnect) this._counters.reconnects++
      this._counters.lastConnectedAt = Date.now()
      this.logger?.info({ capabilities: capabilities.length, transport: this.descriptor.transport }, 'Server connected')
      return true
    } catch (err) {
      await this.closeConnection(connection)
      if (generation !== this.generation) return false

      this._state = 'disconnected'
      this._capabilities = []
      this._lastError = errorMessage(err)
      this.logger?.warn({ err }, 'Server connect failed')
      return false
    }
  }

  /** Release the transport and enter `closed`. Safe from any state. */
  async disconnect(): Promise<void> {
    if (this._state === 'closed') return
    this.generation++
    this._state = 'closed'
    this._capabilities = []
    await this.release()
  }

  /** Drop the connection after reconnection gave up; the session stays reusable. */
  async markDisconnected(reason: string): Promise<void> {
    if (this._state === 'closed') return
    this._state = 'disconnected'
    this._capabilities = []
    this._lastError = reason
    await this.release()
    this.logger?.warn({ reason }, 'Server marked disconnected')
  }

  async invoke(capability: string, args: Record<string, unknown>, timeoutMs: number): Promise<InvokeOutcome> {
    const connection = this.connection
    if (!connection || !this.isLive) {
      return { ok: false, reason: 'unavailable', message: `Server "${this.name}" is not connected` }
    }

    const startedAt = Date.now()
    try {
      const payload = await withTimeout(timeoutMs, (signal) => connection.call(capability, args, { signal, timeoutMs }))
      this._consecutiveFailures = 0
      this.callStats.record(capability, true, Date.now() - startedAt)
      this.onCallSettled?.(true)
      return { ok: true, payload }
    } catch (err) {
      const message = errorMessage(err)
      const reason =
        err instanceof TimeoutError ? 'timeout' : err instanceof ConnectionError ? err.reason : 'transport'

      if (reason === 'transport' && connection === this.connection) {
        this._consecutiveFailures++
        if (this._state === 'connected') this._state = 'degraded'
      }
      this._lastError = message
      this.callStats.record(capability, false, Date.now() - startedAt, message)
      this.onCallSettled?.(false)
      this.logger?.debug({ tool: capability, reason, err }, 'Tool call failed')
      return { ok: false, reason, message }
    }
  }

  /** Liveness check by re-listing capabilities. */
  async probe(timeoutMs: number): Promise<boolean> {
    const connection = this.connection
    if (!connection || !this.isLive) return false

    try {
      const capabilities = await withSpan(SPAN_NAMES.SERVER_HEALTH, { [ATTR_KEYS.SERVER_NAME]: this.name }, () =>
        withTimeout(timeoutMs, (signal) => connection.listCapabilities({ signal, timeoutMs })),
      )
      if (connection !== this.connection) return false
      this.setCapabilities(capabilities)
      this._state = 'connected'
      this._consecutiveFailures = 0
      this._counters.lastHeartbeatAt = Date.now()
      return true
    } catch (err) {
      if (connection !== this.connection) return false
      this._state = 'degraded'
      this._consecutiveFailures++
      this._lastError = errorMessage(err)
      this.logger?.warn({ err, failures: this._consecutiveFailures }, 'Heartbeat probe failed')
      return false
    }
  }

  private setCapabilities(capabilities: CapabilityInfo[]): void {
    if (!sameCapabilities(this._capabilities, capabilities)) this._capabilityRevision++
    this._capabilities = Object.freeze(capabilities.map((cap) => Object.freeze({ ...cap })))
  }

  private async release(): Promise<void> {
    const connection = this.connection
    if (!connection) return
    this.connection = null
    this._counters.disconnects++
    this._counters.lastDisconnectedAt = Date.now()
    await this.closeConnection(connection)
  }

  private async closeConnection(connection: ServerConnection): Promise<void> {
    try {
      await connection.close()
    } catch (err) {
      this.logger?.debug({ err }, 'Connection close failed')
    }
  }
}

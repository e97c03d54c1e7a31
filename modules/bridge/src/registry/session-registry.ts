/**
 * SessionRegistry: the configured servers, each bound to one Session.
 *
 * Owns the qualified-name table, drives connect/heartbeat/reconnect and
 * aggregates status. Table mutations happen without an intervening await,
 * so concurrent callers always see a consistent view.
 */

import type { Logger } from '@mcpmux/observability'

import { describeCapability } from '../capabilities/describe'
import { BridgeError } from '../errors'
import type { BridgeSettings, ServerDescriptor, TransportKind } from '../schemas/config'
import type { CapabilityCallStats } from '../session/call-stats'
import { sdkConnectionFactory } from '../session/connection'
import type { ConnectionFactory } from '../session/connection'
import { Session } from '../session/session'
import type { SessionCounters } from '../session/session'
import type { CapabilityDescriptor, CapabilitySink, SessionState } from '../types'
import { backoffDelay, sleep } from '../util/timing'
import { KeyedMutex } from './mutex'

// ── Types ──────────────────────────────────────────────────────────────

export interface RegistryOptions {
  settings: BridgeSettings
  sink?: CapabilitySink
  connectionFactory?: ConnectionFactory
  logger?: Logger
  /** Backoff wait between attempts; replaced in tests. Must resolve early once `signal` aborts. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>
}

export interface ResolvedCapability {
  session: Session
  capability: string
  descriptor: CapabilityDescriptor
}

export interface ServerStatus {
  name: string
  enabled: boolean
  transport: TransportKind
  description: string | null
  state: SessionState
  capabilityCount: number
  consecutiveFailures: number
  reconnectPaused: boolean
  lastError: string | null
  counters: SessionCounters
  calls: { attempts: number; successes: number; failures: number; meanDurationMs: number }
}

export interface RegistryStatus {
  servers: ServerStatus[]
  totals: { servers: number; connected: number; capabilities: number }
  global: {
    totalCalls: number
    successfulCalls: number
    failedCalls: number
    uptimeSeconds: number
    callsPerMinute: number
  }
}

export interface ReconnectResult {
  name: string
  connected: boolean
}

interface ServerEntry {
  session: Session
  reconnectPaused: boolean
  keys: Set<string>
  syncedRevision: number
}

// ── Registry ───────────────────────────────────────────────────────────

export class SessionRegistry {
  private readonly servers = new Map<string, ServerEntry>()
  private readonly bindings = new Map<string, { server: string; descriptor: CapabilityDescriptor }>()
  private readonly locks = new KeyedMutex()
  private readonly startedAt = Date.now()
  private readonly calls = { total: 0, successful: 0, failed: 0 }

  private readonly settings: BridgeSettings
  private readonly sink?: CapabilitySink
  private readonly connectionFactory: ConnectionFactory
  private readonly logger?: Logger
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>
  private readonly closing = new AbortController()

  constructor(options: RegistryOptions) {
    this.settings = options.settings
    this.sink = options.sink
    this.logger = options.logger?.child({ component: 'registry' })
    this.connectionFactory = options.connectionFactory ?? sdkConnectionFactory(this.logger)
    this.sleep = options.sleep ?? sleep
  }

  get size(): number {
    return this.servers.size
  }

  has(name: string): boolean {
    return this.servers.has(name)
  }

  session(name: string): Session | undefined {
    return this.servers.get(name)?.session
  }

  /**
   * Register a server and, when enabled, connect it with retries. A server
   * that cannot be reached stays registered with auto-reconnect paused.
   * Resolves with whether it ended up connected. With `connect: false` the
   * server is registered paused.
   */
  async addServer(descriptor: ServerDescriptor, options: { connect?: boolean } = {}): Promise<boolean> {
    if (this.servers.has(descriptor.name)) {
      throw new BridgeError('DuplicateServer', `Server "${descriptor.name}" is already registered`)
    }

    const session = new Session(descriptor, {
      connectTimeoutMs: this.settings.connectTimeoutMs,
      connectionFactory: this.connectionFactory,
      logger: this.logger,
      onCallSettled: (success) => this.countCall(success),
    })
    const entry: ServerEntry = { session, reconnectPaused: false, keys: new Set(), syncedRevision: -1 }
    this.servers.set(descriptor.name, entry)

    if (!descriptor.enabled) {
      this.logger?.info({ server: descriptor.name }, 'Server registered disabled')
      return false
    }
    if (options.connect === false) {
      // Waits for a manual reconnect.
      entry.reconnectPaused = true
      return false
    }

    const connected = await this.locks.run(descriptor.name, () =>
      this.connectWithRetry(entry, this.settings.retryAttempts),
    )
    if (!connected && this.servers.get(descriptor.name) === entry) {
      entry.reconnectPaused = true
      this.logger?.error(
        { server: descriptor.name, attempts: this.settings.retryAttempts, lastError: session.lastError },
        'Server unreachable, auto-reconnect paused',
      )
    }
    return connected
  }

  async removeServer(name: string): Promise<void> {
    const entry = this.requireEntry(name)
    this.servers.delete(name)
    this.dropCapabilities(entry)
    await entry.session.disconnect()
    this.logger?.info({ server: name }, 'Server removed')
  }

  resolve(qualifiedName: string): ResolvedCapability {
    const binding = this.bindings.get(qualifiedName)
    if (!binding) throw new BridgeError('NotFound', `Unknown tool "${qualifiedName}"`)

    const entry = this.servers.get(binding.server)
    if (!entry || !entry.session.isLive) {
      throw new BridgeError('Unavailable', `Server "${binding.server}" is not connected`)
    }
    return { session: entry.session, capability: binding.descriptor.name, descriptor: binding.descriptor }
  }

  /** Descriptor for a qualified name regardless of the owning session's state. */
  describe(qualifiedName: string): CapabilityDescriptor | undefined {
    return this.bindings.get(qualifiedName)?.descriptor
  }

  listCapabilities(): CapabilityDescriptor[] {
    return Array.from(this.bindings.values(), (binding) => binding.descriptor)
  }

  // ── Health ───────────────────────────────────────────────────────────

  /**
   * Probe every enabled server concurrently. Servers whose failures reach the
   * threshold, and disconnected servers that are not paused, get a bounded
   * reconnection. Never rejects.
   */
  async heartbeatTick(): Promise<void> {
    const entries = Array.from(this.servers.values()).filter((entry) => entry.session.descriptor.enabled)
    await Promise.allSettled(entries.map((entry) => this.heartbeatServer(entry)))
  }

  private async heartbeatServer(entry: ServerEntry): Promise<void> {
    const name = entry.session.name
    // A manual reconnect or an earlier cycle is still working on this server.
    if (this.locks.isLocked(name)) return

    try {
      await this.locks.run(name, async () => {
        const { session } = entry
        const heartbeat = this.settings.heartbeat

        if (session.isLive) {
          if (await session.probe(heartbeat.probeTimeoutMs)) {
            this.syncCapabilities(entry)
            return
          }
          if (!heartbeat.autoReconnect || session.consecutiveFailures < heartbeat.failureThreshold) return
          this.logger?.warn({ server: name, failures: session.consecutiveFailures }, 'Failure threshold reached, reconnecting')
          await this.reconnectOrPause(entry)
          return
        }

        if (session.state === 'disconnected' && !entry.reconnectPaused && heartbeat.autoReconnect) {
          await this.reconnectOrPause(entry)
        }
      })
    } catch (err) {
      this.logger?.error({ err, server: name }, 'Heartbeat failed')
    }
  }

  private async reconnectOrPause(entry: ServerEntry): Promise<void> {
    const attempts = this.settings.heartbeat.maxReconnectAttempts
    if (await this.connectWithRetry(entry, attempts, { force: true })) return
    if (entry.session.state === 'closed' || this.closing.signal.aborted) return

    await entry.session.markDisconnected(
      `Reconnect failed after ${attempts} attempt(s): ${entry.session.lastError ?? 'unknown error'}`,
    )
    entry.reconnectPaused = true
    this.logger?.error({ server: entry.session.name, attempts }, 'Reconnect exhausted, auto-reconnect paused')
  }

  /**
   * Manual reconnect of one server, or of every enabled server with `all`.
   * Under the server's lock it clears the failure counter, then leaves the
   * pause flag set only when the attempt fails.
   */
  async reconnect(name: string): Promise<ReconnectResult[]> {
    const targets =
      name === 'all'
        ? Array.from(this.servers.values()).filter((entry) => entry.session.descriptor.enabled)
        : [this.requireEntry(name)]

    return Promise.all(
      targets.map(async (entry): Promise<ReconnectResult> => {
        const serverName = entry.session.name
        if (!entry.session.descriptor.enabled) return { name: serverName, connected: false }

        const connected = await this.locks.run(serverName, async () => {
          entry.reconnectPaused = false
          entry.session.resetFailures()
          const ok = await this.connectWithRetry(entry, this.settings.retryAttempts, { force: true })
          entry.reconnectPaused = !ok && this.servers.get(serverName) === entry
          return ok
        })
        this.logger?.info({ server: serverName, connected }, 'Manual reconnect finished')
        return { name: serverName, connected }
      }),
    )
  }

  private async connectWithRetry(entry: ServerEntry, attempts: number, options: { force?: boolean } = {}): Promise<boolean> {
    const { session } = entry
    for (let attempt = 1; attempt <= attempts; attempt++) {
      // Only the first attempt replaces a live connection.
      const ok = await session.connect({ force: options.force === true && attempt === 1 })
      if (ok) {
        this.syncCapabilities(entry)
        return true
      }
      if (session.state === 'closed' || this.servers.get(session.name) !== entry) return false

      this.logger?.warn({ server: session.name, attempt, attempts, err: session.lastError }, 'Connect attempt failed')
      if (attempt < attempts) {
        const delay = backoffDelay(attempt, this.settings.retryIntervalMs, this.settings.maxBackoffMs)
        await this.sleep(delay, this.closing.signal)
        if (this.closing.signal.aborted) return false
      }
    }
    return false
  }

  // ── Capability table ─────────────────────────────────────────────────

  private syncCapabilities(entry: ServerEntry): void {
    const { session } = entry
    if (this.servers.get(session.name) !== entry) return
    if (entry.syncedRevision === session.capabilityRevision) return

    this.dropCapabilities(entry)
    for (const info of session.capabilities) {
      const descriptor = describeCapability(this.settings.toolPrefix, session.name, info)
      this.bindings.set(descriptor.qualifiedName, { server: session.name, descriptor })
      entry.keys.add(descriptor.qualifiedName)
      this.sink?.register(descriptor)
    }
    entry.syncedRevision = session.capabilityRevision
    this.logger?.debug({ server: session.name, capabilities: entry.keys.size }, 'Capabilities registered')
  }

  private dropCapabilities(entry: ServerEntry): void {
    if (entry.keys.size === 0) return
    const names = Array.from(entry.keys)
    for (const name of names) this.bindings.delete(name)
    entry.keys.clear()
    entry.syncedRevision = -1
    this.sink?.unregister(names)
  }

  // ── Status ───────────────────────────────────────────────────────────

  private countCall(success: boolean): void {
    this.calls.total++
    if (success) this.calls.successful++
    else this.calls.failed++
  }

  status(): RegistryStatus {
    const servers = Array.from(this.servers.values(), (entry): ServerStatus => {
      const { session } = entry
      return {
        name: session.name,
        enabled: session.descriptor.enabled,
        transport: session.descriptor.transport,
        description: session.descriptor.description ?? null,
        state: session.state,
        // Bindings outlive a disconnect so `resolve` can answer Unavailable.
        capabilityCount: session.capabilities.length,
        consecutiveFailures: session.consecutiveFailures,
        reconnectPaused: entry.reconnectPaused,
        lastError: session.lastError,
        counters: session.counters,
        calls: session.callStats.totals(),
      }
    })

    const uptimeSeconds = Math.floor((Date.now() - this.startedAt) / 1000)
    return {
      servers,
      totals: {
        servers: servers.length,
        connected: servers.filter((s) => s.state === 'connected' || s.state === 'degraded').length,
        capabilities: servers.reduce((sum, s) => sum + s.capabilityCount, 0),
      },
      global: {
        totalCalls: this.calls.total,
        successfulCalls: this.calls.successful,
        failedCalls: this.calls.failed,
        uptimeSeconds,
        callsPerMinute: uptimeSeconds > 0 ? Math.round((this.calls.total / (uptimeSeconds / 60)) * 100) / 100 : 0,
      },
    }
  }

  /** Per-capability call statistics, keyed by qualified name. Capabilities never called are omitted. */
  stats(): Record<string, CapabilityCallStats> {
    const result: Record<string, CapabilityCallStats> = {}
    for (const [qualifiedName, binding] of this.bindings) {
      const session = this.servers.get(binding.server)?.session
      const stats = session?.callStats.get(binding.descriptor.name)
      if (stats) result[qualifiedName] = stats
    }
    return result
  }

  /** Cut short any backoff wait so in-flight retries give up. */
  abortRetries(): void {
    this.closing.abort()
  }

  async shutdown(): Promise<void> {
    this.abortRetries()
    const entries = Array.from(this.servers.values())
    this.servers.clear()
    for (const entry of entries) this.dropCapabilities(entry)
    await Promise.allSettled(entries.map((entry) => entry.session.disconnect()))
  }

  private requireEntry(name: string): ServerEntry {
    const entry = this.servers.get(name)
    if (!entry) throw new BridgeError('NotFound', `Unknown server "${name}"`)
    return entry
  }
}

/**
 * Bridge: composition root. Builds every component from one validated
 * configuration and exposes the operations callers use.
 */

import { createLogger } from '@mcpmux/observability'
import type { Logger } from '@mcpmux/observability'

import { CallCache } from './cache/call-cache'
import type { CacheEntryInfo, CacheStats } from './cache/call-cache'
import { qualifyName } from './capabilities/qualified-name'
import { PermissionEvaluator } from './permissions/permission-evaluator'
import type { PermissionSummary } from './permissions/permission-evaluator'
import { CallPipeline } from './pipeline/call-pipeline'
import type { InvokeOptions } from './pipeline/call-pipeline'
import { HeartbeatScheduler } from './registry/heartbeat'
import { SessionRegistry } from './registry/session-registry'
import type { ReconnectResult, RegistryStatus } from './registry/session-registry'
import { parseBridgeConfig, parseServerDescriptor } from './schemas/config'
import type { BridgeConfig, BridgeSettings } from './schemas/config'
import type { CallerIdentity } from './schemas/tool-call'
import type { CapabilityCallStats } from './session/call-stats'
import type { ConnectionFactory } from './session/connection'
import { CallTracer } from './trace/call-tracer'
import type {
  CallRecord,
  CapabilityDescriptor,
  CapabilitySink,
  PostProcessor,
  ToolCallResult,
  TraceSink,
} from './types'

export interface BridgeOptions {
  /** Raw configuration; validated with `bridgeConfigSchema`. */
  config: unknown
  capabilitySink?: CapabilitySink
  traceSink?: TraceSink
  postProcessor?: PostProcessor
  connectionFactory?: ConnectionFactory
  logger?: Logger
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>
}

export class Bridge {
  readonly config: BridgeConfig
  readonly registry: SessionRegistry
  readonly cache: CallCache
  readonly permissions: PermissionEvaluator
  readonly tracer: CallTracer
  readonly pipeline: CallPipeline
  private readonly heartbeat: HeartbeatScheduler
  private readonly logger: Logger
  private started = false

  constructor(options: BridgeOptions) {
    this.config = parseBridgeConfig(options.config)
    this.logger = options.logger ?? createLogger({ service: 'mcpmux-bridge' })

    const { settings } = this.config
    this.registry = new SessionRegistry({
      settings,
      sink: options.capabilitySink,
      connectionFactory: options.connectionFactory,
      logger: this.logger,
      sleep: options.sleep,
    })
    this.cache = new CallCache(settings.cache)
    this.permissions = new PermissionEvaluator(settings.permissions)
    this.tracer = new CallTracer({ settings: settings.trace, sink: options.traceSink, logger: this.logger })
    this.pipeline = new CallPipeline({
      settings,
      registry: this.registry,
      cache: this.cache,
      permissions: this.permissions,
      tracer: this.tracer,
      postProcessor: options.postProcessor,
      logger: this.logger,
    })
    this.heartbeat = new HeartbeatScheduler({
      intervalMs: settings.heartbeat.intervalMs,
      tick: () => this.registry.heartbeatTick(),
      logger: this.logger,
    })
  }

  get settings(): BridgeSettings {
    return this.config.settings
  }

  /** Register configured servers, connect them when `autoConnect` is on, start the heartbeat. */
  async start(): Promise<void> {
    if (this.started) return
    this.started = true

    const connect = this.settings.autoConnect
    const results = await Promise.allSettled(
      this.config.servers.map((server) => this.registry.addServer(server, { connect })),
    )
    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        this.logger.error({ err: result.reason, server: this.config.servers[i].name }, 'Server registration failed')
      }
    })

    if (this.settings.heartbeat.enabled) this.heartbeat.start()

    const status = this.registry.status()
    this.logger.info(
      { servers: status.totals.servers, connected: status.totals.connected, capabilities: status.totals.capabilities },
      'Bridge started',
    )
  }

  async shutdown(): Promise<void> {
    // A tick may be waiting out reconnect backoff.
    this.registry.abortRetries()
    await this.heartbeat.stop()
    await this.registry.shutdown()
    await this.tracer.flush()
    this.started = false
    this.logger.info('Bridge stopped')
  }

  // ── Calls ────────────────────────────────────────────────────────────

  invoke(
    capability: string,
    args: Record<string, unknown>,
    caller: CallerIdentity,
    options?: InvokeOptions,
  ): Promise<ToolCallResult> {
    return this.pipeline.invoke(capability, args, caller, options)
  }

  listCapabilities(): CapabilityDescriptor[] {
    return this.registry.listCapabilities()
  }

  // ── Servers ──────────────────────────────────────────────────────────

  status(): RegistryStatus {
    return this.registry.status()
  }

  stats(): Record<string, CapabilityCallStats> {
    return this.registry.stats()
  }

  /** Validates and registers a server at runtime. */
  async addServer(descriptor: unknown): Promise<boolean> {
    return this.registry.addServer(parseServerDescriptor(descriptor))
  }

  async removeServer(name: string): Promise<void> {
    await this.registry.removeServer(name)
    this.cache.invalidate(qualifyName(this.settings.toolPrefix, name, '*'))
  }

  reconnect(name: string): Promise<ReconnectResult[]> {
    return this.registry.reconnect(name)
  }

  // ── Trace / cache / permissions ──────────────────────────────────────

  traceRecent(limit?: number): Readonly<CallRecord>[] {
    return this.tracer.recent(limit)
  }

  traceByCapability(capability: string, limit?: number): Readonly<CallRecord>[] {
    return this.tracer.byCapability(capability, limit)
  }

  cacheStats(): CacheStats {
    return this.cache.stats()
  }

  cacheEntries(): CacheEntryInfo[] {
    return this.cache.entries()
  }

  /** Clears entries whose capability matches `pattern`, or everything. Returns the count removed. */
  cacheClear(pattern?: string): number {
    return this.cache.invalidate(pattern)
  }

  permissionsFor(capability: string): PermissionSummary {
    return this.permissions.permissionsFor(capability)
  }
}

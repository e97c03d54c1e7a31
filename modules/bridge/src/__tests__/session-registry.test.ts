import { describe, it, expect } from 'vitest'

import { isBridgeError } from '../errors'
import { SessionRegistry } from '../registry/session-registry'
import { bridgeSettingsSchema, parseServerDescriptor } from '../schemas/config'
import type { BridgeSettingsInput } from '../schemas/config'
import type { CapabilityDescriptor, CapabilitySink } from '../types'
import { sleep as realSleep } from '../util/timing'
import { FakeServer, fakeConnectionFactory, noSleep, stdioDescriptor } from './fixtures/fake-connection'

function recordingSink() {
  const registered = new Map<string, CapabilityDescriptor>()
  const unregistered: string[] = []
  const sink: CapabilitySink = {
    register: (descriptor) => {
      registered.set(descriptor.qualifiedName, descriptor)
    },
    unregister: (names) => {
      for (const name of names) registered.delete(name)
      unregistered.push(...names)
    },
  }
  return { registered, unregistered, sink }
}

function setup(
  servers: Record<string, FakeServer>,
  settings: BridgeSettingsInput = {},
  sleep: (ms: number, signal?: AbortSignal) => Promise<void> = noSleep,
) {
  const recorder = recordingSink()
  const registry = new SessionRegistry({
    settings: bridgeSettingsSchema.parse({ retryIntervalMs: 0, ...settings }),
    sink: recorder.sink,
    connectionFactory: fakeConnectionFactory(servers),
    sleep,
  })
  return { registry, ...recorder }
}

const descriptor = (name: string, extra: Record<string, unknown> = {}) =>
  parseServerDescriptor(stdioDescriptor(name, extra))

describe('SessionRegistry', () => {
  it('connects a server and registers its capabilities under qualified names', async () => {
    const { registry, registered } = setup({ s1: new FakeServer(['echo', 'list_files']) })

    expect(await registry.addServer(descriptor('s1'))).toBe(true)
    expect(Array.from(registered.keys())).toEqual(['mcp_s1_echo', 'mcp_s1_list_files'])
    expect(registered.get('mcp_s1_echo')?.description).toBe('echo tool [from MCP server: s1]')

    const resolved = registry.resolve('mcp_s1_list_files')
    expect(resolved.session.name).toBe('s1')
    expect(resolved.capability).toBe('list_files')
  })

  it('fails to resolve unknown names with NotFound', () => {
    const { registry } = setup({})
    expect(() => registry.resolve('mcp_s1_echo')).toThrowError(/Unknown tool "mcp_s1_echo"/)
    try {
      registry.resolve('mcp_nope_nothing')
    } catch (err) {
      expect(isBridgeError(err, 'NotFound')).toBe(true)
    }
  })

  it('lets exactly one of two concurrent adds with the same name succeed', async () => {
    const { registry } = setup({ s1: new FakeServer() })
    const results = await Promise.allSettled([registry.addServer(descriptor('s1')), registry.addServer(descriptor('s1'))])

    expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1)
    const rejected = results.find((r) => r.status === 'rejected')
    expect(rejected?.status === 'rejected' && isBridgeError(rejected.reason, 'DuplicateServer')).toBe(true)
  })

  it('retains disabled servers without connecting them', async () => {
    const server = new FakeServer()
    const { registry } = setup({ s1: server })

    expect(await registry.addServer(descriptor('s1', { enabled: false }))).toBe(false)
    expect(server.opens).toBe(0)
    expect(registry.status().servers[0]).toMatchObject({ name: 's1', enabled: false, state: 'disconnected' })
  })

  it('retries with capped exponential backoff and pauses an unreachable server', async () => {
    const server = new FakeServer()
    server.openError = new Error('connection refused')
    const delays: number[] = []
    const { registry } = setup(
      { s1: server },
      { retryAttempts: 4, retryIntervalMs: 100, maxBackoffMs: 300 },
      async (ms) => {
        delays.push(ms)
      },
    )

    expect(await registry.addServer(descriptor('s1'))).toBe(false)
    expect(server.opens).toBe(4)
    expect(delays).toEqual([100, 200, 300])
    expect(registry.status().servers[0]).toMatchObject({
      state: 'disconnected',
      reconnectPaused: true,
      lastError: 'connection refused',
    })
  })

  it('disconnects and pauses a server after the failure threshold, then reconnects manually', async () => {
    const server = new FakeServer()
    const { registry } = setup({ s1: server }, { heartbeat: { failureThreshold: 3, maxReconnectAttempts: 3 } })
    await registry.addServer(descriptor('s1'))

    server.listError = new Error('probe failed')
    server.openError = new Error('still down')

    await registry.heartbeatTick()
    expect(registry.status().servers[0]).toMatchObject({ state: 'degraded', consecutiveFailures: 1 })
    await registry.heartbeatTick()
    expect(registry.status().servers[0]).toMatchObject({ state: 'degraded', consecutiveFailures: 2 })
    await registry.heartbeatTick()
    expect(registry.status().servers[0]).toMatchObject({
      state: 'disconnected',
      reconnectPaused: true,
      capabilityCount: 0,
    })
    expect(registry.status().totals.capabilities).toBe(0)
    expect(server.opens).toBe(4)

    // Paused: further ticks leave it alone.
    await registry.heartbeatTick()
    expect(server.opens).toBe(4)
    expect(() => registry.resolve('mcp_s1_echo')).toThrowError(/not connected/)

    server.listError = null
    server.openError = null
    expect(await registry.reconnect('s1')).toEqual([{ name: 's1', connected: true }])
    expect(registry.status().servers[0]).toMatchObject({
      state: 'connected',
      consecutiveFailures: 0,
      reconnectPaused: false,
    })
    expect(registry.resolve('mcp_s1_echo').capability).toBe('echo')
    expect(registry.status().servers[0].capabilityCount).toBe(1)
  })

  it('leaves a server unpaused when a manual reconnect succeeds after a failing heartbeat reconnect', async () => {
    const server = new FakeServer()
    const { registry } = setup(
      { s1: server },
      { retryAttempts: 1, heartbeat: { failureThreshold: 1, maxReconnectAttempts: 1 } },
    )
    await registry.addServer(descriptor('s1'))

    server.listError = new Error('list failed')
    server.openError = new Error('still down')
    server.openDelayMs = 20

    // The heartbeat takes the lock first; the manual reconnect queues behind it.
    const tick = registry.heartbeatTick()
    const manual = registry.reconnect('s1')
    await tick
    server.listError = null
    server.openError = null

    expect(await manual).toEqual([{ name: 's1', connected: true }])
    expect(server.opens).toBe(3)
    expect(registry.status().servers[0]).toMatchObject({
      state: 'connected',
      reconnectPaused: false,
      consecutiveFailures: 0,
    })
  })

  it('gives up a backoff wait once retries are aborted', async () => {
    const server = new FakeServer()
    server.openError = new Error('connection refused')
    const { registry } = setup(
      { s1: server },
      { retryAttempts: 3, retryIntervalMs: 600_000, maxBackoffMs: 600_000 },
      realSleep,
    )

    const adding = registry.addServer(descriptor('s1'))
    await new Promise((resolve) => setTimeout(resolve, 20))
    expect(server.opens).toBe(1)

    registry.abortRetries()
    expect(await adding).toBe(false)
    expect(server.opens).toBe(1)
    expect(registry.status().servers[0]).toMatchObject({ state: 'disconnected', reconnectPaused: true })
  })

  it('probes servers concurrently so a slow one does not hold up the rest', async () => {
    const slow = new FakeServer()
    const fast = new FakeServer()
    const { registry } = setup({ slow, fast }, { heartbeat: { probeTimeoutMs: 1000 } })
    await registry.addServer(descriptor('slow'))
    await registry.addServer(descriptor('fast'))
    slow.listDelayMs = 200

    const tick = registry.heartbeatTick()
    await new Promise((resolve) => setTimeout(resolve, 50))
    expect(registry.session('fast')?.counters.lastHeartbeatAt).not.toBeNull()
    expect(registry.session('slow')?.counters.lastHeartbeatAt).toBeNull()
    await tick
    expect(registry.session('slow')?.counters.lastHeartbeatAt).not.toBeNull()
  })

  it('skips the heartbeat for a server with a reconnect in progress', async () => {
    const server = new FakeServer()
    const { registry } = setup({ s1: server })
    await registry.addServer(descriptor('s1'))
    server.openDelayMs = 30

    const reconnect = registry.reconnect('s1')
    await registry.heartbeatTick()
    expect(await reconnect).toEqual([{ name: 's1', connected: true }])
    expect(registry.session('s1')?.counters.lastHeartbeatAt).toBeNull()
    expect(registry.session('s1')?.counters.reconnects).toBe(1)
  })

  it('re-registers capabilities when a probe sees a changed list', async () => {
    const server = new FakeServer(['echo'])
    const { registry, registered } = setup({ s1: server })
    await registry.addServer(descriptor('s1'))

    server.capabilities = [...server.capabilities, { name: 'ping', description: '', inputSchema: {} }]
    await registry.heartbeatTick()
    expect(Array.from(registered.keys())).toEqual(['mcp_s1_echo', 'mcp_s1_ping'])
    expect(registered.get('mcp_s1_ping')?.description).toBe('[from MCP server: s1]')
  })

  it('removes a server and unregisters its capabilities', async () => {
    const server = new FakeServer(['echo'])
    const { registry, registered, unregistered } = setup({ s1: server })
    await registry.addServer(descriptor('s1'))

    await registry.removeServer('s1')
    expect(registered.size).toBe(0)
    expect(unregistered).toEqual(['mcp_s1_echo'])
    expect(server.closes).toBe(1)
    expect(registry.has('s1')).toBe(false)
    expect(() => registry.resolve('mcp_s1_echo')).toThrowError(/Unknown tool/)
    await expect(registry.removeServer('s1')).rejects.toThrowError(/Unknown server "s1"/)
  })

  it('aggregates status, call counters and per-capability stats', async () => {
    const { registry } = setup({ s1: new FakeServer(['echo']), s2: new FakeServer(['ping']) })
    await registry.addServer(descriptor('s1'))
    await registry.addServer(descriptor('s2', { enabled: false }))

    const { session, capability } = registry.resolve('mcp_s1_echo')
    await session.invoke(capability, { x: 1 }, 1000)
    await session.invoke('missing', {}, 1000)

    const status = registry.status()
    expect(status.totals).toEqual({ servers: 2, connected: 1, capabilities: 1 })
    expect(status.global).toMatchObject({ totalCalls: 2, successfulCalls: 1, failedCalls: 1 })
    expect(status.servers[0].calls).toMatchObject({ attempts: 2, successes: 1, failures: 1 })

    const stats = registry.stats()
    expect(Object.keys(stats)).toEqual(['mcp_s1_echo'])
    expect(stats.mcp_s1_echo).toMatchObject({ calls: 1, successes: 1, failures: 0, successRate: 1 })
  })

  it('disconnects everything on shutdown', async () => {
    const s1 = new FakeServer()
    const { registry, registered } = setup({ s1 })
    await registry.addServer(descriptor('s1'))

    await registry.shutdown()
    expect(registry.size).toBe(0)
    expect(registered.size).toBe(0)
    expect(s1.closes).toBe(1)
  })
})

import { afterEach, describe, it, expect } from 'vitest'

import { Bridge } from '../bridge'
import { isBridgeError } from '../errors'
import type { CallRecord, CapabilityDescriptor, TraceSink } from '../types'
import { inMemoryConnectionFactory } from './fixtures/echo-server'
import { FakeServer, fakeConnectionFactory, noSleep, stdioDescriptor } from './fixtures/fake-connection'

const caller = { platform: 'discord', userId: 'u1' }
const bridges: Bridge[] = []

function track(bridge: Bridge): Bridge {
  bridges.push(bridge)
  return bridge
}

afterEach(async () => {
  await Promise.all(bridges.splice(0).map((bridge) => bridge.shutdown()))
})

describe('Bridge over the MCP SDK', () => {
  it('calls tools on an in-process server end to end', async () => {
    const registered: CapabilityDescriptor[] = []
    const bridge = track(
      new Bridge({
        config: { settings: { heartbeat: { enabled: false } }, servers: [stdioDescriptor('echo')] },
        connectionFactory: inMemoryConnectionFactory(),
        capabilitySink: { register: (d) => registered.push(d), unregister: () => {} },
      }),
    )
    await bridge.start()

    expect(registered.map((d) => d.qualifiedName)).toEqual([
      'mcp_echo_echo',
      'mcp_echo_sum',
      'mcp_echo_lines',
      'mcp_echo_pixel',
      'mcp_echo_fail',
    ])
    expect(registered[1].parameters).toEqual([
      { name: 'values', type: 'string', description: '(JSON array)', required: true },
    ])

    expect((await bridge.invoke('mcp_echo_echo', { text: 'hi' }, caller)).content).toBe('hi')
    expect((await bridge.invoke('mcp_echo_sum', { values: '[1, 2]' }, caller)).content).toBe('3')

    const err = await bridge.invoke('mcp_echo_fail', {}, caller).catch((e: unknown) => e)
    expect(err).toMatchObject({ kind: 'ProtocolError', message: 'Tool "mcp_echo_fail" failed: boom' })
  })
})

describe('Bridge lifecycle', () => {
  it('registers servers paused when autoConnect is off', async () => {
    const s1 = new FakeServer()
    const bridge = track(
      new Bridge({
        config: { settings: { autoConnect: false, heartbeat: { enabled: false } }, servers: [stdioDescriptor('s1')] },
        connectionFactory: fakeConnectionFactory({ s1 }),
      }),
    )
    await bridge.start()
    expect(s1.opens).toBe(0)
    expect(bridge.status().servers[0]).toMatchObject({ state: 'disconnected', reconnectPaused: true })

    expect(await bridge.reconnect('all')).toEqual([{ name: 's1', connected: true }])
    expect(bridge.listCapabilities().map((c) => c.qualifiedName)).toEqual(['mcp_s1_echo'])
  })

  it('adds and removes servers at runtime', async () => {
    const s1 = new FakeServer()
    const s2 = new FakeServer(['ping'])
    const bridge = track(
      new Bridge({
        config: { settings: { heartbeat: { enabled: false } }, servers: [stdioDescriptor('s1')] },
        connectionFactory: fakeConnectionFactory({ s1, s2 }),
        sleep: noSleep,
      }),
    )
    await bridge.start()

    expect(await bridge.addServer(stdioDescriptor('s2'))).toBe(true)
    await expect(bridge.addServer(stdioDescriptor('s2'))).rejects.toMatchObject({ kind: 'DuplicateServer' })
    await expect(bridge.addServer({ name: 'bad_name', command: 'x' })).rejects.toMatchObject({ kind: 'InvalidConfig' })

    await bridge.invoke('mcp_s2_ping', { x: 1 }, caller)
    await bridge.invoke('mcp_s1_echo', { x: 1 }, caller)
    expect(bridge.cacheStats().size).toBe(2)

    await bridge.removeServer('s2')
    expect(bridge.cacheEntries().map((e) => e.capability)).toEqual(['mcp_s1_echo'])
    const err = await bridge.invoke('mcp_s2_ping', { x: 1 }, caller).catch((e: unknown) => e)
    expect(isBridgeError(err, 'NotFound')).toBe(true)
  })

  it('returns the result when the trace sink throws', async () => {
    const s1 = new FakeServer()
    const bridge = track(
      new Bridge({
        config: { settings: { heartbeat: { enabled: false } }, servers: [stdioDescriptor('s1')] },
        connectionFactory: fakeConnectionFactory({ s1 }),
        traceSink: {
          append: () => {
            throw new Error('sink down')
          },
        },
      }),
    )
    await bridge.start()

    const result = await bridge.invoke('mcp_s1_echo', { x: 1 }, caller)
    expect(result.content).toBe('{"x":1}')
    expect(s1.calls).toHaveLength(1)
    expect(bridge.traceRecent(1)[0].outcome).toBe('success')
  })

  it('honours a call timeout beyond the timer range', async () => {
    const s1 = new FakeServer()
    s1.callDelayMs = 20
    const bridge = track(
      new Bridge({
        config: { settings: { heartbeat: { enabled: false } }, servers: [stdioDescriptor('s1')] },
        connectionFactory: fakeConnectionFactory({ s1 }),
      }),
    )
    await bridge.start()

    const result = await bridge.invoke('mcp_s1_echo', { x: 1 }, caller, { timeoutMs: 3_000_000_000 })
    expect(result.content).toBe('{"x":1}')
  })

  it('flushes the trace sink on shutdown', async () => {
    const written: Readonly<CallRecord>[] = []
    const traceSink: TraceSink = {
      append: async (record) => {
        await new Promise((resolve) => setTimeout(resolve, 20))
        written.push(record)
      },
    }
    const s1 = new FakeServer()
    const bridge = new Bridge({
      config: { settings: { heartbeat: { enabled: false } }, servers: [stdioDescriptor('s1')] },
      connectionFactory: fakeConnectionFactory({ s1 }),
      traceSink,
    })
    await bridge.start()
    await bridge.invoke('mcp_s1_echo', { x: 2 }, caller)
    expect(written).toHaveLength(0)

    await bridge.shutdown()
    expect(written.map((r) => r.capability)).toEqual(['mcp_s1_echo'])
    expect(s1.closes).toBe(1)
    expect(bridge.status().servers).toEqual([])
  })

  it('exposes permission summaries and cache controls', async () => {
    const s1 = new FakeServer()
    const bridge = track(
      new Bridge({
        config: {
          settings: {
            heartbeat: { enabled: false },
            permissions: { enabled: true, rules: [{ tool: 'mcp_s1_*', mode: 'whitelist', allowed: ['discord:u1:user'] }] },
          },
          servers: [stdioDescriptor('s1')],
        },
        connectionFactory: fakeConnectionFactory({ s1 }),
      }),
    )
    await bridge.start()

    expect(bridge.permissionsFor('mcp_s1_echo').rules).toEqual([
      { tool: 'mcp_s1_*', mode: 'whitelist', allowed: ['discord:u1:user'], denied: [], index: 0, effective: true },
    ])
    await bridge.invoke('mcp_s1_echo', { x: 1 }, caller)
    expect(bridge.cacheClear('mcp_s2_*')).toBe(0)
    expect(bridge.cacheClear()).toBe(1)
    expect(bridge.stats().mcp_s1_echo).toMatchObject({ calls: 1, successes: 1 })
  })

  it('rejects an invalid configuration up front', () => {
    expect(() => new Bridge({ config: { servers: [{ name: 'x', transport: 'carrier-pigeon' }] } })).toThrowError(
      /Invalid bridge configuration/,
    )
  })
})

import { Client } from '@modelcontextprotocol/sdk/client/index.js'
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js'
import { CallToolResultSchema, ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js'
import type { Logger } from '@mcpmux/observability'

import type { ServerDescriptor } from '../schemas/config'
import type { CapabilityInfo } from '../types'
import { timerDelay } from '../util/timing'
import { flattenContent } from './content'
import { createTransport } from './transports'

export interface ConnectionCallOptions {
  signal: AbortSignal
  timeoutMs: number
}

export type ConnectionFailure = 'timeout' | 'protocol' | 'transport'

/** Raised by a ServerConnection with the reason already classified. */
export class ConnectionError extends Error {
  constructor(
    readonly reason: ConnectionFailure,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'ConnectionError'
  }
}

/**
 * The protocol operations a Session needs from one server. The default
 * implementation is backed by the SDK client; tests substitute scripted ones.
 */
export interface ServerConnection {
  open(options: ConnectionCallOptions): Promise<void>
  listCapabilities(options: ConnectionCallOptions): Promise<CapabilityInfo[]>
  /** Resolves with the flattened result text; rejects with a ConnectionError. */
  call(name: string, args: Record<string, unknown>, options: ConnectionCallOptions): Promise<string>
  close(): Promise<void>
}

export type ConnectionFactory = (descriptor: ServerDescriptor) => ServerConnection

const CLIENT_INFO = { name: 'mcpmux', version: '0.1.0' }

function classifySdkError(err: unknown): ConnectionError {
  if (err instanceof ConnectionError) return err
  const message = err instanceof Error ? err.message : String(err)
  if (err instanceof McpError) {
    if (err.code === ErrorCode.RequestTimeout) return new ConnectionError('timeout', message, { cause: err })
    if (err.code === ErrorCode.ConnectionClosed) return new ConnectionError('transport', message, { cause: err })
    return new ConnectionError('protocol', message, { cause: err })
  }
  return new ConnectionError('transport', message, { cause: err })
}

export class SdkConnection implements ServerConnection {
  private client: Client | null = null
  private closed = false

  constructor(
    private readonly serverName: string,
    private readonly transportFactory: () => Transport | Promise<Transport>,
    private readonly logger?: Logger,
  ) {}

  async open(options: ConnectionCallOptions): Promise<void> {
    const client = new Client(CLIENT_INFO)
    try {
      const transport = await this.transportFactory()
      await client.connect(transport, { signal: options.signal, timeout: timerDelay(options.timeoutMs) })
    } catch (err) {
      await this.closeClient(client)
      throw classifySdkError(err)
    }
    if (this.closed) {
      await this.closeClient(client)
      throw new ConnectionError('transport', `Connection to ${this.serverName} closed while opening`)
    }
    this.client = client
  }

  async listCapabilities(options: ConnectionCallOptions): Promise<CapabilityInfo[]> {
    const client = this.requireClient()
    const capabilities: CapabilityInfo[] = []
    let cursor: string | undefined
    try {
      do {
        const page = await client.listTools(cursor ? { cursor } : undefined, {
          signal: options.signal,
          timeout: timerDelay(options.timeoutMs),
        })
        for (const tool of page.tools) {
          capabilities.push({ name: tool.name, description: tool.description ?? '', inputSchema: tool.inputSchema })
        }
        cursor = page.nextCursor
      } while (cursor)
    } catch (err) {
      throw classifySdkError(err)
    }
    return capabilities
  }

  async call(name: string, args: Record<string, unknown>, options: ConnectionCallOptions): Promise<string> {
    const client = this.requireClient()
    let raw: unknown
    try {
      raw = await client.callTool({ name, arguments: args }, CallToolResultSchema, {
        signal: options.signal,
        timeout: timerDelay(options.timeoutMs),
      })
    } catch (err) {
      throw classifySdkError(err)
    }

    const parsed = CallToolResultSchema.safeParse(raw)
    if (!parsed.success) {
      throw new ConnectionError('protocol', `Malformed result from ${this.serverName}/${name}`, { cause: parsed.error })
    }
    const text = flattenContent(parsed.data.content)
    if (parsed.data.isError) throw new ConnectionError('protocol', text)
    return text
  }

  async close(): Promise<void> {
    this.closed = true
    const client = this.client
    this.client = null
    if (client) await this.closeClient(client)
  }

  private requireClient(): Client {
    if (!this.client) throw new ConnectionError('transport', `Not connected to ${this.serverName}`)
    return this.client
  }

  private async closeClient(client: Client): Promise<void> {
    try {
      await client.close()
    } catch (err) {
      this.logger?.debug({ err, server: this.serverName }, 'Client close failed')
    }
  }
}

/** Default factory: one SDK client per connection, over the descriptor's transport. */
export function sdkConnectionFactory(logger?: Logger): ConnectionFactory {
  return (descriptor) => new SdkConnection(descriptor.name, () => createTransport(descriptor), logger)
}

import { StdioClientTransport, getDefaultEnvironment } from '@modelcontextprotocol/sdk/client/stdio.js'
import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js'
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js'
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js'

import { BridgeError } from '../errors'
import type { ServerDescriptor, TransportKind } from '../schemas/config'

export type TransportFactory = (descriptor: ServerDescriptor) => Transport

function requireUrl(descriptor: ServerDescriptor): URL {
  if (!descriptor.url) {
    throw new BridgeError('InvalidConfig', `Server "${descriptor.name}" has no url for ${descriptor.transport}`)
  }
  return new URL(descriptor.url)
}

/** One entry per supported transport. */
export const TRANSPORT_FACTORIES: Record<TransportKind, TransportFactory> = {
  stdio: (descriptor) => {
    if (!descriptor.command) {
      throw new BridgeError('InvalidConfig', `Server "${descriptor.name}" has no command for stdio`)
    }
    return new StdioClientTransport({
      command: descriptor.command,
      args: descriptor.args,
      env: descriptor.env ? { ...getDefaultEnvironment(), ...descriptor.env } : undefined,
      cwd: descriptor.cwd,
    })
  },
  sse: (descriptor) =>
    new SSEClientTransport(requireUrl(descriptor), {
      requestInit: { headers: descriptor.headers ?? {} },
    }),
  'streamable-http': (descriptor) =>
    new StreamableHTTPClientTransport(requireUrl(descriptor), {
      requestInit: { headers: descriptor.headers ?? {} },
    }),
}

export function createTransport(descriptor: ServerDescriptor): Transport {
  return TRANSPORT_FACTORIES[descriptor.transport](descriptor)
}

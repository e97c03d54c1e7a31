import { ConnectionError } from '@mcpmux/bridge'
import type { CapabilityInfo, ConnectionFactory, ServerConnection } from '@mcpmux/bridge'

const CAPABILITIES: CapabilityInfo[] = [
  {
    name: 'echo',
    description: 'Echo the arguments',
    inputSchema: { type: 'object', properties: { text: { type: 'string' } } },
  },
  { name: 'boom', description: 'Always fails', inputSchema: { type: 'object' } },
]

function stubConnection(): ServerConnection {
  return {
    open: async () => {},
    listCapabilities: async () => CAPABILITIES.map((cap) => ({ ...cap })),
    call: async (name, args) => {
      if (name === 'boom') throw new ConnectionError('protocol', 'boom')
      return JSON.stringify(args)
    },
    close: async () => {},
  }
}

/** Every server connects and offers `echo` and `boom`, except those named in `unreachable`. */
export function stubConnectionFactory(unreachable: string[] = []): ConnectionFactory {
  return (descriptor) => {
    if (!unreachable.includes(descriptor.name)) return stubConnection()
    return {
      ...stubConnection(),
      open: async () => {
        throw new ConnectionError('transport', 'connection refused')
      },
    }
  }
}

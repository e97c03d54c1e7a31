import { describe, it, expect } from 'vitest'

import { parseServerDescriptor } from '../schemas/config'
import { ConnectionError } from '../session/connection'
import type { ConnectionCallOptions, ServerConnection } from '../session/connection'
import { inMemoryConnectionFactory } from './fixtures/echo-server'
import { stdioDescriptor } from './fixtures/fake-connection'

function options(): ConnectionCallOptions {
  return { signal: new AbortController().signal, timeoutMs: 5000 }
}

async function openEcho(): Promise<ServerConnection> {
  const connection = inMemoryConnectionFactory()(parseServerDescriptor(stdioDescriptor('echo')))
  await connection.open(options())
  return connection
}

describe('SdkConnection', () => {
  it('lists the server tools with their input schemas', async () => {
    const connection = await openEcho()
    const capabilities = await connection.listCapabilities(options())

    expect(capabilities.map((c) => c.name)).toEqual(['echo', 'sum', 'lines', 'pixel', 'fail'])
    const echo = capabilities[0]
    expect(echo.description).toBe('Echo the text back')
    expect(echo.inputSchema).toMatchObject({
      type: 'object',
      properties: { text: { type: 'string', description: 'Text to echo' } },
      required: ['text'],
    })
    await connection.close()
  })

  it('returns flattened text for a tool call', async () => {
    const connection = await openEcho()
    expect(await connection.call('echo', { text: 'hello' }, options())).toBe('hello')
    expect(await connection.call('sum', { values: [1, 2, 3.5] }, options())).toBe('6.5')
    expect(await connection.call('lines', {}, options())).toBe('first\nsecond')
    expect(await connection.call('pixel', {}, options())).toBe('[binary data: 4 bytes]')
    await connection.close()
  })

  it('turns an error result into a protocol failure carrying its text', async () => {
    const connection = await openEcho()
    const failure = await connection.call('fail', {}, options()).catch((err: unknown) => err)
    expect(failure).toBeInstanceOf(ConnectionError)
    expect(failure).toMatchObject({ reason: 'protocol', message: 'boom' })
    await connection.close()
  })

  it('classifies an unknown tool as a protocol failure', async () => {
    const connection = await openEcho()
    const failure = await connection.call('nope', {}, options()).catch((err: unknown) => err)
    expect(failure).toMatchObject({ reason: 'protocol' })
    await connection.close()
  })

  it('refuses calls after close', async () => {
    const connection = await openEcho()
    await connection.close()
    await expect(connection.call('echo', { text: 'x' }, options())).rejects.toMatchObject({
      reason: 'transport',
      message: 'Not connected to echo',
    })
  })
})

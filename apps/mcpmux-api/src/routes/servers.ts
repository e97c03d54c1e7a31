import type { FastifyInstance } from 'fastify'
import { parseServerDescriptor } from '@mcpmux/bridge'
import type { Bridge } from '@mcpmux/bridge'

type ServerParams = { Params: { name: string } }

export function registerServerRoutes(app: FastifyInstance, bridge: Bridge) {
  app.get('/v1/servers', async () => bridge.status())

  app.post('/v1/servers', async (request, reply) => {
    const descriptor = parseServerDescriptor(request.body)
    const connected = await bridge.addServer(descriptor)
    return reply.code(201).send({ name: descriptor.name, connected })
  })

  app.delete<ServerParams>('/v1/servers/:name', async (request, reply) => {
    await bridge.removeServer(request.params.name)
    return reply.code(204).send()
  })

  // `all` reconnects every enabled server
  app.post<ServerParams>('/v1/servers/:name/reconnect', async (request) => {
    return { results: await bridge.reconnect(request.params.name) }
  })
}

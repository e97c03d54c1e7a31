import type { FastifyInstance } from 'fastify'
import { toolCallRequestSchema } from '@mcpmux/bridge'
import type { Bridge } from '@mcpmux/bridge'

export function registerToolRoutes(app: FastifyInstance, bridge: Bridge) {
  app.get('/v1/tools', async () => ({ tools: bridge.listCapabilities() }))

  app.get('/v1/tools/stats', async () => ({ stats: bridge.stats() }))

  app.post('/v1/tools/call', async (request) => {
    const body = toolCallRequestSchema.parse(request.body)
    return bridge.invoke(body.tool, body.arguments, body.identity, { timeoutMs: body.timeout_ms })
  })
}

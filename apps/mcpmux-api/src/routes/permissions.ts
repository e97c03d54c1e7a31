import type { FastifyInstance } from 'fastify'
import type { Bridge } from '@mcpmux/bridge'

export function registerPermissionRoutes(app: FastifyInstance, bridge: Bridge) {
  app.get<{ Params: { tool: string } }>('/v1/permissions/:tool', async (request) => {
    return bridge.permissionsFor(request.params.tool)
  })
}

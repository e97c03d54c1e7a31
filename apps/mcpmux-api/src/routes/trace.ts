import type { FastifyInstance } from 'fastify'
import { z } from 'zod'
import type { Bridge } from '@mcpmux/bridge'

const traceQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(1000).optional(),
  tool: z.string().min(1).optional(),
})

export function registerTraceRoutes(app: FastifyInstance, bridge: Bridge) {
  app.get('/v1/trace', async (request) => {
    const { limit, tool } = traceQuerySchema.parse(request.query)
    const records = tool
      ? bridge.traceByCapability(tool, limit)
      : bridge.traceRecent(limit)
    return { records }
  })
}

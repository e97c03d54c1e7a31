import type { FastifyInstance } from 'fastify'
import { z } from 'zod'
import type { Bridge } from '@mcpmux/bridge'

const clearQuerySchema = z.object({
  pattern: z.string().min(1).optional(),
})

export function registerCacheRoutes(app: FastifyInstance, bridge: Bridge) {
  app.get('/v1/cache', async () => ({
    stats: bridge.cacheStats(),
    entries: bridge.cacheEntries(),
  }))

  app.delete('/v1/cache', async (request) => {
    const { pattern } = clearQuerySchema.parse(request.query)
    return { removed: bridge.cacheClear(pattern) }
  })
}

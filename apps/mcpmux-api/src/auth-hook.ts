import { timingSafeEqual } from 'node:crypto'
import type { FastifyInstance, FastifyRequest } from 'fastify'

function bearerToken(request: FastifyRequest): string | null {
  const auth = request.headers.authorization
  if (!auth?.startsWith('Bearer ')) return null
  return auth.replace('Bearer ', '').trim()
}

function tokensMatch(given: string, expected: string): boolean {
  const a = Buffer.from(given)
  const b = Buffer.from(expected)
  return a.length === b.length && timingSafeEqual(a, b)
}

/** Requires `Authorization: Bearer <token>` on every /v1 route. */
export function registerAdminAuth(app: FastifyInstance, adminToken: string) {
  app.addHook('onRequest', async (request, reply) => {
    if (!request.url.startsWith('/v1')) return
    const token = bearerToken(request)
    if (!token) return reply.code(401).send({ error: 'Missing admin token' })
    if (!tokensMatch(token, adminToken)) return reply.code(401).send({ error: 'Invalid admin token' })
  })
}

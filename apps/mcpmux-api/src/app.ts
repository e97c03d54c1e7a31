import Fastify from 'fastify'
import type { FastifyInstance } from 'fastify'
import { ZodError } from 'zod'
import { isBridgeError } from '@mcpmux/bridge'
import type { Bridge } from '@mcpmux/bridge'
import { captureError, SERVICE_NAMES } from '@mcpmux/observability'
import { registerAdminAuth } from './auth-hook'
import { registerHealthRoute } from './health-route'
import { registerToolRoutes } from './routes/tools'
import { registerServerRoutes } from './routes/servers'
import { registerTraceRoutes } from './routes/trace'
import { registerCacheRoutes } from './routes/cache'
import { registerPermissionRoutes } from './routes/permissions'

export interface AppOptions {
  /** When set, every /v1 route requires it as a bearer token. */
  adminToken?: string
  /** Fastify request logging; off unless given. */
  logger?: boolean | { level: string }
}

function clientStatusCode(error: Error): number | null {
  if (!('statusCode' in error) || typeof error.statusCode !== 'number') return null
  return error.statusCode >= 400 && error.statusCode < 500 ? error.statusCode : null
}

export async function buildApp(bridge: Bridge, opts: AppOptions = {}): Promise<FastifyInstance> {
  const app = Fastify({ logger: opts.logger ?? false })

  app.setErrorHandler((error: Error, request, reply) => {
    if (isBridgeError(error)) {
      return reply.status(error.statusCode).send({ error: error.message, kind: error.kind })
    }
    if (error instanceof ZodError) {
      return reply.status(400).send({
        error: 'Invalid request',
        issues: error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
      })
    }
    const status = clientStatusCode(error)
    if (status !== null) {
      return reply.status(status).send({ error: error.message })
    }

    captureError(error, {
      service: SERVICE_NAMES.API,
      operation: `${request.method} ${request.url}`,
    })
    request.log.error({ err: error }, 'Unhandled request error')
    return reply.status(500).send({ error: 'Internal Server Error' })
  })

  if (opts.adminToken) registerAdminAuth(app, opts.adminToken)

  registerHealthRoute(app, SERVICE_NAMES.API)
  registerToolRoutes(app, bridge)
  registerServerRoutes(app, bridge)
  registerTraceRoutes(app, bridge)
  registerCacheRoutes(app, bridge)
  registerPermissionRoutes(app, bridge)

  await app.ready()
  return app
}

import {
  Bridge,
  PostgresTraceSink,
  createDbClient,
  truncatingPostProcessor,
} from '@mcpmux/bridge'
import type { TraceSink } from '@mcpmux/bridge'
import {
  initSentry,
  captureError,
  initTracing,
  shutdownTracing,
  flushSentry,
  createLogger,
  SERVICE_NAMES,
} from '@mcpmux/observability'
import { buildApp } from './app'
import { loadBridgeConfig, readEnv } from './config'

async function buildServer() {
  initSentry({ serviceName: SERVICE_NAMES.API })
  await initTracing({ serviceName: SERVICE_NAMES.API })

  const env = readEnv()
  const logger = createLogger({ service: SERVICE_NAMES.API, level: env.logLevel })

  // Trace persistence (optional)
  let traceSink: TraceSink | undefined
  const db = env.databaseUrl ? createDbClient(env.databaseUrl, logger) : null
  if (db) {
    const sink = new PostgresTraceSink(db)
    await sink.ensureTable()
    traceSink = sink
    logger.info('Postgres trace sink initialized')
  }

  const bridge = new Bridge({
    config: loadBridgeConfig(env, logger),
    traceSink,
    postProcessor: truncatingPostProcessor,
    logger: logger.child({ component: 'bridge' }),
  })
  await bridge.start()

  if (!env.adminToken) logger.warn('MCPMUX_ADMIN_TOKEN not set - admin API is unauthenticated')
  const app = await buildApp(bridge, {
    adminToken: env.adminToken ?? undefined,
    logger: { level: env.logLevel },
  })

  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutting down')
    await app.close()
    await bridge.shutdown()
    await db?.end()
    await shutdownTracing()
    await flushSentry()
    process.exit(0)
  }
  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err) => {
        logger.error({ err }, 'Shutdown failed')
        process.exit(1)
      })
    })
  }

  return { app, env }
}

buildServer()
  .then(({ app, env }) => app.listen({ port: env.port, host: env.host }))
  .catch((err) => {
    captureError(err, { service: SERVICE_NAMES.API, operation: 'startup' })
    console.error(err)
    process.exit(1)
  })

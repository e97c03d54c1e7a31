import pg from 'pg'
import type { Logger } from '@mcpmux/observability'

export type DbClient = {
  query: (text: string, values?: unknown[]) => Promise<{ rows: unknown[] }>
  end: () => Promise<void>
}

export function createDbClient(databaseUrl: string | undefined, logger?: Logger): DbClient | undefined {
  if (!databaseUrl) {
    logger?.warn('DATABASE_URL not set, durable trace disabled')
    return undefined
  }
  const pool = new pg.Pool({ connectionString: databaseUrl, max: 5 })
  pool.on('error', (err) => {
    logger?.error({ err }, 'Idle database client error')
  })
  return {
    query: (text: string, values?: unknown[]) => pool.query(text, values),
    end: () => pool.end(),
  }
}

/**
 * Append-only trace table. Arguments are stored as a hash of their canonical
 * JSON, never verbatim.
 */

import { canonicalJson, sha256Hex } from '../cache/cache-key'
import type { CallRecord, TraceSink } from '../types'
import type { DbClient } from './db-client'

export const TRACE_TABLE = 'mcpmux_call_trace'

const CREATE_TABLE_SQL = `CREATE TABLE IF NOT EXISTS ${TRACE_TABLE} (
  id TEXT PRIMARY KEY,
  capability TEXT NOT NULL,
  server TEXT,
  raw_capability TEXT,
  identities TEXT[] NOT NULL,
  args_hash TEXT,
  started_at TIMESTAMPTZ NOT NULL,
  finished_at TIMESTAMPTZ NOT NULL,
  duration_ms INTEGER NOT NULL,
  outcome TEXT NOT NULL,
  cache_hit BOOLEAN NOT NULL,
  post_processed BOOLEAN NOT NULL,
  error_kind TEXT,
  error_message TEXT
)`

const CREATE_INDEX_SQL = `CREATE INDEX IF NOT EXISTS ${TRACE_TABLE}_capability_idx ON ${TRACE_TABLE} (capability, started_at DESC)`

export function hashArgs(args: Record<string, unknown>): string | null {
  if (Object.keys(args).length === 0) return null
  return sha256Hex(canonicalJson(args))
}

export class PostgresTraceSink implements TraceSink {
  constructor(private readonly db: DbClient) {}

  async ensureTable(): Promise<void> {
    await this.db.query(CREATE_TABLE_SQL)
    await this.db.query(CREATE_INDEX_SQL)
  }

  async append(record: Readonly<CallRecord>): Promise<void> {
    await this.db.query(
      `INSERT INTO ${TRACE_TABLE}
        (id, capability, server, raw_capability, identities, args_hash, started_at, finished_at,
         duration_ms, outcome, cache_hit, post_processed, error_kind, error_message)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14)`,
      [
        record.id,
        record.capability,
        record.server,
        record.rawCapability,
        [...record.identities],
        hashArgs(record.args),
        new Date(record.startedAt),
        new Date(record.finishedAt),
        Math.round(record.durationMs),
        record.outcome,
        record.cacheHit,
        record.postProcessed,
        record.errorKind,
        record.error,
      ],
    )
  }
}

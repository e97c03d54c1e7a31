/**
 * CallTracer: the last N call records in memory, optionally mirrored to a
 * durable sink. Sink writes never delay or fail the call being recorded.
 */

import { classifyError } from '@mcpmux/observability'
import type { Logger } from '@mcpmux/observability'

import type { TraceSettings } from '../schemas/config'
import type { CallRecord, TraceSink } from '../types'
import { RingBuffer } from './ring-buffer'

export interface CallTracerOptions {
  settings: TraceSettings
  sink?: TraceSink
  logger?: Logger
}

export class CallTracer {
  private readonly buffer: RingBuffer<Readonly<CallRecord>>
  private readonly pending = new Set<Promise<void>>()
  private readonly settings: TraceSettings
  private readonly sink?: TraceSink
  private readonly logger?: Logger

  constructor(options: CallTracerOptions) {
    this.settings = options.settings
    this.sink = options.sink
    this.logger = options.logger?.child({ component: 'tracer' })
    this.buffer = new RingBuffer(options.settings.maxRecords)
  }

  get enabled(): boolean {
    return this.settings.enabled
  }

  record(entry: CallRecord): Readonly<CallRecord> {
    const copy: CallRecord = { ...entry, identities: [...entry.identities], args: { ...entry.args } }
    Object.freeze(copy.identities)
    Object.freeze(copy.args)
    const record = Object.freeze(copy)
    if (!this.settings.enabled) return record

    this.buffer.push(record)
    if (this.sink) this.mirror(this.sink, record)
    return record
  }

  private mirror(sink: TraceSink, record: Readonly<CallRecord>): void {
    // A sink that throws synchronously is treated like one that rejects.
    const write = Promise.resolve()
      .then(() => sink.append(record))
      .catch((err) => {
        this.logger?.error({ err, errorType: classifyError(err), traceId: record.id }, 'Trace sink write failed')
      })
      .finally(() => {
        this.pending.delete(write)
      })
    this.pending.add(write)
  }

  /** Most recent first. */
  recent(limit = this.settings.maxRecords): Readonly<CallRecord>[] {
    return this.buffer.newest(limit)
  }

  byCapability(capability: string, limit = this.settings.maxRecords): Readonly<CallRecord>[] {
    return this.buffer
      .newest()
      .filter((record) => record.capability === capability)
      .slice(0, Math.max(0, limit))
  }

  /** Wait for sink writes issued so far. */
  async flush(): Promise<void> {
    await Promise.allSettled(Array.from(this.pending))
  }

  clear(): void {
    this.buffer.clear()
  }

  get size(): number {
    return this.buffer.size
  }
}

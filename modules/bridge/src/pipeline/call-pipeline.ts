/**
 * CallPipeline: the one entry point for tool calls.
 *
 *   coerce args → permission → cache → resolve + dispatch → cache put
 *     → post-process → trace
 *
 * Every path, including denials and failures, records exactly one trace entry.
 */

import { randomUUID } from 'node:crypto'
import { ATTR_KEYS, SPAN_NAMES, classifyError, hashForTelemetry, withSpan } from '@mcpmux/observability'
import type { Logger } from '@mcpmux/observability'

import type { CallCache } from '../cache/call-cache'
import { coerceArguments } from '../capabilities/parameter-spec'
import { BridgeError, errorMessage, isBridgeError } from '../errors'
import type { PermissionEvaluator } from '../permissions/permission-evaluator'
import { callerKey, expandCaller, formatIdentity } from '../permissions/identity'
import type { SessionRegistry } from '../registry/session-registry'
import type { BridgeSettings } from '../schemas/config'
import type { CallerIdentity } from '../schemas/tool-call'
import type { CallTracer } from '../trace/call-tracer'
import type { CallRecord, InvokeOutcome, PostProcessor, ToolCallResult } from '../types'
import { resolvePostProcess, runPostProcessor, shouldPostProcess } from './post-process'

export interface CallPipelineOptions {
  settings: BridgeSettings
  registry: SessionRegistry
  cache: CallCache
  permissions: PermissionEvaluator
  tracer: CallTracer
  postProcessor?: PostProcessor
  logger?: Logger
}

export interface InvokeOptions {
  /** Overall budget for dispatch plus post-processing. Defaults to `callTimeoutMs`. */
  timeoutMs?: number
}

type CallDraft = Pick<CallRecord, 'id' | 'capability' | 'server' | 'rawCapability' | 'identities' | 'args' | 'startedAt'>

type CallEnding = {
  outcome: CallRecord['outcome']
  cacheHit?: boolean
  postProcessed?: boolean
  error?: BridgeError
  rawResult?: string
  processedResult?: string
}

function failureToError(capability: string, outcome: Extract<InvokeOutcome, { ok: false }>): BridgeError {
  switch (outcome.reason) {
    case 'timeout':
      return new BridgeError('Timeout', `Tool "${capability}" timed out: ${outcome.message}`)
    case 'protocol':
      return new BridgeError('ProtocolError', `Tool "${capability}" failed: ${outcome.message}`)
    case 'transport':
    case 'unavailable':
      return new BridgeError('Unavailable', `Tool "${capability}" is unavailable: ${outcome.message}`)
  }
}

export class CallPipeline {
  private readonly settings: BridgeSettings
  private readonly registry: SessionRegistry
  private readonly cache: CallCache
  private readonly permissions: PermissionEvaluator
  private readonly tracer: CallTracer
  private readonly postProcessor?: PostProcessor
  private readonly logger?: Logger

  constructor(options: CallPipelineOptions) {
    this.settings = options.settings
    this.registry = options.registry
    this.cache = options.cache
    this.permissions = options.permissions
    this.tracer = options.tracer
    this.postProcessor = options.postProcessor
    this.logger = options.logger?.child({ component: 'pipeline' })
  }

  async invoke(
    capability: string,
    args: Record<string, unknown>,
    caller: CallerIdentity,
    options: InvokeOptions = {},
  ): Promise<ToolCallResult> {
    const startedAt = Date.now()
    const deadline = startedAt + (options.timeoutMs ?? this.settings.callTimeoutMs)
    const identities = expandCaller(caller)
    const descriptor = this.registry.describe(capability)
    const callArgs = descriptor ? coerceArguments(args, descriptor.inputSchema) : { ...args }

    const draft: CallDraft = {
      id: randomUUID(),
      capability,
      server: descriptor?.server ?? null,
      rawCapability: descriptor?.name ?? null,
      identities: identities.map(formatIdentity),
      args: callArgs,
      startedAt,
    }

    // 1. Permission
    const decision = this.permissions.check(capability, identities)
    if (!decision.allowed) {
      const error = new BridgeError('PermissionDenied', `Permission denied for "${capability}" (${decision.reason})`)
      this.finish(draft, { outcome: 'denied', error })
      this.logger?.info({ tool: capability, identities: draft.identities, reason: decision.reason }, 'Tool call denied')
      throw error
    }

    // 2. Cache
    const partition = this.permissions.isIdentityIndependent(capability) ? '' : callerKey(identities)
    const cached = this.cache.get(capability, callArgs, partition)
    if (cached !== undefined) {
      const record = this.finish(draft, { outcome: 'success', cacheHit: true, rawResult: cached, processedResult: cached })
      return this.toResult(record, cached)
    }

    // 3. Dispatch
    let raw: string
    try {
      raw = await this.dispatch(capability, callArgs, deadline, draft.identities.join(','))
    } catch (err) {
      const error = isBridgeError(err) ? err : new BridgeError('ProtocolError', errorMessage(err), { cause: err })
      this.finish(draft, { outcome: 'error', error })
      this.logger?.warn({ tool: capability, kind: error.kind, err: error.message }, 'Tool call failed')
      throw error
    }
    this.cache.put(capability, callArgs, raw, undefined, partition)

    // 4. Post-process
    const processed = await this.postProcess(capability, draft.server, raw, deadline)
    const record = this.finish(draft, {
      outcome: 'success',
      postProcessed: processed !== undefined,
      rawResult: raw,
      processedResult: processed ?? raw,
    })
    return this.toResult(record, processed ?? raw)
  }

  private dispatch(
    capability: string,
    args: Record<string, unknown>,
    deadline: number,
    callerIdentity: string,
  ): Promise<string> {
    const attrs = {
      [ATTR_KEYS.TOOL_NAME]: capability,
      [ATTR_KEYS.CALLER_KEY_HASH]: hashForTelemetry(callerIdentity),
      [ATTR_KEYS.TOOL_CACHE_HIT]: false,
    }
    return withSpan(SPAN_NAMES.TOOL_EXECUTE, attrs, async (span) => {
      const { session, capability: rawName } = this.registry.resolve(capability)
      span.setAttribute(ATTR_KEYS.TOOL_SERVER, session.name)

      const remaining = deadline - Date.now()
      if (remaining <= 0) throw new BridgeError('Timeout', `Tool "${capability}" exceeded its deadline before dispatch`)

      const started = Date.now()
      const outcome = await session.invoke(rawName, args, remaining)
      span.setAttribute(ATTR_KEYS.TOOL_DURATION_MS, Date.now() - started)
      if (outcome.ok) return outcome.payload

      span.setAttribute(ATTR_KEYS.TOOL_ERROR_TYPE, outcome.reason)
      throw failureToError(capability, outcome)
    })
  }

  /** Resolves with the processed text, or undefined when the raw text stands. */
  private async postProcess(
    capability: string,
    server: string | null,
    raw: string,
    deadline: number,
  ): Promise<string | undefined> {
    if (!this.postProcessor) return undefined

    const override = server ? this.registry.session(server)?.descriptor.postProcess : undefined
    const settings = resolvePostProcess(this.settings.postProcess, override)
    if (!shouldPostProcess(settings, raw)) return undefined

    const remaining = deadline - Date.now()
    if (remaining <= 0) return undefined

    const processor = this.postProcessor
    try {
      return await withSpan(SPAN_NAMES.POST_PROCESS, { [ATTR_KEYS.TOOL_NAME]: capability }, () =>
        runPostProcessor(processor, raw, settings, capability, remaining),
      )
    } catch (err) {
      this.logger?.warn({ tool: capability, err, errorType: classifyError(err) }, 'Post-processing failed, returning raw result')
      return undefined
    }
  }

  private finish(draft: CallDraft, ending: CallEnding): Readonly<CallRecord> {
    const finishedAt = Date.now()
    return this.tracer.record({
      ...draft,
      finishedAt,
      durationMs: finishedAt - draft.startedAt,
      outcome: ending.outcome,
      success: ending.outcome === 'success',
      cacheHit: ending.cacheHit ?? false,
      postProcessed: ending.postProcessed ?? false,
      errorKind: ending.error?.kind ?? null,
      error: ending.error?.message ?? null,
      rawResult: ending.rawResult ?? null,
      processedResult: ending.processedResult ?? null,
    })
  }

  private toResult(record: Readonly<CallRecord>, content: string): ToolCallResult {
    return {
      capability: record.capability,
      server: record.server,
      content,
      cacheHit: record.cacheHit,
      postProcessed: record.postProcessed,
      durationMs: record.durationMs,
      traceId: record.id,
    }
  }
}

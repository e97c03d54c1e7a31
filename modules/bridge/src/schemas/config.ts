import { z } from 'zod'
import { BridgeError } from '../errors'
import { MAX_TIMER_MS } from '../util/timing'

/** A delay handed to a Node timer. */
export const timerMsSchema = z.number().int().positive().max(MAX_TIMER_MS, `must be at most ${MAX_TIMER_MS} ms`)

/** Server names are a qualified-name segment, so `_` is reserved as the delimiter. */
export const SERVER_NAME_PATTERN = /^[A-Za-z0-9-]+$/

const TRANSPORT_ALIASES: Record<string, string> = {
  http: 'streamable-http',
  streamable_http: 'streamable-http',
  streamablehttp: 'streamable-http',
}

export const transportKindSchema = z.preprocess(
  (value) => {
    if (typeof value !== 'string') return value
    const lower = value.toLowerCase()
    return TRANSPORT_ALIASES[lower] ?? lower
  },
  z.enum(['stdio', 'sse', 'streamable-http']),
)

export const postProcessOverrideSchema = z.object({
  enabled: z.boolean().optional(),
  thresholdChars: z.number().int().positive().optional(),
  maxOutputChars: z.number().int().positive().optional(),
})

export const serverDescriptorSchema = z
  .object({
    name: z.string().regex(SERVER_NAME_PATTERN, 'server names may only contain letters, digits and "-"'),
    enabled: z.boolean().default(true),
    transport: transportKindSchema.default('stdio'),
    description: z.string().optional(),
    // stdio
    command: z.string().optional(),
    args: z.array(z.string()).default([]),
    env: z.record(z.string()).optional(),
    cwd: z.string().optional(),
    // sse / streamable-http
    url: z.string().url().optional(),
    headers: z.record(z.string()).optional(),
    postProcess: postProcessOverrideSchema.optional(),
  })
  .superRefine((server, ctx) => {
    if (server.transport === 'stdio' && !server.command) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['command'], message: 'stdio transport requires a command' })
    }
    if (server.transport !== 'stdio' && !server.url) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['url'], message: `${server.transport} transport requires a url` })
    }
  })

export const permissionRuleSchema = z.object({
  tool: z.string().min(1),
  mode: z.enum(['whitelist', 'blacklist']),
  allowed: z.array(z.string()).default([]),
  denied: z.array(z.string()).default([]),
})

export const heartbeatSettingsSchema = z.object({
  enabled: z.boolean().default(true),
  intervalMs: timerMsSchema.default(60_000),
  probeTimeoutMs: timerMsSchema.default(10_000),
  failureThreshold: z.number().int().min(1).default(3),
  autoReconnect: z.boolean().default(true),
  maxReconnectAttempts: z.number().int().min(1).default(3),
})

export const cacheSettingsSchema = z.object({
  enabled: z.boolean().default(true),
  ttlMs: z.number().int().positive().default(300_000),
  maxEntries: z.number().int().min(1).default(100),
  exclude: z.array(z.string()).default([]),
})

export const traceSettingsSchema = z.object({
  enabled: z.boolean().default(true),
  maxRecords: z.number().int().min(1).default(100),
})

export const postProcessSettingsSchema = z.object({
  enabled: z.boolean().default(false),
  thresholdChars: z.number().int().positive().default(2000),
  maxOutputChars: z.number().int().positive().default(1000),
})

export const permissionSettingsSchema = z.object({
  enabled: z.boolean().default(false),
  defaultMode: z.enum(['allow_all', 'deny_all']).default('allow_all'),
  quickAllow: z.array(z.string()).default([]),
  quickDeny: z.array(z.string()).default([]),
  rules: z.array(permissionRuleSchema).default([]),
})

export const bridgeSettingsSchema = z.object({
  toolPrefix: z.string().regex(SERVER_NAME_PATTERN, 'the tool prefix may not contain "_"').default('mcp'),
  connectTimeoutMs: timerMsSchema.default(30_000),
  callTimeoutMs: timerMsSchema.default(60_000),
  autoConnect: z.boolean().default(true),
  retryAttempts: z.number().int().min(1).default(3),
  retryIntervalMs: z.number().int().min(0).max(MAX_TIMER_MS).default(5_000),
  maxBackoffMs: z.number().int().min(0).max(MAX_TIMER_MS).default(60_000),
  heartbeat: heartbeatSettingsSchema.default({}),
  cache: cacheSettingsSchema.default({}),
  trace: traceSettingsSchema.default({}),
  postProcess: postProcessSettingsSchema.default({}),
  permissions: permissionSettingsSchema.default({}),
})

export const bridgeConfigSchema = z
  .object({
    settings: bridgeSettingsSchema.default({}),
    servers: z.array(serverDescriptorSchema).default([]),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>()
    config.servers.forEach((server, index) => {
      if (seen.has(server.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['servers', index, 'name'],
          message: `duplicate server name "${server.name}"`,
        })
      }
      seen.add(server.name)
    })
  })

export type TransportKind = z.infer<typeof transportKindSchema>
export type ServerDescriptor = z.infer<typeof serverDescriptorSchema>
export type ServerDescriptorInput = z.input<typeof serverDescriptorSchema>
export type PostProcessOverride = z.infer<typeof postProcessOverrideSchema>
export type PermissionRule = z.infer<typeof permissionRuleSchema>
export type HeartbeatSettings = z.infer<typeof heartbeatSettingsSchema>
export type CacheSettings = z.infer<typeof cacheSettingsSchema>
export type TraceSettings = z.infer<typeof traceSettingsSchema>
export type PostProcessSettings = z.infer<typeof postProcessSettingsSchema>
export type PermissionSettings = z.infer<typeof permissionSettingsSchema>
export type BridgeSettings = z.infer<typeof bridgeSettingsSchema>
export type BridgeSettingsInput = z.input<typeof bridgeSettingsSchema>
export type BridgeConfig = z.infer<typeof bridgeConfigSchema>
export type BridgeConfigInput = z.input<typeof bridgeConfigSchema>

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ')
}

export function parseBridgeConfig(raw: unknown): BridgeConfig {
  const result = bridgeConfigSchema.safeParse(raw)
  if (!result.success) {
    throw new BridgeError('InvalidConfig', `Invalid bridge configuration: ${formatIssues(result.error)}`, {
      cause: result.error,
    })
  }
  return result.data
}

export function parseServerDescriptor(raw: unknown): ServerDescriptor {
  const result = serverDescriptorSchema.safeParse(raw)
  if (!result.success) {
    throw new BridgeError('InvalidConfig', `Invalid server descriptor: ${formatIssues(result.error)}`, {
      cause: result.error,
    })
  }
  return result.data
}

/**
 * Canonical observability conventions for mcpmux services.
 * Single source of truth - import from here, never hardcode strings.
 */

export const SERVICE_NAMESPACE = 'mcpmux'

export const SERVICE_NAMES = {
  BRIDGE: 'mcpmux-bridge',
  API: 'mcpmux-api',
} as const

export const SPAN_NAMES = {
  TOOL_EXECUTE: 'mcpmux.tool_execute',
  SERVER_CONNECT: 'mcpmux.server_connect',
  SERVER_HEALTH: 'mcpmux.server_health',
  POST_PROCESS: 'mcpmux.post_process',
} as const

export const ATTR_KEYS = {
  // Identity (HASHED via hashForTelemetry)
  CALLER_KEY_HASH: 'mcpmux.caller_key_hash',
  // Tool metrics
  TOOL_NAME: 'mcpmux.tool.name',
  TOOL_SERVER: 'mcpmux.tool.server',
  TOOL_CACHE_HIT: 'mcpmux.tool.cache_hit',
  TOOL_DURATION_MS: 'mcpmux.tool.duration_ms',
  TOOL_ERROR_TYPE: 'mcpmux.tool.error_type',
  // Server health
  SERVER_NAME: 'mcpmux.server.name',
  SERVER_TRANSPORT: 'mcpmux.server.transport',
} as const

export const SAMPLING_DEFAULTS: Record<string, number> = {
  production: 0.1,
  staging: 1.0,
  development: 1.0,
  test: 0.0,
}

export type MuxEnvironment = 'production' | 'staging' | 'development' | 'test'

export function getMuxEnv(): MuxEnvironment {
  const env = process.env.MCPMUX_ENV || process.env.NODE_ENV || 'development'
  if (env === 'prod' || env === 'production') return 'production'
  if (env === 'stage' || env === 'staging' || env === 'preview') return 'staging'
  if (env === 'test') return 'test'
  return 'development'
}

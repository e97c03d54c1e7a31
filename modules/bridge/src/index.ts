export { Bridge } from './bridge'
export type { BridgeOptions } from './bridge'

export { BridgeError, isBridgeError, errorMessage } from './errors'
export type { BridgeErrorKind } from './errors'

export {
  bridgeConfigSchema,
  bridgeSettingsSchema,
  serverDescriptorSchema,
  permissionRuleSchema,
  parseBridgeConfig,
  parseServerDescriptor,
  SERVER_NAME_PATTERN,
} from './schemas/config'
export type {
  BridgeConfig,
  BridgeConfigInput,
  BridgeSettings,
  BridgeSettingsInput,
  ServerDescriptor,
  ServerDescriptorInput,
  PermissionRule,
  TransportKind,
} from './schemas/config'
export { callerIdentitySchema, toolCallRequestSchema } from './schemas/tool-call'
export type { CallerIdentity, ToolCallRequest } from './schemas/tool-call'

export { Session } from './session/session'
export type { SessionCounters } from './session/session'
export { SdkConnection, ConnectionError, sdkConnectionFactory } from './session/connection'
export type { ServerConnection, ConnectionFactory, ConnectionCallOptions } from './session/connection'
export { flattenContent } from './session/content'
export { TRANSPORT_FACTORIES, createTransport } from './session/transports'

export { SessionRegistry } from './registry/session-registry'
export type { RegistryStatus, ServerStatus, ReconnectResult } from './registry/session-registry'
export { HeartbeatScheduler } from './registry/heartbeat'

export { toParameterSpecs, coerceArguments } from './capabilities/parameter-spec'
export type { ParameterSpec, ParameterType } from './capabilities/parameter-spec'
export { qualifyName, parseQualifiedName } from './capabilities/qualified-name'

export { CallCache } from './cache/call-cache'
export type { CacheStats, CacheEntryInfo } from './cache/call-cache'

export { PermissionEvaluator } from './permissions/permission-evaluator'
export type { PermissionDecision, PermissionSummary } from './permissions/permission-evaluator'
export { expandCaller, formatIdentity } from './permissions/identity'
export type { Identity, IdentityScope } from './permissions/identity'

export { CallTracer } from './trace/call-tracer'
export { PostgresTraceSink } from './trace/postgres-sink'
export { createDbClient } from './trace/db-client'
export type { DbClient } from './trace/db-client'

export { CallPipeline } from './pipeline/call-pipeline'
export type { InvokeOptions } from './pipeline/call-pipeline'
export { truncatingPostProcessor } from './pipeline/post-process'

export type {
  CapabilityDescriptor,
  CapabilityInfo,
  CapabilitySink,
  CallRecord,
  PostProcessor,
  PostProcessContext,
  SessionState,
  ToolCallResult,
  TraceSink,
} from './types'

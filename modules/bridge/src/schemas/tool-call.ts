import { z } from 'zod'
import { timerMsSchema } from './config'

export const callerIdentitySchema = z.object({
  platform: z.string().min(1),
  userId: z.string().min(1),
  groupId: z.string().min(1).optional(),
})

export const toolCallRequestSchema = z.object({
  tool: z.string().min(1),
  arguments: z.record(z.unknown()).default({}),
  identity: callerIdentitySchema,
  timeout_ms: timerMsSchema.optional(),
})

export type CallerIdentity = z.infer<typeof callerIdentitySchema>
export type ToolCallRequest = z.infer<typeof toolCallRequestSchema>

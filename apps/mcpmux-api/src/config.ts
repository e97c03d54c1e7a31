import { readFileSync } from 'node:fs'
import { z } from 'zod'
import type { Logger } from '@mcpmux/observability'

export const DEFAULT_CONFIG_PATH = 'mcpmux.config.json'

const envSchema = z.object({
  MCPMUX_CONFIG: z.string().min(1).optional(),
  PORT: z.coerce.number().int().min(0).max(65535).default(4020),
  HOST: z.string().min(1).default('0.0.0.0'),
  DATABASE_URL: z.string().optional(),
  MCPMUX_ADMIN_TOKEN: z.string().optional(),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
})

export interface ApiEnv {
  configPath: string
  /** False when the path fell back to the default. */
  configPathExplicit: boolean
  port: number
  host: string
  databaseUrl: string | null
  adminToken: string | null
  logLevel: string
}

export function readEnv(env: NodeJS.ProcessEnv = process.env): ApiEnv {
  const parsed = envSchema.parse(env)
  return {
    configPath: parsed.MCPMUX_CONFIG ?? DEFAULT_CONFIG_PATH,
    configPathExplicit: parsed.MCPMUX_CONFIG !== undefined,
    port: parsed.PORT,
    host: parsed.HOST,
    databaseUrl: parsed.DATABASE_URL || null,
    adminToken: parsed.MCPMUX_ADMIN_TOKEN || null,
    logLevel: parsed.LOG_LEVEL,
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

/**
 * Reads the raw bridge configuration. A missing file at the default path
 * yields an empty config; a missing explicit path is an error.
 */
export function loadBridgeConfig(env: Pick<ApiEnv, 'configPath' | 'configPathExplicit'>, logger?: Logger): unknown {
  let text: string
  try {
    text = readFileSync(env.configPath, 'utf8')
  } catch (err) {
    if (isMissingFile(err) && !env.configPathExplicit) {
      logger?.warn({ path: env.configPath }, 'No config file found, starting with no servers')
      return {}
    }
    throw err
  }

  try {
    return JSON.parse(text)
  } catch (err) {
    throw new Error(`Config file ${env.configPath} is not valid JSON`, { cause: err })
  }
}

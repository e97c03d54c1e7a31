/**
 * Maps a capability's JSON input schema to flat parameter specs a host can
 * turn into its own callable signature, and coerces string-encoded JSON
 * arguments back into structured values.
 */

import type { JsonSchema } from '../types'

export type ParameterType = 'string' | 'integer' | 'float' | 'boolean'

export interface ParameterSpec {
  name: string
  type: ParameterType
  description: string
  required: boolean
  enumValues?: string[]
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function schemaProperties(inputSchema: JsonSchema): Record<string, Record<string, unknown>> {
  const properties = inputSchema.properties
  if (!isRecord(properties)) return {}
  const result: Record<string, Record<string, unknown>> = {}
  for (const [name, prop] of Object.entries(properties)) {
    result[name] = isRecord(prop) ? prop : {}
  }
  return result
}

/** The declared JSON type, skipping `null` in a type union. */
function declaredType(prop: Record<string, unknown>): string | undefined {
  const type = prop.type
  if (typeof type === 'string') return type
  if (Array.isArray(type)) {
    return type.find((t): t is string => typeof t === 'string' && t !== 'null')
  }
  return undefined
}

function withNote(description: string, note: string): string {
  return description ? `${description} ${note}` : note
}

export function toParameterSpecs(inputSchema: JsonSchema): ParameterSpec[] {
  const required = new Set(
    Array.isArray(inputSchema.required)
      ? inputSchema.required.filter((r): r is string => typeof r === 'string')
      : [],
  )

  return Object.entries(schemaProperties(inputSchema)).map(([name, prop]) => {
    const description = typeof prop.description === 'string' ? prop.description : ''
    const spec: ParameterSpec = { name, type: 'string', description, required: required.has(name) }

    switch (declaredType(prop)) {
      case 'integer':
        spec.type = 'integer'
        break
      case 'number':
        spec.type = 'float'
        break
      case 'boolean':
        spec.type = 'boolean'
        break
      case 'array':
        spec.description = withNote(description, '(JSON array)')
        break
      case 'object':
        spec.description = withNote(description, '(JSON object)')
        break
    }

    if (Array.isArray(prop.enum)) spec.enumValues = prop.enum.map((v) => String(v))
    return spec
  })
}

function parseStructured(value: string): unknown {
  const trimmed = value.trim()
  if (!trimmed.startsWith('[') && !trimmed.startsWith('{')) return value
  try {
    const parsed: unknown = JSON.parse(trimmed)
    return typeof parsed === 'object' && parsed !== null ? parsed : value
  } catch {
    return value
  }
}

/**
 * Hosts often pass array/object parameters as JSON text. Replace such strings
 * with the parsed value when the schema declares an array or object there.
 */
export function coerceArguments(args: Record<string, unknown>, inputSchema: JsonSchema): Record<string, unknown> {
  const properties = schemaProperties(inputSchema)
  const result: Record<string, unknown> = { ...args }
  for (const [name, value] of Object.entries(args)) {
    if (typeof value !== 'string') continue
    const prop = properties[name]
    if (!prop) continue
    const type = declaredType(prop)
    if (type === 'array' || type === 'object') result[name] = parseStructured(value)
  }
  return result
}

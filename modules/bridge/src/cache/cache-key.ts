import { createHash } from 'node:crypto'
import { canonicalize } from 'json-canonicalize'

/** RFC 8785 canonical JSON, so key order and number formatting never change the digest. */
export function canonicalJson(value: unknown): string {
  return canonicalize(value)
}

export function sha256Hex(input: string): string {
  return createHash('sha256').update(input).digest('hex')
}

export function cacheKey(capability: string, args: Record<string, unknown>, partition = ''): string {
  return sha256Hex(canonicalJson({ capability, args, partition }))
}

/**
 * Qualified capability names: `{prefix}_{server}_{capability}`.
 *
 * Prefix and server names never contain `_`, so the first two underscores are
 * always the delimiters and the capability part may contain any.
 */

export interface QualifiedName {
  prefix: string
  server: string
  capability: string
}

export const NAME_DELIMITER = '_'

export function qualifyName(prefix: string, server: string, capability: string): string {
  return `${prefix}${NAME_DELIMITER}${server}${NAME_DELIMITER}${capability}`
}

export function parseQualifiedName(qualifiedName: string): QualifiedName | null {
  const first = qualifiedName.indexOf(NAME_DELIMITER)
  if (first <= 0) return null
  const second = qualifiedName.indexOf(NAME_DELIMITER, first + 1)
  if (second <= first + 1 || second === qualifiedName.length - 1) return null
  return {
    prefix: qualifiedName.slice(0, first),
    server: qualifiedName.slice(first + 1, second),
    capability: qualifiedName.slice(second + 1),
  }
}

/**
 * Whole-string glob matching where `*` matches any run of characters
 * (including none) and everything else is literal.
 */

const compiled = new Map<string, RegExp>()

function escapeRegExp(text: string): string {
  return text.replace(/[.+?^${}()|[\]\\]/g, '\\$&')
}

function compile(pattern: string): RegExp {
  let regex = compiled.get(pattern)
  if (!regex) {
    regex = new RegExp(`^${pattern.split('*').map(escapeRegExp).join('.*')}$`, 's')
    compiled.set(pattern, regex)
  }
  return regex
}

export function globMatch(pattern: string, value: string): boolean {
  if (pattern === '*') return true
  if (!pattern.includes('*')) return pattern === value
  return compile(pattern).test(value)
}

export function matchesAny(patterns: readonly string[], value: string): boolean {
  return patterns.some((pattern) => globMatch(pattern, value))
}

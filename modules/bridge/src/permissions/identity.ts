/**
 * Caller identities and the patterns permission rules match them with.
 *
 * Canonical form is `platform:id:scope`, e.g. `qq:123:group`.
 */

import type { CallerIdentity } from '../schemas/tool-call'
import { globMatch } from './glob'

export type IdentityScope = 'group' | 'private' | 'user'

export interface Identity {
  platform: string
  id: string
  scope: IdentityScope
}

/** Segments may be `*`. */
export interface IdentityPattern {
  platform: string
  id: string
  scope: string
  source: string
}

export function formatIdentity(identity: Identity): string {
  return `${identity.platform}:${identity.id}:${identity.scope}`
}

/** The conversation (group, or private chat with the user) followed by the user. */
export function expandCaller(caller: CallerIdentity): Identity[] {
  const conversation: Identity = caller.groupId
    ? { platform: caller.platform, id: caller.groupId, scope: 'group' }
    : { platform: caller.platform, id: caller.userId, scope: 'private' }
  return [conversation, { platform: caller.platform, id: caller.userId, scope: 'user' }]
}

/** Stable string for a caller's identity set. */
export function callerKey(identities: readonly Identity[]): string {
  return identities.map(formatIdentity).join(',')
}

/**
 * `platform:id:scope` as written; `scope:id` for any platform; a bare id
 * takes `bareScope`.
 */
export function parseIdentityPattern(pattern: string, bareScope: IdentityScope): IdentityPattern {
  const parts = pattern.split(':')
  if (parts.length === 1) return { platform: '*', id: pattern, scope: bareScope, source: pattern }
  if (parts.length === 2) return { platform: '*', scope: parts[0], id: parts[1], source: pattern }
  return {
    platform: parts[0],
    id: parts.slice(1, -1).join(':'),
    scope: parts[parts.length - 1],
    source: pattern,
  }
}

export function identityMatches(pattern: IdentityPattern, identity: Identity): boolean {
  return (
    globMatch(pattern.platform, identity.platform) &&
    globMatch(pattern.scope, identity.scope) &&
    globMatch(pattern.id, identity.id)
  )
}

export function anyIdentityMatches(patterns: readonly IdentityPattern[], identities: readonly Identity[]): boolean {
  return patterns.some((pattern) => identities.some((identity) => identityMatches(pattern, identity)))
}

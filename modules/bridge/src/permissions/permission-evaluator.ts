/**
 * PermissionEvaluator: decides whether a set of caller identities may use a
 * capability.
 *
 * Order: disabled → quick-allow → quick-deny (conversation only) → first
 * matching rule → default mode.
 */

import type { PermissionRule, PermissionSettings } from '../schemas/config'
import { globMatch } from './glob'
import { anyIdentityMatches, parseIdentityPattern } from './identity'
import type { Identity, IdentityPattern } from './identity'

export type PermissionReason = 'disabled' | 'quick_allow' | 'quick_deny' | 'whitelist' | 'blacklist' | 'default'

export interface PermissionDecision {
  allowed: boolean
  reason: PermissionReason
  ruleIndex?: number
}

export interface EffectiveRule extends PermissionRule {
  index: number
  effective: boolean
}

export interface PermissionSummary {
  capability: string
  enabled: boolean
  defaultMode: PermissionSettings['defaultMode']
  quickAllow: string[]
  quickDeny: string[]
  rules: EffectiveRule[]
  identityIndependent: boolean
}

interface CompiledRule {
  rule: PermissionRule
  allowed: IdentityPattern[]
  denied: IdentityPattern[]
}

export class PermissionEvaluator {
  private readonly quickAllow: IdentityPattern[]
  private readonly quickDeny: IdentityPattern[]
  private readonly rules: CompiledRule[]

  constructor(private readonly settings: PermissionSettings) {
    this.quickAllow = settings.quickAllow.map((p) => parseIdentityPattern(p, 'user'))
    this.quickDeny = settings.quickDeny.map((p) => parseIdentityPattern(p, 'group'))
    this.rules = settings.rules.map((rule) => ({
      rule,
      allowed: rule.allowed.map((p) => parseIdentityPattern(p, 'user')),
      denied: rule.denied.map((p) => parseIdentityPattern(p, 'user')),
    }))
  }

  get enabled(): boolean {
    return this.settings.enabled
  }

  check(capability: string, identities: readonly Identity[]): PermissionDecision {
    if (!this.settings.enabled) return { allowed: true, reason: 'disabled' }

    if (anyIdentityMatches(this.quickAllow, identities)) return { allowed: true, reason: 'quick_allow' }

    const conversation = identities.filter((identity) => identity.scope !== 'user')
    if (anyIdentityMatches(this.quickDeny, conversation)) return { allowed: false, reason: 'quick_deny' }

    const ruleIndex = this.rules.findIndex((compiled) => globMatch(compiled.rule.tool, capability))
    if (ruleIndex >= 0) {
      const compiled = this.rules[ruleIndex]
      if (compiled.rule.mode === 'whitelist') {
        return { allowed: anyIdentityMatches(compiled.allowed, identities), reason: 'whitelist', ruleIndex }
      }
      return { allowed: !anyIdentityMatches(compiled.denied, identities), reason: 'blacklist', ruleIndex }
    }

    return { allowed: this.settings.defaultMode === 'allow_all', reason: 'default' }
  }

  /** True when no identity can change the outcome for this capability. */
  isIdentityIndependent(capability: string): boolean {
    if (!this.settings.enabled) return true
    if (this.quickAllow.length > 0 || this.quickDeny.length > 0) return false
    return !this.rules.some((compiled) => globMatch(compiled.rule.tool, capability))
  }

  permissionsFor(capability: string): PermissionSummary {
    const matching = this.settings.rules
      .map((rule, index) => ({ rule, index }))
      .filter(({ rule }) => globMatch(rule.tool, capability))

    return {
      capability,
      enabled: this.settings.enabled,
      defaultMode: this.settings.defaultMode,
      quickAllow: [...this.settings.quickAllow],
      quickDeny: [...this.settings.quickDeny],
      rules: matching.map(({ rule, index }, position) => ({ ...rule, index, effective: position === 0 })),
      identityIndependent: this.isIdentityIndependent(capability),
    }
  }
}

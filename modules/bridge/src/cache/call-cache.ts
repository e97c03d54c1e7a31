/**
 * CallCache: bounded LRU of tool results with per-entry TTL.
 *
 * Map insertion order is the recency order (oldest first); a hit re-inserts
 * the entry at the tail. Every mutation is synchronous.
 */

import type { CacheSettings } from '../schemas/config'
import { globMatch, matchesAny } from '../permissions/glob'
import { cacheKey } from './cache-key'

export interface CacheEntry {
  key: string
  capability: string
  value: string
  createdAt: number
  expiresAt: number
  hitCount: number
}

export type CacheEntryInfo = Omit<CacheEntry, 'value'> & { size: number }

export interface CacheStats {
  enabled: boolean
  size: number
  maxEntries: number
  ttlMs: number
  hits: number
  misses: number
  evictions: number
  hitRate: number
}

export class CallCache {
  private readonly table = new Map<string, CacheEntry>()
  private hits = 0
  private misses = 0
  private evictions = 0

  constructor(private readonly settings: CacheSettings) {}

  isCacheable(capability: string): boolean {
    return this.settings.enabled && !matchesAny(this.settings.exclude, capability)
  }

  get(capability: string, args: Record<string, unknown>, partition = ''): string | undefined {
    if (!this.isCacheable(capability)) return undefined

    const key = cacheKey(capability, args, partition)
    const entry = this.table.get(key)
    if (!entry) {
      this.misses++
      return undefined
    }
    if (entry.expiresAt <= Date.now()) {
      this.table.delete(key)
      this.evictions++
      this.misses++
      return undefined
    }

    entry.hitCount++
    this.hits++
    this.table.delete(key)
    this.table.set(key, entry)
    return entry.value
  }

  /** Returns whether the value was stored. */
  put(capability: string, args: Record<string, unknown>, value: string, ttlMs?: number, partition = ''): boolean {
    const ttl = ttlMs ?? this.settings.ttlMs
    if (!this.isCacheable(capability) || ttl <= 0) return false

    const now = Date.now()
    const key = cacheKey(capability, args, partition)
    const existing = this.table.get(key)
    if (existing) {
      // Overwrite in place: recency is left unchanged.
      existing.value = value
      existing.createdAt = now
      existing.expiresAt = now + ttl
      return true
    }

    while (this.table.size >= this.settings.maxEntries) {
      const oldest = this.table.keys().next()
      if (oldest.done) break
      this.table.delete(oldest.value)
      this.evictions++
    }
    this.table.set(key, { key, capability, value, createdAt: now, expiresAt: now + ttl, hitCount: 0 })
    return true
  }

  /** Drop entries whose capability matches `pattern` (all entries without one). Returns the count. */
  invalidate(pattern?: string): number {
    if (pattern === undefined) return this.clear()
    let removed = 0
    for (const [key, entry] of this.table) {
      if (globMatch(pattern, entry.capability)) {
        this.table.delete(key)
        removed++
      }
    }
    return removed
  }

  clear(): number {
    const removed = this.table.size
    this.table.clear()
    return removed
  }

  get size(): number {
    return this.table.size
  }

  stats(): CacheStats {
    const lookups = this.hits + this.misses
    return {
      enabled: this.settings.enabled,
      size: this.table.size,
      maxEntries: this.settings.maxEntries,
      ttlMs: this.settings.ttlMs,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      hitRate: lookups > 0 ? Math.round((this.hits / lookups) * 10_000) / 10_000 : 0,
    }
  }

  /** Diagnostic listing, most recently used last, without cached values. */
  entries(): CacheEntryInfo[] {
    return Array.from(this.table.values(), ({ value, ...info }) => ({ ...info, size: value.length }))
  }
}

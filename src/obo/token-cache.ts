// src/obo/token-cache.ts — In-memory cache of exchanged OBO tokens
//
// Keyed by (subject, canonical scope set). A token is never served once its
// remaining lifetime drops inside the safety margin: it is treated as expired
// early and the caller re-exchanges.

import { defaultTimeProvider, msUntil, type TimeProvider } from "../shared/time-provider.js"

export interface CacheKey {
  readonly subject: string
  /** Trimmed, de-duplicated, sorted */
  readonly scopes: readonly string[]
}

export interface CachedToken {
  readonly accessToken: string
  readonly expiresAt: Date
  readonly acquiredAt: Date
  readonly scopes: readonly string[]
}

/** Trim, drop empties and duplicates, then sort. Scope order must not cause cache misses. */
export function canonicalizeScopes(scopes: Iterable<string>): string[] {
  const unique = new Set<string>()
  for (const scope of scopes) {
    const trimmed = scope.trim()
    if (trimmed) unique.add(trimmed)
  }
  return [...unique].sort()
}

export function createCacheKey(subject: string, scopes: Iterable<string>): CacheKey {
  return { subject, scopes: canonicalizeScopes(scopes) }
}

/**
 * Length-prefixed so a subject containing the separator can never collide
 * with a different (subject, scopes) pair.
 */
export function serializeCacheKey(key: CacheKey): string {
  return `${key.subject.length}:${key.subject}|${key.scopes.join(" ")}`
}

export interface OboTokenCacheOptions {
  /** Seconds before expiry at which a token stops being served. Default 60. */
  safetyMarginSeconds?: number
  time?: TimeProvider
}

interface Entry {
  subject: string
  token: CachedToken
}

export class OboTokenCache {
  private readonly store = new Map<string, Entry>()
  // Clear counter: an exchange that started before a clear must not repopulate the cache
  private clears = 0
  private clearedAllAt = 0
  private readonly subjectClearedAt = new Map<string, number>()
  private readonly safetyMarginMs: number
  private readonly time: TimeProvider

  constructor(options: OboTokenCacheOptions = {}) {
    this.safetyMarginMs = (options.safetyMarginSeconds ?? 60) * 1000
    this.time = options.time ?? defaultTimeProvider
  }

  get size(): number {
    return this.store.size
  }

  /** Serve a token only while it is outside the safety margin. Expired entries are evicted on read. */
  get(key: CacheKey): CachedToken | undefined {
    const id = serializeCacheKey(key)
    const entry = this.store.get(id)
    if (!entry) return undefined
    if (!this.isServable(entry.token)) {
      this.store.delete(id)
      return undefined
    }
    return entry.token
  }

  /** Opaque marker of the last clear affecting `subject`; capture before an exchange starts. */
  generation(subject: string): number {
    return Math.max(this.clearedAllAt, this.subjectClearedAt.get(subject) ?? 0)
  }

  /**
   * Store (overwriting any prior entry for the key). With `generation`, the
   * write is skipped when the subject was cleared since it was captured.
   * Returns whether the token was stored.
   */
  set(key: CacheKey, token: CachedToken, generation?: number): boolean {
    if (generation !== undefined && generation !== this.generation(key.subject)) return false
    this.store.set(serializeCacheKey(key), { subject: key.subject, token })
    return true
  }

  delete(key: CacheKey): boolean {
    return this.store.delete(serializeCacheKey(key))
  }

  /** Drop every token held for one user (e.g. on detected revocation). Returns the number removed. */
  clearSubject(subject: string): number {
    this.subjectClearedAt.set(subject, ++this.clears)
    let removed = 0
    for (const [id, entry] of this.store) {
      if (entry.subject === subject) {
        this.store.delete(id)
        removed++
      }
    }
    return removed
  }

  clear(): number {
    this.clearedAllAt = ++this.clears
    this.subjectClearedAt.clear()
    const removed = this.store.size
    this.store.clear()
    return removed
  }

  /** Evict every entry inside its safety margin. Returns the number removed. */
  sweep(): number {
    let removed = 0
    for (const [id, entry] of this.store) {
      if (!this.isServable(entry.token)) {
        this.store.delete(id)
        removed++
      }
    }
    return removed
  }

  isServable(token: CachedToken): boolean {
    return msUntil(this.time, token.expiresAt) > this.safetyMarginMs
  }
}

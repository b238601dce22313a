// src/identity/jwks-cache.ts — Identity provider signing-key cache
//
// Lazily fetches the IdP's JWKS document and serves keys by kid from memory.
//   FRESH: key set younger than ttlMs, last fetch succeeded
//   STALE: TTL elapsed or last refresh failed; last known-good set still served
//   EMPTY: nothing fetched yet (or invalidated); a failed fetch is fatal here
//
// Every refresh goes through one SingleFlight slot: N concurrent validations
// that need new keys produce exactly one GET. The key set is built into a fresh
// Map and swapped in whole, so readers never observe a partial update.

import { importJWK } from "jose"
import type { KeyLike } from "jose"
import { Type } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import { GatewayError } from "../errors.js"
import { SingleFlight } from "../shared/single-flight.js"
import { defaultTimeProvider, msUntil, type TimeProvider } from "../shared/time-provider.js"
import { silentLogger, type Logger } from "../shared/logger.js"

export type SigningKey = KeyLike | Uint8Array

export type JwksState = "EMPTY" | "FRESH" | "STALE"

const JwkSchema = Type.Object({
  kty: Type.String(),
  kid: Type.Optional(Type.String()),
  use: Type.Optional(Type.String()),
  alg: Type.Optional(Type.String()),
  crv: Type.Optional(Type.String()),
})

const JwksDocumentSchema = Type.Object({
  keys: Type.Array(JwkSchema),
})

interface JwksKeySet {
  readonly keys: ReadonlyMap<string, SigningKey>
  readonly fetchedAt: number
}

export interface JwksCacheOptions {
  jwksUrl: string
  /** Key set lifetime before a refresh is attempted. Default 15 min. */
  ttlMs?: number
  /** Bound on a single JWKS GET. Default 5 s. */
  fetchTimeoutMs?: number
  /** Minimum spacing between refreshes triggered by unknown kids. Default 1 s. */
  minRefreshIntervalMs?: number
  /** After a failed refresh, serve the stale set this long before trying again. Default 30 s. */
  failureBackoffMs?: number
  fetcher?: typeof fetch
  time?: TimeProvider
  logger?: Logger
}

const FLIGHT_KEY = "jwks"
const DEFAULT_TTL_MS = 15 * 60 * 1000
const DEFAULT_FETCH_TIMEOUT_MS = 5_000
const DEFAULT_MIN_REFRESH_INTERVAL_MS = 1_000
const DEFAULT_FAILURE_BACKOFF_MS = 30_000

const EC_CURVE_ALGORITHMS: Record<string, string> = {
  "P-256": "ES256",
  "P-384": "ES384",
  "P-521": "ES512",
}

/** JWKS documents from some providers omit `alg`; derive the default for the key type. */
function inferAlgorithm(jwk: { kty: string; crv?: string }): string | undefined {
  if (jwk.kty === "RSA") return "RS256"
  if (jwk.kty === "EC" && jwk.crv) return EC_CURVE_ALGORITHMS[jwk.crv]
  if (jwk.kty === "OKP" && (jwk.crv === "Ed25519" || jwk.crv === "Ed448")) return "EdDSA"
  return undefined
}

export class JwksCache {
  private keySet: JwksKeySet | null = null
  private lastFetchAttemptMs = Number.NEGATIVE_INFINITY
  private lastFetchFailed = false
  private readonly flight = new SingleFlight<JwksKeySet>()

  private readonly jwksUrl: string
  private readonly ttlMs: number
  private readonly fetchTimeoutMs: number
  private readonly minRefreshIntervalMs: number
  private readonly failureBackoffMs: number
  private readonly fetcher: typeof fetch
  private readonly time: TimeProvider
  private readonly logger: Logger

  constructor(options: JwksCacheOptions) {
    this.jwksUrl = options.jwksUrl
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS
    this.fetchTimeoutMs = options.fetchTimeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS
    this.minRefreshIntervalMs = options.minRefreshIntervalMs ?? DEFAULT_MIN_REFRESH_INTERVAL_MS
    this.failureBackoffMs = options.failureBackoffMs ?? DEFAULT_FAILURE_BACKOFF_MS
    this.fetcher = options.fetcher ?? fetch
    this.time = options.time ?? defaultTimeProvider
    this.logger = options.logger ?? silentLogger
  }

  get state(): JwksState {
    if (!this.keySet) return "EMPTY"
    if (this.lastFetchFailed || this.isExpired(this.keySet)) return "STALE"
    return "FRESH"
  }

  get keyCount(): number {
    return this.keySet?.keys.size ?? 0
  }

  /**
   * Resolve the signing key for `kid`.
   * Unknown kids trigger a refresh (key rotation); an expired set triggers a
   * refresh whose failure falls back to the set already held.
   */
  async getKey(kid: string, signal?: AbortSignal): Promise<SigningKey> {
    const current = this.keySet
    if (current) {
      const key = current.keys.get(kid)
      const refreshable = this.canRefresh()
      if (key && (!this.isExpired(current) || !refreshable)) return key
      if (!key && !refreshable) throw this.keyNotFound(kid)
    }

    const refreshed = await this.flight.run(FLIGHT_KEY, (flightSignal) => this.fetchKeySet(flightSignal), signal)
    const key = refreshed.keys.get(kid)
    if (!key) throw this.keyNotFound(kid)
    return key
  }

  /** Drop the key set; the next validation refetches. */
  invalidate(): void {
    this.keySet = null
    this.lastFetchFailed = false
    this.lastFetchAttemptMs = Number.NEGATIVE_INFINITY
    this.logger.info("key set invalidated")
  }

  private isExpired(set: JwksKeySet): boolean {
    return msUntil(this.time, set.fetchedAt + this.ttlMs) <= 0
  }

  private canRefresh(): boolean {
    if (this.flight.isInFlight(FLIGHT_KEY)) return true
    const window = this.lastFetchFailed ? this.failureBackoffMs : this.minRefreshIntervalMs
    return this.time.now() - this.lastFetchAttemptMs >= window
  }

  private keyNotFound(kid: string): GatewayError {
    return new GatewayError("JWKS_KEY_NOT_FOUND", "No signing key matches the token's kid", { kid })
  }

  private async fetchKeySet(signal: AbortSignal): Promise<JwksKeySet> {
    // Stamped once the fetch settles: an abandoned fetch must not rate-limit the next caller
    const attemptedAt = this.time.now()
    try {
      const keys = await this.download(signal)
      this.lastFetchAttemptMs = attemptedAt
      const next: JwksKeySet = { keys, fetchedAt: this.time.now() }
      this.keySet = next
      this.lastFetchFailed = false
      this.logger.info("key set refreshed", { keyCount: keys.size })
      return next
    } catch (err) {
      if (signal.aborted) throw err
      this.lastFetchAttemptMs = attemptedAt
      this.lastFetchFailed = true
      const reason = err instanceof Error ? err.message : String(err)
      const stale = this.keySet
      if (stale) {
        this.logger.warn("refresh failed, serving last known-good key set", {
          reason,
          ageMs: this.time.now() - stale.fetchedAt,
        })
        return stale
      }
      this.logger.error("refresh failed with no key set to fall back on", { reason })
      throw new GatewayError("JWKS_UNAVAILABLE", "Signing keys are unavailable", { reason }, { cause: err })
    }
  }

  private async download(signal: AbortSignal): Promise<Map<string, SigningKey>> {
    const response = await this.fetcher(this.jwksUrl, {
      method: "GET",
      headers: { Accept: "application/json" },
      signal: AbortSignal.any([signal, AbortSignal.timeout(this.fetchTimeoutMs)]),
    })
    if (!response.ok) {
      throw new Error(`JWKS endpoint returned HTTP ${response.status}`)
    }

    const body: unknown = await response.json()
    if (!Value.Check(JwksDocumentSchema, body)) {
      throw new Error("JWKS document failed schema validation")
    }

    const keys = new Map<string, SigningKey>()
    for (const jwk of body.keys) {
      // Only public signature keys belong here
      if (!jwk.kid || jwk.kty === "oct") continue
      if (jwk.use !== undefined && jwk.use !== "sig") continue
      const alg = jwk.alg ?? inferAlgorithm(jwk)
      if (!alg) continue
      try {
        keys.set(jwk.kid, await importJWK(jwk, alg))
      } catch (err) {
        this.logger.warn("skipping unusable JWKS entry", {
          kid: jwk.kid,
          reason: err instanceof Error ? err.message : String(err),
        })
      }
    }

    if (keys.size === 0) {
      throw new Error("JWKS document contained no usable signing keys")
    }
    return keys
  }
}

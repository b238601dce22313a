// src/obo/obo-exchanger.ts — On-Behalf-Of token exchange (confidential client)
//
// exchange(assertion, scopes, { subject }):
//   1. CacheKey = (validated subject, canonical scopes); servable cached token → return, no I/O
//   2. Otherwise one SingleFlight per CacheKey: concurrent callers for the same
//      pair share a single token-endpoint exchange
//   3. The exchange runs under RetryPolicy: invalid_grant / consent_required /
//      unauthorized_client are terminal, network errors / 408 / 429 / 5xx are
//      retried with bounded exponential backoff
//   4. The returned token must still represent the same subject
//   5. Store under the CacheKey (overwrite) and return; a cache clear for the
//      subject while the exchange was in flight leaves the result uncached
//
// Neither the assertion, the exchanged token nor the client secret is ever
// logged, audited or put into an error.

import { decodeJwt } from "jose"
import type { JWTPayload } from "jose"
import { Type } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import { GatewayError, isAbortError, isGatewayError, type GatewayErrorCode } from "../errors.js"
import { resolveSubject } from "../identity/claims.js"
import { SingleFlight } from "../shared/single-flight.js"
import {
  RetryExhaustedError,
  RetryPolicy,
  type RetryDecision,
  type RetryPolicyConfig,
  type Sleep,
} from "../shared/retry-policy.js"
import { defaultTimeProvider, type TimeProvider } from "../shared/time-provider.js"
import { silentLogger, type Logger } from "../shared/logger.js"
import type { AuditLog } from "../audit/audit-log.js"
import {
  createCacheKey,
  serializeCacheKey,
  type CacheKey,
  type CachedToken,
  type OboTokenCache,
} from "./token-cache.js"

export const JWT_BEARER_GRANT = "urn:ietf:params:oauth:grant-type:jwt-bearer"

export interface ExchangeContext {
  /** Subject of the validated inbound token; the only identity the result may represent. */
  subject: string
  signal?: AbortSignal
  requestId?: string
}

export interface TokenExchanger {
  exchange(userAssertion: string, targetScopes: Iterable<string>, context: ExchangeContext): Promise<CachedToken>
}

export interface OboClientCredentials {
  tokenUrl: string
  clientId: string
  clientSecret: string
}

export interface OboExchangerOptions {
  credentials: OboClientCredentials
  cache: OboTokenCache
  retry?: Partial<RetryPolicyConfig>
  /** Bound on one token-endpoint attempt. Default 10 s. */
  attemptTimeoutMs?: number
  /** Reject exchanged JWTs whose subject differs from the caller's. Default true. */
  verifyIdentity?: boolean
  fetcher?: typeof fetch
  sleep?: Sleep
  time?: TimeProvider
  logger?: Logger
  audit?: AuditLog
}

// ---------------------------------------------------------------------------
// Token endpoint response handling
// ---------------------------------------------------------------------------

const TokenSuccessSchema = Type.Object({
  access_token: Type.String({ minLength: 1 }),
  // v1 endpoints return expires_in as a string
  expires_in: Type.Union([Type.Number({ minimum: 0 }), Type.String({ pattern: "^[0-9]+$" })]),
  token_type: Type.Optional(Type.String()),
})

const TokenErrorSchema = Type.Object({
  error: Type.String(),
  error_description: Type.Optional(Type.String()),
  suberror: Type.Optional(Type.String()),
})

/** A failed token-endpoint attempt, before classification. */
export class TokenEndpointFailure extends Error {
  readonly name = "TokenEndpointFailure"
  readonly status?: number
  readonly oauthError?: string
  readonly suberror?: string
  readonly description?: string
  readonly retryAfterMs?: number
  readonly timedOut: boolean
  readonly invalidResponse: boolean

  constructor(init: {
    message: string
    status?: number
    oauthError?: string
    suberror?: string
    description?: string
    retryAfterMs?: number
    timedOut?: boolean
    invalidResponse?: boolean
    cause?: unknown
  }) {
    super(init.message, { cause: init.cause })
    this.status = init.status
    this.oauthError = init.oauthError
    this.suberror = init.suberror
    this.description = init.description
    this.retryAfterMs = init.retryAfterMs
    this.timedOut = init.timedOut ?? false
    this.invalidResponse = init.invalidResponse ?? false
  }
}

export type FailureClassification =
  | { kind: "terminal"; code: GatewayErrorCode }
  | { kind: "transient"; retryAfterMs?: number }

const CONSENT_ERRORS = new Set(["consent_required", "interaction_required"])
const CONSENT_MARKERS = ["consent_required", "AADSTS65001"]
const TRANSIENT_STATUSES = new Set([408, 429])

export function classifyTokenEndpointFailure(failure: TokenEndpointFailure): FailureClassification {
  if (failure.invalidResponse) return { kind: "terminal", code: "OBO_UPSTREAM_UNAVAILABLE" }

  const status = failure.status
  // No HTTP response at all: connection error or attempt timeout
  if (status === undefined) return { kind: "transient" }
  if (status >= 500 || TRANSIENT_STATUSES.has(status)) {
    return { kind: "transient", retryAfterMs: failure.retryAfterMs }
  }

  const error = failure.oauthError
  if (error === "invalid_grant") {
    const consent = [failure.suberror, failure.description].some(
      (text) => text !== undefined && CONSENT_MARKERS.some((marker) => text.includes(marker)),
    )
    return { kind: "terminal", code: consent ? "OBO_CONSENT_REQUIRED" : "OBO_ASSERTION_INVALID" }
  }
  if (error && CONSENT_ERRORS.has(error)) return { kind: "terminal", code: "OBO_CONSENT_REQUIRED" }
  if (error) return { kind: "terminal", code: "OBO_UNAUTHORIZED_CLIENT" }
  if (status === 401 || status === 403) return { kind: "terminal", code: "OBO_UNAUTHORIZED_CLIENT" }
  return { kind: "terminal", code: "OBO_UPSTREAM_UNAVAILABLE" }
}

function retryDecision(err: unknown): RetryDecision {
  if (!(err instanceof TokenEndpointFailure)) return { retry: false }
  const classification = classifyTokenEndpointFailure(err)
  if (classification.kind === "terminal") return { retry: false }
  return { retry: true, delayHintMs: classification.retryAfterMs }
}

/** Retry-After as delta-seconds or HTTP date, in ms. */
export function parseRetryAfter(value: string | null, nowMs: number): number | undefined {
  if (!value) return undefined
  const trimmed = value.trim()
  if (/^[0-9]+$/.test(trimmed)) return parseInt(trimmed, 10) * 1000
  const at = Date.parse(trimmed)
  if (Number.isNaN(at)) return undefined
  return Math.max(0, at - nowMs)
}

// ---------------------------------------------------------------------------
// Exchanger
// ---------------------------------------------------------------------------

export class OboExchanger implements TokenExchanger {
  private readonly flight = new SingleFlight<CachedToken>()
  private readonly retry: RetryPolicy
  private readonly credentials: OboClientCredentials
  private readonly cache: OboTokenCache
  private readonly attemptTimeoutMs: number
  private readonly verifyIdentity: boolean
  private readonly fetcher: typeof fetch
  private readonly time: TimeProvider
  private readonly logger: Logger
  private readonly audit?: AuditLog

  constructor(options: OboExchangerOptions) {
    this.credentials = options.credentials
    this.cache = options.cache
    this.attemptTimeoutMs = options.attemptTimeoutMs ?? 10_000
    this.verifyIdentity = options.verifyIdentity ?? true
    this.fetcher = options.fetcher ?? fetch
    this.time = options.time ?? defaultTimeProvider
    this.logger = options.logger ?? silentLogger
    this.audit = options.audit
    this.retry = new RetryPolicy(options.retry ?? {}, retryDecision, options.sleep)
  }

  /** Number of exchanges currently in flight (diagnostics). */
  get inFlight(): number {
    return this.flight.size
  }

  async exchange(userAssertion: string, targetScopes: Iterable<string>, context: ExchangeContext): Promise<CachedToken> {
    const key = createCacheKey(context.subject, targetScopes)
    if (key.scopes.length === 0) {
      throw new GatewayError("INTERNAL_ERROR", "OBO exchange requires at least one target scope")
    }

    const cached = this.cache.get(key)
    if (cached) {
      this.logger.debug("cache hit", { subject: key.subject, scopes: key.scopes })
      return cached
    }

    return this.flight.run(
      serializeCacheKey(key),
      (signal) => this.acquire(userAssertion, key, signal, context.requestId),
      context.signal,
    )
  }

  private async acquire(assertion: string, key: CacheKey, signal: AbortSignal, requestId?: string): Promise<CachedToken> {
    const generation = this.cache.generation(key.subject)
    try {
      const token = await this.retry.execute(async (attempt) => {
        if (attempt > 1) this.logger.warn("retrying token exchange", { subject: key.subject, attempt })
        return this.requestToken(assertion, key.scopes, signal)
      }, signal)

      if (this.verifyIdentity) this.assertSameIdentity(token.accessToken, key.subject)

      if (!this.cache.set(key, token, generation)) {
        this.logger.info("cache cleared during exchange, result not cached", { subject: key.subject })
      }
      this.audit?.record({
        event: "obo_token_acquired",
        success: true,
        requestId,
        subject: key.subject,
        details: { scopes: key.scopes, expiresAt: token.expiresAt.toISOString() },
      })
      return token
    } catch (err) {
      if (signal.aborted && isAbortError(err)) throw err
      const mapped = this.toGatewayError(err)
      this.logger.warn("token exchange failed", { subject: key.subject, code: mapped.code, ...mapped.context })
      this.audit?.record({
        event: "obo_token_failed",
        success: false,
        requestId,
        subject: key.subject,
        details: { scopes: key.scopes, code: mapped.code },
      })
      throw mapped
    }
  }

  private async requestToken(assertion: string, scopes: readonly string[], signal: AbortSignal): Promise<CachedToken> {
    const startedAt = this.time.now()
    const body = new URLSearchParams()
    body.set("grant_type", JWT_BEARER_GRANT)
    body.set("client_id", this.credentials.clientId)
    body.set("client_secret", this.credentials.clientSecret)
    body.set("assertion", assertion)
    body.set("scope", scopes.join(" "))
    body.set("requested_token_use", "on_behalf_of")

    const attemptSignal = AbortSignal.timeout(this.attemptTimeoutMs)
    let response: Response
    try {
      response = await this.fetcher(this.credentials.tokenUrl, {
        method: "POST",
        headers: {
          "Content-Type": "application/x-www-form-urlencoded",
          Accept: "application/json",
        },
        body,
        signal: AbortSignal.any([signal, attemptSignal]),
      })
    } catch (err) {
      if (signal.aborted) throw err
      const timedOut = attemptSignal.aborted
      throw new TokenEndpointFailure({
        message: timedOut ? "Token endpoint attempt timed out" : "Token endpoint unreachable",
        timedOut,
        cause: err,
      })
    }

    const payload: unknown = await response.json().catch(() => undefined)

    if (!response.ok) {
      const oauth = Value.Check(TokenErrorSchema, payload) ? payload : undefined
      throw new TokenEndpointFailure({
        message: `Token endpoint returned HTTP ${response.status}${oauth ? ` (${oauth.error})` : ""}`,
        status: response.status,
        oauthError: oauth?.error,
        suberror: oauth?.suberror,
        description: oauth?.error_description,
        retryAfterMs: parseRetryAfter(response.headers.get("retry-after"), this.time.now()),
      })
    }

    if (!Value.Check(TokenSuccessSchema, payload)) {
      throw new TokenEndpointFailure({
        message: "Token endpoint response is missing access_token or expires_in",
        status: response.status,
        invalidResponse: true,
      })
    }

    const expiresInSeconds = typeof payload.expires_in === "number" ? payload.expires_in : parseInt(payload.expires_in, 10)
    // Lifetime counted from before the request went out, never after
    return {
      accessToken: payload.access_token,
      acquiredAt: new Date(startedAt),
      expiresAt: new Date(startedAt + expiresInSeconds * 1000),
      scopes: [...scopes],
    }
  }

  private assertSameIdentity(accessToken: string, subject: string): void {
    let payload: JWTPayload
    try {
      payload = decodeJwt(accessToken)
    } catch {
      // Opaque token: nothing to compare against
      return
    }
    const tokenSubject = resolveSubject(payload)
    if (tokenSubject !== undefined && tokenSubject !== subject) {
      throw new GatewayError("OBO_IDENTITY_MISMATCH", "Exchanged token represents a different user", {
        subject,
      })
    }
  }

  private toGatewayError(err: unknown): GatewayError {
    if (isGatewayError(err)) return err

    if (err instanceof RetryExhaustedError) {
      const last = err.lastError
      const timedOut = last instanceof TokenEndpointFailure && last.timedOut
      return new GatewayError(
        timedOut ? "OBO_UPSTREAM_TIMEOUT" : "OBO_UPSTREAM_UNAVAILABLE",
        `Identity provider unavailable after ${err.attempts} attempts`,
        {
          attempts: err.attempts,
          status: last instanceof TokenEndpointFailure ? last.status : undefined,
        },
        { cause: err },
      )
    }

    if (err instanceof TokenEndpointFailure) {
      const classification = classifyTokenEndpointFailure(err)
      const code = classification.kind === "terminal" ? classification.code : "OBO_UPSTREAM_UNAVAILABLE"
      return new GatewayError(code, err.message, { status: err.status, oauthError: err.oauthError }, { cause: err })
    }

    return new GatewayError("OBO_UPSTREAM_UNAVAILABLE", "Token exchange failed", {}, { cause: err })
  }
}

/**
 * Exchanger paired with MockTokenValidator when authentication is disabled:
 * no identity provider is contacted and downstream calls carry a fixed marker.
 */
export class LocalDevelopmentExchanger implements TokenExchanger {
  static readonly TOKEN = "local-development"

  constructor(private readonly time: TimeProvider = defaultTimeProvider) {}

  async exchange(_userAssertion: string, targetScopes: Iterable<string>): Promise<CachedToken> {
    const now = this.time.now()
    return {
      accessToken: LocalDevelopmentExchanger.TOKEN,
      acquiredAt: new Date(now),
      expiresAt: new Date(now + 60 * 60 * 1000),
      scopes: [...targetScopes],
    }
  }
}

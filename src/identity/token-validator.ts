// src/identity/token-validator.ts — Inbound bearer token validation
//
// Two strategies behind one interface, chosen once at construction:
//   JwtTokenValidator:  signature via JwksCache, then lifetime, issuer, audience
//   MockTokenValidator: fixed local-development identity, refused in production
//
// Validation order (security-critical):
//   1. Structural parse: 3 segments, decodable header with allowed alg and kid,
//      decodable payload
//   2. Early lifetime rejection from the unverified payload: an expired token is
//      refused before any key lookup, whatever its signature. Unverified data
//      only ever rejects, it never accepts.
//   3. Key lookup by kid (JwksCache refreshes on unknown kid)
//   4. Signature verification
//   5. nbf, then exp (authoritative, with clock skew)
//   6. iss against the issuer allow-list
//   7. aud against the audience allow-list
//   8. Claim extraction (see CLAIM_PRIORITY)

import { compactVerify, decodeJwt, decodeProtectedHeader, errors } from "jose"
import type { JWTPayload } from "jose"
import { GatewayError, isGatewayError } from "../errors.js"
import { extractClaims, mockClaims, type Claims, type MockIdentity } from "./claims.js"
import type { SigningKey } from "./jwks-cache.js"
import { defaultTimeProvider, hasPassed, type TimeProvider } from "../shared/time-provider.js"
import { silentLogger, type Logger } from "../shared/logger.js"

export interface Authenticated {
  claims: Claims
  /** The raw inbound token, kept only to be presented as the OBO user assertion. */
  assertion: string
}

export interface TokenValidator {
  readonly mode: "jwt" | "mock"
  validate(token: string, signal?: AbortSignal): Promise<Claims>
  /** Authenticate from a raw Authorization header value. */
  authenticate(authorizationHeader: string | undefined, signal?: AbortSignal): Promise<Authenticated>
}

export interface KeyResolver {
  getKey(kid: string, signal?: AbortSignal): Promise<SigningKey>
}

export interface JwtTokenValidatorOptions {
  /** Exact-match issuer allow-list; list every equivalent form (v1 and v2 issuers). */
  issuers: readonly string[]
  /** Exact-match audience allow-list; list every equivalent form (client id, api:// URI, override). */
  audiences: readonly string[]
  algorithms: readonly string[]
  clockSkewSeconds: number
  keys: KeyResolver
  time?: TimeProvider
  logger?: Logger
}

const BEARER_PREFIX = /^Bearer\s+/i

/** Extract the token from `Bearer <token>`, or null when absent or another scheme. */
export function parseBearer(authorizationHeader: string | undefined): string | null {
  if (!authorizationHeader || !BEARER_PREFIX.test(authorizationHeader)) return null
  const token = authorizationHeader.replace(BEARER_PREFIX, "").trim()
  return token.length > 0 ? token : null
}

function malformed(message: string, context: Record<string, unknown> = {}): GatewayError {
  return new GatewayError("TOKEN_MALFORMED", message, context)
}

function assertStandardClaimTypes(payload: JWTPayload): void {
  const numeric = ["exp", "nbf", "iat"] as const
  for (const name of numeric) {
    if (payload[name] !== undefined && typeof payload[name] !== "number") {
      throw malformed(`Claim ${name} must be a number`)
    }
  }
  if (payload.iss !== undefined && typeof payload.iss !== "string") {
    throw malformed("Claim iss must be a string")
  }
}

function audiencesOf(payload: JWTPayload): string[] {
  if (typeof payload.aud === "string") return [payload.aud]
  if (Array.isArray(payload.aud)) return payload.aud.filter((a): a is string => typeof a === "string")
  return []
}

export class JwtTokenValidator implements TokenValidator {
  readonly mode = "jwt"
  private readonly issuers: ReadonlySet<string>
  private readonly audiences: readonly string[]
  private readonly algorithms: string[]
  private readonly clockSkewSeconds: number
  private readonly keys: KeyResolver
  private readonly time: TimeProvider
  private readonly logger: Logger

  constructor(options: JwtTokenValidatorOptions) {
    if (options.issuers.length === 0) throw new Error("JwtTokenValidator requires at least one issuer")
    if (options.audiences.length === 0) throw new Error("JwtTokenValidator requires at least one audience")
    if (options.algorithms.length === 0) throw new Error("JwtTokenValidator requires at least one algorithm")
    this.issuers = new Set(options.issuers)
    this.audiences = [...options.audiences]
    this.algorithms = [...options.algorithms]
    this.clockSkewSeconds = options.clockSkewSeconds
    this.keys = options.keys
    this.time = options.time ?? defaultTimeProvider
    this.logger = options.logger ?? silentLogger
  }

  async authenticate(authorizationHeader: string | undefined, signal?: AbortSignal): Promise<Authenticated> {
    const token = parseBearer(authorizationHeader)
    if (!token) {
      throw new GatewayError("AUTH_REQUIRED", "Bearer token required")
    }
    const claims = await this.validate(token, signal)
    return { claims, assertion: token }
  }

  async validate(token: string, signal?: AbortSignal): Promise<Claims> {
    let kid: string | undefined
    try {
      // 1. Structure
      if (token.split(".").length !== 3) throw malformed("Token is not a compact JWS")
      const header = this.decodeHeader(token)
      kid = header.kid
      const payload = this.decodePayload(token)

      // 2. Early lifetime rejection (unverified)
      if (typeof payload.exp === "number" && this.isExpired(payload.exp)) {
        throw new GatewayError("TOKEN_EXPIRED", "Token has expired", { kid })
      }

      // 3. Key
      const key = await this.keys.getKey(header.kid, signal)

      // 4. Signature
      await this.verifySignature(token, key, header.kid)

      // 5. Lifetime (authoritative)
      if (typeof payload.nbf === "number" && !hasPassed(this.time, payload.nbf, -this.clockSkewSeconds)) {
        throw new GatewayError("TOKEN_NOT_YET_VALID", "Token is not yet valid", { kid })
      }
      if (typeof payload.exp !== "number") throw malformed("Token has no exp claim", { kid })
      if (this.isExpired(payload.exp)) {
        throw new GatewayError("TOKEN_EXPIRED", "Token has expired", { kid })
      }

      // 6. Issuer
      if (typeof payload.iss !== "string" || !this.issuers.has(payload.iss)) {
        throw new GatewayError("TOKEN_INVALID_ISSUER", "Token issuer is not allowed", { kid })
      }

      // 7. Audience
      const presented = audiencesOf(payload)
      const matched = this.audiences.find((aud) => presented.includes(aud))
      if (!matched) {
        throw new GatewayError("TOKEN_INVALID_AUDIENCE", "Token audience is not allowed", { kid })
      }

      // 8. Claims
      const claims = extractClaims(payload, matched)
      this.logger.debug("token validated", { kid, subject: claims.subject })
      return claims
    } catch (err) {
      if (isGatewayError(err)) {
        this.logger.debug("token rejected", { code: err.code, kid })
      }
      throw err
    }
  }

  private isExpired(exp: number): boolean {
    return hasPassed(this.time, exp, this.clockSkewSeconds)
  }

  private decodeHeader(token: string): { alg: string; kid: string } {
    let header: ReturnType<typeof decodeProtectedHeader>
    try {
      header = decodeProtectedHeader(token)
    } catch {
      throw malformed("Token header is not decodable")
    }
    if (typeof header.alg !== "string" || !this.algorithms.includes(header.alg)) {
      throw malformed("Token algorithm is not allowed", { alg: header.alg })
    }
    if (typeof header.kid !== "string" || header.kid.length === 0) {
      throw malformed("Token header has no kid")
    }
    return { alg: header.alg, kid: header.kid }
  }

  private decodePayload(token: string): JWTPayload {
    let payload: JWTPayload
    try {
      payload = decodeJwt(token)
    } catch {
      throw malformed("Token payload is not decodable")
    }
    assertStandardClaimTypes(payload)
    return payload
  }

  private async verifySignature(token: string, key: SigningKey, kid: string): Promise<void> {
    try {
      await compactVerify(token, key, { algorithms: this.algorithms })
    } catch (err) {
      if (err instanceof errors.JOSEAlgNotAllowed) {
        throw malformed("Token algorithm is not allowed", { kid })
      }
      // Signature mismatch, or a key whose type cannot verify this alg
      throw new GatewayError("TOKEN_INVALID_SIGNATURE", "Token signature is invalid", { kid }, { cause: err })
    }
  }
}

/**
 * Local-development strategy: every request is the configured mock identity.
 * The raw header is ignored entirely, so no token is ever inspected.
 */
export class MockTokenValidator implements TokenValidator {
  readonly mode = "mock"

  constructor(private readonly identity: MockIdentity) {}

  async validate(): Promise<Claims> {
    return mockClaims(this.identity)
  }

  async authenticate(): Promise<Authenticated> {
    return { claims: mockClaims(this.identity), assertion: "" }
  }
}

export interface TokenValidatorSelection {
  authDisabled: boolean
  nodeEnv?: string
  mockIdentity: MockIdentity
  jwt: () => JwtTokenValidatorOptions
}

/**
 * Pick the strategy once. The mock strategy is only reachable through the
 * explicit switch and never when NODE_ENV is production.
 */
export function createTokenValidator(selection: TokenValidatorSelection): TokenValidator {
  if (selection.authDisabled) {
    const env = (selection.nodeEnv ?? "").trim().toLowerCase()
    if (env === "production" || env === "prod") {
      throw new Error("Authentication cannot be disabled in production")
    }
    return new MockTokenValidator(selection.mockIdentity)
  }
  return new JwtTokenValidator(selection.jwt())
}

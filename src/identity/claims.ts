// src/identity/claims.ts — Typed identity claims and claim-name resolution
//
// Identity providers publish the same logical fact under different claim names
// depending on token version (v1 vs v2, id vs access token). Each logical field
// is resolved ONCE, at validation time, through the ordered lists below. No
// other module reads raw JWT payload fields.

import type { JWTPayload } from "jose"
import { GatewayError } from "../errors.js"

export interface Claims {
  /** Stable, opaque user id. Never derived from a username or email. */
  readonly subject: string
  readonly displayName: string
  readonly preferredUsername?: string
  readonly tenantId: string
  readonly scopes: readonly string[]
  readonly roles: readonly string[]
  /** `exp`, Unix seconds */
  readonly expiresAt: number
  /** `iat`, Unix seconds */
  readonly issuedAt?: number
  /** Raw `iss` as presented */
  readonly issuer: string
  /** The configured audience the token matched */
  readonly audience: string
}

/**
 * Claim-name priority, first non-empty string wins.
 *
 * subject: `oid` is the directory object id, identical across every app and
 * token version for one user; `sub` is the standard fallback for providers
 * without `oid`. Usernames and emails are deliberately absent: they can be
 * reassigned to another person and must never select an identity.
 */
export const CLAIM_PRIORITY = {
  subject: ["oid", "sub"],
  displayName: ["name", "preferred_username"],
  preferredUsername: ["preferred_username", "upn", "email", "unique_name"],
  tenantId: ["tid"],
  scopes: ["scp", "scope"],
  roles: ["roles"],
} as const

function firstString(payload: JWTPayload, names: readonly string[]): string | undefined {
  for (const name of names) {
    const value = payload[name]
    if (typeof value === "string" && value.length > 0) return value
  }
  return undefined
}

function spaceDelimited(payload: JWTPayload, names: readonly string[]): string[] {
  const raw = firstString(payload, names)
  if (!raw) return []
  return raw.split(" ").filter(Boolean)
}

function stringArray(payload: JWTPayload, names: readonly string[]): string[] {
  for (const name of names) {
    const value = payload[name]
    if (Array.isArray(value)) {
      return value.filter((v): v is string => typeof v === "string" && v.length > 0)
    }
  }
  return []
}

/** Resolve the subject from a payload, or undefined if no subject claim is present. */
export function resolveSubject(payload: JWTPayload): string | undefined {
  return firstString(payload, CLAIM_PRIORITY.subject)
}

/**
 * Build Claims from an already signature-, lifetime-, issuer- and
 * audience-checked payload.
 */
export function extractClaims(payload: JWTPayload, matchedAudience: string): Claims {
  const subject = resolveSubject(payload)
  if (!subject) {
    throw new GatewayError("TOKEN_MALFORMED", "Token has no subject claim", {
      checked: CLAIM_PRIORITY.subject,
    })
  }
  if (typeof payload.iss !== "string" || typeof payload.exp !== "number") {
    throw new GatewayError("TOKEN_MALFORMED", "Token is missing iss or exp")
  }

  const claims: Claims = {
    subject,
    displayName: firstString(payload, CLAIM_PRIORITY.displayName) ?? subject,
    preferredUsername: firstString(payload, CLAIM_PRIORITY.preferredUsername),
    tenantId: firstString(payload, CLAIM_PRIORITY.tenantId) ?? payload.iss,
    scopes: Object.freeze(spaceDelimited(payload, CLAIM_PRIORITY.scopes)),
    roles: Object.freeze(stringArray(payload, CLAIM_PRIORITY.roles)),
    expiresAt: payload.exp,
    issuedAt: typeof payload.iat === "number" ? payload.iat : undefined,
    issuer: payload.iss,
    audience: matchedAudience,
  }
  return Object.freeze(claims)
}

export interface MockIdentity {
  subject: string
  displayName: string
  preferredUsername?: string
}

/** Fixed identity used when authentication is disabled for local development. */
export function mockClaims(identity: MockIdentity, lifetimeSeconds: number = 60 * 60): Claims {
  return Object.freeze({
    subject: identity.subject,
    displayName: identity.displayName,
    preferredUsername: identity.preferredUsername,
    tenantId: "local-development",
    scopes: Object.freeze([]),
    roles: Object.freeze([]),
    expiresAt: Math.floor(Date.now() / 1000) + lifetimeSeconds,
    issuer: "urn:obo-gateway:mock",
    audience: "urn:obo-gateway:mock",
  })
}

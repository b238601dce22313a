// src/gateway/auth.ts — Admin authentication and request-id middleware

import { createHash, timingSafeEqual } from "node:crypto"
import type { Context, Next } from "hono"
import { ulid } from "ulid"

export type GatewayEnv = { Variables: { requestId: string } }

/** Timing-safe string comparison (constant-time even for different lengths) */
export function safeCompare(a: string, b: string): boolean {
  const bufA = createHash("sha256").update(a).digest()
  const bufB = createHash("sha256").update(b).digest()
  return timingSafeEqual(bufA, bufB)
}

/** Static bearer token guard for /admin/* (operator credential, not a user token). */
export function adminAuthMiddleware(adminToken: string) {
  return async (c: Context<GatewayEnv>, next: Next) => {
    const authHeader = c.req.header("Authorization")
    if (!authHeader?.startsWith("Bearer ")) {
      return c.json({ error: "Unauthorized", code: "AUTH_REQUIRED", requestId: c.get("requestId") }, 401)
    }

    const token = authHeader.slice(7)
    if (!safeCompare(token, adminToken)) {
      return c.json({ error: "Unauthorized", code: "AUTH_INVALID", requestId: c.get("requestId") }, 401)
    }

    return next()
  }
}

const SAFE_REQUEST_ID = /^[A-Za-z0-9._-]{1,64}$/

/** Adopt a well-formed inbound X-Request-Id, otherwise mint a ULID. Echoed on every response. */
export function requestIdMiddleware(nextId: () => string = () => ulid()) {
  return async (c: Context<GatewayEnv>, next: Next) => {
    const inbound = c.req.header("X-Request-Id")
    const requestId = inbound && SAFE_REQUEST_ID.test(inbound) ? inbound : nextId()
    c.set("requestId", requestId)
    await next()
    c.res.headers.set("X-Request-Id", requestId)
  }
}

// src/gateway/server.ts — Hono HTTP server with routes
//
//   GET  /health                              liveness + key set / cache summary
//   ALL  /api/v1/resources/:resource[/*]      delegated request pipeline
//   POST /admin/obo-cache/clear               (GATEWAY_ADMIN_TOKEN only)
//   POST /admin/jwks/invalidate               (GATEWAY_ADMIN_TOKEN only)

import { Hono, type Context } from "hono"
import { Type } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import { GatewayError, type GatewayErrorCode } from "../errors.js"
import type { AuditLog } from "../audit/audit-log.js"
import type { JwksCache } from "../identity/jwks-cache.js"
import type { TokenValidator } from "../identity/token-validator.js"
import type { OboTokenCache } from "../obo/token-cache.js"
import type { DelegatedRequestPipeline } from "../pipeline/delegated-request.js"
import { silentLogger, type Logger } from "../shared/logger.js"
import { adminAuthMiddleware, requestIdMiddleware, type GatewayEnv } from "./auth.js"

export interface AppOptions {
  pipeline: DelegatedRequestPipeline
  validator: TokenValidator
  /** Absent when authentication is disabled */
  jwks?: JwksCache
  oboCache?: OboTokenCache
  audit?: AuditLog
  /** Empty or absent: admin routes are not mounted */
  adminToken?: string
  logger?: Logger
  nextRequestId?: () => string
  /** Largest request body forwarded to a resource. Default 1 MiB. */
  maxBodyBytes?: number
}

export const DEFAULT_MAX_BODY_BYTES = 1024 * 1024

const RESOURCE_PREFIX_SEGMENTS = 5 // "", "api", "v1", "resources", ":resource"

/** Codes whose message is returned verbatim; every other code gets a fixed message. */
const VERBATIM_CODES: ReadonlySet<GatewayErrorCode> = new Set<GatewayErrorCode>([
  "AUTH_REQUIRED",
  "TOKEN_MALFORMED",
  "TOKEN_INVALID_SIGNATURE",
  "TOKEN_EXPIRED",
  "TOKEN_NOT_YET_VALID",
  "TOKEN_INVALID_ISSUER",
  "TOKEN_INVALID_AUDIENCE",
  "JWKS_KEY_NOT_FOUND",
  "FORBIDDEN_CROSS_USER",
  "RESOURCE_UNKNOWN",
])

const FIXED_MESSAGES: Partial<Record<GatewayErrorCode, string>> = {
  JWKS_UNAVAILABLE: "Signing keys are unavailable",
  OBO_ASSERTION_INVALID: "User assertion was rejected by the identity provider",
  OBO_CONSENT_REQUIRED: "User consent is required for the downstream resource",
  OBO_UNAUTHORIZED_CLIENT: "Gateway is not authorized for the downstream resource",
  OBO_IDENTITY_MISMATCH: "Delegated identity could not be confirmed",
  OBO_UPSTREAM_UNAVAILABLE: "Identity provider unavailable",
  OBO_UPSTREAM_TIMEOUT: "Identity provider timed out",
  RESOURCE_UNAVAILABLE: "Downstream resource unavailable",
  REQUEST_BODY_TOO_LARGE: "Request body too large",
  REQUEST_BODY_UNREADABLE: "Request body could not be read",
  REQUEST_ABORTED: "Request aborted",
}

export function publicMessage(error: GatewayError): string {
  if (VERBATIM_CODES.has(error.code)) return error.message
  return FIXED_MESSAGES[error.code] ?? "Internal server error"
}

/** JSON error body. Built as a raw Response: 499 is not a status Hono's typed helpers accept. */
export function errorResponse(error: GatewayError, requestId: string): Response {
  const headers = new Headers({ "Content-Type": "application/json", "X-Request-Id": requestId })
  if (error.httpStatus === 401) headers.set("WWW-Authenticate", 'Bearer realm="obo-gateway"')
  return new Response(JSON.stringify({ error: publicMessage(error), code: error.code, requestId }), {
    status: error.httpStatus,
    headers,
  })
}

/**
 * Buffer a request body up to `maxBytes`. A declared Content-Length over the
 * limit fails before anything is read; an undeclared body is cut off as soon
 * as it crosses the limit.
 */
export async function readBoundedBody(
  request: Pick<Request, "headers" | "body">,
  maxBytes: number,
): Promise<ArrayBuffer | null> {
  const declared = request.headers.get("content-length")
  if (declared !== null && parseInt(declared, 10) > maxBytes) throw bodyTooLarge(maxBytes)

  const stream = request.body
  if (!stream) return null
  const reader = stream.getReader()
  const chunks: Uint8Array[] = []
  let size = 0
  for (;;) {
    const { done, value } = await reader.read()
    if (done) break
    size += value.byteLength
    if (size > maxBytes) {
      await reader.cancel()
      throw bodyTooLarge(maxBytes)
    }
    chunks.push(value)
  }

  const buffer = new ArrayBuffer(size)
  const view = new Uint8Array(buffer)
  let offset = 0
  for (const chunk of chunks) {
    view.set(chunk, offset)
    offset += chunk.byteLength
  }
  return buffer
}

function bodyTooLarge(maxBytes: number): GatewayError {
  return new GatewayError("REQUEST_BODY_TOO_LARGE", "Request body too large", { maxBytes })
}

const CacheClearBody = Type.Object({
  subject: Type.Optional(Type.String({ minLength: 1 })),
})

export function createApp(options: AppOptions) {
  const app = new Hono<GatewayEnv>()
  const logger = options.logger ?? silentLogger
  const maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES

  app.use("*", requestIdMiddleware(options.nextRequestId))

  app.get("/health", (c) => {
    return c.json({
      status: "healthy",
      authMode: options.validator.mode,
      jwks: options.jwks
        ? { state: options.jwks.state, keyCount: options.jwks.keyCount }
        : { state: "DISABLED", keyCount: 0 },
      oboCache: { size: options.oboCache?.size ?? 0 },
    })
  })

  const handleResource = async (c: Context<GatewayEnv>) => {
    const requestId = c.get("requestId")
    const resource = c.req.param("resource") ?? ""
    const url = new URL(c.req.url)
    const rest = url.pathname.split("/").slice(RESOURCE_PREFIX_SEGMENTS)
    const path = rest.length > 0 ? `/${rest.join("/")}` : ""
    const owner = url.searchParams.get("owner") ?? url.searchParams.get("userId")
    const method = c.req.method
    const raw = c.req.raw
    const readBody = method === "GET" || method === "HEAD" ? undefined : () => readBoundedBody(raw, maxBodyBytes)

    const outcome = await options.pipeline.run({
      authorization: c.req.header("Authorization"),
      resource,
      requestedOwner: owner,
      requestId,
      signal: c.req.raw.signal,
      request: { method, path, query: url.search, headers: raw.headers },
      readBody,
    })

    if (outcome.state !== "COMPLETED") {
      return errorResponse(outcome.error, requestId)
    }
    const headers = new Headers(outcome.response.headers)
    headers.set("X-Request-Id", requestId)
    return new Response(outcome.response.body, { status: outcome.response.status, headers })
  }

  app.all("/api/v1/resources/:resource", handleResource)
  app.all("/api/v1/resources/:resource/*", handleResource)

  // Admin (operator) routes
  if (options.adminToken) {
    app.use("/admin/*", adminAuthMiddleware(options.adminToken))

    app.post("/admin/obo-cache/clear", async (c) => {
      const raw: unknown = await c.req.json().catch(() => ({}))
      if (!Value.Check(CacheClearBody, raw)) {
        return c.json({ error: "Body must be {\"subject\"?: string}", code: "INVALID_REQUEST", requestId: c.get("requestId") }, 400)
      }
      const cache = options.oboCache
      const removed = cache ? (raw.subject ? cache.clearSubject(raw.subject) : cache.clear()) : 0
      options.audit?.record({
        event: "obo_cache_cleared",
        success: true,
        requestId: c.get("requestId"),
        subject: raw.subject,
        details: { removed, scope: raw.subject ? "subject" : "all" },
      })
      logger.info("obo cache cleared", { removed, subject: raw.subject })
      return c.json({ removed })
    })

    app.post("/admin/jwks/invalidate", (c) => {
      options.jwks?.invalidate()
      options.audit?.record({
        event: "jwks_invalidated",
        success: true,
        requestId: c.get("requestId"),
        details: { enabled: options.jwks !== undefined },
      })
      return c.json({ invalidated: options.jwks !== undefined })
    })
  }

  app.notFound((c) => {
    return c.json({ error: "Not found", code: "NOT_FOUND", requestId: c.get("requestId") }, 404)
  })

  app.onError((err, c) => {
    logger.error("unhandled error", { path: c.req.path, error: err.message })
    return c.json({ error: "Internal server error", code: "INTERNAL_ERROR", requestId: c.get("requestId") }, 500)
  })

  return app
}

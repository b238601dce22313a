// src/errors.ts — Gateway typed error classes
//
// Every failure the request path can produce is a GatewayError with a stable
// code. The code decides the HTTP status and whether a retry is ever allowed;
// call sites never branch on message text.

export type GatewayErrorCategory =
  | "authentication"
  | "authorization"
  | "delegation"
  | "upstream"
  | "configuration"
  | "request"

/** Error codes and the HTTP status each one surfaces as. */
export const GATEWAY_ERROR_STATUS = {
  // Authentication (401, never retried)
  AUTH_REQUIRED: 401,
  TOKEN_MALFORMED: 401,
  TOKEN_INVALID_SIGNATURE: 401,
  TOKEN_EXPIRED: 401,
  TOKEN_NOT_YET_VALID: 401,
  TOKEN_INVALID_ISSUER: 401,
  TOKEN_INVALID_AUDIENCE: 401,
  JWKS_KEY_NOT_FOUND: 401,
  // Key material could not be fetched at all
  JWKS_UNAVAILABLE: 503,
  // Authorization (403, audited)
  FORBIDDEN_CROSS_USER: 403,
  // Delegation, terminal upstream rejections
  OBO_ASSERTION_INVALID: 401,
  OBO_CONSENT_REQUIRED: 403,
  OBO_UNAUTHORIZED_CLIENT: 403,
  OBO_IDENTITY_MISMATCH: 502,
  // Delegation, transient failures after the retry ceiling
  OBO_UPSTREAM_UNAVAILABLE: 502,
  OBO_UPSTREAM_TIMEOUT: 504,
  // Downstream hand-off
  RESOURCE_UNKNOWN: 404,
  RESOURCE_UNAVAILABLE: 502,
  // Request lifecycle
  REQUEST_BODY_TOO_LARGE: 413,
  REQUEST_BODY_UNREADABLE: 400,
  REQUEST_ABORTED: 499,
  INTERNAL_ERROR: 500,
  // Startup
  CONFIG_INVALID: 500,
} as const

export type GatewayErrorCode = keyof typeof GATEWAY_ERROR_STATUS

const CATEGORY_BY_PREFIX: ReadonlyArray<[string, GatewayErrorCategory]> = [
  ["AUTH_", "authentication"],
  ["TOKEN_", "authentication"],
  ["JWKS_", "authentication"],
  ["FORBIDDEN_", "authorization"],
  ["OBO_UPSTREAM_", "upstream"],
  ["OBO_", "delegation"],
  ["RESOURCE_", "upstream"],
  ["CONFIG_", "configuration"],
]

function categoryOf(code: GatewayErrorCode): GatewayErrorCategory {
  for (const [prefix, category] of CATEGORY_BY_PREFIX) {
    if (code.startsWith(prefix)) return category
  }
  return "request"
}

/** Typed error for every gateway operation. `context` must never hold token material. */
export class GatewayError extends Error {
  readonly name = "GatewayError"
  readonly code: GatewayErrorCode
  readonly httpStatus: number
  readonly category: GatewayErrorCategory
  readonly context: Record<string, unknown>

  constructor(code: GatewayErrorCode, message: string, context: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, options)
    this.code = code
    this.httpStatus = GATEWAY_ERROR_STATUS[code]
    this.category = categoryOf(code)
    this.context = context
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
    }
  }
}

export function isGatewayError(err: unknown): err is GatewayError {
  return err instanceof GatewayError
}

/** Thrown by loadConfig()/validateConfig(). Fatal: the process must not start serving. */
export class ConfigError extends Error {
  readonly name = "ConfigError"
  readonly problems: readonly string[]

  constructor(problems: string[]) {
    super(`Invalid gateway configuration: ${problems.join("; ")}`)
    this.problems = problems
  }
}

/** Wrap any thrown value as a GatewayError, keeping existing ones untouched. */
export function toGatewayError(err: unknown, fallback: GatewayErrorCode = "INTERNAL_ERROR"): GatewayError {
  if (isGatewayError(err)) return err
  if (isAbortError(err)) {
    return new GatewayError("REQUEST_ABORTED", "Request aborted by caller", {}, { cause: err })
  }
  const message = err instanceof Error ? err.message : String(err)
  return new GatewayError(fallback, message, {}, { cause: err })
}

/** True for DOMException AbortError / TimeoutError raised by AbortSignal-aware APIs. */
export function isAbortError(err: unknown): boolean {
  return err instanceof Error && (err.name === "AbortError" || err.name === "TimeoutError")
}

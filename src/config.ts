// src/config.ts — Configuration loader from environment variables
//
// Everything security-relevant is explicit: accepted issuers and audiences are
// listed, never inferred from a tenant id. Invalid or missing settings fail
// startup with a ConfigError naming every problem at once.

import { readFileSync } from "node:fs"
import { resolve } from "node:path"
import { Type, type Static } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import { ConfigError } from "./errors.js"
import type { MockIdentity } from "./identity/claims.js"
import type { ResourceDefinition } from "./resources/resource-client.js"
import type { RetryPolicyConfig } from "./shared/retry-policy.js"

export interface GatewayConfig {
  port: number
  host: string
  nodeEnv: string

  auth: {
    /** Local-development switch: mock identity, no token checks, no IdP calls. */
    disabled: boolean
    mockIdentity: MockIdentity
  }

  /** Identity provider (inbound validation and OBO exchange) */
  idp: {
    jwksUrl: string
    tokenUrl: string
    clientId: string
    clientSecret: string
    issuers: string[]
    audiences: string[]
    algorithms: string[]
    clockSkewSeconds: number
  }

  jwks: {
    ttlMs: number
    fetchTimeoutMs: number
    minRefreshIntervalMs: number
    failureBackoffMs: number
  }

  obo: {
    safetyMarginSeconds: number
    attemptTimeoutMs: number
    sweepIntervalMs: number
    verifyIdentity: boolean
    retry: RetryPolicyConfig
  }

  resourcesConfigPath: string
  resources: ReadonlyMap<string, ResourceDefinition>

  /** Largest request body forwarded to a resource */
  maxBodyBytes: number

  /** Enables /admin/* when non-empty */
  adminToken: string
  debug: boolean
}

type Env = Record<string, string | undefined>

// ---------------------------------------------------------------------------
// Resources file
// ---------------------------------------------------------------------------

const ResourceEntrySchema = Type.Object({
  scopes: Type.Array(Type.String({ minLength: 1 }), { minItems: 1 }),
  baseUrl: Type.String({ pattern: "^https?://" }),
  timeoutMs: Type.Optional(Type.Integer({ minimum: 1 })),
})

export const ResourcesFileSchema = Type.Object({
  resources: Type.Record(Type.String({ pattern: "^[A-Za-z0-9_-]+$" }), ResourceEntrySchema, {
    additionalProperties: false,
  }),
})

export type ResourcesFile = Static<typeof ResourcesFileSchema>

/** Parse and validate a resources document. Throws ConfigError listing every schema violation. */
export function parseResources(raw: unknown, source = "resources config"): Map<string, ResourceDefinition> {
  if (!Value.Check(ResourcesFileSchema, raw)) {
    const problems = [...Value.Errors(ResourcesFileSchema, raw)].map(
      (e) => `${source}: ${e.path || "/"} ${e.message}`,
    )
    throw new ConfigError(problems)
  }
  const resources = new Map<string, ResourceDefinition>()
  for (const [name, entry] of Object.entries(raw.resources)) {
    resources.set(name, { name, scopes: [...entry.scopes], baseUrl: entry.baseUrl, timeoutMs: entry.timeoutMs })
  }
  return resources
}

export function loadResources(path: string): Map<string, ResourceDefinition> {
  let text: string
  try {
    text = readFileSync(resolve(path), "utf-8")
  } catch (err) {
    throw new ConfigError([`GATEWAY_RESOURCES_CONFIG: cannot read ${path} (${err instanceof Error ? err.message : String(err)})`])
  }
  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch {
    throw new ConfigError([`GATEWAY_RESOURCES_CONFIG: ${path} is not valid JSON`])
  }
  return parseResources(raw, path)
}

// ---------------------------------------------------------------------------
// Environment parsing
// ---------------------------------------------------------------------------

/** Parse an integer from an environment variable, failing fast on NaN. */
function parseIntEnv(env: Env, envKey: string, fallback: string): number {
  const raw = env[envKey] ?? fallback
  const value = parseInt(raw, 10)
  if (isNaN(value)) {
    throw new ConfigError([`${envKey} must be a valid integer (got "${raw}")`])
  }
  return value
}

/** Comma-separated list, trimmed, empties dropped. */
export function parseList(value: string | undefined): string[] {
  if (!value) return []
  return value
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
}

function parseBool(value: string | undefined, fallback = false): boolean {
  if (value === undefined || value.trim() === "") return fallback
  return ["true", "1", "yes"].includes(value.trim().toLowerCase())
}

function isProduction(nodeEnv: string): boolean {
  const env = nodeEnv.trim().toLowerCase()
  return env === "production" || env === "prod"
}

export function loadConfig(env: Env = process.env): GatewayConfig {
  const authDisabled = parseBool(env.GATEWAY_AUTH_DISABLED)
  const tenantId = env.IDP_TENANT_ID ?? ""
  const authorityHost = (env.IDP_AUTHORITY_HOST ?? "https://login.microsoftonline.com").replace(/\/+$/, "")
  const resourcesConfigPath = env.GATEWAY_RESOURCES_CONFIG ?? "config/resources.json"

  const config: GatewayConfig = {
    port: parseIntEnv(env, "PORT", "8001"),
    host: env.HOST ?? "0.0.0.0",
    nodeEnv: env.NODE_ENV ?? "development",

    auth: {
      disabled: authDisabled,
      mockIdentity: {
        subject: env.GATEWAY_MOCK_SUBJECT ?? "00000000-0000-0000-0000-000000000001",
        displayName: env.GATEWAY_MOCK_NAME ?? "Test User",
        preferredUsername: env.GATEWAY_MOCK_USERNAME ?? "test@example.com",
      },
    },

    idp: {
      // Tenant id only ever derives endpoint URLs
      jwksUrl: env.IDP_JWKS_URL ?? (tenantId ? `${authorityHost}/${tenantId}/discovery/v2.0/keys` : ""),
      tokenUrl: env.IDP_TOKEN_URL ?? (tenantId ? `${authorityHost}/${tenantId}/oauth2/v2.0/token` : ""),
      clientId: env.IDP_CLIENT_ID ?? "",
      clientSecret: env.IDP_CLIENT_SECRET ?? "",
      issuers: parseList(env.GATEWAY_ISSUERS),
      audiences: parseList(env.GATEWAY_AUDIENCES),
      algorithms: env.GATEWAY_ALGORITHMS ? parseList(env.GATEWAY_ALGORITHMS) : ["RS256"],
      clockSkewSeconds: parseIntEnv(env, "GATEWAY_CLOCK_SKEW_SECONDS", "30"),
    },

    jwks: {
      ttlMs: parseIntEnv(env, "JWKS_CACHE_TTL_MS", "900000"),
      fetchTimeoutMs: parseIntEnv(env, "JWKS_FETCH_TIMEOUT_MS", "5000"),
      minRefreshIntervalMs: parseIntEnv(env, "JWKS_MIN_REFRESH_INTERVAL_MS", "1000"),
      failureBackoffMs: parseIntEnv(env, "JWKS_FAILURE_BACKOFF_MS", "30000"),
    },

    obo: {
      safetyMarginSeconds: parseIntEnv(env, "OBO_SAFETY_MARGIN_SECONDS", "60"),
      attemptTimeoutMs: parseIntEnv(env, "OBO_EXCHANGE_TIMEOUT_MS", "10000"),
      sweepIntervalMs: parseIntEnv(env, "OBO_CACHE_SWEEP_INTERVAL_MS", "60000"),
      verifyIdentity: parseBool(env.OBO_VERIFY_IDENTITY, true),
      retry: {
        maxAttempts: parseIntEnv(env, "OBO_RETRY_MAX_ATTEMPTS", "3"),
        baseDelayMs: parseIntEnv(env, "OBO_RETRY_BASE_DELAY_MS", "200"),
        maxDelayMs: parseIntEnv(env, "OBO_RETRY_MAX_DELAY_MS", "2000"),
        jitter: 0.2,
      },
    },

    resourcesConfigPath,
    resources: loadResources(resourcesConfigPath),

    maxBodyBytes: parseIntEnv(env, "GATEWAY_MAX_BODY_BYTES", "1048576"),

    adminToken: env.GATEWAY_ADMIN_TOKEN ?? "",
    debug: parseBool(env.GATEWAY_DEBUG),
  }

  validateConfig(config)
  return config
}

/** Collect every problem, then throw once. Returns normally for a usable config. */
export function validateConfig(config: GatewayConfig): void {
  const problems: string[] = []

  if (config.port < 1 || config.port > 65535) problems.push(`PORT must be 1-65535 (got ${config.port})`)
  if (config.resources.size === 0) problems.push(`${config.resourcesConfigPath} defines no resources`)

  if (config.auth.disabled) {
    if (isProduction(config.nodeEnv)) {
      problems.push("GATEWAY_AUTH_DISABLED must not be set when NODE_ENV is production")
    }
  } else {
    const { idp } = config
    if (!idp.jwksUrl) problems.push("IDP_JWKS_URL (or IDP_TENANT_ID) is required")
    if (!idp.tokenUrl) problems.push("IDP_TOKEN_URL (or IDP_TENANT_ID) is required")
    if (!idp.clientId) problems.push("IDP_CLIENT_ID is required")
    if (!idp.clientSecret) problems.push("IDP_CLIENT_SECRET is required")
    if (idp.issuers.length === 0) problems.push("GATEWAY_ISSUERS must list at least one accepted issuer")
    if (idp.audiences.length === 0) problems.push("GATEWAY_AUDIENCES must list at least one accepted audience")
    if (idp.algorithms.length === 0) problems.push("GATEWAY_ALGORITHMS must list at least one algorithm")
    if (idp.algorithms.some((alg) => alg.toLowerCase() === "none" || alg.startsWith("HS"))) {
      problems.push("GATEWAY_ALGORITHMS may only name asymmetric algorithms")
    }
  }

  if (config.idp.clockSkewSeconds < 0 || config.idp.clockSkewSeconds > 300) {
    problems.push("GATEWAY_CLOCK_SKEW_SECONDS must be 0-300")
  }
  if (config.obo.safetyMarginSeconds < 0) problems.push("OBO_SAFETY_MARGIN_SECONDS must not be negative")
  if (config.obo.retry.maxAttempts < 1 || config.obo.retry.maxAttempts > 10) {
    problems.push("OBO_RETRY_MAX_ATTEMPTS must be 1-10")
  }
  if (config.obo.retry.baseDelayMs < 0 || config.obo.retry.maxDelayMs < config.obo.retry.baseDelayMs) {
    problems.push("OBO_RETRY_MAX_DELAY_MS must be >= OBO_RETRY_BASE_DELAY_MS >= 0")
  }
  for (const [name, value] of [
    ["JWKS_CACHE_TTL_MS", config.jwks.ttlMs],
    ["JWKS_FETCH_TIMEOUT_MS", config.jwks.fetchTimeoutMs],
    ["OBO_EXCHANGE_TIMEOUT_MS", config.obo.attemptTimeoutMs],
    ["OBO_CACHE_SWEEP_INTERVAL_MS", config.obo.sweepIntervalMs],
    ["GATEWAY_MAX_BODY_BYTES", config.maxBodyBytes],
  ] as const) {
    if (value <= 0) problems.push(`${name} must be positive`)
  }

  if (problems.length > 0) throw new ConfigError(problems)
}

// src/boot/gateway-boot.ts — Component wiring for the gateway
//
// Builds every component from a validated GatewayConfig. The strategy pair is
// chosen here, once: JwtTokenValidator + OboExchanger, or (auth disabled)
// MockTokenValidator + LocalDevelopmentExchanger. Nothing on the request path
// checks the mode again.

import type { GatewayConfig } from "../config.js"
import { AuditLog } from "../audit/audit-log.js"
import { AuthorizationGuard } from "../authz/authorization-guard.js"
import { createApp } from "../gateway/server.js"
import { JwksCache } from "../identity/jwks-cache.js"
import { createTokenValidator, type TokenValidator } from "../identity/token-validator.js"
import { LocalDevelopmentExchanger, OboExchanger, type TokenExchanger } from "../obo/obo-exchanger.js"
import { OboTokenCache } from "../obo/token-cache.js"
import { DelegatedRequestPipeline } from "../pipeline/delegated-request.js"
import { HttpResourceClient, type ResourceClient } from "../resources/resource-client.js"
import { SecretRedactor } from "../safety/secret-redactor.js"
import { createLogger, type Logger } from "../shared/logger.js"
import type { Sleep } from "../shared/retry-policy.js"
import { defaultTimeProvider, type TimeProvider } from "../shared/time-provider.js"

// ── Dependency injection interface ─────────────────────────

export interface GatewayBootDeps {
  /** Used for JWKS and token-endpoint calls */
  fetcher?: typeof fetch
  resourceClient?: ResourceClient
  audit?: AuditLog
  time?: TimeProvider
  sleep?: Sleep
  logger?: (tag: string) => Logger
  nextRequestId?: () => string
}

export interface Gateway {
  app: ReturnType<typeof createApp>
  validator: TokenValidator
  exchanger: TokenExchanger
  pipeline: DelegatedRequestPipeline
  oboCache: OboTokenCache
  jwks?: JwksCache
  audit: AuditLog
}

/** Redactor for logs and audit events that also knows the configured client secret. */
export function createRedactor(config: GatewayConfig): SecretRedactor {
  return new SecretRedactor(undefined, [{ label: "client-secret", value: config.idp.clientSecret }])
}

export function buildGateway(config: GatewayConfig, deps: GatewayBootDeps = {}): Gateway {
  const time = deps.time ?? defaultTimeProvider
  const redactor = createRedactor(config)
  const log = deps.logger ?? ((tag: string) => createLogger(tag, config.debug, redactor))
  const audit = deps.audit ?? new AuditLog(undefined, time, redactor)
  const oboCache = new OboTokenCache({ safetyMarginSeconds: config.obo.safetyMarginSeconds, time })

  const keys: { jwks?: JwksCache } = {}
  const validator = createTokenValidator({
    authDisabled: config.auth.disabled,
    nodeEnv: config.nodeEnv,
    mockIdentity: config.auth.mockIdentity,
    jwt: () => {
      const jwks = new JwksCache({
        jwksUrl: config.idp.jwksUrl,
        ttlMs: config.jwks.ttlMs,
        fetchTimeoutMs: config.jwks.fetchTimeoutMs,
        minRefreshIntervalMs: config.jwks.minRefreshIntervalMs,
        failureBackoffMs: config.jwks.failureBackoffMs,
        fetcher: deps.fetcher,
        time,
        logger: log("jwks"),
      })
      return {
        issuers: config.idp.issuers,
        audiences: config.idp.audiences,
        algorithms: config.idp.algorithms,
        clockSkewSeconds: config.idp.clockSkewSeconds,
        keys: (keys.jwks = jwks),
        time,
        logger: log("token"),
      }
    },
  })

  const exchanger: TokenExchanger =
    validator.mode === "mock"
      ? new LocalDevelopmentExchanger(time)
      : new OboExchanger({
          credentials: {
            tokenUrl: config.idp.tokenUrl,
            clientId: config.idp.clientId,
            clientSecret: config.idp.clientSecret,
          },
          cache: oboCache,
          retry: config.obo.retry,
          attemptTimeoutMs: config.obo.attemptTimeoutMs,
          verifyIdentity: config.obo.verifyIdentity,
          fetcher: deps.fetcher,
          sleep: deps.sleep,
          time,
          logger: log("obo"),
          audit,
        })

  const pipeline = new DelegatedRequestPipeline({
    validator,
    guard: new AuthorizationGuard(audit, log("authz")),
    exchanger,
    resources: config.resources,
    resourceClient: deps.resourceClient ?? new HttpResourceClient({ logger: log("resource") }),
    audit,
    logger: log("pipeline"),
  })

  const app = createApp({
    pipeline,
    validator,
    jwks: keys.jwks,
    oboCache,
    audit,
    adminToken: config.adminToken,
    maxBodyBytes: config.maxBodyBytes,
    logger: log("gateway"),
    nextRequestId: deps.nextRequestId,
  })

  return { app, validator, exchanger, pipeline, oboCache, jwks: keys.jwks, audit }
}

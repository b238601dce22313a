// src/pipeline/delegated-request.ts — Delegated request lifecycle
//
// One inbound request, one pass through:
//   UNAUTHENTICATED → AUTHENTICATED → AUTHORIZED → DELEGATED → COMPLETED
//                                   ↘ FORBIDDEN  (cross-user, terminal)
//   any non-terminal state          → FAILED     (terminal)
//
// The downstream resource is never contacted before AUTHORIZED, and never
// with anything but the exchanged token. The request body is not read until
// the caller is authorized.

import { GatewayError, toGatewayError } from "../errors.js"
import type { AuditLog } from "../audit/audit-log.js"
import type { AuthorizationGuard } from "../authz/authorization-guard.js"
import type { Claims } from "../identity/claims.js"
import type { Authenticated, TokenValidator } from "../identity/token-validator.js"
import type { TokenExchanger } from "../obo/obo-exchanger.js"
import type { CachedToken } from "../obo/token-cache.js"
import type { ResourceClient, ResourceRegistry, ResourceRequest } from "../resources/resource-client.js"
import { silentLogger, type Logger } from "../shared/logger.js"

// ---------------------------------------------------------------------------
// States
// ---------------------------------------------------------------------------

export const PipelineState = {
  UNAUTHENTICATED: "UNAUTHENTICATED",
  AUTHENTICATED: "AUTHENTICATED",
  AUTHORIZED: "AUTHORIZED",
  FORBIDDEN: "FORBIDDEN",
  DELEGATED: "DELEGATED",
  COMPLETED: "COMPLETED",
  FAILED: "FAILED",
} as const

export type PipelineState = (typeof PipelineState)[keyof typeof PipelineState]

export const PIPELINE_TRANSITIONS: Record<PipelineState, readonly PipelineState[]> = {
  UNAUTHENTICATED: [PipelineState.AUTHENTICATED, PipelineState.FAILED],
  AUTHENTICATED: [PipelineState.AUTHORIZED, PipelineState.FORBIDDEN, PipelineState.FAILED],
  AUTHORIZED: [PipelineState.DELEGATED, PipelineState.FAILED],
  DELEGATED: [PipelineState.COMPLETED, PipelineState.FAILED],
  FORBIDDEN: [], // terminal
  COMPLETED: [], // terminal
  FAILED: [], // terminal
}

export class PipelineStateError extends Error {
  constructor(
    public readonly currentState: PipelineState,
    public readonly attemptedState: PipelineState,
  ) {
    super(`Invalid pipeline transition: ${currentState} → ${attemptedState}`)
    this.name = "PipelineStateError"
  }
}

/** Tracks one request's state; refuses any move not in PIPELINE_TRANSITIONS. */
export class PipelineRun {
  private current: PipelineState = PipelineState.UNAUTHENTICATED
  private readonly states: PipelineState[] = [PipelineState.UNAUTHENTICATED]

  get state(): PipelineState {
    return this.current
  }

  get trail(): PipelineState[] {
    return [...this.states]
  }

  transition(to: PipelineState): void {
    if (!PIPELINE_TRANSITIONS[this.current].includes(to)) {
      throw new PipelineStateError(this.current, to)
    }
    this.current = to
    this.states.push(to)
  }
}

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

export interface PipelineInput {
  /** Raw Authorization header value. */
  authorization: string | undefined
  resource: string
  /** Owner named by the request (query/path), if any. */
  requestedOwner?: string | null
  request: Omit<ResourceRequest, "signal" | "requestId" | "body">
  /** Called once the request is authorized; absent for bodiless methods. */
  readBody?: () => Promise<ArrayBuffer | null>
  requestId: string
  signal?: AbortSignal
}

export type PipelineOutcome =
  | { state: "COMPLETED"; status: number; response: Response; claims: Claims; trail: PipelineState[] }
  | { state: "FORBIDDEN"; status: 403; error: GatewayError; claims: Claims; trail: PipelineState[] }
  | { state: "FAILED"; status: number; error: GatewayError; claims?: Claims; trail: PipelineState[] }

export interface DelegatedRequestPipelineDeps {
  validator: TokenValidator
  guard: AuthorizationGuard
  exchanger: TokenExchanger
  resources: ResourceRegistry
  resourceClient: ResourceClient
  audit?: AuditLog
  logger?: Logger
}

export class DelegatedRequestPipeline {
  private readonly logger: Logger

  constructor(private readonly deps: DelegatedRequestPipelineDeps) {
    this.logger = deps.logger ?? silentLogger
  }

  async run(input: PipelineInput): Promise<PipelineOutcome> {
    const run = new PipelineRun()
    const { requestId, signal } = input

    // Authenticate
    let auth: Authenticated
    try {
      auth = await this.deps.validator.authenticate(input.authorization, signal)
    } catch (err) {
      const error = toGatewayError(err)
      this.deps.audit?.record({
        event: "token_rejected",
        success: false,
        requestId,
        details: { code: error.code, resource: input.resource },
      })
      return this.fail(run, error)
    }
    run.transition(PipelineState.AUTHENTICATED)
    const claims = auth.claims
    this.deps.audit?.record({
      event: "token_validated",
      success: true,
      requestId,
      subject: claims.subject,
      details: { mode: this.deps.validator.mode, tenantId: claims.tenantId, resource: input.resource },
    })

    // Authorize
    const decision = this.deps.guard.authorize(claims.subject, input.requestedOwner, {
      requestId,
      resource: input.resource,
    })
    if (decision.outcome === "DENIED_CROSS_USER") {
      run.transition(PipelineState.FORBIDDEN)
      return {
        state: "FORBIDDEN",
        status: 403,
        error: new GatewayError("FORBIDDEN_CROSS_USER", "You can only access your own resources", {
          actingSubject: decision.actingSubject,
          requestedOwner: decision.requestedOwner,
        }),
        claims,
        trail: run.trail,
      }
    }
    if (decision.outcome === "UNAUTHENTICATED") {
      return this.fail(run, new GatewayError("AUTH_REQUIRED", "Token carries no usable subject"), claims)
    }
    run.transition(PipelineState.AUTHORIZED)

    const resource = this.deps.resources.get(input.resource)
    if (!resource) {
      return this.fail(
        run,
        new GatewayError("RESOURCE_UNKNOWN", `Unknown resource: ${input.resource}`, { resource: input.resource }),
        claims,
      )
    }

    let body: ArrayBuffer | null = null
    if (input.readBody) {
      try {
        body = await input.readBody()
      } catch (err) {
        return this.fail(run, toGatewayError(err, "REQUEST_BODY_UNREADABLE"), claims)
      }
    }

    // Delegate
    let token: CachedToken
    try {
      token = await this.deps.exchanger.exchange(auth.assertion, resource.scopes, {
        subject: claims.subject,
        signal,
        requestId,
      })
    } catch (err) {
      return this.fail(run, toGatewayError(err, "OBO_UPSTREAM_UNAVAILABLE"), claims)
    }
    run.transition(PipelineState.DELEGATED)

    // Hand off
    let response: Response
    try {
      response = await this.deps.resourceClient.forward(resource, token.accessToken, {
        ...input.request,
        body,
        requestId,
        signal,
      })
    } catch (err) {
      return this.fail(run, toGatewayError(err, "RESOURCE_UNAVAILABLE"), claims)
    }
    run.transition(PipelineState.COMPLETED)

    this.logger.debug("request completed", {
      requestId,
      subject: claims.subject,
      resource: resource.name,
      status: response.status,
    })
    return { state: "COMPLETED", status: response.status, response, claims, trail: run.trail }
  }

  private fail(run: PipelineRun, error: GatewayError, claims?: Claims): PipelineOutcome {
    run.transition(PipelineState.FAILED)
    const data = { code: error.code, from: run.trail.at(-2), ...error.context }
    if (error.httpStatus >= 500) this.logger.warn("request failed", data)
    else this.logger.debug("request failed", data)
    return { state: "FAILED", status: error.httpStatus, error, claims, trail: run.trail }
  }
}


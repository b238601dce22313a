// src/authz/authorization-guard.ts — Same-user resource access policy
//
// A caller may act only on resources owned by the identity that presented the
// inbound token. Identifiers are opaque: compared exactly, never normalized.
// Must run before any downstream call is made.

import type { AuditLog } from "../audit/audit-log.js"
import { silentLogger, type Logger } from "../shared/logger.js"

export type AuthorizationDecision =
  | { outcome: "ALLOWED"; actingSubject: string; requestedOwner: string | null }
  | { outcome: "DENIED_CROSS_USER"; actingSubject: string; requestedOwner: string }
  | { outcome: "UNAUTHENTICATED"; actingSubject: null; requestedOwner: string | null }

export interface AuthorizeContext {
  requestId?: string
  resource?: string
}

function present(value: string | null | undefined): value is string {
  return typeof value === "string" && value.length > 0
}

export class AuthorizationGuard {
  constructor(
    private readonly audit?: AuditLog,
    private readonly logger: Logger = silentLogger,
  ) {}

  authorize(
    actingSubject: string | null | undefined,
    requestedOwner: string | null | undefined,
    context: AuthorizeContext = {},
  ): AuthorizationDecision {
    const owner = present(requestedOwner) ? requestedOwner : null

    if (!present(actingSubject)) {
      return { outcome: "UNAUTHENTICATED", actingSubject: null, requestedOwner: owner }
    }

    // No explicit owner: the request is implicitly scoped to the caller
    if (owner === null) {
      return { outcome: "ALLOWED", actingSubject, requestedOwner: null }
    }

    if (owner !== actingSubject) {
      this.logger.warn("cross-user access denied", {
        actingSubject,
        requestedOwner: owner,
        resource: context.resource,
      })
      this.audit?.record({
        event: "authorization_denied",
        success: false,
        requestId: context.requestId,
        subject: actingSubject,
        tags: ["security"],
        details: {
          reason: "cross_user",
          actingSubject,
          requestedOwner: owner,
          resource: context.resource,
        },
      })
      return { outcome: "DENIED_CROSS_USER", actingSubject, requestedOwner: owner }
    }

    return { outcome: "ALLOWED", actingSubject, requestedOwner: owner }
  }
}

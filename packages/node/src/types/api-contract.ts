/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { SandboxService } from "../services/sandbox-service.js";
import type { AuditLog } from "../services/audit-log.js";
import type { AccountId } from "@shardvault/types";

/**
 * Hono environment type for the sandbox app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The sandbox every request runs against */
    service: SandboxService;

    /** Audit log of mutations */
    auditLog: AuditLog;

    /** Signing account from X-Account-Id (set by principal middleware) */
    principal: AccountId | undefined;

    /** Parsed request body (set by validateBody) */
    validatedBody: unknown;
  };
}

/**
 * Shared response helpers for transaction-backed routes.
 */

import type { Context } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { AuditResourceType } from "../services/audit-log.js";
import type { SubmittedTransaction } from "../services/sandbox-service.js";

export interface AuditTarget {
  readonly action: string;
  readonly resourceType: AuditResourceType;
  readonly resourceId: string;
  readonly detail?: string;
}

/**
 * Audit a submitted transaction and respond with it: 200 once its
 * receipts have all executed, 202 while any is still queued.
 */
export function respondWithTransaction(
  c: Context<AppEnv>,
  actor: string,
  tx: SubmittedTransaction,
  target: AuditTarget,
): Response {
  c.get("auditLog").append({ actor, transactionId: tx.transactionId, ...target });
  return c.json({ data: tx }, tx.outcome.status === "pending" ? 202 : 200);
}

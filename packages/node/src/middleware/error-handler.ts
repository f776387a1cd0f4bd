/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Every domain error in the stack (HostError, LedgerError, VaultError,
 * RegistryError, AssetRegistryError, SandboxError) carries a string
 * `code`; the code picks the HTTP status.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Readonly<Record<string, ContentfulStatusCode>> = {
  // Malformed requests
  VALIDATION_ERROR: 400,
  INVALID_ARGUMENTS: 400,
  INVALID_ACCOUNT_ID: 400,
  EMPTY_BATCH: 400,
  DUPLICATE_ASSET: 400,
  INVALID_AMOUNT: 400,
  INVALID_METADATA: 400,
  INVALID_DEPOSIT: 400,
  SELF_TRANSFER: 400,
  INVALID_SNAPSHOT: 400,

  // Principal
  MISSING_PRINCIPAL: 401,
  UNAUTHORIZED: 403,
  RESERVED_ACCOUNT: 403,
  CALL_PROHIBITED: 403,

  // Lookups
  NOT_FOUND: 404,
  ACCOUNT_NOT_FOUND: 404,
  TRANSACTION_NOT_FOUND: 404,
  VAULT_NOT_FOUND: 404,
  SETTLEMENT_NOT_FOUND: 404,
  ASSET_REGISTRY_NOT_FOUND: 404,
  TOKEN_NOT_FOUND: 404,
  METHOD_NOT_FOUND: 404,
  NO_COMPONENT: 404,

  // State conflicts
  ALREADY_REGISTERED: 409,
  ADDRESS_TAKEN: 409,
  ALREADY_INITIALIZED: 409,
  NOT_INITIALIZED: 409,
  ACCOUNT_EXISTS: 409,
  ACCOUNT_ALREADY_REGISTERED: 409,
  TOKEN_EXISTS: 409,
  NOT_AN_ASSET_REGISTRY: 409,
  INVALID_TRANSITION: 409,
  NON_ZERO_BALANCE: 409,

  // Unprocessable
  INSUFFICIENT_FUNDS: 422,
  INSUFFICIENT_BALANCE: 422,
  INSUFFICIENT_RESERVE: 422,
  INSUFFICIENT_DEPOSIT: 422,
  ACCOUNT_NOT_REGISTERED: 422,
  ARITHMETIC_OVERFLOW: 422,
  ARITHMETIC_UNDERFLOW: 422,
  GAS_EXCEEDED: 422,
  APPROVAL_MISMATCH: 422,
  OWNER_MISMATCH: 422,
  TRANSACTION_FAILED: 422,

  // Remote steps
  REMOTE_CALL_FAILED: 502,
  REMOTE_CALL_PENDING: 502,
  FORCED_FAILURE: 502,
};

function errorCodeOf(err: Error): string | undefined {
  return "code" in err && typeof err.code === "string" ? err.code : undefined;
}

function transactionIdOf(err: Error): string | undefined {
  return "transactionId" in err && typeof err.transactionId === "string"
    ? err.transactionId
    : undefined;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  const code = errorCodeOf(err);
  const status = code === undefined ? 500 : (STATUS_MAP[code] ?? 500);

  // Don't leak internal details
  const message = status === 500 ? "Internal server error" : err.message;
  const transactionId = transactionIdOf(err);

  const envelope = createErrorEnvelope(
    status === 500 ? "INTERNAL_ERROR" : (code ?? "INTERNAL_ERROR"),
    message,
    transactionId === undefined ? undefined : { transactionId },
  );
  return c.json(envelope, status);
}

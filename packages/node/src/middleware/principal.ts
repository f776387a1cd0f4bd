/**
 * Principal middleware.
 *
 * The account a request acts as comes from the X-Account-Id header.
 * Reads may omit it; every mutation requires it.
 */

import type { Context, MiddlewareHandler } from "hono";
import { isValidAccountId } from "@shardvault/types";
import type { AccountId } from "@shardvault/types";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";
import { SandboxError } from "../services/sandbox-service.js";

export const PRINCIPAL_HEADER = "X-Account-Id";

const MUTATING_METHODS = new Set(["POST", "PUT", "PATCH", "DELETE"]);

export function principalMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const header = c.req.header(PRINCIPAL_HEADER);

    if (header === undefined) {
      if (MUTATING_METHODS.has(c.req.method)) {
        return c.json(
          createErrorEnvelope("MISSING_PRINCIPAL", `${PRINCIPAL_HEADER} header is required`),
          401,
        );
      }
      c.set("principal", undefined);
      return next();
    }

    if (!isValidAccountId(header)) {
      return c.json(
        createErrorEnvelope("INVALID_ACCOUNT_ID", `Invalid ${PRINCIPAL_HEADER} "${header}"`),
        400,
      );
    }

    c.set("principal", header);
    return next();
  };
}

/**
 * The principal of a request that passed principalMiddleware on a
 * mutating route.
 */
export function requirePrincipal(c: Context<AppEnv>): AccountId {
  const principal = c.get("principal");
  if (principal === undefined) {
    throw new SandboxError("MISSING_PRINCIPAL", `${PRINCIPAL_HEADER} header is required`);
  }
  return principal;
}

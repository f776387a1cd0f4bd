/**
 * Path parameter parsing shared by the route modules.
 */

import type { Context } from "hono";
import { isValidAccountId } from "@shardvault/types";
import type { AccountId } from "@shardvault/types";
import type { AppEnv } from "../types/api-contract.js";
import { IndexParamSchema } from "../types/dto.js";
import { SandboxError } from "../services/sandbox-service.js";

export function indexParam(c: Context<AppEnv>): number {
  const raw = c.req.param("index");
  const parsed = IndexParamSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SandboxError("VALIDATION_ERROR", `Invalid vault index "${String(raw)}"`);
  }
  return parsed.data;
}

export function accountParam(c: Context<AppEnv>, name: string): AccountId {
  const raw = c.req.param(name);
  if (raw === undefined || !isValidAccountId(raw)) {
    throw new SandboxError("VALIDATION_ERROR", `Invalid account id "${String(raw)}"`);
  }
  return raw;
}

/**
 * @shardvault/runtime: Argument parsing for component methods.
 *
 * Arguments reach a component as plain JSON values. Components parse
 * them with a zod schema before using them.
 */

import { z } from "zod";
import { isValidAccountId } from "@shardvault/types";
import type { ExecutionContext } from "./types.js";
import { HostError } from "./types.js";

/** An account id that satisfies the host's naming rule. */
export const AccountIdSchema = z.string().refine(isValidAccountId, {
  message: "Invalid account id",
});

/** A u128 amount of base units, as a decimal string. */
export const U128Schema = z.string().regex(/^\d+$/, "Expected a decimal string of base units");

/**
 * Parse method arguments, failing with INVALID_ARGUMENTS.
 */
export function parseArgs<S extends z.ZodTypeAny>(
  schema: S,
  args: unknown,
  method: string,
): z.infer<S> {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new HostError("INVALID_ARGUMENTS", `Invalid arguments for ${method}: ${details}`);
  }
  return parsed.data;
}

/**
 * Failure for a method a component does not expose.
 */
export function methodNotFound(component: string, method: string): HostError {
  return new HostError("METHOD_NOT_FOUND", `${component} has no method "${method}"`);
}

/**
 * Callbacks are private: only the component's own account may call them.
 */
export function assertPrivate(ctx: ExecutionContext, method: string): void {
  if (ctx.predecessorAccountId !== ctx.currentAccountId) {
    throw new HostError("UNAUTHORIZED", `Method ${method} is private`);
  }
}

/**
 * @shardvault/runtime: Tagged results of remote steps.
 *
 * Every request resolves to exactly one CallResult. Resuming code
 * reads it from `ctx.promiseResults` and decides what a failure means
 * through a ResumptionPolicy.
 */

import type { ExecutionContext } from "./types.js";
import { HostError } from "./types.js";

export type CallResult<T> =
  | { readonly status: "success"; readonly value: T }
  | { readonly status: "failed"; readonly reason: string; readonly code?: string }
  | { readonly status: "pending" };

export type Success<T> = Extract<CallResult<T>, { status: "success" }>;
export type Failed = Extract<CallResult<unknown>, { status: "failed" }>;
export type Pending = Extract<CallResult<unknown>, { status: "pending" }>;

/**
 * How resuming code treats a result that is not a success.
 *
 * - "abort": failure and pending throw, aborting the resuming receipt
 * - "propagate": the result is handed back as a value
 */
export type ResumptionPolicy = "abort" | "propagate";

// ─── Constructors ────────────────────────────────────────────────────────

export function success<T>(value: T): Success<T> {
  return { status: "success", value };
}

export function failed(reason: string, code?: string): Failed {
  return code === undefined ? { status: "failed", reason } : { status: "failed", reason, code };
}

export function pending(): Pending {
  return { status: "pending" };
}

/**
 * Turn a thrown value into a failed result, keeping a string `code`
 * when the error carries one.
 */
export function failedFromError(err: unknown): Failed {
  if (err instanceof Error) {
    const code = "code" in err && typeof err.code === "string" ? err.code : undefined;
    return failed(err.message, code);
  }
  return failed(String(err));
}

// ─── Narrowing ───────────────────────────────────────────────────────────

export function isSuccess<T>(result: CallResult<T>): result is Success<T> {
  return result.status === "success";
}

export function isFailed<T>(result: CallResult<T>): result is Failed {
  return result.status === "failed";
}

export function isPending<T>(result: CallResult<T>): result is Pending {
  return result.status === "pending";
}

// ─── Resumption ──────────────────────────────────────────────────────────

/**
 * The single result a callback resumes with. A callback invoked with
 * no results, or with several, fails with NOT_A_CALLBACK.
 */
export function requireSingleResult(ctx: ExecutionContext): CallResult<unknown> {
  const [first, ...rest] = ctx.promiseResults;
  if (first === undefined || rest.length > 0) {
    throw new HostError(
      "NOT_A_CALLBACK",
      `Expected exactly one promise result, got ${String(ctx.promiseResults.length)}`,
    );
  }
  return first;
}

/**
 * Apply a resumption policy to a result. Under "abort" anything but a
 * success throws; under "propagate" the result is returned unchanged.
 */
export function resume<T>(result: CallResult<T>, policy: ResumptionPolicy): CallResult<T> {
  if (policy === "propagate" || result.status === "success") return result;
  if (result.status === "pending") {
    throw new HostError("REMOTE_CALL_PENDING", "Remote call has not resolved");
  }
  throw new HostError("REMOTE_CALL_FAILED", `Remote call failed: ${result.reason}`);
}

/**
 * Runtime Type Guards
 *
 * Narrowing functions for Shardvault domain types.
 * Results of remote steps arrive as `unknown` and are narrowed
 * here before a component trusts them.
 */

import { isValidAccountId } from "./account.js";
import type {
  CreateVaultArgs,
  PublicVaultInfo,
  VaultParams,
  VaultRecord,
} from "./vault.js";

/** Largest value representable in an unsigned 128-bit integer. */
const U128_MAX = (1n << 128n) - 1n;

/**
 * True for a decimal string of base units within the u128 range.
 */
export function isU128String(value: unknown): value is string {
  if (typeof value !== "string" || !/^\d+$/.test(value)) return false;
  return BigInt(value) <= U128_MAX;
}

function asRecord(value: unknown): Record<string, unknown> | null {
  if (value === null || typeof value !== "object") return null;
  return value as Record<string, unknown>;
}

export function isPublicVaultInfo(value: unknown): value is PublicVaultInfo {
  const v = asRecord(value);
  if (v === null) return false;
  return (
    typeof v.name === "string" &&
    typeof v.symbol === "string" &&
    isU128String(v.reportedSupply) &&
    typeof v.media === "string"
  );
}

export function isVaultRecord(value: unknown): value is VaultRecord {
  const v = asRecord(value);
  if (v === null) return false;
  return (
    typeof v.index === "number" &&
    Number.isSafeInteger(v.index) &&
    v.index >= 0 &&
    isValidAccountId(v.origin) &&
    isValidAccountId(v.vaultAddress)
  );
}

export function isVaultParams(value: unknown): value is VaultParams {
  const v = asRecord(value);
  if (v === null) return false;
  return (
    typeof v.name === "string" &&
    typeof v.symbol === "string" &&
    isU128String(v.unitValue) &&
    typeof v.media === "string"
  );
}

export function isCreateVaultArgs(value: unknown): value is CreateVaultArgs {
  const v = asRecord(value);
  if (v === null) return false;
  return (
    typeof v.name === "string" &&
    isValidAccountId(v.origin) &&
    typeof v.symbol === "string" &&
    v.symbol.length > 0 &&
    typeof v.media === "string"
  );
}

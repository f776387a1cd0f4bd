/**
 * @shardvault/ledger: Checked share arithmetic.
 *
 * All arithmetic uses bigint bounded to the unsigned 128-bit range.
 * Values outside the range throw instead of wrapping.
 *
 * Rules:
 * - No floating-point operations
 * - No negative quantities
 * - Decimal strings convert to base units via SHARE_DECIMALS scaling
 */

import { LedgerError } from "./types.js";

/** Largest share quantity (u128). */
export const U128_MAX = (1n << 128n) - 1n;

/** Decimal places of one whole share. */
export const SHARE_DECIMALS = 24;

/** Base units in one whole share. */
export const ONE_SHARE = 10n ** BigInt(SHARE_DECIMALS);

function assertInRange(value: bigint, op: string): bigint {
  if (value < 0n) {
    throw new LedgerError("ARITHMETIC_UNDERFLOW", `${op} underflows: result ${value.toString()} is negative`);
  }
  if (value > U128_MAX) {
    throw new LedgerError("ARITHMETIC_OVERFLOW", `${op} overflows u128: result ${value.toString()}`);
  }
  return value;
}

export function checkedAdd(a: bigint, b: bigint): bigint {
  return assertInRange(a + b, "addition");
}

export function checkedSub(a: bigint, b: bigint): bigint {
  return assertInRange(a - b, "subtraction");
}

export function checkedMul(a: bigint, b: bigint): bigint {
  return assertInRange(a * b, "multiplication");
}

/**
 * Integer division, truncating toward zero.
 */
export function checkedDiv(a: bigint, b: bigint): bigint {
  if (b === 0n) {
    throw new LedgerError("INVALID_AMOUNT", "Division by zero");
  }
  return assertInRange(a / b, "division");
}

/**
 * Parse a u128 decimal string of base units ("1000000").
 */
export function parseU128(value: string): bigint {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid u128 amount: "${value}"`);
  }
  return assertInRange(BigInt(trimmed), "parse");
}

/**
 * Parse a decimal amount of whole shares into base units.
 *
 * "1.5" → 1500000000000000000000000n
 * "100" → 100000000000000000000000000n
 */
export function parseShares(amount: string): bigint {
  const trimmed = amount.trim();
  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid share amount format: "${amount}"`);
  }

  const [intPart = "0", fracPart = ""] = trimmed.split(".");
  if (fracPart.length > SHARE_DECIMALS) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but shares allow ${String(SHARE_DECIMALS)}`,
    );
  }

  return assertInRange(BigInt(intPart + fracPart.padEnd(SHARE_DECIMALS, "0")), "parse");
}

/**
 * Format base units as a decimal amount of whole shares.
 *
 * 1500000000000000000000000n → "1.500000000000000000000000"
 */
export function formatShares(units: bigint): string {
  assertInRange(units, "format");
  const str = units.toString().padStart(SHARE_DECIMALS + 1, "0");
  return `${str.slice(0, str.length - SHARE_DECIMALS)}.${str.slice(str.length - SHARE_DECIMALS)}`;
}

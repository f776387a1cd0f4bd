/**
 * @shardvault/ledger: Types for the share ledger.
 *
 * Rules:
 * - Share amounts are bigint base units within the u128 range
 * - Snapshots carry amounts as decimal strings
 * - Fail-closed: invalid operations throw, never silently succeed
 */

import type { AccountId } from "@shardvault/types";

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "ACCOUNT_NOT_REGISTERED"
  | "ACCOUNT_ALREADY_REGISTERED"
  | "INSUFFICIENT_BALANCE"
  | "INSUFFICIENT_RESERVE"
  | "NON_ZERO_BALANCE"
  | "SELF_TRANSFER"
  | "INVALID_AMOUNT"
  | "ARITHMETIC_OVERFLOW"
  | "ARITHMETIC_UNDERFLOW"
  | "INVALID_SNAPSHOT";

/**
 * Structured error from the share ledger.
 * Always thrown: never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

// ─── Hooks ───────────────────────────────────────────────────────────────

/**
 * Observability callbacks fired by the ledger. They have no state
 * effect on the ledger itself.
 */
export interface LedgerHooks {
  onAccountClosed?(accountId: AccountId, balance: bigint): void;
  onTokensBurned?(accountId: AccountId, amount: bigint): void;
}

// ─── Invariant ───────────────────────────────────────────────────────────

/**
 * Result of checking `totalSupply == Σ balances + reserved`.
 */
export interface SupplyCheck {
  readonly totalSupply: bigint;
  readonly sumOfBalances: bigint;
  /** Shares held out of balances while a remote step is pending */
  readonly reserved: bigint;
  /** totalSupply == sumOfBalances + reserved */
  readonly consistent: boolean;
  /** consistent, and nothing reserved: totalSupply == sumOfBalances */
  readonly settled: boolean;
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/**
 * Serializable snapshot of the ledger state.
 */
export interface LedgerSnapshot {
  readonly version: 1;
  readonly balances: readonly { readonly accountId: AccountId; readonly balance: string }[];
  readonly totalSupply: string;
  readonly reserved: string;
}

/**
 * @shardvault/vault: Types for the vault component.
 *
 * Rules:
 * - Share amounts are bigint internally, decimal strings at the surface
 * - Every deposit, withdrawal and swap in confirmed mode is a
 *   settlement intent with one leg per asset transfer
 * - Intents are kept after they resolve, for reconciliation
 */

import type { Logger } from "pino";
import type { AccountId, AssetId, AssetOriginId } from "@shardvault/types";

// =============================================================================
// Error
// =============================================================================

export type VaultErrorCode =
  | "NOT_INITIALIZED"
  | "ALREADY_INITIALIZED"
  | "UNAUTHORIZED"
  | "INSUFFICIENT_BALANCE"
  | "INSUFFICIENT_DEPOSIT"
  | "INVALID_DEPOSIT"
  | "EMPTY_BATCH"
  | "DUPLICATE_ASSET"
  | "INVALID_AMOUNT"
  | "INVALID_METADATA"
  | "ARITHMETIC_UNDERFLOW"
  | "SETTLEMENT_NOT_FOUND"
  | "INVALID_TRANSITION";

export class VaultError extends Error {
  public readonly code: VaultErrorCode;

  constructor(code: VaultErrorCode, message: string) {
    super(message);
    this.name = "VaultError";
    this.code = code;
  }
}

// =============================================================================
// Configuration
// =============================================================================

/**
 * When the ledger changes relative to the asset transfers.
 *
 * - "confirmed": credit or burn only once a transfer is confirmed
 * - "optimistic": change the ledger first and never reconcile
 *   (financially unsafe: funds are at risk until the transfers land)
 */
export type SettlementMode = "confirmed" | "optimistic";

export interface VaultOptions {
  /** Default: "confirmed" */
  readonly settlement?: SettlementMode;
  /** Gas attached to each asset transfer. Default: 10 TGas */
  readonly transferGas?: bigint;
  /** Gas attached to each settlement callback. Default: 5 TGas */
  readonly callbackGas?: bigint;
  readonly logger?: Logger;
}

// =============================================================================
// State
// =============================================================================

export interface VaultState {
  readonly origin: AssetOriginId;
  /** The principal that ran init; the only one allowed to setParams */
  readonly registry: AccountId;
  /** Share units one deposited asset is worth */
  readonly unitValue: bigint;
  readonly name: string;
  readonly symbol: string;
  readonly media: string;
}

// =============================================================================
// Settlement intents
// =============================================================================

export type SettlementKind = "deposit" | "withdraw" | "swap";

export type SettlementStatus = "pending" | "settled" | "partially_failed" | "failed";

export type LegStatus = "pending" | "confirmed" | "failed";

/**
 * One asset transfer of a settlement.
 */
export interface SettlementLeg {
  readonly assetId: AssetId;
  /** Account the asset moves to */
  readonly receiverId: AccountId;
  readonly status: LegStatus;
  readonly reason?: string;
  readonly resolvedAtBlock?: number;
}

export interface SettlementIntent {
  readonly id: string;
  readonly kind: SettlementKind;
  /** Account whose shares the settlement credits or debits */
  readonly accountId: AccountId;
  readonly status: SettlementStatus;
  readonly legs: readonly SettlementLeg[];
  /** Share units per asset when the intent was opened */
  readonly unitValue: string;
  readonly openedAtBlock: number;
  readonly resolvedAtBlock?: number;
}

/** Shape of the `storage_balance_*` views. */
export interface StorageBalance {
  readonly total: string;
  readonly available: string;
}

export interface StorageBalanceBounds {
  readonly min: string;
  readonly max: string | null;
}

/**
 * @shardvault/vault: Custody vault for one asset-origin class.
 *
 * Locks unique assets and issues fungible shares against them.
 *
 * Subsystems:
 * - Ledger: balances and supply via @shardvault/ledger
 * - Settlements: saga intents resolving each asset transfer
 * - Metadata: fungible-token metadata of the shares
 *
 * Design rules:
 * - Confirmed settlement is the default; optimistic is opt-in
 * - Preconditions are checked before any state changes
 * - Only the registry that initialized a vault may update it
 */

// Component
export {
  VaultContract,
  UNIT_VALUE,
  STORAGE_BALANCE_MIN,
  DEFAULT_TRANSFER_GAS,
  DEFAULT_CALLBACK_GAS,
} from "./vault.js";

// Subsystems
export { SettlementBook } from "./settlement.js";
export type { OpenSettlement, SettlementBookSnapshot } from "./settlement.js";
export { FT_METADATA_SPEC, buildMetadata, assertValidMetadata } from "./metadata.js";
export type { ShareMetadata } from "./metadata.js";

// Types
export type {
  VaultErrorCode,
  SettlementMode,
  VaultOptions,
  VaultState,
  SettlementKind,
  SettlementStatus,
  LegStatus,
  SettlementLeg,
  SettlementIntent,
  StorageBalance,
  StorageBalanceBounds,
} from "./types.js";
export { VaultError } from "./types.js";

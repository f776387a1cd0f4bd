/**
 * @shardvault/types: Shared domain types for the Shardvault stack.
 *
 * These types are used across all Shardvault packages:
 * - Account and asset identities
 * - Vault records and public projections
 * - Parameter updates
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - u128 quantities travel as decimal strings
 */

// Account types
export type { AccountId, AssetOriginId, AssetId } from "./account.js";
export {
  isValidAccountId,
  isSubAccountOf,
  MIN_ACCOUNT_ID_LENGTH,
  MAX_ACCOUNT_ID_LENGTH,
} from "./account.js";

// Vault types
export type {
  VaultRecord,
  PublicVaultInfo,
  CreateVaultArgs,
  VaultParams,
} from "./vault.js";

// Runtime type guards
export {
  isU128String,
  isPublicVaultInfo,
  isVaultRecord,
  isVaultParams,
  isCreateVaultArgs,
} from "./guards.js";

/**
 * Vault Types
 *
 * Records and projections exchanged between the Registry, its Vaults
 * and their callers.
 *
 * Rules:
 * - All types are readonly (immutability by default)
 * - Share amounts are decimal strings of base units (u128 range)
 * - Media and icon fields are passed through verbatim
 */

import type { AccountId, AssetOriginId } from "./account.js";

/**
 * Index entry created once per provisioned Vault. Never reused or
 * mutated after creation.
 */
export interface VaultRecord {
  /** Monotonically increasing, starting at 0 */
  readonly index: number;
  readonly origin: AssetOriginId;
  readonly vaultAddress: AccountId;
}

/**
 * Read-only projection of a Vault's state.
 *
 * `reportedSupply` counts the deposited assets currently represented
 * (total supply / unit value, minus the seed unit).
 */
export interface PublicVaultInfo {
  readonly name: string;
  readonly symbol: string;
  readonly reportedSupply: string;
  readonly media: string;
}

/**
 * Arguments of a Vault's constructor and of Registry.createVault.
 */
export interface CreateVaultArgs {
  readonly name: string;
  readonly origin: AssetOriginId;
  readonly symbol: string;
  readonly media: string;
}

/**
 * Registry-gated parameter update for a Vault.
 */
export interface VaultParams {
  readonly name: string;
  readonly symbol: string;
  /** Share units one deposited asset is worth, in base units */
  readonly unitValue: string;
  readonly media: string;
}

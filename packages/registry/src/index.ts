/**
 * @shardvault/registry: Creates and indexes vaults.
 *
 * Subsystems:
 * - Provisioning: one vault per asset origin at a derived address
 * - Index: index → origin → vault address tables
 * - Info cache: public vault info keyed by index, with retries
 *
 * Design rules:
 * - Records are committed after the vault's init succeeds by default
 * - Only the owner may update vault parameters or the fee
 * - Snapshots carry an explicit schema version
 */

// Component
export {
  RegistryContract,
  VAULT_FUNDING,
  INFO_GAS,
  INFO_CALLBACK_GAS,
  PROVISION_CALLBACK_GAS,
  PARAMS_CALLBACK_GAS,
  INFO_ATTEMPT_GAS,
  SNAPSHOT_VERSION,
} from "./registry.js";
export { deriveVaultAddress } from "./address.js";
export { installShardvault, REGISTRY_CODE_ID, VAULT_CODE_ID } from "./install.js";
export type { InstallOptions } from "./install.js";

// Types
export type {
  RegistryErrorCode,
  CommitOrder,
  RegistryOptions,
  PendingProvision,
  ProvisioningFailure,
  InfoFailure,
  ParamsFailure,
  ProvisioningTicket,
  CachedVaultInfo,
  RegistrySnapshot,
} from "./types.js";
export { RegistryError } from "./types.js";

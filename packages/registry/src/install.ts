/**
 * @shardvault/registry: Bootstrap of a registry on a host.
 */

import type { Host } from "@shardvault/runtime";
import { ONE_UNIT } from "@shardvault/runtime";
import type { AccountId } from "@shardvault/types";
import { VaultContract } from "@shardvault/vault";
import type { VaultOptions } from "@shardvault/vault";
import { RegistryContract } from "./registry.js";
import type { RegistryOptions } from "./types.js";

export const REGISTRY_CODE_ID = "registry";
export const VAULT_CODE_ID = "vault";

export interface InstallOptions {
  readonly registryId: AccountId;
  /** Genesis balance of the registry account. Default: 1000 whole units */
  readonly initialBalance?: bigint;
  readonly registry?: Omit<RegistryOptions, "vaultCodeId">;
  /** Options every provisioned vault is constructed with */
  readonly vault?: VaultOptions;
}

/**
 * Register the vault and registry code with `host`, create the
 * registry account and deploy the registry on it.
 */
export function installShardvault(host: Host, options: InstallOptions): void {
  host.registerCode(VAULT_CODE_ID, () => new VaultContract(options.vault));
  host.registerCode(
    REGISTRY_CODE_ID,
    () => new RegistryContract({ ...options.registry, vaultCodeId: VAULT_CODE_ID }),
  );
  host.createAccount(options.registryId, options.initialBalance ?? 1000n * ONE_UNIT);
  host.genesisDeploy(options.registryId, REGISTRY_CODE_ID);
}

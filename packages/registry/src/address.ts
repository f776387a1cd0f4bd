/**
 * @shardvault/registry: Vault address derivation.
 */

import type { AccountId } from "@shardvault/types";
import { isValidAccountId } from "@shardvault/types";
import { RegistryError } from "./types.js";

/**
 * Address of the vault a registry provisions for `symbol`: a direct
 * sub-account of the registry, so addresses are namespaced per
 * registry. Dots in the symbol become dashes and the result is
 * lowercased.
 */
export function deriveVaultAddress(symbol: string, registryId: AccountId): AccountId {
  const prefix = symbol.replaceAll(".", "-");
  const address = `${prefix}.${registryId}`.toLowerCase();
  if (!isValidAccountId(address)) {
    throw new RegistryError(
      "INVALID_ACCOUNT_ID",
      `Symbol "${symbol}" does not yield a valid vault address`,
    );
  }
  return address;
}

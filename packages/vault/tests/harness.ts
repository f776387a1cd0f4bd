/**
 * Test harness: a host with an asset registry at "nft" and an
 * initialized vault at "vault" whose registry principal is "registry".
 */

import { Host, InMemoryAssetRegistry, ONE_UNIT } from "@shardvault/runtime";
import type { HostOptions } from "@shardvault/runtime";
import { VaultContract } from "../src/vault.js";
import type { VaultOptions } from "../src/types.js";

export const VAULT = "vault";
export const NFT = "nft";
export const REGISTRY = "registry";

export interface VaultHarness {
  readonly host: Host;
  vault(): VaultContract;
  nft(): InMemoryAssetRegistry;
  /** Mint tokens to `owner` and approve the vault to move them */
  mint(owner: string, tokenIds: readonly string[], approve?: boolean): void;
  balanceOf(accountId: string): bigint;
}

export function setupVault(options: VaultOptions = {}, hostOptions: HostOptions = {}): VaultHarness {
  const host = new Host(hostOptions);
  host.registerCode("vault", () => new VaultContract(options));
  host.registerCode("asset-registry", () => new InMemoryAssetRegistry());
  for (const id of ["alice", "bob", NFT, REGISTRY]) {
    host.createAccount(id, 100n * ONE_UNIT);
  }
  host.createAccount(VAULT, 25n * ONE_UNIT);
  host.genesisDeploy(NFT, "asset-registry");
  host.genesisDeploy(VAULT, "vault");
  host.transact(REGISTRY, VAULT, "init", {
    origin: NFT,
    name: "Punks Vault",
    symbol: "PUNK",
    media: "ipfs://punk",
  });

  const vault = () => host.componentAt(VAULT, VaultContract);
  return {
    host,
    vault,
    nft: () => host.componentAt(NFT, InMemoryAssetRegistry),
    mint(owner, tokenIds, approve = true) {
      for (const tokenId of tokenIds) {
        host.transact(NFT, NFT, "nft_mint", { tokenId, ownerId: owner });
        if (approve) {
          host.transact(owner, NFT, "nft_approve", { tokenId, accountId: VAULT });
        }
      }
    },
    balanceOf: (accountId) => vault().ledger.balanceOf(accountId),
  };
}

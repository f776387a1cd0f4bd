/**
 * Optimistic settlement: the ledger moves before the transfers land
 * and is never reconciled.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { UNIT_VALUE } from "../src/vault.js";
import { NFT, VAULT, setupVault } from "./harness.js";
import type { VaultHarness } from "./harness.js";

const UV = UNIT_VALUE;

describe("VaultContract (optimistic)", () => {
  let h: VaultHarness;

  const call = (signer: string, method: string, args: unknown = {}) =>
    h.host.transact(signer, VAULT, method, args);

  beforeEach(() => {
    h = setupVault({ settlement: "optimistic" });
    h.mint("alice", ["a"]);
  });

  it("credits shares before the transfer executes", () => {
    const { result } = call("alice", "deposit", { assetId: "a" });
    expect(result).toEqual({ status: "success", value: null });
    expect(h.balanceOf("alice")).toBe(UV);
    expect(h.vault().settlements.count).toBe(0);

    h.host.settle();
    expect(h.nft().ownerOf("a")).toBe(VAULT);
  });

  it("keeps the credit when the transfer fails", () => {
    h.nft().failNextTransfers(1);
    call("alice", "deposit", { assetId: "a" });
    h.host.settle();

    expect(h.nft().ownerOf("a")).toBe("alice");
    expect(h.balanceOf("alice")).toBe(UV);
    expect(h.host.view(VAULT, "getInfo")).toMatchObject({ reportedSupply: "1" });
    expect(h.host.view(NFT, "nft_tokens_for_owner", { accountId: VAULT })).toEqual([]);
  });

  it("burns shares at once on withdrawal, whatever the transfer does", () => {
    call("alice", "deposit", { assetId: "a" });
    h.host.settle();

    h.nft().failNextTransfers(1);
    const { transactionId } = call("alice", "withdraw", { assetId: "a" });
    expect(h.host.outcome(transactionId).receipts[0]?.logs).toEqual([
      `Account @alice burned ${UV.toString()}`,
    ]);
    expect(h.balanceOf("alice")).toBe(0n);

    h.host.settle();
    expect(h.nft().ownerOf("a")).toBe(VAULT);
    expect(h.vault().ledger.totalSupply).toBe(UV);
  });

  it("issues both swap transfers without a callback", () => {
    call("alice", "deposit", { assetId: "a" });
    h.host.settle();
    h.mint("alice", ["c"]);

    const { transactionId } = call("alice", "swap", { assetInId: "c", assetOutId: "a" });
    h.host.settle();

    expect(h.host.outcome(transactionId).receipts.map((r) => r.method)).toEqual([
      "swap",
      "nft_transfer",
      "nft_transfer",
    ]);
    expect(h.nft().ownerOf("c")).toBe(VAULT);
    expect(h.nft().ownerOf("a")).toBe("alice");
  });
});

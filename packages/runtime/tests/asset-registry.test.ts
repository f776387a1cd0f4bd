/**
 * Tests for InMemoryAssetRegistry, driven through the host.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { Host } from "../src/host.js";
import { InMemoryAssetRegistry } from "../src/asset-registry.js";
import { ONE_UNIT } from "../src/types.js";

describe("InMemoryAssetRegistry", () => {
  let host: Host;

  const registry = () => host.componentAt("nft", InMemoryAssetRegistry);
  const transfer = (signer: string, args: Record<string, unknown>, deposit = 1n) =>
    host.transact(signer, "nft", "nft_transfer", args, { deposit }).result;

  beforeEach(() => {
    host = new Host();
    host.registerCode("asset-registry", () => new InMemoryAssetRegistry({ minters: ["minter"] }));
    for (const id of ["nft", "minter", "alice", "bob", "keeper"]) {
      host.createAccount(id, 10n * ONE_UNIT);
    }
    host.genesisDeploy("nft", "asset-registry");
    host.transact("nft", "nft", "nft_mint", { tokenId: "t1", ownerId: "alice" });
  });

  describe("nft_mint", () => {
    it("mints from the registry itself or a configured minter", () => {
      const { result } = host.transact("minter", "nft", "nft_mint", {
        tokenId: "t2",
        ownerId: "bob",
      });
      expect(result).toEqual({
        status: "success",
        value: { tokenId: "t2", ownerId: "bob", approvedAccountIds: {} },
      });
      expect(host.view("nft", "nft_total_supply")).toBe("2");
    });

    it("rejects other minters and duplicate tokens", () => {
      expect(
        host.transact("alice", "nft", "nft_mint", { tokenId: "t2", ownerId: "alice" }).result,
      ).toMatchObject({ status: "failed", code: "UNAUTHORIZED" });
      expect(
        host.transact("nft", "nft", "nft_mint", { tokenId: "t1", ownerId: "bob" }).result,
      ).toMatchObject({ status: "failed", code: "TOKEN_EXISTS" });
    });

    it("rejects malformed arguments", () => {
      expect(host.transact("nft", "nft", "nft_mint", { tokenId: "t2" }).result).toMatchObject({
        status: "failed",
        code: "INVALID_ARGUMENTS",
      });
    });
  });

  describe("nft_transfer", () => {
    it("moves a token the predecessor owns", () => {
      expect(transfer("alice", { receiverId: "bob", tokenId: "t1", memo: "gift" })).toEqual({
        status: "success",
        value: null,
      });
      expect(registry().ownerOf("t1")).toBe("bob");
      expect(host.view("nft", "nft_tokens_for_owner", { accountId: "bob" })).toEqual([
        { tokenId: "t1", ownerId: "bob", approvedAccountIds: {} },
      ]);
    });

    it("requires exactly one yocto attached", () => {
      expect(transfer("alice", { receiverId: "bob", tokenId: "t1" }, 0n)).toMatchObject({
        code: "INVALID_DEPOSIT",
      });
      expect(transfer("alice", { receiverId: "bob", tokenId: "t1" }, 2n)).toMatchObject({
        code: "INVALID_DEPOSIT",
      });
      expect(registry().ownerOf("t1")).toBe("alice");
    });

    it("rejects a sender that is neither owner nor approved", () => {
      expect(transfer("bob", { receiverId: "bob", tokenId: "t1" })).toMatchObject({
        code: "UNAUTHORIZED",
      });
    });

    it("rejects sending a token to its owner", () => {
      expect(transfer("alice", { receiverId: "alice", tokenId: "t1" })).toMatchObject({
        code: "SELF_TRANSFER",
      });
    });

    it("rejects unknown tokens", () => {
      expect(transfer("alice", { receiverId: "bob", tokenId: "t9" })).toMatchObject({
        code: "TOKEN_NOT_FOUND",
      });
    });
  });

  describe("approvals", () => {
    it("lets an approved account move the token and clears approvals", () => {
      const approval = host.transact("alice", "nft", "nft_approve", {
        tokenId: "t1",
        accountId: "keeper",
      }).result;
      expect(approval).toEqual({ status: "success", value: 0 });
      expect(host.view("nft", "nft_token", { tokenId: "t1" })).toEqual({
        tokenId: "t1",
        ownerId: "alice",
        approvedAccountIds: { keeper: 0 },
      });

      expect(transfer("keeper", { receiverId: "bob", tokenId: "t1", approvalId: 0 })).toEqual({
        status: "success",
        value: null,
      });
      expect(host.view("nft", "nft_token", { tokenId: "t1" })).toEqual({
        tokenId: "t1",
        ownerId: "bob",
        approvedAccountIds: {},
      });
    });

    it("moves an approved token only from the named sender", () => {
      host.transact("alice", "nft", "nft_approve", { tokenId: "t1", accountId: "keeper" });

      expect(transfer("keeper", { receiverId: "keeper", tokenId: "t1", senderId: "bob" })).toEqual({
        status: "failed",
        reason: 'Token "t1" belongs to @alice, not @bob',
        code: "OWNER_MISMATCH",
      });
      expect(registry().ownerOf("t1")).toBe("alice");

      expect(
        transfer("keeper", { receiverId: "keeper", tokenId: "t1", senderId: "alice" }),
      ).toEqual({ status: "success", value: null });
      expect(registry().ownerOf("t1")).toBe("keeper");
    });

    it("rejects a mismatched approval id", () => {
      host.transact("alice", "nft", "nft_approve", { tokenId: "t1", accountId: "keeper" });
      expect(transfer("keeper", { receiverId: "bob", tokenId: "t1", approvalId: 5 })).toMatchObject(
        { code: "APPROVAL_MISMATCH" },
      );
    });

    it("only lets the owner approve", () => {
      expect(
        host.transact("bob", "nft", "nft_approve", { tokenId: "t1", accountId: "bob" }).result,
      ).toMatchObject({ status: "failed", code: "UNAUTHORIZED" });
    });
  });

  describe("failNextTransfers", () => {
    it("fails the next transfers and keeps counting across rollbacks", () => {
      registry().failNextTransfers(1);

      expect(transfer("alice", { receiverId: "bob", tokenId: "t1" })).toMatchObject({
        status: "failed",
        code: "FORCED_FAILURE",
      });
      expect(registry().ownerOf("t1")).toBe("alice");

      expect(transfer("alice", { receiverId: "bob", tokenId: "t1" })).toEqual({
        status: "success",
        value: null,
      });
      expect(registry().ownerOf("t1")).toBe("bob");
    });
  });

  it("returns null for an unknown token", () => {
    expect(host.view("nft", "nft_token", { tokenId: "missing" })).toBeNull();
  });
});

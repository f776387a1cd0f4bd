/**
 * Runtime type guard tests for @shardvault/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject malformed results of remote steps.
 */
import { describe, it, expect } from "vitest";
import {
  isU128String,
  isPublicVaultInfo,
  isVaultRecord,
  isVaultParams,
  isCreateVaultArgs,
} from "../src/guards.js";
import { isValidAccountId, isSubAccountOf } from "../src/account.js";

// =============================================================================
// Account ids
// =============================================================================

describe("isValidAccountId", () => {
  it("accepts top-level and nested names", () => {
    expect(isValidAccountId("alice")).toBe(true);
    expect(isValidAccountId("yti.registry.sandbox")).toBe(true);
    expect(isValidAccountId("nft-collection_2.sandbox")).toBe(true);
  });

  it("rejects uppercase, empty parts and separators at the edges", () => {
    expect(isValidAccountId("Alice")).toBe(false);
    expect(isValidAccountId("a..b")).toBe(false);
    expect(isValidAccountId("-alice")).toBe(false);
    expect(isValidAccountId("alice.")).toBe(false);
    expect(isValidAccountId("a--b")).toBe(false);
  });

  it("enforces the length bounds", () => {
    expect(isValidAccountId("a")).toBe(false);
    expect(isValidAccountId("ab")).toBe(true);
    expect(isValidAccountId("a".repeat(64))).toBe(true);
    expect(isValidAccountId("a".repeat(65))).toBe(false);
  });

  it("rejects non-strings", () => {
    expect(isValidAccountId(42)).toBe(false);
    expect(isValidAccountId(null)).toBe(false);
  });
});

describe("isSubAccountOf", () => {
  it("accepts a direct child", () => {
    expect(isSubAccountOf("yti.registry", "registry")).toBe(true);
  });

  it("rejects grandchildren and unrelated names", () => {
    expect(isSubAccountOf("a.yti.registry", "registry")).toBe(false);
    expect(isSubAccountOf("yti-registry", "registry")).toBe(false);
    expect(isSubAccountOf("registry", "registry")).toBe(false);
  });
});

// =============================================================================
// Quantities
// =============================================================================

describe("isU128String", () => {
  it("accepts zero and the u128 maximum", () => {
    expect(isU128String("0")).toBe(true);
    expect(isU128String(((1n << 128n) - 1n).toString())).toBe(true);
  });

  it("rejects values past u128, decimals and signs", () => {
    expect(isU128String((1n << 128n).toString())).toBe(false);
    expect(isU128String("1.5")).toBe(false);
    expect(isU128String("-1")).toBe(false);
    expect(isU128String("")).toBe(false);
  });

  it("rejects numbers (must be string)", () => {
    expect(isU128String(100)).toBe(false);
  });
});

// =============================================================================
// Vault projections
// =============================================================================

describe("isPublicVaultInfo", () => {
  const valid = {
    name: "Yeti",
    symbol: "YTI",
    reportedSupply: "3",
    media: "https://example.test/yeti.png",
  };

  it("accepts a well-formed projection", () => {
    expect(isPublicVaultInfo(valid)).toBe(true);
  });

  it("rejects a numeric supply", () => {
    expect(isPublicVaultInfo({ ...valid, reportedSupply: 3 })).toBe(false);
  });

  it("rejects missing media", () => {
    const { media: _media, ...rest } = valid;
    expect(isPublicVaultInfo(rest)).toBe(false);
  });

  it("rejects null and primitives", () => {
    expect(isPublicVaultInfo(null)).toBe(false);
    expect(isPublicVaultInfo("info")).toBe(false);
  });
});

describe("isVaultRecord", () => {
  it("accepts a record with a valid index and accounts", () => {
    expect(
      isVaultRecord({ index: 0, origin: "nft.sandbox", vaultAddress: "yti.registry" }),
    ).toBe(true);
  });

  it("rejects negative or fractional indexes", () => {
    expect(
      isVaultRecord({ index: -1, origin: "nft.sandbox", vaultAddress: "yti.registry" }),
    ).toBe(false);
    expect(
      isVaultRecord({ index: 1.5, origin: "nft.sandbox", vaultAddress: "yti.registry" }),
    ).toBe(false);
  });
});

describe("isVaultParams", () => {
  it("accepts params with a u128 unit value", () => {
    expect(
      isVaultParams({ name: "Yeti", symbol: "YTI", unitValue: "100", media: "" }),
    ).toBe(true);
  });

  it("rejects a non-numeric unit value", () => {
    expect(
      isVaultParams({ name: "Yeti", symbol: "YTI", unitValue: "lots", media: "" }),
    ).toBe(false);
  });
});

describe("isCreateVaultArgs", () => {
  it("requires a valid origin account and a symbol", () => {
    expect(
      isCreateVaultArgs({ name: "Yeti", origin: "nft.sandbox", symbol: "YTI", media: "" }),
    ).toBe(true);
    expect(
      isCreateVaultArgs({ name: "Yeti", origin: "NFT", symbol: "YTI", media: "" }),
    ).toBe(false);
    expect(
      isCreateVaultArgs({ name: "Yeti", origin: "nft.sandbox", symbol: "", media: "" }),
    ).toBe(false);
  });
});

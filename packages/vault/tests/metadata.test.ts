import { describe, it, expect } from "vitest";
import { FT_METADATA_SPEC, assertValidMetadata, buildMetadata } from "../src/metadata.js";
import { VaultError } from "../src/types.js";

describe("share metadata", () => {
  it("passes media through as the icon", () => {
    expect(buildMetadata("Punks Vault", "PUNK", "data:image/svg+xml,<svg/>")).toEqual({
      spec: FT_METADATA_SPEC,
      name: "Punks Vault",
      symbol: "PUNK",
      icon: "data:image/svg+xml,<svg/>",
      reference: null,
      referenceHash: null,
      decimals: 24,
    });
  });

  it("accepts a reference with a 32-byte hash", () => {
    const metadata = {
      ...buildMetadata("v", "V", ""),
      reference: "ipfs://doc",
      referenceHash: Buffer.alloc(32, 7).toString("base64"),
    };
    expect(() => assertValidMetadata(metadata)).not.toThrow();
  });

  it("rejects a reference without a hash", () => {
    const metadata = { ...buildMetadata("v", "V", ""), reference: "ipfs://doc" };
    expect(() => assertValidMetadata(metadata)).toThrow(
      "Reference and reference hash must be present together",
    );
  });

  it("rejects a hash of the wrong length", () => {
    const metadata = {
      ...buildMetadata("v", "V", ""),
      reference: "ipfs://doc",
      referenceHash: Buffer.alloc(16).toString("base64"),
    };
    expect(() => assertValidMetadata(metadata)).toThrow(VaultError);
  });

  it("rejects another metadata standard", () => {
    const metadata = { ...buildMetadata("v", "V", ""), spec: "ft-1.0.0" };
    expect(() => assertValidMetadata(metadata)).toThrow(`Metadata spec must be "${FT_METADATA_SPEC}"`);
  });
});

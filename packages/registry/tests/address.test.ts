import { describe, it, expect } from "vitest";
import { deriveVaultAddress } from "../src/address.js";
import { RegistryError } from "../src/types.js";

describe("deriveVaultAddress", () => {
  it("namespaces the lowercased symbol under the registry", () => {
    expect(deriveVaultAddress("PUNK", "registry")).toBe("punk.registry");
  });

  it("turns dots in the symbol into dashes", () => {
    expect(deriveVaultAddress("my.coin", "reg.sandbox")).toBe("my-coin.reg.sandbox");
  });

  it("rejects symbols that do not yield an account id", () => {
    try {
      deriveVaultAddress("Bad Symbol!", "registry");
      expect.fail("should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(RegistryError);
      expect((err as RegistryError).code).toBe("INVALID_ACCOUNT_ID");
    }
  });
});

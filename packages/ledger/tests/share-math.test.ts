/**
 * Tests for checked share arithmetic.
 */

import { describe, it, expect } from "vitest";
import {
  U128_MAX,
  ONE_SHARE,
  checkedAdd,
  checkedSub,
  checkedMul,
  checkedDiv,
  parseU128,
  parseShares,
  formatShares,
} from "../src/share-math.js";
import { LedgerError } from "../src/types.js";

describe("checked arithmetic", () => {
  it("adds within range", () => {
    expect(checkedAdd(2n, 3n)).toBe(5n);
  });

  it("rejects addition past u128", () => {
    expect(() => checkedAdd(U128_MAX, 1n)).toThrow(LedgerError);
    try {
      checkedAdd(U128_MAX, 1n);
    } catch (err) {
      expect((err as LedgerError).code).toBe("ARITHMETIC_OVERFLOW");
    }
  });

  it("rejects subtraction below zero instead of wrapping", () => {
    try {
      checkedSub(1n, 2n);
      expect.fail("should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(LedgerError);
      expect((err as LedgerError).code).toBe("ARITHMETIC_UNDERFLOW");
    }
  });

  it("multiplies and detects overflow", () => {
    expect(checkedMul(3n, 100n)).toBe(300n);
    expect(() => checkedMul(U128_MAX, 2n)).toThrow("overflows u128");
  });

  it("divides truncating toward zero", () => {
    expect(checkedDiv(7n, 2n)).toBe(3n);
  });

  it("rejects division by zero", () => {
    expect(() => checkedDiv(1n, 0n)).toThrow("Division by zero");
  });
});

describe("parseU128", () => {
  it("parses base-unit strings", () => {
    expect(parseU128("1000")).toBe(1000n);
    expect(parseU128(" 42 ")).toBe(42n);
  });

  it("rejects fractions, signs and values past u128", () => {
    expect(() => parseU128("1.5")).toThrow(LedgerError);
    expect(() => parseU128("-1")).toThrow(LedgerError);
    expect(() => parseU128((U128_MAX + 1n).toString())).toThrow("overflows u128");
  });
});

describe("parseShares / formatShares", () => {
  it("scales whole shares to base units", () => {
    expect(parseShares("1")).toBe(ONE_SHARE);
    expect(parseShares("1.5")).toBe(1_500_000_000_000_000_000_000_000n);
    expect(parseShares("100")).toBe(100n * ONE_SHARE);
  });

  it("rejects more decimal places than a share has", () => {
    expect(() => parseShares("0." + "1".repeat(25))).toThrow("decimal places");
  });

  it("formats base units as whole shares", () => {
    expect(formatShares(1_500_000_000_000_000_000_000_000n)).toBe(
      "1.500000000000000000000000",
    );
    expect(formatShares(1n)).toBe("0.000000000000000000000001");
    expect(formatShares(0n)).toBe("0.000000000000000000000000");
  });

  it("parses what it formats", () => {
    const units = 123_456_789n * ONE_SHARE + 42n;
    expect(parseShares(formatShares(units))).toBe(units);
  });
});

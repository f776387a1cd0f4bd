/**
 * Tests for index-cursor pagination.
 */

import { describe, it, expect } from "vitest";
import { decodeCursor, encodeCursor, paginate } from "../src/types/pagination.js";

const items = Array.from({ length: 12 }, (_, index) => ({ index }));
const indexOf = (item: { index: number }) => item.index;

describe("cursor encoding", () => {
  it("decodes a cursor of the same list", () => {
    expect(decodeCursor(encodeCursor("vaults", 7), "vaults")).toBe(7);
  });

  it("rejects a cursor of another list", () => {
    expect(decodeCursor(encodeCursor("audit", 7), "vaults")).toBeUndefined();
  });

  it("rejects garbage", () => {
    expect(decodeCursor("not-base64-json", "vaults")).toBeUndefined();
  });
});

describe("paginate", () => {
  it("returns the first page with a cursor", () => {
    const page = paginate(items, { limit: 5 }, indexOf, "vaults");

    expect(page.data.map(indexOf)).toEqual([0, 1, 2, 3, 4]);
    expect(page.pagination.hasMore).toBe(true);
    expect(page.pagination.cursor).toBe(encodeCursor("vaults", 4));
  });

  it("continues after the cursor", () => {
    const page = paginate(items, { limit: 5, cursor: encodeCursor("vaults", 9) }, indexOf, "vaults");

    expect(page.data.map(indexOf)).toEqual([10, 11]);
    expect(page.pagination).toEqual({ cursor: null, hasMore: false });
  });

  it("orders by index, not by string value", () => {
    const page = paginate(items, { limit: 3, cursor: encodeCursor("vaults", 1) }, indexOf, "vaults");

    expect(page.data.map(indexOf)).toEqual([2, 3, 4]);
  });

  it("starts over on an invalid cursor", () => {
    const page = paginate(items, { limit: 2, cursor: "bogus" }, indexOf, "vaults");

    expect(page.data.map(indexOf)).toEqual([0, 1]);
  });
});

/**
 * Tests for block-based retry backoff.
 */

import { describe, it, expect } from "vitest";
import { computeDelay, canRetry, DEFAULT_RETRY_CONFIG } from "../src/retry.js";
import type { RetryConfig } from "../src/retry.js";

const config: RetryConfig = {
  maxAttempts: 4,
  baseDelayBlocks: 1,
  maxDelayBlocks: 16,
  jitterBlocks: 0,
};

describe("computeDelay", () => {
  it("doubles per attempt", () => {
    expect([0, 1, 2, 3].map((attempt) => computeDelay(attempt, config))).toEqual([1, 2, 4, 8]);
  });

  it("caps at maxDelayBlocks", () => {
    expect(computeDelay(5, config)).toBe(16);
    expect(computeDelay(10, config)).toBe(16);
  });

  it("adds whole blocks of jitter up to jitterBlocks", () => {
    const jittery: RetryConfig = { ...config, jitterBlocks: 2 };
    expect(computeDelay(0, jittery, () => 0)).toBe(1);
    expect(computeDelay(0, jittery, () => 0.99)).toBe(3);
  });
});

describe("canRetry", () => {
  it("allows attempts up to maxAttempts", () => {
    expect(canRetry(1, DEFAULT_RETRY_CONFIG)).toBe(true);
    expect(canRetry(2, DEFAULT_RETRY_CONFIG)).toBe(true);
    expect(canRetry(3, DEFAULT_RETRY_CONFIG)).toBe(false);
  });
});

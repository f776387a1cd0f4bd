/**
 * @shardvault/runtime: Delivery policies.
 *
 * Receipts that become ready in the same block may execute in any
 * order. The host asks its DeliveryPolicy for that order; shuffled
 * delivery makes the arbitrariness explicit and reproducible.
 */

import type { DeliveryPolicy } from "./types.js";

/**
 * Ready receipts execute in the order they were issued.
 */
export const fifoDelivery: DeliveryPolicy = {
  order<T>(items: readonly T[]): T[] {
    return [...items];
  },
};

/**
 * Deterministic 32-bit PRNG (mulberry32). Returns floats in [0, 1).
 */
export function mulberry32(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Ready receipts execute in a seeded random order (Fisher–Yates).
 * The same seed replays the same interleaving.
 */
export function shuffledDelivery(seed: number): DeliveryPolicy {
  const random = mulberry32(seed);
  return {
    order<T>(items: readonly T[]): T[] {
      const out = [...items];
      for (let i = out.length - 1; i > 0; i--) {
        const j = Math.floor(random() * (i + 1));
        const a = out[i];
        const b = out[j];
        if (a === undefined || b === undefined) continue;
        out[i] = b;
        out[j] = a;
      }
      return out;
    },
  };
}

/**
 * Test helpers for @shardvault/node.
 *
 * Provides a test app factory that creates a Hono app with
 * all middleware and routes, but no HTTP server.
 */

import { ONE_UNIT } from "@shardvault/runtime";
import { createApp } from "../src/app.js";
import type { AppInstance } from "../src/app.js";
import type { SandboxOptions } from "../src/services/sandbox-service.js";

export const REGISTRY = "registry.test";
export const ADMIN = "admin.test";
export const PUNKS = "punks";
export const PUNK_VAULT = "punk.registry.test";
export const FIXED_NOW = new Date("2026-01-15T12:00:00.000Z");

export const DEFAULT_SANDBOX: SandboxOptions = {
  registryId: REGISTRY,
  ownerId: ADMIN,
  registryBalance: 1000n * ONE_UNIT,
  bootstrapBalance: 100n * ONE_UNIT,
  settlement: "confirmed",
  commitOrder: "confirmed",
  resumption: "propagate",
  infoRetryAttempts: 3,
  delivery: "fifo",
  deliverySeed: 1,
};

/**
 * Create a test app over a fresh sandbox. Audit timestamps use
 * FIXED_NOW.
 */
export function createTestApp(overrides: Partial<SandboxOptions> = {}): AppInstance {
  return createApp({
    sandbox: { ...DEFAULT_SANDBOX, ...overrides },
    now: () => FIXED_NOW,
  });
}

/**
 * JSON request helper. `principal` becomes the X-Account-Id header.
 */
export function jsonRequest(
  path: string,
  method: string = "GET",
  body?: unknown,
  principal?: string,
  headers?: Record<string, string>,
): Request {
  const init: RequestInit = {
    method,
    headers: {
      "Content-Type": "application/json",
      ...(principal === undefined ? {} : { "X-Account-Id": principal }),
      ...headers,
    },
  };

  if (body !== undefined) {
    init.body = JSON.stringify(body);
  }

  return new Request(`http://localhost${path}`, init);
}

export interface Envelope<T> {
  readonly data: T;
}

export interface ErrorBody {
  readonly error: {
    readonly code: string;
    readonly message: string;
    readonly details?: Record<string, unknown>;
  };
}

export async function readJson<T>(res: Response): Promise<T> {
  return (await res.json()) as T;
}

/**
 * Mint `tokenIds` of PUNKS to `owner` and provision the PUNK vault,
 * settling the host afterwards.
 */
export async function seedPunkVault(
  app: AppInstance["app"],
  owner: string,
  tokenIds: readonly string[],
): Promise<void> {
  for (const tokenId of tokenIds) {
    await app.request(
      jsonRequest(`/api/v1/assets/${PUNKS}/tokens`, "POST", { tokenId, ownerId: owner }, owner),
    );
  }
  await app.request(
    jsonRequest(
      "/api/v1/vaults",
      "POST",
      { origin: PUNKS, name: "Punks Vault", symbol: "PUNK", media: "ipfs://punk" },
      owner,
    ),
  );
  await app.request(jsonRequest("/api/v1/host/settle", "POST", {}, owner));
}

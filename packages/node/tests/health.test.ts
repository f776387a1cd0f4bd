/**
 * Tests for health check endpoints.
 *
 * Verifies:
 * - GET /health reports the host's block height and queue
 * - GET /ready is 503 while receipts wait for delivery
 * - X-Request-Id is generated, propagated or replaced
 */

import { describe, it, expect } from "vitest";
import { PUNKS, createTestApp, jsonRequest, readJson } from "./setup.js";

describe("GET /health", () => {
  it("returns 200 with the host's block height", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.status).toBe(200);
    const body = await readJson<{ status: string; blockHeight: number; queuedReceipts: number }>(res);
    expect(body.status).toBe("ok");
    expect(body.blockHeight).toBe(0);
    expect(body.queuedReceipts).toBe(0);
  });

  it("generates an X-Request-Id", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.headers.get("X-Request-Id")).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("preserves a well-formed incoming X-Request-Id", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/health", "GET", undefined, undefined, { "X-Request-Id": "test-req-123" }),
    );

    expect(res.headers.get("X-Request-Id")).toBe("test-req-123");
  });

  it("replaces a malformed incoming X-Request-Id", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/health", "GET", undefined, undefined, { "X-Request-Id": "not allowed!" }),
    );

    expect(res.headers.get("X-Request-Id")).not.toBe("not allowed!");
    expect(res.headers.get("X-Request-Id")).toMatch(/^[0-9a-f-]{36}$/);
  });
});

describe("GET /ready", () => {
  it("is ready when the registry is deployed and nothing is queued", async () => {
    const { app } = createTestApp();
    const res = await app.request("/ready");

    expect(res.status).toBe(200);
    const body = await readJson<{ status: string; subsystems: Record<string, string> }>(res);
    expect(body.status).toBe("ready");
    expect(body.subsystems).toEqual({ registry: "ok", delivery: "ok" });
  });

  it("is not ready while provisioning receipts are queued", async () => {
    const { app } = createTestApp();
    await app.request(
      jsonRequest(
        "/api/v1/vaults",
        "POST",
        { origin: PUNKS, name: "Punks Vault", symbol: "PUNK", media: "" },
        "alice",
      ),
    );

    const res = await app.request("/ready");
    expect(res.status).toBe(503);
    const body = await readJson<{ status: string; queuedReceipts: number; subsystems: Record<string, string> }>(res);
    expect(body.status).toBe("not_ready");
    expect(body.queuedReceipts).toBe(2);
    expect(body.subsystems).toEqual({ registry: "ok", delivery: "pending" });
  });
});

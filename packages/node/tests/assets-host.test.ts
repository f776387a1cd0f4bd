/**
 * Tests for asset registry and host routes.
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { AppInstance } from "../src/app.js";
import type { OutcomeView, SubmittedTransaction } from "../src/services/sandbox-service.js";
import { PUNKS, createTestApp, jsonRequest, readJson } from "./setup.js";
import type { Envelope, ErrorBody } from "./setup.js";

describe("asset routes", () => {
  let app: AppInstance["app"];

  const post = (path: string, body: unknown, principal = "alice") =>
    app.request(jsonRequest(path, "POST", body, principal));

  beforeEach(() => {
    app = createTestApp().app;
  });

  it("deploys an asset registry on first mint", async () => {
    const res = await post(`/api/v1/assets/${PUNKS}/tokens`, { tokenId: "t1", ownerId: "alice" });

    expect(res.status).toBe(200);
    const tx = (await readJson<Envelope<SubmittedTransaction>>(res)).data;
    expect(tx.value).toEqual({ tokenId: "t1", ownerId: "alice", approvedAccountIds: {} });
    expect(tx.outcome.receipts[0]?.logs).toEqual(["Minted t1 to @alice"]);
  });

  it("lists the tokens an account holds", async () => {
    await post(`/api/v1/assets/${PUNKS}/tokens`, { tokenId: "t1", ownerId: "alice" });
    await post(`/api/v1/assets/${PUNKS}/tokens`, { tokenId: "t2", ownerId: "bob" });

    const res = await app.request(`/api/v1/assets/${PUNKS}/tokens?owner=alice`);
    const body = await readJson<Envelope<{ tokenId: string }[]>>(res);
    expect(body.data.map((t) => t.tokenId)).toEqual(["t1"]);
  });

  it("records approvals", async () => {
    await post(`/api/v1/assets/${PUNKS}/tokens`, { tokenId: "t1", ownerId: "alice" });

    const res = await post(`/api/v1/assets/${PUNKS}/tokens/t1/approve`, { accountId: "bob" });
    expect((await readJson<Envelope<SubmittedTransaction>>(res)).data.value).toBe(0);

    const token = await readJson<Envelope<{ approvedAccountIds: Record<string, number> }>>(
      await app.request(`/api/v1/assets/${PUNKS}/tokens/t1`),
    );
    expect(token.data.approvedAccountIds).toEqual({ bob: 0 });
  });

  it("rejects a duplicate token", async () => {
    await post(`/api/v1/assets/${PUNKS}/tokens`, { tokenId: "t1", ownerId: "alice" });

    const res = await post(`/api/v1/assets/${PUNKS}/tokens`, { tokenId: "t1", ownerId: "bob" });
    expect(res.status).toBe(409);
    expect((await readJson<ErrorBody>(res)).error.code).toBe("TOKEN_EXISTS");
  });

  it("refuses to mint on an account that is not an asset registry", async () => {
    const res = await post("/api/v1/assets/admin.test/tokens", { tokenId: "t1", ownerId: "alice" });

    expect(res.status).toBe(409);
    expect((await readJson<ErrorBody>(res)).error.code).toBe("NOT_AN_ASSET_REGISTRY");
  });

  it("returns 404 for an unknown registry or token", async () => {
    const missingRegistry = await app.request("/api/v1/assets/apes/tokens/t1");
    expect(missingRegistry.status).toBe(404);
    expect((await readJson<ErrorBody>(missingRegistry)).error.code).toBe("ASSET_REGISTRY_NOT_FOUND");

    await post(`/api/v1/assets/${PUNKS}/tokens`, { tokenId: "t1", ownerId: "alice" });
    const missingToken = await app.request(`/api/v1/assets/${PUNKS}/tokens/t9`);
    expect(missingToken.status).toBe(404);
    expect((await readJson<ErrorBody>(missingToken)).error.code).toBe("TOKEN_NOT_FOUND");
  });
});

describe("host routes", () => {
  it("reports a transaction's outcome with gas as a string", async () => {
    const { app } = createTestApp();
    const minted = await app.request(
      jsonRequest(`/api/v1/assets/${PUNKS}/tokens`, "POST", { tokenId: "t1", ownerId: "alice" }, "alice"),
    );
    const { transactionId } = (await readJson<Envelope<SubmittedTransaction>>(minted)).data;

    const res = await app.request(`/api/v1/transactions/${transactionId}`);
    const outcome = (await readJson<Envelope<OutcomeView>>(res)).data;
    expect(outcome.status).toBe("success");
    expect(outcome.receipts).toHaveLength(1);
    expect(outcome.receipts[0]?.gasBurnt).toBe("1000000000000");
  });

  it("returns 404 for an unknown transaction", async () => {
    const { app } = createTestApp();
    const res = await app.request("/api/v1/transactions/nope");

    expect(res.status).toBe(404);
    expect((await readJson<ErrorBody>(res)).error.code).toBe("TRANSACTION_NOT_FOUND");
  });

  it("reports native balances", async () => {
    const { app } = createTestApp();
    const res = await app.request("/api/v1/host/accounts/admin.test");

    expect((await readJson<Envelope<{ balance: string }>>(res)).data.balance).toBe(
      (100n * 10n ** 24n).toString(),
    );
  });

  it("audits settle calls", async () => {
    const { app, auditLog } = createTestApp();
    await app.request(jsonRequest("/api/v1/host/settle", "POST", {}, "alice"));

    expect(auditLog.query()).toEqual([
      {
        seq: 0,
        timestamp: "2026-01-15T12:00:00.000Z",
        actor: "alice",
        action: "settle",
        resourceType: "host",
        resourceId: "0",
        detail: "0 receipts in 0 rounds",
      },
    ]);
  });

  it("settles after every transaction when auto-settle is on", async () => {
    const { app } = createTestApp({ autoSettle: true });
    const res = await app.request(
      jsonRequest(
        "/api/v1/vaults",
        "POST",
        { origin: PUNKS, name: "Punks Vault", symbol: "PUNK", media: "" },
        "alice",
      ),
    );

    expect(res.status).toBe(200);
    expect((await readJson<Envelope<SubmittedTransaction>>(res)).data.outcome.status).toBe("success");
  });
});

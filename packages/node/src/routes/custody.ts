/**
 * Vault custody routes.
 *
 * GET    /api/v1/custody/:vaultId/info                 : Info, params, metadata, supply
 * GET    /api/v1/custody/:vaultId/balance/:accountId   : Share and storage balance
 * GET    /api/v1/custody/:vaultId/settlements          : Settlement intents (?status=)
 * GET    /api/v1/custody/:vaultId/settlements/:id      : One settlement intent
 * POST   /api/v1/custody/:vaultId/deposit              : Lock assets, issue shares
 * POST   /api/v1/custody/:vaultId/withdraw             : Burn shares, release assets
 * POST   /api/v1/custody/:vaultId/swap                 : Exchange one asset for another
 * POST   /api/v1/custody/:vaultId/storage              : Register with the share ledger
 * POST   /api/v1/custody/:vaultId/transfer             : Move shares between accounts
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  DepositSchema,
  ListSettlementsQuerySchema,
  RegisterStorageSchema,
  SwapSchema,
  TransferSharesSchema,
  WithdrawSchema,
} from "../types/dto.js";
import { bodyOf, parseQuery, validateBody } from "../middleware/validate.js";
import { requirePrincipal } from "../middleware/principal.js";
import { respondWithTransaction } from "./respond.js";
import { accountParam } from "./params.js";

export function createCustodyRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:vaultId/info", (c) => {
    return c.json({ data: c.get("service").vaultInfo(accountParam(c, "vaultId")) });
  });

  routes.get("/:vaultId/balance/:accountId", (c) => {
    const vaultId = accountParam(c, "vaultId");
    const accountId = accountParam(c, "accountId");
    return c.json({ data: c.get("service").vaultBalance(vaultId, accountId) });
  });

  routes.get("/:vaultId/settlements", (c) => {
    const query = parseQuery(c, ListSettlementsQuerySchema);
    if (!query.ok) return query.response;
    const vaultId = accountParam(c, "vaultId");
    return c.json({ data: c.get("service").listSettlements(vaultId, query.value.status) });
  });

  routes.get("/:vaultId/settlements/:id", (c) => {
    const vaultId = accountParam(c, "vaultId");
    return c.json({ data: c.get("service").getSettlement(vaultId, c.req.param("id")) });
  });

  routes.post("/:vaultId/deposit", validateBody(DepositSchema), (c) => {
    const principal = requirePrincipal(c);
    const vaultId = accountParam(c, "vaultId");
    const { assetIds } = bodyOf(c, DepositSchema);
    const tx = c.get("service").deposit(principal, vaultId, assetIds);
    return respondWithTransaction(c, principal, tx, {
      action: "deposit",
      resourceType: "custody",
      resourceId: vaultId,
      detail: assetIds.join(","),
    });
  });

  routes.post("/:vaultId/withdraw", validateBody(WithdrawSchema), (c) => {
    const principal = requirePrincipal(c);
    const vaultId = accountParam(c, "vaultId");
    const { assetIds, receiverId } = bodyOf(c, WithdrawSchema);
    const tx = c.get("service").withdraw(principal, vaultId, assetIds, receiverId);
    return respondWithTransaction(c, principal, tx, {
      action: "withdraw",
      resourceType: "custody",
      resourceId: vaultId,
      detail: assetIds.join(","),
    });
  });

  routes.post("/:vaultId/swap", validateBody(SwapSchema), (c) => {
    const principal = requirePrincipal(c);
    const vaultId = accountParam(c, "vaultId");
    const { assetInId, assetOutId } = bodyOf(c, SwapSchema);
    const tx = c.get("service").swap(principal, vaultId, assetInId, assetOutId);
    return respondWithTransaction(c, principal, tx, {
      action: "swap",
      resourceType: "custody",
      resourceId: vaultId,
      detail: `${assetInId}->${assetOutId}`,
    });
  });

  routes.post("/:vaultId/storage", validateBody(RegisterStorageSchema), (c) => {
    const principal = requirePrincipal(c);
    const vaultId = accountParam(c, "vaultId");
    const { accountId } = bodyOf(c, RegisterStorageSchema);
    const tx = c.get("service").registerStorage(principal, vaultId, accountId);
    return respondWithTransaction(c, principal, tx, {
      action: "storageDeposit",
      resourceType: "custody",
      resourceId: vaultId,
      detail: accountId ?? principal,
    });
  });

  routes.post("/:vaultId/transfer", validateBody(TransferSharesSchema), (c) => {
    const principal = requirePrincipal(c);
    const vaultId = accountParam(c, "vaultId");
    const { receiverId, amount, memo } = bodyOf(c, TransferSharesSchema);
    const tx = c.get("service").transferShares(principal, vaultId, receiverId, amount, memo);
    return respondWithTransaction(c, principal, tx, {
      action: "ftTransfer",
      resourceType: "custody",
      resourceId: vaultId,
      detail: `${amount} to ${receiverId}`,
    });
  });

  return routes;
}

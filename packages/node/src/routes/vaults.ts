/**
 * Registry routes.
 *
 * POST   /api/v1/vaults                   : Provision a vault for an origin
 * GET    /api/v1/vaults                   : List vault records (cursor pagination)
 * GET    /api/v1/vaults/count             : Number of recorded vaults
 * GET    /api/v1/vaults/by-origin/:origin : Vault address of an origin
 * GET    /api/v1/vaults/cache             : Cached vault info, by index
 * POST   /api/v1/vaults/refresh           : Clear the cache and re-request all info
 * GET    /api/v1/vaults/:index/address    : Vault address at an index
 * POST   /api/v1/vaults/:index/info       : Request a vault's info into the cache
 * PUT    /api/v1/vaults/:index/params     : Update a vault's parameters (owner only)
 *
 * GET    /api/v1/registry                 : Owner, fee, pending and failed work
 * GET    /api/v1/registry/snapshot        : Versioned registry snapshot
 * GET    /api/v1/registry/fee             : Current fee
 * PUT    /api/v1/registry/fee             : Set the fee (owner only)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  CreateVaultSchema,
  PaginationQuerySchema,
  SetFeeSchema,
  RefreshSchema,
  SetParamsSchema,
} from "../types/dto.js";
import { bodyOf, parseQuery, validateBody } from "../middleware/validate.js";
import { requirePrincipal } from "../middleware/principal.js";
import { paginate } from "../types/pagination.js";
import { createErrorEnvelope } from "../types/error.js";
import { respondWithTransaction } from "./respond.js";
import { accountParam, indexParam } from "./params.js";

export function createVaultRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(CreateVaultSchema), (c) => {
    const principal = requirePrincipal(c);
    const body = bodyOf(c, CreateVaultSchema);
    const tx = c.get("service").createVault(principal, body);
    return respondWithTransaction(c, principal, tx, {
      action: "createVault",
      resourceType: "vault",
      resourceId: body.origin,
      detail: body.symbol,
    });
  });

  routes.get("/", (c) => {
    const query = parseQuery(c, PaginationQuerySchema);
    if (!query.ok) return query.response;
    const records = c.get("service").getVaultRecords();
    return c.json(paginate(records, query.value, (r) => r.index, "vaults"));
  });

  routes.get("/count", (c) => {
    return c.json({ data: { count: c.get("service").getVaultCount() } });
  });

  routes.get("/by-origin/:origin", (c) => {
    const origin = accountParam(c, "origin");
    const vaultAddress = c.get("service").getVaultByOrigin(origin);
    if (vaultAddress === null) {
      return c.json(createErrorEnvelope("NOT_FOUND", `No vault for origin "${origin}"`), 404);
    }
    return c.json({ data: { origin, vaultAddress } });
  });

  routes.get("/cache", (c) => {
    return c.json({ data: c.get("service").getAllCachedInfo() });
  });

  routes.post("/refresh", validateBody(RefreshSchema), (c) => {
    const principal = requirePrincipal(c);
    const tx = c.get("service").refreshAll(principal, bodyOf(c, RefreshSchema));
    return respondWithTransaction(c, principal, tx, {
      action: "refreshAll",
      resourceType: "registry",
      resourceId: c.get("service").registryId,
    });
  });

  routes.get("/:index/address", (c) => {
    const index = indexParam(c);
    return c.json({ data: { index, vaultAddress: c.get("service").getVaultAddressByIndex(index) } });
  });

  routes.post("/:index/info", (c) => {
    const principal = requirePrincipal(c);
    const index = indexParam(c);
    const tx = c.get("service").requestVaultInfo(principal, index);
    return respondWithTransaction(c, principal, tx, {
      action: "getVaultInfoByIndex",
      resourceType: "vault",
      resourceId: String(index),
    });
  });

  routes.put("/:index/params", validateBody(SetParamsSchema), (c) => {
    const principal = requirePrincipal(c);
    const index = indexParam(c);
    const body = bodyOf(c, SetParamsSchema);
    const tx = c.get("service").setParams(principal, index, body);
    return respondWithTransaction(c, principal, tx, {
      action: "setParams",
      resourceType: "vault",
      resourceId: String(index),
      detail: `unitValue=${body.unitValue}`,
    });
  });

  return routes;
}

export function createRegistryRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => c.json({ data: c.get("service").registryStatus() }));

  routes.get("/snapshot", (c) => c.json({ data: c.get("service").registrySnapshot() }));

  routes.get("/fee", (c) => c.json({ data: { fee: c.get("service").getFee() } }));

  routes.put("/fee", validateBody(SetFeeSchema), (c) => {
    const principal = requirePrincipal(c);
    const { fee } = bodyOf(c, SetFeeSchema);
    const tx = c.get("service").setFee(principal, fee);
    return respondWithTransaction(c, principal, tx, {
      action: "setFee",
      resourceType: "registry",
      resourceId: c.get("service").registryId,
      detail: fee,
    });
  });

  return routes;
}

/**
 * Asset registry routes. Asset registries are deployed on first mint.
 *
 * POST   /api/v1/assets/:origin/tokens                   : Mint a token
 * GET    /api/v1/assets/:origin/tokens?owner=            : Tokens held by an account
 * GET    /api/v1/assets/:origin/tokens/:tokenId          : One token
 * POST   /api/v1/assets/:origin/tokens/:tokenId/approve  : Approve an account to move it
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ApproveTokenSchema, MintTokenSchema, TokensQuerySchema } from "../types/dto.js";
import { bodyOf, parseQuery, validateBody } from "../middleware/validate.js";
import { requirePrincipal } from "../middleware/principal.js";
import { respondWithTransaction } from "./respond.js";
import { accountParam } from "./params.js";

export function createAssetRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/:origin/tokens", validateBody(MintTokenSchema), (c) => {
    const principal = requirePrincipal(c);
    const origin = accountParam(c, "origin");
    const { tokenId, ownerId } = bodyOf(c, MintTokenSchema);
    const tx = c.get("service").mint(origin, tokenId, ownerId);
    return respondWithTransaction(c, principal, tx, {
      action: "mint",
      resourceType: "asset",
      resourceId: `${origin}/${tokenId}`,
      detail: ownerId,
    });
  });

  routes.get("/:origin/tokens", (c) => {
    const query = parseQuery(c, TokensQuerySchema);
    if (!query.ok) return query.response;
    const origin = accountParam(c, "origin");
    return c.json({ data: c.get("service").tokensOf(origin, query.value.owner) });
  });

  routes.get("/:origin/tokens/:tokenId", (c) => {
    const origin = accountParam(c, "origin");
    return c.json({ data: c.get("service").token(origin, c.req.param("tokenId")) });
  });

  routes.post("/:origin/tokens/:tokenId/approve", validateBody(ApproveTokenSchema), (c) => {
    const principal = requirePrincipal(c);
    const origin = accountParam(c, "origin");
    const tokenId = c.req.param("tokenId");
    const { accountId } = bodyOf(c, ApproveTokenSchema);
    const tx = c.get("service").approve(principal, origin, tokenId, accountId);
    return respondWithTransaction(c, principal, tx, {
      action: "approve",
      resourceType: "asset",
      resourceId: `${origin}/${tokenId}`,
      detail: accountId,
    });
  });

  return routes;
}

/**
 * Host routes.
 *
 * POST   /api/v1/host/settle         : Deliver queued receipts
 * GET    /api/v1/host/accounts/:id   : Native balance of an account
 * GET    /api/v1/transactions/:id    : Outcome of a transaction and its receipts
 * GET    /api/v1/audit               : Audit log, newest first
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AuditQuerySchema, SettleSchema } from "../types/dto.js";
import { bodyOf, parseQuery, validateBody } from "../middleware/validate.js";
import { requirePrincipal } from "../middleware/principal.js";
import { accountParam } from "./params.js";

export function createHostRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/host/settle", validateBody(SettleSchema), (c) => {
    const principal = requirePrincipal(c);
    const { maxRounds } = bodyOf(c, SettleSchema);
    const report = c.get("service").settle(maxRounds);
    c.get("auditLog").append({
      actor: principal,
      action: "settle",
      resourceType: "host",
      resourceId: String(report.blockHeight),
      detail: `${String(report.executed)} receipts in ${String(report.rounds)} rounds`,
    });
    return c.json({ data: report });
  });

  routes.get("/host/accounts/:id", (c) => {
    const accountId = accountParam(c, "id");
    return c.json({ data: { accountId, balance: c.get("service").balanceOf(accountId) } });
  });

  routes.get("/transactions/:id", (c) => {
    return c.json({ data: c.get("service").outcome(c.req.param("id")) });
  });

  routes.get("/audit", (c) => {
    const query = parseQuery(c, AuditQuerySchema);
    if (!query.ok) return query.response;
    return c.json({ data: c.get("auditLog").query(query.value) });
  });

  return routes;
}

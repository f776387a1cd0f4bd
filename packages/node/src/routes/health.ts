/**
 * Health check routes.
 *
 * GET /health: Liveness check with the host's block height
 * GET /ready : Readiness check: the registry is deployed and the host
 *               has nothing left to deliver
 */

import { Hono } from "hono";
import { REGISTRY_CODE_ID } from "@shardvault/registry";
import type { AppEnv } from "../types/api-contract.js";

export function createHealthRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    const { blockHeight, queuedReceipts } = c.get("service").status();
    return c.json({
      status: "ok",
      blockHeight,
      queuedReceipts,
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const service = c.get("service");
    const status = service.status();
    const registryDeployed = service.host.codeIdOf(status.registryId) === REGISTRY_CODE_ID;
    const settled = status.queuedReceipts === 0;
    const ready = registryDeployed && settled;

    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        subsystems: {
          registry: registryDeployed ? "ok" : "down",
          delivery: settled ? "ok" : "pending",
        },
        queuedReceipts: status.queuedReceipts,
        timestamp: new Date().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}

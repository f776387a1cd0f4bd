/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability: tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { SandboxService } from "./services/sandbox-service.js";
import type { SandboxOptions } from "./services/sandbox-service.js";
import { AuditLog } from "./services/audit-log.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { principalMiddleware } from "./middleware/principal.js";
import { createHealthRoutes } from "./routes/health.js";
import { createRegistryRoutes, createVaultRoutes } from "./routes/vaults.js";
import { createCustodyRoutes } from "./routes/custody.js";
import { createAssetRoutes } from "./routes/assets.js";
import { createHostRoutes } from "./routes/host.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly sandbox: SandboxOptions;
  readonly logFn?: (entry: RequestLogEntry) => void;
  /** Clock for audit timestamps. Default: the system clock */
  readonly now?: () => Date;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: SandboxService;
  readonly auditLog: AuditLog;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new SandboxService(options.sandbox);
  const auditLog = new AuditLog(options.now);

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  app.use("*", async (c, next) => {
    c.set("service", service);
    c.set("auditLog", auditLog);
    await next();
  });

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(handleError);

  // ─── Health Routes (no principal required) ──────────────────────
  app.route("/", createHealthRoutes());

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", principalMiddleware());

  app.route("/api/v1/vaults", createVaultRoutes());
  app.route("/api/v1/registry", createRegistryRoutes());
  app.route("/api/v1/custody", createCustodyRoutes());
  app.route("/api/v1/assets", createAssetRoutes());
  app.route("/api/v1", createHostRoutes());

  return { app, service, auditLog };
}

/**
 * @shardvault/node: HTTP sandbox over a Shardvault host.
 *
 * Serves the registry, its vaults and in-memory asset registries from
 * one in-process execution host.
 */

export { SandboxService, SandboxError, toOutcomeView, ASSET_REGISTRY_CODE_ID } from "./services/sandbox-service.js";
export type {
  SandboxOptions,
  SandboxErrorCode,
  OutcomeView,
  ReceiptView,
  SubmittedTransaction,
  SettleView,
  HostStatus,
} from "./services/sandbox-service.js";
export { AuditLog } from "./services/audit-log.js";
export type { AuditLogEntry, AuditLogQuery, AuditResourceType } from "./services/audit-log.js";
export { loadConfig, sandboxOptionsFromConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";

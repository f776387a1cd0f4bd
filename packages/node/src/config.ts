/**
 * @shardvault/node: Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { AccountIdSchema, ONE_UNIT } from "@shardvault/runtime";
import type { SandboxOptions } from "./services/sandbox-service.js";

// =============================================================================
// Schema
// =============================================================================

/** Whole units, as a decimal string of digits. */
const WholeUnits = z.string().regex(/^\d+$/, "Expected a whole number of units");

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Registry
  REGISTRY_ACCOUNT_ID: AccountIdSchema.default("registry.sandbox"),
  REGISTRY_OWNER_ID: AccountIdSchema.default("admin.sandbox"),
  REGISTRY_INITIAL_BALANCE: WholeUnits.default("1000"),
  BOOTSTRAP_BALANCE: WholeUnits.default("100"),

  // Settlement and resumption
  VAULT_SETTLEMENT: z.enum(["confirmed", "optimistic"]).default("confirmed"),
  VAULT_COMMIT_ORDER: z.enum(["confirmed", "eager"]).default("confirmed"),
  RESUMPTION_POLICY: z.enum(["propagate", "abort"]).default("propagate"),
  INFO_RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  AUTO_SETTLE: z
    .enum(["true", "false"])
    .default("false")
    .transform((v) => v === "true"),

  // Delivery
  DELIVERY_ORDER: z.enum(["fifo", "shuffle"]).default("fifo"),
  DELIVERY_SEED: z.coerce.number().int().default(1),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

/**
 * Sandbox options for a loaded configuration.
 */
export function sandboxOptionsFromConfig(config: AppConfig): SandboxOptions {
  return {
    registryId: config.REGISTRY_ACCOUNT_ID,
    ownerId: config.REGISTRY_OWNER_ID,
    registryBalance: BigInt(config.REGISTRY_INITIAL_BALANCE) * ONE_UNIT,
    bootstrapBalance: BigInt(config.BOOTSTRAP_BALANCE) * ONE_UNIT,
    settlement: config.VAULT_SETTLEMENT,
    commitOrder: config.VAULT_COMMIT_ORDER,
    resumption: config.RESUMPTION_POLICY,
    infoRetryAttempts: config.INFO_RETRY_ATTEMPTS,
    delivery: config.DELIVERY_ORDER,
    deliverySeed: config.DELIVERY_SEED,
    autoSettle: config.AUTO_SETTLE,
  };
}

/**
 * @shardvault/registry: Types for the registry component.
 *
 * Rules:
 * - One vault per asset origin, enforced unique
 * - Records are append-only and never reused
 * - The info cache is keyed by index, never by arrival order
 */

import type { Logger } from "pino";
import type { ResumptionPolicy, RetryConfig } from "@shardvault/runtime";
import type { AccountId, AssetOriginId, PublicVaultInfo, VaultRecord } from "@shardvault/types";

// =============================================================================
// Error
// =============================================================================

export type RegistryErrorCode =
  | "ALREADY_REGISTERED"
  | "ADDRESS_TAKEN"
  | "INVALID_ACCOUNT_ID"
  | "NOT_FOUND"
  | "UNAUTHORIZED"
  | "INVALID_SNAPSHOT";

export class RegistryError extends Error {
  public readonly code: RegistryErrorCode;

  constructor(code: RegistryErrorCode, message: string) {
    super(message);
    this.name = "RegistryError";
    this.code = code;
  }
}

// =============================================================================
// Configuration
// =============================================================================

/**
 * When a vault record is committed relative to the vault's constructor.
 *
 * - "confirmed": reserve the origin, append the record only once init
 *   has succeeded
 * - "eager": append the record when the provisioning request is issued,
 *   even if init later fails
 */
export type CommitOrder = "confirmed" | "eager";

export interface RegistryOptions {
  /** Administrator for setParams and setFee. Default: the registry account itself */
  readonly ownerId?: AccountId;
  /** Code id deployed on provisioned vault accounts. Default: "vault" */
  readonly vaultCodeId?: string;
  /** Default: "confirmed" */
  readonly commitOrder?: CommitOrder;
  /** How info callbacks treat a failed or pending result. Default: "propagate" */
  readonly resumption?: ResumptionPolicy;
  /** Re-issue policy for failed info requests under "propagate" */
  readonly infoRetry?: Partial<RetryConfig>;
  /** Jitter source for info retries. Default: Math.random */
  readonly random?: () => number;
  readonly logger?: Logger;
}

// =============================================================================
// State
// =============================================================================

/**
 * A vault whose provisioning request is in flight under "confirmed".
 */
export interface PendingProvision {
  readonly origin: AssetOriginId;
  readonly vaultAddress: AccountId;
  readonly requestedBy: AccountId;
  readonly requestedAtBlock: number;
}

export interface ProvisioningFailure {
  readonly origin: AssetOriginId;
  readonly vaultAddress: AccountId;
  readonly reason: string;
  readonly blockHeight: number;
}

export interface InfoFailure {
  readonly index: number;
  readonly vaultAddress: AccountId;
  readonly attempts: number;
  readonly reason: string;
  readonly blockHeight: number;
}

/**
 * A forwarded parameter update the vault rejected.
 */
export interface ParamsFailure {
  readonly vault: AccountId;
  readonly reason: string;
  readonly blockHeight: number;
}

/**
 * Result of createVault. `index` is null while the record waits for
 * the vault's constructor.
 */
export interface ProvisioningTicket {
  readonly origin: AssetOriginId;
  readonly vaultAddress: AccountId;
  readonly index: number | null;
}

export interface CachedVaultInfo {
  readonly index: number;
  readonly info: PublicVaultInfo;
  readonly blockHeight: number;
}

/**
 * Persisted registry state. `version` is bumped whenever the shape of
 * any entry changes; restore() rejects versions it does not know.
 */
export interface RegistrySnapshot {
  readonly version: 1;
  readonly owner: AccountId | null;
  readonly fee: string;
  readonly records: readonly VaultRecord[];
  readonly pending: readonly PendingProvision[];
  readonly provisioningFailures: readonly ProvisioningFailure[];
  readonly cache: readonly CachedVaultInfo[];
  readonly infoFailures: readonly InfoFailure[];
  readonly paramsFailures: readonly ParamsFailure[];
}

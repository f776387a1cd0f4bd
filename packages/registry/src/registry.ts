/**
 * Registry: creates and indexes vaults, one per asset origin.
 *
 * Keeps two tables: index → origin and origin → vault address, plus a
 * monotone counter. Aggregates the public info of its vaults into a
 * cache through asynchronous info requests.
 *
 * Provisioning is a single receipt on the derived vault address:
 * create the account, fund it, add the signer's key, deploy the vault
 * code and call its init. Those actions commit or fail together.
 *
 * Commit order:
 * - "confirmed": the origin is reserved while the receipt is in flight
 *   and the record is appended by onVaultProvisioned once init has
 *   succeeded; a failure releases the reservation and is kept
 * - "eager": the record is appended when the request is issued and
 *   points at a vault that may never have been initialized
 *
 * Info requests resume in onVaultInfo. Under "abort" anything but a
 * success aborts the callback; under "propagate" a failure is retried
 * after a backoff in blocks and recorded once attempts run out. Each
 * request carries the gas for the retries it may still issue, so a
 * request funds only as many retries as the issuing receipt can pay
 * for, and refreshAll splits its gas evenly across the vaults it asks.
 */

import pino from "pino";
import type { Logger } from "pino";
import { z } from "zod";
import { parseU128 } from "@shardvault/ledger";
import {
  AccountIdSchema,
  DEFAULT_RETRY_CONFIG,
  HostError,
  ONE_UNIT,
  TGAS,
  U128Schema,
  assertPrivate,
  canRetry,
  computeDelay,
  methodNotFound,
  parseArgs,
  requireSingleResult,
  resume,
} from "@shardvault/runtime";
import type {
  CallResult,
  Component,
  ExecutionContext,
  ResumptionPolicy,
  Restore,
  RetryConfig,
} from "@shardvault/runtime";
import type {
  AccountId,
  AssetOriginId,
  CreateVaultArgs,
  PublicVaultInfo,
  VaultParams,
  VaultRecord,
} from "@shardvault/types";
import { isPublicVaultInfo } from "@shardvault/types";
import { deriveVaultAddress } from "./address.js";
import type {
  CachedVaultInfo,
  CommitOrder,
  InfoFailure,
  ParamsFailure,
  PendingProvision,
  ProvisioningFailure,
  ProvisioningTicket,
  RegistryOptions,
  RegistrySnapshot,
} from "./types.js";
import { RegistryError } from "./types.js";

// =============================================================================
// Constants
// =============================================================================

/** Balance granted to every provisioned vault account: 25 whole units. */
export const VAULT_FUNDING = 25n * ONE_UNIT;

export const INFO_GAS = 5n * TGAS;
export const INFO_CALLBACK_GAS = 5n * TGAS;
export const PROVISION_CALLBACK_GAS = 5n * TGAS;
export const PARAMS_CALLBACK_GAS = 5n * TGAS;

/** Gas one info attempt costs: the request plus its callback. */
export const INFO_ATTEMPT_GAS = INFO_GAS + INFO_CALLBACK_GAS;

export const SNAPSHOT_VERSION = 1;

// =============================================================================
// Argument schemas
// =============================================================================

const IndexSchema = z.number().int().nonnegative();

const CreateVaultArgsSchema = z.object({
  name: z.string(),
  origin: AccountIdSchema,
  symbol: z.string().min(1),
  media: z.string(),
});
const ProvisionedArgs = z.object({ origin: AccountIdSchema });
const IndexArgs = z.object({ index: IndexSchema });
const InfoCallbackArgs = z.object({
  index: IndexSchema,
  attempt: z.number().int().nonnegative(),
  retries: z.number().int().nonnegative(),
});
const RefreshArgs = z.object({
  from: IndexSchema.optional(),
  limit: z.number().int().positive().optional(),
});
const ParamsForwardedArgs = z.object({ vault: AccountIdSchema });
const OriginArgs = z.object({ origin: AccountIdSchema });
const SetParamsArgs = z.object({
  vault: AccountIdSchema,
  name: z.string(),
  symbol: z.string(),
  unitValue: U128Schema,
  media: z.string(),
});
const SetFeeArgs = z.object({ fee: U128Schema });

const PublicVaultInfoSchema = z.custom<PublicVaultInfo>(isPublicVaultInfo, {
  message: "Invalid vault info",
});

const SnapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  owner: AccountIdSchema.nullable(),
  fee: U128Schema,
  records: z.array(
    z.object({ index: IndexSchema, origin: AccountIdSchema, vaultAddress: AccountIdSchema }),
  ),
  pending: z.array(
    z.object({
      origin: AccountIdSchema,
      vaultAddress: AccountIdSchema,
      requestedBy: AccountIdSchema,
      requestedAtBlock: z.number().int().nonnegative(),
    }),
  ),
  provisioningFailures: z.array(
    z.object({
      origin: AccountIdSchema,
      vaultAddress: AccountIdSchema,
      reason: z.string(),
      blockHeight: z.number().int().nonnegative(),
    }),
  ),
  cache: z.array(
    z.object({
      index: IndexSchema,
      info: PublicVaultInfoSchema,
      blockHeight: z.number().int().nonnegative(),
    }),
  ),
  infoFailures: z.array(
    z.object({
      index: IndexSchema,
      vaultAddress: AccountIdSchema,
      attempts: z.number().int().positive(),
      reason: z.string(),
      blockHeight: z.number().int().nonnegative(),
    }),
  ),
  paramsFailures: z.array(
    z.object({
      vault: AccountIdSchema,
      reason: z.string(),
      blockHeight: z.number().int().nonnegative(),
    }),
  ),
});

// =============================================================================
// Registry
// =============================================================================

export class RegistryContract implements Component {
  private _owner: AccountId | null;
  private _fee = 0n;
  private readonly _indexToOrigin = new Map<number, AssetOriginId>();
  private readonly _originToVault = new Map<AssetOriginId, AccountId>();
  private _counter = 0;
  private readonly _pending = new Map<AssetOriginId, PendingProvision>();
  private _provisioningFailures: ProvisioningFailure[] = [];
  private readonly _cache = new Map<number, CachedVaultInfo>();
  private _infoFailures: InfoFailure[] = [];
  private _paramsFailures: ParamsFailure[] = [];

  private readonly _vaultCodeId: string;
  private readonly _commitOrder: CommitOrder;
  private readonly _resumption: ResumptionPolicy;
  private readonly _retry: RetryConfig;
  private readonly _random: () => number;
  private readonly _logger: Logger;

  constructor(options: RegistryOptions = {}) {
    this._owner = options.ownerId ?? null;
    this._vaultCodeId = options.vaultCodeId ?? "vault";
    this._commitOrder = options.commitOrder ?? "confirmed";
    this._resumption = options.resumption ?? "propagate";
    this._retry = { ...DEFAULT_RETRY_CONFIG, ...options.infoRetry };
    this._random = options.random ?? Math.random;
    this._logger = options.logger ?? pino({ level: "silent" });
  }

  get commitOrder(): CommitOrder {
    return this._commitOrder;
  }

  get resumption(): ResumptionPolicy {
    return this._resumption;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Component
  // ───────────────────────────────────────────────────────────────────────

  invoke(method: string, ctx: ExecutionContext, args: unknown): unknown {
    switch (method) {
      // Provisioning
      case "createVault":
        return this.createVault(ctx, parseArgs(CreateVaultArgsSchema, args, method));
      case "onVaultProvisioned":
        assertPrivate(ctx, method);
        return this.onVaultProvisioned(ctx, parseArgs(ProvisionedArgs, args, method).origin);

      // Info aggregation
      case "getVaultInfoByIndex": {
        const { index } = parseArgs(IndexArgs, args, method);
        this.requireRecord(index);
        this.requestInfo(ctx, index, 0, this.fundedRetries(ctx.remainingGas()), 0);
        return null;
      }
      case "onVaultInfo": {
        assertPrivate(ctx, method);
        const { index, attempt, retries } = parseArgs(InfoCallbackArgs, args, method);
        return this.onVaultInfo(ctx, index, attempt, retries);
      }
      case "refreshAll":
        return this.refreshAll(ctx, parseArgs(RefreshArgs, args, method));
      case "getAllCachedInfo":
        return this.getAllCachedInfo();
      case "getCachedInfo":
        return this._cache.get(parseArgs(IndexArgs, args, method).index)?.info ?? null;

      // Lookups
      case "getVaultAddressByIndex":
        return this.requireRecord(parseArgs(IndexArgs, args, method).index).vaultAddress;
      case "getVaultCount":
        return this._counter;
      case "getVaultRecords":
        return this.getVaultRecords();
      case "getVaultByOrigin":
        return this._originToVault.get(parseArgs(OriginArgs, args, method).origin) ?? null;
      case "getPendingProvisions":
        return [...this._pending.values()];
      case "getProvisioningFailures":
        return this._provisioningFailures;
      case "getInfoFailures":
        return this._infoFailures;
      case "getParamsFailures":
        return this._paramsFailures;

      // Administration
      case "getOwner":
        return this.ownerOf(ctx);
      case "setParams":
        return this.setParams(ctx, parseArgs(SetParamsArgs, args, method));
      case "onParamsForwarded":
        assertPrivate(ctx, method);
        return this.onParamsForwarded(ctx, parseArgs(ParamsForwardedArgs, args, method).vault);
      case "setFee":
        return this.setFee(ctx, parseU128(parseArgs(SetFeeArgs, args, method).fee));
      case "getFee":
        return this._fee.toString();

      default:
        throw methodNotFound("RegistryContract", method);
    }
  }

  checkpoint(): Restore {
    const snapshot = this.snapshot();
    return () => {
      this.restore(snapshot);
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Provisioning
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Provision a vault for `origin` at an address derived from `symbol`.
   */
  private createVault(ctx: ExecutionContext, args: CreateVaultArgs): ProvisioningTicket {
    if (this._originToVault.has(args.origin)) {
      throw new RegistryError(
        "ALREADY_REGISTERED",
        `Origin "${args.origin}" is already registered`,
      );
    }
    if (this._pending.has(args.origin)) {
      throw new RegistryError(
        "ALREADY_REGISTERED",
        `A vault for origin "${args.origin}" is already being provisioned`,
      );
    }
    const vaultAddress = deriveVaultAddress(args.symbol, ctx.currentAccountId);
    if (this.isAddressTaken(vaultAddress)) {
      throw new RegistryError(
        "ADDRESS_TAKEN",
        `Vault address "${vaultAddress}" is already used by another origin`,
      );
    }

    const provision = ctx
      .batch(vaultAddress)
      .createAccount()
      .transfer(VAULT_FUNDING)
      .addFullAccessKey(ctx.signerPublicKey)
      .deploy(this._vaultCodeId)
      .functionCall(
        "init",
        { origin: args.origin, name: args.name, symbol: args.symbol, media: args.media },
        { gas: ctx.prepaidGas / 3n },
      )
      .submit();

    if (this._commitOrder === "eager") {
      const record = this.appendRecord(args.origin, vaultAddress);
      ctx.log(`Vault @${vaultAddress} registered for @${args.origin} at index ${String(record.index)}`);
      return { origin: args.origin, vaultAddress, index: record.index };
    }

    this._pending.set(args.origin, {
      origin: args.origin,
      vaultAddress,
      requestedBy: ctx.predecessorAccountId,
      requestedAtBlock: ctx.blockHeight,
    });
    provision.andThen(
      ctx.currentAccountId,
      "onVaultProvisioned",
      { origin: args.origin },
      { gas: PROVISION_CALLBACK_GAS },
    );
    ctx.log(`Provisioning vault @${vaultAddress} for @${args.origin}`);
    return { origin: args.origin, vaultAddress, index: null };
  }

  private onVaultProvisioned(ctx: ExecutionContext, origin: AssetOriginId): VaultRecord | null {
    const result = requireSingleResult(ctx);
    const provision = this._pending.get(origin);
    if (provision === undefined) {
      throw new RegistryError("NOT_FOUND", `No provisioning in flight for origin "${origin}"`);
    }
    this._pending.delete(origin);

    if (result.status === "success") {
      const record = this.appendRecord(origin, provision.vaultAddress);
      ctx.log(
        `Vault @${provision.vaultAddress} registered for @${origin} at index ${String(record.index)}`,
      );
      this._logger.info(
        { registry: ctx.currentAccountId, vault: provision.vaultAddress, index: record.index },
        "Vault provisioned",
      );
      return record;
    }

    const reason = result.status === "failed" ? result.reason : "Provisioning did not resolve";
    this._provisioningFailures.push({
      origin,
      vaultAddress: provision.vaultAddress,
      reason,
      blockHeight: ctx.blockHeight,
    });
    ctx.log(`Provisioning of @${provision.vaultAddress} failed: ${reason}`);
    this._logger.warn(
      { registry: ctx.currentAccountId, vault: provision.vaultAddress, reason },
      "Vault provisioning failed",
    );
    return null;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Info aggregation
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Request a vault's public info; onVaultInfo caches it under `index`.
   * The callback carries the gas for `retries` more attempts.
   */
  private requestInfo(
    ctx: ExecutionContext,
    index: number,
    attempt: number,
    retries: number,
    delayBlocks: number,
  ): void {
    const record = this.requireRecord(index);
    ctx
      .call(record.vaultAddress, "getInfo", {}, { gas: INFO_GAS, delayBlocks })
      .andThen(
        ctx.currentAccountId,
        "onVaultInfo",
        { index, attempt, retries },
        { gas: INFO_CALLBACK_GAS + BigInt(retries) * INFO_ATTEMPT_GAS },
      );
  }

  private onVaultInfo(
    ctx: ExecutionContext,
    index: number,
    attempt: number,
    retries: number,
  ): PublicVaultInfo | null {
    const result = resume(requireSingleResult(ctx), this._resumption);
    const record = this.requireRecord(index);

    if (result.status === "success") {
      if (isPublicVaultInfo(result.value)) {
        this._cache.set(index, { index, info: result.value, blockHeight: ctx.blockHeight });
        return result.value;
      }
      if (this._resumption === "abort") {
        throw new HostError("REMOTE_CALL_FAILED", `Vault @${record.vaultAddress} returned malformed info`);
      }
      this.retryInfo(ctx, record, attempt, retries, "Malformed vault info");
      return null;
    }

    this.retryInfo(
      ctx,
      record,
      attempt,
      retries,
      result.status === "failed" ? result.reason : "Info request did not resolve",
    );
    return null;
  }

  private retryInfo(
    ctx: ExecutionContext,
    record: VaultRecord,
    attempt: number,
    retries: number,
    reason: string,
  ): void {
    const attemptsMade = attempt + 1;
    if (retries > 0 && canRetry(attemptsMade, this._retry)) {
      const delay = computeDelay(attempt, this._retry, this._random);
      this.requestInfo(ctx, record.index, attemptsMade, retries - 1, delay);
      ctx.log(
        `Info request for vault #${String(record.index)} failed (attempt ${String(attemptsMade)} of ${String(this._retry.maxAttempts)}), retrying in ${String(delay)} blocks`,
      );
      return;
    }

    this._infoFailures.push({
      index: record.index,
      vaultAddress: record.vaultAddress,
      attempts: attemptsMade,
      reason,
      blockHeight: ctx.blockHeight,
    });
    ctx.log(`Info request for vault #${String(record.index)} failed: ${reason}`);
    this._logger.warn(
      { registry: ctx.currentAccountId, vault: record.vaultAddress, attempts: attemptsMade, reason },
      "Vault info unavailable",
    );
  }

  /**
   * Clear the cache and request the info of every vault from `from`
   * (default 0), at most `limit` of them. Responses fill the cache in
   * whatever order they arrive. Returns the number of requests.
   *
   * The receipt's gas is split evenly across the requests; each one
   * funds as many retries as its share allows. A range whose share
   * cannot pay for a single attempt is rejected before anything is
   * issued.
   */
  private refreshAll(ctx: ExecutionContext, range: { from?: number; limit?: number }): number {
    const from = range.from ?? 0;
    const end = range.limit === undefined ? this._counter : Math.min(this._counter, from + range.limit);
    const count = Math.max(end - from, 0);

    if (count > 0) {
      const share = ctx.remainingGas() / BigInt(count);
      if (share < INFO_ATTEMPT_GAS) {
        throw new HostError(
          "GAS_EXCEEDED",
          `Refreshing ${String(count)} vaults needs ${(INFO_ATTEMPT_GAS * BigInt(count)).toString()} gas, ${ctx.remainingGas().toString()} remaining; refresh a smaller range`,
        );
      }
      const retries = this.fundedRetries(share);
      for (const [index] of this._cache) {
        if (index >= from && index < end) this._cache.delete(index);
      }
      for (let index = from; index < end; index++) {
        this.requestInfo(ctx, index, 0, retries, 0);
      }
    }
    return count;
  }

  private getAllCachedInfo(): PublicVaultInfo[] {
    return [...this._cache.values()].sort((a, b) => a.index - b.index).map((entry) => entry.info);
  }

  /**
   * Retries one request can carry within `budget` gas, capped by the
   * retry policy. Under "abort" a failure is never retried.
   */
  private fundedRetries(budget: bigint): number {
    if (this._resumption === "abort") return 0;
    const affordable = budget / INFO_ATTEMPT_GAS - 1n;
    const allowed = BigInt(Math.max(this._retry.maxAttempts - 1, 0));
    const retries = affordable < allowed ? affordable : allowed;
    return retries > 0n ? Number(retries) : 0;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Administration
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Forward a parameter update to one of this registry's vaults.
   */
  private setParams(ctx: ExecutionContext, args: VaultParams & { vault: AccountId }): null {
    this.assertOwner(ctx, "setParams");
    if (!this.isRecordedVault(args.vault)) {
      throw new RegistryError("NOT_FOUND", `"${args.vault}" is not a vault of this registry`);
    }
    ctx
      .call(
        args.vault,
        "setParams",
        { name: args.name, symbol: args.symbol, unitValue: args.unitValue, media: args.media },
        { gas: ctx.prepaidGas / 2n },
      )
      .andThen(
        ctx.currentAccountId,
        "onParamsForwarded",
        { vault: args.vault },
        { gas: PARAMS_CALLBACK_GAS },
      );
    return null;
  }

  /**
   * Resumes a forwarded parameter update. A rejection is recorded in
   * getParamsFailures() and returned as the tagged result.
   */
  private onParamsForwarded(ctx: ExecutionContext, vault: AccountId): CallResult<unknown> {
    const result = resume(requireSingleResult(ctx), this._resumption);
    if (result.status === "success") {
      ctx.log(`Parameters of @${vault} updated`);
      return result;
    }

    const reason = result.status === "failed" ? result.reason : "Parameter update did not resolve";
    this._paramsFailures.push({ vault, reason, blockHeight: ctx.blockHeight });
    ctx.log(`Parameter update of @${vault} failed: ${reason}`);
    this._logger.warn({ registry: ctx.currentAccountId, vault, reason }, "Vault parameter update failed");
    return result;
  }

  /**
   * Store the fee rate. Nothing in this registry charges it.
   */
  private setFee(ctx: ExecutionContext, fee: bigint): null {
    this.assertOwner(ctx, "setFee");
    this._fee = fee;
    ctx.log(`Fee set to ${fee.toString()}`);
    return null;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshot
  // ───────────────────────────────────────────────────────────────────────

  snapshot(): RegistrySnapshot {
    return {
      version: SNAPSHOT_VERSION,
      owner: this._owner,
      fee: this._fee.toString(),
      records: this.getVaultRecords(),
      pending: [...this._pending.values()],
      provisioningFailures: [...this._provisioningFailures],
      cache: [...this._cache.values()],
      infoFailures: [...this._infoFailures],
      paramsFailures: [...this._paramsFailures],
    };
  }

  /**
   * Replace this registry's state with the snapshot's. Record indices
   * must run from 0 without gaps.
   */
  restore(snapshot: RegistrySnapshot): void {
    snapshot.records.forEach((record, position) => {
      if (record.index !== position) {
        throw new RegistryError(
          "INVALID_SNAPSHOT",
          `Record at position ${String(position)} has index ${String(record.index)}`,
        );
      }
    });

    this._owner = snapshot.owner;
    this._fee = parseU128(snapshot.fee);
    this._indexToOrigin.clear();
    this._originToVault.clear();
    for (const record of snapshot.records) {
      this._indexToOrigin.set(record.index, record.origin);
      this._originToVault.set(record.origin, record.vaultAddress);
    }
    this._counter = snapshot.records.length;
    this._pending.clear();
    for (const provision of snapshot.pending) this._pending.set(provision.origin, provision);
    this._provisioningFailures = [...snapshot.provisioningFailures];
    this._cache.clear();
    for (const entry of snapshot.cache) this._cache.set(entry.index, entry);
    this._infoFailures = [...snapshot.infoFailures];
    this._paramsFailures = [...snapshot.paramsFailures];
  }

  /**
   * Validate a persisted snapshot of unknown shape.
   */
  static parseSnapshot(value: unknown): RegistrySnapshot {
    const parsed = SnapshotSchema.safeParse(value);
    if (!parsed.success) {
      throw new RegistryError(
        "INVALID_SNAPSHOT",
        `Invalid registry snapshot: ${parsed.error.issues.map((i) => i.message).join("; ")}`,
      );
    }
    return parsed.data;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private helpers
  // ───────────────────────────────────────────────────────────────────────

  private appendRecord(origin: AssetOriginId, vaultAddress: AccountId): VaultRecord {
    const index = this._counter;
    this._originToVault.set(origin, vaultAddress);
    this._indexToOrigin.set(index, origin);
    this._counter++;
    return { index, origin, vaultAddress };
  }

  private requireRecord(index: number): VaultRecord {
    const origin = this._indexToOrigin.get(index);
    const vaultAddress = origin === undefined ? undefined : this._originToVault.get(origin);
    if (origin === undefined || vaultAddress === undefined) {
      throw new RegistryError("NOT_FOUND", `No vault at index ${String(index)}`);
    }
    return { index, origin, vaultAddress };
  }

  private getVaultRecords(): VaultRecord[] {
    const records: VaultRecord[] = [];
    for (let index = 0; index < this._counter; index++) {
      records.push(this.requireRecord(index));
    }
    return records;
  }

  private isRecordedVault(address: AccountId): boolean {
    for (const vaultAddress of this._originToVault.values()) {
      if (vaultAddress === address) return true;
    }
    return false;
  }

  private isAddressTaken(address: AccountId): boolean {
    if (this.isRecordedVault(address)) return true;
    for (const provision of this._pending.values()) {
      if (provision.vaultAddress === address) return true;
    }
    return false;
  }

  private ownerOf(ctx: ExecutionContext): AccountId {
    return this._owner ?? ctx.currentAccountId;
  }

  private assertOwner(ctx: ExecutionContext, method: string): void {
    if (ctx.predecessorAccountId !== this.ownerOf(ctx)) {
      throw new RegistryError("UNAUTHORIZED", `Only the registry owner can call ${method}`);
    }
  }
}

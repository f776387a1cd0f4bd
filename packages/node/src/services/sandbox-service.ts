/**
 * SandboxService: one execution host with a registry deployed on it.
 *
 * Wraps the host, the registry, the vaults it provisions and the asset
 * registries they take custody from. Route handlers call this service;
 * they never touch the host directly.
 *
 * Rules:
 * - Every mutation is a transaction signed by the calling principal
 * - Unknown principals are created on first use with a bootstrap balance
 * - Sub-accounts of the registry are never created by the sandbox
 * - A failed root receipt surfaces as a SandboxError carrying its code
 */

import pino from "pino";
import type { Logger } from "pino";
import {
  Host,
  InMemoryAssetRegistry,
  ONE_YOCTO,
  fifoDelivery,
  shuffledDelivery,
} from "@shardvault/runtime";
import type {
  ResumptionPolicy,
  TransactionOutcome,
  TransactResult,
} from "@shardvault/runtime";
import {
  RegistryContract,
  installShardvault,
  VAULT_CODE_ID,
} from "@shardvault/registry";
import type { CommitOrder, RegistrySnapshot } from "@shardvault/registry";
import { STORAGE_BALANCE_MIN } from "@shardvault/vault";
import type { SettlementMode, SettlementStatus } from "@shardvault/vault";
import { isSubAccountOf, isVaultRecord } from "@shardvault/types";
import type {
  AccountId,
  AssetId,
  AssetOriginId,
  CreateVaultArgs,
  VaultParams,
  VaultRecord,
} from "@shardvault/types";

export const ASSET_REGISTRY_CODE_ID = "asset-registry";

// =============================================================================
// Error
// =============================================================================

export type SandboxErrorCode =
  | "MISSING_PRINCIPAL"
  | "RESERVED_ACCOUNT"
  | "VAULT_NOT_FOUND"
  | "SETTLEMENT_NOT_FOUND"
  | "ASSET_REGISTRY_NOT_FOUND"
  | "NOT_AN_ASSET_REGISTRY"
  | "TOKEN_NOT_FOUND"
  | "TRANSACTION_FAILED"
  | "VALIDATION_ERROR";

/**
 * Error raised by the sandbox. A failed transaction keeps the code of
 * the error that aborted its root receipt, so `code` is widened to
 * string.
 */
export class SandboxError extends Error {
  public readonly code: SandboxErrorCode | string;
  public readonly transactionId: string | undefined;

  constructor(code: SandboxErrorCode | string, message: string, transactionId?: string) {
    super(message);
    this.name = "SandboxError";
    this.code = code;
    this.transactionId = transactionId;
  }
}

// =============================================================================
// Options
// =============================================================================

export interface SandboxOptions {
  readonly registryId: AccountId;
  readonly ownerId: AccountId;
  readonly registryBalance: bigint;
  /** Balance given to a principal the first time it is seen */
  readonly bootstrapBalance: bigint;
  readonly settlement: SettlementMode;
  readonly commitOrder: CommitOrder;
  readonly resumption: ResumptionPolicy;
  readonly infoRetryAttempts: number;
  readonly delivery: "fifo" | "shuffle";
  readonly deliverySeed: number;
  /** Run settle() after every transaction. Default: false */
  readonly autoSettle?: boolean;
  readonly logger?: Logger;
}

// =============================================================================
// Views
// =============================================================================

export interface ReceiptView {
  readonly receiptId: string;
  readonly predecessor: AccountId;
  readonly receiver: AccountId;
  readonly method: string | null;
  readonly status: string;
  readonly blockHeight: number | null;
  readonly gasBurnt: string;
  readonly logs: readonly string[];
  readonly result: unknown;
}

export interface OutcomeView {
  readonly transactionId: string;
  readonly status: TransactionOutcome["status"];
  readonly value: unknown;
  readonly reason: string | null;
  readonly receipts: readonly ReceiptView[];
}

export interface SubmittedTransaction {
  readonly transactionId: string;
  /** Return value of the root receipt */
  readonly value: unknown;
  readonly outcome: OutcomeView;
}

export interface SettleView {
  readonly rounds: number;
  readonly executed: number;
  readonly blockHeight: number;
  readonly remaining: number;
}

export interface HostStatus {
  readonly blockHeight: number;
  readonly queuedReceipts: number;
  readonly registryId: AccountId;
}

export function toOutcomeView(outcome: TransactionOutcome): OutcomeView {
  return {
    transactionId: outcome.transactionId,
    status: outcome.status,
    value: outcome.value,
    reason: outcome.reason,
    receipts: outcome.receipts.map((r) => ({
      receiptId: r.receiptId,
      predecessor: r.predecessor,
      receiver: r.receiver,
      method: r.method,
      status: r.status,
      blockHeight: r.blockHeight,
      gasBurnt: r.gasBurnt.toString(),
      logs: r.logs,
      result: r.result,
    })),
  };
}

// =============================================================================
// Service
// =============================================================================

export class SandboxService {
  private readonly _host: Host;
  private readonly _registryId: AccountId;
  private readonly _bootstrapBalance: bigint;
  private readonly _autoSettle: boolean;
  private readonly _logger: Logger;

  constructor(options: SandboxOptions) {
    this._logger = options.logger ?? pino({ level: "silent" });
    this._host = new Host({
      delivery: options.delivery === "shuffle"
        ? shuffledDelivery(options.deliverySeed)
        : fifoDelivery,
      logger: this._logger.child({ component: "host" }),
    });
    this._registryId = options.registryId;
    this._bootstrapBalance = options.bootstrapBalance;
    this._autoSettle = options.autoSettle ?? false;

    installShardvault(this._host, {
      registryId: options.registryId,
      initialBalance: options.registryBalance,
      registry: {
        ownerId: options.ownerId,
        commitOrder: options.commitOrder,
        resumption: options.resumption,
        infoRetry: { maxAttempts: options.infoRetryAttempts },
        logger: this._logger.child({ component: "registry" }),
      },
      vault: {
        settlement: options.settlement,
        logger: this._logger.child({ component: "vault" }),
      },
    });
    this._host.registerCode(ASSET_REGISTRY_CODE_ID, () => new InMemoryAssetRegistry());
    this.ensureAccount(options.ownerId);
  }

  get host(): Host {
    return this._host;
  }

  get registryId(): AccountId {
    return this._registryId;
  }

  // ─── Host ────────────────────────────────────────────────────────────

  status(): HostStatus {
    return {
      blockHeight: this._host.blockHeight,
      queuedReceipts: this._host.queuedReceipts,
      registryId: this._registryId,
    };
  }

  settle(maxRounds?: number): SettleView {
    const report = this._host.settle(maxRounds);
    this._logger.debug({ ...report }, "Settled host");
    return report;
  }

  outcome(transactionId: string): OutcomeView {
    return toOutcomeView(this._host.outcome(transactionId));
  }

  /**
   * Create `accountId` with the bootstrap balance unless it exists.
   */
  ensureAccount(accountId: AccountId): void {
    if (this._host.accountExists(accountId)) return;
    if (accountId === this._registryId || isSubAccountOf(accountId, this._registryId)) {
      throw new SandboxError(
        "RESERVED_ACCOUNT",
        `"${accountId}" is reserved for vaults of the registry`,
      );
    }
    this._host.createAccount(accountId, this._bootstrapBalance);
    this._logger.info({ accountId }, "Bootstrapped account");
  }

  balanceOf(accountId: AccountId): string {
    return this._host.balanceOf(accountId).toString();
  }

  // ─── Registry ────────────────────────────────────────────────────────

  createVault(principal: AccountId, args: CreateVaultArgs): SubmittedTransaction {
    return this.submit(principal, this._registryId, "createVault", args);
  }

  getVaultRecords(): readonly VaultRecord[] {
    const records = this._host.view(this._registryId, "getVaultRecords");
    return Array.isArray(records) ? records.filter(isVaultRecord) : [];
  }

  getVaultCount(): unknown {
    return this._host.view(this._registryId, "getVaultCount");
  }

  getVaultAddressByIndex(index: number): AccountId {
    const address = this._host.view(this._registryId, "getVaultAddressByIndex", { index });
    if (typeof address !== "string") {
      throw new SandboxError("VAULT_NOT_FOUND", `No vault at index ${String(index)}`);
    }
    return address;
  }

  getVaultByOrigin(origin: AssetOriginId): unknown {
    return this._host.view(this._registryId, "getVaultByOrigin", { origin });
  }

  requestVaultInfo(principal: AccountId, index: number): SubmittedTransaction {
    return this.submit(principal, this._registryId, "getVaultInfoByIndex", { index });
  }

  refreshAll(principal: AccountId, range: { from?: number; limit?: number } = {}): SubmittedTransaction {
    return this.submit(principal, this._registryId, "refreshAll", range);
  }

  getAllCachedInfo(): unknown {
    return this._host.view(this._registryId, "getAllCachedInfo");
  }

  setParams(principal: AccountId, index: number, params: VaultParams): SubmittedTransaction {
    const vault = this.getVaultAddressByIndex(index);
    return this.submit(principal, this._registryId, "setParams", { vault, ...params });
  }

  setFee(principal: AccountId, fee: string): SubmittedTransaction {
    return this.submit(principal, this._registryId, "setFee", { fee });
  }

  getFee(): unknown {
    return this._host.view(this._registryId, "getFee");
  }

  registryStatus(): Record<string, unknown> {
    const view = (method: string): unknown => this._host.view(this._registryId, method);
    return {
      registryId: this._registryId,
      owner: view("getOwner"),
      fee: view("getFee"),
      vaultCount: view("getVaultCount"),
      pending: view("getPendingProvisions"),
      provisioningFailures: view("getProvisioningFailures"),
      infoFailures: view("getInfoFailures"),
      paramsFailures: view("getParamsFailures"),
    };
  }

  registrySnapshot(): RegistrySnapshot {
    return this._host.componentAt(this._registryId, RegistryContract).snapshot();
  }

  // ─── Vaults ──────────────────────────────────────────────────────────

  vaultInfo(vaultId: AccountId): Record<string, unknown> {
    this.requireVault(vaultId);
    return {
      vaultId,
      origin: this._host.view(vaultId, "getOrigin"),
      info: this._host.view(vaultId, "getInfo"),
      params: this._host.view(vaultId, "getParams"),
      metadata: this._host.view(vaultId, "ft_metadata"),
      totalSupply: this._host.view(vaultId, "ft_total_supply"),
      supplyCheck: this._host.view(vaultId, "checkSupply"),
    };
  }

  vaultBalance(vaultId: AccountId, accountId: AccountId): Record<string, unknown> {
    this.requireVault(vaultId);
    return {
      accountId,
      balance: this._host.view(vaultId, "ft_balance_of", { accountId }),
      storage: this._host.view(vaultId, "storage_balance_of", { accountId }),
    };
  }

  listSettlements(vaultId: AccountId, status?: SettlementStatus): unknown {
    this.requireVault(vaultId);
    return this._host.view(vaultId, "listSettlements", status === undefined ? {} : { status });
  }

  getSettlement(vaultId: AccountId, id: string): unknown {
    this.requireVault(vaultId);
    const settlement = this._host.view(vaultId, "getSettlement", { id });
    if (settlement === null) {
      throw new SandboxError("SETTLEMENT_NOT_FOUND", `No settlement "${id}" on ${vaultId}`);
    }
    return settlement;
  }

  /** One asset id runs `deposit`, several run `batchDeposit`. */
  deposit(principal: AccountId, vaultId: AccountId, assetIds: readonly AssetId[]): SubmittedTransaction {
    this.requireVault(vaultId);
    const [first, ...rest] = assetIds;
    if (first !== undefined && rest.length === 0) {
      return this.submit(principal, vaultId, "deposit", { assetId: first });
    }
    return this.submit(principal, vaultId, "batchDeposit", { assetIds });
  }

  withdraw(
    principal: AccountId,
    vaultId: AccountId,
    assetIds: readonly AssetId[],
    receiverId?: AccountId,
  ): SubmittedTransaction {
    this.requireVault(vaultId);
    if (receiverId !== undefined) this.ensureAccount(receiverId);
    const receiver = receiverId === undefined ? {} : { receiverId };
    const [first, ...rest] = assetIds;
    if (first !== undefined && rest.length === 0) {
      return this.submit(principal, vaultId, "withdraw", { assetId: first, ...receiver });
    }
    return this.submit(principal, vaultId, "batchWithdraw", { assetIds, ...receiver });
  }

  swap(
    principal: AccountId,
    vaultId: AccountId,
    assetInId: AssetId,
    assetOutId: AssetId,
  ): SubmittedTransaction {
    this.requireVault(vaultId);
    return this.submit(principal, vaultId, "swap", { assetInId, assetOutId });
  }

  /**
   * Register `accountId` (default: the principal) with the vault's
   * share ledger, attaching the minimum storage balance.
   */
  registerStorage(principal: AccountId, vaultId: AccountId, accountId?: AccountId): SubmittedTransaction {
    this.requireVault(vaultId);
    const args = accountId === undefined ? {} : { accountId };
    return this.submit(principal, vaultId, "storage_deposit", args, STORAGE_BALANCE_MIN);
  }

  transferShares(
    principal: AccountId,
    vaultId: AccountId,
    receiverId: AccountId,
    amount: string,
    memo?: string,
  ): SubmittedTransaction {
    this.requireVault(vaultId);
    const args = memo === undefined ? { receiverId, amount } : { receiverId, amount, memo };
    return this.submit(principal, vaultId, "ft_transfer", args, ONE_YOCTO);
  }

  // ─── Asset registries ────────────────────────────────────────────────

  /**
   * Deploy an asset registry at `origin` unless one is already there.
   */
  ensureAssetRegistry(origin: AssetOriginId): void {
    if (!this._host.accountExists(origin)) {
      this.ensureAccount(origin);
      this._host.genesisDeploy(origin, ASSET_REGISTRY_CODE_ID);
      this._logger.info({ origin }, "Deployed asset registry");
      return;
    }
    if (this._host.codeIdOf(origin) !== ASSET_REGISTRY_CODE_ID) {
      throw new SandboxError("NOT_AN_ASSET_REGISTRY", `"${origin}" is not an asset registry`);
    }
  }

  mint(origin: AssetOriginId, tokenId: AssetId, ownerId: AccountId): SubmittedTransaction {
    this.ensureAssetRegistry(origin);
    this.ensureAccount(ownerId);
    return this.submit(origin, origin, "nft_mint", { tokenId, ownerId });
  }

  approve(
    principal: AccountId,
    origin: AssetOriginId,
    tokenId: AssetId,
    accountId: AccountId,
  ): SubmittedTransaction {
    this.requireAssetRegistry(origin);
    return this.submit(principal, origin, "nft_approve", { tokenId, accountId });
  }

  tokensOf(origin: AssetOriginId, accountId: AccountId): unknown {
    this.requireAssetRegistry(origin);
    return this._host.view(origin, "nft_tokens_for_owner", { accountId });
  }

  token(origin: AssetOriginId, tokenId: AssetId): unknown {
    this.requireAssetRegistry(origin);
    const token = this._host.view(origin, "nft_token", { tokenId });
    if (token === null) {
      throw new SandboxError("TOKEN_NOT_FOUND", `No token "${tokenId}" on ${origin}`);
    }
    return token;
  }

  // ─── Internals ───────────────────────────────────────────────────────

  private submit(
    principal: AccountId,
    receiver: AccountId,
    method: string,
    args: unknown,
    deposit?: bigint,
  ): SubmittedTransaction {
    this.ensureAccount(principal);
    const { transactionId, result }: TransactResult = this._host.transact(
      principal,
      receiver,
      method,
      args,
      deposit === undefined ? {} : { deposit },
    );

    if (result.status === "failed") {
      this._logger.info(
        { transactionId, principal, receiver, method, reason: result.reason },
        "Transaction failed",
      );
      throw new SandboxError(result.code ?? "TRANSACTION_FAILED", result.reason, transactionId);
    }

    if (this._autoSettle) this.settle();
    return {
      transactionId,
      value: result.status === "success" ? result.value : null,
      outcome: this.outcome(transactionId),
    };
  }

  private requireVault(vaultId: AccountId): void {
    if (!this._host.accountExists(vaultId) || this._host.codeIdOf(vaultId) !== VAULT_CODE_ID) {
      throw new SandboxError("VAULT_NOT_FOUND", `No vault is deployed at "${vaultId}"`);
    }
  }

  private requireAssetRegistry(origin: AssetOriginId): void {
    if (!this._host.accountExists(origin)) {
      throw new SandboxError("ASSET_REGISTRY_NOT_FOUND", `No asset registry at "${origin}"`);
    }
    if (this._host.codeIdOf(origin) !== ASSET_REGISTRY_CODE_ID) {
      throw new SandboxError("NOT_AN_ASSET_REGISTRY", `"${origin}" is not an asset registry`);
    }
  }
}

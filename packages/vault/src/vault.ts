/**
 * Vault: custody component for one asset-origin class.
 *
 * Holds deposited unique assets and issues fungible shares against
 * them at a fixed rate (`unitValue` share units per asset).
 *
 * Composes:
 * - ShareLedger (balances, total supply, reserve)
 * - SettlementBook (saga intents for asset transfers)
 *
 * In confirmed mode the ledger changes only when a transfer callback
 * reports success: deposits credit per confirmed asset, withdrawals
 * hold the shares in the ledger's reserve and burn or release them
 * per leg. In optimistic mode the ledger changes first and nothing is
 * reconciled; integrators must treat those funds as at risk until the
 * transfers land.
 *
 * Every transfer names the account the asset must belong to: the
 * caller for assets coming in, the vault for assets going out. An
 * approval alone never lets one account deposit another's asset, and
 * a withdrawal can only release an asset the vault holds.
 *
 * swap() does not check that the caller may draw `assetOutId` out of
 * the pool. That is an open safety gap, not a resolved trust model.
 */

import pino from "pino";
import type { Logger } from "pino";
import { z } from "zod";
import {
  ShareLedger,
  ONE_SHARE,
  checkedMul,
  parseU128,
} from "@shardvault/ledger";
import {
  AccountIdSchema,
  U128Schema,
  assertPrivate,
  methodNotFound,
  parseArgs,
  requireSingleResult,
  ONE_YOCTO,
  TGAS,
} from "@shardvault/runtime";
import type {
  CallResult,
  Component,
  ExecutionContext,
  PendingCall,
  Restore,
} from "@shardvault/runtime";
import type {
  AccountId,
  AssetId,
  AssetOriginId,
  PublicVaultInfo,
  VaultParams,
} from "@shardvault/types";
import { assertValidMetadata, buildMetadata } from "./metadata.js";
import type { ShareMetadata } from "./metadata.js";
import { SettlementBook } from "./settlement.js";
import type {
  LegStatus,
  SettlementIntent,
  SettlementLeg,
  SettlementMode,
  StorageBalance,
  StorageBalanceBounds,
  VaultOptions,
  VaultState,
} from "./types.js";
import { VaultError } from "./types.js";

// =============================================================================
// Constants
// =============================================================================

/** Share units one deposited asset is worth at init: 100 whole shares. */
export const UNIT_VALUE = 100n * ONE_SHARE;

/** Deposit that registers an account with the share ledger. */
export const STORAGE_BALANCE_MIN = 1_250_000_000_000_000_000_000n;

export const DEFAULT_TRANSFER_GAS = 10n * TGAS;
export const DEFAULT_CALLBACK_GAS = 5n * TGAS;

// =============================================================================
// Argument schemas
// =============================================================================

const AssetIdSchema = z.string().min(1);
const AssetIdsSchema = z.array(AssetIdSchema);

const InitArgs = z.object({
  origin: AccountIdSchema,
  name: z.string(),
  symbol: z.string(),
  media: z.string(),
});
const DepositArgs = z.object({ assetId: AssetIdSchema });
const BatchDepositArgs = z.object({ assetIds: AssetIdsSchema });
const WithdrawArgs = z.object({ assetId: AssetIdSchema, receiverId: AccountIdSchema.optional() });
const BatchWithdrawArgs = z.object({
  assetIds: AssetIdsSchema,
  receiverId: AccountIdSchema.optional(),
});
const SwapArgs = z.object({ assetInId: AssetIdSchema, assetOutId: AssetIdSchema });
const SetParamsArgs = z.object({
  name: z.string(),
  symbol: z.string(),
  unitValue: U128Schema,
  media: z.string(),
});
const LegArgs = z.object({ intentId: z.string(), assetId: AssetIdSchema });
const SwapCallbackArgs = z.object({ intentId: z.string() });
const AccountArgs = z.object({ accountId: AccountIdSchema });
const FtTransferArgs = z.object({
  receiverId: AccountIdSchema,
  amount: U128Schema,
  memo: z.string().optional(),
});
const StorageDepositArgs = z.object({ accountId: AccountIdSchema.optional() });
const StorageUnregisterArgs = z.object({ force: z.boolean().optional() });
const ListSettlementsArgs = z.object({
  status: z.enum(["pending", "settled", "partially_failed", "failed"]).optional(),
});
const SettlementArgs = z.object({ id: z.string() });

// =============================================================================
// Vault
// =============================================================================

export class VaultContract implements Component {
  private _state: VaultState | null = null;
  private readonly _ledger: ShareLedger;
  private readonly _book = new SettlementBook();
  /** Storage deposit each account paid through storage_deposit */
  private readonly _storagePaid = new Map<AccountId, bigint>();
  private readonly _settlement: SettlementMode;
  private readonly _transferGas: bigint;
  private readonly _callbackGas: bigint;
  private readonly _logger: Logger;
  private _ctx: ExecutionContext | null = null;

  constructor(options: VaultOptions = {}) {
    this._settlement = options.settlement ?? "confirmed";
    this._transferGas = options.transferGas ?? DEFAULT_TRANSFER_GAS;
    this._callbackGas = options.callbackGas ?? DEFAULT_CALLBACK_GAS;
    this._logger = options.logger ?? pino({ level: "silent" });
    this._ledger = new ShareLedger({
      onAccountClosed: (accountId, balance) => {
        this.emit(`Closed @${accountId} with ${balance.toString()}`);
      },
      onTokensBurned: (accountId, amount) => {
        this.emit(`Account @${accountId} burned ${amount.toString()}`);
      },
    });
  }

  get settlement(): SettlementMode {
    return this._settlement;
  }

  get ledger(): ShareLedger {
    return this._ledger;
  }

  get settlements(): SettlementBook {
    return this._book;
  }

  get state(): VaultState | null {
    return this._state;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Component
  // ───────────────────────────────────────────────────────────────────────

  invoke(method: string, ctx: ExecutionContext, args: unknown): unknown {
    this._ctx = ctx;
    try {
      return this.dispatch(method, ctx, args);
    } finally {
      this._ctx = null;
    }
  }

  checkpoint(): Restore {
    const state = this._state;
    const ledger = this._ledger.snapshot();
    const book = this._book.snapshot();
    const storagePaid = new Map(this._storagePaid);
    return () => {
      this._state = state;
      this._ledger.restore(ledger);
      this._book.restore(book);
      this._storagePaid.clear();
      for (const [account, paid] of storagePaid) this._storagePaid.set(account, paid);
    };
  }

  private dispatch(method: string, ctx: ExecutionContext, args: unknown): unknown {
    switch (method) {
      // Lifecycle
      case "init":
        return this.init(ctx, parseArgs(InitArgs, args, method));
      case "setParams":
        return this.setParams(ctx, parseArgs(SetParamsArgs, args, method));

      // Views
      case "getInfo":
        return this.getInfo();
      case "getOrigin":
        return this.requireState().origin;
      case "getParams":
        return this.getParams();
      case "ft_metadata":
        return this.ftMetadata();
      case "ft_total_supply":
        this.requireState();
        return this._ledger.totalSupply.toString();
      case "ft_balance_of":
        this.requireState();
        return this._ledger.balanceOf(parseArgs(AccountArgs, args, method).accountId).toString();
      case "storage_balance_of":
        return this.storageBalanceOf(parseArgs(AccountArgs, args, method).accountId);
      case "storage_balance_bounds":
        return this.storageBalanceBounds();
      case "listSettlements":
        return this._book.list(parseArgs(ListSettlementsArgs, args, method).status);
      case "getSettlement":
        return this._book.get(parseArgs(SettlementArgs, args, method).id) ?? null;
      case "checkSupply": {
        const check = this._ledger.checkSupply();
        return {
          totalSupply: check.totalSupply.toString(),
          sumOfBalances: check.sumOfBalances.toString(),
          reserved: check.reserved.toString(),
          consistent: check.consistent,
          settled: check.settled,
        };
      }

      // Custody
      case "deposit":
        return this.deposit(ctx, [parseArgs(DepositArgs, args, method).assetId]);
      case "batchDeposit":
        return this.deposit(ctx, parseArgs(BatchDepositArgs, args, method).assetIds);
      case "withdraw": {
        const a = parseArgs(WithdrawArgs, args, method);
        return this.withdraw(ctx, [a.assetId], a.receiverId);
      }
      case "batchWithdraw": {
        const a = parseArgs(BatchWithdrawArgs, args, method);
        return this.withdraw(ctx, a.assetIds, a.receiverId);
      }
      case "swap": {
        const a = parseArgs(SwapArgs, args, method);
        return this.swap(ctx, a.assetInId, a.assetOutId);
      }

      // Settlement callbacks
      case "onDepositResolved":
        assertPrivate(ctx, method);
        return this.onDepositResolved(ctx, parseArgs(LegArgs, args, method));
      case "onWithdrawResolved":
        assertPrivate(ctx, method);
        return this.onWithdrawResolved(ctx, parseArgs(LegArgs, args, method));
      case "onSwapPulled":
        assertPrivate(ctx, method);
        return this.onSwapPulled(ctx, parseArgs(SwapCallbackArgs, args, method).intentId);
      case "onSwapReleased":
        assertPrivate(ctx, method);
        return this.onSwapReleased(ctx, parseArgs(SwapCallbackArgs, args, method).intentId);

      // Fungible token
      case "ft_transfer":
        return this.ftTransfer(ctx, parseArgs(FtTransferArgs, args, method));
      case "storage_deposit":
        return this.storageDeposit(ctx, parseArgs(StorageDepositArgs, args, method).accountId);
      case "storage_unregister":
        return this.storageUnregister(
          ctx,
          parseArgs(StorageUnregisterArgs, args, method).force ?? false,
        );

      default:
        throw methodNotFound("VaultContract", method);
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ───────────────────────────────────────────────────────────────────────

  /**
   * One-time constructor. The calling principal becomes the registry,
   * the only account allowed to update parameters. The vault's own
   * account is seeded with one asset's worth of shares.
   */
  private init(
    ctx: ExecutionContext,
    args: { origin: AssetOriginId; name: string; symbol: string; media: string },
  ): null {
    if (this._state !== null) {
      throw new VaultError("ALREADY_INITIALIZED", "Vault is already initialized");
    }
    assertValidMetadata(buildMetadata(args.name, args.symbol, args.media));

    this._state = {
      origin: args.origin,
      registry: ctx.predecessorAccountId,
      unitValue: UNIT_VALUE,
      name: args.name,
      symbol: args.symbol,
      media: args.media,
    };
    this._ledger.registerAccount(ctx.currentAccountId);
    this._ledger.deposit(ctx.currentAccountId, UNIT_VALUE);
    this._logger.info(
      { vault: ctx.currentAccountId, origin: args.origin, registry: ctx.predecessorAccountId },
      "Vault initialized",
    );
    return null;
  }

  /**
   * Overwrite metadata and the exchange rate. Existing balances are
   * not rescaled.
   */
  private setParams(ctx: ExecutionContext, args: VaultParams): null {
    const state = this.requireState();
    if (ctx.predecessorAccountId !== state.registry) {
      throw new VaultError("UNAUTHORIZED", "Only the registry can update vault parameters");
    }
    const unitValue = parseU128(args.unitValue);
    if (unitValue === 0n) {
      throw new VaultError("INVALID_AMOUNT", "Unit value must be positive");
    }
    assertValidMetadata(buildMetadata(args.name, args.symbol, args.media));

    this._state = {
      ...state,
      name: args.name,
      symbol: args.symbol,
      unitValue,
      media: args.media,
    };
    ctx.log(`Parameters updated: unit value ${unitValue.toString()}`);
    return null;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Views
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Public projection. `reportedSupply` is the number of deposited
   * assets represented: totalSupply / unitValue - 1 for the seed.
   */
  private getInfo(): PublicVaultInfo {
    const state = this.requireState();
    const totalSupply = this._ledger.totalSupply;
    if (totalSupply < state.unitValue) {
      throw new VaultError(
        "ARITHMETIC_UNDERFLOW",
        `Total supply ${totalSupply.toString()} is below the unit value ${state.unitValue.toString()}`,
      );
    }
    return {
      name: state.name,
      symbol: state.symbol,
      reportedSupply: (totalSupply / state.unitValue - 1n).toString(),
      media: state.media,
    };
  }

  private getParams(): VaultParams {
    const state = this.requireState();
    return {
      name: state.name,
      symbol: state.symbol,
      unitValue: state.unitValue.toString(),
      media: state.media,
    };
  }

  private ftMetadata(): ShareMetadata {
    const state = this.requireState();
    return buildMetadata(state.name, state.symbol, state.media);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Custody
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Move assets into custody and credit `unitValue` shares per asset
   * to the caller. Returns the settlement id, or null when optimistic.
   */
  private deposit(ctx: ExecutionContext, assetIds: readonly AssetId[]): string | null {
    const state = this.requireState();
    assertBatch(assetIds);
    const caller = ctx.predecessorAccountId;
    const self = ctx.currentAccountId;

    if (this._settlement === "optimistic") {
      const amount = checkedMul(state.unitValue, BigInt(assetIds.length));
      for (const assetId of assetIds) {
        this.transferAsset(ctx, state, assetId, caller, self);
      }
      this.ensureRegistered(caller);
      this._ledger.deposit(caller, amount);
      return null;
    }

    const intent = this._book.open({
      kind: "deposit",
      accountId: caller,
      legs: assetIds.map((assetId) => ({ assetId, receiverId: self })),
      unitValue: state.unitValue,
      blockHeight: ctx.blockHeight,
    });
    for (const assetId of assetIds) {
      this.transferAsset(ctx, state, assetId, caller, self).andThen(
        self,
        "onDepositResolved",
        { intentId: intent.id, assetId },
        { gas: this._callbackGas },
      );
    }
    return intent.id;
  }

  /**
   * Send assets out of custody and destroy `unitValue` shares per
   * asset from the caller. The asset goes to `receiverId`, defaulting
   * to the caller.
   */
  private withdraw(
    ctx: ExecutionContext,
    assetIds: readonly AssetId[],
    receiverId: AccountId | undefined,
  ): string | null {
    const state = this.requireState();
    assertBatch(assetIds);
    const caller = ctx.predecessorAccountId;
    const receiver = receiverId ?? caller;
    const amount = checkedMul(state.unitValue, BigInt(assetIds.length));
    if (this._ledger.balanceOf(caller) < amount) {
      throw new VaultError(
        "INSUFFICIENT_BALANCE",
        assetIds.length === 1
          ? "Token balance is smaller than the asset value"
          : "Token balance is smaller than the asset batch value",
      );
    }

    if (this._settlement === "optimistic") {
      for (const assetId of assetIds) {
        this.transferAsset(ctx, state, assetId, ctx.currentAccountId, receiver);
      }
      this._ledger.burn(caller, amount);
      return null;
    }

    this._ledger.reserve(caller, amount);
    const intent = this._book.open({
      kind: "withdraw",
      accountId: caller,
      legs: assetIds.map((assetId) => ({ assetId, receiverId: receiver })),
      unitValue: state.unitValue,
      blockHeight: ctx.blockHeight,
    });
    for (const assetId of assetIds) {
      this.transferAsset(ctx, state, assetId, ctx.currentAccountId, receiver).andThen(
        ctx.currentAccountId,
        "onWithdrawResolved",
        { intentId: intent.id, assetId },
        { gas: this._callbackGas },
      );
    }
    return intent.id;
  }

  /**
   * Pull `assetInId` from the caller and send `assetOutId` to the
   * caller. The ledger is not touched.
   */
  private swap(ctx: ExecutionContext, assetInId: AssetId, assetOutId: AssetId): string | null {
    const state = this.requireState();
    assertBatch([assetInId, assetOutId]);
    const caller = ctx.predecessorAccountId;
    const self = ctx.currentAccountId;

    if (this._settlement === "optimistic") {
      this.transferAsset(ctx, state, assetInId, caller, self);
      this.transferAsset(ctx, state, assetOutId, self, caller);
      return null;
    }

    const intent = this._book.open({
      kind: "swap",
      accountId: caller,
      legs: [
        { assetId: assetInId, receiverId: self },
        { assetId: assetOutId, receiverId: caller },
      ],
      unitValue: state.unitValue,
      blockHeight: ctx.blockHeight,
    });
    this.transferAsset(ctx, state, assetInId, caller, self).andThen(
      self,
      "onSwapPulled",
      { intentId: intent.id },
      { gas: this._transferGas + 2n * this._callbackGas },
    );
    return intent.id;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Settlement callbacks
  // ───────────────────────────────────────────────────────────────────────

  private onDepositResolved(
    ctx: ExecutionContext,
    args: { intentId: string; assetId: AssetId },
  ): LegStatus {
    const result = requireSingleResult(ctx);
    const intent = this._book.require(args.intentId);

    if (result.status === "success") {
      const updated = this._book.confirmLeg(args.intentId, args.assetId, ctx.blockHeight);
      this.ensureRegistered(intent.accountId);
      this._ledger.deposit(intent.accountId, parseU128(intent.unitValue));
      this.logResolution(ctx, updated);
      return "confirmed";
    }

    const reason = failureReason(result);
    const updated = this._book.failLeg(args.intentId, args.assetId, reason, ctx.blockHeight);
    ctx.log(`Deposit of ${args.assetId} failed: ${reason}`);
    this.logResolution(ctx, updated);
    return "failed";
  }

  private onWithdrawResolved(
    ctx: ExecutionContext,
    args: { intentId: string; assetId: AssetId },
  ): LegStatus {
    const result = requireSingleResult(ctx);
    const intent = this._book.require(args.intentId);
    const amount = parseU128(intent.unitValue);

    if (result.status === "success") {
      const updated = this._book.confirmLeg(args.intentId, args.assetId, ctx.blockHeight);
      this._ledger.burnReserved(intent.accountId, amount);
      this.logResolution(ctx, updated);
      return "confirmed";
    }

    const reason = failureReason(result);
    const updated = this._book.failLeg(args.intentId, args.assetId, reason, ctx.blockHeight);
    this._ledger.releaseReserved(intent.accountId, amount);
    ctx.log(`Withdrawal of ${args.assetId} failed, ${amount.toString()} returned to @${intent.accountId}`);
    this.logResolution(ctx, updated);
    return "failed";
  }

  private onSwapPulled(ctx: ExecutionContext, intentId: string): LegStatus {
    const result = requireSingleResult(ctx);
    const state = this.requireState();
    const [pull, release] = swapLegs(this._book.require(intentId));

    if (result.status === "success") {
      this._book.confirmLeg(intentId, pull.assetId, ctx.blockHeight);
      const self = ctx.currentAccountId;
      this.transferAsset(ctx, state, release.assetId, self, release.receiverId).andThen(
        self,
        "onSwapReleased",
        { intentId },
        { gas: this._callbackGas },
      );
      return "confirmed";
    }

    const reason = failureReason(result);
    this._book.failLeg(intentId, pull.assetId, reason, ctx.blockHeight);
    const updated = this._book.failLeg(
      intentId,
      release.assetId,
      `Not attempted: pull of ${pull.assetId} failed`,
      ctx.blockHeight,
    );
    ctx.log(`Swap pull of ${pull.assetId} failed: ${reason}`);
    this.logResolution(ctx, updated);
    return "failed";
  }

  private onSwapReleased(ctx: ExecutionContext, intentId: string): LegStatus {
    const result = requireSingleResult(ctx);
    const [, release] = swapLegs(this._book.require(intentId));

    if (result.status === "success") {
      const updated = this._book.confirmLeg(intentId, release.assetId, ctx.blockHeight);
      this.logResolution(ctx, updated);
      return "confirmed";
    }

    const reason = failureReason(result);
    const updated = this._book.failLeg(intentId, release.assetId, reason, ctx.blockHeight);
    ctx.log(`Swap release of ${release.assetId} failed: ${reason}`);
    this.logResolution(ctx, updated);
    return "failed";
  }

  // ───────────────────────────────────────────────────────────────────────
  // Fungible token and storage
  // ───────────────────────────────────────────────────────────────────────

  private ftTransfer(
    ctx: ExecutionContext,
    args: { receiverId: AccountId; amount: string; memo?: string },
  ): null {
    this.requireState();
    assertOneYocto(ctx);
    const amount = parseU128(args.amount);
    const sender = ctx.predecessorAccountId;
    this._ledger.transfer(sender, args.receiverId, amount);
    ctx.log(
      `Transfer ${amount.toString()} from ${sender} to ${args.receiverId}` +
        (args.memo === undefined ? "" : `, memo: ${args.memo}`),
    );
    return null;
  }

  /**
   * Register an account with the share ledger. An account that has
   * already paid gets the whole deposit back; otherwise anything above
   * STORAGE_BALANCE_MIN is refunded. An account registered by a deposit
   * callback has paid nothing and may pay here.
   */
  private storageDeposit(ctx: ExecutionContext, accountId: AccountId | undefined): StorageBalance {
    this.requireState();
    const account = accountId ?? ctx.predecessorAccountId;
    const attached = ctx.attachedDeposit;

    if (this._storagePaid.has(account)) {
      ctx.log("The account is already registered, refunding the deposit");
      this.refund(ctx, attached);
    } else {
      if (attached < STORAGE_BALANCE_MIN) {
        throw new VaultError(
          "INSUFFICIENT_DEPOSIT",
          `The attached deposit is less than the minimum storage balance ${STORAGE_BALANCE_MIN.toString()}`,
        );
      }
      this.ensureRegistered(account);
      this._storagePaid.set(account, STORAGE_BALANCE_MIN);
      this.refund(ctx, attached - STORAGE_BALANCE_MIN);
    }
    return { total: STORAGE_BALANCE_MIN.toString(), available: "0" };
  }

  /**
   * Close the caller's account. A non-zero balance needs `force` and
   * is burned. Refunds the attached yocto and whatever the account paid
   * for storage. Returns false when the account was not registered.
   */
  private storageUnregister(ctx: ExecutionContext, force: boolean): boolean {
    this.requireState();
    assertOneYocto(ctx);
    const account = ctx.predecessorAccountId;
    if (!this._ledger.isRegistered(account)) {
      ctx.log(`The account ${account} is not registered`);
      return false;
    }

    const balance = this._ledger.unregister(account, force);
    if (balance > 0n) {
      this.emit(`Account @${account} burned ${balance.toString()}`);
    }
    const paid = this._storagePaid.get(account) ?? 0n;
    this._storagePaid.delete(account);
    this.refund(ctx, paid + ONE_YOCTO);
    return true;
  }

  private storageBalanceOf(accountId: AccountId): StorageBalance | null {
    this.requireState();
    if (!this._ledger.isRegistered(accountId)) return null;
    const paid = this._storagePaid.get(accountId) ?? 0n;
    return { total: paid.toString(), available: "0" };
  }

  private storageBalanceBounds(): StorageBalanceBounds {
    return { min: STORAGE_BALANCE_MIN.toString(), max: STORAGE_BALANCE_MIN.toString() };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private helpers
  // ───────────────────────────────────────────────────────────────────────

  private requireState(): VaultState {
    if (this._state === null) {
      throw new VaultError("NOT_INITIALIZED", "Vault is not initialized");
    }
    return this._state;
  }

  private ensureRegistered(accountId: AccountId): void {
    if (!this._ledger.isRegistered(accountId)) {
      this._ledger.registerAccount(accountId);
    }
  }

  /**
   * Ask the asset registry to move `assetId` from `senderId` to
   * `receiverId`. The transfer fails unless `senderId` owns the asset.
   */
  private transferAsset(
    ctx: ExecutionContext,
    state: VaultState,
    assetId: AssetId,
    senderId: AccountId,
    receiverId: AccountId,
  ): PendingCall {
    return ctx.call(
      state.origin,
      "nft_transfer",
      { receiverId, tokenId: assetId, senderId },
      { deposit: ONE_YOCTO, gas: this._transferGas },
    );
  }

  private refund(ctx: ExecutionContext, amount: bigint): void {
    if (amount > 0n) {
      ctx.batch(ctx.predecessorAccountId).transfer(amount).submit();
    }
  }

  private emit(line: string): void {
    this._ctx?.log(line);
  }

  private logResolution(ctx: ExecutionContext, intent: SettlementIntent): void {
    if (intent.status === "pending") return;
    this._logger.info(
      { vault: ctx.currentAccountId, settlementId: intent.id, status: intent.status },
      "Settlement resolved",
    );
  }
}

// =============================================================================
// Helpers
// =============================================================================

function assertBatch(assetIds: readonly AssetId[]): void {
  if (assetIds.length === 0) {
    throw new VaultError("EMPTY_BATCH", "At least one asset id is required");
  }
  const seen = new Set<AssetId>();
  for (const assetId of assetIds) {
    if (seen.has(assetId)) {
      throw new VaultError("DUPLICATE_ASSET", `Asset '${assetId}' appears more than once`);
    }
    seen.add(assetId);
  }
}

function assertOneYocto(ctx: ExecutionContext): void {
  if (ctx.attachedDeposit !== ONE_YOCTO) {
    throw new VaultError("INVALID_DEPOSIT", "Requires an attached deposit of exactly 1 yocto");
  }
}

function failureReason(result: CallResult<unknown>): string {
  return result.status === "failed" ? result.reason : "Transfer did not resolve";
}

function swapLegs(intent: SettlementIntent): readonly [SettlementLeg, SettlementLeg] {
  const [pull, release] = intent.legs;
  if (intent.kind !== "swap" || pull === undefined || release === undefined) {
    throw new VaultError("SETTLEMENT_NOT_FOUND", `Settlement '${intent.id}' is not a swap`);
  }
  return [pull, release];
}

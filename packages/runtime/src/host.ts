/**
 * @shardvault/runtime: In-process execution host.
 *
 * Holds accounts and their deployed components, and executes receipts
 * one at a time. Each component instance is single-threaded: a receipt
 * runs to completion before the next one starts, and suspension happens
 * only where a request crosses to another account.
 *
 * API surface:
 * - createAccount() / registerCode() / genesisDeploy(): bootstrap
 * - transact(): submit a signed transaction; its first receipt runs now
 * - settle(): deliver queued receipts block by block
 * - view(): read-only call, requests prohibited
 * - outcome(): result and receipt tree of a transaction
 *
 * Rules:
 * - A failed receipt leaves its receiver as it was and refunds its deposit
 * - Outbound requests of a failed receipt are never enqueued
 * - A callback runs only after every receipt it depends on has resolved
 */

import pino from "pino";
import type { Logger } from "pino";
import type { AccountId } from "@shardvault/types";
import { isSubAccountOf, isValidAccountId } from "@shardvault/types";
import type { CallResult } from "./call-result.js";
import { failedFromError, pending, success } from "./call-result.js";
import type { ContextEnvironment, OutboundRequest } from "./context.js";
import { ReceiptContext } from "./context.js";
import { fifoDelivery } from "./delivery.js";
import { computeReceiptId, derivePublicKey } from "./receipt-id.js";
import type {
  Action,
  Component,
  ComponentFactory,
  DeliveryPolicy,
  HostOptions,
  Receipt,
  ReceiptOutcome,
  Restore,
  SettleReport,
  TransactOptions,
  TransactResult,
  TransactionOutcome,
} from "./types.js";
import { HostError, TGAS } from "./types.js";

interface AccountState {
  balance: bigint;
  readonly keys: Set<string>;
  component: Component | null;
  codeId: string | null;
}

interface AccountCheckpoint {
  readonly existed: boolean;
  readonly balance: bigint;
  readonly keys: readonly string[];
  readonly component: Component | null;
  readonly codeId: string | null;
  readonly restoreComponent: Restore | null;
}

export class Host {
  private readonly _accounts = new Map<AccountId, AccountState>();
  private readonly _code = new Map<string, ComponentFactory>();
  private readonly _queue: Receipt[] = [];
  private readonly _results = new Map<string, CallResult<unknown>>();
  private readonly _outcomes = new Map<string, ReceiptOutcome>();
  private readonly _transactions = new Map<string, string[]>();
  private _nonce = 0;
  private _blockHeight = 0;

  private readonly _gasPerReceipt: bigint;
  private readonly _defaultTransactionGas: bigint;
  private readonly _delivery: DeliveryPolicy;
  private readonly _maxRounds: number;
  private readonly _logger: Logger;

  constructor(options: HostOptions = {}) {
    this._gasPerReceipt = options.gasPerReceipt ?? TGAS;
    this._defaultTransactionGas = options.defaultTransactionGas ?? 300n * TGAS;
    this._delivery = options.delivery ?? fifoDelivery;
    this._maxRounds = options.maxRounds ?? 10_000;
    this._logger = options.logger ?? pino({ level: "silent" });
  }

  // ─── Bootstrap ───────────────────────────────────────────────────────

  /**
   * Genesis account creation. Receipts can only create sub-accounts of
   * their predecessor; top-level accounts come from here.
   */
  createAccount(accountId: AccountId, balance: bigint): void {
    if (!isValidAccountId(accountId)) {
      throw new HostError("INVALID_ACCOUNT_ID", `Invalid account id "${accountId}"`);
    }
    if (this._accounts.has(accountId)) {
      throw new HostError("ACCOUNT_EXISTS", `Account "${accountId}" already exists`);
    }
    if (balance < 0n) {
      throw new HostError("INSUFFICIENT_FUNDS", "Genesis balance cannot be negative");
    }
    this._accounts.set(accountId, {
      balance,
      keys: new Set([derivePublicKey(accountId)]),
      component: null,
      codeId: null,
    });
  }

  registerCode(codeId: string, factory: ComponentFactory): void {
    this._code.set(codeId, factory);
  }

  /**
   * Deploy code at genesis, without a receipt.
   */
  genesisDeploy(accountId: AccountId, codeId: string): void {
    const account = this.requireAccount(accountId);
    account.component = this.instantiate(codeId);
    account.codeId = codeId;
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  get blockHeight(): number {
    return this._blockHeight;
  }

  /** Receipts issued but not yet executed. */
  get queuedReceipts(): number {
    return this._queue.length;
  }

  accountExists(accountId: AccountId): boolean {
    return this._accounts.has(accountId);
  }

  balanceOf(accountId: AccountId): bigint {
    return this.requireAccount(accountId).balance;
  }

  keysOf(accountId: AccountId): readonly string[] {
    return [...this.requireAccount(accountId).keys];
  }

  codeIdOf(accountId: AccountId): string | null {
    return this.requireAccount(accountId).codeId;
  }

  /**
   * The component deployed at `accountId`, narrowed to `ctor`.
   */
  componentAt<C extends Component>(
    accountId: AccountId,
    ctor: abstract new (...args: never[]) => C,
  ): C {
    const component = this.requireAccount(accountId).component;
    if (component === null) {
      throw new HostError("NO_COMPONENT", `No component is deployed at "${accountId}"`);
    }
    if (!(component instanceof ctor)) {
      throw new HostError(
        "NO_COMPONENT",
        `Component at "${accountId}" is not a ${ctor.name}`,
      );
    }
    return component;
  }

  // ─── Transactions ────────────────────────────────────────────────────

  /**
   * Submit a transaction signed by `signer`. The first receipt executes
   * immediately; receipts it issues wait for settle().
   */
  transact(
    signer: AccountId,
    receiver: AccountId,
    method: string,
    args: unknown = {},
    options: TransactOptions = {},
  ): TransactResult {
    const deposit = options.deposit ?? 0n;
    const gas = options.gas ?? this._defaultTransactionGas;
    this.debit(signer, deposit);

    const actions: readonly Action[] = [
      { kind: "functionCall", method, args: structuredClone(args), deposit, gas },
    ];
    const id = this.allocateId(signer, receiver, actions);
    const receipt: Receipt = {
      id,
      transactionId: id,
      predecessor: signer,
      signer,
      signerPublicKey: derivePublicKey(signer),
      receiver,
      actions,
      deposit,
      gas,
      dependsOn: [],
      notBeforeBlock: this._blockHeight,
    };
    this._transactions.set(id, []);
    this.track(receipt);

    const result = this.execute(receipt);
    return { transactionId: id, result };
  }

  /**
   * Deliver queued receipts until none is left or the round limit is
   * reached. Each round is one block: the receipts ready at its start
   * execute in the delivery policy's order.
   */
  settle(maxRounds: number = this._maxRounds): SettleReport {
    let rounds = 0;
    let executed = 0;

    while (this._queue.length > 0 && rounds < maxRounds) {
      const ready = this._queue.filter((receipt) => this.isReady(receipt));
      for (const receipt of this._delivery.order(ready)) {
        this._queue.splice(this._queue.indexOf(receipt), 1);
        this.execute(receipt);
        executed++;
      }
      rounds++;
      this._blockHeight++;
    }

    return {
      rounds,
      executed,
      blockHeight: this._blockHeight,
      remaining: this._queue.length,
    };
  }

  /**
   * Read-only call. State changes are rolled back and requests throw
   * CALL_PROHIBITED.
   */
  view(accountId: AccountId, method: string, args: unknown = {}): unknown {
    const component = this.requireComponent(accountId);
    const restore = component.checkpoint();
    const ctx = new ReceiptContext(
      {
        receiptId: "view",
        currentAccountId: accountId,
        predecessorAccountId: accountId,
        signerAccountId: accountId,
        signerPublicKey: derivePublicKey(accountId),
        attachedDeposit: 0n,
        prepaidGas: this._defaultTransactionGas,
        gasBurnt: 0n,
        blockHeight: this._blockHeight,
        promiseResults: [],
        isView: true,
      },
      this.environment(),
    );
    try {
      return structuredClone(component.invoke(method, ctx, structuredClone(args)));
    } finally {
      restore();
    }
  }

  outcome(transactionId: string): TransactionOutcome {
    const receiptIds = this._transactions.get(transactionId);
    if (receiptIds === undefined) {
      throw new HostError("TRANSACTION_NOT_FOUND", `Unknown transaction "${transactionId}"`);
    }
    const receipts: ReceiptOutcome[] = [];
    for (const id of receiptIds) {
      const outcome = this._outcomes.get(id);
      if (outcome !== undefined) receipts.push(outcome);
    }

    const root = receipts[0];
    const settled = receipts.every((r) => r.status !== "queued");
    if (root === undefined || !settled) {
      return { transactionId, status: "pending", value: null, reason: null, receipts };
    }
    if (root.result.status === "failed") {
      return { transactionId, status: "failed", value: null, reason: root.result.reason, receipts };
    }
    const value = root.result.status === "success" ? root.result.value : null;
    return { transactionId, status: "success", value, reason: null, receipts };
  }

  // ─── Execution ───────────────────────────────────────────────────────

  private execute(receipt: Receipt): CallResult<unknown> {
    const checkpoint = this.checkpointAccount(receipt.receiver);
    const logs: string[] = [];
    const outbound: OutboundRequest[] = [];
    let method: string | null = null;
    let gasBurnt = 0n;
    let result: CallResult<unknown> = success(null);

    try {
      for (const action of receipt.actions) {
        if (action.kind === "functionCall") {
          method = action.method;
          gasBurnt += this._gasPerReceipt;
        }
        const value = this.applyAction(receipt, action, logs, outbound);
        if (action.kind === "functionCall") result = success(value);
      }
    } catch (err: unknown) {
      this.restoreAccount(receipt.receiver, checkpoint);
      if (receipt.deposit > 0n) {
        const payer = this._accounts.get(receipt.predecessor);
        if (payer !== undefined) payer.balance += receipt.deposit;
      }
      result = failedFromError(err);
      this._logger.debug(
        { receiptId: receipt.id, accountId: receipt.receiver, method, err },
        "Receipt failed",
      );
      this.record(receipt, method, "failed", gasBurnt, logs, result);
      return result;
    }

    for (const request of outbound) {
      this.enqueue(receipt, request);
    }
    this.record(receipt, method, "success", gasBurnt, logs, result);
    return result;
  }

  private applyAction(
    receipt: Receipt,
    action: Action,
    logs: string[],
    outbound: OutboundRequest[],
  ): unknown {
    if (action.kind === "createAccount") {
      this.createSubAccount(receipt.predecessor, receipt.receiver);
      return null;
    }

    const account = this.requireAccount(receipt.receiver);
    switch (action.kind) {
      case "transfer":
        account.balance += action.amount;
        return null;
      case "addFullAccessKey":
        account.keys.add(action.publicKey);
        return null;
      case "deploy":
        account.component = this.instantiate(action.codeId);
        account.codeId = action.codeId;
        return null;
      case "functionCall":
        break;
    }

    account.balance += action.deposit;
    if (action.gas < this._gasPerReceipt) {
      throw new HostError(
        "GAS_EXCEEDED",
        `Receipt needs ${this._gasPerReceipt.toString()} gas, ${action.gas.toString()} attached`,
      );
    }
    const component = this.requireComponent(receipt.receiver);
    const ctx = new ReceiptContext(
      {
        receiptId: receipt.id,
        currentAccountId: receipt.receiver,
        predecessorAccountId: receipt.predecessor,
        signerAccountId: receipt.signer,
        signerPublicKey: receipt.signerPublicKey,
        attachedDeposit: action.deposit,
        prepaidGas: action.gas,
        gasBurnt: this._gasPerReceipt,
        blockHeight: this._blockHeight,
        promiseResults: receipt.dependsOn.map((id) => this._results.get(id) ?? pending()),
        isView: false,
      },
      this.environment(),
    );

    try {
      const value = component.invoke(action.method, ctx, action.args);
      outbound.push(...ctx.outbound);
      return structuredClone(value);
    } finally {
      for (const line of ctx.logs) {
        logs.push(line);
        this._logger.debug({ receiptId: receipt.id, accountId: receipt.receiver }, line);
      }
    }
  }

  private createSubAccount(predecessor: AccountId, accountId: AccountId): void {
    if (!isValidAccountId(accountId)) {
      throw new HostError("INVALID_ACCOUNT_ID", `Invalid account id "${accountId}"`);
    }
    if (this._accounts.has(accountId)) {
      throw new HostError("ACCOUNT_EXISTS", `Account "${accountId}" already exists`);
    }
    if (!isSubAccountOf(accountId, predecessor)) {
      throw new HostError(
        "UNAUTHORIZED",
        `"${predecessor}" cannot create "${accountId}": only direct sub-accounts of the predecessor`,
      );
    }
    this._accounts.set(accountId, { balance: 0n, keys: new Set(), component: null, codeId: null });
  }

  private enqueue(parent: Receipt, request: OutboundRequest): void {
    let gas = 0n;
    let deposit = 0n;
    for (const action of request.actions) {
      if (action.kind === "functionCall") {
        gas += action.gas;
        deposit += action.deposit;
      } else if (action.kind === "transfer") {
        deposit += action.amount;
      }
    }
    const receipt: Receipt = {
      id: request.id,
      transactionId: parent.transactionId,
      predecessor: parent.receiver,
      signer: parent.signer,
      signerPublicKey: parent.signerPublicKey,
      receiver: request.receiver,
      actions: request.actions,
      deposit,
      gas,
      dependsOn: request.dependsOn,
      notBeforeBlock: this._blockHeight + 1 + request.delayBlocks,
    };
    this._queue.push(receipt);
    this.track(receipt);
  }

  private isReady(receipt: Receipt): boolean {
    return (
      receipt.notBeforeBlock <= this._blockHeight &&
      receipt.dependsOn.every((id) => this._results.has(id))
    );
  }

  // ─── Bookkeeping ─────────────────────────────────────────────────────

  private track(receipt: Receipt): void {
    this._transactions.get(receipt.transactionId)?.push(receipt.id);
    this._outcomes.set(receipt.id, {
      receiptId: receipt.id,
      predecessor: receipt.predecessor,
      receiver: receipt.receiver,
      method: methodOf(receipt),
      status: "queued",
      blockHeight: null,
      gasBurnt: 0n,
      logs: [],
      result: pending(),
    });
  }

  private record(
    receipt: Receipt,
    method: string | null,
    status: "success" | "failed",
    gasBurnt: bigint,
    logs: readonly string[],
    result: CallResult<unknown>,
  ): void {
    this._results.set(receipt.id, result);
    this._outcomes.set(receipt.id, {
      receiptId: receipt.id,
      predecessor: receipt.predecessor,
      receiver: receipt.receiver,
      method,
      status,
      blockHeight: this._blockHeight,
      gasBurnt,
      logs,
      result,
    });
  }

  private checkpointAccount(accountId: AccountId): AccountCheckpoint {
    const account = this._accounts.get(accountId);
    if (account === undefined) {
      return {
        existed: false,
        balance: 0n,
        keys: [],
        component: null,
        codeId: null,
        restoreComponent: null,
      };
    }
    return {
      existed: true,
      balance: account.balance,
      keys: [...account.keys],
      component: account.component,
      codeId: account.codeId,
      restoreComponent: account.component?.checkpoint() ?? null,
    };
  }

  private restoreAccount(accountId: AccountId, checkpoint: AccountCheckpoint): void {
    if (!checkpoint.existed) {
      this._accounts.delete(accountId);
      return;
    }
    const account = this._accounts.get(accountId);
    if (account === undefined) return;
    account.balance = checkpoint.balance;
    account.keys.clear();
    for (const key of checkpoint.keys) account.keys.add(key);
    account.component = checkpoint.component;
    account.codeId = checkpoint.codeId;
    checkpoint.restoreComponent?.();
  }

  // ─── Private helpers ─────────────────────────────────────────────────

  private environment(): ContextEnvironment {
    return {
      allocateId: (predecessor, receiver, actions) =>
        this.allocateId(predecessor, receiver, actions),
      balanceOf: (accountId) => this.balanceOf(accountId),
      debit: (accountId, amount) => this.debit(accountId, amount),
    };
  }

  private allocateId(
    predecessor: AccountId,
    receiver: AccountId,
    actions: readonly Action[],
  ): string {
    this._nonce++;
    return computeReceiptId({ nonce: this._nonce, predecessor, receiver, actions });
  }

  private debit(accountId: AccountId, amount: bigint): void {
    const account = this.requireAccount(accountId);
    if (amount < 0n) {
      throw new HostError("INSUFFICIENT_FUNDS", "Cannot move a negative amount");
    }
    if (account.balance < amount) {
      throw new HostError(
        "INSUFFICIENT_FUNDS",
        `Account "${accountId}" holds ${account.balance.toString()}, cannot move ${amount.toString()}`,
      );
    }
    account.balance -= amount;
  }

  private instantiate(codeId: string): Component {
    const factory = this._code.get(codeId);
    if (factory === undefined) {
      throw new HostError("CODE_NOT_FOUND", `No code registered as "${codeId}"`);
    }
    return factory();
  }

  private requireAccount(accountId: AccountId): AccountState {
    const account = this._accounts.get(accountId);
    if (account === undefined) {
      throw new HostError("ACCOUNT_NOT_FOUND", `Account "${accountId}" does not exist`);
    }
    return account;
  }

  private requireComponent(accountId: AccountId): Component {
    const component = this.requireAccount(accountId).component;
    if (component === null) {
      throw new HostError("NO_COMPONENT", `No component is deployed at "${accountId}"`);
    }
    return component;
  }
}

function methodOf(receipt: Receipt): string | null {
  let method: string | null = null;
  for (const action of receipt.actions) {
    if (action.kind === "functionCall") method = action.method;
  }
  return method;
}

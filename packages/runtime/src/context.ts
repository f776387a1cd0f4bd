/**
 * @shardvault/runtime: Execution context of one receipt.
 *
 * Collects logs and outbound requests while a component runs. The host
 * enqueues the outbound requests only when the execution returns
 * without throwing.
 *
 * Rules:
 * - Gas attached to requests draws from the receipt's remaining gas
 * - Deposits leave the current account when the request is issued
 * - Views may not issue requests
 */

import type { AccountId } from "@shardvault/types";
import { isValidAccountId } from "@shardvault/types";
import type { CallResult } from "./call-result.js";
import type {
  Action,
  BatchBuilder,
  CallOptions,
  ExecutionContext,
  PendingCall,
} from "./types.js";
import { HostError, TGAS } from "./types.js";

/** Gas attached to a request that names none. */
export const DEFAULT_CALL_GAS = 5n * TGAS;

/**
 * A request issued during an execution, waiting to be enqueued.
 */
export interface OutboundRequest {
  readonly id: string;
  readonly receiver: AccountId;
  readonly actions: readonly Action[];
  readonly dependsOn: readonly string[];
  readonly delayBlocks: number;
}

/**
 * What a context needs from the host.
 */
export interface ContextEnvironment {
  allocateId(predecessor: AccountId, receiver: AccountId, actions: readonly Action[]): string;
  balanceOf(accountId: AccountId): bigint;
  debit(accountId: AccountId, amount: bigint): void;
}

export interface ContextInit {
  readonly receiptId: string;
  readonly currentAccountId: AccountId;
  readonly predecessorAccountId: AccountId;
  readonly signerAccountId: AccountId;
  readonly signerPublicKey: string;
  readonly attachedDeposit: bigint;
  readonly prepaidGas: bigint;
  readonly gasBurnt: bigint;
  readonly blockHeight: number;
  readonly promiseResults: readonly CallResult<unknown>[];
  readonly isView: boolean;
}

export class ReceiptContext implements ExecutionContext {
  readonly receiptId: string;
  readonly currentAccountId: AccountId;
  readonly predecessorAccountId: AccountId;
  readonly signerAccountId: AccountId;
  readonly signerPublicKey: string;
  readonly attachedDeposit: bigint;
  readonly prepaidGas: bigint;
  readonly blockHeight: number;
  readonly promiseResults: readonly CallResult<unknown>[];
  readonly isView: boolean;

  private readonly _env: ContextEnvironment;
  private _gasUsed: bigint;
  private readonly _logs: string[] = [];
  private readonly _outbound: OutboundRequest[] = [];

  constructor(init: ContextInit, env: ContextEnvironment) {
    this.receiptId = init.receiptId;
    this.currentAccountId = init.currentAccountId;
    this.predecessorAccountId = init.predecessorAccountId;
    this.signerAccountId = init.signerAccountId;
    this.signerPublicKey = init.signerPublicKey;
    this.attachedDeposit = init.attachedDeposit;
    this.prepaidGas = init.prepaidGas;
    this.blockHeight = init.blockHeight;
    this.promiseResults = init.promiseResults;
    this.isView = init.isView;
    this._gasUsed = init.gasBurnt;
    this._env = env;
  }

  get logs(): readonly string[] {
    return this._logs;
  }

  get outbound(): readonly OutboundRequest[] {
    return this._outbound;
  }

  get gasUsed(): bigint {
    return this._gasUsed;
  }

  accountBalance(): bigint {
    return this._env.balanceOf(this.currentAccountId);
  }

  remainingGas(): bigint {
    return this.prepaidGas - this._gasUsed;
  }

  log(message: string): void {
    this._logs.push(message);
  }

  call(receiver: AccountId, method: string, args: unknown, options: CallOptions = {}): PendingCall {
    return this.issue(receiver, [this.functionCall(method, args, options)], [], options.delayBlocks ?? 0);
  }

  batch(receiver: AccountId): BatchBuilder {
    this.assertMayIssue();
    const actions: Action[] = [];
    const builder: BatchBuilder = {
      createAccount: () => {
        actions.push({ kind: "createAccount" });
        return builder;
      },
      transfer: (amount) => {
        actions.push({ kind: "transfer", amount });
        return builder;
      },
      addFullAccessKey: (publicKey) => {
        actions.push({ kind: "addFullAccessKey", publicKey });
        return builder;
      },
      deploy: (codeId) => {
        actions.push({ kind: "deploy", codeId });
        return builder;
      },
      functionCall: (method, args, options = {}) => {
        actions.push(this.functionCall(method, args, options));
        return builder;
      },
      submit: (delayBlocks = 0) => this.issue(receiver, actions, [], delayBlocks),
    };
    return builder;
  }

  // ─── Private helpers ─────────────────────────────────────────────────

  private functionCall(method: string, args: unknown, options: CallOptions): Action {
    return {
      kind: "functionCall",
      method,
      args: structuredClone(args),
      deposit: options.deposit ?? 0n,
      gas: options.gas ?? DEFAULT_CALL_GAS,
    };
  }

  private issue(
    receiver: AccountId,
    actions: readonly Action[],
    dependsOn: readonly string[],
    delayBlocks: number,
  ): PendingCall {
    this.assertMayIssue();
    if (!isValidAccountId(receiver)) {
      throw new HostError("INVALID_ACCOUNT_ID", `Invalid receiver account id "${receiver}"`);
    }
    if (!Number.isInteger(delayBlocks) || delayBlocks < 0) {
      throw new HostError("INVALID_ARGUMENTS", `delayBlocks must be a non-negative integer`);
    }

    let gas = 0n;
    let deposit = 0n;
    for (const action of actions) {
      if (action.kind === "functionCall") {
        gas += action.gas;
        deposit += action.deposit;
      } else if (action.kind === "transfer") {
        deposit += action.amount;
      }
    }
    if (gas > this.remainingGas()) {
      throw new HostError(
        "GAS_EXCEEDED",
        `Attaching ${gas.toString()} gas exceeds the ${this.remainingGas().toString()} remaining`,
      );
    }
    if (deposit > 0n) {
      this._env.debit(this.currentAccountId, deposit);
    }
    this._gasUsed += gas;

    const id = this._env.allocateId(this.currentAccountId, receiver, actions);
    this._outbound.push({ id, receiver, actions, dependsOn, delayBlocks });
    return this.pendingCall(id);
  }

  private pendingCall(receiptId: string): PendingCall {
    return {
      receiptId,
      andThen: (receiver, method, args, options = {}) =>
        this.issue(
          receiver,
          [this.functionCall(method, args, options)],
          [receiptId],
          options.delayBlocks ?? 0,
        ),
    };
  }

  private assertMayIssue(): void {
    if (this.isView) {
      throw new HostError("CALL_PROHIBITED", "Views cannot issue requests");
    }
  }
}

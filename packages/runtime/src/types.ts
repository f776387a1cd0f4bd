/**
 * @shardvault/runtime: Types for the execution host.
 *
 * Rules:
 * - Balances, deposits and gas are bigint
 * - Every cross-account effect is a receipt
 * - A receipt either commits all of its state changes or none
 * - Remote results are values (CallResult), never thrown across accounts
 */

import type { Logger } from "pino";
import type { AccountId } from "@shardvault/types";
import type { CallResult } from "./call-result.js";

// =============================================================================
// Units
// =============================================================================

/** Smallest balance denomination: 10^-24 of a whole unit. */
export const ONE_YOCTO = 1n;

/** One whole unit of balance. */
export const ONE_UNIT = 10n ** 24n;

/** 10^12 gas. */
export const TGAS = 1_000_000_000_000n;

// =============================================================================
// Errors
// =============================================================================

export type HostErrorCode =
  | "ACCOUNT_NOT_FOUND"
  | "ACCOUNT_EXISTS"
  | "INVALID_ACCOUNT_ID"
  | "INSUFFICIENT_FUNDS"
  | "GAS_EXCEEDED"
  | "CODE_NOT_FOUND"
  | "NO_COMPONENT"
  | "METHOD_NOT_FOUND"
  | "INVALID_ARGUMENTS"
  | "UNAUTHORIZED"
  | "CALL_PROHIBITED"
  | "NOT_A_CALLBACK"
  | "REMOTE_CALL_FAILED"
  | "REMOTE_CALL_PENDING"
  | "TRANSACTION_NOT_FOUND";

/**
 * Structured error from the execution host.
 */
export class HostError extends Error {
  public readonly code: HostErrorCode;

  constructor(code: HostErrorCode, message: string) {
    super(message);
    this.name = "HostError";
    this.code = code;
  }
}

// =============================================================================
// Receipts
// =============================================================================

export type Action =
  | { readonly kind: "createAccount" }
  | { readonly kind: "transfer"; readonly amount: bigint }
  | { readonly kind: "addFullAccessKey"; readonly publicKey: string }
  | { readonly kind: "deploy"; readonly codeId: string }
  | {
      readonly kind: "functionCall";
      readonly method: string;
      readonly args: unknown;
      readonly deposit: bigint;
      readonly gas: bigint;
    };

/**
 * One step of a transaction, executed on `receiver`.
 */
export interface Receipt {
  readonly id: string;
  readonly transactionId: string;
  readonly predecessor: AccountId;
  readonly signer: AccountId;
  readonly signerPublicKey: string;
  readonly receiver: AccountId;
  readonly actions: readonly Action[];
  /** Total deposit attached across the actions */
  readonly deposit: bigint;
  /** Total gas attached across the actions */
  readonly gas: bigint;
  /** Receipts whose results this one receives as promiseResults */
  readonly dependsOn: readonly string[];
  /** Earliest block at which the receipt may execute */
  readonly notBeforeBlock: number;
}

export type ReceiptStatus = "queued" | "success" | "failed";

/**
 * Execution record of a receipt.
 */
export interface ReceiptOutcome {
  readonly receiptId: string;
  readonly predecessor: AccountId;
  readonly receiver: AccountId;
  readonly method: string | null;
  readonly status: ReceiptStatus;
  readonly blockHeight: number | null;
  readonly gasBurnt: bigint;
  readonly logs: readonly string[];
  readonly result: CallResult<unknown>;
}

/**
 * Outcome of a whole transaction: the first receipt's result, pending
 * until every receipt of its tree has executed.
 */
export interface TransactionOutcome {
  readonly transactionId: string;
  readonly status: "success" | "failed" | "pending";
  readonly value: unknown;
  readonly reason: string | null;
  readonly receipts: readonly ReceiptOutcome[];
}

// =============================================================================
// Execution context
// =============================================================================

export interface CallOptions {
  /** Gas attached to the request. Default: DEFAULT_CALL_GAS */
  readonly gas?: bigint;
  /** Balance moved to the receiver with the request. Default: 0 */
  readonly deposit?: bigint;
  /** Blocks to wait before the request may execute. Default: 0 */
  readonly delayBlocks?: number;
}

/**
 * Handle on an issued request. `andThen` registers the resumption
 * target, which runs once after the request resolves and receives its
 * result as `promiseResults[0]`.
 */
export interface PendingCall {
  readonly receiptId: string;
  andThen(receiver: AccountId, method: string, args: unknown, options?: CallOptions): PendingCall;
}

/**
 * Builds one receipt carrying several actions. The actions commit or
 * fail together.
 */
export interface BatchBuilder {
  createAccount(): BatchBuilder;
  transfer(amount: bigint): BatchBuilder;
  addFullAccessKey(publicKey: string): BatchBuilder;
  deploy(codeId: string): BatchBuilder;
  functionCall(method: string, args: unknown, options?: Omit<CallOptions, "delayBlocks">): BatchBuilder;
  submit(delayBlocks?: number): PendingCall;
}

export interface ExecutionContext {
  readonly receiptId: string;
  readonly currentAccountId: AccountId;
  readonly predecessorAccountId: AccountId;
  readonly signerAccountId: AccountId;
  readonly signerPublicKey: string;
  readonly attachedDeposit: bigint;
  readonly prepaidGas: bigint;
  readonly blockHeight: number;
  readonly promiseResults: readonly CallResult<unknown>[];
  /** True inside `host.view`; requests are prohibited there */
  readonly isView: boolean;
  /** Liquid balance of the current account */
  accountBalance(): bigint;
  /** Gas left for attaching to outbound requests */
  remainingGas(): bigint;
  log(message: string): void;
  call(receiver: AccountId, method: string, args: unknown, options?: CallOptions): PendingCall;
  batch(receiver: AccountId): BatchBuilder;
}

// =============================================================================
// Components
// =============================================================================

/** Undo function returned by a component checkpoint. */
export type Restore = () => void;

/**
 * Deployed code on an account. The host checkpoints the component
 * before each receipt and restores it when the receipt fails.
 */
export interface Component {
  invoke(method: string, ctx: ExecutionContext, args: unknown): unknown;
  checkpoint(): Restore;
}

export type ComponentFactory = () => Component;

// =============================================================================
// Delivery
// =============================================================================

/**
 * Chooses the order in which the receipts ready in one block execute.
 */
export interface DeliveryPolicy {
  order<T>(items: readonly T[]): T[];
}

// =============================================================================
// Host options
// =============================================================================

export interface HostOptions {
  /** Gas burnt by executing any receipt. Default: 1 TGas */
  readonly gasPerReceipt?: bigint;
  /** Gas attached to a transaction when the signer gives none. Default: 300 TGas */
  readonly defaultTransactionGas?: bigint;
  readonly delivery?: DeliveryPolicy;
  /** Rounds `settle()` runs before giving up. Default: 10_000 */
  readonly maxRounds?: number;
  readonly logger?: Logger;
}

export interface TransactOptions {
  readonly gas?: bigint;
  readonly deposit?: bigint;
}

export interface TransactResult {
  readonly transactionId: string;
  /** Result of the first receipt; follow-up receipts wait for settle() */
  readonly result: CallResult<unknown>;
}

export interface SettleReport {
  readonly rounds: number;
  readonly executed: number;
  readonly blockHeight: number;
  /** Receipts still queued when the round limit was reached */
  readonly remaining: number;
}

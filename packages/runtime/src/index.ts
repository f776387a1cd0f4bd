/**
 * @shardvault/runtime: Execution host and async call protocol.
 *
 * Runs components in process the way a sharded host would:
 * - Every cross-account effect is a receipt, executed one at a time
 * - Requests resolve to a tagged CallResult delivered to a callback
 * - Ready receipts execute in an order chosen by a DeliveryPolicy
 * - Gas and deposits are metered per receipt
 */

// Host
export { Host } from "./host.js";
export { ReceiptContext, DEFAULT_CALL_GAS } from "./context.js";
export type { OutboundRequest, ContextEnvironment, ContextInit } from "./context.js";

// Call results
export {
  success,
  failed,
  pending,
  failedFromError,
  isSuccess,
  isFailed,
  isPending,
  requireSingleResult,
  resume,
} from "./call-result.js";
export type {
  CallResult,
  Success,
  Failed,
  Pending,
  ResumptionPolicy,
} from "./call-result.js";

// Delivery
export { fifoDelivery, shuffledDelivery, mulberry32 } from "./delivery.js";

// Retry
export { computeDelay, canRetry, DEFAULT_RETRY_CONFIG } from "./retry.js";
export type { RetryConfig } from "./retry.js";

// Identifiers
export { computeReceiptId, derivePublicKey } from "./receipt-id.js";
export type { ReceiptHeader } from "./receipt-id.js";

// Arguments
export {
  parseArgs,
  methodNotFound,
  assertPrivate,
  AccountIdSchema,
  U128Schema,
} from "./args.js";

// Asset registry
export {
  InMemoryAssetRegistry,
  AssetRegistryError,
  ASSET_REGISTRY_STANDARD,
} from "./asset-registry.js";
export type {
  AssetRegistry,
  AssetRegistryErrorCode,
  NftToken,
  NftTransferArgs,
  InMemoryAssetRegistryOptions,
} from "./asset-registry.js";

// Types
export type {
  Action,
  Receipt,
  ReceiptStatus,
  ReceiptOutcome,
  TransactionOutcome,
  CallOptions,
  PendingCall,
  BatchBuilder,
  ExecutionContext,
  Restore,
  Component,
  ComponentFactory,
  DeliveryPolicy,
  HostOptions,
  TransactOptions,
  TransactResult,
  SettleReport,
  HostErrorCode,
} from "./types.js";
export { HostError, ONE_YOCTO, ONE_UNIT, TGAS } from "./types.js";

/**
 * @shardvault/runtime: Receipt and transaction identifiers.
 *
 * An id is the SHA-256 of the RFC 8785 canonical JSON of a header
 * that includes a host-wide nonce, so two identical requests still get
 * distinct ids.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { AccountId } from "@shardvault/types";
import type { Action } from "./types.js";

export interface ReceiptHeader {
  readonly nonce: number;
  readonly predecessor: AccountId;
  readonly receiver: AccountId;
  readonly actions: readonly Action[];
}

function describeAction(action: Action): string {
  switch (action.kind) {
    case "createAccount":
      return "createAccount";
    case "transfer":
      return `transfer:${action.amount.toString()}`;
    case "addFullAccessKey":
      return `addFullAccessKey:${action.publicKey}`;
    case "deploy":
      return `deploy:${action.codeId}`;
    case "functionCall":
      return `functionCall:${action.method}:${action.deposit.toString()}:${action.gas.toString()}`;
  }
}

/**
 * Compute the id of a receipt (or of the transaction it starts).
 */
export function computeReceiptId(header: ReceiptHeader): string {
  const canonical = canonicalize({
    nonce: header.nonce,
    predecessor: header.predecessor,
    receiver: header.receiver,
    actions: header.actions.map(describeAction),
  });
  return createHash("sha256").update(canonical).digest("hex");
}

/**
 * Deterministic public key of an account, in the host's
 * `ed25519:<hex>` form.
 */
export function derivePublicKey(accountId: AccountId): string {
  return `ed25519:${createHash("sha256").update(`key:${accountId}`).digest("hex")}`;
}

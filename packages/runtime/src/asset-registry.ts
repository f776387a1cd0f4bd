/**
 * @shardvault/runtime: In-memory asset registry.
 *
 * An in-process asset registry for unique, non-divisible assets. It
 * owns the tokens of one asset-origin class and moves them between
 * accounts on request.
 *
 * Rules:
 * - nft_transfer requires exactly one yocto attached
 * - Only the owner or an approved account may move a token
 * - A transfer naming `senderId` fails unless that account owns the token
 * - A transfer clears every approval on the token
 * - failNextTransfers() forces the next transfers to fail; the
 *   counter is not rolled back with the failed receipt
 */

import { z } from "zod";
import type { AccountId, AssetId } from "@shardvault/types";
import { AccountIdSchema, methodNotFound, parseArgs } from "./args.js";
import type { Component, ExecutionContext, Restore } from "./types.js";
import { ONE_YOCTO } from "./types.js";

/** Standard the registry's methods follow. */
export const ASSET_REGISTRY_STANDARD = "nep171";

// =============================================================================
// Interface
// =============================================================================

export interface NftTransferArgs {
  readonly receiverId: AccountId;
  readonly tokenId: AssetId;
  /** Account the token must belong to when the transfer executes */
  readonly senderId?: AccountId;
  readonly approvalId?: number;
  readonly memo?: string;
}

export interface NftToken {
  readonly tokenId: AssetId;
  readonly ownerId: AccountId;
  readonly approvedAccountIds: Readonly<Record<AccountId, number>>;
}

/**
 * Methods every asset registry exposes to custody components.
 */
export interface AssetRegistry {
  nft_transfer(ctx: ExecutionContext, args: NftTransferArgs): null;
  nft_token(ctx: ExecutionContext, tokenId: AssetId): NftToken | null;
}

export type AssetRegistryErrorCode =
  | "TOKEN_NOT_FOUND"
  | "TOKEN_EXISTS"
  | "UNAUTHORIZED"
  | "INVALID_DEPOSIT"
  | "SELF_TRANSFER"
  | "APPROVAL_MISMATCH"
  | "OWNER_MISMATCH"
  | "FORCED_FAILURE";

export class AssetRegistryError extends Error {
  public readonly code: AssetRegistryErrorCode;

  constructor(code: AssetRegistryErrorCode, message: string) {
    super(message);
    this.name = "AssetRegistryError";
    this.code = code;
  }
}

// =============================================================================
// Argument schemas
// =============================================================================

const accountId = AccountIdSchema;
const tokenId = z.string().min(1);

const MintArgs = z.object({ tokenId, ownerId: accountId });
const ApproveArgs = z.object({ tokenId, accountId });
const TransferArgs = z.object({
  receiverId: accountId,
  tokenId,
  senderId: accountId.optional(),
  approvalId: z.number().int().nonnegative().optional(),
  memo: z.string().optional(),
});
const TokenArgs = z.object({ tokenId });
const OwnerArgs = z.object({ accountId });

// =============================================================================
// Component
// =============================================================================

interface TokenState {
  ownerId: AccountId;
  approvals: Map<AccountId, number>;
  nextApprovalId: number;
}

export interface InMemoryAssetRegistryOptions {
  /** Accounts besides the registry itself allowed to mint */
  readonly minters?: readonly AccountId[];
}

export class InMemoryAssetRegistry implements Component, AssetRegistry {
  private readonly _tokens = new Map<AssetId, TokenState>();
  private readonly _minters: ReadonlySet<AccountId>;
  private _failuresPending = 0;

  constructor(options: InMemoryAssetRegistryOptions = {}) {
    this._minters = new Set(options.minters ?? []);
  }

  invoke(method: string, ctx: ExecutionContext, args: unknown): unknown {
    switch (method) {
      case "nft_mint": {
        const { tokenId, ownerId } = parseArgs(MintArgs, args, method);
        return this.nft_mint(ctx, tokenId, ownerId);
      }
      case "nft_approve": {
        const { tokenId, accountId } = parseArgs(ApproveArgs, args, method);
        return this.nft_approve(ctx, tokenId, accountId);
      }
      case "nft_transfer":
        return this.nft_transfer(ctx, parseArgs(TransferArgs, args, method));
      case "nft_token":
        return this.nft_token(ctx, parseArgs(TokenArgs, args, method).tokenId);
      case "nft_tokens_for_owner":
        return this.nft_tokens_for_owner(parseArgs(OwnerArgs, args, method).accountId);
      case "nft_total_supply":
        return this._tokens.size.toString();
      default:
        throw methodNotFound("InMemoryAssetRegistry", method);
    }
  }

  checkpoint(): Restore {
    const saved = new Map<AssetId, TokenState>();
    for (const [id, token] of this._tokens) {
      saved.set(id, { ...token, approvals: new Map(token.approvals) });
    }
    return () => {
      this._tokens.clear();
      for (const [id, token] of saved) this._tokens.set(id, token);
    };
  }

  /**
   * Make the next `count` transfers fail.
   */
  failNextTransfers(count: number): void {
    this._failuresPending = count;
  }

  ownerOf(tokenId: AssetId): AccountId | null {
    return this._tokens.get(tokenId)?.ownerId ?? null;
  }

  // ─── Methods ─────────────────────────────────────────────────────────

  nft_mint(ctx: ExecutionContext, tokenId: AssetId, ownerId: AccountId): NftToken {
    const minter = ctx.predecessorAccountId;
    if (minter !== ctx.currentAccountId && !this._minters.has(minter)) {
      throw new AssetRegistryError("UNAUTHORIZED", `"${minter}" may not mint`);
    }
    if (this._tokens.has(tokenId)) {
      throw new AssetRegistryError("TOKEN_EXISTS", `Token "${tokenId}" already exists`);
    }
    const token: TokenState = { ownerId, approvals: new Map(), nextApprovalId: 0 };
    this._tokens.set(tokenId, token);
    ctx.log(`Minted ${tokenId} to @${ownerId}`);
    return toView(tokenId, token);
  }

  /**
   * Approve `accountId` to move the token. Returns the approval id.
   */
  nft_approve(ctx: ExecutionContext, tokenId: AssetId, accountId: AccountId): number {
    const token = this.requireToken(tokenId);
    if (ctx.predecessorAccountId !== token.ownerId) {
      throw new AssetRegistryError(
        "UNAUTHORIZED",
        `Only the owner of "${tokenId}" can approve accounts`,
      );
    }
    const approvalId = token.nextApprovalId;
    token.nextApprovalId++;
    token.approvals.set(accountId, approvalId);
    return approvalId;
  }

  nft_transfer(ctx: ExecutionContext, args: NftTransferArgs): null {
    if (ctx.attachedDeposit !== ONE_YOCTO) {
      throw new AssetRegistryError(
        "INVALID_DEPOSIT",
        "Requires an attached deposit of exactly 1 yocto",
      );
    }
    if (this._failuresPending > 0) {
      this._failuresPending--;
      throw new AssetRegistryError("FORCED_FAILURE", `Transfer of "${args.tokenId}" was forced to fail`);
    }

    const token = this.requireToken(args.tokenId);
    if (args.senderId !== undefined && args.senderId !== token.ownerId) {
      throw new AssetRegistryError(
        "OWNER_MISMATCH",
        `Token "${args.tokenId}" belongs to @${token.ownerId}, not @${args.senderId}`,
      );
    }
    const sender = ctx.predecessorAccountId;
    if (sender !== token.ownerId) {
      const approval = token.approvals.get(sender);
      if (approval === undefined) {
        throw new AssetRegistryError(
          "UNAUTHORIZED",
          `"${sender}" is neither the owner of "${args.tokenId}" nor approved`,
        );
      }
      if (args.approvalId !== undefined && args.approvalId !== approval) {
        throw new AssetRegistryError(
          "APPROVAL_MISMATCH",
          `Approval id ${String(args.approvalId)} does not match ${String(approval)}`,
        );
      }
    }
    if (args.receiverId === token.ownerId) {
      throw new AssetRegistryError(
        "SELF_TRANSFER",
        "The token owner and the receiver should be different",
      );
    }

    const previousOwner = token.ownerId;
    token.ownerId = args.receiverId;
    token.approvals.clear();
    ctx.log(
      `Transfer ${args.tokenId} from @${previousOwner} to @${args.receiverId}` +
        (args.memo === undefined ? "" : ` memo: ${args.memo}`),
    );
    return null;
  }

  nft_token(_ctx: ExecutionContext, tokenId: AssetId): NftToken | null {
    const token = this._tokens.get(tokenId);
    return token === undefined ? null : toView(tokenId, token);
  }

  nft_tokens_for_owner(accountId: AccountId): NftToken[] {
    const out: NftToken[] = [];
    for (const [id, token] of this._tokens) {
      if (token.ownerId === accountId) out.push(toView(id, token));
    }
    return out;
  }

  // ─── Private helpers ─────────────────────────────────────────────────

  private requireToken(tokenId: AssetId): TokenState {
    const token = this._tokens.get(tokenId);
    if (token === undefined) {
      throw new AssetRegistryError("TOKEN_NOT_FOUND", `Token "${tokenId}" does not exist`);
    }
    return token;
  }
}

function toView(tokenId: AssetId, token: TokenState): NftToken {
  return {
    tokenId,
    ownerId: token.ownerId,
    approvedAccountIds: Object.fromEntries(token.approvals),
  };
}

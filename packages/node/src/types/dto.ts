/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body/query validation.
 */

import { z } from "zod";
import { AccountIdSchema, U128Schema } from "@shardvault/runtime";

// =============================================================================
// Shared Schemas
// =============================================================================

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

const AssetIdSchema = z.string().min(1).max(256);

export const IndexParamSchema = z.coerce.number().int().nonnegative();

// =============================================================================
// Registry DTOs
// =============================================================================

export const CreateVaultSchema = z.object({
  origin: AccountIdSchema,
  name: z.string().min(1).max(256),
  symbol: z.string().min(1).max(64),
  media: z.string().max(2048),
});

export type CreateVaultDto = z.infer<typeof CreateVaultSchema>;

export const SetParamsSchema = z.object({
  name: z.string().min(1).max(256),
  symbol: z.string().min(1).max(64),
  unitValue: U128Schema,
  media: z.string().max(2048),
});

export type SetParamsDto = z.infer<typeof SetParamsSchema>;

export const SetFeeSchema = z.object({
  fee: U128Schema,
});

export type SetFeeDto = z.infer<typeof SetFeeSchema>;

/** Vault index range for a refresh; the whole registry when empty. */
export const RefreshSchema = z.object({
  from: z.number().int().nonnegative().optional(),
  limit: z.number().int().positive().optional(),
});

export type RefreshDto = z.infer<typeof RefreshSchema>;

// =============================================================================
// Custody DTOs
// =============================================================================

export const DepositSchema = z.object({
  assetIds: z.array(AssetIdSchema).min(1),
});

export type DepositDto = z.infer<typeof DepositSchema>;

export const WithdrawSchema = z.object({
  assetIds: z.array(AssetIdSchema).min(1),
  receiverId: AccountIdSchema.optional(),
});

export type WithdrawDto = z.infer<typeof WithdrawSchema>;

export const SwapSchema = z.object({
  assetInId: AssetIdSchema,
  assetOutId: AssetIdSchema,
});

export type SwapDto = z.infer<typeof SwapSchema>;

export const RegisterStorageSchema = z.object({
  accountId: AccountIdSchema.optional(),
});

export type RegisterStorageDto = z.infer<typeof RegisterStorageSchema>;

export const TransferSharesSchema = z.object({
  receiverId: AccountIdSchema,
  amount: U128Schema,
  memo: z.string().max(256).optional(),
});

export type TransferSharesDto = z.infer<typeof TransferSharesSchema>;

export const ListSettlementsQuerySchema = z.object({
  status: z.enum(["pending", "settled", "partially_failed", "failed"]).optional(),
});

// =============================================================================
// Asset DTOs
// =============================================================================

export const MintTokenSchema = z.object({
  tokenId: AssetIdSchema,
  ownerId: AccountIdSchema,
});

export type MintTokenDto = z.infer<typeof MintTokenSchema>;

export const ApproveTokenSchema = z.object({
  accountId: AccountIdSchema,
});

export type ApproveTokenDto = z.infer<typeof ApproveTokenSchema>;

export const TokensQuerySchema = z.object({
  owner: AccountIdSchema,
});

// =============================================================================
// Host DTOs
// =============================================================================

export const SettleSchema = z.object({
  maxRounds: z.number().int().min(1).max(100_000).optional(),
});

export type SettleDto = z.infer<typeof SettleSchema>;

export const AuditQuerySchema = z.object({
  action: z.string().optional(),
  resourceType: z.string().optional(),
  resourceId: z.string().optional(),
  actor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(1000).optional(),
});

export type AuditQuery = z.infer<typeof AuditQuerySchema>;

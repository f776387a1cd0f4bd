/**
 * Type barrel: re-exports all public types from @shardvault/node.
 */

// DTOs
export {
  PaginationQuerySchema,
  IndexParamSchema,
  CreateVaultSchema,
  SetParamsSchema,
  SetFeeSchema,
  DepositSchema,
  WithdrawSchema,
  SwapSchema,
  RegisterStorageSchema,
  TransferSharesSchema,
  ListSettlementsQuerySchema,
  MintTokenSchema,
  ApproveTokenSchema,
  TokensQuerySchema,
  SettleSchema,
  AuditQuerySchema,
} from "./dto.js";
export type {
  CreateVaultDto,
  SetParamsDto,
  SetFeeDto,
  DepositDto,
  WithdrawDto,
  SwapDto,
  RegisterStorageDto,
  TransferSharesDto,
  MintTokenDto,
  ApproveTokenDto,
  SettleDto,
  AuditQuery,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// App env
export type { AppEnv } from "./api-contract.js";

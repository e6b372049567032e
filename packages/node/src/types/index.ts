/**
 * Type barrel — re-exports all public types from @rebasekit/node.
 */

// DTOs
export {
  AccountIdSchema,
  AmountSchema,
  MintSchema,
  BurnSchema,
  TransferSchema,
  ChangeSupplySchema,
  toBalanceDto,
  toTransferDto,
  toOptDto,
  toSupplyChangeDto,
  toAccountDto,
  toSupplyDto,
  toAuditDto,
} from "./dto.js";
export type {
  BalanceDto,
  TransferResultDto,
  OptDto,
  SupplyChangeDto,
  AccountDto,
  SupplyDto,
  AuditDto,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// App env
export { SEQUENCE_HEADER } from "./api-contract.js";
export type { AppEnv, ValidatedEnv } from "./api-contract.js";

/**
 * Request/Response DTOs.
 *
 * Request bodies have a Zod schema and a derived TypeScript type;
 * amounts travel as base-10 strings and are parsed to bigint here.
 * Response DTOs are the string-typed mirror of the ledger's values.
 */

import { z } from "zod";
import type { AccountId, StrategySelection } from "@rebasekit/types";
import type {
  AccountView,
  AuditReport,
  BalanceUpdate,
  OptResult,
  SupplyChangeResult,
  TransferResult,
} from "@rebasekit/ledger";
import type { SupplyView } from "../services/ledger-service.js";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AccountIdSchema = z.string().min(1).max(128);

/** Unsigned base-10 integer string → bigint. Range is checked by the ledger. */
export const AmountSchema = z
  .string()
  .regex(/^\d+$/, "Must be an unsigned base-10 integer string")
  .transform((v) => BigInt(v));

// =============================================================================
// Request DTOs
// =============================================================================

export const MintSchema = z.object({
  account: AccountIdSchema,
  amount: AmountSchema,
});

export const BurnSchema = z.object({
  account: AccountIdSchema,
  amount: AmountSchema,
});

export const TransferSchema = z.object({
  from: AccountIdSchema,
  to: AccountIdSchema,
  amount: AmountSchema,
});

export const ChangeSupplySchema = z.object({
  newTotalSupply: AmountSchema,
});

// =============================================================================
// Response DTOs
// =============================================================================

export interface BalanceDto {
  readonly accountId: AccountId;
  readonly balance: string;
}

export interface TransferResultDto {
  readonly from: BalanceDto;
  readonly to: BalanceDto;
  readonly creditsDeducted: string;
  readonly creditsCredited: string;
}

export interface OptDto extends BalanceDto {
  readonly isNonRebasing: boolean;
  readonly supplyAdjustment: string;
}

export interface SupplyChangeDto {
  readonly rebasingCreditsPerToken: string;
  readonly totalSupply: string;
}

export interface AccountDto {
  readonly accountId: AccountId;
  readonly credits: string;
  readonly balance: string;
  readonly creditsPerToken: string;
  readonly isNonRebasing: boolean;
}

export interface SupplyDto {
  readonly totalSupply: string;
  readonly cachedTotalSupply: string;
  readonly rebasingCredits: string;
  readonly rebasingCreditsPerToken: string;
  readonly nonRebasingSupply: string;
  readonly roundingErrorAccumulator?: string;
  readonly strategies: StrategySelection;
  readonly sequence: number;
}

export interface AuditDto {
  readonly accountCount: number;
  readonly sumOfBalances: string;
  readonly totalSupply: string;
  readonly reportedTotalSupply: string;
  readonly supplyGap: string;
  readonly rebasingCredits: { readonly recorded: string; readonly computed: string };
  readonly nonRebasingSupply: { readonly recorded: string; readonly computed: string };
  readonly balanced: boolean;
}

// =============================================================================
// Mappers
// =============================================================================

export function toBalanceDto(update: BalanceUpdate): BalanceDto {
  return { accountId: update.accountId, balance: update.balance.toString() };
}

export function toTransferDto(result: TransferResult): TransferResultDto {
  return {
    from: toBalanceDto(result.from),
    to: toBalanceDto(result.to),
    creditsDeducted: result.creditsDeducted.toString(),
    creditsCredited: result.creditsCredited.toString(),
  };
}

export function toOptDto(result: OptResult): OptDto {
  return {
    accountId: result.accountId,
    balance: result.balance.toString(),
    isNonRebasing: result.isNonRebasing,
    supplyAdjustment: result.supplyAdjustment.toString(),
  };
}

export function toSupplyChangeDto(result: SupplyChangeResult): SupplyChangeDto {
  return {
    rebasingCreditsPerToken: result.rebasingCreditsPerToken.toString(),
    totalSupply: result.totalSupply.toString(),
  };
}

export function toAccountDto(view: AccountView): AccountDto {
  return {
    accountId: view.accountId,
    credits: view.credits.toString(),
    balance: view.balance.toString(),
    creditsPerToken: view.creditsPerToken.toString(),
    isNonRebasing: view.isNonRebasing,
  };
}

export function toSupplyDto(view: SupplyView): SupplyDto {
  const dto: SupplyDto = {
    totalSupply: view.reportedTotalSupply.toString(),
    cachedTotalSupply: view.global.totalSupply.toString(),
    rebasingCredits: view.global.rebasingCredits.toString(),
    rebasingCreditsPerToken: view.global.rebasingCreditsPerToken.toString(),
    nonRebasingSupply: view.global.nonRebasingSupply.toString(),
    strategies: view.strategies,
    sequence: view.sequence,
  };
  if (view.roundingErrorAccumulator !== undefined) {
    return { ...dto, roundingErrorAccumulator: view.roundingErrorAccumulator.toString() };
  }
  return dto;
}

export function toAuditDto(report: AuditReport): AuditDto {
  return {
    accountCount: report.accountCount,
    sumOfBalances: report.sumOfBalances.toString(),
    totalSupply: report.totalSupply.toString(),
    reportedTotalSupply: report.reportedTotalSupply.toString(),
    supplyGap: report.supplyGap.toString(),
    rebasingCredits: {
      recorded: report.rebasingCredits.recorded.toString(),
      computed: report.rebasingCredits.computed.toString(),
    },
    nonRebasingSupply: {
      recorded: report.nonRebasingSupply.recorded.toString(),
      computed: report.nonRebasingSupply.computed.toString(),
    },
    balanced: report.balanced,
  };
}

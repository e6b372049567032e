/**
 * Runtime Type Guards
 *
 * Narrowing functions for ledger wire types.
 * These enable safe runtime validation at system boundaries
 * (API inputs, journal lines, restored snapshots).
 *
 * Guards check shape only. Numeric range and cross-field invariants
 * are enforced by the ledger when it loads the value.
 */

import type {
  AccountRecord,
  BurnPolicyName,
  GlobalStateRecord,
  LedgerOperation,
  LedgerOperationKind,
  LedgerSnapshotRecord,
  StrategySelection,
  SupplyChangeStrategyName,
  TransferRoundingStrategyName,
} from "./ledger.js";

// =============================================================================
// Scalars
// =============================================================================

const UINT_PATTERN = /^\d+$/;
const INT_PATTERN = /^-?\d+$/;

/** Base-10 unsigned integer string ("0", "42", never "", "-1" or "1.5"). */
export function isUintString(value: unknown): value is string {
  return typeof value === "string" && UINT_PATTERN.test(value);
}

/** Base-10 signed integer string. */
export function isIntString(value: unknown): value is string {
  return typeof value === "string" && INT_PATTERN.test(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.length > 0;
}

// =============================================================================
// Records
// =============================================================================

export function isAccountRecord(value: unknown): value is AccountRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isNonEmptyString(v.id) &&
    isUintString(v.credits) &&
    typeof v.isNonRebasing === "boolean" &&
    (v.lockedCreditsPerToken === undefined || isUintString(v.lockedCreditsPerToken))
  );
}

export function isGlobalStateRecord(value: unknown): value is GlobalStateRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isUintString(v.rebasingCredits) &&
    isUintString(v.rebasingCreditsPerToken) &&
    isUintString(v.nonRebasingSupply) &&
    isUintString(v.totalSupply)
  );
}

// =============================================================================
// Strategies
// =============================================================================

const SUPPLY_CHANGE_STRATEGIES = new Set<string>(["derived", "trusted"]);
const TRANSFER_ROUNDING_STRATEGIES = new Set<string>(["derived", "independent"]);
const BURN_POLICIES = new Set<string>(["strict", "naive"]);

export function isSupplyChangeStrategyName(value: unknown): value is SupplyChangeStrategyName {
  return typeof value === "string" && SUPPLY_CHANGE_STRATEGIES.has(value);
}

export function isTransferRoundingStrategyName(
  value: unknown,
): value is TransferRoundingStrategyName {
  return typeof value === "string" && TRANSFER_ROUNDING_STRATEGIES.has(value);
}

export function isBurnPolicyName(value: unknown): value is BurnPolicyName {
  return typeof value === "string" && BURN_POLICIES.has(value);
}

export function isStrategySelection(value: unknown): value is StrategySelection {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isSupplyChangeStrategyName(v.supplyChange) &&
    isTransferRoundingStrategyName(v.transferRounding) &&
    isBurnPolicyName(v.burnPolicy)
  );
}

// =============================================================================
// Operations
// =============================================================================

const OPERATION_KINDS = new Set<string>([
  "mint", "burn", "transfer", "optIn", "optOut", "changeSupply",
]);

export function isLedgerOperationKind(value: unknown): value is LedgerOperationKind {
  return typeof value === "string" && OPERATION_KINDS.has(value);
}

export function isLedgerOperation(value: unknown): value is LedgerOperation {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;

  switch (v.kind) {
    case "mint":
    case "burn":
      return isNonEmptyString(v.account) && isUintString(v.amount);
    case "transfer":
      return isNonEmptyString(v.from) && isNonEmptyString(v.to) && isUintString(v.amount);
    case "optIn":
    case "optOut":
      return isNonEmptyString(v.account);
    case "changeSupply":
      return isUintString(v.newTotalSupply);
    default:
      return false;
  }
}

// =============================================================================
// Snapshots
// =============================================================================

export function isLedgerSnapshotRecord(value: unknown): value is LedgerSnapshotRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    v.version === 1 &&
    isStrategySelection(v.strategies) &&
    isGlobalStateRecord(v.global) &&
    Array.isArray(v.accounts) &&
    v.accounts.every(isAccountRecord) &&
    (v.roundingErrorAccumulator === undefined || isIntString(v.roundingErrorAccumulator)) &&
    typeof v.createdAt === "string"
  );
}

/**
 * @rebasekit/types — Shared wire types for the rebasekit stack.
 *
 * These types are used across all rebasekit packages:
 * - Account and global state records
 * - Ledger operations (submitted, journaled, replayed)
 * - Snapshots
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Integers travel as base-10 strings
 */

export type {
  AccountId,
  AccountRecord,
  GlobalStateRecord,
  SupplyChangeStrategyName,
  TransferRoundingStrategyName,
  BurnPolicyName,
  StrategySelection,
  LedgerOperation,
  LedgerOperationKind,
  LedgerSnapshotRecord,
} from "./ledger.js";

// Runtime type guards
export {
  isUintString,
  isIntString,
  isAccountRecord,
  isGlobalStateRecord,
  isSupplyChangeStrategyName,
  isTransferRoundingStrategyName,
  isBurnPolicyName,
  isStrategySelection,
  isLedgerOperationKind,
  isLedgerOperation,
  isLedgerSnapshotRecord,
} from "./guards.js";

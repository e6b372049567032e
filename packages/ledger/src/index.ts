/**
 * @rebasekit/ledger — Credit/multiplier ledger engine for rebasing tokens.
 *
 * A pure TypeScript ledger with zero runtime dependencies.
 * Tracks balances as credits under a shared multiplier so that a
 * supply change touches one number instead of every account:
 * - Every conversion goes through mulTruncate / divPrecisely (round down)
 * - Every operation is atomic (staged, then committed as a unit)
 * - Failures come back as LedgerResult values
 * - Historical and improved rounding variants are selectable per ledger
 * - An optional decorator records the rounding drift it can observe
 */

// Core engine
export { RebasingLedger } from "./ledger.js";
export { RoundingErrorTracker } from "./rounding-error-tracker.js";

// State
export { LedgerState, StagedLedgerState, EMPTY_ACCOUNT } from "./state.js";

// Components
export {
  AccountLedger,
  AccountReader,
  balanceOfAccount,
  creditsPerTokenOf,
} from "./account-ledger.js";
export { SupplyController } from "./supply-controller.js";
export { TransferEngine } from "./transfer-engine.js";
export { RebaseOptController } from "./rebase-opt-controller.js";

// Strategies
export {
  DERIVED_SUPPLY_CHANGE,
  TRUSTED_SUPPLY_CHANGE,
  DERIVED_TRANSFER_ROUNDING,
  INDEPENDENT_TRANSFER_ROUNDING,
  STRICT_BURN_POLICY,
  NAIVE_BURN_POLICY,
  SUPPLY_CHANGE_STRATEGIES,
  TRANSFER_ROUNDING_STRATEGIES,
  BURN_POLICIES,
  DEFAULT_STRATEGIES,
  resolveStrategies,
} from "./strategies.js";

// Fixed-point arithmetic
export {
  PRECISION,
  MAX_UINT256,
  mulTruncate,
  divPrecisely,
  checkedAdd,
  checkedSub,
  applyDelta,
  assertUint256,
  parseUint,
} from "./fixed-point-math.js";

// Operations, audit, snapshots
export { applyOperation, describeOperation } from "./operations.js";
export { auditState, withReportedTotalSupply } from "./audit.js";
export {
  toAccountRecord,
  fromAccountRecord,
  toGlobalRecord,
  fromGlobalRecord,
} from "./snapshot.js";

// Types
export type {
  AccountState,
  GlobalState,
  LedgerReader,
  LedgerStore,
  SupplyChangeInput,
  SupplyChangeStrategy,
  TransferCredits,
  TransferRoundingStrategy,
  BurnPolicy,
  LedgerStrategies,
  BalanceUpdate,
  TransferResult,
  OptResult,
  SupplyChangeResult,
  OperationValue,
  AccountView,
  AuditReport,
  LedgerErrorCode,
  LedgerResult,
  TokenLedger,
  LedgerOptions,
} from "./types.js";

export { LedgerError, ok, fail } from "./types.js";

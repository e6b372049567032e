/**
 * @rebasekit/ledger — Internal types for the rebasing ledger engine.
 *
 * In-memory state is bigint throughout. The string-typed wire shapes
 * live in @rebasekit/types and are converted in snapshot.ts.
 *
 * Rules:
 * - All state records are readonly; writes replace whole records
 * - Fail-closed: a failing operation leaves no partial mutation
 * - Validation failures come back as LedgerResult, never as throws
 */

import type {
  AccountId,
  BurnPolicyName,
  LedgerSnapshotRecord,
  StrategySelection,
  SupplyChangeStrategyName,
  TransferRoundingStrategyName,
} from "@rebasekit/types";

// ─── State ───────────────────────────────────────────────────────────────

/**
 * A single account. The union encodes the rule that a locked multiplier
 * exists exactly when the account is non-rebasing.
 */
export type AccountState =
  | {
      readonly credits: bigint;
      readonly isNonRebasing: false;
    }
  | {
      readonly credits: bigint;
      readonly isNonRebasing: true;
      /** Multiplier snapshot captured at opt-out; always > 0 */
      readonly lockedCreditsPerToken: bigint;
    };

/** Ledger-wide aggregates. */
export interface GlobalState {
  readonly rebasingCredits: bigint;
  /** Always > 0 */
  readonly rebasingCreditsPerToken: bigint;
  /** Token-denominated, not credits */
  readonly nonRebasingSupply: bigint;
  readonly totalSupply: bigint;
}

/** Read side of the ledger state. */
export interface LedgerReader {
  /** Unknown accounts read as an empty rebasing account. */
  getAccount(id: AccountId): AccountState;
  getGlobal(): GlobalState;
}

/** Read/write view handed to the components for one operation. */
export interface LedgerStore extends LedgerReader {
  setAccount(id: AccountId, account: AccountState): void;
  setGlobal(global: GlobalState): void;
}

// ─── Strategies ──────────────────────────────────────────────────────────

export interface SupplyChangeInput {
  readonly requestedTotalSupply: bigint;
  readonly rebasingCredits: bigint;
  readonly rebasingCreditsPerToken: bigint;
  readonly nonRebasingSupply: bigint;
}

/** Decides the cached total supply after the multiplier is recomputed. */
export interface SupplyChangeStrategy {
  readonly name: SupplyChangeStrategyName;
  resolveTotalSupply(input: SupplyChangeInput): bigint;
}

export interface TransferCredits {
  readonly creditsDeducted: bigint;
  readonly creditsCredited: bigint;
}

/** Converts a token amount into the credits moved on each side. */
export interface TransferRoundingStrategy {
  readonly name: TransferRoundingStrategyName;
  computeCredits(amount: bigint, fromCreditsPerToken: bigint, toCreditsPerToken: bigint): TransferCredits;
}

/** Burn acceptance rule and non-rebasing aggregate bookkeeping. */
export interface BurnPolicy {
  readonly name: BurnPolicyName;
  /** Throws LedgerError to reject the burn. */
  checkCreditAmount(amount: bigint, creditAmount: bigint): void;
  /** Amount taken out of nonRebasingSupply for a non-rebasing burn. */
  nonRebasingSupplyReduction(amount: bigint, creditAmount: bigint, creditsPerToken: bigint): bigint;
}

export interface LedgerStrategies {
  readonly supplyChange: SupplyChangeStrategy;
  readonly transferRounding: TransferRoundingStrategy;
  readonly burnPolicy: BurnPolicy;
}

// ─── Operation Results ───────────────────────────────────────────────────

export interface BalanceUpdate {
  readonly accountId: AccountId;
  readonly balance: bigint;
}

export interface TransferResult {
  readonly from: BalanceUpdate;
  readonly to: BalanceUpdate;
  readonly creditsDeducted: bigint;
  readonly creditsCredited: bigint;
}

export interface OptResult {
  readonly accountId: AccountId;
  readonly balance: bigint;
  readonly isNonRebasing: boolean;
  /** Change applied to totalSupply to keep the local balance sum intact */
  readonly supplyAdjustment: bigint;
}

export interface SupplyChangeResult {
  readonly rebasingCreditsPerToken: bigint;
  readonly totalSupply: bigint;
}

export type OperationValue = BalanceUpdate | TransferResult | OptResult | SupplyChangeResult;

/** Read model of one account. */
export interface AccountView {
  readonly accountId: AccountId;
  readonly credits: bigint;
  readonly balance: bigint;
  readonly creditsPerToken: bigint;
  readonly isNonRebasing: boolean;
}

/**
 * O(n) consistency report. Never computed by an operation;
 * harnesses and operators ask for it explicitly.
 */
export interface AuditReport {
  readonly accountCount: number;
  readonly sumOfBalances: bigint;
  /** Cached value maintained by the operations */
  readonly totalSupply: bigint;
  /** Value returned by totalSupply() (differs when rounding is tracked) */
  readonly reportedTotalSupply: bigint;
  /** reportedTotalSupply - sumOfBalances */
  readonly supplyGap: bigint;
  readonly rebasingCredits: { readonly recorded: bigint; readonly computed: bigint };
  readonly nonRebasingSupply: { readonly recorded: bigint; readonly computed: bigint };
  readonly balanced: boolean;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "ARITHMETIC_OVERFLOW"
  | "DIVISION_BY_ZERO"
  | "INSUFFICIENT_BALANCE"
  | "INSUFFICIENT_CREDITS"
  | "DUST_AMOUNT_BURN"
  | "ALREADY_IN_STATE"
  | "INVALID_SUPPLY_CHANGE"
  | "INVALID_AMOUNT"
  | "INVALID_SNAPSHOT";

/**
 * Structured error from the ledger engine.
 *
 * Components throw it to abort an operation; the ledger facade catches
 * it at the operation boundary and hands it back inside a LedgerResult.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

export type LedgerResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: LedgerError };

export function ok<T>(value: T): LedgerResult<T> {
  return { ok: true, value };
}

export function fail<T>(error: LedgerError): LedgerResult<T> {
  return { ok: false, error };
}

// ─── Ledger Interface ────────────────────────────────────────────────────

/**
 * The synchronous call surface shared by the plain ledger and the
 * rounding-error tracking decorator.
 */
export interface TokenLedger {
  readonly strategies: StrategySelection;

  mint(account: AccountId, amount: bigint): LedgerResult<BalanceUpdate>;
  burn(account: AccountId, amount: bigint): LedgerResult<BalanceUpdate>;
  transfer(from: AccountId, to: AccountId, amount: bigint): LedgerResult<TransferResult>;
  optIn(account: AccountId): LedgerResult<OptResult>;
  optOut(account: AccountId): LedgerResult<OptResult>;
  changeSupply(newTotalSupply: bigint): LedgerResult<SupplyChangeResult>;

  /**
   * Run `fn` with `guard` installed: every operation that succeeds inside
   * `fn` calls it after computing its result and before committing. A
   * throwing guard discards that operation's stage; a LedgerError comes
   * back as the operation's failure, anything else propagates.
   */
  guardCommits<T>(guard: () => void, fn: () => T): T;

  balanceOf(account: AccountId): bigint;
  creditsPerToken(account: AccountId): bigint;
  getAccount(account: AccountId): AccountView;
  totalSupply(): bigint;
  getGlobalState(): GlobalState;
  audit(): AuditReport;
  snapshot(createdAt?: string): LedgerSnapshotRecord;
}

// ─── Construction ────────────────────────────────────────────────────────

export interface LedgerOptions {
  /** Strategy names; unspecified entries use the improved variants. */
  readonly strategies?: Partial<StrategySelection> | undefined;
  /** Starting global multiplier. Default: PRECISION */
  readonly initialCreditsPerToken?: bigint | undefined;
}

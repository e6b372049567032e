/**
 * Ledger Wire Types
 *
 * Serializable shapes shared by the ledger engine and its outer layers.
 *
 * Rules:
 * - All integers are base-10 strings (bigint does not survive JSON)
 * - Amounts are unsigned minimal token units, never decimals
 * - Credits are an internal unit; only the ledger converts them to balances
 */

/** Account identifier (opaque to the ledger). */
export type AccountId = string;

/**
 * Stored form of a single account.
 */
export interface AccountRecord {
  readonly id: AccountId;

  /** Internal credit balance */
  readonly credits: string;

  /** True when the account tracks a frozen personal multiplier */
  readonly isNonRebasing: boolean;

  /**
   * Multiplier snapshot taken at opt-out.
   * Present if and only if `isNonRebasing` is true.
   */
  readonly lockedCreditsPerToken?: string;
}

/**
 * Stored form of the ledger-wide aggregates.
 */
export interface GlobalStateRecord {
  /** Sum of credits over every rebasing account */
  readonly rebasingCredits: string;

  /** Global multiplier shared by rebasing accounts; always > 0 */
  readonly rebasingCreditsPerToken: string;

  /** Token-denominated sum of non-rebasing balances */
  readonly nonRebasingSupply: string;

  /** Cached total supply */
  readonly totalSupply: string;
}

/** Names of the rounding strategy variants selectable at construction. */
export type SupplyChangeStrategyName = "derived" | "trusted";
export type TransferRoundingStrategyName = "derived" | "independent";
export type BurnPolicyName = "strict" | "naive";

/**
 * Strategy selection carried in snapshots so a restored ledger
 * rounds the same way it did before.
 */
export interface StrategySelection {
  readonly supplyChange: SupplyChangeStrategyName;
  readonly transferRounding: TransferRoundingStrategyName;
  readonly burnPolicy: BurnPolicyName;
}

/**
 * A single ledger operation, as submitted by callers, journaled,
 * and replayed.
 */
export type LedgerOperation =
  | { readonly kind: "mint"; readonly account: AccountId; readonly amount: string }
  | { readonly kind: "burn"; readonly account: AccountId; readonly amount: string }
  | {
      readonly kind: "transfer";
      readonly from: AccountId;
      readonly to: AccountId;
      readonly amount: string;
    }
  | { readonly kind: "optIn"; readonly account: AccountId }
  | { readonly kind: "optOut"; readonly account: AccountId }
  | { readonly kind: "changeSupply"; readonly newTotalSupply: string };

export type LedgerOperationKind = LedgerOperation["kind"];

/**
 * Serializable snapshot of a ledger.
 */
export interface LedgerSnapshotRecord {
  readonly version: 1;
  readonly strategies: StrategySelection;
  readonly global: GlobalStateRecord;
  readonly accounts: readonly AccountRecord[];

  /** Signed accumulator; present only for rounding-tracked ledgers */
  readonly roundingErrorAccumulator?: string;

  readonly createdAt: string;
}

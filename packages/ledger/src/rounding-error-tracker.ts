/**
 * @rebasekit/ledger — Rounding error tracking decorator.
 *
 * Wraps a RebasingLedger and, around every successful mint, burn and
 * transfer, compares the balance change actually observed on the
 * touched accounts with the change the operation made to totalSupply.
 * The difference accumulates in a signed counter and is folded into
 * totalSupply(), floored at zero.
 *
 *   transfer: Δfrom + Δto          (supply change 0)
 *   mint:     Δaccount - amount
 *   burn:     Δaccount + amount
 *
 * A rebase rescales the rebasing side from its credits, which drops any
 * drift recorded there, while the non-rebasing side keeps whatever gap
 * nonRebasingSupply has against the locked balances. So the tracker
 * also follows that gap, and after every changeSupply that moves the
 * multiplier the accumulator restarts from it. The truncation a rebase
 * itself introduces is spread across every rebasing account and is not
 * measured.
 *
 * Opt-in already corrects totalSupply itself; opt-out moves no balance.
 */

import type { AccountId, LedgerSnapshotRecord, StrategySelection } from "@rebasekit/types";
import { isLedgerSnapshotRecord } from "@rebasekit/types";
import { withReportedTotalSupply } from "./audit.js";
import { RebasingLedger } from "./ledger.js";
import type {
  AccountView,
  AuditReport,
  BalanceUpdate,
  GlobalState,
  LedgerResult,
  OptResult,
  SupplyChangeResult,
  TokenLedger,
  TransferResult,
} from "./types.js";

/** Touched accounts and the non-rebasing aggregate, read before an operation. */
interface Observation {
  readonly accounts: ReadonlyMap<AccountId, { readonly balance: bigint; readonly isNonRebasing: boolean }>;
  readonly nonRebasingSupply: bigint;
}

export class RoundingErrorTracker implements TokenLedger {
  private readonly _inner: RebasingLedger;
  private _accumulator: bigint;
  private _nonRebasingDrift: bigint;

  constructor(inner: RebasingLedger, accumulator = 0n) {
    this._inner = inner;
    this._accumulator = accumulator;
    const { nonRebasingSupply } = inner.audit();
    this._nonRebasingDrift = nonRebasingSupply.computed - nonRebasingSupply.recorded;
  }

  get strategies(): StrategySelection {
    return this._inner.strategies;
  }

  /** Signed sum of recorded rounding deltas. */
  get roundingErrorAccumulator(): bigint {
    return this._accumulator;
  }

  /** Sum of non-rebasing balances minus the nonRebasingSupply aggregate. */
  get nonRebasingDrift(): bigint {
    return this._nonRebasingDrift;
  }

  // ─── Tracked Operations ──────────────────────────────────────────────

  mint(account: AccountId, amount: bigint): LedgerResult<BalanceUpdate> {
    const observation = this._observe([account]);
    const result = this._inner.mint(account, amount);
    if (result.ok) {
      this._record(observation, amount);
    }
    return result;
  }

  burn(account: AccountId, amount: bigint): LedgerResult<BalanceUpdate> {
    const observation = this._observe([account]);
    const result = this._inner.burn(account, amount);
    if (result.ok) {
      this._record(observation, -amount);
    }
    return result;
  }

  transfer(from: AccountId, to: AccountId, amount: bigint): LedgerResult<TransferResult> {
    const observation = this._observe([from, to]);
    const result = this._inner.transfer(from, to, amount);
    if (result.ok) {
      this._record(observation, 0n);
    }
    return result;
  }

  changeSupply(newTotalSupply: bigint): LedgerResult<SupplyChangeResult> {
    const unchanged = newTotalSupply === this._inner.totalSupply();
    const result = this._inner.changeSupply(newTotalSupply);
    if (result.ok && !unchanged) {
      this._accumulator = this._nonRebasingDrift;
    }
    return result;
  }

  private _observe(ids: readonly AccountId[]): Observation {
    const accounts = new Map<AccountId, { balance: bigint; isNonRebasing: boolean }>();
    for (const id of ids) {
      const view = this._inner.getAccount(id);
      accounts.set(id, { balance: view.balance, isNonRebasing: view.isNonRebasing });
    }
    return { accounts, nonRebasingSupply: this._inner.getGlobalState().nonRebasingSupply };
  }

  /** Fold the observed balance change against the nominal supply change. */
  private _record(observation: Observation, supplyChange: bigint): void {
    let balanceChange = 0n;
    let nonRebasingChange = 0n;
    for (const [id, before] of observation.accounts) {
      const delta = this._inner.balanceOf(id) - before.balance;
      balanceChange += delta;
      if (before.isNonRebasing) {
        nonRebasingChange += delta;
      }
    }

    this._accumulator += balanceChange - supplyChange;
    this._nonRebasingDrift +=
      nonRebasingChange - (this._inner.getGlobalState().nonRebasingSupply - observation.nonRebasingSupply);
  }

  // ─── Pass-through Operations ─────────────────────────────────────────

  optIn(account: AccountId): LedgerResult<OptResult> {
    return this._inner.optIn(account);
  }

  optOut(account: AccountId): LedgerResult<OptResult> {
    return this._inner.optOut(account);
  }

  guardCommits<T>(guard: () => void, fn: () => T): T {
    return this._inner.guardCommits(guard, fn);
  }

  // ─── Reads ───────────────────────────────────────────────────────────

  balanceOf(account: AccountId): bigint {
    return this._inner.balanceOf(account);
  }

  creditsPerToken(account: AccountId): bigint {
    return this._inner.creditsPerToken(account);
  }

  getAccount(account: AccountId): AccountView {
    return this._inner.getAccount(account);
  }

  /** Cached supply plus the accumulator, never below zero. */
  totalSupply(): bigint {
    const reported = this._inner.totalSupply() + this._accumulator;
    return reported < 0n ? 0n : reported;
  }

  getGlobalState(): GlobalState {
    return this._inner.getGlobalState();
  }

  audit(): AuditReport {
    return withReportedTotalSupply(this._inner.audit(), this.totalSupply());
  }

  // ─── Snapshot (Persistence) ──────────────────────────────────────────

  snapshot(createdAt?: string): LedgerSnapshotRecord {
    return {
      ...this._inner.snapshot(createdAt),
      roundingErrorAccumulator: this._accumulator.toString(),
    };
  }

  static fromSnapshot(snapshot: unknown): RoundingErrorTracker {
    const inner = RebasingLedger.fromSnapshot(snapshot);
    const accumulator =
      isLedgerSnapshotRecord(snapshot) && snapshot.roundingErrorAccumulator !== undefined
        ? BigInt(snapshot.roundingErrorAccumulator)
        : 0n;
    return new RoundingErrorTracker(inner, accumulator);
  }
}

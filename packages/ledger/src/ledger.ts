/**
 * @rebasekit/ledger — Core RebasingLedger class.
 *
 * Credit/multiplier ledger for a rebasing token. Owns one LedgerState
 * exclusively and applies one operation at a time, each atomically:
 * the components work against a fresh stage, and the stage is only
 * committed when the whole operation succeeds.
 *
 * API surface:
 * - mint() / burn() — Change supply at one account
 * - transfer() — Move value between two accounts
 * - optIn() / optOut() — Switch an account between rebasing and non-rebasing
 * - changeSupply() — Rebase every rebasing account in O(1)
 * - balanceOf() / totalSupply() / getAccount() / getGlobalState() — Reads
 * - audit() — O(n) invariant report
 * - guardCommits() — Run a write-ahead hook before each commit
 * - snapshot() / fromSnapshot() — Persistence
 *
 * Mutating calls return a LedgerResult. They never throw LedgerError.
 */

import type { AccountId, AccountRecord, LedgerSnapshotRecord, StrategySelection } from "@rebasekit/types";
import { isLedgerSnapshotRecord } from "@rebasekit/types";
import { AccountLedger, AccountReader } from "./account-ledger.js";
import { auditState } from "./audit.js";
import { assertUint256, PRECISION } from "./fixed-point-math.js";
import { RebaseOptController } from "./rebase-opt-controller.js";
import { fromAccountRecord, fromGlobalRecord, toAccountRecord, toGlobalRecord } from "./snapshot.js";
import { LedgerState } from "./state.js";
import { resolveStrategies } from "./strategies.js";
import { SupplyController } from "./supply-controller.js";
import { TransferEngine } from "./transfer-engine.js";
import type {
  AccountState,
  AccountView,
  AuditReport,
  BalanceUpdate,
  GlobalState,
  LedgerOptions,
  LedgerResult,
  LedgerStrategies,
  OptResult,
  SupplyChangeResult,
  TokenLedger,
  TransferResult,
} from "./types.js";
import { fail, LedgerError, ok } from "./types.js";

/**
 * Components bound to a single staged operation.
 */
interface OperationContext {
  readonly accounts: AccountLedger;
  readonly supply: SupplyController;
}

export class RebasingLedger implements TokenLedger {
  readonly strategies: StrategySelection;

  private readonly _strategies: LedgerStrategies;
  private readonly _state: LedgerState;
  private readonly _reader: AccountReader;
  private _commitGuard: (() => void) | undefined;

  /**
   * @param state - Existing state to take ownership of. When omitted an
   *   empty state is created at `options.initialCreditsPerToken`.
   */
  constructor(options: LedgerOptions = {}, state?: LedgerState) {
    const { selection, strategies } = resolveStrategies(options.strategies);
    this.strategies = selection;
    this._strategies = strategies;
    this._state = state ?? LedgerState.create(options.initialCreditsPerToken ?? PRECISION);
    this._reader = new AccountReader(this._state);
  }

  // ─── Operations ──────────────────────────────────────────────────────

  mint(account: AccountId, amount: bigint): LedgerResult<BalanceUpdate> {
    return this._execute(({ supply }) => {
      assertUint256(amount, "amount");
      return supply.mint(account, amount);
    });
  }

  burn(account: AccountId, amount: bigint): LedgerResult<BalanceUpdate> {
    return this._execute(({ supply }) => {
      assertUint256(amount, "amount");
      return supply.burn(account, amount);
    });
  }

  transfer(from: AccountId, to: AccountId, amount: bigint): LedgerResult<TransferResult> {
    return this._execute(({ accounts, supply }) => {
      assertUint256(amount, "amount");
      return new TransferEngine(accounts, supply, this._strategies.transferRounding).transfer(from, to, amount);
    });
  }

  optIn(account: AccountId): LedgerResult<OptResult> {
    return this._execute(({ accounts, supply }) => new RebaseOptController(accounts, supply).optIn(account));
  }

  optOut(account: AccountId): LedgerResult<OptResult> {
    return this._execute(({ accounts, supply }) => new RebaseOptController(accounts, supply).optOut(account));
  }

  changeSupply(newTotalSupply: bigint): LedgerResult<SupplyChangeResult> {
    return this._execute(({ supply }) => {
      assertUint256(newTotalSupply, "newTotalSupply");
      return supply.changeSupply(newTotalSupply);
    });
  }

  guardCommits<T>(guard: () => void, fn: () => T): T {
    const previous = this._commitGuard;
    this._commitGuard = guard;
    try {
      return fn();
    } finally {
      this._commitGuard = previous;
    }
  }

  /**
   * Run one operation against a fresh stage. LedgerError aborts the
   * operation and is returned; anything else (including a failing
   * commit guard) propagates with the stage discarded.
   */
  private _execute<T>(run: (context: OperationContext) => T): LedgerResult<T> {
    const stage = this._state.begin();
    const accounts = new AccountLedger(stage);
    const supply = new SupplyController(stage, accounts, this._strategies);

    try {
      const value = run({ accounts, supply });
      this._commitGuard?.();
      stage.commit();
      return ok(value);
    } catch (err: unknown) {
      if (err instanceof LedgerError) {
        return fail(err);
      }
      throw err;
    }
  }

  // ─── Reads ───────────────────────────────────────────────────────────

  balanceOf(account: AccountId): bigint {
    return this._reader.balanceOf(account);
  }

  creditsPerToken(account: AccountId): bigint {
    return this._reader.creditsPerToken(account);
  }

  getAccount(account: AccountId): AccountView {
    const state = this._state.getAccount(account);
    return {
      accountId: account,
      credits: state.credits,
      balance: this._reader.balanceOf(account),
      creditsPerToken: this._reader.creditsPerToken(account),
      isNonRebasing: state.isNonRebasing,
    };
  }

  hasAccount(account: AccountId): boolean {
    return this._state.hasAccount(account);
  }

  get accountCount(): number {
    return this._state.accountCount;
  }

  totalSupply(): bigint {
    return this._state.getGlobal().totalSupply;
  }

  getGlobalState(): GlobalState {
    return this._state.getGlobal();
  }

  audit(): AuditReport {
    return auditState(this._state, this.totalSupply());
  }

  // ─── Snapshot (Persistence) ──────────────────────────────────────────

  snapshot(createdAt?: string): LedgerSnapshotRecord {
    const accounts: AccountRecord[] = [];
    for (const [id, account] of this._state.entries()) {
      accounts.push(toAccountRecord(id, account));
    }
    return {
      version: 1,
      strategies: this.strategies,
      global: toGlobalRecord(this._state.getGlobal()),
      accounts,
      createdAt: createdAt ?? new Date().toISOString(),
    };
  }

  /**
   * Restore a ledger from a snapshot (typically parsed JSON).
   * Throws LedgerError("INVALID_SNAPSHOT") on any malformed field.
   */
  static fromSnapshot(snapshot: unknown): RebasingLedger {
    if (!isLedgerSnapshotRecord(snapshot)) {
      throw new LedgerError("INVALID_SNAPSHOT", "Snapshot does not match the version 1 layout");
    }

    const accounts = new Map<AccountId, AccountState>();
    for (const record of snapshot.accounts) {
      if (accounts.has(record.id)) {
        throw new LedgerError("INVALID_SNAPSHOT", `Duplicate account in snapshot: "${record.id}"`);
      }
      accounts.set(record.id, fromAccountRecord(record));
    }

    const state = new LedgerState(fromGlobalRecord(snapshot.global), accounts);
    return new RebasingLedger({ strategies: snapshot.strategies }, state);
  }
}

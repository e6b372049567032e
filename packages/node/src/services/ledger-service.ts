/**
 * @rebasekit/node — Ledger service.
 *
 * Owns one ledger (optionally wrapped in the rounding-error tracker),
 * the sequencer in front of it and the journal behind it. Construction
 * replays the journal, so a service built on an existing journal comes
 * up with the state it had before the restart.
 *
 * Mutations are async (they queue behind the sequencer) and take an
 * optional context whose fields go into the sequencer's log lines;
 * reads are synchronous and see the state after the last applied
 * operation. After stop() every mutation rejects with
 * SequencerClosedError.
 */

import pino from "pino";
import type { AccountId, StrategySelection } from "@rebasekit/types";
import { RebasingLedger, RoundingErrorTracker } from "@rebasekit/ledger";
import type {
  AccountView,
  AuditReport,
  BalanceUpdate,
  GlobalState,
  LedgerOptions,
  OptResult,
  SupplyChangeResult,
  TokenLedger,
  TransferResult,
} from "@rebasekit/ledger";
import { InMemoryJournal } from "./journal.js";
import type { OperationJournal } from "./journal.js";
import { LedgerSequencer } from "./sequencer.js";
import type { Sequenced, SequencerLogger, SubmitContext } from "./sequencer.js";

// =============================================================================
// Options
// =============================================================================

export interface LedgerServiceOptions {
  readonly ledger?: LedgerOptions | undefined;
  /** Wrap the ledger in RoundingErrorTracker. Default: false */
  readonly trackRoundingErrors?: boolean | undefined;
  /** Default: a fresh InMemoryJournal */
  readonly journal?: OperationJournal | undefined;
  /** Default: a silent pino logger */
  readonly logger?: SequencerLogger | undefined;
}

/** Global state plus what totalSupply() reports. */
export interface SupplyView {
  readonly global: GlobalState;
  readonly reportedTotalSupply: bigint;
  /** Present when rounding errors are tracked */
  readonly roundingErrorAccumulator?: bigint | undefined;
  readonly strategies: StrategySelection;
  readonly sequence: number;
}

// =============================================================================
// Service
// =============================================================================

export class LedgerService {
  private readonly _ledger: TokenLedger;
  private readonly _tracker: RoundingErrorTracker | undefined;
  private readonly _sequencer: LedgerSequencer;
  private readonly _replayed: number;

  /**
   * @throws Error if the journal does not replay cleanly
   */
  constructor(options: LedgerServiceOptions = {}) {
    const base = new RebasingLedger(options.ledger);
    this._tracker = options.trackRoundingErrors === true ? new RoundingErrorTracker(base) : undefined;
    this._ledger = this._tracker ?? base;

    const journal = options.journal ?? new InMemoryJournal();
    const logger = options.logger ?? pino({ level: "silent" });
    this._sequencer = new LedgerSequencer(this._ledger, journal, logger);
    this._replayed = this._sequencer.replay(journal.readAll());
  }

  // ─── Mutations ───────────────────────────────────────────────────────

  mint(account: AccountId, amount: bigint, context?: SubmitContext): Promise<Sequenced<BalanceUpdate>> {
    return this._sequencer.submit(
      { kind: "mint", account, amount: amount.toString() },
      (ledger) => ledger.mint(account, amount),
      context,
    );
  }

  burn(account: AccountId, amount: bigint, context?: SubmitContext): Promise<Sequenced<BalanceUpdate>> {
    return this._sequencer.submit(
      { kind: "burn", account, amount: amount.toString() },
      (ledger) => ledger.burn(account, amount),
      context,
    );
  }

  transfer(
    from: AccountId,
    to: AccountId,
    amount: bigint,
    context?: SubmitContext,
  ): Promise<Sequenced<TransferResult>> {
    return this._sequencer.submit(
      { kind: "transfer", from, to, amount: amount.toString() },
      (ledger) => ledger.transfer(from, to, amount),
      context,
    );
  }

  optIn(account: AccountId, context?: SubmitContext): Promise<Sequenced<OptResult>> {
    return this._sequencer.submit({ kind: "optIn", account }, (ledger) => ledger.optIn(account), context);
  }

  optOut(account: AccountId, context?: SubmitContext): Promise<Sequenced<OptResult>> {
    return this._sequencer.submit({ kind: "optOut", account }, (ledger) => ledger.optOut(account), context);
  }

  changeSupply(newTotalSupply: bigint, context?: SubmitContext): Promise<Sequenced<SupplyChangeResult>> {
    return this._sequencer.submit(
      { kind: "changeSupply", newTotalSupply: newTotalSupply.toString() },
      (ledger) => ledger.changeSupply(newTotalSupply),
      context,
    );
  }

  // ─── Reads ───────────────────────────────────────────────────────────

  getAccount(account: AccountId): AccountView {
    return this._ledger.getAccount(account);
  }

  getSupply(): SupplyView {
    return {
      global: this._ledger.getGlobalState(),
      reportedTotalSupply: this._ledger.totalSupply(),
      roundingErrorAccumulator: this._tracker?.roundingErrorAccumulator,
      strategies: this._ledger.strategies,
      sequence: this._sequencer.sequence,
    };
  }

  audit(): AuditReport {
    return this._ledger.audit();
  }

  get strategies(): StrategySelection {
    return this._ledger.strategies;
  }

  get trackingRoundingErrors(): boolean {
    return this._tracker !== undefined;
  }

  /** Sequence number of the last applied operation. */
  get sequence(): number {
    return this._sequencer.sequence;
  }

  /** Number of journal entries applied at construction. */
  get replayed(): number {
    return this._replayed;
  }

  // ─── Lifecycle ───────────────────────────────────────────────────────

  /** False after stop() or once an operation failed to commit. */
  isReady(): boolean {
    return !this._sequencer.closed && this._sequencer.healthy;
  }

  /**
   * Refuse further mutations and wait for queued operations to finish.
   */
  stop(): Promise<void> {
    return this._sequencer.close();
  }
}

/**
 * @rebasekit/node — Ledger sequencer.
 *
 * Callers may submit operations concurrently; the sequencer runs them
 * one at a time in submission order. Each operation that succeeds gets
 * the next sequence number and is journaled before the ledger commits
 * it, so everything a submitter hears back as applied survives a
 * restart. Rejected operations get no number and are not journaled.
 *
 * A failed append discards the operation and stops the sequencer:
 * that submission and every later one reject with SequencerClosedError
 * (the failing one with the journal's own error). close() stops
 * intake the same way after letting queued work finish.
 */

import type { Logger } from "pino";
import type { LedgerOperation } from "@rebasekit/types";
import { applyOperation, describeOperation } from "@rebasekit/ledger";
import type { LedgerError, LedgerResult, OperationValue, TokenLedger } from "@rebasekit/ledger";
import type { JournalEntry, OperationJournal } from "./journal.js";

export type Sequenced<T> =
  | { readonly ok: true; readonly sequence: number; readonly value: T }
  | { readonly ok: false; readonly error: LedgerError };

export type SequencerLogger = Pick<Logger, "debug" | "warn" | "error">;

/** Fields carried into every log line about one submission. */
export interface SubmitContext {
  readonly requestId?: string | undefined;
}

/** The sequencer no longer takes operations. */
export class SequencerClosedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SequencerClosedError";
  }
}

export class LedgerSequencer {
  private _tail: Promise<void> = Promise.resolve();
  private _sequence = 0;
  private _failed = false;
  private _closed = false;

  constructor(
    private readonly _ledger: TokenLedger,
    private readonly _journal: OperationJournal,
    private readonly _logger: SequencerLogger,
  ) {}

  /** Sequence number of the last applied operation (0 when none). */
  get sequence(): number {
    return this._sequence;
  }

  /** False once an operation failed to commit. */
  get healthy(): boolean {
    return !this._failed;
  }

  get closed(): boolean {
    return this._closed;
  }

  /**
   * Queue an operation. `apply` performs it on the ledger; `operation`
   * is its wire form, written to the journal before the commit.
   */
  submit<T>(
    operation: LedgerOperation,
    apply: (ledger: TokenLedger) => LedgerResult<T>,
    context: SubmitContext = {},
  ): Promise<Sequenced<T>> {
    if (this._closed) {
      return Promise.reject(new SequencerClosedError("Sequencer is closed"));
    }

    const run = this._tail.then(() => this._run(operation, apply, context));
    // The submitter observes failures through `run`; the queue keeps going.
    this._tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  /** Queue a wire operation as-is. */
  submitOperation(operation: LedgerOperation, context?: SubmitContext): Promise<Sequenced<OperationValue>> {
    return this.submit(operation, (ledger) => applyOperation(ledger, operation), context);
  }

  /** Resolves once every operation submitted so far has finished. */
  drain(): Promise<void> {
    return this._tail;
  }

  /** Refuse further submissions and wait for the queued ones. */
  close(): Promise<void> {
    this._closed = true;
    return this.drain();
  }

  /**
   * Re-apply journaled operations without journaling them again.
   * Must run before any submission.
   *
   * @throws Error if an entry is out of sequence or no longer applies
   */
  replay(entries: readonly JournalEntry[]): number {
    for (const entry of entries) {
      if (entry.sequence !== this._sequence + 1) {
        throw new Error(
          `Journal out of sequence: expected ${this._sequence + 1}, found ${entry.sequence}`,
        );
      }

      const result = applyOperation(this._ledger, entry.operation);
      if (!result.ok) {
        throw new Error(
          `Journal entry ${entry.sequence} (${describeOperation(entry.operation)}) failed to replay: ${result.error.code}`,
        );
      }
      this._sequence = entry.sequence;
    }
    return entries.length;
  }

  private _run<T>(
    operation: LedgerOperation,
    apply: (ledger: TokenLedger) => LedgerResult<T>,
    context: SubmitContext,
  ): Sequenced<T> {
    if (this._failed) {
      throw new SequencerClosedError("Sequencer stopped after a failed commit");
    }

    const description = describeOperation(operation);
    const sequence = this._sequence + 1;

    let result: LedgerResult<T>;
    try {
      result = this._ledger.guardCommits(
        () => this._journal.append({ sequence, operation, appliedAt: new Date().toISOString() }),
        () => apply(this._ledger),
      );
    } catch (err: unknown) {
      this._failed = true;
      this._logger.error({ ...context, err, sequence, operation: description }, "Journal append failed");
      throw err;
    }

    if (!result.ok) {
      this._logger.warn(
        { ...context, operation: description, code: result.error.code, reason: result.error.message },
        "Operation rejected",
      );
      return { ok: false, error: result.error };
    }

    this._sequence = sequence;
    this._logger.debug({ ...context, sequence, operation: description }, "Operation applied");
    return { ok: true, sequence, value: result.value };
  }
}

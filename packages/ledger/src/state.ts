/**
 * @rebasekit/ledger — Ledger state and staged writes.
 *
 * LedgerState is the one explicitly constructed value holding the
 * account table and the global record. Operations never write to it
 * directly: they work against a StagedLedgerState that buffers every
 * record it replaces, and commit() publishes the buffer in one step.
 * An abandoned stage leaves the state untouched.
 *
 * Staging costs O(accounts touched), never O(accounts in the ledger).
 */

import type { AccountId } from "@rebasekit/types";
import { PRECISION } from "./fixed-point-math.js";
import type { AccountState, GlobalState, LedgerReader, LedgerStore } from "./types.js";
import { LedgerError } from "./types.js";

/** Unknown accounts read as this value. */
export const EMPTY_ACCOUNT: AccountState = { credits: 0n, isNonRebasing: false };

type Publish = (writes: ReadonlyMap<AccountId, AccountState>, global: GlobalState) => void;

/**
 * Committed ledger state.
 */
export class LedgerState implements LedgerReader {
  private readonly _accounts: Map<AccountId, AccountState>;
  private _global: GlobalState;

  constructor(global: GlobalState, accounts?: Iterable<readonly [AccountId, AccountState]>) {
    if (global.rebasingCreditsPerToken <= 0n) {
      throw new LedgerError("INVALID_AMOUNT", "rebasingCreditsPerToken must be greater than zero");
    }
    this._global = global;
    this._accounts = new Map(accounts);
  }

  /**
   * Create an empty ledger state.
   */
  static create(initialCreditsPerToken: bigint = PRECISION): LedgerState {
    return new LedgerState({
      rebasingCredits: 0n,
      rebasingCreditsPerToken: initialCreditsPerToken,
      nonRebasingSupply: 0n,
      totalSupply: 0n,
    });
  }

  getAccount(id: AccountId): AccountState {
    return this._accounts.get(id) ?? EMPTY_ACCOUNT;
  }

  hasAccount(id: AccountId): boolean {
    return this._accounts.has(id);
  }

  getGlobal(): GlobalState {
    return this._global;
  }

  /** Iterate committed accounts in insertion order. */
  entries(): IterableIterator<[AccountId, AccountState]> {
    return this._accounts.entries();
  }

  get accountCount(): number {
    return this._accounts.size;
  }

  /**
   * Open a stage for one operation.
   */
  begin(): StagedLedgerState {
    return new StagedLedgerState(this, (writes, global) => {
      for (const [id, account] of writes) {
        this._accounts.set(id, account);
      }
      this._global = global;
    });
  }
}

/**
 * Write buffer over a LedgerState.
 */
export class StagedLedgerState implements LedgerStore {
  private readonly _writes = new Map<AccountId, AccountState>();
  private _global: GlobalState;
  private _committed = false;

  constructor(
    private readonly _base: LedgerReader,
    private readonly _publish: Publish,
  ) {
    this._global = _base.getGlobal();
  }

  getAccount(id: AccountId): AccountState {
    return this._writes.get(id) ?? this._base.getAccount(id);
  }

  setAccount(id: AccountId, account: AccountState): void {
    this._writes.set(id, account);
  }

  getGlobal(): GlobalState {
    return this._global;
  }

  setGlobal(global: GlobalState): void {
    this._global = global;
  }

  /** Number of accounts this stage will write. */
  get writeCount(): number {
    return this._writes.size;
  }

  commit(): void {
    if (this._committed) {
      throw new Error("Stage already committed");
    }
    this._committed = true;
    this._publish(this._writes, this._global);
  }
}

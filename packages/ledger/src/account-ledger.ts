/**
 * @rebasekit/ledger — Per-account credit storage.
 *
 * Owns the conversion from credits to balances and the raw credit
 * mutations. Aggregates (rebasingCredits, nonRebasingSupply,
 * totalSupply) are the SupplyController's business, not this one's.
 *
 * Rules:
 * - Rebasing accounts use the global multiplier
 * - Non-rebasing accounts use their locked snapshot
 * - Credit subtraction never goes below zero
 */

import type { AccountId } from "@rebasekit/types";
import { checkedAdd, divPrecisely } from "./fixed-point-math.js";
import type { AccountState, GlobalState, LedgerReader, LedgerStore } from "./types.js";
import { LedgerError } from "./types.js";

/**
 * Multiplier that applies to an account.
 */
export function creditsPerTokenOf(account: AccountState, global: GlobalState): bigint {
  return account.isNonRebasing ? account.lockedCreditsPerToken : global.rebasingCreditsPerToken;
}

/**
 * Token balance of an account.
 */
export function balanceOfAccount(account: AccountState, global: GlobalState): bigint {
  return divPrecisely(account.credits, creditsPerTokenOf(account, global));
}

/**
 * Read-only account queries over committed state.
 */
export class AccountReader {
  constructor(protected readonly reader: LedgerReader) {}

  getAccount(id: AccountId): AccountState {
    return this.reader.getAccount(id);
  }

  creditsPerToken(id: AccountId): bigint {
    return creditsPerTokenOf(this.reader.getAccount(id), this.reader.getGlobal());
  }

  balanceOf(id: AccountId): bigint {
    return balanceOfAccount(this.reader.getAccount(id), this.reader.getGlobal());
  }
}

/**
 * Account queries plus raw credit mutation, bound to one staged operation.
 */
export class AccountLedger extends AccountReader {
  constructor(private readonly _store: LedgerStore) {
    super(_store);
  }

  addCredits(id: AccountId, credits: bigint): void {
    const account = this._store.getAccount(id);
    this._store.setAccount(id, { ...account, credits: checkedAdd(account.credits, credits) });
  }

  /**
   * Throws INSUFFICIENT_CREDITS when the account holds fewer credits.
   */
  subCredits(id: AccountId, credits: bigint): void {
    const account = this._store.getAccount(id);
    if (account.credits < credits) {
      throw new LedgerError(
        "INSUFFICIENT_CREDITS",
        `Account "${id}" holds ${account.credits.toString()} credits, cannot remove ${credits.toString()}`,
      );
    }
    this._store.setAccount(id, { ...account, credits: account.credits - credits });
  }

  /** Replace an account record wholesale (class changes). */
  replaceAccount(id: AccountId, account: AccountState): void {
    this._store.setAccount(id, account);
  }
}

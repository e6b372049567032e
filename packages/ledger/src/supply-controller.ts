/**
 * @rebasekit/ledger — Global multiplier and supply bookkeeping.
 *
 * Owns the GlobalState record: the rebasing multiplier, the two
 * aggregates that partition supply (rebasingCredits in credits,
 * nonRebasingSupply in tokens) and the cached totalSupply.
 *
 * changeSupply rescales every rebasing balance with a single
 * divPrecisely on the multiplier. Per-account truncation afterwards
 * means rebasing balances may sum to less than the cached supply by up
 * to (rebasing accounts - 1) units; nothing here can detect that
 * without iterating accounts, so the rounding tracker does not cover it.
 */

import type { AccountId } from "@rebasekit/types";
import type { AccountLedger } from "./account-ledger.js";
import { applyDelta, divPrecisely, mulTruncate } from "./fixed-point-math.js";
import type {
  BalanceUpdate,
  GlobalState,
  LedgerStore,
  LedgerStrategies,
  SupplyChangeResult,
} from "./types.js";
import { LedgerError } from "./types.js";

export class SupplyController {
  constructor(
    private readonly _store: LedgerStore,
    private readonly _accounts: AccountLedger,
    private readonly _strategies: Pick<LedgerStrategies, "supplyChange" | "burnPolicy">,
  ) {}

  get global(): GlobalState {
    return this._store.getGlobal();
  }

  // ─── Aggregate Adjustments ───────────────────────────────────────────

  adjustRebasingCredits(delta: bigint): void {
    const global = this.global;
    this._store.setGlobal({ ...global, rebasingCredits: applyDelta(global.rebasingCredits, delta) });
  }

  adjustNonRebasingSupply(delta: bigint): void {
    const global = this.global;
    this._store.setGlobal({ ...global, nonRebasingSupply: applyDelta(global.nonRebasingSupply, delta) });
  }

  adjustTotalSupply(delta: bigint): void {
    const global = this.global;
    this._store.setGlobal({ ...global, totalSupply: applyDelta(global.totalSupply, delta) });
  }

  // ─── Supply Change ───────────────────────────────────────────────────

  /**
   * Rebase to a new total supply by recomputing the global multiplier.
   *
   * Fails with INVALID_SUPPLY_CHANGE when the request is below the
   * non-rebasing supply or would leave the multiplier at zero.
   */
  changeSupply(newTotalSupply: bigint): SupplyChangeResult {
    const global = this.global;

    if (newTotalSupply === global.totalSupply) {
      return {
        rebasingCreditsPerToken: global.rebasingCreditsPerToken,
        totalSupply: global.totalSupply,
      };
    }

    if (newTotalSupply < global.nonRebasingSupply) {
      throw new LedgerError(
        "INVALID_SUPPLY_CHANGE",
        `New total supply ${newTotalSupply.toString()} is below non-rebasing supply ${global.nonRebasingSupply.toString()}`,
      );
    }

    const rebasingSupply = newTotalSupply - global.nonRebasingSupply;
    if (rebasingSupply === 0n) {
      throw new LedgerError("INVALID_SUPPLY_CHANGE", "New total supply leaves no rebasing supply");
    }

    const rebasingCreditsPerToken = divPrecisely(global.rebasingCredits, rebasingSupply);
    if (rebasingCreditsPerToken === 0n) {
      throw new LedgerError(
        "INVALID_SUPPLY_CHANGE",
        `New total supply ${newTotalSupply.toString()} drives the rebasing multiplier to zero`,
      );
    }

    const totalSupply = this._strategies.supplyChange.resolveTotalSupply({
      requestedTotalSupply: newTotalSupply,
      rebasingCredits: global.rebasingCredits,
      rebasingCreditsPerToken,
      nonRebasingSupply: global.nonRebasingSupply,
    });

    this._store.setGlobal({ ...global, rebasingCreditsPerToken, totalSupply });
    return { rebasingCreditsPerToken, totalSupply };
  }

  // ─── Mint / Burn ─────────────────────────────────────────────────────

  mint(id: AccountId, amount: bigint): BalanceUpdate {
    const account = this._accounts.getAccount(id);
    const creditAmount = mulTruncate(amount, this._accounts.creditsPerToken(id));

    this._accounts.addCredits(id, creditAmount);
    if (account.isNonRebasing) {
      this.adjustNonRebasingSupply(amount);
    } else {
      this.adjustRebasingCredits(creditAmount);
    }
    this.adjustTotalSupply(amount);

    return { accountId: id, balance: this._accounts.balanceOf(id) };
  }

  burn(id: AccountId, amount: bigint): BalanceUpdate {
    const account = this._accounts.getAccount(id);
    const creditsPerToken = this._accounts.creditsPerToken(id);
    const creditAmount = mulTruncate(amount, creditsPerToken);
    const policy = this._strategies.burnPolicy;

    policy.checkCreditAmount(amount, creditAmount);

    if (account.credits < creditAmount) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `Account "${id}" cannot burn ${amount.toString()}: balance is ${this._accounts.balanceOf(id).toString()}`,
      );
    }

    this._accounts.subCredits(id, creditAmount);
    if (account.isNonRebasing) {
      const reduction = policy.nonRebasingSupplyReduction(amount, creditAmount, creditsPerToken);
      this.adjustNonRebasingSupply(-reduction);
    } else {
      this.adjustRebasingCredits(-creditAmount);
    }
    this.adjustTotalSupply(-amount);

    return { accountId: id, balance: this._accounts.balanceOf(id) };
  }
}

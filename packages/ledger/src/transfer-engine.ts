/**
 * @rebasekit/ledger — Cross-account value movement.
 *
 * Sender and recipient may sit on different multipliers (one rebasing,
 * one non-rebasing, or two different locked snapshots). The
 * TransferRoundingStrategy decides how many credits leave and arrive;
 * this engine applies them and keeps the aggregates in step:
 *
 * - rebasing side → rebasingCredits moves by the credits
 * - non-rebasing side → nonRebasingSupply moves by the actual balance change
 *
 * totalSupply is never touched by a transfer.
 */

import type { AccountId } from "@rebasekit/types";
import type { AccountLedger } from "./account-ledger.js";
import type { SupplyController } from "./supply-controller.js";
import type { TransferResult, TransferRoundingStrategy } from "./types.js";
import { LedgerError } from "./types.js";

export class TransferEngine {
  constructor(
    private readonly _accounts: AccountLedger,
    private readonly _supply: SupplyController,
    private readonly _rounding: TransferRoundingStrategy,
  ) {}

  transfer(from: AccountId, to: AccountId, amount: bigint): TransferResult {
    const fromCpt = this._accounts.creditsPerToken(from);
    const toCpt = this._accounts.creditsPerToken(to);
    const { creditsDeducted, creditsCredited } = this._rounding.computeCredits(amount, fromCpt, toCpt);

    const fromAccount = this._accounts.getAccount(from);
    const toAccount = this._accounts.getAccount(to);
    const fromBefore = this._accounts.balanceOf(from);
    const toBefore = this._accounts.balanceOf(to);

    if (fromAccount.credits < creditsDeducted) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `Account "${from}" cannot transfer ${amount.toString()}: balance is ${fromBefore.toString()}`,
      );
    }

    this._accounts.subCredits(from, creditsDeducted);
    this._accounts.addCredits(to, creditsCredited);

    // Self-transfers share one multiplier, so both sides move the same credits.
    if (from !== to) {
      if (fromAccount.isNonRebasing) {
        this._supply.adjustNonRebasingSupply(this._accounts.balanceOf(from) - fromBefore);
      } else {
        this._supply.adjustRebasingCredits(-creditsDeducted);
      }

      if (toAccount.isNonRebasing) {
        this._supply.adjustNonRebasingSupply(this._accounts.balanceOf(to) - toBefore);
      } else {
        this._supply.adjustRebasingCredits(creditsCredited);
      }
    }

    return {
      from: { accountId: from, balance: this._accounts.balanceOf(from) },
      to: { accountId: to, balance: this._accounts.balanceOf(to) },
      creditsDeducted,
      creditsCredited,
    };
  }
}

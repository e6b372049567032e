/**
 * @rebasekit/ledger — Opt-in / opt-out state machine.
 *
 * Rebasing ⇄ NonRebasing, per account.
 *
 * optOut freezes the current global multiplier into the account, so
 * its balance is unchanged by construction. optIn re-expresses the
 * credits under the global multiplier; when the two multipliers differ
 * the balance can move by a minimal unit, and totalSupply is adjusted
 * by the same amount to keep the local balance sum intact.
 */

import type { AccountId } from "@rebasekit/types";
import type { AccountLedger } from "./account-ledger.js";
import { divPrecisely, mulTruncate } from "./fixed-point-math.js";
import type { SupplyController } from "./supply-controller.js";
import type { OptResult } from "./types.js";
import { LedgerError } from "./types.js";

export class RebaseOptController {
  constructor(
    private readonly _accounts: AccountLedger,
    private readonly _supply: SupplyController,
  ) {}

  optOut(id: AccountId): OptResult {
    const account = this._accounts.getAccount(id);
    if (account.isNonRebasing) {
      throw new LedgerError("ALREADY_IN_STATE", `Account "${id}" is already non-rebasing`);
    }

    const balance = this._accounts.balanceOf(id);
    const lockedCreditsPerToken = this._supply.global.rebasingCreditsPerToken;

    this._supply.adjustRebasingCredits(-account.credits);
    this._supply.adjustNonRebasingSupply(balance);
    this._accounts.replaceAccount(id, {
      credits: account.credits,
      isNonRebasing: true,
      lockedCreditsPerToken,
    });

    return { accountId: id, balance, isNonRebasing: true, supplyAdjustment: 0n };
  }

  optIn(id: AccountId): OptResult {
    const account = this._accounts.getAccount(id);
    if (!account.isNonRebasing) {
      throw new LedgerError("ALREADY_IN_STATE", `Account "${id}" is already rebasing`);
    }

    const oldBalance = this._accounts.balanceOf(id);
    const rebasingCreditsPerToken = this._supply.global.rebasingCreditsPerToken;

    // Re-expressing at an unchanged multiplier is the identity.
    const credits =
      account.lockedCreditsPerToken === rebasingCreditsPerToken
        ? account.credits
        : mulTruncate(divPrecisely(account.credits, account.lockedCreditsPerToken), rebasingCreditsPerToken);

    this._accounts.replaceAccount(id, { credits, isNonRebasing: false });
    this._supply.adjustNonRebasingSupply(-oldBalance);
    this._supply.adjustRebasingCredits(credits);

    const newBalance = this._accounts.balanceOf(id);
    const supplyAdjustment = newBalance - oldBalance;
    this._supply.adjustTotalSupply(supplyAdjustment);

    return { accountId: id, balance: newBalance, isNonRebasing: false, supplyAdjustment };
  }
}

/**
 * @rebasekit/ledger — Rounding strategy variants.
 *
 * Each numeric policy has a historical variant and an improved one,
 * selected at construction so both can run side by side:
 *
 * - SupplyChangeStrategy: "derived" (default) recomputes totalSupply from
 *   the new multiplier; "trusted" caches the requested value as given.
 * - TransferRoundingStrategy: "derived" (default) computes the side with
 *   the coarser multiplier first and re-derives the other from it;
 *   "independent" truncates both sides straight from the amount.
 * - BurnPolicy: "strict" (default) rejects dust burns and books the
 *   actual non-rebasing balance change; "naive" accepts zero-credit
 *   burns and books the nominal amount.
 */

import type {
  BurnPolicyName,
  StrategySelection,
  SupplyChangeStrategyName,
  TransferRoundingStrategyName,
} from "@rebasekit/types";
import { divPrecisely, mulTruncate } from "./fixed-point-math.js";
import type {
  BurnPolicy,
  LedgerStrategies,
  SupplyChangeStrategy,
  TransferRoundingStrategy,
} from "./types.js";
import { LedgerError } from "./types.js";

// ─── Supply Change ───────────────────────────────────────────────────────

export const DERIVED_SUPPLY_CHANGE: SupplyChangeStrategy = {
  name: "derived",
  resolveTotalSupply: (input) =>
    divPrecisely(input.rebasingCredits, input.rebasingCreditsPerToken) + input.nonRebasingSupply,
};

export const TRUSTED_SUPPLY_CHANGE: SupplyChangeStrategy = {
  name: "trusted",
  resolveTotalSupply: (input) => input.requestedTotalSupply,
};

// ─── Transfer Rounding ───────────────────────────────────────────────────

export const DERIVED_TRANSFER_ROUNDING: TransferRoundingStrategy = {
  name: "derived",
  computeCredits(amount, fromCpt, toCpt) {
    if (fromCpt === toCpt) {
      const credits = mulTruncate(amount, fromCpt);
      return { creditsDeducted: credits, creditsCredited: credits };
    }

    if (fromCpt > toCpt) {
      const creditsCredited = mulTruncate(amount, toCpt);
      const creditsDeducted = mulTruncate(divPrecisely(creditsCredited, toCpt), fromCpt);
      return { creditsDeducted, creditsCredited };
    }

    const creditsDeducted = mulTruncate(amount, fromCpt);
    const creditsCredited = mulTruncate(divPrecisely(creditsDeducted, fromCpt), toCpt);
    return { creditsDeducted, creditsCredited };
  },
};

export const INDEPENDENT_TRANSFER_ROUNDING: TransferRoundingStrategy = {
  name: "independent",
  computeCredits: (amount, fromCpt, toCpt) => ({
    creditsDeducted: mulTruncate(amount, fromCpt),
    creditsCredited: mulTruncate(amount, toCpt),
  }),
};

// ─── Burn ────────────────────────────────────────────────────────────────

export const STRICT_BURN_POLICY: BurnPolicy = {
  name: "strict",
  checkCreditAmount(amount, creditAmount) {
    if (amount > 0n && creditAmount === 0n) {
      throw new LedgerError(
        "DUST_AMOUNT_BURN",
        `Burning ${amount.toString()} removes zero credits at the current multiplier`,
      );
    }
  },
  nonRebasingSupplyReduction: (_amount, creditAmount, creditsPerToken) =>
    divPrecisely(creditAmount, creditsPerToken),
};

export const NAIVE_BURN_POLICY: BurnPolicy = {
  name: "naive",
  checkCreditAmount() {
    // accepts zero-credit burns
  },
  nonRebasingSupplyReduction: (amount) => amount,
};

// ─── Registry ────────────────────────────────────────────────────────────

export const SUPPLY_CHANGE_STRATEGIES: Readonly<Record<SupplyChangeStrategyName, SupplyChangeStrategy>> = {
  derived: DERIVED_SUPPLY_CHANGE,
  trusted: TRUSTED_SUPPLY_CHANGE,
};

export const TRANSFER_ROUNDING_STRATEGIES: Readonly<
  Record<TransferRoundingStrategyName, TransferRoundingStrategy>
> = {
  derived: DERIVED_TRANSFER_ROUNDING,
  independent: INDEPENDENT_TRANSFER_ROUNDING,
};

export const BURN_POLICIES: Readonly<Record<BurnPolicyName, BurnPolicy>> = {
  strict: STRICT_BURN_POLICY,
  naive: NAIVE_BURN_POLICY,
};

export const DEFAULT_STRATEGIES: StrategySelection = {
  supplyChange: "derived",
  transferRounding: "derived",
  burnPolicy: "strict",
};

/**
 * Fill unspecified names with the defaults and look up the implementations.
 */
export function resolveStrategies(selection?: Partial<StrategySelection>): {
  readonly selection: StrategySelection;
  readonly strategies: LedgerStrategies;
} {
  const resolved: StrategySelection = {
    supplyChange: selection?.supplyChange ?? DEFAULT_STRATEGIES.supplyChange,
    transferRounding: selection?.transferRounding ?? DEFAULT_STRATEGIES.transferRounding,
    burnPolicy: selection?.burnPolicy ?? DEFAULT_STRATEGIES.burnPolicy,
  };

  return {
    selection: resolved,
    strategies: {
      supplyChange: SUPPLY_CHANGE_STRATEGIES[resolved.supplyChange],
      transferRounding: TRANSFER_ROUNDING_STRATEGIES[resolved.transferRounding],
      burnPolicy: BURN_POLICIES[resolved.burnPolicy],
    },
  };
}

/**
 * Tests for the rounding strategy variants in isolation.
 */

import { describe, it, expect } from "vitest";
import {
  DERIVED_SUPPLY_CHANGE,
  TRUSTED_SUPPLY_CHANGE,
  DERIVED_TRANSFER_ROUNDING,
  INDEPENDENT_TRANSFER_ROUNDING,
  STRICT_BURN_POLICY,
  NAIVE_BURN_POLICY,
  resolveStrategies,
} from "../src/strategies.js";
import { P, TWO_THIRDS, thrownCode } from "./helpers.js";

describe("SupplyChangeStrategy", () => {
  const input = {
    requestedTotalSupply: 3n,
    rebasingCredits: 2n,
    rebasingCreditsPerToken: TWO_THIRDS,
    nonRebasingSupply: 0n,
  };

  it("derived recomputes supply from credits and multiplier", () => {
    expect(DERIVED_SUPPLY_CHANGE.resolveTotalSupply({ ...input, nonRebasingSupply: 4n })).toBe(7n);
  });

  it("trusted returns the requested supply", () => {
    expect(TRUSTED_SUPPLY_CHANGE.resolveTotalSupply({ ...input, requestedTotalSupply: 9n })).toBe(9n);
  });
});

describe("TransferRoundingStrategy", () => {
  it("moves equal credits under equal multipliers", () => {
    expect(DERIVED_TRANSFER_ROUNDING.computeCredits(10n, TWO_THIRDS, TWO_THIRDS)).toEqual({
      creditsDeducted: 6n,
      creditsCredited: 6n,
    });
  });

  it("derived computes the coarser side first", () => {
    expect(DERIVED_TRANSFER_ROUNDING.computeCredits(10n, TWO_THIRDS, P)).toEqual({
      creditsDeducted: 6n,
      creditsCredited: 9n,
    });
    expect(DERIVED_TRANSFER_ROUNDING.computeCredits(10n, P, TWO_THIRDS)).toEqual({
      creditsDeducted: 9n,
      creditsCredited: 6n,
    });
  });

  it("independent truncates both sides from the amount", () => {
    expect(INDEPENDENT_TRANSFER_ROUNDING.computeCredits(10n, TWO_THIRDS, P)).toEqual({
      creditsDeducted: 6n,
      creditsCredited: 10n,
    });
  });
});

describe("BurnPolicy", () => {
  it("strict rejects a positive amount that removes no credits", () => {
    expect(thrownCode(() => STRICT_BURN_POLICY.checkCreditAmount(1n, 0n))).toBe("DUST_AMOUNT_BURN");
    expect(thrownCode(() => STRICT_BURN_POLICY.checkCreditAmount(0n, 0n))).toBeUndefined();
  });

  it("naive accepts it", () => {
    expect(thrownCode(() => NAIVE_BURN_POLICY.checkCreditAmount(1n, 0n))).toBeUndefined();
  });

  it("strict books the credits' token value, naive the nominal amount", () => {
    expect(STRICT_BURN_POLICY.nonRebasingSupplyReduction(2n, 1n, TWO_THIRDS)).toBe(1n);
    expect(NAIVE_BURN_POLICY.nonRebasingSupplyReduction(2n, 1n, TWO_THIRDS)).toBe(2n);
  });
});

describe("resolveStrategies", () => {
  it("maps names to implementations", () => {
    const { selection, strategies } = resolveStrategies({ transferRounding: "independent" });

    expect(selection).toEqual({ supplyChange: "derived", transferRounding: "independent", burnPolicy: "strict" });
    expect(strategies.supplyChange).toBe(DERIVED_SUPPLY_CHANGE);
    expect(strategies.transferRounding).toBe(INDEPENDENT_TRANSFER_ROUNDING);
    expect(strategies.burnPolicy).toBe(STRICT_BURN_POLICY);
  });
});

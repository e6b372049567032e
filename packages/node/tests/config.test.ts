/**
 * Tests for config.ts — loadConfig + ledgerServiceOptions.
 */

import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { loadConfig, ledgerServiceOptions } from "../src/config.js";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    const config = loadConfig({});

    expect(config.PORT).toBe(3000);
    expect(config.HOST).toBe("0.0.0.0");
    expect(config.LOG_LEVEL).toBe("info");
    expect(config.NODE_ENV).toBe("development");
    expect(config.SUPPLY_CHANGE_STRATEGY).toBe("derived");
    expect(config.TRANSFER_ROUNDING).toBe("derived");
    expect(config.BURN_POLICY).toBe("strict");
    expect(config.ROUNDING_ERROR_TRACKING).toBe(false);
    expect(config.INITIAL_CREDITS_PER_TOKEN).toBe(10n ** 18n);
    expect(config.JOURNAL_PATH).toBeUndefined();
  });

  it("coerces PORT from a string", () => {
    expect(loadConfig({ PORT: "8080" }).PORT).toBe(8080);
  });

  it("parses strategy names and the tracking flag", () => {
    const config = loadConfig({
      SUPPLY_CHANGE_STRATEGY: "trusted",
      TRANSFER_ROUNDING: "independent",
      BURN_POLICY: "naive",
      ROUNDING_ERROR_TRACKING: "true",
    });

    expect(config.SUPPLY_CHANGE_STRATEGY).toBe("trusted");
    expect(config.TRANSFER_ROUNDING).toBe("independent");
    expect(config.BURN_POLICY).toBe("naive");
    expect(config.ROUNDING_ERROR_TRACKING).toBe(true);
  });

  it("parses INITIAL_CREDITS_PER_TOKEN to bigint", () => {
    expect(loadConfig({ INITIAL_CREDITS_PER_TOKEN: "2000" }).INITIAL_CREDITS_PER_TOKEN).toBe(2000n);
  });

  it("rejects a zero or malformed INITIAL_CREDITS_PER_TOKEN", () => {
    expect(() => loadConfig({ INITIAL_CREDITS_PER_TOKEN: "0" })).toThrow(ZodError);
    expect(() => loadConfig({ INITIAL_CREDITS_PER_TOKEN: "1e18" })).toThrow(ZodError);
  });

  it("rejects unknown strategy names", () => {
    expect(() => loadConfig({ BURN_POLICY: "lenient" })).toThrow(ZodError);
  });

  it("rejects tracking flags other than true/false", () => {
    expect(() => loadConfig({ ROUNDING_ERROR_TRACKING: "yes" })).toThrow(ZodError);
  });

  it("rejects an out-of-range PORT", () => {
    expect(() => loadConfig({ PORT: "70000" })).toThrow(ZodError);
  });
});

describe("ledgerServiceOptions", () => {
  it("maps config onto ledger construction options", () => {
    const config = loadConfig({
      TRANSFER_ROUNDING: "independent",
      ROUNDING_ERROR_TRACKING: "true",
      INITIAL_CREDITS_PER_TOKEN: "500",
    });

    expect(ledgerServiceOptions(config)).toEqual({
      ledger: {
        strategies: {
          supplyChange: "derived",
          transferRounding: "independent",
          burnPolicy: "strict",
        },
        initialCreditsPerToken: 500n,
      },
      trackRoundingErrors: true,
    });
  });
});

/**
 * Tests for LedgerService.
 */

import { describe, it, expect } from "vitest";
import { LedgerService } from "../src/services/ledger-service.js";
import { SequencerClosedError } from "../src/services/sequencer.js";

const TWO_THIRDS = 666666666666666666n;

describe("LedgerService", () => {
  it("returns sequenced results for mutations", async () => {
    const service = new LedgerService();

    const mint = await service.mint("alice", 10n);

    expect(mint).toEqual({ ok: true, sequence: 1, value: { accountId: "alice", balance: 10n } });
  });

  it("returns rejected operations without a sequence", async () => {
    const service = new LedgerService();

    const result = await service.optIn("alice");

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("ALREADY_IN_STATE");
    }
    expect(service.sequence).toBe(0);
  });

  it("uses the configured strategies", async () => {
    const service = new LedgerService({
      ledger: { strategies: { supplyChange: "trusted" } },
    });
    await service.mint("alice", 1n);
    await service.mint("bob", 1n);

    const change = await service.changeSupply(3n);

    expect(change.ok && change.value).toEqual({ rebasingCreditsPerToken: TWO_THIRDS, totalSupply: 3n });
    expect(service.strategies).toEqual({
      supplyChange: "trusted",
      transferRounding: "derived",
      burnPolicy: "strict",
    });
  });

  it("leaves the accumulator out of the supply view when not tracking", () => {
    const service = new LedgerService();

    expect(service.trackingRoundingErrors).toBe(false);
    expect(service.getSupply().roundingErrorAccumulator).toBeUndefined();
  });

  it("reports the accumulator when tracking", async () => {
    const service = new LedgerService({
      trackRoundingErrors: true,
      ledger: { strategies: { transferRounding: "independent" } },
    });
    await service.mint("alice", 1n);
    await service.mint("bob", 1n);
    await service.changeSupply(3n);

    expect(service.trackingRoundingErrors).toBe(true);
    expect(service.getSupply().roundingErrorAccumulator).toBe(0n);
    expect(service.getSupply().reportedTotalSupply).toBe(3n);
  });

  it("starts at a custom initial multiplier", () => {
    const service = new LedgerService({ ledger: { initialCreditsPerToken: 2n * 10n ** 18n } });

    expect(service.getSupply().global.rebasingCreditsPerToken).toBe(2n * 10n ** 18n);
  });

  it("reports an audit gap after a rebase truncates balances", async () => {
    const service = new LedgerService();
    await service.mint("alice", 1n);
    await service.mint("bob", 1n);
    await service.changeSupply(3n);

    const report = service.audit();
    expect(report.sumOfBalances).toBe(2n);
    expect(report.totalSupply).toBe(3n);
    expect(report.supplyGap).toBe(1n);
    expect(report.balanced).toBe(false);
  });

  it("is not ready after stop", async () => {
    const service = new LedgerService();
    expect(service.isReady()).toBe(true);

    await service.stop();

    expect(service.isReady()).toBe(false);
  });

  it("rejects mutations after stop without applying them", async () => {
    const service = new LedgerService();
    await service.mint("alice", 10n);
    await service.stop();

    await expect(service.mint("alice", 5n)).rejects.toBeInstanceOf(SequencerClosedError);
    await expect(service.changeSupply(20n)).rejects.toThrow("Sequencer is closed");

    expect(service.getAccount("alice").balance).toBe(10n);
    expect(service.sequence).toBe(1);
  });

  it("finishes operations queued before stop", async () => {
    const service = new LedgerService();

    const mint = service.mint("alice", 10n);
    await service.stop();

    expect((await mint).ok).toBe(true);
    expect(service.getAccount("alice").balance).toBe(10n);
  });
});

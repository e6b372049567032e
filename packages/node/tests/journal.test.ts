/**
 * Tests for the operation journals.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { appendFileSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { InMemoryJournal, JsonlJournal, isJournalEntry } from "../src/services/journal.js";
import type { JournalEntry } from "../src/services/journal.js";
import { LedgerService } from "../src/services/ledger-service.js";

const AT = "2026-01-01T00:00:00.000Z";

const MINT: JournalEntry = {
  sequence: 1,
  operation: { kind: "mint", account: "alice", amount: "100" },
  appliedAt: AT,
};

describe("isJournalEntry", () => {
  it("accepts a well-formed entry", () => {
    expect(isJournalEntry(MINT)).toBe(true);
  });

  it("rejects non-positive or fractional sequences", () => {
    expect(isJournalEntry({ ...MINT, sequence: 0 })).toBe(false);
    expect(isJournalEntry({ ...MINT, sequence: 1.5 })).toBe(false);
  });

  it("rejects an unknown operation kind", () => {
    expect(isJournalEntry({ ...MINT, operation: { kind: "seize", account: "alice" } })).toBe(false);
  });

  it("rejects non-objects", () => {
    expect(isJournalEntry(null)).toBe(false);
    expect(isJournalEntry("entry")).toBe(false);
  });
});

describe("InMemoryJournal", () => {
  it("returns entries in append order as a copy", () => {
    const journal = new InMemoryJournal();
    journal.append(MINT);

    const entries = journal.readAll();
    expect(entries).toEqual([MINT]);

    journal.append({ ...MINT, sequence: 2 });
    expect(entries).toHaveLength(1);
  });
});

describe("JsonlJournal", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "ledger-journal-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("creates the parent directory and writes one line per entry", () => {
    const filePath = join(dir, "nested", "journal.jsonl");
    const journal = new JsonlJournal({ filePath });

    journal.append(MINT);

    expect(journal.filePath).toBe(filePath);
    expect(readFileSync(filePath, "utf-8")).toBe(JSON.stringify(MINT) + "\n");
  });

  it("loads existing entries on construction", () => {
    const filePath = join(dir, "journal.jsonl");
    new JsonlJournal({ filePath }).append(MINT);

    expect(new JsonlJournal({ filePath }).readAll()).toEqual([MINT]);
  });

  it("skips torn and malformed lines", () => {
    const filePath = join(dir, "journal.jsonl");
    writeFileSync(filePath, JSON.stringify(MINT) + "\n" + '{"bogus":true}\n\n');
    appendFileSync(filePath, '{"sequence":2,"opera');

    expect(new JsonlJournal({ filePath }).readAll()).toEqual([MINT]);
  });
});

describe("LedgerService journal replay", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "ledger-replay-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("restores state from a journal written by an earlier service", async () => {
    const filePath = join(dir, "journal.jsonl");

    const first = new LedgerService({ journal: new JsonlJournal({ filePath }) });
    await first.mint("alice", 100n);
    await first.transfer("alice", "bob", 30n);
    await first.changeSupply(200n);
    await first.optOut("bob");
    await first.stop();

    const second = new LedgerService({ journal: new JsonlJournal({ filePath }) });

    expect(second.replayed).toBe(4);
    expect(second.sequence).toBe(4);
    expect(second.getAccount("alice").balance).toBe(140n);
    expect(second.getAccount("bob")).toEqual(first.getAccount("bob"));
    expect(second.getSupply().global).toEqual(first.getSupply().global);
  });

  it("does not journal rejected operations", async () => {
    const journal = new InMemoryJournal();
    const service = new LedgerService({ journal });

    await service.burn("alice", 1n);

    expect(journal.readAll()).toEqual([]);
  });

  it("fails construction when the journal does not replay", () => {
    const journal = new InMemoryJournal();
    journal.append({ sequence: 1, operation: { kind: "burn", account: "alice", amount: "1" }, appliedAt: AT });

    expect(() => new LedgerService({ journal })).toThrow(
      "Journal entry 1 (burn 1 → alice) failed to replay: INSUFFICIENT_BALANCE",
    );
  });
});

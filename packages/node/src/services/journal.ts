/**
 * @rebasekit/node — Operation journal.
 *
 * Append-only record of every operation the ledger applied, in
 * sequence order. Replaying it into a fresh ledger with the same
 * strategies reproduces the state exactly, so the journal is the
 * only thing that has to survive a restart.
 *
 * Two implementations:
 * - InMemoryJournal: tests and ephemeral nodes
 * - JsonlJournal: one JSON object per line, fsync'd on every append
 */

import {
  openSync,
  closeSync,
  appendFileSync,
  readFileSync,
  existsSync,
  fsyncSync,
  mkdirSync,
} from "node:fs";
import { dirname } from "node:path";
import type { LedgerOperation } from "@rebasekit/types";
import { isLedgerOperation } from "@rebasekit/types";

// =============================================================================
// Types
// =============================================================================

export interface JournalEntry {
  /** 1-based, gapless across applied operations */
  readonly sequence: number;
  readonly operation: LedgerOperation;
  readonly appliedAt: string;
}

export interface OperationJournal {
  append(entry: JournalEntry): void;
  readAll(): readonly JournalEntry[];
}

export function isJournalEntry(value: unknown): value is JournalEntry {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.sequence === "number" &&
    Number.isInteger(v.sequence) &&
    v.sequence > 0 &&
    isLedgerOperation(v.operation) &&
    typeof v.appliedAt === "string"
  );
}

// =============================================================================
// In-memory
// =============================================================================

export class InMemoryJournal implements OperationJournal {
  private readonly _entries: JournalEntry[] = [];

  append(entry: JournalEntry): void {
    this._entries.push(entry);
  }

  readAll(): readonly JournalEntry[] {
    return [...this._entries];
  }
}

// =============================================================================
// JSONL file
// =============================================================================

export interface JsonlJournalOptions {
  /** Path to the JSONL file */
  readonly filePath: string;
}

/**
 * File-based journal.
 *
 * Partial or corrupt lines (a torn final write) are skipped on load.
 * The file is never truncated or rewritten.
 */
export class JsonlJournal implements OperationJournal {
  private readonly _filePath: string;
  private readonly _entries: JournalEntry[] = [];

  /**
   * Loads existing entries when the file exists; otherwise the file is
   * created on first append. The parent directory is created eagerly.
   */
  constructor(options: JsonlJournalOptions) {
    this._filePath = options.filePath;
    mkdirSync(dirname(this._filePath), { recursive: true });
    this._loadFromFile();
  }

  get filePath(): string {
    return this._filePath;
  }

  append(entry: JournalEntry): void {
    this._writeAndSync(JSON.stringify(entry) + "\n");
    this._entries.push(entry);
  }

  readAll(): readonly JournalEntry[] {
    return [...this._entries];
  }

  private _loadFromFile(): void {
    if (!existsSync(this._filePath)) {
      return;
    }

    const content = readFileSync(this._filePath, "utf-8");

    for (const line of content.split("\n")) {
      const trimmed = line.trim();
      if (trimmed.length === 0) {
        continue;
      }

      let record: unknown;
      try {
        record = JSON.parse(trimmed);
      } catch {
        // torn write
        continue;
      }

      if (isJournalEntry(record)) {
        this._entries.push(record);
      }
    }
  }

  private _writeAndSync(data: string): void {
    const fd = openSync(this._filePath, "a");
    try {
      appendFileSync(fd, data, "utf-8");
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
  }
}

/**
 * @rebasekit/node — HTTP node for the rebasing ledger.
 *
 * Package public API. The server itself starts from main.ts.
 */

export { LedgerService } from "./services/ledger-service.js";
export type { LedgerServiceOptions, SupplyView } from "./services/ledger-service.js";
export { LedgerSequencer, SequencerClosedError } from "./services/sequencer.js";
export type { Sequenced, SequencerLogger, SubmitContext } from "./services/sequencer.js";
export { InMemoryJournal, JsonlJournal, isJournalEntry } from "./services/journal.js";
export type { JournalEntry, JsonlJournalOptions, OperationJournal } from "./services/journal.js";
export { loadConfig, ledgerServiceOptions, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";

/**
 * @rebasekit/node — Entry point.
 *
 * Loads config, replays the journal, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig, ledgerServiceOptions } from "./config.js";
import { createApp } from "./app.js";
import { LedgerService } from "./services/ledger-service.js";
import { InMemoryJournal, JsonlJournal } from "./services/journal.js";
import type { OperationJournal } from "./services/journal.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  let journal: OperationJournal;
  if (config.JOURNAL_PATH !== undefined) {
    journal = new JsonlJournal({ filePath: config.JOURNAL_PATH });
  } else {
    journal = new InMemoryJournal();
    logger.warn("JOURNAL_PATH not set; ledger state will not survive a restart");
  }

  const service = new LedgerService({
    ...ledgerServiceOptions(config),
    journal,
    logger,
  });

  logger.info(
    {
      replayed: service.replayed,
      strategies: service.strategies,
      trackRoundingErrors: service.trackingRoundingErrors,
    },
    "Ledger ready",
  );

  const { app } = createApp({ service, logger });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info({ port: config.PORT, host: config.HOST }, "Ledger node started");

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutdown signal received");
    server.close();
    await service.stop();
    logger.info({ sequence: service.sequence }, "Shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});

/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability — tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorEnvelope } from "./types/error.js";
import { LedgerService } from "./services/ledger-service.js";
import type { LedgerServiceOptions } from "./services/ledger-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogger } from "./middleware/logger.js";
import { createHealthRoutes } from "./routes/health.js";
import { createLedgerRoutes } from "./routes/ledger.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  /** A ready service, or options to build one. Default: a fresh in-memory service */
  readonly service?: LedgerService | LedgerServiceOptions | undefined;
  /** Request log sink. Default: no request logging */
  readonly logger?: RequestLogger | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: LedgerService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions = {}): AppInstance {
  const service =
    options.service instanceof LedgerService
      ? options.service
      : new LedgerService(options.service);

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logger !== undefined) {
    app.use("*", loggerMiddleware(options.logger));
  }

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(handleError);
  app.notFound((c) => c.json(createErrorEnvelope("NOT_FOUND", "Route not found"), 404));

  // ─── Health Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.route("/api/v1", createLedgerRoutes());

  return { app, service };
}

/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (ledger accepting operations)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { LedgerService } from "../services/ledger-service.js";

export function createHealthRoutes(service: LedgerService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const ready = service.isReady();
    const body = {
      status: ready ? "ready" : "not_ready",
      sequence: service.sequence,
      replayed: service.replayed,
      timestamp: new Date().toISOString(),
    };

    return ready ? c.json(body, 200) : c.json(body, 503);
  });

  return routes;
}

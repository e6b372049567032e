/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { LedgerService } from "../services/ledger-service.js";

/** Set on every mutation response the ledger applied. */
export const SEQUENCE_HEADER = "X-Ledger-Sequence";

/**
 * Hono environment type for the ledger node.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The ledger service (set for every /api/* request) */
    service: LedgerService;
  };
}

/**
 * Environment of a handler behind validateBody(schema).
 */
export interface ValidatedEnv<T> {
  Variables: AppEnv["Variables"] & {
    validatedBody: T;
  };
}

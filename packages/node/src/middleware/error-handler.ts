/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Routes throw the LedgerError of a rejected operation; its code
 * picks the HTTP status. A stopped sequencer is a 503. Anything else
 * is a 500.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { LedgerError } from "@rebasekit/ledger";
import type { LedgerErrorCode } from "@rebasekit/ledger";
import { SequencerClosedError } from "../services/sequencer.js";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Ledger Error → HTTP Status Mapping
// =============================================================================

export const STATUS_MAP: Readonly<Record<LedgerErrorCode, ContentfulStatusCode>> = {
  // Malformed input
  INVALID_AMOUNT: 400,
  INVALID_SNAPSHOT: 400,

  // Account already in the requested class
  ALREADY_IN_STATE: 409,

  // Valid request, refused by current ledger state
  INSUFFICIENT_BALANCE: 422,
  INSUFFICIENT_CREDITS: 422,
  DUST_AMOUNT_BURN: 422,
  INVALID_SUPPLY_CHANGE: 422,
  ARITHMETIC_OVERFLOW: 422,
  DIVISION_BY_ZERO: 422,
};

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  if (err instanceof LedgerError) {
    return c.json(createErrorEnvelope(err.code, err.message), STATUS_MAP[err.code]);
  }

  if (err instanceof SequencerClosedError) {
    return c.json(createErrorEnvelope("SERVICE_UNAVAILABLE", "Ledger is not accepting operations"), 503);
  }

  // Don't leak internal details
  return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
}

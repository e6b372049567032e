/**
 * Ledger routes.
 *
 * POST /api/v1/mint                     — Mint tokens to an account
 * POST /api/v1/burn                     — Burn tokens from an account
 * POST /api/v1/transfer                 — Move tokens between accounts
 * POST /api/v1/supply                   — Rebase to a new total supply
 * POST /api/v1/accounts/:id/opt-in      — Make an account rebasing
 * POST /api/v1/accounts/:id/opt-out     — Make an account non-rebasing
 * GET  /api/v1/accounts/:id             — Account view
 * GET  /api/v1/supply                   — Global state and strategies
 * GET  /api/v1/audit                    — O(n) consistency report
 *
 * Applied mutations answer with their sequence number in the body and
 * in X-Ledger-Sequence. Rejected operations are thrown as their
 * LedgerError; the global error handler turns the code into a status.
 */

import { Hono } from "hono";
import { SEQUENCE_HEADER } from "../types/api-contract.js";
import type { AppEnv } from "../types/api-contract.js";
import {
  AccountIdSchema,
  BurnSchema,
  ChangeSupplySchema,
  MintSchema,
  TransferSchema,
  toAccountDto,
  toAuditDto,
  toBalanceDto,
  toOptDto,
  toSupplyChangeDto,
  toSupplyDto,
  toTransferDto,
} from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";

export function createLedgerRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // ─── Mutations ───────────────────────────────────────────────────

  routes.post("/mint", validateBody(MintSchema), async (c) => {
    const body = c.get("validatedBody");
    const outcome = await c.get("service").mint(body.account, body.amount, {
      requestId: c.get("requestId"),
    });
    if (!outcome.ok) throw outcome.error;
    c.header(SEQUENCE_HEADER, String(outcome.sequence));

    return c.json({ data: { sequence: outcome.sequence, ...toBalanceDto(outcome.value) } });
  });

  routes.post("/burn", validateBody(BurnSchema), async (c) => {
    const body = c.get("validatedBody");
    const outcome = await c.get("service").burn(body.account, body.amount, {
      requestId: c.get("requestId"),
    });
    if (!outcome.ok) throw outcome.error;
    c.header(SEQUENCE_HEADER, String(outcome.sequence));

    return c.json({ data: { sequence: outcome.sequence, ...toBalanceDto(outcome.value) } });
  });

  routes.post("/transfer", validateBody(TransferSchema), async (c) => {
    const body = c.get("validatedBody");
    const outcome = await c.get("service").transfer(body.from, body.to, body.amount, {
      requestId: c.get("requestId"),
    });
    if (!outcome.ok) throw outcome.error;
    c.header(SEQUENCE_HEADER, String(outcome.sequence));

    return c.json({ data: { sequence: outcome.sequence, ...toTransferDto(outcome.value) } });
  });

  routes.post("/supply", validateBody(ChangeSupplySchema), async (c) => {
    const body = c.get("validatedBody");
    const outcome = await c.get("service").changeSupply(body.newTotalSupply, {
      requestId: c.get("requestId"),
    });
    if (!outcome.ok) throw outcome.error;
    c.header(SEQUENCE_HEADER, String(outcome.sequence));

    return c.json({ data: { sequence: outcome.sequence, ...toSupplyChangeDto(outcome.value) } });
  });

  routes.post("/accounts/:id/opt-in", async (c) => {
    const id = AccountIdSchema.safeParse(c.req.param("id"));
    if (!id.success) {
      return c.json(createErrorEnvelope("VALIDATION_ERROR", "Invalid account id"), 400);
    }

    const outcome = await c.get("service").optIn(id.data, { requestId: c.get("requestId") });
    if (!outcome.ok) throw outcome.error;
    c.header(SEQUENCE_HEADER, String(outcome.sequence));

    return c.json({ data: { sequence: outcome.sequence, ...toOptDto(outcome.value) } });
  });

  routes.post("/accounts/:id/opt-out", async (c) => {
    const id = AccountIdSchema.safeParse(c.req.param("id"));
    if (!id.success) {
      return c.json(createErrorEnvelope("VALIDATION_ERROR", "Invalid account id"), 400);
    }

    const outcome = await c.get("service").optOut(id.data, { requestId: c.get("requestId") });
    if (!outcome.ok) throw outcome.error;
    c.header(SEQUENCE_HEADER, String(outcome.sequence));

    return c.json({ data: { sequence: outcome.sequence, ...toOptDto(outcome.value) } });
  });

  // ─── Reads ───────────────────────────────────────────────────────

  routes.get("/accounts/:id", (c) => {
    const id = AccountIdSchema.safeParse(c.req.param("id"));
    if (!id.success) {
      return c.json(createErrorEnvelope("VALIDATION_ERROR", "Invalid account id"), 400);
    }

    return c.json({ data: toAccountDto(c.get("service").getAccount(id.data)) });
  });

  routes.get("/supply", (c) => {
    return c.json({ data: toSupplyDto(c.get("service").getSupply()) });
  });

  routes.get("/audit", (c) => {
    return c.json({ data: toAuditDto(c.get("service").audit()) });
  });

  return routes;
}

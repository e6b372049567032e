/**
 * Request logging middleware.
 *
 * One pino line per request, at a level picked by status: error for
 * 5xx, warn for 4xx, info otherwise. Mutations carry the sequence
 * number the ledger assigned, read back from X-Ledger-Sequence.
 */

import type { MiddlewareHandler } from "hono";
import type { Logger } from "pino";
import { SEQUENCE_HEADER } from "../types/api-contract.js";
import type { AppEnv } from "../types/api-contract.js";

export type RequestLogger = Pick<Logger, "info" | "warn" | "error">;

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
  readonly sequence?: number | undefined;
}

export function loggerMiddleware(logger: RequestLogger): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    const sequence = c.res.headers.get(SEQUENCE_HEADER);
    const entry: RequestLogEntry = {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
      requestId: c.get("requestId"),
      ...(sequence !== null ? { sequence: Number(sequence) } : {}),
    };
    const message = `${entry.method} ${entry.path} ${entry.status}`;

    if (entry.status >= 500) {
      logger.error(entry, message);
    } else if (entry.status >= 400) {
      logger.warn(entry, message);
    } else {
      logger.info(entry, message);
    }
  };
}

/**
 * Request ID middleware.
 *
 * Propagates an incoming X-Request-Id when it is a plain token of up to
 * 128 characters (letters, digits, `.`, `_`, `:`, `-`); anything else
 * is replaced by a fresh UUID. The id travels into the sequencer's log
 * lines for every mutation the request submits, and back out on the
 * response.
 */

import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export const REQUEST_ID_HEADER = "X-Request-Id";

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;

export function requestIdMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const incoming = c.req.header(REQUEST_ID_HEADER);
    const requestId =
      incoming !== undefined && REQUEST_ID_PATTERN.test(incoming) ? incoming : randomUUID();

    c.set("requestId", requestId);

    await next();

    c.header(REQUEST_ID_HEADER, requestId);
  };
}

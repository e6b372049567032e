/**
 * Test helpers for @rebasekit/node.
 *
 * Provides a test app factory that creates a Hono app with
 * all middleware and routes, but no HTTP server.
 */

import { createApp } from "../src/app.js";
import type { AppInstance, CreateAppOptions } from "../src/app.js";

/**
 * Create a test app backed by a fresh in-memory service.
 */
export function createTestApp(options: CreateAppOptions = {}): AppInstance {
  return createApp(options);
}

/**
 * JSON request helper.
 */
export function jsonRequest(
  path: string,
  method: string = "GET",
  body?: unknown,
  headers?: Record<string, string>,
): Request {
  const init: RequestInit = {
    method,
    headers: {
      "Content-Type": "application/json",
      ...headers,
    },
  };

  if (body !== undefined) {
    init.body = JSON.stringify(body);
  }

  return new Request(`http://localhost${path}`, init);
}

/**
 * Captures pino output as parsed JSON lines.
 */
export function captureStream(): {
  readonly stream: { write(msg: string): void };
  readonly lines: Record<string, unknown>[];
} {
  const lines: Record<string, unknown>[] = [];
  return {
    lines,
    stream: {
      write(msg: string) {
        const parsed: unknown = JSON.parse(msg);
        if (parsed !== null && typeof parsed === "object" && !Array.isArray(parsed)) {
          lines.push({ ...parsed });
        }
      },
    },
  };
}

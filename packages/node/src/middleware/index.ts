/**
 * Middleware barrel — re-exports all middleware.
 */

export { handleError, STATUS_MAP } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry, RequestLogger } from "./logger.js";
export { validateBody } from "./validate.js";

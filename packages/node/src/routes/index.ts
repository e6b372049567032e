/**
 * Routes barrel — re-exports all route factories.
 */

export { createHealthRoutes } from "./health.js";
export { createLedgerRoutes } from "./ledger.js";

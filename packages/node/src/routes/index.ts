/**
 * Route barrel: re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createCashoutRoutes } from "./cashout.js";

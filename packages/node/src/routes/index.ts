/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createPeriodRoutes } from "./periods.js";
export { createAccountRoutes } from "./accounts.js";
export { createJournalRoutes } from "./journals.js";
export { createLedgerRoutes } from "./ledger.js";
export { createCalendarRoutes } from "./calendar.js";

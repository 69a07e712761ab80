/**
 * @fiscus/fiscal — Fiscal periods and document numbering.
 *
 * Manages accounting periods anchored to the secondary calendar:
 * - Creation from explicit bounds or from a "YYYY/YY" name
 * - Lifecycle: current flag, close, reopen, delete
 * - Per-period invoice, purchase and voucher counters
 *
 * Design rules:
 * - At most one current period per tenant
 * - Counters never decrease and never repeat
 * - Closed periods issue no numbers
 */

// Service
export { PeriodService, DEFAULT_RETRY_ATTEMPTS } from "./period-service.js";
export type { PeriodServiceDeps } from "./period-service.js";

// Store
export { DEFAULT_RETAINED_KEYS, InMemoryPeriodStore, TransientStoreError } from "./store.js";

// Period helpers
export {
  DOCUMENT_TYPE_CODES,
  DOCUMENT_NUMBER_WIDTH,
  deriveYearCode,
  documentPrefix,
  formatDocumentNumber,
  prefixFor,
  counterFor,
  containsDate,
  newFiscalPeriod,
} from "./period.js";
export type { NewPeriodParams } from "./period.js";

// Types
export type {
  FiscalPeriod,
  ClosedState,
  PeriodWrite,
  CounterWrite,
  IncrementOptions,
  PeriodStore,
} from "./types.js";

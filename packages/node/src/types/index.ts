/**
 * Type barrel — re-exports all public types from @fiscus/node.
 */

// DTOs
export {
  AccountTypeSchema,
  JournalStatusSchema,
  DocumentTypeSchema,
  DateQuerySchema,
  SecondaryDateFormatSchema,
  ToSecondaryQuerySchema,
  CreatePeriodSchema,
  DocumentNumberParamsSchema,
  CreateAccountSchema,
  UpdateAccountSchema,
  JournalLineSchema,
  CreateJournalSchema,
  ListJournalsQuerySchema,
  LedgerQuerySchema,
} from "./dto.js";
export type {
  CreatePeriodDto,
  CreateAccountDto,
  UpdateAccountDto,
  CreateJournalDto,
  ListJournalsQuery,
  LedgerQuery,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// App env
export type { AppEnv } from "./api-contract.js";

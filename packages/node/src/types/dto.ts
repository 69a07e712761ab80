/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Schemas check shape only; dates, amounts and balances are checked by
 * the domain services so their error codes reach the client unchanged.
 */

import { z } from "zod";
import { SECONDARY_DATE_FORMATS } from "@fiscus/calendar";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AccountTypeSchema = z.enum([
  "asset",
  "liability",
  "equity",
  "revenue",
  "expense",
]);

export const JournalStatusSchema = z.enum(["draft", "posted"]);

export const DocumentTypeSchema = z.enum(["invoice", "purchase", "voucher"]);

export const DateQuerySchema = z.object({
  date: z.string().min(1),
});

export const SecondaryDateFormatSchema = z.enum(SECONDARY_DATE_FORMATS);

export const ToSecondaryQuerySchema = DateQuerySchema.extend({
  format: SecondaryDateFormatSchema.default("DD MMMM YYYY"),
});

// =============================================================================
// Period DTOs
// =============================================================================

/**
 * `{ name }` derives the bounds from a "YYYY/YY" name; `{ name, startDate,
 * endDate }` takes explicit Gregorian bounds.
 */
export const CreatePeriodSchema = z
  .object({
    name: z.string().min(1).max(64),
    startDate: z.string().optional(),
    endDate: z.string().optional(),
  })
  .refine((body) => (body.startDate === undefined) === (body.endDate === undefined), {
    message: "startDate and endDate must be given together",
    path: ["endDate"],
  });

export const DocumentNumberParamsSchema = z.object({
  id: z.string().min(1),
  documentType: DocumentTypeSchema,
});

// =============================================================================
// Account DTOs
// =============================================================================

export const CreateAccountSchema = z.object({
  code: z.string().min(1).max(32),
  name: z.string().min(1).max(128),
  type: AccountTypeSchema,
  parentId: z.string().min(1).optional(),
  description: z.string().max(1024).optional(),
});

export const UpdateAccountSchema = z.object({
  code: z.string().min(1).max(32).optional(),
  name: z.string().min(1).max(128).optional(),
  type: AccountTypeSchema.optional(),
  parentId: z.string().min(1).optional(),
  description: z.string().max(1024).optional(),
  active: z.boolean().optional(),
});

// =============================================================================
// Journal DTOs
// =============================================================================

export const JournalLineSchema = z.object({
  accountId: z.string().min(1),
  debit: z.number().optional(),
  credit: z.number().optional(),
  description: z.string().max(1024).optional(),
});

export const CreateJournalSchema = z.object({
  periodId: z.string().min(1),
  transactionDate: z.string().min(1),
  description: z.string().max(1024),
  reference: z
    .object({
      id: z.string().min(1),
      type: z.string().min(1),
    })
    .optional(),
  lines: z.array(JournalLineSchema).max(500),
});

export const ListJournalsQuerySchema = z.object({
  periodId: z.string().min(1).optional(),
  status: JournalStatusSchema.optional(),
});

// =============================================================================
// Ledger DTOs
// =============================================================================

export const LedgerQuerySchema = z.object({
  from: z.string().min(1),
  to: z.string().min(1),
  orientation: z.enum(["debit", "normal"]).default("debit"),
});

// =============================================================================
// Derived Types
// =============================================================================

export type CreatePeriodDto = z.infer<typeof CreatePeriodSchema>;
export type CreateAccountDto = z.infer<typeof CreateAccountSchema>;
export type UpdateAccountDto = z.infer<typeof UpdateAccountSchema>;
export type CreateJournalDto = z.infer<typeof CreateJournalSchema>;
export type ListJournalsQuery = z.infer<typeof ListJournalsQuerySchema>;
export type LedgerQuery = z.infer<typeof LedgerQuerySchema>;

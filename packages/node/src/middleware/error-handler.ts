/**
 * Global error handler.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Domain errors map by kind:
 * - validation → 400
 * - not_found  → 404
 * - conflict   → 409
 * - state      → 422
 *
 * Anything else is a 500 with a generic message; the original error is
 * handed to `onUnexpectedError` and never reaches the client.
 */

import type { Context, ErrorHandler, NotFoundHandler } from "hono";
import { isDomainError } from "@fiscus/types";
import type { DomainErrorKind } from "@fiscus/types";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

export const STATUS_BY_KIND = {
  validation: 400,
  not_found: 404,
  conflict: 409,
  state: 422,
} as const satisfies Record<DomainErrorKind, number>;

export type UnexpectedErrorHook = (err: Error, requestId: string) => void;

// =============================================================================
// Handlers
// =============================================================================

/**
 * Build the onError handler. Registered as Hono's onError handler.
 */
export function createErrorHandler(onUnexpected?: UnexpectedErrorHook): ErrorHandler<AppEnv> {
  return (err: Error, c: Context<AppEnv>) => {
    if (isDomainError(err)) {
      return c.json(
        createErrorEnvelope(err.code, err.message, err.details),
        STATUS_BY_KIND[err.kind],
      );
    }

    onUnexpected?.(err, c.get("requestId"));
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  };
}

/** Envelope for unknown routes. */
export const handleNotFound: NotFoundHandler<AppEnv> = (c) =>
  c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404);

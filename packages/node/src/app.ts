/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability: tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { FiscusService } from "./services/fiscus-service.js";
import { createErrorHandler, handleNotFound } from "./middleware/error-handler.js";
import type { UnexpectedErrorHook } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { tenantMiddleware } from "./middleware/tenant.js";
import { createHealthRoutes } from "./routes/health.js";
import { createPeriodRoutes } from "./routes/periods.js";
import { createAccountRoutes } from "./routes/accounts.js";
import { createJournalRoutes } from "./routes/journals.js";
import { createLedgerRoutes } from "./routes/ledger.js";
import { createCalendarRoutes } from "./routes/calendar.js";

// =============================================================================
// App Config
// =============================================================================

export const DEFAULT_TENANT_ID = "default";

export interface CreateAppOptions {
  /** Domain services. Built with `retryAttempts` when omitted. */
  readonly service?: FiscusService | undefined;
  readonly retryAttempts?: number | undefined;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
  /** Called with every error that becomes a 500 */
  readonly onUnexpectedError?: UnexpectedErrorHook | undefined;
  /** Tenant used when a request carries no X-Tenant-Id */
  readonly defaultTenantId?: string | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: FiscusService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions = {}): AppInstance {
  const service =
    options.service ?? new FiscusService({ retryAttempts: options.retryAttempts });
  const defaultTenantId = options.defaultTenantId ?? DEFAULT_TENANT_ID;

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handlers ─────────────────────────────────────────────
  app.onError(createErrorHandler(options.onUnexpectedError));
  app.notFound(handleNotFound);

  // ─── Health Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", tenantMiddleware({ defaultTenantId }));

  app.route("/api/v1/periods", createPeriodRoutes(service));
  app.route("/api/v1/accounts", createAccountRoutes(service));
  app.route("/api/v1/journals", createJournalRoutes(service));
  app.route("/api/v1/ledger", createLedgerRoutes(service));
  app.route("/api/v1/calendar", createCalendarRoutes(service));

  return { app, service };
}

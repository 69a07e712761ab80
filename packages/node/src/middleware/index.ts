/**
 * Middleware barrel — re-exports all middleware.
 */

export { createErrorHandler, handleNotFound, STATUS_BY_KIND } from "./error-handler.js";
export type { UnexpectedErrorHook } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { parseJsonBody, parseQuery, parseValue, formatZodErrors } from "./validate.js";
export type { RequestSchema, ValidationIssue } from "./validate.js";
export { tenantMiddleware, TENANT_HEADER, ACTOR_HEADER, DEFAULT_ACTOR } from "./tenant.js";
export type { TenantOptions } from "./tenant.js";

/**
 * Tenant and actor resolution.
 *
 * Identity comes from opaque headers; nothing here authenticates.
 * X-Tenant-Id falls back to the configured default tenant and
 * X-Actor-Id to "system". Blank headers count as absent.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export const TENANT_HEADER = "X-Tenant-Id";
export const ACTOR_HEADER = "X-Actor-Id";
export const DEFAULT_ACTOR = "system";

export interface TenantOptions {
  readonly defaultTenantId: string;
}

export function tenantMiddleware(options: TenantOptions): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    c.set("tenantId", headerOr(c.req.header(TENANT_HEADER), options.defaultTenantId));
    c.set("actorId", headerOr(c.req.header(ACTOR_HEADER), DEFAULT_ACTOR));
    await next();
  };
}

function headerOr(value: string | undefined, fallback: string): string {
  const trimmed = value?.trim();
  return trimmed === undefined || trimmed === "" ? fallback : trimmed;
}

/**
 * Chart of accounts routes.
 *
 * POST  /api/v1/accounts                  — Create an account
 * GET   /api/v1/accounts                  — List the tenant's accounts by code
 * GET   /api/v1/accounts/by-code/:code    — Look up by account code
 * GET   /api/v1/accounts/:id              — Get a single account
 * PATCH /api/v1/accounts/:id              — Update the given fields
 * POST  /api/v1/accounts/:id/deactivate   — Mark inactive
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { CreateAccountSchema, UpdateAccountSchema } from "../types/dto.js";
import { parseJsonBody } from "../middleware/validate.js";
import type { FiscusService } from "../services/fiscus-service.js";
import { operationOptions } from "./context.js";

export function createAccountRoutes(service: FiscusService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", async (c) => {
    const body = await parseJsonBody(c, CreateAccountSchema);
    const account = await service.accounts.create(c.get("tenantId"), body, operationOptions(c));
    return c.json({ data: account }, 201);
  });

  routes.get("/", async (c) => {
    const accounts = await service.accounts.list(c.get("tenantId"), operationOptions(c));
    return c.json({ data: accounts });
  });

  routes.get("/by-code/:code", async (c) => {
    const account = await service.accounts.getByCode(
      c.get("tenantId"),
      c.req.param("code"),
      operationOptions(c),
    );
    return c.json({ data: account });
  });

  routes.get("/:id", async (c) => {
    const account = await service.accounts.get(
      c.get("tenantId"),
      c.req.param("id"),
      operationOptions(c),
    );
    return c.json({ data: account });
  });

  routes.patch("/:id", async (c) => {
    const patch = await parseJsonBody(c, UpdateAccountSchema);
    const account = await service.accounts.update(
      c.get("tenantId"),
      c.req.param("id"),
      patch,
      operationOptions(c),
    );
    return c.json({ data: account });
  });

  routes.post("/:id/deactivate", async (c) => {
    const account = await service.accounts.deactivate(
      c.get("tenantId"),
      c.req.param("id"),
      operationOptions(c),
    );
    return c.json({ data: account });
  });

  return routes;
}

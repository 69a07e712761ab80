/**
 * Fiscal period routes.
 *
 * POST   /api/v1/periods                               — Create ({name} or {name, startDate, endDate})
 * GET    /api/v1/periods                               — List the tenant's periods
 * GET    /api/v1/periods/current                       — The tenant's current period
 * GET    /api/v1/periods/lookup?date=YYYY-MM-DD        — The period containing a date
 * GET    /api/v1/periods/:id                           — Get a single period
 * POST   /api/v1/periods/:id/current                   — Make it the current period
 * POST   /api/v1/periods/:id/close                     — Close (actor from X-Actor-Id)
 * POST   /api/v1/periods/:id/reopen                    — Reopen
 * DELETE /api/v1/periods/:id                           — Delete (not current, not closed)
 * POST   /api/v1/periods/:id/numbers/:documentType     — Issue the next document number
 */

import { Hono } from "hono";
import { NotFoundError } from "@fiscus/types";
import type { AppEnv } from "../types/api-contract.js";
import {
  CreatePeriodSchema,
  DateQuerySchema,
  DocumentNumberParamsSchema,
} from "../types/dto.js";
import { parseJsonBody, parseQuery, parseValue } from "../middleware/validate.js";
import type { FiscusService } from "../services/fiscus-service.js";
import { operationOptions } from "./context.js";

export function createPeriodRoutes(service: FiscusService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // POST /api/v1/periods — Create
  routes.post("/", async (c) => {
    const body = await parseJsonBody(c, CreatePeriodSchema);
    const tenantId = c.get("tenantId");
    const options = operationOptions(c);

    const period =
      body.startDate !== undefined && body.endDate !== undefined
        ? await service.periods.create(tenantId, body.name, body.startDate, body.endDate, options)
        : await service.periods.createFromName(tenantId, body.name, options);

    return c.json({ data: period }, 201);
  });

  // GET /api/v1/periods — List
  routes.get("/", async (c) => {
    const periods = await service.periods.list(c.get("tenantId"), operationOptions(c));
    return c.json({ data: periods });
  });

  // GET /api/v1/periods/current
  routes.get("/current", async (c) => {
    const period = await service.periods.getCurrent(c.get("tenantId"), operationOptions(c));
    if (period === undefined) {
      throw new NotFoundError("PERIOD_NOT_FOUND", "No current period");
    }
    return c.json({ data: period });
  });

  // GET /api/v1/periods/lookup?date=
  routes.get("/lookup", async (c) => {
    const { date } = parseQuery(c, DateQuerySchema);
    const period = await service.periods.findForDate(
      c.get("tenantId"),
      date,
      operationOptions(c),
    );
    if (period === undefined) {
      throw new NotFoundError("PERIOD_NOT_FOUND", `No period contains ${date}`);
    }
    return c.json({ data: period });
  });

  // GET /api/v1/periods/:id
  routes.get("/:id", async (c) => {
    const period = await service.periodOf(c.get("tenantId"), c.req.param("id"), operationOptions(c));
    return c.json({ data: period });
  });

  // POST /api/v1/periods/:id/current
  routes.post("/:id/current", async (c) => {
    const period = await service.periods.setAsCurrent(
      c.get("tenantId"),
      c.req.param("id"),
      operationOptions(c),
    );
    return c.json({ data: period });
  });

  // POST /api/v1/periods/:id/close
  routes.post("/:id/close", async (c) => {
    const id = c.req.param("id");
    const options = operationOptions(c);
    await service.periodOf(c.get("tenantId"), id, options);
    const period = await service.periods.close(id, c.get("actorId"), options);
    return c.json({ data: period });
  });

  // POST /api/v1/periods/:id/reopen
  routes.post("/:id/reopen", async (c) => {
    const id = c.req.param("id");
    const options = operationOptions(c);
    await service.periodOf(c.get("tenantId"), id, options);
    const period = await service.periods.reopen(id, options);
    return c.json({ data: period });
  });

  // DELETE /api/v1/periods/:id
  routes.delete("/:id", async (c) => {
    const id = c.req.param("id");
    const options = operationOptions(c);
    await service.periodOf(c.get("tenantId"), id, options);
    await service.periods.delete(id, options);
    return c.body(null, 204);
  });

  // POST /api/v1/periods/:id/numbers/:documentType
  routes.post("/:id/numbers/:documentType", async (c) => {
    const { id, documentType } = parseValue(
      DocumentNumberParamsSchema,
      c.req.param(),
      "path parameters",
    );
    const options = operationOptions(c);
    await service.periodOf(c.get("tenantId"), id, options);
    const number = await service.periods.generateNumber(id, documentType, options);
    return c.json({ data: { periodId: id, documentType, number } }, 201);
  });

  return routes;
}

/**
 * Journal entry routes.
 *
 * POST /api/v1/journals            — Create a draft (createdBy from X-Actor-Id)
 * GET  /api/v1/journals            — List, newest transaction date first
 *                                    (?periodId=&status=draft|posted)
 * GET  /api/v1/journals/:id        — Get a single entry with its lines
 * POST /api/v1/journals/:id/post   — Post a draft (postedBy from X-Actor-Id)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { CreateJournalSchema, ListJournalsQuerySchema } from "../types/dto.js";
import { parseJsonBody, parseQuery } from "../middleware/validate.js";
import type { FiscusService } from "../services/fiscus-service.js";
import { operationOptions } from "./context.js";

export function createJournalRoutes(service: FiscusService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", async (c) => {
    const body = await parseJsonBody(c, CreateJournalSchema);
    const entry = await service.journals.create(
      c.get("tenantId"),
      { ...body, createdBy: c.get("actorId") },
      operationOptions(c),
    );
    return c.json({ data: entry }, 201);
  });

  routes.get("/", async (c) => {
    const filter = parseQuery(c, ListJournalsQuerySchema);
    const entries = await service.journals.list(c.get("tenantId"), filter, operationOptions(c));
    return c.json({ data: entries });
  });

  routes.get("/:id", async (c) => {
    const entry = await service.entryOf(c.get("tenantId"), c.req.param("id"), operationOptions(c));
    return c.json({ data: entry });
  });

  routes.post("/:id/post", async (c) => {
    const id = c.req.param("id");
    const options = operationOptions(c);
    await service.entryOf(c.get("tenantId"), id, options);
    const entry = await service.journals.post(id, c.get("actorId"), options);
    return c.json({ data: entry });
  });

  return routes;
}

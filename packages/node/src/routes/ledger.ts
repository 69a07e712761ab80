/**
 * Ledger projection route.
 *
 * GET /api/v1/ledger/:accountId?from=YYYY-MM-DD&to=YYYY-MM-DD&orientation=debit|normal
 *
 * Posted lines for the account in the inclusive window, with a running
 * balance that starts at zero at `from`.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { LedgerQuerySchema } from "../types/dto.js";
import { parseQuery } from "../middleware/validate.js";
import type { FiscusService } from "../services/fiscus-service.js";
import { operationOptions } from "./context.js";

export function createLedgerRoutes(service: FiscusService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:accountId", async (c) => {
    const query = parseQuery(c, LedgerQuerySchema);
    const rows = await service.ledger.project(
      c.get("tenantId"),
      c.req.param("accountId"),
      query.from,
      query.to,
      { ...operationOptions(c), orientation: query.orientation },
    );
    const closing = rows[rows.length - 1]?.runningBalance ?? 0;
    return c.json({ data: rows, closingBalance: closing });
  });

  return routes;
}

/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running),
 *               with the calendar years this instance can convert
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { FiscusService } from "../services/fiscus-service.js";

export function createHealthRoutes(service: FiscusService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    const years = service.calendar.supportedYears;
    return c.json({
      status: "ok",
      calendar: { minYear: years.min, maxYear: years.max },
      timestamp: new Date().toISOString(),
    });
  });

  return routes;
}

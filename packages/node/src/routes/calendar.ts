/**
 * Calendar conversion routes.
 *
 * GET /api/v1/calendar/to-secondary?date=YYYY-MM-DD  — Gregorian → secondary
 *     &format=DD MMMM YYYY                             (display form, optional)
 * GET /api/v1/calendar/to-gregorian?date=YYYY-MM-DD  — secondary → Gregorian
 *                                                      (accepts the YYYY-03-32 year-end marker)
 */

import { Hono } from "hono";
import {
  fiscalYearNameFor,
  formatSecondaryDate,
  gregorianMonthSpan,
  secondaryMonthName,
} from "@fiscus/calendar";
import type { AppEnv } from "../types/api-contract.js";
import { DateQuerySchema, ToSecondaryQuerySchema } from "../types/dto.js";
import { parseQuery } from "../middleware/validate.js";
import type { FiscusService } from "../services/fiscus-service.js";

export function createCalendarRoutes(service: FiscusService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/to-secondary", (c) => {
    const { date, format } = parseQuery(c, ToSecondaryQuerySchema);
    const secondary = service.calendar.toSecondary(date);
    return c.json({
      data: {
        gregorian: date,
        secondary: formatSecondaryDate(secondary),
        display: formatSecondaryDate(secondary, format),
        monthName: secondaryMonthName(secondary.month),
        gregorianMonths: gregorianMonthSpan(secondary.month),
        fiscalYear: fiscalYearNameFor(secondary),
      },
    });
  });

  routes.get("/to-gregorian", (c) => {
    const { date } = parseQuery(c, DateQuerySchema);
    const secondary = service.calendar.parse(date);
    return c.json({
      data: {
        secondary: formatSecondaryDate(secondary),
        gregorian: service.calendar.toGregorian(secondary),
      },
    });
  });

  return routes;
}

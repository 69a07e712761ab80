/**
 * Tests for the health endpoint and unknown routes.
 *
 * Verifies:
 * - GET /health returns 200 with status "ok" and the calendar range
 * - Unknown paths get the error envelope with a 404
 */

import { describe, it, expect } from "vitest";
import { createTestApp, errorOf } from "./setup.js";

describe("GET /health", () => {
  it("returns 200 with status ok", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      status: "ok",
      calendar: { minYear: 2080, maxYear: 2090 },
    });
  });

  it("needs no tenant header", async () => {
    const { app } = createTestApp({ defaultTenantId: "ignored" });
    const res = await app.request("/health");
    expect(res.status).toBe(200);
  });
});

describe("unknown routes", () => {
  it("returns the error envelope", async () => {
    const { app } = createTestApp();
    const res = await app.request("/api/v1/nothing-here");

    expect(res.status).toBe(404);
    expect(await errorOf(res)).toEqual({
      code: "NOT_FOUND",
      message: "No route for GET /api/v1/nothing-here",
    });
  });
});

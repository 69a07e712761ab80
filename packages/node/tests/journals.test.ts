/**
 * Tests for journal entry routes.
 *
 * Covers:
 * - Draft creation with the actor as creator
 * - Double-entry and period errors mapped to HTTP statuses
 * - Posting, double-posting and posting into a closed period
 * - Listing filters and tenant isolation
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { AppInstance } from "../src/app.js";
import {
  NOW,
  createTestApp,
  errorOf,
  idOf,
  jsonRequest,
  openAccount,
  openPeriod,
} from "./setup.js";

const OTHER = { "X-Tenant-Id": "t2" };

describe("journal routes", () => {
  let app: AppInstance["app"];
  let periodId: string;
  let cash: string;
  let revenue: string;

  function sale(amount: number, date = "2025-08-01"): Record<string, unknown> {
    return {
      periodId,
      transactionDate: date,
      description: "Cash sale",
      lines: [
        { accountId: cash, debit: amount },
        { accountId: revenue, credit: amount },
      ],
    };
  }

  async function draft(body: Record<string, unknown>): Promise<string> {
    return idOf(await app.request(jsonRequest("/api/v1/journals", "POST", body)));
  }

  beforeEach(async () => {
    ({ app } = createTestApp());
    periodId = await openPeriod(app);
    cash = await openAccount(app, "1001", "Cash", "asset");
    revenue = await openAccount(app, "4001", "Sales", "revenue");
  });

  // ─── Create ────────────────────────────────────────────────────────

  describe("POST /api/v1/journals", () => {
    it("creates a draft with the actor as creator", async () => {
      const res = await app.request(
        jsonRequest(
          "/api/v1/journals",
          "POST",
          { ...sale(500), reference: { id: "INV-8283-0001", type: "invoice" } },
          { "X-Actor-Id": "alice" },
        ),
      );

      expect(res.status).toBe(201);
      expect(await res.json()).toMatchObject({
        data: {
          tenantId: "default",
          periodId,
          transactionDate: "2025-08-01",
          description: "Cash sale",
          status: "draft",
          reference: { id: "INV-8283-0001", type: "invoice" },
          createdBy: "alice",
          createdAt: NOW,
          lines: [
            { accountId: cash, debit: 500, credit: 0 },
            { accountId: revenue, debit: 0, credit: 500 },
          ],
        },
      });
    });

    it("rejects an unbalanced entry with its totals", async () => {
      const res = await app.request(
        jsonRequest("/api/v1/journals", "POST", {
          ...sale(500),
          lines: [
            { accountId: cash, debit: 500 },
            { accountId: revenue, credit: 400 },
          ],
        }),
      );

      expect(res.status).toBe(400);
      const error = await errorOf(res);
      expect(error.code).toBe("UNBALANCED_ENTRY");
      expect(error.details).toEqual({ totalDebit: 500, totalCredit: 400 });

      const list = await app.request("/api/v1/journals");
      expect(await list.json()).toEqual({ data: [] });
    });

    it("requires at least two lines", async () => {
      const res = await app.request(
        jsonRequest("/api/v1/journals", "POST", {
          ...sale(0),
          lines: [{ accountId: cash, debit: 0 }],
        }),
      );

      expect(res.status).toBe(400);
      expect((await errorOf(res)).code).toBe("TOO_FEW_LINES");
    });

    it("validates the body shape", async () => {
      const res = await app.request(
        jsonRequest("/api/v1/journals", "POST", { ...sale(10), lines: "none" }),
      );

      expect(res.status).toBe(400);
      const error = await errorOf(res);
      expect(error.code).toBe("VALIDATION_ERROR");
      expect(error.details).toMatchObject({ issues: [{ path: "lines" }] });
    });

    it("rejects dates outside the period", async () => {
      const res = await app.request(jsonRequest("/api/v1/journals", "POST", sale(10, "2026-07-16")));

      expect(res.status).toBe(400);
      expect((await errorOf(res)).code).toBe("DATE_OUTSIDE_PERIOD");
    });

    it("rejects entries in a closed period", async () => {
      await app.request(jsonRequest(`/api/v1/periods/${periodId}/close`, "POST"));
      const res = await app.request(jsonRequest("/api/v1/journals", "POST", sale(10)));

      expect(res.status).toBe(400);
      expect((await errorOf(res)).code).toBe("PERIOD_CLOSED");
    });

    it("reports an unknown account", async () => {
      const res = await app.request(
        jsonRequest("/api/v1/journals", "POST", {
          ...sale(10),
          lines: [
            { accountId: cash, debit: 10 },
            { accountId: "ghost", credit: 10 },
          ],
        }),
      );

      expect(res.status).toBe(404);
      expect((await errorOf(res)).code).toBe("ACCOUNT_NOT_FOUND");
    });

    it("treats another tenant's period as missing", async () => {
      const res = await app.request(jsonRequest("/api/v1/journals", "POST", sale(10), OTHER));

      expect(res.status).toBe(404);
      expect((await errorOf(res)).code).toBe("PERIOD_NOT_FOUND");
    });
  });

  // ─── Post ──────────────────────────────────────────────────────────

  describe("POST /api/v1/journals/:id/post", () => {
    it("posts a draft once", async () => {
      const id = await draft(sale(500));

      const posted = await app.request(
        jsonRequest(`/api/v1/journals/${id}/post`, "POST", undefined, { "X-Actor-Id": "bob" }),
      );
      expect(posted.status).toBe(200);
      expect(await posted.json()).toMatchObject({
        data: { id, status: "posted", postedBy: "bob", postedAt: NOW },
      });

      const again = await app.request(jsonRequest(`/api/v1/journals/${id}/post`, "POST"));
      expect(again.status).toBe(409);
      expect((await errorOf(again)).code).toBe("ALREADY_POSTED");
    });

    it("refuses to post into a closed period", async () => {
      const id = await draft(sale(75));
      await app.request(jsonRequest(`/api/v1/periods/${periodId}/close`, "POST"));

      const res = await app.request(jsonRequest(`/api/v1/journals/${id}/post`, "POST"));
      expect(res.status).toBe(422);
      expect((await errorOf(res)).code).toBe("PERIOD_CLOSED");

      const entry = await app.request(`/api/v1/journals/${id}`);
      expect(await entry.json()).toMatchObject({ data: { status: "draft" } });
    });

    it("reports a missing entry", async () => {
      const res = await app.request(jsonRequest("/api/v1/journals/missing/post", "POST"));
      expect(res.status).toBe(404);
      expect((await errorOf(res)).code).toBe("ENTRY_NOT_FOUND");
    });

    it("hides another tenant's entry", async () => {
      const id = await draft(sale(5));

      const get = await app.request(jsonRequest(`/api/v1/journals/${id}`, "GET", undefined, OTHER));
      expect(get.status).toBe(404);

      const post = await app.request(
        jsonRequest(`/api/v1/journals/${id}/post`, "POST", undefined, OTHER),
      );
      expect(post.status).toBe(404);

      const entry = await app.request(`/api/v1/journals/${id}`);
      expect(await entry.json()).toMatchObject({ data: { status: "draft" } });
    });
  });

  // ─── List ──────────────────────────────────────────────────────────

  describe("GET /api/v1/journals", () => {
    it("lists newest transaction dates first and filters by status", async () => {
      const early = await draft({ ...sale(1, "2025-08-01"), description: "early" });
      await draft({ ...sale(2, "2025-09-01"), description: "late" });
      await app.request(jsonRequest(`/api/v1/journals/${early}/post`, "POST"));

      const all = await app.request("/api/v1/journals");
      expect(await all.json()).toMatchObject({
        data: [{ description: "late" }, { description: "early" }],
      });

      const posted = await app.request("/api/v1/journals?status=posted");
      expect(await posted.json()).toMatchObject({ data: [{ id: early }] });

      const byPeriod = await app.request(`/api/v1/journals?periodId=${periodId}&status=draft`);
      expect(await byPeriod.json()).toMatchObject({ data: [{ description: "late" }] });
    });

    it("rejects an unknown status filter", async () => {
      const res = await app.request("/api/v1/journals?status=void");
      expect(res.status).toBe(400);
      expect((await errorOf(res)).code).toBe("VALIDATION_ERROR");
    });

    it("is scoped to the tenant", async () => {
      await draft(sale(1));
      const res = await app.request(jsonRequest("/api/v1/journals", "GET", undefined, OTHER));
      expect(await res.json()).toEqual({ data: [] });
    });
  });
});

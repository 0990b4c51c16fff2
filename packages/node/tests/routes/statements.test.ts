/**
 * Tests for statement routes.
 */

import { describe, it, expect } from "vitest";
import { createTestApp, jsonRequest, ACCOUNTS, ENTRIES, PRIMARY_TEMPLATE } from "../setup.js";

function post(body: Record<string, unknown>): Request {
  return jsonRequest("/api/v1/statements", "POST", {
    entries: ENTRIES,
    template: PRIMARY_TEMPLATE,
    ...body,
  });
}

describe("POST /api/v1/statements", () => {
  it("aggregates entries into the detailed view by default", async () => {
    const { app } = createTestApp();
    const res = await app.request(post({}));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      data: {
        view: "detailed",
        rows: [
          { level: 1, displayOrder: 10, id: 1, name: "Revenue", kind: "acc", amount: 1500 },
          { level: 1, displayOrder: 20, id: 2, name: "Purchases", kind: "acc", amount: -700 },
          { level: 0, displayOrder: 30, id: 3, name: "Gross margin", kind: "calc", amount: 800 },
          { level: 3, displayOrder: 40, id: 4, name: "External charges", kind: "acc", amount: -150 },
          { level: 0, displayOrder: 50, id: 5, name: "Operating income", kind: "calc", amount: 650 },
        ],
        warnings: [],
        rejected: [],
      },
    });
  });

  it("keeps levels 0 and 1 in the simplified view", async () => {
    const { app } = createTestApp();
    const res = await app.request(post({ view: "simplified" }));

    expect(await res.json()).toMatchObject({
      data: {
        rows: [
          { id: 1, displayOrder: 10 },
          { id: 2, displayOrder: 20 },
          { id: 3, displayOrder: 30 },
          { id: 5, displayOrder: 40, amount: 650 },
        ],
      },
    });
  });

  it("lists account lines under leaf rows in the complete view", async () => {
    const { app } = createTestApp();
    const res = await app.request(post({ view: "complete", accounts: ACCOUNTS }));

    expect(await res.json()).toMatchObject({
      data: {
        view: "complete",
        rows: [
          { id: 1, displayOrder: 10 },
          { id: 2, displayOrder: 20 },
          { id: 3, displayOrder: 30 },
          { id: 4, displayOrder: 40, amount: -150 },
          { id: 4001, displayOrder: 50, level: 4, name: "622600 Fees", kind: "acc", amount: -150 },
          { id: 5, displayOrder: 60 },
        ],
      },
    });
  });

  it("rejects entries on accounts missing from the chart", async () => {
    const { app } = createTestApp();
    const res = await app.request(post({ accounts: ACCOUNTS }));

    expect(await res.json()).toMatchObject({
      data: {
        rejected: [
          {
            entry: { date: "2024-09-01", code: "512000", amount: 999 },
            code: "512000",
            reason: "UNKNOWN_ACCOUNT",
          },
        ],
      },
    });
  });

  it("reports forward references between formula rows", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      post({
        template: [
          { display_order: 10, id: 1, name: "Total", type: "calc", level: 0, formula: "=2" },
          { display_order: 20, id: 2, name: "Half", type: "calc", level: 0, formula: "=3*0.5" },
          { display_order: 30, id: 3, name: "Sales", type: "acc", level: 1, accounts_to_include: "70*" },
        ],
      }),
    );

    expect(await res.json()).toMatchObject({
      data: {
        rows: [
          { id: 1, amount: 0 },
          { id: 2, amount: 750 },
          { id: 3, amount: 1500 },
        ],
        warnings: [
          { rowId: 1, referencedId: 2, message: "Row 1 reads formula row 2 before it is computed" },
        ],
      },
    });
  });

  it("rejects an unknown view", async () => {
    const { app } = createTestApp();
    const res = await app.request(post({ view: "summary" }));

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { code: "VALIDATION_ERROR" } });
  });
});

/**
 * Tests for statement views.
 */

import { describe, it, expect } from "vitest";
import type { RowDefinition } from "@ledgerlens/types";
import { MappingTemplate } from "@ledgerlens/mapping";
import { aggregate } from "../src/aggregate.js";
import {
  applyViewLevelFilter,
  buildCompleteView,
  renumberDisplayOrder,
  totalsByCode,
} from "../src/views.js";

function def(
  id: number,
  level: number,
  displayOrder: number,
  kind: "acc" | "calc",
  include: string[] = [],
  formula = "",
): RowDefinition {
  return {
    displayOrder,
    id,
    name: `Row ${String(id)}`,
    kind,
    level,
    includePatterns: include,
    excludePatterns: [],
    formula,
    notes: "",
  };
}

// Operating result (0) > revenue (1) > sales (2) > goods / services (3)
const template = new MappingTemplate([
  def(2, 1, 10, "calc", [], "=3"),
  def(3, 2, 20, "acc", ["70*"]),
  def(4, 3, 30, "acc", ["707*"]),
  def(5, 3, 40, "acc", ["706*"]),
  def(1, 0, 100, "calc", [], "=2"),
]);

const entries = [
  { code: "707100", amount: 300 },
  { code: "707000", amount: 200 },
  { code: "706000", amount: 50 },
  { code: "706000", amount: -50 },
];

const statement = aggregate(entries, template);

describe("applyViewLevelFilter", () => {
  it("keeps levels 0-1 for the simplified view", () => {
    const view = applyViewLevelFilter(statement, "simplified");
    expect(view.map((r) => [r.id, r.displayOrder])).toEqual([
      [2, 10],
      [1, 20],
    ]);
  });

  it("keeps levels 0-2 for the regular view", () => {
    expect(applyViewLevelFilter(statement, "regular").map((r) => r.id)).toEqual([2, 3, 1]);
  });

  it("keeps every row for other views", () => {
    const view = applyViewLevelFilter(statement, "detailed");
    expect(view.map((r) => r.id)).toEqual([2, 3, 4, 5, 1]);
    expect(view.map((r) => r.displayOrder)).toEqual([10, 20, 30, 40, 50]);
  });

  it("does not modify the input statement", () => {
    applyViewLevelFilter(statement, "detailed");
    expect(statement.map((r) => r.id)).toEqual([1, 2, 3, 4, 5]);
  });
});

describe("totalsByCode", () => {
  it("nets amounts per code and drops zero totals", () => {
    expect([...totalsByCode(entries)]).toEqual([
      ["707100", 300],
      ["707000", 200],
    ]);
  });

  it("trims codes", () => {
    expect([...totalsByCode([{ code: " 601 ", amount: 1 }, { code: "601", amount: 2 }])]).toEqual([
      ["601", 3],
    ]);
  });
});

describe("buildCompleteView", () => {
  it("inserts account lines under leaf acc rows", () => {
    const names = new Map([["707000", "Sales of goods"]]);
    const view = buildCompleteView(statement, entries, template, names);

    expect(view).toEqual([
      { level: 1, displayOrder: 10, id: 2, name: "Row 2", kind: "calc", amount: 500 },
      { level: 2, displayOrder: 20, id: 3, name: "Row 3", kind: "acc", amount: 500 },
      { level: 3, displayOrder: 30, id: 4, name: "Row 4", kind: "acc", amount: 500 },
      { level: 4, displayOrder: 40, id: 4001, name: "707000 Sales of goods", kind: "acc", amount: 200 },
      { level: 4, displayOrder: 50, id: 4002, name: "707100", kind: "acc", amount: 300 },
      { level: 3, displayOrder: 60, id: 5, name: "Row 5", kind: "acc", amount: 0 },
      { level: 0, displayOrder: 70, id: 1, name: "Row 1", kind: "calc", amount: 500 },
    ]);
  });

  it("honours a custom leaf level", () => {
    const view = buildCompleteView(statement, entries, template, new Map(), 2);
    expect(view.filter((r) => r.level === 3 && r.id > 1000).map((r) => r.id)).toEqual([3001, 3002]);
  });
});

describe("renumberDisplayOrder", () => {
  it("uses the given start and step", () => {
    const rows = renumberDisplayOrder(statement.slice(0, 3), 100, 5);
    expect(rows.map((r) => r.displayOrder)).toEqual([100, 105, 110]);
  });
});

/**
 * Tests for statement aggregation.
 *
 * Covers:
 * - One output row per template row, zero-filled
 * - Fan-out of one entry to several rows
 * - Exclusion patterns
 * - Formula rows in declaration order (including stale forward reads)
 * - Rounding and ordering of the output
 * - Abort on unsafe formulas
 */

import { describe, it, expect } from "vitest";
import type { RowDefinition } from "@ledgerlens/types";
import { MappingError, MappingTemplate } from "@ledgerlens/mapping";
import { aggregate, accumulateRowValues, statementById } from "../src/aggregate.js";

// ─── Helpers ─────────────────────────────────────────────────────────────

function acc(id: number, include: string[], extra: Partial<RowDefinition> = {}): RowDefinition {
  return {
    displayOrder: id * 10,
    id,
    name: `Row ${String(id)}`,
    kind: "acc",
    level: 1,
    includePatterns: include,
    excludePatterns: [],
    formula: "",
    notes: "",
    ...extra,
  };
}

function calc(id: number, formula: string, extra: Partial<RowDefinition> = {}): RowDefinition {
  return {
    displayOrder: id * 10,
    id,
    name: `Row ${String(id)}`,
    kind: "calc",
    level: 0,
    includePatterns: [],
    excludePatterns: [],
    formula,
    notes: "",
    ...extra,
  };
}

function amountOf(statement: ReturnType<typeof aggregate>, id: number): number | undefined {
  return statementById(statement).get(id)?.amount;
}

// ─── Tests ───────────────────────────────────────────────────────────────

describe("aggregate", () => {
  it("computes acc and calc rows from entries", () => {
    const template = new MappingTemplate([acc(1, ["70*"]), acc(2, ["62*"]), calc(3, "=1+2")]);
    const statement = aggregate(
      [
        { code: "701000", amount: 1000 },
        { code: "62201", amount: -300 },
      ],
      template,
    );

    expect(amountOf(statement, 1)).toBe(1000);
    expect(amountOf(statement, 2)).toBe(-300);
    expect(amountOf(statement, 3)).toBe(700);
  });

  it("emits a zero row for rows without entries", () => {
    const template = new MappingTemplate([acc(1, ["70*"]), acc(2, ["60*"]), calc(3, "")]);
    const statement = aggregate([{ code: "701", amount: 5 }], template);

    expect(statement).toHaveLength(3);
    expect(amountOf(statement, 2)).toBe(0);
    expect(amountOf(statement, 3)).toBe(0);
  });

  it("emits every row for an empty entry list", () => {
    const template = new MappingTemplate([acc(1, ["70*"]), calc(2, "=1*2.0")]);
    expect(aggregate([], template).map((r) => r.amount)).toEqual([0, 0]);
  });

  it("adds the full amount to every matching row", () => {
    const template = new MappingTemplate([acc(1, ["6*"]), acc(2, ["622*"])]);
    const statement = aggregate([{ code: "62201", amount: -80 }], template);

    expect(amountOf(statement, 1)).toBe(-80);
    expect(amountOf(statement, 2)).toBe(-80);
  });

  it("skips rows whose exclude pattern matches", () => {
    const template = new MappingTemplate([
      acc(1, ["70*"], { excludePatterns: ["709*"] }),
      acc(2, ["709*"]),
    ]);
    const statement = aggregate(
      [
        { code: "706000", amount: 100 },
        { code: "709000", amount: -10 },
      ],
      template,
    );

    expect(amountOf(statement, 1)).toBe(100);
    expect(amountOf(statement, 2)).toBe(-10);
  });

  it("ignores entries whose code matches no row", () => {
    const template = new MappingTemplate([acc(1, ["70*"])]);
    expect(amountOf(aggregate([{ code: "512000", amount: 999 }], template), 1)).toBe(0);
  });

  it("lets formula rows read earlier formula rows", () => {
    const template = new MappingTemplate([
      acc(1, ["70*"]),
      acc(2, ["60*"]),
      calc(3, "=1+2"),
      calc(4, "=3*2.0"),
    ]);
    const statement = aggregate(
      [
        { code: "70", amount: 50 },
        { code: "60", amount: -20 },
      ],
      template,
    );
    expect(amountOf(statement, 4)).toBe(60);
  });

  it("reads the stale value of a later formula row", () => {
    const template = new MappingTemplate([
      acc(1, ["70*"]),
      calc(2, "=3+1"),
      calc(3, "=1"),
    ]);
    const statement = aggregate([{ code: "70", amount: 50 }], template);

    expect(amountOf(statement, 2)).toBe(50);
    expect(amountOf(statement, 3)).toBe(50);
  });

  it("evaluates SUM over aggregated rows", () => {
    const template = new MappingTemplate([
      acc(1, ["1*"]),
      acc(2, ["2*"]),
      acc(3, ["3*"]),
      calc(4, "=SUM(1;2;3)"),
    ]);
    const statement = aggregate(
      [
        { code: "10", amount: 10 },
        { code: "20", amount: 20 },
        { code: "30", amount: 30 },
      ],
      template,
    );
    expect(amountOf(statement, 4)).toBe(60);
  });

  it("rounds amounts to 2 decimals", () => {
    const template = new MappingTemplate([acc(1, ["70*"])]);
    const statement = aggregate(
      [
        { code: "701", amount: 0.1 },
        { code: "702", amount: 0.2 },
        { code: "703", amount: 10.004 },
      ],
      template,
    );
    expect(amountOf(statement, 1)).toBe(10.3);
  });

  it("sorts rows by level then display order", () => {
    const template = new MappingTemplate([
      acc(1, ["70*"], { level: 2, displayOrder: 10 }),
      acc(2, ["60*"], { level: 1, displayOrder: 30 }),
      calc(3, "=1+2", { level: 0, displayOrder: 50 }),
      acc(4, ["64*"], { level: 1, displayOrder: 20 }),
    ]);
    expect(aggregate([], template).map((r) => r.id)).toEqual([3, 4, 2, 1]);
  });

  it("returns the row shape of the statement", () => {
    const template = new MappingTemplate([acc(7, ["70*"], { name: "Sales", level: 2, displayOrder: 15 })]);
    expect(aggregate([{ code: "70", amount: 12.5 }], template)).toEqual([
      { level: 2, displayOrder: 15, id: 7, name: "Sales", kind: "acc", amount: 12.5 },
    ]);
  });

  it("aborts on an unsafe formula", () => {
    const template = new MappingTemplate([acc(1, ["70*"]), calc(2, "=process.exit(1)")]);
    expect(() => aggregate([{ code: "70", amount: 1 }], template)).toThrow(MappingError);
  });

  it("aborts on division by zero", () => {
    const template = new MappingTemplate([acc(1, ["70*"]), acc(2, ["60*"]), calc(3, "=1/2")]);
    expect(() => aggregate([{ code: "70", amount: 1 }], template)).toThrow("Division by zero");
  });

  it("does not depend on previous calls", () => {
    const template = new MappingTemplate([acc(1, ["70*"]), calc(2, "=1*2.0")]);
    aggregate([{ code: "70", amount: 100 }], template);
    expect(amountOf(aggregate([{ code: "70", amount: 1 }], template), 2)).toBe(2);
  });
});

describe("accumulateRowValues", () => {
  it("keeps unrounded values", () => {
    const template = new MappingTemplate([acc(1, ["70*"])]);
    expect(accumulateRowValues([{ code: "70", amount: 1.23456 }], template).get(1)).toBe(1.23456);
  });
});

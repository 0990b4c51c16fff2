/**
 * Tests for terminal rendering.
 */

import { describe, it, expect } from "vitest";
import { Chalk } from "chalk";
import {
  formatValue,
  renderHeading,
  renderMeasures,
  renderRatios,
  renderStatement,
  renderWarning,
} from "../src/render.js";

const plain = new Chalk({ level: 0 });

describe("formatValue", () => {
  it("formats numbers at fixed decimals and null as n/a", () => {
    expect(formatValue(1500, 2)).toBe("1500.00");
    expect(formatValue(-0.5, 1)).toBe("-0.5");
    expect(formatValue(null, 2)).toBe("n/a");
  });
});

describe("renderHeading", () => {
  it("underlines the title across both columns", () => {
    expect(renderHeading("Ratios", plain)).toEqual(["Ratios", "─".repeat(54)]);
  });
});

describe("renderStatement", () => {
  it("indents by level and right-aligns amounts", () => {
    const lines = renderStatement(
      [
        { level: 0, displayOrder: 10, id: 3, name: "Margin", kind: "calc", amount: 750 },
        { level: 2, displayOrder: 20, id: 1, name: "Sales", kind: "acc", amount: 1200.5 },
      ],
      plain,
    );

    expect(lines).toEqual([
      "Margin" + " ".repeat(34) + "        750.00",
      "    Sales" + " ".repeat(31) + "       1200.50",
    ]);
  });

  it("colours negative amounts red", () => {
    const coloured = new Chalk({ level: 1 });
    const [line] = renderStatement(
      [{ level: 1, displayOrder: 10, id: 2, name: "Purchases", kind: "acc", amount: -5 }],
      coloured,
    );

    expect(line).toContain("\u001B[31m" + "         -5.00" + "\u001B[39m");
  });
});

describe("renderMeasures", () => {
  it("lists measures in metadata order with their unit", () => {
    const lines = renderMeasures(
      [
        { key: "revenue", label: "Revenue", unit: "amount", notes: "", kind: "canonical" },
        { key: "missing", label: "Missing", unit: "amount", notes: "", kind: "extra" },
        { key: "days", label: "Days", unit: "days", notes: "", kind: "extra" },
      ],
      { revenue: 10, days: 31 },
      plain,
    );

    expect(lines).toEqual([
      "Revenue".padEnd(40) + "10.00".padStart(14) + "  amount",
      "Days".padEnd(40) + "31.00".padStart(14) + "  days",
    ]);
  });
});

describe("renderRatios", () => {
  it("starts a group whenever the level changes", () => {
    const lines = renderRatios(
      [
        { key: "a", label: "Alpha", value: 1.5, unit: "ratio", notes: "", level: "basic" },
        { key: "b", label: "Beta", value: null, unit: "percent", notes: "", level: "basic" },
        { key: "c", label: "Gamma", value: 2, unit: "ratio", notes: "", level: "full" },
      ],
      1,
      plain,
    );

    expect(lines).toEqual([
      "[basic]",
      "Alpha".padEnd(40) + "1.5".padStart(14) + "  ratio",
      "Beta".padEnd(40) + "n/a".padStart(14) + "  percent",
      "[full]",
      "Gamma".padEnd(40) + "2.0".padStart(14) + "  ratio",
    ]);
  });
});

describe("renderWarning", () => {
  it("prefixes the message", () => {
    expect(renderWarning("Row 1 reads formula row 2 before it is computed", plain)).toBe(
      "! Row 1 reads formula row 2 before it is computed",
    );
  });
});

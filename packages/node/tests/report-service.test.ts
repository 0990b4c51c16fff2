/**
 * Tests for ReportService — measure sets, metadata and multi-period reports.
 */

import { describe, it, expect } from "vitest";
import pino from "pino";
import type { Logger } from "pino";
import { MappingError, MappingTemplate } from "@ledgerlens/mapping";
import { parseRules } from "@ledgerlens/ratios";
import {
  ReportError,
  ReportService,
  entriesInPeriod,
  periodDays,
} from "../src/services/report-service.js";
import {
  CUSTOM_RULES,
  ENTRIES,
  PRIMARY_TEMPLATE,
  SECONDARY_TEMPLATE,
  STANDARD_RULES,
} from "./setup.js";

const primary = MappingTemplate.fromRecords(PRIMARY_TEMPLATE);
const secondary = MappingTemplate.fromRecords(SECONDARY_TEMPLATE);
const standard = parseRules(STANDARD_RULES);
const custom = parseRules(CUSTOM_RULES);

function captureLogger(): { logger: Logger; lines: unknown[] } {
  const lines: unknown[] = [];
  const logger = pino(
    { level: "debug" },
    {
      write(message: string) {
        lines.push(JSON.parse(message));
      },
    },
  );
  return { logger, lines };
}

// =============================================================================
// Periods
// =============================================================================

describe("periodDays", () => {
  it("counts both ends of the period", () => {
    expect(periodDays({ label: "2024", start: "2024-01-01", end: "2024-12-31" })).toBe(366);
    expect(periodDays({ label: "day", start: "2024-03-01", end: "2024-03-01" })).toBe(1);
  });

  it("prefers an explicit day count", () => {
    expect(periodDays({ label: "Q1", start: "2024-01-01", end: "2024-03-31", days: 90 })).toBe(90);
  });

  it("rejects inverted periods and invalid dates", () => {
    expect(() => periodDays({ label: "x", start: "2024-02-01", end: "2024-01-31" })).toThrow(
      ReportError,
    );
    expect(() => periodDays({ label: "y", start: "2024-13-45", end: "2024-12-31" })).toThrow(
      'Period "y" has an invalid date',
    );
  });

  it("rejects dates that do not exist in the calendar", () => {
    expect(() => periodDays({ label: "Feb", start: "2024-02-01", end: "2024-02-31" })).toThrow(
      'Period "Feb" has an invalid date',
    );
    expect(() => periodDays({ label: "Leap", start: "2023-02-29", end: "2023-03-31" })).toThrow(
      'Period "Leap" has an invalid date',
    );
    expect(periodDays({ label: "Feb", start: "2024-02-01", end: "2024-02-29" })).toBe(29);
  });
});

describe("entriesInPeriod", () => {
  it("includes entries on both boundaries", () => {
    const kept = entriesInPeriod(ENTRIES, { label: "Q1", start: "2024-01-15", end: "2024-03-05" });
    expect(kept.map((entry) => entry.date)).toEqual([
      "2024-01-15",
      "2024-02-10",
      "2024-02-11",
      "2024-03-05",
    ]);
  });
});

// =============================================================================
// Measure sets
// =============================================================================

describe("ReportService.computeMeasures", () => {
  it("lets secondary canonical measures override primary ones", () => {
    const overriding = MappingTemplate.fromRecords([
      { display_order: 10, id: 1, name: "Net sales", type: "acc", level: 1, accounts_to_include: "706*", canonical_measure: "revenue" },
    ]);
    const service = new ReportService();
    const set = service.computeMeasures({
      entries: ENTRIES,
      template: primary,
      secondaryTemplate: overriding,
      extraMeasures: { revenue: 1 },
    });

    expect(set.measures["revenue"]).toBe(1500);
    expect(set.secondary).toEqual([
      { level: 1, displayOrder: 10, id: 1, name: "Net sales", kind: "acc", amount: 1500 },
    ]);
  });

  it("lets later rule sets read earlier derived measures", () => {
    const service = new ReportService();
    const set = service.computeMeasures({
      entries: ENTRIES,
      template: primary,
      ruleSets: [
        standard,
        parseRules({ measures: { gm_ratio: { formula: "gross_margin_pct / 100" } } }),
      ],
    });

    expect(set.measures["gm_ratio"]).toBe(80000 / 1500 / 100);
    expect(set.skipped).toEqual([]);
  });

  it("logs skipped measures at debug", () => {
    const { logger, lines } = captureLogger();
    const service = new ReportService(logger);
    service.computeMeasures({ entries: ENTRIES, template: primary, ruleSets: [custom] });

    expect(lines).toEqual([
      expect.objectContaining({
        level: 20,
        measure: "payroll_per_head",
        code: "UNKNOWN_VARIABLE",
        msg: 'Unknown variable in expression: "payroll"',
      }),
    ]);
  });

  it("propagates formula errors", () => {
    const broken = MappingTemplate.fromRecords([
      { display_order: 10, id: 1, name: "Bad", type: "calc", level: 0, formula: "=1;2" },
    ]);
    const service = new ReportService();
    expect(() => service.computeMeasures({ entries: [], template: broken })).toThrow(MappingError);
  });
});

describe("ReportService.describeMeasures", () => {
  it("prefers canonical over derived metadata", () => {
    const service = new ReportService();
    const shadowing = parseRules({
      measures: { revenue: { formula: "revenue * 2", label: "Doubled" } },
    });
    const metadata = service.describeMeasures(
      { revenue: 3000, extra_days: 10, period_days: 30 },
      { template: primary, ruleSets: [shadowing] },
    );

    expect(metadata).toEqual([
      { key: "revenue", label: "Revenue", unit: "amount", notes: "", kind: "canonical" },
      { key: "extra_days", label: "extra_days", unit: "amount", notes: "", kind: "extra" },
      { key: "period_days", label: "period_days", unit: "days", notes: "", kind: "extra" },
    ]);
  });
});

// =============================================================================
// Reports
// =============================================================================

describe("ReportService.buildReport", () => {
  it("throws NO_PERIODS for an empty period list", () => {
    const service = new ReportService();
    expect(() =>
      service.buildReport({ entries: ENTRIES, template: primary, periods: [], level: "basic" }),
    ).toThrow(new ReportError("NO_PERIODS", "A report needs at least one period"));
  });

  it("applies custom rules after standard rules", () => {
    const service = new ReportService();
    const report = service.buildReport({
      entries: ENTRIES,
      template: primary,
      periods: [{ label: "2024", start: "2024-01-01", end: "2024-12-31" }],
      ruleSets: [
        standard,
        parseRules({
          ratios: { basic: { revenue_per_day: { formula: "revenue / period_days" } } },
        }),
      ],
      level: "basic",
    });

    expect(report.ratios.map((ratio) => [ratio.key, ratio.value])).toEqual([
      ["gross_margin_pct", 80000 / 1500],
      ["operating_margin", 65000 / 1500],
      ["revenue_per_day", 1500 / 366],
    ]);
  });

  it("filters unknown accounts before splitting periods", () => {
    const service = new ReportService();
    const report = service.buildReport({
      entries: ENTRIES,
      template: primary,
      periods: [{ label: "2024", start: "2024-01-01", end: "2024-12-31" }],
      level: "basic",
      knownCodes: new Set(["70"]),
    });

    expect(report.rejected.map((rejection) => rejection.code)).toEqual([
      "607000",
      "609000",
      "622600",
      "607000",
      "512000",
    ]);
    expect(report.statements.primary.find((row) => row.id === 5)?.amount).toBe(1500);
  });

  it("logs template warnings and a summary", () => {
    const { logger, lines } = captureLogger();
    const service = new ReportService(logger);
    service.buildReport({
      entries: ENTRIES,
      template: primary,
      secondaryTemplate: secondary,
      periods: [{ label: "2024", start: "2024-01-01", end: "2024-12-31" }],
      level: "basic",
    });

    expect(lines).toEqual([
      expect.objectContaining({
        level: 40,
        rowId: 1,
        template: "secondary",
        msg: "Row 1 reads formula row 4 before it is computed",
      }),
      expect.objectContaining({
        level: 30,
        periods: 1,
        entries: 7,
        ratios: 0,
        msg: "Report built",
      }),
    ]);
  });
});

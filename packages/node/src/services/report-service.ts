/**
 * ReportService — Composition root for the analysis packages.
 *
 * Route handlers delegate to this service; it wires mapping templates,
 * aggregation, canonical measures, derived measures and ratios into
 * single-period measure sets and multi-period reports.
 *
 * Rules:
 * - Periods are inclusive on both ends and compared as ISO date strings
 * - Extra measures (plus period_days) layer on the primary statement;
 *   secondary canonical measures then override
 * - Rule sets apply in order: each set's derived measures see the
 *   previous sets' results; ratios are computed from the final map
 */

import type { Logger } from "pino";
import type {
  AggregatedStatement,
  LedgerEntry,
  MeasureMap,
  MeasureMeta,
  RatioLevel,
  RatioResult,
  StatementRow,
} from "@ledgerlens/types";
import type { ForwardReferenceWarning, MappingTemplate } from "@ledgerlens/mapping";
import {
  aggregate,
  extractCanonicalMeasures,
  filterUnknownAccounts,
  mergeMeasures,
} from "@ledgerlens/engine";
import type { ExtraMeasures, RejectedEntry } from "@ledgerlens/engine";
import {
  computeRatios,
  evaluateDerivedMeasures,
  loadDerivedMeasureMetadata,
} from "@ledgerlens/ratios";
import type { RuleSet, SkippedMeasure } from "@ledgerlens/ratios";

// =============================================================================
// Errors
// =============================================================================

export type ReportErrorCode = "NO_PERIODS" | "INVALID_PERIOD";

export class ReportError extends Error {
  public readonly code: ReportErrorCode;

  constructor(code: ReportErrorCode, message: string) {
    super(message);
    this.name = "ReportError";
    this.code = code;
  }
}

// =============================================================================
// Types
// =============================================================================

export const PERIOD_DAYS_MEASURE = "period_days";

export interface ReportPeriod {
  readonly label: string;
  /** Inclusive ISO date */
  readonly start: string;
  /** Inclusive ISO date */
  readonly end: string;
  /** Overrides the day count derived from start and end */
  readonly days?: number | undefined;
}

export interface MeasureSetInput {
  readonly entries: readonly LedgerEntry[];
  readonly template: MappingTemplate;
  readonly secondaryTemplate?: MappingTemplate | undefined;
  readonly extraMeasures?: ExtraMeasures | undefined;
  readonly ruleSets?: readonly RuleSet[] | undefined;
}

export interface MeasureSet {
  readonly primary: AggregatedStatement;
  readonly secondary: AggregatedStatement | null;
  readonly measures: MeasureMap;
  readonly skipped: readonly SkippedMeasure[];
}

export interface ReportInput extends MeasureSetInput {
  readonly periods: readonly ReportPeriod[];
  readonly level: RatioLevel;
  /** When given, entries on unknown accounts are rejected up front */
  readonly knownCodes?: ReadonlySet<string> | undefined;
}

export interface PeriodStatementRow extends StatementRow {
  readonly periodLabel: string;
  readonly notes: string;
}

export interface PeriodMeasure extends MeasureMeta {
  readonly periodLabel: string;
  readonly value: number;
}

export interface PeriodRatio extends RatioResult {
  readonly periodLabel: string;
}

export interface PeriodSkippedMeasure extends SkippedMeasure {
  readonly periodLabel: string;
}

export interface TemplateWarning extends ForwardReferenceWarning {
  readonly template: "primary" | "secondary";
}

export interface MultiPeriodReport {
  readonly statements: {
    readonly primary: readonly PeriodStatementRow[];
    readonly secondary: readonly PeriodStatementRow[] | null;
  };
  readonly measures: readonly PeriodMeasure[];
  readonly ratios: readonly PeriodRatio[];
  readonly skippedMeasures: readonly PeriodSkippedMeasure[];
  readonly warnings: readonly TemplateWarning[];
  readonly rejected: readonly RejectedEntry<LedgerEntry>[];
}

// =============================================================================
// Helpers
// =============================================================================

const MS_PER_DAY = 86_400_000;

/**
 * Milliseconds of a "YYYY-MM-DD" date at UTC midnight, or NaN when the text
 * is not a calendar date. Dates that would roll over ("2024-02-31") are NaN.
 */
function parseIsoDate(text: string): number {
  const ms = Date.parse(`${text}T00:00:00Z`);
  if (Number.isNaN(ms) || new Date(ms).toISOString().slice(0, 10) !== text) {
    return Number.NaN;
  }
  return ms;
}

/**
 * Inclusive day count of a period, unless the period gives its own.
 *
 * { start: "2024-01-01", end: "2024-12-31" } → 366
 */
export function periodDays(period: ReportPeriod): number {
  const start = parseIsoDate(period.start);
  const end = parseIsoDate(period.end);
  if (Number.isNaN(start) || Number.isNaN(end)) {
    throw new ReportError("INVALID_PERIOD", `Period "${period.label}" has an invalid date`);
  }
  if (end < start) {
    throw new ReportError("INVALID_PERIOD", `Period "${period.label}" ends before it starts`);
  }
  return period.days ?? Math.round((end - start) / MS_PER_DAY) + 1;
}

export function entriesInPeriod(
  entries: readonly LedgerEntry[],
  period: ReportPeriod,
): LedgerEntry[] {
  return entries.filter((entry) => entry.date >= period.start && entry.date <= period.end);
}

function withPeriod(
  statement: AggregatedStatement,
  template: MappingTemplate,
  periodLabel: string,
): PeriodStatementRow[] {
  return statement.map((row) => ({
    periodLabel,
    ...row,
    notes: template.getRow(row.id)?.notes ?? "",
  }));
}

// =============================================================================
// Service
// =============================================================================

export class ReportService {
  private readonly logger: Logger | undefined;

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  /**
   * Statements and the full measure map for one set of entries.
   */
  computeMeasures(input: MeasureSetInput): MeasureSet {
    const primary = aggregate(input.entries, input.template);
    const secondary =
      input.secondaryTemplate === undefined ? null : aggregate(input.entries, input.secondaryTemplate);

    let measures = extractCanonicalMeasures(primary, input.template, input.extraMeasures);
    if (secondary !== null && input.secondaryTemplate !== undefined) {
      measures = mergeMeasures(measures, extractCanonicalMeasures(secondary, input.secondaryTemplate));
    }

    const skipped: SkippedMeasure[] = [];
    for (const ruleSet of input.ruleSets ?? []) {
      const result = evaluateDerivedMeasures(measures, ruleSet.measures);
      measures = result.measures;
      skipped.push(...result.skipped);
    }

    for (const skip of skipped) {
      this.logger?.debug({ measure: skip.key, code: skip.code }, skip.message);
    }

    return { primary, secondary, measures, skipped };
  }

  /**
   * Display metadata for every measure of a map.
   *
   * Canonical metadata (secondary over primary) wins over derived
   * metadata (later rule sets over earlier ones); anything else is an
   * "extra" measure labelled by its key.
   */
  describeMeasures(
    measures: MeasureMap,
    input: Pick<MeasureSetInput, "template" | "secondaryTemplate" | "ruleSets">,
  ): MeasureMeta[] {
    const canonical = new Map(input.template.canonicalMeasureMetadata());
    if (input.secondaryTemplate !== undefined) {
      for (const [key, meta] of input.secondaryTemplate.canonicalMeasureMetadata()) {
        canonical.set(key, meta);
      }
    }

    const derived = new Map<string, MeasureMeta>();
    for (const ruleSet of input.ruleSets ?? []) {
      for (const [key, meta] of loadDerivedMeasureMetadata(ruleSet.measures)) {
        derived.set(key, meta);
      }
    }

    return Object.keys(measures).map(
      (key): MeasureMeta =>
        canonical.get(key) ??
        derived.get(key) ?? {
          key,
          label: key,
          unit: key === PERIOD_DAYS_MEASURE ? "days" : "amount",
          notes: "",
          kind: "extra",
        },
    );
  }

  /**
   * Forward-reference warnings of the primary and secondary templates.
   */
  lintTemplates(
    input: Pick<MeasureSetInput, "template" | "secondaryTemplate">,
  ): TemplateWarning[] {
    const warnings: TemplateWarning[] = input.template
      .lintForwardReferences()
      .map((warning): TemplateWarning => ({ ...warning, template: "primary" }));
    if (input.secondaryTemplate !== undefined) {
      for (const warning of input.secondaryTemplate.lintForwardReferences()) {
        warnings.push({ ...warning, template: "secondary" });
      }
    }
    return warnings;
  }

  /**
   * Statements, measures and ratios for each period, in period order.
   *
   * @throws {ReportError} when there are no periods or a period is inverted
   * @throws {MappingError} when a template is invalid or a formula unsafe
   */
  buildReport(input: ReportInput): MultiPeriodReport {
    if (input.periods.length === 0) {
      throw new ReportError("NO_PERIODS", "A report needs at least one period");
    }
    const days = input.periods.map(periodDays);

    const warnings = this.lintTemplates(input);
    for (const warning of warnings) {
      this.logger?.warn({ rowId: warning.rowId, template: warning.template }, warning.message);
    }

    let entries = input.entries;
    let rejected: readonly RejectedEntry<LedgerEntry>[] = [];
    if (input.knownCodes !== undefined) {
      const filtered = filterUnknownAccounts(input.entries, input.knownCodes);
      entries = filtered.kept;
      rejected = filtered.rejected;
      if (rejected.length > 0) {
        this.logger?.warn({ count: rejected.length }, "Entries on unknown accounts rejected");
      }
    }

    const primary: PeriodStatementRow[] = [];
    const secondary: PeriodStatementRow[] = [];
    const measures: PeriodMeasure[] = [];
    const ratios: PeriodRatio[] = [];
    const skippedMeasures: PeriodSkippedMeasure[] = [];

    input.periods.forEach((period, index) => {
      const set = this.computeMeasures({
        ...input,
        entries: entriesInPeriod(entries, period),
        extraMeasures: { ...input.extraMeasures, [PERIOD_DAYS_MEASURE]: days[index] },
      });

      primary.push(...withPeriod(set.primary, input.template, period.label));
      if (set.secondary !== null && input.secondaryTemplate !== undefined) {
        secondary.push(...withPeriod(set.secondary, input.secondaryTemplate, period.label));
      }

      for (const meta of this.describeMeasures(set.measures, input)) {
        const value = set.measures[meta.key];
        if (value === undefined) continue;
        measures.push({ periodLabel: period.label, ...meta, value });
      }

      for (const ruleSet of input.ruleSets ?? []) {
        for (const ratio of computeRatios(set.measures, ruleSet.ratios, input.level)) {
          ratios.push({ periodLabel: period.label, ...ratio });
        }
      }

      for (const skip of set.skipped) {
        skippedMeasures.push({ periodLabel: period.label, ...skip });
      }
    });

    this.logger?.info(
      { periods: input.periods.length, entries: entries.length, ratios: ratios.length },
      "Report built",
    );

    return {
      statements: {
        primary,
        secondary: input.secondaryTemplate === undefined ? null : secondary,
      },
      measures,
      ratios,
      skippedMeasures,
      warnings,
      rejected,
    };
  }
}

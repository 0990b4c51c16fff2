/**
 * @ledgerlens/ratios — Derived measures.
 *
 * Rules:
 * - Rules are folded in order; a rule may read any base measure or any
 *   derived measure computed before it
 * - A rule with an empty formula, or one that fails to evaluate, is
 *   skipped and stays unavailable to later rules and ratios
 * - A derived measure replaces a base measure of the same name
 */

import type { DerivedMeasureRule, MeasureMap, MeasureMeta } from "@ledgerlens/types";
import { evaluateExpression } from "./expression.js";
import { DEFAULT_UNIT } from "./rules.js";
import { ExpressionError } from "./types.js";
import type { ExpressionErrorCode } from "./types.js";

export interface SkippedMeasure {
  readonly key: string;
  readonly code: ExpressionErrorCode;
  readonly message: string;
}

export interface DerivedMeasuresResult {
  readonly measures: MeasureMap;
  readonly skipped: readonly SkippedMeasure[];
}

/**
 * Compute derived measures and report the rules that were skipped.
 * Rules with an empty formula are ignored without a report.
 */
export function evaluateDerivedMeasures(
  base: MeasureMap,
  rules: readonly DerivedMeasureRule[],
): DerivedMeasuresResult {
  const measures = new Map<string, number>(Object.entries(base));
  const skipped: SkippedMeasure[] = [];

  for (const rule of rules) {
    if (rule.formula.trim() === "") continue;
    try {
      measures.set(rule.key, evaluateExpression(rule.formula, Object.fromEntries(measures)));
    } catch (err) {
      if (!(err instanceof ExpressionError)) throw err;
      skipped.push({ key: rule.key, code: err.code, message: err.message });
    }
  }

  return { measures: Object.fromEntries(measures), skipped };
}

/**
 * Base measures plus every derived measure that could be computed.
 */
export function computeDerivedMeasures(
  base: MeasureMap,
  rules: readonly DerivedMeasureRule[],
): MeasureMap {
  return evaluateDerivedMeasures(base, rules).measures;
}

/**
 * Display metadata for derived measures, keyed by measure name.
 * Missing label defaults to the key and missing unit to "amount".
 */
export function loadDerivedMeasureMetadata(
  rules: readonly DerivedMeasureRule[],
): ReadonlyMap<string, MeasureMeta> {
  const metadata = new Map<string, MeasureMeta>();
  for (const rule of rules) {
    metadata.set(rule.key, {
      key: rule.key,
      label: rule.label !== undefined && rule.label !== "" ? rule.label : rule.key,
      unit: rule.unit !== undefined && rule.unit !== "" ? rule.unit : DEFAULT_UNIT,
      notes: rule.notes ?? "",
      kind: "extra",
    });
  }
  return metadata;
}

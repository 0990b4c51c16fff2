/**
 * @ledgerlens/ratios — Ratio evaluation.
 *
 * Ratio levels are cumulative: "advanced" includes "basic", "full"
 * includes everything. A level outside that order is a custom tier and
 * includes only itself.
 *
 * A ratio whose formula is exactly a measure name passes that measure
 * through; any other formula is evaluated as an expression. A ratio
 * that cannot be evaluated still appears, with value null.
 */

import type { MeasureMap, RatioDefinition, RatioLevel, RatioResult } from "@ledgerlens/types";
import { roundHalfEven } from "@ledgerlens/engine";
import { evaluateExpression } from "./expression.js";
import { ExpressionError } from "./types.js";

export const LEVEL_ORDER: readonly RatioLevel[] = ["basic", "advanced", "full"];

/**
 * Levels a request for `level` covers, lowest first.
 *
 * "advanced" → ["basic", "advanced"]
 * "custom"   → ["custom"]
 */
export function levelsToInclude(level: RatioLevel): readonly RatioLevel[] {
  const index = LEVEL_ORDER.indexOf(level);
  return index === -1 ? [level] : LEVEL_ORDER.slice(0, index + 1);
}

function lookup(measures: MeasureMap, name: string): number | undefined {
  return Object.hasOwn(measures, name) ? measures[name] : undefined;
}

/**
 * Value of one ratio, or null when it has no formula or cannot be
 * evaluated. A definition without a formula falls back to its measure
 * reference.
 */
export function evaluateRatio(definition: RatioDefinition, measures: MeasureMap): number | null {
  const formula = definition.formula?.trim() ?? "";

  if (formula === "") {
    const measure = definition.measure?.trim() ?? "";
    return measure === "" ? null : (lookup(measures, measure) ?? null);
  }

  const passthrough = lookup(measures, formula);
  if (passthrough !== undefined) {
    return passthrough;
  }

  try {
    return evaluateExpression(formula, measures);
  } catch (err) {
    if (err instanceof ExpressionError) return null;
    throw err;
  }
}

/**
 * Compute every ratio covered by `level`, grouped by ascending level and
 * in declaration order within a level.
 */
export function computeRatios(
  measures: MeasureMap,
  definitions: readonly RatioDefinition[],
  level: RatioLevel,
): RatioResult[] {
  const results: RatioResult[] = [];

  for (const current of levelsToInclude(level)) {
    for (const definition of definitions) {
      if (definition.level !== current) continue;
      results.push({
        key: definition.key,
        label: definition.label,
        value: evaluateRatio(definition, measures),
        unit: definition.unit,
        notes: definition.notes,
        level: current,
      });
    }
  }

  return results;
}

// ─── Display ─────────────────────────────────────────────────────────────

function levelRank(level: RatioLevel): number {
  const index = LEVEL_ORDER.indexOf(level);
  return index === -1 ? LEVEL_ORDER.length : index;
}

/**
 * Ratio results ready for a table: values rounded to `decimals`, sorted
 * by level (basic, advanced, full, then custom tiers) and then by key.
 */
export function ratiosToTable(results: readonly RatioResult[], decimals: number): RatioResult[] {
  return results
    .map((result) => ({
      ...result,
      value: result.value === null ? null : roundHalfEven(result.value, decimals),
    }))
    .sort(
      (a, b) =>
        levelRank(a.level) - levelRank(b.level) || (a.key < b.key ? -1 : a.key > b.key ? 1 : 0),
    );
}

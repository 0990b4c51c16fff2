/**
 * @ledgerlens/engine — Canonical measure extraction.
 *
 * Projects statement rows onto named, standard-agnostic measures
 * ("revenue", "net_income", ...) through the canonical_measure tags of
 * the template, then layers caller-supplied extra measures on top
 * (balance-sheet inputs, head count, period length).
 */

import type { AggregatedStatement, MeasureMap } from "@ledgerlens/types";
import type { MappingTemplate } from "@ledgerlens/mapping";
import { statementById } from "./aggregate.js";

/**
 * Extra measures as they arrive from configuration: numbers or numeric text.
 */
export type ExtraMeasures = Readonly<Record<string, unknown>>;

/**
 * Coerce a configuration value to a finite number.
 * Returns undefined for anything that is not a number or numeric text.
 */
export function coerceMeasureValue(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === "string") {
    const text = value.trim();
    if (text === "") return undefined;
    const parsed = Number(text);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

/**
 * Build the measure map of one statement.
 *
 * - Tagged rows missing from the statement, or holding a non-finite
 *   amount, yield 0.
 * - Extra measures override tagged rows of the same name; values that
 *   cannot be coerced are dropped.
 *
 * Throws MappingError when the template has duplicate ids or tags.
 */
export function extractCanonicalMeasures(
  statement: AggregatedStatement,
  template: MappingTemplate,
  extraMeasures?: ExtraMeasures,
): MeasureMap {
  const rows = statementById(statement);
  const measures = new Map<string, number>();

  for (const [key, id] of template.canonicalMeasures()) {
    const amount = rows.get(id)?.amount;
    measures.set(key, amount !== undefined && Number.isFinite(amount) ? amount : 0);
  }

  if (extraMeasures !== undefined) {
    for (const [key, raw] of Object.entries(extraMeasures)) {
      const value = coerceMeasureValue(raw);
      if (value !== undefined) {
        measures.set(key, value);
      }
    }
  }

  return Object.fromEntries(measures);
}

/**
 * Merge measure maps left to right; later maps win on collision.
 *
 * Used to combine a primary statement with a more specific secondary one.
 */
export function mergeMeasures(...maps: readonly MeasureMap[]): MeasureMap {
  const merged = new Map<string, number>();
  for (const map of maps) {
    for (const [key, value] of Object.entries(map)) {
      merged.set(key, value);
    }
  }
  return Object.fromEntries(merged);
}

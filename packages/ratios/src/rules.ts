/**
 * @ledgerlens/ratios — Rules documents.
 *
 * A rules document declares derived measures and ratios per accounting
 * standard:
 *
 *   {
 *     "measures": {
 *       "ebitda": { "formula": "operating_income + depreciation", "label": "EBITDA" }
 *     },
 *     "ratios": {
 *       "basic":    { "gross_margin_pct": { "formula": "gross_margin / revenue * 100", "unit": "percent" } },
 *       "advanced": { "ebitda": { "measure": "ebitda" } }
 *     }
 *   }
 *
 * Rules:
 * - Declaration order is evaluation order, for measures and for ratios
 *   within a level
 * - Object keys that look like integers are reordered by JavaScript
 *   itself; use names that do not
 * - Missing label defaults to the key, unit to "amount", notes to ""
 * - A measure without a formula is kept with an empty one and skipped
 *   when measures are computed; a numeric formula is read as its text
 */

import { z } from "zod";
import type { DerivedMeasureRule, RatioDefinition } from "@ledgerlens/types";
import { RulesError } from "./types.js";

// =============================================================================
// Schema
// =============================================================================

export const MeasureRuleSchema = z.object({
  formula: z.union([z.string(), z.number().transform(String)]).optional(),
  label: z.string().optional(),
  unit: z.string().optional(),
  notes: z.string().optional(),
});

export const RatioRuleSchema = z.object({
  formula: z.string().optional(),
  measure: z.string().optional(),
  label: z.string().optional(),
  unit: z.string().optional(),
  notes: z.string().optional(),
});

export const RulesSchema = z.object({
  measures: z.record(MeasureRuleSchema).optional(),
  ratios: z.record(z.record(RatioRuleSchema)).optional(),
});

export type RulesDocument = z.infer<typeof RulesSchema>;

/**
 * A rules document flattened into ordered lists.
 */
export interface RuleSet {
  readonly measures: readonly DerivedMeasureRule[];
  readonly ratios: readonly RatioDefinition[];
}

export const EMPTY_RULE_SET: RuleSet = { measures: [], ratios: [] };

export const DEFAULT_UNIT = "amount";

// =============================================================================
// Conversion
// =============================================================================

/**
 * Validate a rules document and flatten it.
 *
 * @throws {RulesError} when the document does not match the schema
 */
export function parseRules(input: unknown): RuleSet {
  const parsed = RulesSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`,
    );
    throw new RulesError(`Invalid rules document: ${issues.join("; ")}`, issues);
  }
  return flattenRules(parsed.data);
}

/**
 * Turn the nested document into lists, keeping declaration order.
 */
export function flattenRules(document: RulesDocument): RuleSet {
  const measures: DerivedMeasureRule[] = [];
  for (const [key, rule] of Object.entries(document.measures ?? {})) {
    measures.push({ key, ...rule, formula: rule.formula ?? "" });
  }

  const ratios: RatioDefinition[] = [];
  for (const [level, section] of Object.entries(document.ratios ?? {})) {
    for (const [key, rule] of Object.entries(section)) {
      ratios.push({
        key,
        label: rule.label ?? key,
        formula: rule.formula,
        measure: rule.measure,
        unit: rule.unit ?? DEFAULT_UNIT,
        notes: rule.notes ?? "",
        level,
      });
    }
  }

  return { measures, ratios };
}

/**
 * Statement Types
 *
 * Row definitions of a mapping template and the aggregated statement
 * produced from them.
 *
 * Rules:
 * - Row ids are unique within one template
 * - Every row definition yields exactly one statement row
 * - Canonical measure tags are unique within one template
 */

import type { AccountCode } from "./financial.js";

/**
 * Row kind.
 *
 * - "acc"  → aggregation of account codes (sum of amounts)
 * - "calc" → formula over other row ids
 */
export type RowKind = "acc" | "calc";

/**
 * One output line of a statement, as declared in a mapping template.
 */
export interface RowDefinition {
  /** Rendering / tie-break hint. Not guaranteed unique. */
  readonly displayOrder: number;

  /** Unique id, referenced by formulas */
  readonly id: number;

  readonly name: string;
  readonly kind: RowKind;

  /** Hierarchy depth, 0 = top */
  readonly level: number;

  /** Exact codes or prefix patterns ending in "*" */
  readonly includePatterns: readonly AccountCode[];
  readonly excludePatterns: readonly AccountCode[];

  /** Formula text for "calc" rows (e.g. "=1+2", "=SUM(4;5)") */
  readonly formula: string;

  /** Canonical measure name carried by this row, if any */
  readonly canonicalMeasure?: string | undefined;

  readonly notes: string;
}

/**
 * A computed statement line.
 */
export interface StatementRow {
  readonly level: number;
  readonly displayOrder: number;
  readonly id: number;
  readonly name: string;
  readonly kind: RowKind;
  /** Rounded to 2 decimal places */
  readonly amount: number;
}

/**
 * Rows sorted by (level, displayOrder).
 */
export type AggregatedStatement = readonly StatementRow[];

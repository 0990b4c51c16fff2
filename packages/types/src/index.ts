/**
 * @ledgerlens/types — Shared domain types for the ledgerlens stack.
 *
 * These types are used across all ledgerlens packages:
 * - Ledger entries (coded, dated, signed amounts)
 * - Mapping rows and aggregated statements
 * - Measures, derived-measure rules and ratios
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types — meaning lives in consuming code
 */

// Financial types
export type { AccountCode, LedgerEntry } from "./financial.js";

// Statement types
export type {
  RowKind,
  RowDefinition,
  StatementRow,
  AggregatedStatement,
} from "./statement.js";

// Measure and ratio types
export type {
  MeasureMap,
  MeasureKind,
  MeasureMeta,
  DerivedMeasureRule,
  RatioLevel,
  RatioDefinition,
  RatioResult,
} from "./measures.js";

// Runtime type guards
export {
  isLedgerEntry,
  isRowKind,
  isRowDefinition,
  isStatementRow,
  isMeasureMap,
  isRatioResult,
} from "./guards.js";

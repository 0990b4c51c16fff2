/**
 * @ledgerlens/mapping — Mapping templates for financial statements.
 *
 * Maps account codes to statement rows through include/exclude
 * patterns and computes formula rows from other rows.
 *
 * Design rules:
 * - All types are readonly
 * - Templates are immutable once constructed
 * - Fail-closed: unsafe formulas throw, never silently succeed
 * - Zero runtime dependencies
 */

// Template
export { MappingTemplate, rowFromRecord } from "./template.js";

// Pattern matching
export { matches, parsePatternList, WILDCARD } from "./patterns.js";

// Row formulas
export {
  FORMULA_MARKER,
  isFormula,
  parseRowFormula,
  evaluateRowFormula,
  evaluateRowFormulaNode,
  rowReferences,
} from "./row-formula.js";
export type { RowFormulaNode } from "./row-formula.js";

// Types
export type {
  MappingCell,
  MappingRecord,
  ForwardReferenceWarning,
  MappingErrorCode,
} from "./types.js";

export { MappingError } from "./types.js";

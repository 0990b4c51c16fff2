/**
 * @ledgerlens/ratios — Derived measures and financial ratios.
 *
 * Evaluates rule documents over a measure map: derived measures first,
 * then ratios at a cumulative level.
 *
 * Design rules:
 * - Expressions are parsed into a typed tree; nothing is eval()'d
 * - A failing measure or ratio degrades to "absent" / null, never
 *   aborts the whole computation
 * - Rule order is evaluation order
 */

// Expressions
export { parseExpression, evaluateExpression, evaluateExpressionNode } from "./expression.js";
export type { ExpressionNode, BinaryOperator } from "./expression.js";

// Rules documents
export {
  parseRules,
  flattenRules,
  RulesSchema,
  MeasureRuleSchema,
  RatioRuleSchema,
  EMPTY_RULE_SET,
  DEFAULT_UNIT,
} from "./rules.js";
export type { RulesDocument, RuleSet } from "./rules.js";

// Derived measures
export {
  computeDerivedMeasures,
  evaluateDerivedMeasures,
  loadDerivedMeasureMetadata,
} from "./derived-measures.js";
export type { SkippedMeasure, DerivedMeasuresResult } from "./derived-measures.js";

// Ratios
export {
  computeRatios,
  evaluateRatio,
  levelsToInclude,
  ratiosToTable,
  LEVEL_ORDER,
} from "./ratios.js";

// Errors
export { ExpressionError, RulesError } from "./types.js";
export type { ExpressionErrorCode, RulesErrorCode } from "./types.js";

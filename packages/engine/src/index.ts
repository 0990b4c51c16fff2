/**
 * @ledgerlens/engine — Statement aggregation engine.
 *
 * Aggregates coded ledger entries into the rows of a mapping template,
 * projects the result onto canonical measures, and re-derives display
 * views.
 *
 * Design rules:
 * - Pure functions of their inputs; no I/O, no shared state
 * - Every template row appears in every statement
 * - Unresolved references and unmatched codes count as zero
 */

// Aggregation
export { aggregate, accumulateRowValues, statementById } from "./aggregate.js";
export type { AmountEntry } from "./aggregate.js";

// Canonical measures
export {
  extractCanonicalMeasures,
  mergeMeasures,
  coerceMeasureValue,
} from "./canonical-measures.js";
export type { ExtraMeasures } from "./canonical-measures.js";

// Views
export {
  applyViewLevelFilter,
  buildCompleteView,
  renumberDisplayOrder,
  totalsByCode,
  VIEW_MAX_LEVEL,
  DEFAULT_LEAF_LEVEL,
  CHILD_ID_FACTOR,
} from "./views.js";
export type { StatementView } from "./views.js";

// Chart of accounts
export {
  buildAccountIndex,
  resolveKnownAccount,
  filterUnknownAccounts,
} from "./accounts.js";
export type {
  ChartAccount,
  AccountIndex,
  RejectionReason,
  RejectedEntry,
  AccountFilterResult,
} from "./accounts.js";

// Rounding
export { roundHalfEven, CURRENCY_DECIMALS } from "./rounding.js";

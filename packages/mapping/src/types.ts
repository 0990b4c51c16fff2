/**
 * @ledgerlens/mapping — Internal types for mapping templates.
 *
 * Rules:
 * - Templates are immutable once constructed
 * - Construction only coerces types; structural checks run lazily
 * - Fail-closed: unsafe or malformed formulas throw, never silently succeed
 */

// ─── Tabular Input ───────────────────────────────────────────────────────

/** A single cell as read from a spreadsheet or CSV. */
export type MappingCell = string | number | null | undefined;

/**
 * One row of a mapping specification, keyed by column name.
 *
 * Recognized columns: display_order, id, name, type, level,
 * accounts_to_include, accounts_to_exclude, formula,
 * canonical_measure, notes. Other columns are ignored.
 */
export type MappingRecord = Readonly<Record<string, MappingCell>>;

// ─── Lint ────────────────────────────────────────────────────────────────

/**
 * A formula row reading a formula row that is evaluated after it.
 * The reference sees the not-yet-updated value of the later row.
 */
export interface ForwardReferenceWarning {
  readonly rowId: number;
  readonly referencedId: number;
  readonly message: string;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for mapping operations. */
export type MappingErrorCode =
  | "INVALID_FIELD"
  | "INVALID_ROW_KIND"
  | "UNKNOWN_ROW"
  | "DUPLICATE_ROW_ID"
  | "DUPLICATE_CANONICAL_MEASURE"
  | "UNSAFE_FORMULA"
  | "FORMULA_SYNTAX"
  | "DIVISION_BY_ZERO";

/**
 * Structured error from the mapping layer.
 * Always thrown — never returns error codes silently.
 */
export class MappingError extends Error {
  public readonly code: MappingErrorCode;

  constructor(code: MappingErrorCode, message: string) {
    super(message);
    this.name = "MappingError";
    this.code = code;
  }
}

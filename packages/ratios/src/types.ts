/**
 * @ledgerlens/ratios — Error types.
 *
 * Rules:
 * - Expression failures are typed so callers can tell a missing input
 *   from a malformed rule
 * - Derived measures and ratios catch ExpressionError only; anything
 *   else propagates
 */

// ─── Expression Errors ───────────────────────────────────────────────────

export type ExpressionErrorCode =
  | "SYNTAX"
  | "UNKNOWN_VARIABLE"
  | "DIVISION_BY_ZERO"
  | "NON_FINITE";

export class ExpressionError extends Error {
  public readonly code: ExpressionErrorCode;

  constructor(code: ExpressionErrorCode, message: string) {
    super(message);
    this.name = "ExpressionError";
    this.code = code;
  }
}

// ─── Rules Errors ────────────────────────────────────────────────────────

export type RulesErrorCode = "INVALID_RULES";

/**
 * A rules document that does not have the expected shape.
 * `issues` lists one "path: message" line per problem.
 */
export class RulesError extends Error {
  public readonly code: RulesErrorCode;
  public readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(message);
    this.name = "RulesError";
    this.code = "INVALID_RULES";
    this.issues = issues;
  }
}

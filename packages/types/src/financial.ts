/**
 * Financial Types
 *
 * Raw accounting input consumed by the statement pipeline.
 *
 * Rules:
 * - Amounts are already sign-normalized: credit - debit
 *   (revenues positive, expenses negative)
 * - Account codes are strings, compared verbatim
 */

/**
 * A chart-of-accounts code (e.g. "706000", "62201").
 * Never parsed as a number: leading zeros are significant.
 */
export type AccountCode = string;

/**
 * A single dated, coded ledger line.
 */
export interface LedgerEntry {
  /** ISO 8601 calendar date (YYYY-MM-DD) */
  readonly date: string;

  /** Chart-of-accounts code */
  readonly code: AccountCode;

  /** Signed amount, credit-positive */
  readonly amount: number;

  /** Free-text label carried through from the source document */
  readonly description?: string | undefined;
}

/**
 * @ledgerlens/engine — Statement aggregation.
 *
 * Turns sign-normalized ledger entries into one amount per template row:
 *
 * 1. Every row starts at 0, so rows without entries still appear.
 * 2. Each entry adds its full amount to every "acc" row its code feeds.
 * 3. "calc" rows are evaluated once, in declaration order, over the
 *    accumulated values. A formula reading a later "calc" row sees that
 *    row's value before evaluation (0 unless it was also fed by entries).
 * 4. Amounts are rounded to 2 decimals; rows are sorted by
 *    (level, displayOrder).
 *
 * A formula error aborts the whole aggregation.
 */

import type { AggregatedStatement, LedgerEntry, StatementRow } from "@ledgerlens/types";
import type { MappingTemplate } from "@ledgerlens/mapping";
import { roundHalfEven } from "./rounding.js";

/**
 * The part of a ledger entry the aggregation reads.
 */
export type AmountEntry = Pick<LedgerEntry, "code" | "amount">;

/**
 * Unrounded row values keyed by row id, after formula evaluation.
 */
export function accumulateRowValues(
  entries: Iterable<AmountEntry>,
  template: MappingTemplate,
): ReadonlyMap<number, number> {
  const amounts = new Map<number, number>();
  for (const row of template.rows) {
    amounts.set(row.id, 0);
  }

  for (const entry of entries) {
    for (const id of template.rowsForCode(entry.code)) {
      amounts.set(id, (amounts.get(id) ?? 0) + entry.amount);
    }
  }

  for (const row of template.rows) {
    if (row.kind === "calc") {
      amounts.set(row.id, template.evaluateFormula(row.id, amounts));
    }
  }

  return amounts;
}

/**
 * Aggregate entries into a statement with one row per template row.
 */
export function aggregate(
  entries: Iterable<AmountEntry>,
  template: MappingTemplate,
): AggregatedStatement {
  const amounts = accumulateRowValues(entries, template);

  const ordered = [...template.rows].sort(
    (a, b) => a.level - b.level || a.displayOrder - b.displayOrder,
  );

  return ordered.map(
    (row): StatementRow => ({
      level: row.level,
      displayOrder: row.displayOrder,
      id: row.id,
      name: row.name,
      kind: row.kind,
      amount: roundHalfEven(amounts.get(row.id) ?? 0),
    }),
  );
}

/**
 * Index statement rows by id.
 */
export function statementById(statement: AggregatedStatement): ReadonlyMap<number, StatementRow> {
  return new Map(statement.map((row) => [row.id, row]));
}

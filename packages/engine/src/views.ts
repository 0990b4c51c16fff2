/**
 * @ledgerlens/engine — Statement views.
 *
 * Re-derive the display order of an aggregated statement at a chosen
 * level of detail:
 *
 * - simplified: levels 0–1
 * - regular:    levels 0–2
 * - detailed:   every template row
 * - complete:   detailed, plus one line per account code under each
 *               leaf "acc" row
 *
 * Every view renumbers displayOrder to 10, 20, 30, ... in output order.
 */

import type { AccountCode, AggregatedStatement, StatementRow } from "@ledgerlens/types";
import type { MappingTemplate } from "@ledgerlens/mapping";
import type { AmountEntry } from "./aggregate.js";
import { statementById } from "./aggregate.js";
import { roundHalfEven } from "./rounding.js";

export type StatementView = "simplified" | "regular" | "detailed" | "complete";

export const VIEW_MAX_LEVEL: Readonly<Partial<Record<string, number>>> = {
  simplified: 1,
  regular: 2,
};

/** Template level whose "acc" rows receive per-account lines. */
export const DEFAULT_LEAF_LEVEL = 3;

/** Child line ids are parentId * CHILD_ID_FACTOR + position. */
export const CHILD_ID_FACTOR = 1000;

export function renumberDisplayOrder(
  rows: readonly StatementRow[],
  start = 10,
  step = 10,
): StatementRow[] {
  return rows.map((row, index) => ({ ...row, displayOrder: start + index * step }));
}

function byDisplayOrder(a: { displayOrder: number }, b: { displayOrder: number }): number {
  return a.displayOrder - b.displayOrder;
}

/**
 * Filter a statement to a view's levels, sort by template display order
 * and renumber. Views other than "simplified" and "regular" keep every row.
 */
export function applyViewLevelFilter(
  statement: AggregatedStatement,
  view: string,
): StatementRow[] {
  const maxLevel = VIEW_MAX_LEVEL[view];
  const kept =
    maxLevel === undefined ? [...statement] : statement.filter((row) => row.level <= maxLevel);
  return renumberDisplayOrder(kept.sort(byDisplayOrder));
}

/**
 * Net amount per trimmed account code, non-zero totals only.
 */
export function totalsByCode(entries: Iterable<AmountEntry>): ReadonlyMap<AccountCode, number> {
  const totals = new Map<AccountCode, number>();
  for (const entry of entries) {
    const code = entry.code.trim();
    totals.set(code, (totals.get(code) ?? 0) + entry.amount);
  }
  for (const [code, amount] of totals) {
    if (amount === 0) totals.delete(code);
  }
  return totals;
}

/**
 * Build the "complete" view: every template row in display order, with
 * the account codes feeding each leaf "acc" row listed right below it
 * (sorted by code, one level deeper).
 */
export function buildCompleteView(
  statement: AggregatedStatement,
  entries: Iterable<AmountEntry>,
  template: MappingTemplate,
  nameByCode: ReadonlyMap<AccountCode, string> = new Map(),
  leafLevel: number = DEFAULT_LEAF_LEVEL,
): StatementRow[] {
  const amounts = statementById(statement);

  const children = new Map<number, Array<[AccountCode, number]>>();
  for (const [code, amount] of totalsByCode(entries)) {
    for (const id of template.rowsForCode(code)) {
      const row = template.getRow(id);
      if (row?.kind !== "acc" || row.level !== leafLevel) continue;
      const list = children.get(id) ?? [];
      list.push([code, amount]);
      children.set(id, list);
    }
  }

  const out: StatementRow[] = [];
  for (const row of [...template.rows].sort(byDisplayOrder)) {
    out.push({
      level: row.level,
      displayOrder: row.displayOrder,
      id: row.id,
      name: row.name,
      kind: row.kind,
      amount: roundHalfEven(amounts.get(row.id)?.amount ?? 0),
    });

    if (row.kind !== "acc" || row.level !== leafLevel) continue;

    const accounts = [...(children.get(row.id) ?? [])].sort(([a], [b]) =>
      a < b ? -1 : a > b ? 1 : 0,
    );
    accounts.forEach(([code, amount], index) => {
      out.push({
        level: row.level + 1,
        displayOrder: row.displayOrder,
        id: row.id * CHILD_ID_FACTOR + index + 1,
        name: `${code} ${nameByCode.get(code) ?? ""}`.trim(),
        kind: "acc",
        amount: roundHalfEven(amount),
      });
    });
  }

  return renumberDisplayOrder(out);
}

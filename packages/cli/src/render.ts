/**
 * @ledgerlens/cli — Terminal rendering.
 *
 * Renderers return lines instead of printing them. Columns are padded
 * before colouring, so widths hold with and without ANSI codes.
 */

import type { ChalkInstance } from "chalk";
import type { MeasureMap, MeasureMeta, RatioResult, StatementRow } from "@ledgerlens/types";

export const NAME_WIDTH = 40;
export const VALUE_WIDTH = 14;

const INDENT = "  ";
const RULE = "─".repeat(NAME_WIDTH + VALUE_WIDTH);

export function formatValue(value: number | null, decimals: number): string {
  return value === null ? "n/a" : value.toFixed(decimals);
}

export function renderHeading(title: string, chalk: ChalkInstance): string[] {
  return [chalk.cyan.bold(title), chalk.gray(RULE)];
}

/**
 * One line per row, indented by level. Formula rows are bold,
 * negative amounts red.
 */
export function renderStatement(rows: readonly StatementRow[], chalk: ChalkInstance): string[] {
  return rows.map((row) => {
    const name = `${INDENT.repeat(row.level)}${row.name}`.padEnd(NAME_WIDTH);
    const amount = formatValue(row.amount, 2).padStart(VALUE_WIDTH);
    return (
      (row.kind === "calc" ? chalk.white.bold(name) : chalk.white(name)) +
      (row.amount < 0 ? chalk.red(amount) : chalk.white(amount))
    );
  });
}

export function renderMeasures(
  metadata: readonly MeasureMeta[],
  measures: MeasureMap,
  chalk: ChalkInstance,
): string[] {
  const lines: string[] = [];
  for (const meta of metadata) {
    const value = measures[meta.key];
    if (value === undefined) continue;
    lines.push(
      chalk.white(meta.label.padEnd(NAME_WIDTH)) +
        chalk.white(formatValue(value, 2).padStart(VALUE_WIDTH)) +
        chalk.gray(`  ${meta.unit}`),
    );
  }
  return lines;
}

/**
 * Ratio lines, with a "[level]" line wherever the level changes.
 * Expects results already rounded and sorted (see ratiosToTable).
 */
export function renderRatios(
  results: readonly RatioResult[],
  decimals: number,
  chalk: ChalkInstance,
): string[] {
  const lines: string[] = [];
  let level: string | undefined;

  for (const result of results) {
    if (result.level !== level) {
      level = result.level;
      lines.push(chalk.gray(`[${level}]`));
    }
    const value = formatValue(result.value, decimals).padStart(VALUE_WIDTH);
    lines.push(
      chalk.white(result.label.padEnd(NAME_WIDTH)) +
        (result.value === null ? chalk.yellow(value) : chalk.white(value)) +
        chalk.gray(`  ${result.unit}`),
    );
  }
  return lines;
}

export function renderWarning(message: string, chalk: ChalkInstance): string {
  return chalk.yellow("! ") + chalk.yellow(message);
}

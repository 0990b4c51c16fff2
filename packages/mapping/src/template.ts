/**
 * @ledgerlens/mapping — Mapping template.
 *
 * A template is an ordered list of row definitions loaded from a
 * row-oriented specification (one record per output line). It answers
 * two questions for the aggregation engine:
 *
 * - which "acc" rows does an account code feed?
 * - what is the value of a "calc" row given the current row values?
 *
 * Rules:
 * - Immutable once constructed
 * - Construction only coerces types; duplicate ids and duplicate
 *   canonical measure tags are detected when metadata is requested
 * - Formula rows never claim account codes
 */

import type { AccountCode, MeasureMeta, RowDefinition, RowKind } from "@ledgerlens/types";
import { matches, parsePatternList } from "./patterns.js";
import {
  evaluateRowFormula,
  isFormula,
  parseRowFormula,
  rowReferences,
} from "./row-formula.js";
import { MappingError } from "./types.js";
import type { ForwardReferenceWarning, MappingCell, MappingRecord } from "./types.js";

// =============================================================================
// Cell coercion
// =============================================================================

const INTEGER_TEXT = /^[+-]?\d+(\.0*)?$/;

function cellText(cell: MappingCell): string {
  if (cell === null || cell === undefined) return "";
  return String(cell).trim();
}

function cellInteger(record: MappingRecord, column: string, index: number): number {
  const cell = record[column];
  if (typeof cell === "number" && Number.isInteger(cell)) {
    return cell;
  }
  const text = cellText(cell);
  if (!INTEGER_TEXT.test(text)) {
    throw new MappingError(
      "INVALID_FIELD",
      `Row ${String(index + 1)}: column "${column}" must be an integer, got "${text}"`,
    );
  }
  return Number.parseInt(text, 10);
}

function cellLevel(record: MappingRecord, index: number): number {
  const level = cellInteger(record, "level", index);
  if (level < 0) {
    throw new MappingError(
      "INVALID_FIELD",
      `Row ${String(index + 1)}: column "level" must be a non-negative integer, got "${String(level)}"`,
    );
  }
  return level;
}

function cellKind(record: MappingRecord, index: number): RowKind {
  const text = cellText(record["type"]);
  if (text !== "acc" && text !== "calc") {
    throw new MappingError(
      "INVALID_ROW_KIND",
      `Row ${String(index + 1)}: type must be "acc" or "calc", got "${text}"`,
    );
  }
  return text;
}

/**
 * Build a RowDefinition from one tabular record.
 */
export function rowFromRecord(record: MappingRecord, index: number): RowDefinition {
  if (record["name"] === undefined || record["name"] === null) {
    throw new MappingError("INVALID_FIELD", `Row ${String(index + 1)}: column "name" is required`);
  }
  const canonicalMeasure = cellText(record["canonical_measure"]);

  return {
    displayOrder: cellInteger(record, "display_order", index),
    id: cellInteger(record, "id", index),
    name: cellText(record["name"]),
    kind: cellKind(record, index),
    level: cellLevel(record, index),
    includePatterns: parsePatternList(cellText(record["accounts_to_include"])),
    excludePatterns: parsePatternList(cellText(record["accounts_to_exclude"])),
    formula: cellText(record["formula"]),
    canonicalMeasure: canonicalMeasure === "" ? undefined : canonicalMeasure,
    notes: cellText(record["notes"]),
  };
}

// =============================================================================
// Template
// =============================================================================

export class MappingTemplate {
  private readonly _rows: readonly RowDefinition[];
  private readonly _byId: ReadonlyMap<number, RowDefinition>;
  private readonly _accRows: readonly RowDefinition[];

  constructor(rows: readonly RowDefinition[]) {
    this._rows = rows.map((r) => ({
      ...r,
      includePatterns: [...r.includePatterns],
      excludePatterns: [...r.excludePatterns],
    }));
    // Last definition wins on duplicate ids; see assertUniqueIds().
    this._byId = new Map(this._rows.map((r) => [r.id, r]));
    this._accRows = this._rows.filter((r) => r.kind === "acc");
  }

  /**
   * Build a template from tabular records (e.g. parsed CSV rows).
   */
  static fromRecords(records: readonly MappingRecord[]): MappingTemplate {
    return new MappingTemplate(records.map((r, i) => rowFromRecord(r, i)));
  }

  /** Row definitions in declaration order. */
  get rows(): readonly RowDefinition[] {
    return this._rows;
  }

  get size(): number {
    return this._rows.length;
  }

  /**
   * Get a row by id. Returns undefined if not found.
   */
  getRow(id: number): RowDefinition | undefined {
    return this._byId.get(id);
  }

  /**
   * Ids of every "acc" row the code contributes to.
   *
   * A row matches when the code matches one of its include patterns
   * and none of its exclude patterns. One code may feed several rows.
   */
  rowsForCode(code: AccountCode): readonly number[] {
    const ids: number[] = [];
    for (const row of this._accRows) {
      if (matches(code, row.includePatterns) && !matches(code, row.excludePatterns)) {
        ids.push(row.id);
      }
    }
    return ids;
  }

  /**
   * Evaluate the formula of a row against the current row values.
   * Rows without a formula (text not starting with "=") evaluate to 0.
   */
  evaluateFormula(id: number, knownValues: ReadonlyMap<number, number>): number {
    const row = this._byId.get(id);
    if (row === undefined) {
      throw new MappingError("UNKNOWN_ROW", `Unknown row id: ${String(id)}`);
    }
    return evaluateRowFormula(row.formula, knownValues);
  }

  /**
   * Throw if two rows share an id.
   */
  assertUniqueIds(): void {
    const seen = new Set<number>();
    for (const row of this._rows) {
      if (seen.has(row.id)) {
        throw new MappingError("DUPLICATE_ROW_ID", `Duplicate row id: ${String(row.id)}`);
      }
      seen.add(row.id);
    }
  }

  /**
   * Canonical measure name → id of the row carrying it.
   * Throws on duplicate row ids or duplicate measure tags.
   */
  canonicalMeasures(): ReadonlyMap<string, number> {
    this.assertUniqueIds();
    const byMeasure = new Map<string, number>();
    for (const row of this._rows) {
      if (row.canonicalMeasure === undefined) continue;
      const existing = byMeasure.get(row.canonicalMeasure);
      if (existing !== undefined) {
        throw new MappingError(
          "DUPLICATE_CANONICAL_MEASURE",
          `Canonical measure "${row.canonicalMeasure}" is defined on rows ${String(existing)} and ${String(row.id)}`,
        );
      }
      byMeasure.set(row.canonicalMeasure, row.id);
    }
    return byMeasure;
  }

  /**
   * Display metadata for every canonical measure of this template.
   */
  canonicalMeasureMetadata(): ReadonlyMap<string, MeasureMeta> {
    const metadata = new Map<string, MeasureMeta>();
    for (const [key, id] of this.canonicalMeasures()) {
      const row = this._byId.get(id);
      metadata.set(key, {
        key,
        label: row?.name || key,
        unit: "amount",
        notes: row?.notes ?? "",
        kind: "canonical",
      });
    }
    return metadata;
  }

  /**
   * Report "calc" rows reading "calc" rows evaluated at or after them.
   *
   * Formula rows are evaluated once, in declaration order, so such a
   * reference reads the not-yet-computed value. Evaluation order is not
   * changed; this only reports the situation. Formulas that fail to
   * parse are skipped here and fail at aggregation time instead.
   */
  lintForwardReferences(): readonly ForwardReferenceWarning[] {
    const calcPosition = new Map<number, number>();
    this._rows.forEach((row, index) => {
      if (row.kind === "calc") calcPosition.set(row.id, index);
    });

    const warnings: ForwardReferenceWarning[] = [];
    this._rows.forEach((row, index) => {
      if (row.kind !== "calc" || !isFormula(row.formula)) return;

      let references: readonly number[];
      try {
        references = rowReferences(parseRowFormula(row.formula));
      } catch (err: unknown) {
        if (err instanceof MappingError) return;
        throw err;
      }

      for (const referencedId of new Set(references)) {
        const position = calcPosition.get(referencedId);
        if (position !== undefined && position >= index) {
          warnings.push({
            rowId: row.id,
            referencedId,
            message: `Row ${String(row.id)} reads formula row ${String(referencedId)} before it is computed`,
          });
        }
      }
    });
    return warnings;
  }
}

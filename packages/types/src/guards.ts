/**
 * Runtime Type Guards
 *
 * Narrowing functions for ledgerlens domain types.
 * These enable safe runtime validation at system boundaries
 * (API inputs, JSON files, external integrations).
 */

import type { LedgerEntry } from "./financial.js";
import type { RowDefinition, RowKind, StatementRow } from "./statement.js";
import type { MeasureMap, RatioResult } from "./measures.js";

// =============================================================================
// Financial guards
// =============================================================================

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

function isRecord(value: unknown): value is Readonly<Record<string, unknown>> {
  return value !== null && typeof value === "object";
}

export function isLedgerEntry(value: unknown): value is LedgerEntry {
  if (!isRecord(value)) return false;
  return (
    typeof value.date === "string" &&
    ISO_DATE.test(value.date) &&
    typeof value.code === "string" &&
    value.code.length > 0 &&
    typeof value.amount === "number" &&
    Number.isFinite(value.amount) &&
    (value.description === undefined || typeof value.description === "string")
  );
}

// =============================================================================
// Statement guards
// =============================================================================

const ROW_KINDS = new Set<string>(["acc", "calc"]);

export function isRowKind(value: unknown): value is RowKind {
  return typeof value === "string" && ROW_KINDS.has(value);
}

function isStringArray(value: unknown): value is readonly string[] {
  return Array.isArray(value) && value.every((p) => typeof p === "string");
}

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

export function isRowDefinition(value: unknown): value is RowDefinition {
  if (!isRecord(value)) return false;
  return (
    typeof value.displayOrder === "number" &&
    Number.isInteger(value.displayOrder) &&
    typeof value.id === "number" &&
    Number.isInteger(value.id) &&
    typeof value.name === "string" &&
    isRowKind(value.kind) &&
    isNonNegativeInteger(value.level) &&
    isStringArray(value.includePatterns) &&
    isStringArray(value.excludePatterns) &&
    typeof value.formula === "string" &&
    (value.canonicalMeasure === undefined || typeof value.canonicalMeasure === "string") &&
    typeof value.notes === "string"
  );
}

export function isStatementRow(value: unknown): value is StatementRow {
  if (!isRecord(value)) return false;
  return (
    isNonNegativeInteger(value.level) &&
    typeof value.displayOrder === "number" &&
    typeof value.id === "number" &&
    typeof value.name === "string" &&
    isRowKind(value.kind) &&
    typeof value.amount === "number"
  );
}

// =============================================================================
// Measure guards
// =============================================================================

export function isMeasureMap(value: unknown): value is MeasureMap {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    return false;
  }
  return Object.values(value).every(
    (v) => typeof v === "number" && Number.isFinite(v),
  );
}

export function isRatioResult(value: unknown): value is RatioResult {
  if (!isRecord(value)) return false;
  return (
    typeof value.key === "string" &&
    typeof value.label === "string" &&
    (value.value === null || typeof value.value === "number") &&
    typeof value.unit === "string" &&
    typeof value.notes === "string" &&
    typeof value.level === "string"
  );
}

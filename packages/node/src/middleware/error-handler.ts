/**
 * Global error handler.
 *
 * Catches all errors thrown by route handlers and produces a consistent
 * error envelope. Domain errors (MappingError, ExpressionError,
 * RulesError, ReportError) are mapped to a status by their code.
 */

import type { Context } from "hono";
import { ApiError, createErrorEnvelope } from "../types/error.js";
import type { ErrorStatus } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Readonly<Record<string, ErrorStatus>> = {
  // Mapping template errors
  INVALID_FIELD: 400,
  INVALID_ROW_KIND: 400,
  UNKNOWN_ROW: 400,
  DUPLICATE_ROW_ID: 409,
  DUPLICATE_CANONICAL_MEASURE: 409,
  UNSAFE_FORMULA: 422,
  FORMULA_SYNTAX: 422,
  DIVISION_BY_ZERO: 422,

  // Rules documents
  INVALID_RULES: 400,

  // Reports
  NO_PERIODS: 400,
  INVALID_PERIOD: 400,
};

function domainCode(err: Error): string | undefined {
  return "code" in err && typeof err.code === "string" ? err.code : undefined;
}

function detailsOf(err: Error): Record<string, unknown> | undefined {
  if (err instanceof ApiError) return err.details;
  if ("issues" in err && Array.isArray(err.issues) && err.issues.length > 0) {
    return { issues: err.issues };
  }
  return undefined;
}

// =============================================================================
// Handler
// =============================================================================

/**
 * Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  const code = domainCode(err);
  const status: ErrorStatus =
    err instanceof ApiError
      ? err.status
      : code !== undefined
        ? (STATUS_MAP[code] ?? 500)
        : 500;

  // Don't leak internal details
  if (status === 500) {
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), status);
  }

  return c.json(createErrorEnvelope(code ?? "INTERNAL_ERROR", err.message, detailsOf(err)), status);
}

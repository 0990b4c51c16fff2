/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body validation.
 */

import { z } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export const LedgerEntrySchema = z.object({
  date: z.string().regex(ISO_DATE, "Expected an ISO date (YYYY-MM-DD)"),
  code: z.string().trim().min(1),
  amount: z.number().finite(),
  description: z.string().optional(),
});

/** One mapping row, keyed by column name (display_order, id, name, ...). */
export const MappingRowSchema = z.record(z.union([z.string(), z.number(), z.null()]));

export const TemplateSchema = z.array(MappingRowSchema).min(1);

export const ChartAccountSchema = z.object({
  code: z.string(),
  name: z.string().default(""),
});

// Values that are not numbers or numeric text are dropped later, not rejected.
export const ExtraMeasuresSchema = z.record(z.unknown());

export const ViewSchema = z.enum(["simplified", "regular", "detailed", "complete"]);

export const RatioLevelSchema = z.string().trim().min(1);

// =============================================================================
// Statements
// =============================================================================

export const StatementRequestSchema = z.object({
  entries: z.array(LedgerEntrySchema),
  template: TemplateSchema,
  view: ViewSchema.default("detailed"),
  /** When given, entries on unknown accounts are rejected before aggregation */
  accounts: z.array(ChartAccountSchema).optional(),
});

export type StatementRequestDto = z.infer<typeof StatementRequestSchema>;

// =============================================================================
// Measures
// =============================================================================

export const MeasuresRequestSchema = z.object({
  entries: z.array(LedgerEntrySchema),
  template: TemplateSchema,
  secondaryTemplate: TemplateSchema.optional(),
  extraMeasures: ExtraMeasuresSchema.optional(),
  /** Rules documents, applied in order */
  rules: z.array(z.unknown()).default([]),
});

export type MeasuresRequestDto = z.infer<typeof MeasuresRequestSchema>;

// =============================================================================
// Ratios
// =============================================================================

export const RatiosRequestSchema = z.object({
  measures: z.record(z.number().finite()),
  rules: z.unknown(),
  level: RatioLevelSchema.optional(),
  decimals: z.number().int().min(0).max(10).optional(),
});

export type RatiosRequestDto = z.infer<typeof RatiosRequestSchema>;

// =============================================================================
// Reports
// =============================================================================

export const PeriodSchema = z.object({
  label: z.string().trim().min(1),
  start: z.string().regex(ISO_DATE, "Expected an ISO date (YYYY-MM-DD)"),
  end: z.string().regex(ISO_DATE, "Expected an ISO date (YYYY-MM-DD)"),
  days: z.number().positive().optional(),
});

export const ReportRequestSchema = z.object({
  entries: z.array(LedgerEntrySchema),
  template: TemplateSchema,
  secondaryTemplate: TemplateSchema.optional(),
  periods: z.array(PeriodSchema).min(1),
  rules: z
    .object({
      standard: z.unknown().optional(),
      custom: z.unknown().optional(),
    })
    .default({}),
  level: RatioLevelSchema.optional(),
  extraMeasures: ExtraMeasuresSchema.optional(),
  accounts: z.array(ChartAccountSchema).optional(),
});

export type ReportRequestDto = z.infer<typeof ReportRequestSchema>;

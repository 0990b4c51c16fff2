/**
 * Type barrel — re-exports all public types from @ledgerlens/node.
 */

// DTOs
export {
  LedgerEntrySchema,
  MappingRowSchema,
  TemplateSchema,
  ChartAccountSchema,
  ExtraMeasuresSchema,
  ViewSchema,
  RatioLevelSchema,
  StatementRequestSchema,
  MeasuresRequestSchema,
  RatiosRequestSchema,
  PeriodSchema,
  ReportRequestSchema,
} from "./dto.js";
export type {
  StatementRequestDto,
  MeasuresRequestDto,
  RatiosRequestDto,
  ReportRequestDto,
} from "./dto.js";

// Error
export { ApiError, createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorStatus, ErrorDetail, ErrorEnvelope } from "./error.js";

// App env
export type { AppEnv } from "./api-contract.js";

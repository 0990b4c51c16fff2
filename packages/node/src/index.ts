/**
 * @ledgerlens/node — HTTP service for statements, measures and ratios.
 *
 * Package public API. main.ts is the runnable entry point.
 */

export { ReportService, ReportError, periodDays, entriesInPeriod } from "./services/report-service.js";
export type {
  ReportInput,
  ReportPeriod,
  MeasureSet,
  MeasureSetInput,
  MultiPeriodReport,
  PeriodMeasure,
  PeriodRatio,
  PeriodStatementRow,
  TemplateWarning,
} from "./services/report-service.js";
export { loadConfig, settingsFromConfig, ConfigSchema, DEFAULT_SETTINGS } from "./config.js";
export type { AppConfig, AnalysisSettings } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./types/index.js";

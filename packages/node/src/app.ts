/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability — tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "./types/api-contract.js";
import { DEFAULT_SETTINGS } from "./config.js";
import type { AnalysisSettings } from "./config.js";
import { ReportService } from "./services/report-service.js";
import { handleError, loggerMiddleware, requestIdMiddleware } from "./middleware/index.js";
import type { RequestLogEntry } from "./middleware/index.js";
import {
  createHealthRoutes,
  createMeasureRoutes,
  createRatioRoutes,
  createReportRoutes,
  createStatementRoutes,
} from "./routes/index.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  /** Defaults for ratio level, decimals and the entry limit */
  readonly settings?: Partial<AnalysisSettings>;
  readonly logFn?: (entry: RequestLogEntry) => void;
  /** Service-level logger (lint warnings, skipped measures) */
  readonly logger?: Logger;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly reportService: ReportService;
  readonly settings: AnalysisSettings;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions = {}): AppInstance {
  const settings: AnalysisSettings = { ...DEFAULT_SETTINGS, ...options.settings };
  const reportService = new ReportService(options.logger);

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(handleError);

  // ─── Health Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes(settings));

  // ─── API Routes ─────────────────────────────────────────────────
  app.route("/api/v1/statements", createStatementRoutes(settings));
  app.route("/api/v1/measures", createMeasureRoutes(reportService, settings));
  app.route("/api/v1/ratios", createRatioRoutes(settings));
  app.route("/api/v1/reports", createReportRoutes(reportService, settings));

  return { app, reportService, settings };
}

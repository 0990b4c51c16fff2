/**
 * Report routes.
 *
 * POST /api/v1/reports — Statements, measures and ratios over several
 *                        periods in one pass
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { AnalysisSettings } from "../config.js";
import type { ReportService } from "../services/report-service.js";
import { ReportRequestSchema } from "../types/dto.js";
import { readValidatedBody } from "../middleware/validate.js";
import {
  accountIndexFrom,
  assertEntryLimit,
  optionalTemplateFrom,
  ruleSetsFrom,
  templateFrom,
} from "./inputs.js";

export function createReportRoutes(
  service: ReportService,
  settings: AnalysisSettings,
): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", async (c) => {
    const body = await readValidatedBody(c, ReportRequestSchema);
    assertEntryLimit(body.entries.length, settings.maxEntries);

    const report = service.buildReport({
      entries: body.entries,
      template: templateFrom(body.template),
      secondaryTemplate: optionalTemplateFrom(body.secondaryTemplate),
      periods: body.periods,
      ruleSets: ruleSetsFrom([body.rules.standard, body.rules.custom]),
      level: body.level ?? settings.ratioLevel,
      extraMeasures: body.extraMeasures,
      knownCodes: accountIndexFrom(body.accounts)?.knownCodes,
    });

    return c.json({ data: report });
  });

  return routes;
}

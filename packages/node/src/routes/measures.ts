/**
 * Measure routes.
 *
 * POST /api/v1/measures — Canonical, extra and derived measures of one
 *                         set of entries, with display metadata
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { AnalysisSettings } from "../config.js";
import type { ReportService } from "../services/report-service.js";
import { MeasuresRequestSchema } from "../types/dto.js";
import { readValidatedBody } from "../middleware/validate.js";
import { assertEntryLimit, optionalTemplateFrom, ruleSetsFrom, templateFrom } from "./inputs.js";

export function createMeasureRoutes(
  service: ReportService,
  settings: AnalysisSettings,
): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", async (c) => {
    const body = await readValidatedBody(c, MeasuresRequestSchema);
    assertEntryLimit(body.entries.length, settings.maxEntries);

    const input = {
      entries: body.entries,
      template: templateFrom(body.template),
      secondaryTemplate: optionalTemplateFrom(body.secondaryTemplate),
      extraMeasures: body.extraMeasures,
      ruleSets: ruleSetsFrom(body.rules),
    };
    const { measures, skipped } = service.computeMeasures(input);

    return c.json({
      data: {
        measures,
        metadata: service.describeMeasures(measures, input),
        skipped,
      },
    });
  });

  return routes;
}

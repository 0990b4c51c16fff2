/**
 * Ratio routes.
 *
 * POST /api/v1/ratios — Derived measures and ratios of a measure map at
 *                       a ratio level (cumulative for basic/advanced/full)
 */

import { Hono } from "hono";
import { computeDerivedMeasures, computeRatios, parseRules, ratiosToTable } from "@ledgerlens/ratios";
import type { AppEnv } from "../types/api-contract.js";
import type { AnalysisSettings } from "../config.js";
import { RatiosRequestSchema } from "../types/dto.js";
import { readValidatedBody } from "../middleware/validate.js";

export function createRatioRoutes(settings: AnalysisSettings): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", async (c) => {
    const body = await readValidatedBody(c, RatiosRequestSchema);
    const rules = parseRules(body.rules);
    const level = body.level ?? settings.ratioLevel;

    const measures = computeDerivedMeasures(body.measures, rules.measures);
    const ratios = computeRatios(measures, rules.ratios, level);

    return c.json({
      data: {
        level,
        measures,
        ratios: ratiosToTable(ratios, body.decimals ?? settings.ratioDecimals),
      },
    });
  });

  return routes;
}

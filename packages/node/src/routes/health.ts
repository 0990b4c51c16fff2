/**
 * Health check route.
 *
 * GET /health — Liveness probe (always 200 while the server is running)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { AnalysisSettings } from "../config.js";

export function createHealthRoutes(settings: AnalysisSettings): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();
  const startedAt = Date.now();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      uptimeMs: Date.now() - startedAt,
      ratioLevel: settings.ratioLevel,
      timestamp: new Date().toISOString(),
    });
  });

  return routes;
}

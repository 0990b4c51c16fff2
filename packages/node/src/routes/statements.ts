/**
 * Statement routes.
 *
 * POST /api/v1/statements — Aggregate entries through a mapping template
 *                           and project the result onto a view
 */

import { Hono } from "hono";
import {
  aggregate,
  applyViewLevelFilter,
  buildCompleteView,
  filterUnknownAccounts,
} from "@ledgerlens/engine";
import type { AppEnv } from "../types/api-contract.js";
import type { AnalysisSettings } from "../config.js";
import { StatementRequestSchema } from "../types/dto.js";
import { readValidatedBody } from "../middleware/validate.js";
import { accountIndexFrom, assertEntryLimit, templateFrom } from "./inputs.js";

export function createStatementRoutes(settings: AnalysisSettings): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", async (c) => {
    const body = await readValidatedBody(c, StatementRequestSchema);
    assertEntryLimit(body.entries.length, settings.maxEntries);

    const template = templateFrom(body.template);
    const accounts = accountIndexFrom(body.accounts);

    const { kept, rejected } =
      accounts === undefined
        ? { kept: body.entries, rejected: [] }
        : filterUnknownAccounts(body.entries, accounts.knownCodes);

    const statement = aggregate(kept, template);
    const rows =
      body.view === "complete"
        ? buildCompleteView(statement, kept, template, accounts?.nameByCode)
        : applyViewLevelFilter(statement, body.view);

    return c.json({
      data: {
        view: body.view,
        rows,
        warnings: template.lintForwardReferences(),
        rejected,
      },
    });
  });

  return routes;
}

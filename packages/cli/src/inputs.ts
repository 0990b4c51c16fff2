/**
 * @ledgerlens/cli — Input files.
 *
 * Every input is a JSON file validated with the request schemas of
 * @ledgerlens/node, so a file accepted here is also a valid request
 * body fragment.
 */

import { z } from "zod";
import type { ZodType, ZodTypeDef } from "zod";
import type { LedgerEntry } from "@ledgerlens/types";
import { MappingTemplate } from "@ledgerlens/mapping";
import { buildAccountIndex } from "@ledgerlens/engine";
import type { AccountIndex, ExtraMeasures } from "@ledgerlens/engine";
import { parseRules } from "@ledgerlens/ratios";
import type { RuleSet } from "@ledgerlens/ratios";
import {
  ChartAccountSchema,
  ExtraMeasuresSchema,
  LedgerEntrySchema,
  TemplateSchema,
} from "@ledgerlens/node";
import type { ReportPeriod } from "@ledgerlens/node";
import { CliError } from "./types.js";
import type { CliIO } from "./types.js";

/**
 * Read, parse and validate one JSON file.
 *
 * @throws {CliError} INPUT when the file cannot be read, parsed or validated
 */
export function readJsonFile<T>(
  io: CliIO,
  path: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  what: string,
): T {
  let text: string;
  try {
    text = io.readFile(path);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CliError("INPUT", `Cannot read ${what} file ${path}: ${reason}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    throw new CliError("INPUT", `${what} file ${path} is not valid JSON`);
  }

  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`,
    );
    throw new CliError("INPUT", `Invalid ${what} file ${path}: ${issues.join("; ")}`);
  }
  return parsed.data;
}

export function loadEntries(io: CliIO, path: string): LedgerEntry[] {
  return readJsonFile(io, path, z.array(LedgerEntrySchema), "entries");
}

export function loadTemplate(io: CliIO, path: string): MappingTemplate {
  const template = MappingTemplate.fromRecords(readJsonFile(io, path, TemplateSchema, "template"));
  template.assertUniqueIds();
  return template;
}

export function loadAccounts(io: CliIO, path: string): AccountIndex {
  return buildAccountIndex(readJsonFile(io, path, z.array(ChartAccountSchema), "accounts"));
}

export function loadExtraMeasures(io: CliIO, path: string): ExtraMeasures {
  return readJsonFile(io, path, ExtraMeasuresSchema, "extra measures");
}

export function loadRuleSet(io: CliIO, path: string): RuleSet {
  return parseRules(readJsonFile(io, path, z.unknown(), "rules"));
}

// ─── Command-line values ─────────────────────────────────────────────────

const PERIOD_SPEC = /^(.+)=(\d{4}-\d{2}-\d{2})\.\.(\d{4}-\d{2}-\d{2})$/;

/**
 * "H1=2024-01-01..2024-06-30" → { label: "H1", start: ..., end: ... }
 *
 * @throws {CliError} USAGE on any other shape
 */
export function parsePeriod(spec: string): ReportPeriod {
  const match = PERIOD_SPEC.exec(spec.trim());
  const [, label, start, end] = match ?? [];
  if (label === undefined || start === undefined || end === undefined) {
    throw new CliError(
      "USAGE",
      `Invalid period "${spec}" (expected LABEL=YYYY-MM-DD..YYYY-MM-DD)`,
    );
  }
  return { label: label.trim(), start, end };
}

/**
 * @throws {CliError} USAGE unless the text is an integer from 0 to 10
 */
export function parseDecimals(text: string): number {
  if (!/^\d+$/.test(text) || Number(text) > 10) {
    throw new CliError("USAGE", `Invalid --decimals "${text}" (expected 0 to 10)`);
  }
  return Number(text);
}

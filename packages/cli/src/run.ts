/**
 * @ledgerlens/cli — Command runner.
 *
 * ledgerlens statement --entries e.json --template t.json [--view complete]
 * ledgerlens ratios    --entries e.json --template t.json --rules r.json
 * ledgerlens report    --entries e.json --template t.json --rules r.json \
 *                      --period H1=2024-01-01..2024-06-30 --period ...
 *
 * Exit codes: 0 success, 1 invalid input or domain error, 2 usage error.
 */

import { parseArgs } from "node:util";
import { readFileSync } from "node:fs";
import chalk from "chalk";
import {
  aggregate,
  applyViewLevelFilter,
  buildCompleteView,
  filterUnknownAccounts,
} from "@ledgerlens/engine";
import { computeRatios, ratiosToTable } from "@ledgerlens/ratios";
import { ReportService, ViewSchema } from "@ledgerlens/node";
import type { MeasureSetInput } from "@ledgerlens/node";
import {
  loadAccounts,
  loadEntries,
  loadExtraMeasures,
  loadRuleSet,
  loadTemplate,
  parseDecimals,
  parsePeriod,
} from "./inputs.js";
import {
  renderHeading,
  renderMeasures,
  renderRatios,
  renderStatement,
  renderWarning,
} from "./render.js";
import { CliError } from "./types.js";
import type { CliIO } from "./types.js";

export const USAGE: readonly string[] = [
  "Usage: ledgerlens <statement|ratios|report> [options]",
  "",
  "  --entries <file>     Ledger entries (JSON array), required",
  "  --template <file>    Mapping rows (JSON array), required",
  "  --secondary <file>   Secondary mapping rows",
  "  --accounts <file>    Chart of accounts; entries on other codes are rejected",
  "  --rules <file>       Rules document, repeatable, applied in order",
  "  --extra <file>       Extra measures (JSON object)",
  "  --view <name>        simplified | regular | detailed | complete (statement)",
  "  --level <name>       Ratio level (default basic)",
  "  --decimals <n>       Ratio decimals (default 2)",
  "  --period <spec>      LABEL=YYYY-MM-DD..YYYY-MM-DD, repeatable (report)",
  "  -h, --help           Show this help",
];

export const DEFAULT_LEVEL = "basic";
export const DEFAULT_DECIMALS = 2;

const OPTIONS = {
  entries: { type: "string" },
  template: { type: "string" },
  secondary: { type: "string" },
  accounts: { type: "string" },
  rules: { type: "string", multiple: true },
  extra: { type: "string" },
  view: { type: "string" },
  level: { type: "string" },
  decimals: { type: "string" },
  period: { type: "string", multiple: true },
  help: { type: "boolean", short: "h" },
} as const;

export const defaultIO: CliIO = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
  readFile: (path) => readFileSync(path, "utf8"),
  chalk,
};

// =============================================================================
// Argument Parsing
// =============================================================================

function parseCommandLine(argv: readonly string[]) {
  try {
    return parseArgs({ args: [...argv], options: OPTIONS, allowPositionals: true, strict: true });
  } catch (err) {
    if (err instanceof TypeError) {
      throw new CliError("USAGE", err.message);
    }
    throw err;
  }
}

type ParsedValues = ReturnType<typeof parseCommandLine>["values"];

function required(value: string | undefined, flag: string): string {
  if (value === undefined || value.trim() === "") {
    throw new CliError("USAGE", `Missing required option ${flag}`);
  }
  return value;
}

function measureSetInput(values: ParsedValues, io: CliIO): MeasureSetInput {
  return {
    entries: loadEntries(io, required(values.entries, "--entries")),
    template: loadTemplate(io, required(values.template, "--template")),
    secondaryTemplate:
      values.secondary === undefined ? undefined : loadTemplate(io, values.secondary),
    extraMeasures: values.extra === undefined ? undefined : loadExtraMeasures(io, values.extra),
    ruleSets: (values.rules ?? []).map((path) => loadRuleSet(io, path)),
  };
}

// =============================================================================
// Commands
// =============================================================================

function statementCommand(values: ParsedValues, io: CliIO): void {
  const entries = loadEntries(io, required(values.entries, "--entries"));
  const template = loadTemplate(io, required(values.template, "--template"));
  const accounts = values.accounts === undefined ? undefined : loadAccounts(io, values.accounts);

  const view = ViewSchema.safeParse(values.view ?? "detailed");
  if (!view.success) {
    throw new CliError("USAGE", `Unknown view "${values.view ?? ""}"`);
  }

  const { kept, rejected } =
    accounts === undefined
      ? { kept: entries, rejected: [] }
      : filterUnknownAccounts(entries, accounts.knownCodes);

  const statement = aggregate(kept, template);
  const rows =
    view.data === "complete"
      ? buildCompleteView(statement, kept, template, accounts?.nameByCode)
      : applyViewLevelFilter(statement, view.data);

  const { chalk } = io;
  for (const line of renderHeading(`Statement (${view.data})`, chalk)) io.stdout(line);
  for (const line of renderStatement(rows, chalk)) io.stdout(line);
  for (const warning of template.lintForwardReferences()) {
    io.stderr(renderWarning(warning.message, chalk));
  }
  if (rejected.length > 0) {
    io.stderr(renderWarning(`${String(rejected.length)} entries on unknown accounts rejected`, chalk));
  }
}

function ratiosCommand(values: ParsedValues, io: CliIO): void {
  const input = measureSetInput(values, io);
  const level = values.level ?? DEFAULT_LEVEL;
  const decimals = values.decimals === undefined ? DEFAULT_DECIMALS : parseDecimals(values.decimals);

  const service = new ReportService();
  const set = service.computeMeasures(input);
  const ratios = (input.ruleSets ?? []).flatMap((ruleSet) =>
    computeRatios(set.measures, ruleSet.ratios, level),
  );

  const { chalk } = io;
  for (const line of renderHeading("Measures", chalk)) io.stdout(line);
  for (const line of renderMeasures(service.describeMeasures(set.measures, input), set.measures, chalk)) {
    io.stdout(line);
  }
  io.stdout("");
  for (const line of renderHeading(`Ratios (${level})`, chalk)) io.stdout(line);
  for (const line of renderRatios(ratiosToTable(ratios, decimals), decimals, chalk)) io.stdout(line);

  for (const warning of service.lintTemplates(input)) {
    io.stderr(renderWarning(warning.message, chalk));
  }
  for (const skip of set.skipped) {
    io.stderr(renderWarning(`Measure ${skip.key} skipped: ${skip.message}`, chalk));
  }
}

function reportCommand(values: ParsedValues, io: CliIO): void {
  const periods = (values.period ?? []).map(parsePeriod);
  if (periods.length === 0) {
    throw new CliError("USAGE", "report needs at least one --period");
  }
  const input = measureSetInput(values, io);
  const level = values.level ?? DEFAULT_LEVEL;
  const decimals = values.decimals === undefined ? DEFAULT_DECIMALS : parseDecimals(values.decimals);
  const accounts = values.accounts === undefined ? undefined : loadAccounts(io, values.accounts);

  const report = new ReportService().buildReport({
    ...input,
    periods,
    level,
    knownCodes: accounts?.knownCodes,
  });

  const { chalk } = io;
  periods.forEach((period, index) => {
    if (index > 0) io.stdout("");
    const title = `${period.label}  ${period.start} → ${period.end}`;
    for (const line of renderHeading(title, chalk)) io.stdout(line);
    const ratios = report.ratios.filter((ratio) => ratio.periodLabel === period.label);
    for (const line of renderRatios(ratiosToTable(ratios, decimals), decimals, chalk)) {
      io.stdout(line);
    }
  });

  for (const warning of report.warnings) {
    io.stderr(renderWarning(`${warning.template}: ${warning.message}`, chalk));
  }
  if (report.rejected.length > 0) {
    io.stderr(
      renderWarning(`${String(report.rejected.length)} entries on unknown accounts rejected`, chalk),
    );
  }
}

// =============================================================================
// Entry
// =============================================================================

/**
 * Run one command line and return the process exit code.
 */
export function runCli(argv: readonly string[], io: CliIO = defaultIO): number {
  try {
    const { values, positionals } = parseCommandLine(argv);
    const [command] = positionals;

    if (values.help === true) {
      for (const line of USAGE) io.stdout(line);
      return 0;
    }

    switch (command) {
      case "statement":
        statementCommand(values, io);
        return 0;
      case "ratios":
        ratiosCommand(values, io);
        return 0;
      case "report":
        reportCommand(values, io);
        return 0;
      case undefined:
        throw new CliError("USAGE", "Missing command");
      default:
        throw new CliError("USAGE", `Unknown command "${command}"`);
    }
  } catch (err) {
    if (!(err instanceof Error)) throw err;
    io.stderr(io.chalk.red(`error: ${err.message}`));
    if (err instanceof CliError && err.code === "USAGE") {
      for (const line of USAGE) io.stderr(line);
      return 2;
    }
    return 1;
  }
}

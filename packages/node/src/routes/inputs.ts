/**
 * Conversions from validated request bodies to domain inputs.
 */

import { MappingTemplate } from "@ledgerlens/mapping";
import type { MappingRecord } from "@ledgerlens/mapping";
import { buildAccountIndex } from "@ledgerlens/engine";
import type { AccountIndex, ChartAccount } from "@ledgerlens/engine";
import { parseRules } from "@ledgerlens/ratios";
import type { RuleSet } from "@ledgerlens/ratios";
import { ApiError } from "../types/error.js";

/**
 * Build a template and reject duplicate row ids up front.
 */
export function templateFrom(records: readonly MappingRecord[]): MappingTemplate {
  const template = MappingTemplate.fromRecords(records);
  template.assertUniqueIds();
  return template;
}

export function optionalTemplateFrom(
  records: readonly MappingRecord[] | undefined,
): MappingTemplate | undefined {
  return records === undefined ? undefined : templateFrom(records);
}

export function accountIndexFrom(
  accounts: readonly ChartAccount[] | undefined,
): AccountIndex | undefined {
  return accounts === undefined ? undefined : buildAccountIndex(accounts);
}

/**
 * Parse rules documents in order, skipping absent ones.
 */
export function ruleSetsFrom(documents: readonly unknown[]): RuleSet[] {
  return documents.filter((document) => document !== undefined).map(parseRules);
}

/**
 * @throws {ApiError} PAYLOAD_TOO_LARGE above the configured entry limit
 */
export function assertEntryLimit(count: number, maxEntries: number): void {
  if (count > maxEntries) {
    throw new ApiError(
      "PAYLOAD_TOO_LARGE",
      413,
      `Too many entries: ${String(count)} (limit ${String(maxEntries)})`,
    );
  }
}

/**
 * @ledgerlens/mapping — Account code pattern matching.
 *
 * - "70*"   matches any code starting with "70" ("701", "709999")
 * - "62201" matches only the exact code "62201"
 *
 * Matching is case-sensitive and performs no normalization.
 */

import type { AccountCode } from "@ledgerlens/types";

export const WILDCARD = "*";

/**
 * Return true if the code matches at least one pattern.
 * An empty pattern list matches nothing.
 */
export function matches(code: AccountCode, patterns: readonly string[]): boolean {
  for (const pattern of patterns) {
    if (pattern.endsWith(WILDCARD)) {
      if (code.startsWith(pattern.slice(0, -WILDCARD.length))) {
        return true;
      }
    } else if (code === pattern) {
      return true;
    }
  }
  return false;
}

/**
 * Split a semicolon-separated pattern cell into patterns.
 *
 * "70*;71*" → ["70*", "71*"]
 * "" / null → []
 */
export function parsePatternList(raw: string | null | undefined): readonly string[] {
  if (raw === null || raw === undefined) {
    return [];
  }
  return raw
    .split(";")
    .map((p) => p.trim())
    .filter((p) => p !== "");
}

/**
 * @ledgerlens/engine — Chart-of-accounts filtering.
 *
 * An entry is known when its code, or one of its prefixes, appears in
 * the chart of accounts ("606300" is known if "6063", "606" or "60" is).
 * Unknown entries are returned to the caller with a reason instead of
 * being reported here.
 */

import type { AccountCode } from "@ledgerlens/types";

export interface ChartAccount {
  readonly code: AccountCode;
  readonly name: string;
}

/**
 * Lookup structures built from a chart of accounts.
 */
export interface AccountIndex {
  readonly knownCodes: ReadonlySet<AccountCode>;
  readonly nameByCode: ReadonlyMap<AccountCode, string>;
}

export type RejectionReason = "UNKNOWN_ACCOUNT";

export interface RejectedEntry<T> {
  readonly entry: T;
  readonly code: AccountCode;
  readonly reason: RejectionReason;
}

export interface AccountFilterResult<T> {
  readonly kept: readonly T[];
  readonly rejected: readonly RejectedEntry<T>[];
}

/**
 * Index a chart of accounts. Codes and names are trimmed; blank codes
 * are skipped; the last name wins for a repeated code.
 */
export function buildAccountIndex(accounts: Iterable<ChartAccount>): AccountIndex {
  const nameByCode = new Map<AccountCode, string>();
  for (const account of accounts) {
    const code = account.code.trim();
    if (code === "") continue;
    nameByCode.set(code, account.name.trim());
  }
  return { knownCodes: new Set(nameByCode.keys()), nameByCode };
}

/**
 * The most specific known prefix of a code, or null.
 *
 * "606300" → "6063" when "6063" is known
 * "123456" → null when no prefix is known
 */
export function resolveKnownAccount(
  code: AccountCode,
  knownCodes: ReadonlySet<AccountCode>,
): AccountCode | null {
  const trimmed = code.trim();
  for (let length = trimmed.length; length > 0; length--) {
    const prefix = trimmed.slice(0, length);
    if (knownCodes.has(prefix)) {
      return prefix;
    }
  }
  return null;
}

/**
 * Split entries into those with a known account (code trimmed) and
 * those without one.
 */
export function filterUnknownAccounts<T extends { readonly code: AccountCode }>(
  entries: Iterable<T>,
  knownCodes: ReadonlySet<AccountCode>,
): AccountFilterResult<T> {
  const kept: T[] = [];
  const rejected: RejectedEntry<T>[] = [];

  for (const entry of entries) {
    const code = entry.code.trim();
    if (resolveKnownAccount(code, knownCodes) === null) {
      rejected.push({ entry, code, reason: "UNKNOWN_ACCOUNT" });
    } else {
      kept.push(code === entry.code ? entry : { ...entry, code });
    }
  }

  return { kept, rejected };
}

/**
 * Helpers shared by the detectors.
 */

import type { AnomalyDetails, AnomalyKind, LedgerEntry } from "@tally/types";
import { compareEvents } from "@tally/ledger";
import { SEVERITY, type AnomalyFinding } from "../types.js";

/**
 * Group items by a key. Groups appear in first-seen order and keep the
 * input order inside.
 */
export function groupBy<T>(items: readonly T[], keyOf: (item: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    const group = groups.get(key);
    if (group === undefined) {
      groups.set(key, [item]);
    } else {
      group.push(item);
    }
  }
  return groups;
}

/** Canonical event order, then entry key. */
export function compareEntries(a: LedgerEntry, b: LedgerEntry): number {
  const byEvent = compareEvents(a.event, b.event);
  if (byEvent !== 0) return byEvent;
  if (a.key === b.key) return 0;
  return a.key < b.key ? -1 : 1;
}

/** Each user's entries in canonical order. */
export function entriesByUser(ledger: readonly LedgerEntry[]): Map<string, LedgerEntry[]> {
  const groups = groupBy(ledger, (e) => e.event.userId);
  for (const group of groups.values()) {
    group.sort(compareEntries);
  }
  return groups;
}

/**
 * Finding about a single ledger entry.
 */
export function entryFinding(
  type: AnomalyKind,
  entry: LedgerEntry,
  message: string,
  details: AnomalyDetails,
): AnomalyFinding {
  return {
    type,
    subject: { userId: entry.event.userId, transactionId: entry.event.id },
    severity: SEVERITY[type],
    message,
    details,
    relatedEntries: [entry.key],
  };
}

/**
 * Decimal text with trailing fractional zeros removed, so equal values
 * share a key ("-0.010" and "-0.01").
 */
export function valueKey(decimal: string): string {
  if (!decimal.includes(".")) return decimal;
  return decimal.replace(/0+$/, "").replace(/\.$/, "");
}

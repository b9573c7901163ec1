/**
 * ReconciliationSummarizer: aggregate views of a finished ledger.
 *
 * All sums are exact decimals. Amounts in different currencies are added
 * together as logged; the per-user currency list shows when that happened.
 */

import type { LedgerEntry, OverdraftKind, TransactionDirection } from "@tally/types";
import { absDecimal, isNegativeDecimal, sumDecimals } from "@tally/ledger";

// =============================================================================
// Types
// =============================================================================

export interface SummaryTotals {
  readonly transactions: number;
  readonly users: number;
  /** Sum of debit magnitudes */
  readonly totalDebit: string;
  readonly totalCredit: string;
  /** Sum of signed amounts */
  readonly net: string;
  readonly mismatches: number;
  readonly continuityBreaks: number;
  readonly overdrafts: number;
}

export interface UserSummary {
  readonly userId: string;
  readonly transactions: number;
  readonly totalDebit: string;
  readonly totalCredit: string;
  readonly net: string;
  readonly overdrafts: number;
  readonly mismatches: number;
  readonly continuityBreaks: number;
  readonly openingBalance: string;
  readonly finalBalance: string;
  readonly currencies: readonly string[];
}

export interface SourceSummary {
  readonly source: string;
  readonly direction: TransactionDirection;
  readonly transactions: number;
  /** Sum of magnitudes */
  readonly total: string;
}

export interface OverdraftRow {
  readonly key: string;
  readonly timestamp: string;
  readonly userId: string;
  readonly id: string;
  readonly overdraftKind: Exclude<OverdraftKind, "NONE">;
  readonly expectedNewBalance: string;
  readonly actualNewBalance: string;
}

/** The fixed projection accountants review row by row. */
export interface ReconciliationRow {
  readonly timestamp: string;
  readonly userId: string;
  readonly id: string;
  readonly direction: TransactionDirection;
  readonly source: string;
  readonly action: string;
  readonly currency: string;
  readonly priorBalance: string;
  readonly amount: string;
  readonly actualNewBalance: string;
  readonly expectedNewBalance: string;
  readonly mismatch: boolean;
  readonly continuityBreak: boolean;
  readonly overdraftKind: OverdraftKind;
  readonly suggestedAdjustment: string | null;
}

export interface ReconciliationSummary {
  readonly totals: SummaryTotals;
  readonly byUser: readonly UserSummary[];
  readonly bySource: readonly SourceSummary[];
  readonly overdrafts: readonly OverdraftRow[];
  readonly reconciliationView: readonly ReconciliationRow[];
}

// =============================================================================
// Helpers
// =============================================================================

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function debitTotal(entries: readonly LedgerEntry[]): string {
  return sumDecimals(
    entries.filter((e) => isNegativeDecimal(e.event.amount)).map((e) => absDecimal(e.event.amount)),
  );
}

function creditTotal(entries: readonly LedgerEntry[]): string {
  return sumDecimals(
    entries.filter((e) => !isNegativeDecimal(e.event.amount)).map((e) => e.event.amount),
  );
}

function netTotal(entries: readonly LedgerEntry[]): string {
  return sumDecimals(entries.map((e) => e.event.amount));
}

function count(entries: readonly LedgerEntry[], predicate: (e: LedgerEntry) => boolean): number {
  return entries.reduce((n, e) => (predicate(e) ? n + 1 : n), 0);
}

const isOverdrawn = (e: LedgerEntry): boolean => e.overdraftKind !== "NONE";

// =============================================================================
// Views
// =============================================================================

function summarizeUser(userId: string, entries: readonly LedgerEntry[]): UserSummary {
  const first = entries[0];
  const last = entries[entries.length - 1];
  return {
    userId,
    transactions: entries.length,
    totalDebit: debitTotal(entries),
    totalCredit: creditTotal(entries),
    net: netTotal(entries),
    overdrafts: count(entries, isOverdrawn),
    mismatches: count(entries, (e) => e.mismatch),
    continuityBreaks: count(entries, (e) => e.continuityBreak),
    openingBalance: first?.priorBalance ?? "0",
    finalBalance: last?.actualNewBalance ?? "0",
    currencies: [...new Set(entries.map((e) => e.event.currency))].sort(),
  };
}

function summarizeSources(ledger: readonly LedgerEntry[]): SourceSummary[] {
  const groups = new Map<string, { source: string; direction: TransactionDirection; entries: LedgerEntry[] }>();

  for (const entry of ledger) {
    const { source, direction } = entry.event;
    const key = `${source}\u0000${direction}`;
    const group = groups.get(key);
    if (group === undefined) {
      groups.set(key, { source, direction, entries: [entry] });
    } else {
      group.entries.push(entry);
    }
  }

  return [...groups.values()]
    .sort((a, b) => compareText(a.source, b.source) || compareText(a.direction, b.direction))
    .map(({ source, direction, entries }) => ({
      source,
      direction,
      transactions: entries.length,
      total: sumDecimals(entries.map((e) => absDecimal(e.event.amount))),
    }));
}

function toOverdraftRow(entry: LedgerEntry): OverdraftRow[] {
  const kind = entry.overdraftKind;
  if (kind === "NONE") return [];
  return [
    {
      key: entry.key,
      timestamp: entry.event.timestamp,
      userId: entry.event.userId,
      id: entry.event.id,
      overdraftKind: kind,
      expectedNewBalance: entry.expectedNewBalance,
      actualNewBalance: entry.actualNewBalance,
    },
  ];
}

function toReconciliationRow(entry: LedgerEntry): ReconciliationRow {
  const { event } = entry;
  return {
    timestamp: event.timestamp,
    userId: event.userId,
    id: event.id,
    direction: event.direction,
    source: event.source,
    action: event.action,
    currency: event.currency,
    priorBalance: entry.priorBalance,
    amount: event.amount,
    actualNewBalance: entry.actualNewBalance,
    expectedNewBalance: entry.expectedNewBalance,
    mismatch: entry.mismatch,
    continuityBreak: entry.continuityBreak,
    overdraftKind: entry.overdraftKind,
    suggestedAdjustment: entry.suggestedAdjustment,
  };
}

// =============================================================================
// Summarizer
// =============================================================================

/**
 * Summarize a ledger. Rows keep ledger order; users and sources are
 * ordered by code.
 */
export function summarize(ledger: readonly LedgerEntry[]): ReconciliationSummary {
  const byUserId = new Map<string, LedgerEntry[]>();
  for (const entry of ledger) {
    const list = byUserId.get(entry.event.userId);
    if (list === undefined) {
      byUserId.set(entry.event.userId, [entry]);
    } else {
      list.push(entry);
    }
  }

  const byUser = [...byUserId.keys()]
    .sort(compareText)
    .map((userId) => summarizeUser(userId, byUserId.get(userId) ?? []));

  return {
    totals: {
      transactions: ledger.length,
      users: byUserId.size,
      totalDebit: debitTotal(ledger),
      totalCredit: creditTotal(ledger),
      net: netTotal(ledger),
      mismatches: count(ledger, (e) => e.mismatch),
      continuityBreaks: count(ledger, (e) => e.continuityBreak),
      overdrafts: count(ledger, isOverdrawn),
    },
    byUser,
    bySource: summarizeSources(ledger),
    overdrafts: ledger.flatMap(toOverdraftRow),
    reconciliationView: ledger.map(toReconciliationRow),
  };
}

/**
 * Repetition checks: reused transaction ids and quickly repeated deductions.
 */

import type { LedgerEntry } from "@tally/types";
import { compareDecimals, isNegativeDecimal } from "@tally/ledger";
import { SEVERITY, type AnomalyFinding, type DetectorConfig } from "../types.js";
import { compareEntries, entriesByUser, entryFinding, groupBy } from "./shared.js";

/**
 * Ids shared by two or more entries, across all users. One finding per id,
 * relating every entry that carries it in chronological order.
 */
export function detectDuplicateIds(ledger: readonly LedgerEntry[]): AnomalyFinding[] {
  const findings: AnomalyFinding[] = [];

  for (const [id, group] of groupBy(ledger, (e) => e.event.id)) {
    if (group.length < 2) continue;

    const ordered = [...group].sort(compareEntries);
    const users = [...new Set(ordered.map((e) => e.event.userId))].sort();
    const onlyUser = users.length === 1 ? users[0] : undefined;

    findings.push({
      type: "DuplicateId",
      subject: { userId: onlyUser, transactionId: id },
      severity: SEVERITY.DuplicateId,
      message: `Transaction id ${id} appears ${ordered.length} times`,
      details: { occurrences: ordered.length, users: users.join(",") },
      relatedEntries: ordered.map((e) => e.key),
    });
  }

  return findings;
}

/**
 * The same deduction (same user, action and amount) logged again within
 * the rapid-repeat window of the previous one.
 */
export function detectRapidRepeats(
  ledger: readonly LedgerEntry[],
  config: DetectorConfig,
): AnomalyFinding[] {
  const findings: AnomalyFinding[] = [];
  const windowMs = config.rapidRepeatWindowMs;

  for (const entries of entriesByUser(ledger).values()) {
    const lastSeen: LedgerEntry[] = [];

    for (const entry of entries) {
      if (!isNegativeDecimal(entry.event.amount)) continue;

      const index = lastSeen.findIndex(
        (prev) =>
          prev.event.action === entry.event.action &&
          compareDecimals(prev.event.amount, entry.event.amount) === 0,
      );
      const previous = index === -1 ? undefined : lastSeen[index];

      if (previous !== undefined) {
        const gapMs = entry.event.epochMs - previous.event.epochMs;
        if (gapMs <= windowMs) {
          findings.push({
            ...entryFinding(
              "RapidRepeatDeduction",
              entry,
              `Deduction of ${entry.event.amount} repeated ${gapMs} ms after transaction ${previous.event.id}`,
              { amount: entry.event.amount, gapMs, windowMs, previousTransactionId: previous.event.id },
            ),
            relatedEntries: [previous.key, entry.key],
          });
        }
        lastSeen[index] = entry;
      } else {
        lastSeen.push(entry);
      }
    }
  }

  return findings;
}

/**
 * Back-references from ledger rows to the anomalies that mention them.
 */

import type { AnnotatedLedgerEntry, AnomalyRecord, LedgerEntry } from "@tally/types";

/**
 * Attach anomaly ids to each ledger row. Produces new rows; the input
 * ledger is left untouched. Ids appear in anomaly order.
 */
export function annotateLedger(
  ledger: readonly LedgerEntry[],
  anomalies: readonly AnomalyRecord[],
): AnnotatedLedgerEntry[] {
  const idsByKey = new Map<string, string[]>();

  for (const anomaly of anomalies) {
    for (const key of anomaly.relatedEntries) {
      const ids = idsByKey.get(key);
      if (ids === undefined) {
        idsByKey.set(key, [anomaly.id]);
      } else if (!ids.includes(anomaly.id)) {
        ids.push(anomaly.id);
      }
    }
  }

  return ledger.map((entry) => ({ ...entry, anomalyIds: idsByKey.get(entry.key) ?? [] }));
}

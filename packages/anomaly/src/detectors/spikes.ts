/**
 * MAD spike detection.
 *
 * Amounts are grouped per (user, action). A group whose median absolute
 * deviation is zero has no spread to measure against and is skipped.
 * Both passes (statistics, then flagging) see the whole group.
 */

import type { LedgerEntry } from "@tally/types";
import type { AnomalyFinding, DetectorConfig } from "../types.js";
import { median, medianAbsoluteDeviation } from "../stats.js";
import { entryFinding, groupBy } from "./shared.js";

export function detectMadSpikes(
  ledger: readonly LedgerEntry[],
  config: DetectorConfig,
): AnomalyFinding[] {
  const findings: AnomalyFinding[] = [];
  const k = config.madThreshold;
  const groups = groupBy(ledger, (e) => `${e.event.userId}\u0000${e.event.action}`);

  for (const group of groups.values()) {
    const amounts = group.map((e) => Number(e.event.amount));
    const center = median(amounts);
    const mad = medianAbsoluteDeviation(amounts, center);
    if (!(mad > 0)) continue;

    group.forEach((entry, i) => {
      const deviation = Math.abs((amounts[i] ?? center) - center);
      if (deviation <= k * mad) return;

      findings.push(
        entryFinding(
          "MADSpike",
          entry,
          `Amount ${entry.event.amount} is ${(deviation / mad).toFixed(2)} MADs from the ${entry.event.action} median ${center}`,
          { amount: entry.event.amount, median: center, mad, deviation, threshold: k },
        ),
      );
    });
  }

  return findings;
}

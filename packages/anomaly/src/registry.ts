/**
 * Detector registry and runner.
 *
 * The detector set is fixed: one pure function per anomaly kind. A run may
 * enable a subset. Findings from all detectors are merged, put in a global
 * order, and only then given ids, so ids depend on the data alone.
 */

import { ANOMALY_KINDS, type AnomalyKind, type AnomalyRecord, type LedgerEntry } from "@tally/types";
import type { AnomalyFinding, Detector, DetectorConfig } from "./types.js";
import { DEFAULT_DETECTOR_CONFIG } from "./types.js";
import {
  detectBalanceMismatches,
  detectContinuityBreaks,
  detectCurrencyMismatches,
  detectInvalidActions,
  detectMissingFields,
} from "./detectors/record-checks.js";
import { detectMadSpikes } from "./detectors/spikes.js";
import { detectDuplicateIds, detectRapidRepeats } from "./detectors/duplicates.js";
import { detectAfterHours, detectBursts } from "./detectors/timing.js";
import { detectMixedCurrencies, detectRoundingPatterns } from "./detectors/patterns.js";

export const DETECTORS: Readonly<Record<AnomalyKind, Detector>> = {
  InvalidAction: detectInvalidActions,
  MADSpike: detectMadSpikes,
  DuplicateId: detectDuplicateIds,
  RapidRepeatDeduction: detectRapidRepeats,
  Burst: detectBursts,
  AfterHours: detectAfterHours,
  RoundingPattern: detectRoundingPatterns,
  CurrencyMismatch: detectCurrencyMismatches,
  MissingField: detectMissingFields,
  BalanceMismatch: detectBalanceMismatches,
  ContinuityBreak: detectContinuityBreaks,
  MixedCurrency: detectMixedCurrencies,
};

export interface RunDetectorsOptions {
  readonly config?: DetectorConfig | undefined;
  /** Kinds to run; all kinds when omitted */
  readonly detectors?: readonly AnomalyKind[] | undefined;
}

/** "A-000001" for 1. */
export function anomalyId(ordinal: number): string {
  return `A-${String(ordinal).padStart(6, "0")}`;
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Run the enabled detectors over a finished ledger.
 *
 * Results are ordered by the timestamp of their first related entry, then
 * by kind, then by that entry's key.
 */
export function runDetectors(
  ledger: readonly LedgerEntry[],
  options: RunDetectorsOptions = {},
): AnomalyRecord[] {
  const config = options.config ?? DEFAULT_DETECTOR_CONFIG;
  const enabled = new Set<AnomalyKind>(options.detectors ?? ANOMALY_KINDS);
  const epochByKey = new Map(ledger.map((e) => [e.key, e.event.epochMs]));

  const findings: AnomalyFinding[] = [];
  for (const kind of ANOMALY_KINDS) {
    if (enabled.has(kind)) {
      findings.push(...DETECTORS[kind](ledger, config));
    }
  }

  const firstKey = (f: AnomalyFinding): string => f.relatedEntries[0] ?? "";
  const firstEpoch = (f: AnomalyFinding): number =>
    epochByKey.get(firstKey(f)) ?? Number.POSITIVE_INFINITY;

  const ordered = [...findings].sort((a, b) => {
    const ea = firstEpoch(a);
    const eb = firstEpoch(b);
    if (ea !== eb) return ea < eb ? -1 : 1;
    return compareText(a.type, b.type) || compareText(firstKey(a), firstKey(b));
  });

  return ordered.map((finding, i) => ({ id: anomalyId(i + 1), ...finding }));
}

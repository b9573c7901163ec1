/**
 * Reconciler: Top-level coordinator
 *
 * Runs the full pipeline over one batch of raw records:
 * normalize → build ledger → detect anomalies → annotate → summarize → fingerprint.
 *
 * Usage:
 *   const reconciler = new Reconciler({ tolerance: "0.005" });
 *   const report = reconciler.run(records);
 *
 * Configuration is validated in the constructor, so a bad configuration
 * fails before any record is looked at. Bad records never fail the run.
 */

import type { AnomalyRecord, NormalizationFailure } from "@tally/types";
import { LedgerBuilder } from "@tally/ledger";
import { normalizeBatch } from "@tally/intake";
import { annotateLedger, runDetectors, type DetectorConfig } from "@tally/anomaly";
import { buildRoundingTable, resolveEngineConfig, toDetectorConfig } from "./config.js";
import type { EngineConfig } from "./config.js";
import { summarize } from "./summarizer.js";
import { fingerprintReport } from "./fingerprint.js";
import type { ReconciliationReport, TriageReport } from "./types.js";

// =============================================================================
// Counting
// =============================================================================

function countBy<T>(items: readonly T[], keyOf: (item: T) => string): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const item of items) {
    const key = keyOf(item);
    counts[key] = (counts[key] ?? 0) + 1;
  }
  return counts;
}

/** Anomalies per kind; kinds that did not occur are omitted. */
export function countAnomalies(anomalies: readonly AnomalyRecord[]): Record<string, number> {
  return countBy(anomalies, (a) => a.type);
}

function triageOf(received: number, failures: readonly NormalizationFailure[]): TriageReport {
  return {
    received,
    accepted: received - failures.length,
    rejected: failures.length,
    byReason: countBy(failures, (f) => f.reason),
    failures,
  };
}

// =============================================================================
// Reconciler
// =============================================================================

export class Reconciler {
  readonly config: EngineConfig;
  private readonly builder: LedgerBuilder;
  private readonly detectorConfig: DetectorConfig;

  /**
   * @throws {LedgerError} COMPUTATION_INCONSISTENCY when the configuration is invalid
   */
  constructor(config: unknown = {}) {
    this.config = resolveEngineConfig(config);
    this.builder = new LedgerBuilder({
      tolerance: this.config.tolerance,
      roundingTable: buildRoundingTable(this.config),
    });
    this.detectorConfig = toDetectorConfig(this.config);
  }

  /**
   * Reconcile a batch of raw records.
   */
  run(records: readonly unknown[]): ReconciliationReport {
    const { events, failures } = normalizeBatch(records);
    const triage = triageOf(records.length, failures);

    const ledger = this.builder.build(events);
    const anomalies = runDetectors(ledger, {
      config: this.detectorConfig,
      detectors: this.config.detectors,
    });

    return {
      triage,
      ledger: annotateLedger(ledger, anomalies),
      anomalies,
      anomalyCounts: countAnomalies(anomalies),
      summary: summarize(ledger),
      config: this.config,
      fingerprint: fingerprintReport({ ledger, anomalies, triage }),
    };
  }
}

/**
 * @tally/reconciler report types.
 */

import type { AnnotatedLedgerEntry, AnomalyRecord, NormalizationFailure } from "@tally/types";
import type { EngineConfig } from "./config.js";
import type { ReconciliationSummary } from "./summarizer.js";

// =============================================================================
// Triage
// =============================================================================

/** What happened to the raw records of a run. */
export interface TriageReport {
  readonly received: number;
  readonly accepted: number;
  readonly rejected: number;
  /** Rejections per failure reason; reasons that did not occur are omitted */
  readonly byReason: Readonly<Record<string, number>>;
  readonly failures: readonly NormalizationFailure[];
}

// =============================================================================
// Report
// =============================================================================

/**
 * Full result of one reconciliation run.
 */
export interface ReconciliationReport {
  readonly triage: TriageReport;
  readonly ledger: readonly AnnotatedLedgerEntry[];
  readonly anomalies: readonly AnomalyRecord[];
  /** Anomalies per kind; kinds that did not occur are omitted */
  readonly anomalyCounts: Readonly<Record<string, number>>;
  readonly summary: ReconciliationSummary;
  /** Effective configuration after defaults and overrides */
  readonly config: EngineConfig;
  /** SHA-256 over the canonical ledger, anomalies and triage */
  readonly fingerprint: string;
}

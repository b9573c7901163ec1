/**
 * ReconciliationService: Composition root for the domain packages.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly. The service holds the engine configuration loaded at
 * startup and applies per-request overrides on top of it.
 */

import { normalizeBatch } from "@tally/intake";
import type { NormalizedBatch } from "@tally/intake";
import { Reconciler, mergeEngineConfig } from "@tally/reconciler";
import type {
  EngineConfig,
  EngineConfigInput,
  ReconciliationReport,
} from "@tally/reconciler";

// =============================================================================
// Configuration
// =============================================================================

/** One structured line per reconciliation run. */
export interface RunLogEntry {
  readonly records: number;
  readonly failures: number;
  readonly ledgerRows: number;
  readonly anomalies: number;
  readonly anomaliesByType: Readonly<Record<string, number>>;
  readonly fingerprint: string;
  readonly durationMs: number;
}

export interface ReconciliationServiceConfig {
  /** Base engine configuration; defaults fill the rest */
  readonly engine?: EngineConfigInput | undefined;
  readonly logRun?: ((entry: RunLogEntry) => void) | undefined;
}

// =============================================================================
// Service
// =============================================================================

export class ReconciliationService {
  readonly engineConfig: EngineConfig;

  private readonly reconciler: Reconciler;
  private readonly logRun: ((entry: RunLogEntry) => void) | undefined;

  /**
   * @throws {LedgerError} COMPUTATION_INCONSISTENCY when the base configuration is invalid
   */
  constructor(config: ReconciliationServiceConfig = {}) {
    this.reconciler = new Reconciler(config.engine ?? {});
    this.engineConfig = this.reconciler.config;
    this.logRun = config.logRun;
  }

  /**
   * Reconcile a batch, optionally overriding engine settings for this run.
   */
  reconcile(records: readonly unknown[], override?: unknown): ReconciliationReport {
    const reconciler =
      override === undefined
        ? this.reconciler
        : new Reconciler(mergeEngineConfig(this.engineConfig, override));

    const start = Date.now();
    const report = reconciler.run(records);

    this.logRun?.({
      records: records.length,
      failures: report.triage.rejected,
      ledgerRows: report.ledger.length,
      anomalies: report.anomalies.length,
      anomaliesByType: report.anomalyCounts,
      fingerprint: report.fingerprint,
      durationMs: Date.now() - start,
    });

    return report;
  }

  /**
   * Normalize a batch without building a ledger.
   */
  normalize(records: readonly unknown[]): NormalizedBatch {
    return normalizeBatch(records);
  }
}

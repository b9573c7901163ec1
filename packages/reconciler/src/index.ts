/**
 * @tally/reconciler: Reconciliation coordinator.
 *
 * Ties intake, ledger and anomaly detection into one deterministic run
 * and summarizes the result for accountants.
 */

// Coordinator
export { Reconciler, countAnomalies } from "./reconciler.js";

// Configuration
export {
  EngineConfigSchema,
  BusinessHoursSchema,
  resolveEngineConfig,
  mergeEngineConfig,
  buildRoundingTable,
  toDetectorConfig,
} from "./config.js";
export type { EngineConfig, EngineConfigInput } from "./config.js";

// Summaries
export { summarize } from "./summarizer.js";
export type {
  ReconciliationSummary,
  SummaryTotals,
  UserSummary,
  SourceSummary,
  OverdraftRow,
  ReconciliationRow,
} from "./summarizer.js";

// Fingerprints
export { fingerprintReport, hashCanonical } from "./fingerprint.js";
export type { FingerprintContent } from "./fingerprint.js";

// Types
export type { ReconciliationReport, TriageReport } from "./types.js";

/**
 * @tally/anomaly: Anomaly detection over a reconciled ledger.
 *
 * A fixed family of pure detectors, a runner that orders their findings and
 * assigns ids, and the annotation step linking rows back to anomalies.
 */

export { DETECTORS, runDetectors, anomalyId } from "./registry.js";
export type { RunDetectorsOptions } from "./registry.js";

export { annotateLedger } from "./annotate.js";

export { median, medianAbsoluteDeviation } from "./stats.js";

export {
  detectInvalidActions,
  detectMissingFields,
  detectCurrencyMismatches,
  detectBalanceMismatches,
  detectContinuityBreaks,
} from "./detectors/record-checks.js";
export { detectMadSpikes } from "./detectors/spikes.js";
export { detectDuplicateIds, detectRapidRepeats } from "./detectors/duplicates.js";
export { detectBursts, detectAfterHours } from "./detectors/timing.js";
export { detectRoundingPatterns, detectMixedCurrencies } from "./detectors/patterns.js";

export { DEFAULT_DETECTOR_CONFIG, SEVERITY } from "./types.js";
export type { AnomalyFinding, BusinessHours, Detector, DetectorConfig } from "./types.js";

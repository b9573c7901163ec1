/**
 * Anomaly detector contracts.
 */

import type { AnomalyKind, AnomalyRecord, AnomalySeverity, LedgerEntry } from "@tally/types";

/**
 * Local working hours. An entry is after hours when its local hour falls
 * outside [startHour, endHour) or its local weekday is a weekend day.
 */
export interface BusinessHours {
  readonly startHour: number;
  readonly endHour: number;
  /** Offset of local time from UTC, in minutes (e.g. 180 for UTC+3) */
  readonly utcOffsetMinutes: number;
  /** 0 = Sunday … 6 = Saturday */
  readonly weekendDays: readonly number[];
}

/**
 * Thresholds shared by every detector in a run.
 */
export interface DetectorConfig {
  /** k in |amount − median| > k × MAD */
  readonly madThreshold: number;
  readonly burstWindowMs: number;
  readonly rapidRepeatWindowMs: number;
  readonly businessHours: BusinessHours;
  readonly roundingPatternMinOccurrences: number;
  /** Largest |suggestedAdjustment| still considered a rounding artefact */
  readonly roundingPatternMaxMagnitude: string;
}

export const DEFAULT_DETECTOR_CONFIG: DetectorConfig = {
  madThreshold: 6,
  burstWindowMs: 1_000,
  rapidRepeatWindowMs: 60_000,
  businessHours: { startHour: 8, endHour: 18, utcOffsetMinutes: 0, weekendDays: [0, 6] },
  roundingPatternMinOccurrences: 3,
  roundingPatternMaxMagnitude: "0.1",
};

/** A detector match before global ordering assigns its id. */
export type AnomalyFinding = Omit<AnomalyRecord, "id">;

/**
 * A pure check over a finished ledger. Detectors never see each other's
 * output and may run in any order.
 */
export type Detector = (
  ledger: readonly LedgerEntry[],
  config: DetectorConfig,
) => readonly AnomalyFinding[];

export const SEVERITY: Readonly<Record<AnomalyKind, AnomalySeverity>> = {
  InvalidAction: "medium",
  MADSpike: "high",
  DuplicateId: "high",
  RapidRepeatDeduction: "medium",
  Burst: "low",
  AfterHours: "low",
  RoundingPattern: "medium",
  CurrencyMismatch: "medium",
  MissingField: "low",
  BalanceMismatch: "high",
  ContinuityBreak: "high",
  MixedCurrency: "medium",
};

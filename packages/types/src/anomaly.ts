/**
 * Anomaly Types
 *
 * Findings produced by the anomaly detectors over a finished ledger.
 * Related entries are weak references (ledger entry keys), never copies.
 */

/** The fixed set of detector kinds. */
export type AnomalyKind =
  | "InvalidAction"
  | "MADSpike"
  | "DuplicateId"
  | "RapidRepeatDeduction"
  | "Burst"
  | "AfterHours"
  | "RoundingPattern"
  | "CurrencyMismatch"
  | "MissingField"
  | "BalanceMismatch"
  | "ContinuityBreak"
  | "MixedCurrency";

export type AnomalySeverity = "low" | "medium" | "high";

/** Who or what an anomaly is about. At least one field is set. */
export interface AnomalySubject {
  readonly userId?: string | undefined;
  readonly transactionId?: string | undefined;
}

/** Structured explanation. Values are scalars so the record stays serializable. */
export type AnomalyDetails = Readonly<Record<string, string | number | boolean | null>>;

/**
 * One detector match.
 */
export interface AnomalyRecord {
  /** Assigned after global ordering, e.g. "A-000001"; empty until then */
  readonly id: string;
  readonly type: AnomalyKind;
  readonly subject: AnomalySubject;
  readonly severity: AnomalySeverity;
  readonly message: string;
  readonly details: AnomalyDetails;
  /** Keys of the ledger entries involved */
  readonly relatedEntries: readonly string[];
}

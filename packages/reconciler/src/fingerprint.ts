/**
 * Report fingerprints.
 *
 * Algorithm:
 * 1. Canonicalize the content (RFC 8785 / JCS)
 * 2. SHA-256 the canonical form, hex encoded
 *
 * Only deterministic content goes in: no wall-clock values, no run ids.
 * The same records and configuration always produce the same fingerprint.
 * Rejected records are hashed by index, reason and message, never by their
 * raw content, which may hold values JSON cannot represent.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { AnomalyRecord, LedgerEntry, NormalizationFailure } from "@tally/types";
import type { TriageReport } from "./types.js";

/** SHA-256 of the canonical JSON form of a value. */
export function hashCanonical(value: unknown): string {
  return createHash("sha256").update(canonicalize(value)).digest("hex");
}

export interface FingerprintContent {
  readonly ledger: readonly LedgerEntry[];
  readonly anomalies: readonly AnomalyRecord[];
  readonly triage: TriageReport;
}

/** The hashed view of a failure, without the raw record. */
function failureDigest(failure: NormalizationFailure) {
  return {
    recordIndex: failure.recordIndex,
    reason: failure.reason,
    field: failure.field ?? null,
    message: failure.message,
  };
}

/**
 * Fingerprint of a reconciliation result: ledger, anomalies and triage.
 */
export function fingerprintReport(content: FingerprintContent): string {
  const { ledger, anomalies, triage } = content;
  return hashCanonical({
    ledger,
    anomalies,
    triage: { ...triage, failures: triage.failures.map(failureDigest) },
  });
}

/**
 * Runtime Type Guards
 *
 * Narrowing functions for Tally domain types.
 * These enable safe runtime validation at system boundaries
 * (HTTP inputs, configuration, deserialized reports).
 */

import type { TransactionAction, TransactionEvent } from "./transaction.js";
import type { OverdraftKind, RoundingMode } from "./ledger.js";
import type { AnomalyKind, AnomalyRecord, AnomalySeverity } from "./anomaly.js";

// =============================================================================
// Enumerations
// =============================================================================

export const TRANSACTION_ACTIONS = ["DEDUCT", "CREDIT", "ADJUSTMENT", "INVALID"] as const satisfies readonly TransactionAction[];

export const ROUNDING_MODES = ["HALF_UP", "HALF_EVEN", "DOWN"] as const satisfies readonly RoundingMode[];

export const OVERDRAFT_KINDS = ["NONE", "EXPECTED", "ACTUAL", "BOTH"] as const satisfies readonly OverdraftKind[];

export const ANOMALY_KINDS = [
  "InvalidAction",
  "MADSpike",
  "DuplicateId",
  "RapidRepeatDeduction",
  "Burst",
  "AfterHours",
  "RoundingPattern",
  "CurrencyMismatch",
  "MissingField",
  "BalanceMismatch",
  "ContinuityBreak",
  "MixedCurrency",
] as const satisfies readonly AnomalyKind[];

const ACTION_SET = new Set<string>(TRANSACTION_ACTIONS);
const ROUNDING_SET = new Set<string>(ROUNDING_MODES);
const ANOMALY_SET = new Set<string>(ANOMALY_KINDS);
const SEVERITY_SET = new Set<string>(["low", "medium", "high"]);
const DECIMAL_RE = /^-?\d+(\.\d+)?$/;

// =============================================================================
// Scalar guards
// =============================================================================

export function isTransactionAction(value: unknown): value is TransactionAction {
  return typeof value === "string" && ACTION_SET.has(value);
}

export function isRoundingMode(value: unknown): value is RoundingMode {
  return typeof value === "string" && ROUNDING_SET.has(value);
}

export function isAnomalyKind(value: unknown): value is AnomalyKind {
  return typeof value === "string" && ANOMALY_SET.has(value);
}

export function isAnomalySeverity(value: unknown): value is AnomalySeverity {
  return typeof value === "string" && SEVERITY_SET.has(value);
}

/** A plain decimal string: optional minus, digits, optional fraction. */
export function isDecimalString(value: unknown): value is string {
  return typeof value === "string" && DECIMAL_RE.test(value);
}

// =============================================================================
// Record guards
// =============================================================================

export function isTransactionEvent(value: unknown): value is TransactionEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.userId === "string" &&
    v.userId.length > 0 &&
    typeof v.timestamp === "string" &&
    typeof v.epochMs === "number" &&
    typeof v.id === "string" &&
    typeof v.messageId === "string" &&
    isTransactionAction(v.action) &&
    typeof v.rawAction === "string" &&
    (v.direction === "debit" || v.direction === "credit") &&
    isDecimalString(v.amount) &&
    typeof v.currency === "string" &&
    (v.loggedNewBalance === undefined || isDecimalString(v.loggedNewBalance)) &&
    (v.loggedPriorBalance === undefined || isDecimalString(v.loggedPriorBalance)) &&
    typeof v.source === "string" &&
    typeof v.recordIndex === "number"
  );
}

export function isAnomalyRecord(value: unknown): value is AnomalyRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.id === "string" &&
    isAnomalyKind(v.type) &&
    v.subject !== null &&
    typeof v.subject === "object" &&
    isAnomalySeverity(v.severity) &&
    typeof v.message === "string" &&
    v.details !== null &&
    typeof v.details === "object" &&
    Array.isArray(v.relatedEntries) &&
    v.relatedEntries.every((k) => typeof k === "string")
  );
}

/**
 * EventNormalizer: turns raw parser records into TransactionEvents.
 *
 * Rules:
 * - A bad record becomes a NormalizationFailure; the batch always continues
 * - Required fields: userId, id, timestamp, amount
 * - Unrecognized or blank actions normalize to INVALID (they still enter the ledger)
 * - The event amount is the signed net movement applied to the balance
 */

import {
  isTransactionAction,
  type NormalizationFailure,
  type NormalizationFailureReason,
  type TransactionAction,
  type TransactionEvent,
} from "@tally/types";
import { isNegativeDecimal, negateDecimal, subtractDecimals } from "@tally/ledger";
import { RawRecordSchema, REQUIRED_FIELDS } from "./raw-record-schema.js";
import { coerceDecimal, coerceTimestamp, textOf } from "./coerce.js";

// =============================================================================
// Result Types
// =============================================================================

export type NormalizeResult =
  | { readonly ok: true; readonly event: TransactionEvent }
  | { readonly ok: false; readonly failure: NormalizationFailure };

export interface NormalizedBatch {
  readonly events: readonly TransactionEvent[];
  readonly failures: readonly NormalizationFailure[];
}

/** Sign convention of an unsigned logged amount. */
type MovementType = "DEBIT" | "CREDIT";

// =============================================================================
// Helpers
// =============================================================================

function fail(
  record: unknown,
  recordIndex: number,
  reason: NormalizationFailureReason,
  message: string,
  field?: string,
): NormalizeResult {
  return { ok: false, failure: { recordIndex, record, reason, field, message } };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Canonical action code: trimmed, upper-cased, runs of spaces and hyphens
 * folded to "_". Unrecognized codes become INVALID.
 */
export function normalizeAction(rawAction: string): TransactionAction {
  const code = rawAction.trim().toUpperCase().replace(/[\s-]+/g, "_");
  return isTransactionAction(code) ? code : "INVALID";
}

function movementTypeOf(text: string | undefined): MovementType | undefined {
  const upper = text?.toUpperCase();
  return upper === "DEBIT" || upper === "CREDIT" ? upper : undefined;
}

// =============================================================================
// Normalizer
// =============================================================================

/**
 * Normalize a single raw record.
 *
 * @param recordIndex - Position of the record in its batch, carried into the event
 */
export function normalize(record: unknown, recordIndex = 0): NormalizeResult {
  if (!isPlainObject(record)) {
    return fail(record, recordIndex, "NOT_AN_OBJECT", `Record ${recordIndex} is not an object`);
  }

  const parsed = RawRecordSchema.safeParse(record);
  if (!parsed.success) {
    const field = String(parsed.error.issues[0]?.path[0] ?? "");
    return fail(
      record,
      recordIndex,
      "INVALID_FIELD",
      `Field "${field}" must be a string, number, boolean or null`,
      field,
    );
  }
  const raw = parsed.data;

  for (const field of REQUIRED_FIELDS) {
    if (textOf(raw[field]) === undefined) {
      return fail(record, recordIndex, "MISSING_FIELD", `Missing required field "${field}"`, field);
    }
  }

  const amount = coerceDecimal(raw.amount);
  if (amount.kind !== "ok") {
    const text = amount.kind === "invalid" ? amount.text : "";
    return fail(record, recordIndex, "INVALID_AMOUNT", `Invalid amount: "${text}"`, "amount");
  }

  const vat = coerceDecimal(raw.vat);
  if (vat.kind === "invalid") {
    return fail(record, recordIndex, "INVALID_AMOUNT", `Invalid vat: "${vat.text}"`, "vat");
  }

  const instant = coerceTimestamp(raw.timestamp);
  if (instant.kind !== "ok") {
    const text = instant.kind === "invalid" ? instant.text : "";
    return fail(record, recordIndex, "INVALID_TIMESTAMP", `Invalid timestamp: "${text}"`, "timestamp");
  }

  const newBalance = coerceDecimal(raw.newBalance);
  if (newBalance.kind === "invalid") {
    return fail(
      record,
      recordIndex,
      "INVALID_BALANCE",
      `Invalid newBalance: "${newBalance.text}"`,
      "newBalance",
    );
  }

  const oldBalance = coerceDecimal(raw.oldBalance);
  if (oldBalance.kind === "invalid") {
    return fail(
      record,
      recordIndex,
      "INVALID_BALANCE",
      `Invalid oldBalance: "${oldBalance.text}"`,
      "oldBalance",
    );
  }

  const vatValue = vat.kind === "ok" ? vat.value : undefined;

  // With a DEBIT/CREDIT type the logged amount is gross and unsigned.
  let signed = amount.value;
  const movement = movementTypeOf(textOf(raw.type));
  if (movement !== undefined) {
    const net = vatValue === undefined ? amount.value : subtractDecimals(amount.value, vatValue);
    signed = movement === "DEBIT" ? negateDecimal(net) : net;
  }

  const rawAction = textOf(raw.action) ?? "";

  const event: TransactionEvent = {
    userId: textOf(raw.userId) ?? "",
    timestamp: instant.value.iso,
    epochMs: instant.value.epochMs,
    id: textOf(raw.id) ?? "",
    messageId: textOf(raw.messageId) ?? "",
    action: normalizeAction(rawAction),
    rawAction,
    direction: isNegativeDecimal(signed) ? "debit" : "credit",
    amount: signed,
    vat: vatValue,
    currency: textOf(raw.currency)?.toUpperCase() ?? "UNKNOWN",
    loggedNewBalance: newBalance.kind === "ok" ? newBalance.value : undefined,
    loggedPriorBalance: oldBalance.kind === "ok" ? oldBalance.value : undefined,
    source: textOf(raw.source)?.toUpperCase() ?? "",
    recordIndex,
  };

  return { ok: true, event };
}

/**
 * Normalize a batch, splitting it into events and failures. Input order is
 * preserved in both lists.
 */
export function normalizeBatch(records: readonly unknown[]): NormalizedBatch {
  const events: TransactionEvent[] = [];
  const failures: NormalizationFailure[] = [];

  records.forEach((record, index) => {
    const result = normalize(record, index);
    if (result.ok) {
      events.push(result.event);
    } else {
      failures.push(result.failure);
    }
  });

  return { events, failures };
}

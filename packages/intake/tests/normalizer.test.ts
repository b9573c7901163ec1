/**
 * Tests for the event normalizer.
 *
 * Covers:
 * - Field coercion (decimals, timestamps, text)
 * - Action normalization
 * - Signed net amounts from DEBIT/CREDIT types and VAT
 * - Failure reasons and batch triage
 */

import { describe, it, expect } from "vitest";
import { normalize, normalizeAction, normalizeBatch } from "../src/normalizer.js";
import { coerceDecimal, coerceTimestamp, expandExponent } from "../src/coerce.js";

const baseRecord = {
  userId: "user-1",
  timestamp: "2026-03-02T10:00:00Z",
  id: "tx-1",
  messageId: "m-1",
  action: "deduct",
  amount: "-25.0005",
  currency: "sar",
  newBalance: "75.000",
  oldBalance: "100.000",
  source: "app",
};

function eventOf(record: Record<string, unknown>) {
  const result = normalize(record);
  if (!result.ok) throw new Error(`unexpected failure: ${result.failure.message}`);
  return result.event;
}

function failureOf(record: unknown, index = 0) {
  const result = normalize(record, index);
  if (result.ok) throw new Error("expected a failure");
  return result.failure;
}

// =============================================================================
// Coercion
// =============================================================================

describe("coerceDecimal", () => {
  it("keeps the written precision", () => {
    expect(coerceDecimal("-0.50")).toEqual({ kind: "ok", value: "-0.50" });
  });

  it("strips thousands separators and a leading plus", () => {
    expect(coerceDecimal("1,234.50")).toEqual({ kind: "ok", value: "1234.50" });
    expect(coerceDecimal("+12")).toEqual({ kind: "ok", value: "12" });
  });

  it("converts numbers through their shortest text", () => {
    expect(coerceDecimal(0.1)).toEqual({ kind: "ok", value: "0.1" });
    expect(coerceDecimal(1.5e-7)).toEqual({ kind: "ok", value: "0.00000015" });
  });

  it("treats null and blank text as absent", () => {
    expect(coerceDecimal(null)).toEqual({ kind: "absent" });
    expect(coerceDecimal("   ")).toEqual({ kind: "absent" });
    expect(coerceDecimal(undefined)).toEqual({ kind: "absent" });
  });

  it("rejects malformed values", () => {
    expect(coerceDecimal("12abc")).toEqual({ kind: "invalid", text: "12abc" });
    expect(coerceDecimal("1,23")).toEqual({ kind: "invalid", text: "1,23" });
    expect(coerceDecimal(true)).toEqual({ kind: "invalid", text: "true" });
    expect(coerceDecimal(Number.POSITIVE_INFINITY)).toEqual({ kind: "invalid", text: "Infinity" });
  });
});

describe("expandExponent", () => {
  it("moves the decimal point both ways", () => {
    expect(expandExponent("2.5E3")).toBe("2500");
    expect(expandExponent("-1e2")).toBe("-100");
    expect(expandExponent("123.45e-1")).toBe("12.345");
  });

  it("ignores text without an exponent", () => {
    expect(expandExponent("12.5")).toBeUndefined();
  });

  it("refuses absurd exponents", () => {
    expect(expandExponent("1e999")).toBeUndefined();
  });
});

describe("coerceTimestamp", () => {
  it("reads epoch milliseconds as numbers or digit strings", () => {
    expect(coerceTimestamp(0)).toEqual({
      kind: "ok",
      value: { iso: "1970-01-01T00:00:00.000Z", epochMs: 0 },
    });
    expect(coerceTimestamp("1000")).toEqual({
      kind: "ok",
      value: { iso: "1970-01-01T00:00:01.000Z", epochMs: 1000 },
    });
  });

  it("reads naive ISO text as UTC", () => {
    const result = coerceTimestamp("2026-03-02 10:00:00");
    expect(result.kind === "ok" && result.value.iso).toBe("2026-03-02T10:00:00.000Z");
  });

  it("honours explicit offsets", () => {
    const result = coerceTimestamp("2026-03-02T13:00:00+03:00");
    expect(result.kind === "ok" && result.value.iso).toBe("2026-03-02T10:00:00.000Z");
  });

  it("rejects free-form and impossible dates", () => {
    expect(coerceTimestamp("yesterday")).toEqual({ kind: "invalid", text: "yesterday" });
    expect(coerceTimestamp("2026-13-45")).toEqual({ kind: "invalid", text: "2026-13-45" });
  });
});

// =============================================================================
// Actions
// =============================================================================

describe("normalizeAction", () => {
  it("upper-cases and trims recognized actions", () => {
    expect(normalizeAction("  credit ")).toBe("CREDIT");
    expect(normalizeAction("Adjustment")).toBe("ADJUSTMENT");
  });

  it("maps misspellings, blanks and unknown codes to INVALID", () => {
    expect(normalizeAction("DEDCUT")).toBe("INVALID");
    expect(normalizeAction("")).toBe("INVALID");
    expect(normalizeAction("manual-deduction")).toBe("INVALID");
  });
});

// =============================================================================
// normalize
// =============================================================================

describe("normalize", () => {
  it("produces a typed event from a complete record", () => {
    expect(eventOf(baseRecord)).toEqual({
      userId: "user-1",
      timestamp: "2026-03-02T10:00:00.000Z",
      epochMs: Date.parse("2026-03-02T10:00:00.000Z"),
      id: "tx-1",
      messageId: "m-1",
      action: "DEDUCT",
      rawAction: "deduct",
      direction: "debit",
      amount: "-25.0005",
      vat: undefined,
      currency: "SAR",
      loggedNewBalance: "75.000",
      loggedPriorBalance: "100.000",
      source: "APP",
      recordIndex: 0,
    });
  });

  it("fills defaults for optional fields", () => {
    const event = eventOf({ userId: 42, id: "tx-9", timestamp: 0, amount: 3 });
    expect(event.userId).toBe("42");
    expect(event.currency).toBe("UNKNOWN");
    expect(event.source).toBe("");
    expect(event.messageId).toBe("");
    expect(event.action).toBe("INVALID");
    expect(event.rawAction).toBe("");
    expect(event.direction).toBe("credit");
    expect(event.loggedNewBalance).toBeUndefined();
  });

  it("signs a DEBIT amount net of VAT", () => {
    const event = eventOf({ ...baseRecord, type: "DEBIT", amount: "11.50", vat: "1.50" });
    expect(event.amount).toBe("-10.00");
    expect(event.vat).toBe("1.50");
    expect(event.direction).toBe("debit");
  });

  it("keeps a CREDIT amount positive", () => {
    const event = eventOf({ ...baseRecord, type: "credit", amount: 5 });
    expect(event.amount).toBe("5");
    expect(event.direction).toBe("credit");
  });

  it("leaves a signed amount alone when no type is logged", () => {
    const event = eventOf({ ...baseRecord, amount: "-3", vat: "0.45" });
    expect(event.amount).toBe("-3");
    expect(event.vat).toBe("0.45");
  });

  it("ignores unknown keys", () => {
    expect(eventOf({ ...baseRecord, extra: { nested: true } }).id).toBe("tx-1");
  });
});

describe("normalize failures", () => {
  it("rejects non-objects", () => {
    expect(failureOf(42, 3)).toEqual({
      recordIndex: 3,
      record: 42,
      reason: "NOT_AN_OBJECT",
      field: undefined,
      message: "Record 3 is not an object",
    });
    expect(failureOf([]).reason).toBe("NOT_AN_OBJECT");
  });

  it("rejects non-scalar field values", () => {
    const failure = failureOf({ ...baseRecord, amount: { value: 1 } });
    expect(failure.reason).toBe("INVALID_FIELD");
    expect(failure.field).toBe("amount");
  });

  it("reports the first missing required field", () => {
    const { userId: _omit, ...noUser } = baseRecord;
    const failure = failureOf(noUser);
    expect(failure.reason).toBe("MISSING_FIELD");
    expect(failure.field).toBe("userId");
    expect(failure.message).toBe('Missing required field "userId"');
  });

  it("treats a blank required field as missing", () => {
    expect(failureOf({ ...baseRecord, id: "  " }).field).toBe("id");
  });

  it("classifies unparseable values", () => {
    expect(failureOf({ ...baseRecord, amount: "abc" })).toMatchObject({
      reason: "INVALID_AMOUNT",
      field: "amount",
      message: 'Invalid amount: "abc"',
    });
    expect(failureOf({ ...baseRecord, vat: "x" })).toMatchObject({
      reason: "INVALID_AMOUNT",
      field: "vat",
    });
    expect(failureOf({ ...baseRecord, timestamp: "yesterday" })).toMatchObject({
      reason: "INVALID_TIMESTAMP",
      message: 'Invalid timestamp: "yesterday"',
    });
    expect(failureOf({ ...baseRecord, newBalance: "n/a" })).toMatchObject({
      reason: "INVALID_BALANCE",
      field: "newBalance",
    });
    expect(failureOf({ ...baseRecord, oldBalance: "n/a" })).toMatchObject({
      reason: "INVALID_BALANCE",
      field: "oldBalance",
    });
  });
});

// =============================================================================
// normalizeBatch
// =============================================================================

describe("normalizeBatch", () => {
  it("splits events from failures without aborting", () => {
    const batch = normalizeBatch([baseRecord, 7, { ...baseRecord, id: "tx-2" }]);

    expect(batch.events.map((e) => [e.id, e.recordIndex])).toEqual([
      ["tx-1", 0],
      ["tx-2", 2],
    ]);
    expect(batch.failures.map((f) => [f.recordIndex, f.reason])).toEqual([[1, "NOT_AN_OBJECT"]]);
  });

  it("returns empty lists for an empty batch", () => {
    expect(normalizeBatch([])).toEqual({ events: [], failures: [] });
  });
});

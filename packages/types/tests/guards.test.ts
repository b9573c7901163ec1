/**
 * Runtime type guard tests for @tally/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject invalid / malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  ANOMALY_KINDS,
  isTransactionAction,
  isRoundingMode,
  isAnomalyKind,
  isAnomalySeverity,
  isDecimalString,
  isTransactionEvent,
  isAnomalyRecord,
} from "../src/guards.js";

// =============================================================================
// Scalar guards
// =============================================================================

describe("isTransactionAction", () => {
  it("accepts recognized actions", () => {
    expect(isTransactionAction("DEDUCT")).toBe(true);
    expect(isTransactionAction("INVALID")).toBe(true);
  });

  it("rejects lower-case and misspelled actions", () => {
    expect(isTransactionAction("deduct")).toBe(false);
    expect(isTransactionAction("INVAILID")).toBe(false);
  });

  it("rejects non-strings", () => {
    expect(isTransactionAction(1)).toBe(false);
    expect(isTransactionAction(null)).toBe(false);
  });
});

describe("isRoundingMode", () => {
  it("accepts the supported modes", () => {
    expect(isRoundingMode("HALF_UP")).toBe(true);
    expect(isRoundingMode("HALF_EVEN")).toBe(true);
    expect(isRoundingMode("DOWN")).toBe(true);
  });

  it("rejects other modes", () => {
    expect(isRoundingMode("CEILING")).toBe(false);
  });
});

describe("isAnomalyKind / isAnomalySeverity", () => {
  it("accepts every declared kind", () => {
    for (const kind of ANOMALY_KINDS) {
      expect(isAnomalyKind(kind)).toBe(true);
    }
  });

  it("rejects unknown kinds", () => {
    expect(isAnomalyKind("Spike")).toBe(false);
  });

  it("accepts severities", () => {
    expect(isAnomalySeverity("high")).toBe(true);
    expect(isAnomalySeverity("critical")).toBe(false);
  });
});

describe("isDecimalString", () => {
  it("accepts plain decimals", () => {
    expect(isDecimalString("0")).toBe(true);
    expect(isDecimalString("-25.0005")).toBe(true);
  });

  it("rejects numbers and exponent notation", () => {
    expect(isDecimalString(1.5)).toBe(false);
    expect(isDecimalString("1e3")).toBe(false);
    expect(isDecimalString("1,000")).toBe(false);
  });
});

// =============================================================================
// Record guards
// =============================================================================

const validEvent = {
  userId: "user-1",
  timestamp: "2026-03-02T10:00:00.000Z",
  epochMs: Date.parse("2026-03-02T10:00:00.000Z"),
  id: "tx-1",
  messageId: "",
  action: "DEDUCT",
  rawAction: "deduct",
  direction: "debit",
  amount: "-5.00",
  currency: "USD",
  source: "APP",
  recordIndex: 0,
};

describe("isTransactionEvent", () => {
  it("accepts a valid event", () => {
    expect(isTransactionEvent(validEvent)).toBe(true);
  });

  it("accepts logged balances when they are decimals", () => {
    expect(isTransactionEvent({ ...validEvent, loggedNewBalance: "10.00" })).toBe(true);
  });

  it("rejects a numeric amount", () => {
    expect(isTransactionEvent({ ...validEvent, amount: -5 })).toBe(false);
  });

  it("rejects an empty user id", () => {
    expect(isTransactionEvent({ ...validEvent, userId: "" })).toBe(false);
  });

  it("rejects a malformed logged balance", () => {
    expect(isTransactionEvent({ ...validEvent, loggedPriorBalance: "ten" })).toBe(false);
  });

  it("rejects null", () => {
    expect(isTransactionEvent(null)).toBe(false);
  });
});

describe("isAnomalyRecord", () => {
  const record = {
    id: "A-000001",
    type: "DuplicateId",
    subject: { userId: "user-1", transactionId: "tx42" },
    severity: "high",
    message: "Transaction id tx42 appears 2 times",
    details: { occurrences: 2 },
    relatedEntries: ["user-1#1", "user-1#2"],
  };

  it("accepts a valid record", () => {
    expect(isAnomalyRecord(record)).toBe(true);
  });

  it("rejects an unknown type", () => {
    expect(isAnomalyRecord({ ...record, type: "Other" })).toBe(false);
  });

  it("rejects non-string related entries", () => {
    expect(isAnomalyRecord({ ...record, relatedEntries: [1] })).toBe(false);
  });
});

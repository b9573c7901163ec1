import { describe, it, expect } from "vitest";
import { fingerprintReport, hashCanonical } from "../src/fingerprint.js";

describe("hashCanonical", () => {
  it("hashes the RFC 8785 form regardless of key order", () => {
    const expected = "5b71bebbe6b3c09ca542ef17e30971a66ce4bd625875f2d4bb4dc9ed3271197a";
    expect(hashCanonical({ b: [1, true, null], a: "x" })).toBe(expected);
    expect(hashCanonical({ a: "x", b: [1, true, null] })).toBe(expected);
  });
});

describe("fingerprintReport", () => {
  const triage = { received: 0, accepted: 0, rejected: 0, byReason: {}, failures: [] };

  it("equals the hash of ledger, anomalies and triage", () => {
    expect(fingerprintReport({ ledger: [], anomalies: [], triage })).toBe(
      hashCanonical({ ledger: [], anomalies: [], triage }),
    );
  });

  it("depends on the triage", () => {
    expect(fingerprintReport({ ledger: [], anomalies: [], triage })).not.toBe(
      fingerprintReport({ ledger: [], anomalies: [], triage: { ...triage, received: 1 } }),
    );
  });

  it("hashes failures without their raw record", () => {
    const failure = {
      recordIndex: 0,
      reason: "INVALID_FIELD" as const,
      field: "amount",
      message: 'Field "amount" must be a string, number, boolean or null',
    };
    const withBigint = { ...triage, rejected: 1, failures: [{ ...failure, record: { amount: 1n } }] };
    const withText = { ...triage, rejected: 1, failures: [{ ...failure, record: "anything" }] };
    expect(fingerprintReport({ ledger: [], anomalies: [], triage: withBigint })).toBe(
      fingerprintReport({ ledger: [], anomalies: [], triage: withText }),
    );
  });
});

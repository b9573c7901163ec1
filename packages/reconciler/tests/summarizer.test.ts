/**
 * Tests for the reconciliation summarizer.
 */

import { describe, it, expect } from "vitest";
import { buildLedger, CurrencyRoundingTable } from "@tally/ledger";
import { summarize } from "../src/summarizer.js";
import { evt } from "./helpers.js";

const ledger = buildLedger(
  [
    evt({ userId: "u1", id: "a", amount: "-10.00", loggedPriorBalance: "100.00", loggedNewBalance: "90.00" }),
    evt({
      userId: "u1",
      id: "b",
      timestamp: "2026-03-02T10:05:00.000Z",
      amount: "5.00",
      action: "CREDIT",
      direction: "credit",
      source: "ADMIN",
    }),
    evt({ userId: "u2", id: "c", amount: "-3.00" }),
  ],
  { tolerance: "0.005", roundingTable: new CurrencyRoundingTable() },
);

describe("summarize", () => {
  const summary = summarize(ledger);

  it("computes exact totals", () => {
    expect(summary.totals).toEqual({
      transactions: 3,
      users: 2,
      totalDebit: "13.00",
      totalCredit: "5.00",
      net: "-8.00",
      mismatches: 0,
      continuityBreaks: 0,
      overdrafts: 1,
    });
  });

  it("summarizes each user in id order", () => {
    expect(summary.byUser).toEqual([
      {
        userId: "u1",
        transactions: 2,
        totalDebit: "10.00",
        totalCredit: "5.00",
        net: "-5.00",
        overdrafts: 0,
        mismatches: 0,
        continuityBreaks: 0,
        openingBalance: "100.00",
        finalBalance: "95.00",
        currencies: ["USD"],
      },
      {
        userId: "u2",
        transactions: 1,
        totalDebit: "3.00",
        totalCredit: "0",
        net: "-3.00",
        overdrafts: 1,
        mismatches: 0,
        continuityBreaks: 0,
        openingBalance: "0.00",
        finalBalance: "-3.00",
        currencies: ["USD"],
      },
    ]);
  });

  it("groups by source and direction", () => {
    expect(summary.bySource).toEqual([
      { source: "ADMIN", direction: "credit", transactions: 1, total: "5.00" },
      { source: "APP", direction: "debit", transactions: 2, total: "13.00" },
    ]);
  });

  it("lists overdrawn entries", () => {
    expect(summary.overdrafts).toEqual([
      {
        key: "u2#1",
        timestamp: "2026-03-02T10:00:00.000Z",
        userId: "u2",
        id: "c",
        overdraftKind: "BOTH",
        expectedNewBalance: "-3.00",
        actualNewBalance: "-3.00",
      },
    ]);
  });

  it("projects every row in ledger order", () => {
    expect(summary.reconciliationView.map((r) => r.id)).toEqual(["a", "b", "c"]);
    expect(summary.reconciliationView[0]).toEqual({
      timestamp: "2026-03-02T10:00:00.000Z",
      userId: "u1",
      id: "a",
      direction: "debit",
      source: "APP",
      action: "DEDUCT",
      currency: "USD",
      priorBalance: "100.00",
      amount: "-10.00",
      actualNewBalance: "90.00",
      expectedNewBalance: "90.00",
      mismatch: false,
      continuityBreak: false,
      overdraftKind: "NONE",
      suggestedAdjustment: null,
    });
  });

  it("handles an empty ledger", () => {
    expect(summarize([]).totals).toEqual({
      transactions: 0,
      users: 0,
      totalDebit: "0",
      totalCredit: "0",
      net: "0",
      mismatches: 0,
      continuityBreaks: 0,
      overdrafts: 0,
    });
  });
});

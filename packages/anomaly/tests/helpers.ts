import type { LedgerEntry, TransactionEvent } from "@tally/types";
import { buildLedger, CurrencyRoundingTable } from "@tally/ledger";

/** Event on Monday 2026-03-02, 10:00 UTC unless overridden. */
export function evt(overrides: Partial<TransactionEvent> = {}): TransactionEvent {
  const timestamp = overrides.timestamp ?? "2026-03-02T10:00:00.000Z";
  return {
    userId: "user-1",
    id: "tx-1",
    messageId: "",
    action: "DEDUCT",
    rawAction: "DEDUCT",
    direction: "debit",
    amount: "-1.00",
    currency: "USD",
    source: "APP",
    recordIndex: 0,
    ...overrides,
    timestamp,
    epochMs: Date.parse(timestamp),
  };
}

const table = new CurrencyRoundingTable();

export function ledgerOf(events: readonly TransactionEvent[]): readonly LedgerEntry[] {
  return buildLedger(events, { tolerance: "0.005", roundingTable: table });
}

/**
 * Ledger Types
 *
 * Reconciled ledger rows: one per TransactionEvent, expected vs. actual
 * balances plus the flags derived from them.
 *
 * Rules:
 * - Rows are created once by the ledger builder and never mutated
 * - Balances are decimal strings at the currency's decimal places
 * - Anomaly back-references live on a separate annotated copy
 */

import type { TransactionEvent } from "./transaction.js";

/** Rounding applied when a balance is reduced to a currency's decimal places. */
export type RoundingMode = "HALF_UP" | "HALF_EVEN" | "DOWN";

/**
 * How a currency's balances are rounded.
 */
export interface CurrencyRoundingRule {
  readonly currency: string;
  readonly decimalPlaces: number;
  readonly roundingMode: RoundingMode;
}

/**
 * Which side of the comparison went below zero.
 *
 * - EXPECTED: only the computed balance is negative
 * - ACTUAL:   only the logged balance is negative
 * - BOTH:     both are negative
 */
export type OverdraftKind = "NONE" | "EXPECTED" | "ACTUAL" | "BOTH";

/**
 * Where an entry's prior balance came from.
 *
 * - logged:       the log block reported it
 * - carried:      previous entry's actual balance for the same user
 * - derived:      first entry only, logged new balance minus the amount
 * - assumed-zero: first entry with neither balance logged
 */
export type PriorBalanceSource = "logged" | "carried" | "derived" | "assumed-zero";

/** Where an entry's actual balance came from. */
export type ActualBalanceSource = "logged" | "expected";

/**
 * One reconciled transaction row.
 */
export interface LedgerEntry {
  /** Stable reference `${userId}#${sequence}`, unique across the ledger */
  readonly key: string;

  /** 1-based position within the user's ordered sequence */
  readonly sequence: number;

  readonly event: TransactionEvent;

  readonly roundingRule: CurrencyRoundingRule;

  /** False when the rounding table fell back to its default rule */
  readonly currencyResolved: boolean;

  readonly priorBalance: string;
  readonly priorBalanceSource: PriorBalanceSource;

  readonly expectedNewBalance: string;
  readonly actualNewBalance: string;
  readonly actualBalanceSource: ActualBalanceSource;

  /** |actual − expected| > tolerance */
  readonly mismatch: boolean;

  /** Signed actual − expected */
  readonly mismatchDelta: string;

  /** Negation of `mismatch`, kept for report readers */
  readonly withinTolerance: boolean;

  readonly overdraftKind: OverdraftKind;

  /** Prior balance disagrees with the previous entry's actual balance */
  readonly continuityBreak: boolean;

  /** Signed prior − previous actual; null for the first entry or a carried prior */
  readonly continuityDelta: string | null;

  /** expected − actual when mismatched, otherwise null */
  readonly suggestedAdjustment: string | null;
}

/**
 * A ledger row with the ids of the anomalies that reference it.
 */
export interface AnnotatedLedgerEntry extends LedgerEntry {
  readonly anomalyIds: readonly string[];
}

/**
 * @tally/ledger: Ledger builder.
 *
 * Folds normalized transaction events into reconciled ledger rows:
 * expected vs. actual balance, mismatch, overdraft and continuity flags,
 * and the adjustment an accountant would post.
 *
 * Algorithm:
 * 1. Partition events by userId
 * 2. Order each partition by (timestamp, id, messageId)
 * 3. Fold left over the partition with a running balance
 * 4. Concatenate partitions in ascending userId order
 *
 * Rules:
 * - Entry n is computed only after entries 1..n−1 of the same user
 * - Partitions share no state and can be built independently
 * - Every event yields exactly one entry; unknown currencies use the fallback rule
 */

import type {
  LedgerEntry,
  OverdraftKind,
  PriorBalanceSource,
  TransactionEvent,
} from "@tally/types";
import type { CurrencyRoundingTable } from "./currency-table.js";
import {
  addDecimals,
  canonicalDecimal,
  compareDecimals,
  exceedsTolerance,
  isNegativeDecimal,
  padDecimal,
  roundDecimal,
  subtractDecimals,
  zeroDecimal,
} from "./decimal-math.js";
import { LedgerError } from "./types.js";

// =============================================================================
// Configuration
// =============================================================================

export interface LedgerBuildConfig {
  /** Absolute tolerance as a decimal string (e.g. "0.005") */
  readonly tolerance: string;
  readonly roundingTable: CurrencyRoundingTable;
}

// =============================================================================
// Ordering
// =============================================================================

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Canonical order of a user's events: timestamp, then id, then messageId.
 * Strings compare by UTF-16 code units so the order never depends on locale.
 */
export function compareEvents(a: TransactionEvent, b: TransactionEvent): number {
  if (a.epochMs !== b.epochMs) return a.epochMs < b.epochMs ? -1 : 1;
  return compareText(a.id, b.id) || compareText(a.messageId, b.messageId);
}

/**
 * Group events by user, each group in canonical order.
 * The returned map iterates users in ascending userId order.
 */
export function partitionByUser(
  events: readonly TransactionEvent[],
): ReadonlyMap<string, readonly TransactionEvent[]> {
  const groups = new Map<string, TransactionEvent[]>();
  for (const event of events) {
    const group = groups.get(event.userId) ?? [];
    group.push(event);
    groups.set(event.userId, group);
  }

  const ordered = new Map<string, readonly TransactionEvent[]>();
  for (const userId of [...groups.keys()].sort(compareText)) {
    const group = groups.get(userId) ?? [];
    ordered.set(userId, [...group].sort(compareEvents));
  }
  return ordered;
}

// =============================================================================
// Row derivation
// =============================================================================

function overdraftKind(expected: string, actual: string): OverdraftKind {
  const expectedNegative = isNegativeDecimal(expected);
  const actualNegative = isNegativeDecimal(actual);
  if (expectedNegative && actualNegative) return "BOTH";
  if (expectedNegative) return "EXPECTED";
  if (actualNegative) return "ACTUAL";
  return "NONE";
}

/**
 * Fold one user's ordered events into ledger entries.
 */
export function foldUserSequence(
  userId: string,
  events: readonly TransactionEvent[],
  config: LedgerBuildConfig,
): readonly LedgerEntry[] {
  const entries: LedgerEntry[] = [];
  let previous: LedgerEntry | undefined;

  for (const event of events) {
    const { rule, resolved } = config.roundingTable.resolve(event.currency);
    const { decimalPlaces, roundingMode } = rule;

    const loggedActual = event.loggedNewBalance === undefined
      ? undefined
      : roundDecimal(event.loggedNewBalance, decimalPlaces, roundingMode);

    let priorBalance: string;
    let priorBalanceSource: PriorBalanceSource;
    if (event.loggedPriorBalance !== undefined) {
      priorBalance = padDecimal(event.loggedPriorBalance, decimalPlaces);
      priorBalanceSource = "logged";
    } else if (previous !== undefined) {
      priorBalance = previous.actualNewBalance;
      priorBalanceSource = "carried";
    } else if (loggedActual !== undefined) {
      priorBalance = padDecimal(subtractDecimals(loggedActual, event.amount), decimalPlaces);
      priorBalanceSource = "derived";
    } else {
      priorBalance = zeroDecimal(decimalPlaces);
      priorBalanceSource = "assumed-zero";
    }

    const expectedNewBalance = roundDecimal(
      addDecimals(priorBalance, event.amount),
      decimalPlaces,
      roundingMode,
    );
    const actualNewBalance = loggedActual ?? expectedNewBalance;

    const mismatchDelta = subtractDecimals(actualNewBalance, expectedNewBalance);
    const mismatch = exceedsTolerance(actualNewBalance, expectedNewBalance, config.tolerance);

    let continuityDelta: string | null = null;
    let continuityBreak = false;
    if (priorBalanceSource === "logged" && previous !== undefined) {
      continuityDelta = subtractDecimals(priorBalance, previous.actualNewBalance);
      continuityBreak = exceedsTolerance(priorBalance, previous.actualNewBalance, config.tolerance);
    }

    const sequence = entries.length + 1;
    const entry: LedgerEntry = {
      key: `${userId}#${String(sequence)}`,
      sequence,
      event,
      roundingRule: rule,
      currencyResolved: resolved,
      priorBalance,
      priorBalanceSource,
      expectedNewBalance,
      actualNewBalance,
      actualBalanceSource: loggedActual === undefined ? "expected" : "logged",
      mismatch,
      mismatchDelta,
      withinTolerance: !mismatch,
      overdraftKind: overdraftKind(expectedNewBalance, actualNewBalance),
      continuityBreak,
      continuityDelta,
      suggestedAdjustment: mismatch
        ? subtractDecimals(expectedNewBalance, actualNewBalance)
        : null,
    };

    entries.push(entry);
    previous = entry;
  }

  return entries;
}

/**
 * Validate a tolerance string: a non-negative decimal.
 * Returns it in canonical form.
 */
export function validateTolerance(tolerance: string): string {
  let canonical: string;
  try {
    canonical = canonicalDecimal(tolerance);
  } catch (err) {
    throw new LedgerError(
      "COMPUTATION_INCONSISTENCY",
      `Tolerance must be a decimal number, got: "${tolerance}" (${err instanceof Error ? err.message : String(err)})`,
    );
  }
  if (compareDecimals(canonical, "0") < 0) {
    throw new LedgerError(
      "COMPUTATION_INCONSISTENCY",
      `Tolerance must not be negative, got: ${canonical}`,
    );
  }
  return canonical;
}

/**
 * Build the full ledger: one entry per event, grouped by user.
 */
export function buildLedger(
  events: readonly TransactionEvent[],
  config: LedgerBuildConfig,
): readonly LedgerEntry[] {
  const resolved: LedgerBuildConfig = {
    tolerance: validateTolerance(config.tolerance),
    roundingTable: config.roundingTable,
  };

  const ledger: LedgerEntry[] = [];
  for (const [userId, sequence] of partitionByUser(events)) {
    ledger.push(...foldUserSequence(userId, sequence, resolved));
  }
  return ledger;
}

// =============================================================================
// Builder
// =============================================================================

/**
 * Ledger builder bound to a validated configuration.
 *
 * Usage:
 *   const builder = new LedgerBuilder({ tolerance: "0.005", roundingTable });
 *   const ledger = builder.build(events);
 */
export class LedgerBuilder {
  private readonly config: LedgerBuildConfig;

  constructor(config: LedgerBuildConfig) {
    this.config = {
      tolerance: validateTolerance(config.tolerance),
      roundingTable: config.roundingTable,
    };
  }

  get tolerance(): string {
    return this.config.tolerance;
  }

  build(events: readonly TransactionEvent[]): readonly LedgerEntry[] {
    return buildLedger(events, this.config);
  }
}

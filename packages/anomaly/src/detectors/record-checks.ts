/**
 * Per-entry checks.
 *
 * Each of these looks at one ledger row in isolation and emits at most one
 * finding for it.
 */

import type { LedgerEntry } from "@tally/types";
import type { AnomalyFinding } from "../types.js";
import { entryFinding } from "./shared.js";

/**
 * Actions the normalizer could not recognize (typos, unknown codes, blanks).
 */
export function detectInvalidActions(ledger: readonly LedgerEntry[]): AnomalyFinding[] {
  const findings: AnomalyFinding[] = [];

  for (const entry of ledger) {
    if (entry.event.action !== "INVALID") continue;
    const raw = entry.event.rawAction;
    findings.push(
      entryFinding(
        "InvalidAction",
        entry,
        raw === ""
          ? `Transaction ${entry.event.id} has no action`
          : `Unrecognized action "${raw}" on transaction ${entry.event.id}`,
        { rawAction: raw },
      ),
    );
  }

  return findings;
}

/**
 * Blank source or action tags.
 */
export function detectMissingFields(ledger: readonly LedgerEntry[]): AnomalyFinding[] {
  const findings: AnomalyFinding[] = [];

  for (const entry of ledger) {
    const missing: string[] = [];
    if (entry.event.source === "") missing.push("source");
    if (entry.event.rawAction === "") missing.push("action");
    if (missing.length === 0) continue;

    findings.push(
      entryFinding(
        "MissingField",
        entry,
        `Transaction ${entry.event.id} is missing ${missing.join(" and ")}`,
        { fields: missing.join(",") },
      ),
    );
  }

  return findings;
}

/**
 * Currencies without a rounding rule; the entry used the fallback precision.
 */
export function detectCurrencyMismatches(ledger: readonly LedgerEntry[]): AnomalyFinding[] {
  const findings: AnomalyFinding[] = [];

  for (const entry of ledger) {
    if (entry.currencyResolved) continue;
    const { currency, decimalPlaces } = entry.roundingRule;
    findings.push(
      entryFinding(
        "CurrencyMismatch",
        entry,
        `Currency "${currency}" has no rounding rule; rounded to ${decimalPlaces} decimal places`,
        { currency, fallbackDecimalPlaces: decimalPlaces },
      ),
    );
  }

  return findings;
}

/**
 * Logged balances that disagree with the recomputed balance.
 */
export function detectBalanceMismatches(ledger: readonly LedgerEntry[]): AnomalyFinding[] {
  const findings: AnomalyFinding[] = [];

  for (const entry of ledger) {
    if (!entry.mismatch) continue;
    findings.push(
      entryFinding(
        "BalanceMismatch",
        entry,
        `Logged balance ${entry.actualNewBalance} differs from expected ${entry.expectedNewBalance} by ${entry.mismatchDelta}`,
        {
          expected: entry.expectedNewBalance,
          actual: entry.actualNewBalance,
          delta: entry.mismatchDelta,
          suggestedAdjustment: entry.suggestedAdjustment,
        },
      ),
    );
  }

  return findings;
}

/**
 * Logged opening balances that do not continue from the previous entry.
 */
export function detectContinuityBreaks(ledger: readonly LedgerEntry[]): AnomalyFinding[] {
  const findings: AnomalyFinding[] = [];

  for (const entry of ledger) {
    if (!entry.continuityBreak) continue;
    findings.push(
      entryFinding(
        "ContinuityBreak",
        entry,
        `Opening balance ${entry.priorBalance} does not continue from the previous balance (off by ${entry.continuityDelta ?? "?"})`,
        { priorBalance: entry.priorBalance, delta: entry.continuityDelta },
      ),
    );
  }

  return findings;
}

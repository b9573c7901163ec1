/**
 * Cross-entry patterns per user: recurring small corrections and
 * currency mixing.
 */

import type { LedgerEntry } from "@tally/types";
import { absDecimal, compareDecimals, isZeroDecimal } from "@tally/ledger";
import { SEVERITY, type AnomalyFinding, type DetectorConfig } from "../types.js";
import { entriesByUser, groupBy, valueKey } from "./shared.js";

/**
 * The same small non-zero correction recurring for one user and currency.
 * Typical of a balance being rounded the wrong way every time.
 */
export function detectRoundingPatterns(
  ledger: readonly LedgerEntry[],
  config: DetectorConfig,
): AnomalyFinding[] {
  const findings: AnomalyFinding[] = [];

  for (const [userId, entries] of entriesByUser(ledger)) {
    const candidates = entries.filter(
      (e) =>
        e.suggestedAdjustment !== null &&
        !isZeroDecimal(e.suggestedAdjustment) &&
        compareDecimals(absDecimal(e.suggestedAdjustment), config.roundingPatternMaxMagnitude) <= 0,
    );

    const groups = groupBy(
      candidates,
      (e) => `${e.event.currency}\u0000${valueKey(e.suggestedAdjustment ?? "0")}`,
    );

    for (const group of groups.values()) {
      const first = group[0];
      if (first === undefined || group.length < config.roundingPatternMinOccurrences) continue;

      const adjustment = valueKey(first.suggestedAdjustment ?? "0");
      const currency = first.event.currency;
      findings.push({
        type: "RoundingPattern",
        subject: { userId },
        severity: SEVERITY.RoundingPattern,
        message: `Adjustment ${adjustment} ${currency} suggested ${group.length} times for user ${userId}`,
        details: { adjustment, currency, occurrences: group.length },
        relatedEntries: group.map((e) => e.key),
      });
    }
  }

  return findings;
}

/**
 * Users whose entries use more than one currency. One finding per user.
 */
export function detectMixedCurrencies(ledger: readonly LedgerEntry[]): AnomalyFinding[] {
  const findings: AnomalyFinding[] = [];

  for (const [userId, entries] of entriesByUser(ledger)) {
    const currencies = [...new Set(entries.map((e) => e.event.currency))].sort();
    if (currencies.length < 2) continue;

    findings.push({
      type: "MixedCurrency",
      subject: { userId },
      severity: SEVERITY.MixedCurrency,
      message: `User ${userId} has transactions in ${currencies.join(", ")}`,
      details: { currencies: currencies.join(",") },
      relatedEntries: entries.map((e) => e.key),
    });
  }

  return findings;
}

/**
 * Timing checks: bursts of activity and transactions outside business hours.
 */

import type { LedgerEntry } from "@tally/types";
import type { AnomalyFinding, DetectorConfig } from "../types.js";
import { entriesByUser, entryFinding } from "./shared.js";

const WEEKDAYS = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"] as const;

/**
 * Entries following the user's previous entry by less than the burst window.
 */
export function detectBursts(
  ledger: readonly LedgerEntry[],
  config: DetectorConfig,
): AnomalyFinding[] {
  const findings: AnomalyFinding[] = [];

  for (const entries of entriesByUser(ledger).values()) {
    entries.forEach((entry, i) => {
      const previous = i > 0 ? entries[i - 1] : undefined;
      if (previous === undefined) return;

      const gapMs = entry.event.epochMs - previous.event.epochMs;
      if (gapMs >= config.burstWindowMs) return;

      findings.push({
        ...entryFinding(
          "Burst",
          entry,
          `Transaction ${entry.event.id} followed ${previous.event.id} after ${gapMs} ms`,
          { gapMs, windowMs: config.burstWindowMs, previousTransactionId: previous.event.id },
        ),
        relatedEntries: [previous.key, entry.key],
      });
    });
  }

  return findings;
}

/**
 * Entries whose local time falls outside business hours or on a weekend day.
 */
export function detectAfterHours(
  ledger: readonly LedgerEntry[],
  config: DetectorConfig,
): AnomalyFinding[] {
  const { startHour, endHour, utcOffsetMinutes, weekendDays } = config.businessHours;
  const findings: AnomalyFinding[] = [];

  for (const entry of ledger) {
    const local = new Date(entry.event.epochMs + utcOffsetMinutes * 60_000);
    const hour = local.getUTCHours();
    const weekday = local.getUTCDay();

    const weekend = weekendDays.includes(weekday);
    const offHours = hour < startHour || hour >= endHour;
    if (!weekend && !offHours) continue;

    const day = WEEKDAYS[weekday] ?? String(weekday);
    findings.push(
      entryFinding(
        "AfterHours",
        entry,
        weekend
          ? `Transaction ${entry.event.id} at ${day} ${hour}:00 local falls on a weekend`
          : `Transaction ${entry.event.id} at ${hour}:00 local is outside ${startHour}:00-${endHour}:00`,
        { localHour: hour, weekday, weekend },
      ),
    );
  }

  return findings;
}

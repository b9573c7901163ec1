/**
 * Engine configuration.
 *
 * Every tunable of a reconciliation run, validated with Zod. Defaults match
 * the subscription ledger this engine was built for: SAR at 3 places,
 * BHD at 4, other ISO 4217 codes at their minor unit, with a 0.005
 * tolerance.
 *
 * Invalid configuration is fatal and is reported before any ledger is built.
 */

import { z } from "zod";
import { ANOMALY_KINDS, ROUNDING_MODES } from "@tally/types";
import { CurrencyRoundingTable, LedgerError, MAX_DECIMAL_PLACES } from "@tally/ledger";
import type { DetectorConfig } from "@tally/anomaly";
import { expandExponent } from "@tally/intake";

// =============================================================================
// Schema
// =============================================================================

const NON_NEGATIVE_DECIMAL = /^\d+(\.\d+)?$/;

/** Number text without exponent notation: 1e-7 becomes "0.0000001". */
function numberText(value: number): string {
  const text = String(value);
  return expandExponent(text) ?? text;
}

/** A non-negative decimal, given as text or as a JSON number. */
const DecimalText = z
  .union([z.string(), z.number()])
  .transform((v) => (typeof v === "number" ? numberText(v) : v.trim()))
  .pipe(z.string().regex(NON_NEGATIVE_DECIMAL, "Must be a non-negative decimal number"));

const DecimalPlaces = z.number().int().min(0).max(MAX_DECIMAL_PLACES);

export const BusinessHoursSchema = z
  .object({
    startHour: z.number().int().min(0).max(23).default(8),
    endHour: z.number().int().min(1).max(24).default(18),
    utcOffsetMinutes: z.number().int().min(-840).max(840).default(0),
    weekendDays: z.array(z.number().int().min(0).max(6)).default([0, 6]),
  })
  .strict()
  .refine((h) => h.startHour < h.endHour, {
    message: "startHour must be before endHour",
    path: ["endHour"],
  });

export const EngineConfigSchema = z
  .object({
    tolerance: DecimalText.default("0.005"),
    defaultDecimals: DecimalPlaces.default(2),
    currencyRoundingOverrides: z.record(z.string().trim().min(1), DecimalPlaces).default({}),
    roundingMode: z.enum(ROUNDING_MODES).default("HALF_UP"),
    madThreshold: z.number().positive().default(6),
    burstWindowMs: z.number().int().min(0).default(1_000),
    rapidRepeatWindowMs: z.number().int().min(0).default(60_000),
    businessHours: BusinessHoursSchema.default({}),
    roundingPatternMinOccurrences: z.number().int().min(2).default(3),
    roundingPatternMaxMagnitude: DecimalText.default("0.1"),
    detectors: z.array(z.enum(ANOMALY_KINDS)).default([...ANOMALY_KINDS]),
  })
  .strict();

export type EngineConfig = z.output<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

// =============================================================================
// Resolution
// =============================================================================

/**
 * Validate a (partial) configuration and fill in defaults.
 *
 * @throws {LedgerError} COMPUTATION_INCONSISTENCY listing every invalid path
 */
export function resolveEngineConfig(input: unknown = {}): EngineConfig {
  const result = EngineConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new LedgerError("COMPUTATION_INCONSISTENCY", `Invalid engine configuration: ${problems}`);
  }
  return result.data;
}

/**
 * Overlay per-run settings on a base configuration. Nested business hours
 * merge field by field.
 */
export function mergeEngineConfig(base: EngineConfigInput, override: unknown): EngineConfig {
  if (override === undefined || override === null) {
    return resolveEngineConfig(base);
  }
  if (typeof override !== "object" || Array.isArray(override)) {
    return resolveEngineConfig(override);
  }

  const patch: Record<string, unknown> = { ...override };
  const hours = patch["businessHours"];
  if (typeof hours === "object" && hours !== null && !Array.isArray(hours)) {
    patch["businessHours"] = { ...base.businessHours, ...hours };
  }
  return resolveEngineConfig({ ...base, ...patch });
}

export function buildRoundingTable(config: EngineConfig): CurrencyRoundingTable {
  return new CurrencyRoundingTable({
    defaultDecimals: config.defaultDecimals,
    overrides: config.currencyRoundingOverrides,
    roundingMode: config.roundingMode,
  });
}

export function toDetectorConfig(config: EngineConfig): DetectorConfig {
  return {
    madThreshold: config.madThreshold,
    burstWindowMs: config.burstWindowMs,
    rapidRepeatWindowMs: config.rapidRepeatWindowMs,
    businessHours: config.businessHours,
    roundingPatternMinOccurrences: config.roundingPatternMinOccurrences,
    roundingPatternMaxMagnitude: config.roundingPatternMaxMagnitude,
  };
}

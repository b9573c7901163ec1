/**
 * @tally/node: Configuration.
 *
 * Loads and validates configuration from environment variables using Zod,
 * then maps the engine settings onto the reconciler's input shape.
 */

import { z } from "zod";
import { ROUNDING_MODES } from "@tally/types";
import type { EngineConfigInput } from "@tally/reconciler";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Rounding
  TOLERANCE: z.string().default("0.005"),
  DEFAULT_DECIMALS: z.coerce.number().int().min(0).max(18).default(2),
  CURRENCY_DECIMALS: z.string().default(""),
  ROUNDING_MODE: z.enum(ROUNDING_MODES).default("HALF_UP"),

  // Detectors
  MAD_THRESHOLD: z.coerce.number().positive().default(6),
  BURST_WINDOW_MS: z.coerce.number().int().min(0).default(1000),
  RAPID_REPEAT_WINDOW_MS: z.coerce.number().int().min(0).default(60000),

  // Business hours
  BUSINESS_HOURS: z.string().default("08-18"),
  BUSINESS_UTC_OFFSET_MINUTES: z.coerce.number().int().min(-840).max(840).default(0),
  WEEKEND_DAYS: z.string().default("0,6"),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Value Parsing
// =============================================================================

/**
 * Parse the CURRENCY_DECIMALS env var into per-currency decimal places.
 *
 * Format: "SAR:3,BHD:4"
 */
export function parseCurrencyDecimals(raw: string): Readonly<Record<string, number>> {
  if (raw.trim() === "") {
    return {};
  }

  const decimals: Record<string, number> = {};

  for (const entry of raw.split(",")) {
    const [code, places, ...rest] = entry.trim().split(":");
    if (code === undefined || places === undefined || rest.length > 0) {
      throw new Error(
        `Invalid CURRENCY_DECIMALS entry: "${entry.trim()}". Expected format: CODE:places`,
      );
    }

    const currency = code.trim().toUpperCase();
    if (currency === "") {
      throw new Error("Currency code cannot be empty in CURRENCY_DECIMALS");
    }
    if (!/^\d+$/.test(places.trim())) {
      throw new Error(`Invalid decimal places "${places}" for ${currency} in CURRENCY_DECIMALS`);
    }

    decimals[currency] = Number(places.trim());
  }

  return decimals;
}

export interface ParsedBusinessHours {
  readonly startHour: number;
  readonly endHour: number;
}

/**
 * Parse the BUSINESS_HOURS env var.
 *
 * Format: "08-18" (start hour inclusive, end hour exclusive)
 */
export function parseBusinessHours(raw: string): ParsedBusinessHours {
  const match = /^(\d{1,2})-(\d{1,2})$/.exec(raw.trim());
  if (match === null || match[1] === undefined || match[2] === undefined) {
    throw new Error(`Invalid BUSINESS_HOURS: "${raw}". Expected format: HH-HH`);
  }
  return { startHour: Number(match[1]), endHour: Number(match[2]) };
}

/**
 * Parse the WEEKEND_DAYS env var into weekday numbers (0 = Sunday).
 *
 * Format: "0,6"; an empty value means no weekend.
 */
export function parseWeekendDays(raw: string): readonly number[] {
  if (raw.trim() === "") {
    return [];
  }

  return raw.split(",").map((entry) => {
    const day = entry.trim();
    if (!/^[0-6]$/.test(day)) {
      throw new Error(`Invalid WEEKEND_DAYS entry: "${day}". Expected a weekday from 0 to 6`);
    }
    return Number(day);
  });
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

/**
 * Engine settings from the environment. Range checks happen when the
 * reconciler resolves them.
 */
export function toEngineConfig(config: AppConfig): EngineConfigInput {
  return {
    tolerance: config.TOLERANCE,
    defaultDecimals: config.DEFAULT_DECIMALS,
    currencyRoundingOverrides: parseCurrencyDecimals(config.CURRENCY_DECIMALS),
    roundingMode: config.ROUNDING_MODE,
    madThreshold: config.MAD_THRESHOLD,
    burstWindowMs: config.BURST_WINDOW_MS,
    rapidRepeatWindowMs: config.RAPID_REPEAT_WINDOW_MS,
    businessHours: {
      ...parseBusinessHours(config.BUSINESS_HOURS),
      utcOffsetMinutes: config.BUSINESS_UTC_OFFSET_MINUTES,
      weekendDays: [...parseWeekendDays(config.WEEKEND_DAYS)],
    },
  };
}

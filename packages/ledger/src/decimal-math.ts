/**
 * @tally/ledger: Deterministic decimal arithmetic.
 *
 * All arithmetic uses bigint internally for precision.
 * Decimal strings are converted to/from a scaled bigint whose scale is
 * the number of fractional digits written, so no digit is ever lost.
 *
 * Rules:
 * - No floating-point operations
 * - Amounts must be plain decimal strings ("-12.50", "7")
 * - Results of add/subtract carry the larger scale of their operands
 * - Zero runtime dependencies
 */

import type { RoundingMode } from "@tally/types";
import { LedgerError } from "./types.js";
import type { Decimal } from "./types.js";

const DECIMAL_RE = /^-?\d+(\.\d+)?$/;

// ─── Internal Helpers ────────────────────────────────────────────────────

function pow10(exp: number): bigint {
  return 10n ** BigInt(exp);
}

/** Raise a decimal to a larger scale without changing its value. */
function widen(value: Decimal, scale: number): Decimal {
  if (scale <= value.scale) return value;
  return { units: value.units * pow10(scale - value.scale), scale };
}

/** Bring two decimals to a common scale. */
function align(a: Decimal, b: Decimal): [bigint, bigint, number] {
  const scale = Math.max(a.scale, b.scale);
  return [widen(a, scale).units, widen(b, scale).units, scale];
}

/**
 * Parse a decimal string into a scaled bigint.
 *
 * "100.50" → { units: 10050n, scale: 2 }
 * "-7"     → { units: -7n, scale: 0 }
 */
export function parseDecimal(text: string): Decimal {
  if (typeof text !== "string" || text.trim() === "") {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount: "${String(text)}"`);
  }

  const trimmed = text.trim();

  if (!DECIMAL_RE.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const [intPart = "0", fracPart = ""] = abs.split(".");
  const value = BigInt(intPart + fracPart);

  return { units: negative ? -value : value, scale: fracPart.length };
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * { units: 10050n, scale: 2 } → "100.50"
 * { units: -5n, scale: 3 }    → "-0.005"
 */
export function formatDecimal(value: Decimal): string {
  const { units, scale } = value;
  if (scale === 0) {
    return units.toString();
  }

  const negative = units < 0n;
  const abs = negative ? -units : units;
  const str = abs.toString().padStart(scale + 1, "0");
  const intPart = str.slice(0, str.length - scale);
  const fracPart = str.slice(str.length - scale);
  const result = `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}

/**
 * Reduce (or extend) a decimal to exactly `places` fractional digits.
 *
 * HALF_UP rounds ties away from zero, HALF_EVEN to the even neighbour,
 * DOWN truncates toward zero.
 */
export function rescale(value: Decimal, places: number, mode: RoundingMode): Decimal {
  if (!Number.isInteger(places) || places < 0) {
    throw new LedgerError(
      "INVALID_DECIMAL_PLACES",
      `Decimal places must be a non-negative integer, got: ${String(places)}`,
    );
  }
  if (places >= value.scale) {
    return widen(value, places);
  }

  const factor = pow10(value.scale - places);
  const quotient = value.units / factor;
  const remainder = value.units % factor;
  if (remainder === 0n || mode === "DOWN") {
    return { units: quotient, scale: places };
  }

  const step = value.units < 0n ? -1n : 1n;
  const twice = (remainder < 0n ? -remainder : remainder) * 2n;

  let roundAway: boolean;
  if (mode === "HALF_UP") {
    roundAway = twice >= factor;
  } else {
    roundAway = twice > factor || (twice === factor && quotient % 2n !== 0n);
  }

  return { units: roundAway ? quotient + step : quotient, scale: places };
}

// ─── Public API ──────────────────────────────────────────────────────────

/**
 * Round a decimal string to `places` fractional digits.
 *
 * roundDecimal("74.9995", 3, "HALF_UP") → "75.000"
 */
export function roundDecimal(text: string, places: number, mode: RoundingMode): string {
  return formatDecimal(rescale(parseDecimal(text), places, mode));
}

/**
 * Pad a decimal string to at least `places` fractional digits.
 * Never removes digits.
 */
export function padDecimal(text: string, places: number): string {
  return formatDecimal(widen(parseDecimal(text), places));
}

/**
 * Re-format a decimal string in canonical form ("+1.50", "01.5" → "1.5").
 */
export function canonicalDecimal(text: string): string {
  return formatDecimal(parseDecimal(text));
}

/** Add two decimal strings. */
export function addDecimals(a: string, b: string): string {
  const [ua, ub, scale] = align(parseDecimal(a), parseDecimal(b));
  return formatDecimal({ units: ua + ub, scale });
}

/** Subtract b from a. */
export function subtractDecimals(a: string, b: string): string {
  const [ua, ub, scale] = align(parseDecimal(a), parseDecimal(b));
  return formatDecimal({ units: ua - ub, scale });
}

/** Sum a list of decimal strings; "0" for an empty list. */
export function sumDecimals(values: readonly string[]): string {
  let total: Decimal = { units: 0n, scale: 0 };
  for (const value of values) {
    const [ut, uv, scale] = align(total, parseDecimal(value));
    total = { units: ut + uv, scale };
  }
  return formatDecimal(total);
}

/** Compare two decimal strings. Returns -1, 0, or 1. */
export function compareDecimals(a: string, b: string): -1 | 0 | 1 {
  const [ua, ub] = align(parseDecimal(a), parseDecimal(b));
  if (ua < ub) return -1;
  if (ua > ub) return 1;
  return 0;
}

/** Absolute value of a decimal string. */
export function absDecimal(text: string): string {
  const value = parseDecimal(text);
  return formatDecimal(value.units < 0n ? { units: -value.units, scale: value.scale } : value);
}

/** Negate a decimal string. */
export function negateDecimal(text: string): string {
  const value = parseDecimal(text);
  return formatDecimal({ units: -value.units, scale: value.scale });
}

/** Check if a decimal string is negative (< 0). */
export function isNegativeDecimal(text: string): boolean {
  return parseDecimal(text).units < 0n;
}

/** Check if a decimal string is zero. */
export function isZeroDecimal(text: string): boolean {
  return parseDecimal(text).units === 0n;
}

/** Zero at the given scale ("0.000" for 3). */
export function zeroDecimal(places: number): string {
  return formatDecimal({ units: 0n, scale: places });
}

/**
 * |a − b| > tolerance. Equality with the tolerance is within tolerance.
 */
export function exceedsTolerance(a: string, b: string, tolerance: string): boolean {
  return compareDecimals(absDecimal(subtractDecimals(a, b)), tolerance) > 0;
}

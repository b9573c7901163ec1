/**
 * @tally/ledger: Currency rounding table.
 *
 * Maps a currency code to its decimal precision and rounding mode.
 * Currencies with an explicit rule use it; other ISO 4217 codes use their
 * ISO minor unit. Anything else resolves to the default rule and is
 * reported as unresolved, so the caller can surface the fallback instead
 * of hiding it.
 *
 * Rules:
 * - Immutable after construction
 * - Lookups are case-insensitive; rules carry upper-case codes
 * - Invalid decimal places are rejected at construction
 */

import { readFileSync } from "node:fs";
import type { CurrencyRoundingRule, RoundingMode } from "@tally/types";
import { LedgerError } from "./types.js";
import type { CurrencyResolution } from "./types.js";

/** Currencies whose minor unit differs from the default. */
export const DEFAULT_CURRENCY_DECIMALS: Readonly<Record<string, number>> = {
  SAR: 3,
  BHD: 4,
} as const;

export const DEFAULT_DECIMALS = 2;

/** Highest precision the table accepts. */
export const MAX_DECIMAL_PLACES = 18;

const ISO_MINOR_UNITS_FILE = new URL("../data/iso4217-minor-units.json", import.meta.url);

function loadIsoMinorUnits(): Readonly<Record<string, number>> {
  const parsed: unknown = JSON.parse(readFileSync(ISO_MINOR_UNITS_FILE, "utf8"));
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error(`${ISO_MINOR_UNITS_FILE.pathname} must map currency codes to minor units`);
  }
  const units: Record<string, number> = {};
  for (const [code, places] of Object.entries(parsed)) {
    if (typeof places !== "number" || !Number.isInteger(places) || places < 0) {
      throw new Error(`${ISO_MINOR_UNITS_FILE.pathname}: invalid minor unit for ${code}`);
    }
    units[code] = places;
  }
  return units;
}

/**
 * Minor units of the active ISO 4217 codes. Funds and metals without a
 * minor unit (XAU, XDR, ...) are not listed.
 */
export const ISO_4217_MINOR_UNITS: Readonly<Record<string, number>> = loadIsoMinorUnits();

export interface CurrencyTableOptions {
  /** Decimal places for unknown currencies. Default: 2 */
  readonly defaultDecimals?: number | undefined;
  /** Per-currency decimal places, merged over DEFAULT_CURRENCY_DECIMALS */
  readonly overrides?: Readonly<Record<string, number>> | undefined;
  /** Rounding mode for every rule. Default: HALF_UP */
  readonly roundingMode?: RoundingMode | undefined;
  /** Codes that resolve at their own minor unit. Default: ISO_4217_MINOR_UNITS */
  readonly minorUnits?: Readonly<Record<string, number>> | undefined;
}

function assertDecimalPlaces(label: string, places: number): void {
  if (!Number.isInteger(places) || places < 0 || places > MAX_DECIMAL_PLACES) {
    throw new LedgerError(
      "COMPUTATION_INCONSISTENCY",
      `${label} must be an integer between 0 and ${String(MAX_DECIMAL_PLACES)}, got: ${String(places)}`,
    );
  }
}

export class CurrencyRoundingTable {
  readonly defaultDecimals: number;
  readonly roundingMode: RoundingMode;
  private readonly rules: ReadonlyMap<string, CurrencyRoundingRule>;
  private readonly minorUnits: ReadonlyMap<string, number>;

  constructor(options: CurrencyTableOptions = {}) {
    const defaultDecimals = options.defaultDecimals ?? DEFAULT_DECIMALS;
    assertDecimalPlaces("defaultDecimals", defaultDecimals);

    this.defaultDecimals = defaultDecimals;
    this.roundingMode = options.roundingMode ?? "HALF_UP";

    const merged: Record<string, number> = { ...DEFAULT_CURRENCY_DECIMALS };
    for (const [code, places] of Object.entries(options.overrides ?? {})) {
      const currency = code.trim().toUpperCase();
      if (currency === "") {
        throw new LedgerError("COMPUTATION_INCONSISTENCY", "Currency override has an empty code");
      }
      assertDecimalPlaces(`Decimal places for ${currency}`, places);
      merged[currency] = places;
    }

    const rules = new Map<string, CurrencyRoundingRule>();
    for (const currency of Object.keys(merged).sort()) {
      const decimalPlaces = merged[currency] ?? defaultDecimals;
      rules.set(currency, { currency, decimalPlaces, roundingMode: this.roundingMode });
    }
    this.rules = rules;

    const minorUnits = new Map<string, number>();
    for (const [code, places] of Object.entries(options.minorUnits ?? ISO_4217_MINOR_UNITS)) {
      assertDecimalPlaces(`Minor unit of ${code}`, places);
      minorUnits.set(code.trim().toUpperCase(), places);
    }
    this.minorUnits = minorUnits;
  }

  /**
   * Look up a currency, reporting whether the fallback rule was used.
   */
  resolve(currency: string): CurrencyResolution {
    const code = currency.trim().toUpperCase();
    const known = this.rules.get(code);
    if (known !== undefined) {
      return { rule: known, resolved: true };
    }
    const minorUnit = this.minorUnits.get(code);
    if (minorUnit !== undefined) {
      return {
        rule: { currency: code, decimalPlaces: minorUnit, roundingMode: this.roundingMode },
        resolved: true,
      };
    }
    return {
      rule: { currency: code, decimalPlaces: this.defaultDecimals, roundingMode: this.roundingMode },
      resolved: false,
    };
  }

  /** The rule for a currency, falling back to the default. */
  rule(currency: string): CurrencyRoundingRule {
    return this.resolve(currency).rule;
  }

  /** Whether the currency has an explicit rule. */
  has(currency: string): boolean {
    return this.rules.has(currency.trim().toUpperCase());
  }

  /** All explicit rules, ordered by currency code. */
  list(): readonly CurrencyRoundingRule[] {
    return [...this.rules.values()];
  }
}

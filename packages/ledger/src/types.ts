/**
 * @tally/ledger: Internal types for the ledger engine.
 *
 * Rules:
 * - All types are readonly
 * - No mutation of built entries
 * - Fail-closed: structural problems throw, data problems are flagged
 */

import type { CurrencyRoundingRule } from "@tally/types";

// ─── Decimal Types ───────────────────────────────────────────────────────

/**
 * An exact decimal: `units × 10^-scale`.
 *
 * "-25.0005" → { units: -250005n, scale: 4 }
 */
export interface Decimal {
  readonly units: bigint;
  readonly scale: number;
}

// ─── Currency Table Types ────────────────────────────────────────────────

/**
 * Result of a rounding-table lookup. `resolved` is false when the
 * fallback rule was used for a currency the table does not know.
 */
export interface CurrencyResolution {
  readonly rule: CurrencyRoundingRule;
  readonly resolved: boolean;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_DECIMAL_PLACES"
  | "COMPUTATION_INCONSISTENCY";

/**
 * Structured error from the ledger engine.
 * Always thrown, never returned as a code.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

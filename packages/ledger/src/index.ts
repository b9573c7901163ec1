/**
 * @tally/ledger: Balance reconciliation ledger engine.
 *
 * A pure TypeScript engine with zero runtime dependencies:
 * - Exact decimal arithmetic on bigint (no floating point)
 * - Currency-aware rounding with an observable fallback
 * - Deterministic per-user ordering and running-balance fold
 * - Tolerance-based mismatch, overdraft and continuity classification
 *
 * Design rules:
 * - All types are readonly
 * - No mutation of built entries
 * - Fail-closed on configuration, flag-and-continue on data
 */

// Ledger construction
export {
  LedgerBuilder,
  buildLedger,
  foldUserSequence,
  partitionByUser,
  compareEvents,
  validateTolerance,
} from "./ledger-builder.js";
export type { LedgerBuildConfig } from "./ledger-builder.js";

// Currency rounding
export {
  CurrencyRoundingTable,
  DEFAULT_CURRENCY_DECIMALS,
  DEFAULT_DECIMALS,
  MAX_DECIMAL_PLACES,
  ISO_4217_MINOR_UNITS,
} from "./currency-table.js";
export type { CurrencyTableOptions } from "./currency-table.js";

// Decimal arithmetic
export {
  parseDecimal,
  formatDecimal,
  rescale,
  roundDecimal,
  padDecimal,
  canonicalDecimal,
  addDecimals,
  subtractDecimals,
  sumDecimals,
  compareDecimals,
  absDecimal,
  negateDecimal,
  isNegativeDecimal,
  isZeroDecimal,
  zeroDecimal,
  exceedsTolerance,
} from "./decimal-math.js";

// Types
export type { Decimal, CurrencyResolution, LedgerErrorCode } from "./types.js";
export { LedgerError } from "./types.js";

/**
 * @tally/types: Shared domain types for the Tally reconciliation stack.
 *
 * These types are used across all Tally packages:
 * - Raw parser records and normalized transaction events
 * - Reconciled ledger rows
 * - Anomaly findings
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Money is always a decimal string, never a float
 */

// Transaction types
export type {
  RawRecord,
  TransactionAction,
  TransactionDirection,
  TransactionEvent,
  NormalizationFailure,
  NormalizationFailureReason,
} from "./transaction.js";

// Ledger types
export type {
  RoundingMode,
  CurrencyRoundingRule,
  OverdraftKind,
  PriorBalanceSource,
  ActualBalanceSource,
  LedgerEntry,
  AnnotatedLedgerEntry,
} from "./ledger.js";

// Anomaly types
export type {
  AnomalyKind,
  AnomalySeverity,
  AnomalySubject,
  AnomalyDetails,
  AnomalyRecord,
} from "./anomaly.js";

// Runtime type guards
export {
  TRANSACTION_ACTIONS,
  ROUNDING_MODES,
  OVERDRAFT_KINDS,
  ANOMALY_KINDS,
  isTransactionAction,
  isRoundingMode,
  isAnomalyKind,
  isAnomalySeverity,
  isDecimalString,
  isTransactionEvent,
  isAnomalyRecord,
} from "./guards.js";

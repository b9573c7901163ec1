/**
 * Transaction Types
 *
 * The boundary between the external log parser and the reconciliation core.
 *
 * Rules:
 * - All amounts and balances are decimal strings (never floats)
 * - Raw records are untrusted; only TransactionEvent enters the ledger fold
 * - Events are created once by the normalizer and never mutated
 */

/**
 * A record as emitted by the log parser. Field values are whatever the
 * log block contained: strings, numbers, booleans or null.
 */
export type RawRecord = Readonly<Record<string, unknown>>;

/** Recognized balance actions. Anything else normalizes to INVALID. */
export type TransactionAction = "DEDUCT" | "CREDIT" | "ADJUSTMENT" | "INVALID";

/** Direction of the balance movement, derived from the signed amount. */
export type TransactionDirection = "debit" | "credit";

/**
 * A strongly-typed balance transaction.
 */
export interface TransactionEvent {
  readonly userId: string;

  /** ISO 8601 UTC timestamp with millisecond precision */
  readonly timestamp: string;

  /** Same instant as `timestamp`, in epoch milliseconds */
  readonly epochMs: number;

  /** Transaction id as logged (not guaranteed unique) */
  readonly id: string;

  /** Queue message id of the log block; empty when the log carried none */
  readonly messageId: string;

  readonly action: TransactionAction;

  /** Action text exactly as logged */
  readonly rawAction: string;

  readonly direction: TransactionDirection;

  /** Signed net movement applied to the balance (e.g. "-25.0005") */
  readonly amount: string;

  /** Tax portion excluded from the movement, when logged */
  readonly vat?: string | undefined;

  /** Upper-case currency code; "UNKNOWN" when the log carried none */
  readonly currency: string;

  /** Balance the log reports after the transaction */
  readonly loggedNewBalance?: string | undefined;

  /** Balance the log reports before the transaction */
  readonly loggedPriorBalance?: string | undefined;

  /** Upper-case origin tag; empty when the log carried none */
  readonly source: string;

  /** Position of the originating raw record in the input batch */
  readonly recordIndex: number;
}

/** Why a raw record could not become a TransactionEvent. */
export type NormalizationFailureReason =
  | "NOT_AN_OBJECT"
  | "MISSING_FIELD"
  | "INVALID_FIELD"
  | "INVALID_AMOUNT"
  | "INVALID_TIMESTAMP"
  | "INVALID_BALANCE";

/**
 * A raw record excluded from the ledger, kept for triage.
 */
export interface NormalizationFailure {
  readonly recordIndex: number;
  readonly record: unknown;
  readonly reason: NormalizationFailureReason;
  readonly field?: string | undefined;
  readonly message: string;
}

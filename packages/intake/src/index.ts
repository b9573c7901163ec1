/**
 * @tally/intake: Raw record intake.
 *
 * Validates and coerces parser output into TransactionEvents, splitting a
 * batch into events and per-record failures.
 */

export { normalize, normalizeBatch, normalizeAction } from "./normalizer.js";
export type { NormalizeResult, NormalizedBatch } from "./normalizer.js";

export { coerceDecimal, coerceTimestamp, expandExponent, textOf } from "./coerce.js";
export type { Coerced, Instant } from "./coerce.js";

export { RawRecordSchema, REQUIRED_FIELDS } from "./raw-record-schema.js";
export type { RawRecordFields, RawScalar, RequiredField } from "./raw-record-schema.js";

/**
 * Type barrel: re-exports all public types from @tally/node.
 */

// DTOs
export { ReconcileSchema, NormalizeSchema, MAX_RECORDS } from "./dto.js";
export type { ReconcileDto, NormalizeDto } from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// App env
export type { AppEnv, ValidatedEnv } from "./api-contract.js";

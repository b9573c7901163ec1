/**
 * Request DTOs with Zod validation schemas.
 *
 * Records stay `unknown` here: per-record validation belongs to intake,
 * which reports bad records instead of rejecting the request. Engine
 * overrides are checked by the reconciler.
 */

import { z } from "zod";

/** Largest batch accepted in one request. */
export const MAX_RECORDS = 100_000;

const RecordsSchema = z.array(z.unknown()).max(MAX_RECORDS);

// =============================================================================
// Reconciliation DTOs
// =============================================================================

export const ReconcileSchema = z.object({
  records: RecordsSchema,
  config: z.record(z.unknown()).optional(),
});

export type ReconcileDto = z.infer<typeof ReconcileSchema>;

export const NormalizeSchema = z.object({
  records: RecordsSchema,
});

export type NormalizeDto = z.infer<typeof NormalizeSchema>;

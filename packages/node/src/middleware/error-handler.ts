/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps ledger errors to HTTP status codes; anything else is a 500
 * whose message is not exposed.
 */

import type { Context } from "hono";
import { LedgerError } from "@tally/ledger";
import type { LedgerErrorCode } from "@tally/ledger";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Record<LedgerErrorCode, 400 | 422> = {
  INVALID_AMOUNT: 400,
  INVALID_DECIMAL_PLACES: 400,
  // Raised for invalid engine configuration
  COMPUTATION_INCONSISTENCY: 422,
};

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  if (err instanceof LedgerError) {
    return c.json(createErrorEnvelope(err.code, err.message), STATUS_MAP[err.code]);
  }

  return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
}

/**
 * Error envelope for unmatched routes. Registered as Hono's notFound handler.
 */
export function handleNotFound(c: Context): Response {
  return c.json(
    createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`),
    404,
  );
}

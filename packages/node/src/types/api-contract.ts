/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { ReconciliationService } from "../services/reconciliation-service.js";

/**
 * Hono environment type for the tally app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** Shared reconciliation service (set by the app) */
    service: ReconciliationService;
  };
}

/**
 * Environment contributed by body validation; Hono merges it into the
 * handler that follows the middleware.
 */
export interface ValidatedEnv<T> {
  Variables: {
    validatedBody: T;
  };
}

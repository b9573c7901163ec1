/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts so tests can create the app without starting
 * the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { ReconciliationService } from "./services/reconciliation-service.js";
import type { ReconciliationServiceConfig } from "./services/reconciliation-service.js";
import { handleError, handleNotFound } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { createHealthRoutes } from "./routes/health.js";
import { createReconcileRoutes } from "./routes/reconcile.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig?: ReconciliationServiceConfig | undefined;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: ReconciliationService;
}

/**
 * Create the Hono application with all middleware and routes.
 *
 * @throws {LedgerError} COMPUTATION_INCONSISTENCY when the engine configuration is invalid
 */
export function createApp(options: CreateAppOptions = {}): AppInstance {
  const service = new ReconciliationService(options.serviceConfig);

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handlers ─────────────────────────────────────────────
  app.onError(handleError);
  app.notFound(handleNotFound);

  // ─── Health Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes());

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.route("/api/v1", createReconcileRoutes());

  return { app, service };
}

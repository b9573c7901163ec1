/**
 * Reconciliation routes.
 *
 * POST /reconcile   Full run: triage, ledger, anomalies, summary, fingerprint
 * POST /normalize   Intake only: events and per-record failures
 * GET  /config      Effective base engine configuration
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { validateBody } from "../middleware/validate.js";
import { NormalizeSchema, ReconcileSchema } from "../types/dto.js";

export function createReconcileRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/reconcile", validateBody(ReconcileSchema), (c) => {
    const body = c.get("validatedBody");
    const report = c.get("service").reconcile(body.records, body.config);
    return c.json({ data: report });
  });

  routes.post("/normalize", validateBody(NormalizeSchema), (c) => {
    const body = c.get("validatedBody");
    return c.json({ data: c.get("service").normalize(body.records) });
  });

  routes.get("/config", (c) => {
    return c.json({ data: c.get("service").engineConfig });
  });

  return routes;
}

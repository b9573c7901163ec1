/**
 * Health check route.
 *
 * GET /health  Liveness check (always 200 if server is running)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createHealthRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  return routes;
}

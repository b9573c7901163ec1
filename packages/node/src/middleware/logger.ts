/**
 * Request logging middleware.
 *
 * Hands one structured entry per request to an injected log function;
 * the server wires that function to pino.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export type RequestLogLevel = "info" | "warn" | "error";

export interface RequestLogEntry {
  readonly level: RequestLogLevel;
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
}

/** 5xx logs as error, 4xx as warn. */
export function levelForStatus(status: number): RequestLogLevel {
  if (status >= 500) return "error";
  if (status >= 400) return "warn";
  return "info";
}

export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    log({
      level: levelForStatus(c.res.status),
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
      requestId: c.get("requestId"),
    });
  };
}

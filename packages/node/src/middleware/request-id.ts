/**
 * Correlation ids for reconciliation requests.
 *
 * Callers that batch log exports usually tag each upload; a tag that looks
 * like an id (word characters, ".", ":" or "-", at most 128 of them) is
 * reused so run logs line up with the caller's own. Anything else gets a
 * fresh UUID.
 */

import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export const REQUEST_ID_HEADER = "X-Request-Id";

const CALLER_ID = /^[\w.:-]{1,128}$/;

/** The caller's id when it is usable, a new UUID otherwise. */
export function resolveRequestId(header: string | undefined): string {
  if (header === undefined || !CALLER_ID.test(header)) {
    return randomUUID();
  }
  return header;
}

export function requestIdMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const id = resolveRequestId(c.req.header(REQUEST_ID_HEADER));
    c.set("requestId", id);
    await next();
    c.header(REQUEST_ID_HEADER, id);
  };
}

/**
 * Body validation for the JSON endpoints.
 *
 * The body is read once and checked against the route's schema. Handlers
 * read the parsed value from `validatedBody`; a body that is not JSON, or
 * does not fit the schema, ends the request with a VALIDATION_ERROR.
 */

import type { HonoRequest, MiddlewareHandler } from "hono";
import type { ZodIssue, ZodType, ZodTypeDef } from "zod";
import type { ValidatedEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export interface ValidationIssue {
  /** Location in the body, e.g. "records[2]" or "config.tolerance"; empty for the body itself */
  readonly path: string;
  readonly message: string;
}

type JsonRead = { readonly parsed: true; readonly value: unknown } | { readonly parsed: false };

async function readJson(req: HonoRequest): Promise<JsonRead> {
  try {
    return { parsed: true, value: await req.json() };
  } catch {
    return { parsed: false };
  }
}

/** Dotted keys with bracketed array positions: ["records", 2] → "records[2]". */
export function issuePath(path: readonly (string | number)[]): string {
  return path.reduce<string>((acc, segment) => {
    if (typeof segment === "number") return `${acc}[${String(segment)}]`;
    return acc === "" ? segment : `${acc}.${segment}`;
  }, "");
}

function toIssue(issue: ZodIssue): ValidationIssue {
  return { path: issuePath(issue.path), message: issue.message };
}

export function validateBody<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
): MiddlewareHandler<ValidatedEnv<T>> {
  return async (c, next) => {
    const body = await readJson(c.req);
    if (!body.parsed) {
      return c.json(createErrorEnvelope("VALIDATION_ERROR", "Invalid JSON in request body"), 400);
    }

    const result = schema.safeParse(body.value);
    if (result.success) {
      c.set("validatedBody", result.data);
      return next();
    }

    const issues: readonly ValidationIssue[] = result.error.issues.map(toIssue);
    return c.json(
      createErrorEnvelope("VALIDATION_ERROR", "Request body validation failed", { issues }),
      400,
    );
  };
}

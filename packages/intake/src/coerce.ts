/**
 * Scalar coercion for raw record fields.
 *
 * Each coercer distinguishes three outcomes: the field is absent (or blank),
 * the field holds something unusable, or it holds a usable value.
 */

import { canonicalDecimal } from "@tally/ledger";
import type { RawScalar } from "./raw-record-schema.js";

export type Coerced<T> =
  | { readonly kind: "absent" }
  | { readonly kind: "invalid"; readonly text: string }
  | { readonly kind: "ok"; readonly value: T };

const ABSENT = { kind: "absent" } as const;

// ─── Text ────────────────────────────────────────────────────────────────

/**
 * Trimmed text of a scalar, or undefined when null, missing or blank.
 */
export function textOf(value: RawScalar): string | undefined {
  if (value === undefined || value === null) return undefined;
  const text = String(value).trim();
  return text === "" ? undefined : text;
}

// ─── Decimals ────────────────────────────────────────────────────────────

const PLAIN_RE = /^[-+]?\d+(\.\d+)?$/;
const GROUPED_RE = /^[-+]?\d{1,3}(,\d{3})+(\.\d+)?$/;
const EXPONENT_RE = /^([-+]?)(\d+)(?:\.(\d+))?[eE]([-+]?\d+)$/;

/** Largest exponent we are willing to expand into digits. */
const MAX_EXPONENT = 64;

/**
 * Rewrite "1.5e-7" as "0.00000015" by moving the decimal point in the
 * digit string. Returns undefined when the text is not in exponent form.
 */
export function expandExponent(text: string): string | undefined {
  const match = EXPONENT_RE.exec(text);
  if (match === null) return undefined;

  const [, sign = "", intPart = "", fracPart = "", expText = "0"] = match;
  const exponent = Number(expText);
  if (Math.abs(exponent) > MAX_EXPONENT) return undefined;

  const digits = intPart + fracPart;
  const point = intPart.length + exponent;

  let body: string;
  if (point <= 0) {
    body = `0.${"0".repeat(-point)}${digits}`;
  } else if (point >= digits.length) {
    body = digits + "0".repeat(point - digits.length);
  } else {
    body = `${digits.slice(0, point)}.${digits.slice(point)}`;
  }
  return sign === "-" ? `-${body}` : body;
}

/**
 * Coerce a scalar into a canonical decimal string.
 *
 * Numbers go through their shortest round-trip text (never through
 * arithmetic). Strings may carry a leading "+", thousands separators or an
 * exponent.
 */
export function coerceDecimal(value: RawScalar): Coerced<string> {
  if (typeof value === "boolean") return { kind: "invalid", text: String(value) };
  if (typeof value === "number" && !Number.isFinite(value)) {
    return { kind: "invalid", text: String(value) };
  }

  const text = textOf(value);
  if (text === undefined) return ABSENT;

  let candidate = text;
  if (GROUPED_RE.test(candidate)) {
    candidate = candidate.replaceAll(",", "");
  }
  candidate = expandExponent(candidate) ?? candidate;

  if (!PLAIN_RE.test(candidate)) return { kind: "invalid", text };

  const unsigned = candidate.startsWith("+") ? candidate.slice(1) : candidate;
  return { kind: "ok", value: canonicalDecimal(unsigned) };
}

// ─── Timestamps ──────────────────────────────────────────────────────────

export interface Instant {
  /** ISO 8601 UTC with millisecond precision */
  readonly iso: string;
  readonly epochMs: number;
}

const EPOCH_RE = /^-?\d+$/;
const ISO_PREFIX_RE = /^\d{4}-\d{2}-\d{2}/;
const NAIVE_ISO_RE = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;

function instantAt(epochMs: number): Instant | undefined {
  const date = new Date(epochMs);
  const time = date.getTime();
  if (Number.isNaN(time)) return undefined;
  return { iso: date.toISOString(), epochMs: time };
}

/**
 * Coerce a scalar into a UTC instant. Accepts epoch milliseconds (number or
 * digit string) and ISO 8601 text; ISO text without an offset is UTC.
 */
export function coerceTimestamp(value: RawScalar): Coerced<Instant> {
  if (typeof value === "boolean") return { kind: "invalid", text: String(value) };

  const text = textOf(value);
  if (text === undefined) return ABSENT;

  let instant: Instant | undefined;
  if (typeof value === "number" || EPOCH_RE.test(text)) {
    instant = instantAt(Number(text));
  } else if (ISO_PREFIX_RE.test(text)) {
    const iso = NAIVE_ISO_RE.test(text) ? `${text.replace(" ", "T")}Z` : text;
    instant = instantAt(Date.parse(iso));
  }

  return instant === undefined ? { kind: "invalid", text } : { kind: "ok", value: instant };
}

/**
 * Shape check for records coming out of the log parser.
 *
 * The parser emits loosely typed key/value blocks. Every field we read must
 * be a scalar; anything else (nested objects, arrays) is rejected before
 * coercion. Unknown keys pass through untouched.
 */

import { z } from "zod";

const Scalar = z.union([z.string(), z.number(), z.boolean(), z.null()]).optional();

export type RawScalar = z.infer<typeof Scalar>;

export const RawRecordSchema = z
  .object({
    userId: Scalar,
    timestamp: Scalar,
    id: Scalar,
    messageId: Scalar,
    action: Scalar,
    amount: Scalar,
    currency: Scalar,
    newBalance: Scalar,
    oldBalance: Scalar,
    source: Scalar,
    type: Scalar,
    vat: Scalar,
  })
  .passthrough();

export type RawRecordFields = z.infer<typeof RawRecordSchema>;

/** Fields a record cannot do without. Checked in this order. */
export const REQUIRED_FIELDS = ["userId", "id", "timestamp", "amount"] as const;

export type RequiredField = (typeof REQUIRED_FIELDS)[number];

/**
 * Robust statistics over small samples.
 *
 * These work on floats: they only rank amounts, they never feed a balance.
 */

/**
 * Median of a sample; NaN for an empty sample.
 */
export function median(values: readonly number[]): number {
  if (values.length === 0) return Number.NaN;

  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  const upper = sorted[mid] ?? Number.NaN;
  if (sorted.length % 2 === 1) return upper;

  const lower = sorted[mid - 1] ?? Number.NaN;
  return (lower + upper) / 2;
}

/**
 * Median absolute deviation around `center` (the sample median by default).
 */
export function medianAbsoluteDeviation(
  values: readonly number[],
  center: number = median(values),
): number {
  return median(values.map((v) => Math.abs(v - center)));
}

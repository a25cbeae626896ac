// ============================================================================
// Descriptive statistics over numeric samples
// ============================================================================

/**
 * Drops missing entries from a column of values.
 * Missing means `null`, `undefined` or a non-finite number.
 */
export function presentValues(
  values: ReadonlyArray<number | null | undefined>,
): number[] {
  const out: number[] = [];
  for (const v of values) {
    if (typeof v === 'number' && Number.isFinite(v)) {
      out.push(v);
    }
  }
  return out;
}

/**
 * Arithmetic mean. Returns `null` for an empty sample.
 */
export function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/**
 * Sample standard deviation (n - 1 denominator).
 * Undefined below two observations, reported as `null`.
 */
export function sampleStandardDeviation(values: readonly number[]): number | null {
  if (values.length < 2) return null;
  const m = mean(values) ?? 0;
  let squares = 0;
  for (const v of values) squares += (v - m) ** 2;
  return Math.sqrt(squares / (values.length - 1));
}

/**
 * Standard error of the mean: sample SD / sqrt(n).
 * `null` when n < 2.
 */
export function standardErrorOfMean(values: readonly number[]): number | null {
  const sd = sampleStandardDeviation(values);
  if (sd === null) return null;
  return sd / Math.sqrt(values.length);
}

/**
 * Quantile by linear interpolation between closest ranks, the same
 * definition spreadsheet tools use for PERCENTILE.INC.
 *
 * @param q - Probability in [0, 1]
 */
export function quantile(values: readonly number[], q: number): number | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const position = (sorted.length - 1) * Math.min(1, Math.max(0, q));
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  if (lower === upper) return sorted[lower];
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (position - lower);
}

export function median(values: readonly number[]): number | null {
  return quantile(values, 0.5);
}

/**
 * Weak percentile rank: the percentage of `values` that are <= `score`.
 */
export function percentileOfScore(
  values: readonly number[],
  score: number,
): number | null {
  if (values.length === 0) return null;
  let atOrBelow = 0;
  for (const v of values) {
    if (v <= score) atOrBelow++;
  }
  return (atOrBelow / values.length) * 100;
}

/**
 * Rounds for display. Missing stays missing.
 * Example: roundTo(2.45) → 2.5, roundTo(null) → null
 */
export function roundTo(value: number | null, digits = 1): number | null {
  if (value === null || !Number.isFinite(value)) return null;
  const factor = 10 ** digits;
  return Math.round((value + Number.EPSILON * Math.sign(value)) * factor) / factor;
}

/**
 * Quantile Calculations
 * Order-statistic interpolation and the two-tailed split of a coverage level
 */

import { InvalidCoverageError } from '../errors.ts'

export type InterpolationMethod =
  | 'linear' // Linear interpolation (default)
  | 'lower' // Floor index
  | 'higher' // Ceil index
  | 'nearest' // Nearest index
  | 'midpoint' // Average of lower and higher

/**
 * Compute quantile of sorted array
 * @param sorted - Pre-sorted array (ascending)
 * @param p - Quantile (0 to 1)
 * @param method - Interpolation method
 */
export function quantile(
  sorted: ArrayLike<number>,
  p: number,
  method: InterpolationMethod = 'linear'
): number {
  const n = sorted.length
  if (n === 0) return NaN
  if (n === 1 || p <= 0) return sorted[0]!
  if (p >= 1) return sorted[n - 1]!

  const index = p * (n - 1)
  const lo = Math.floor(index)
  const hi = Math.ceil(index)
  const frac = index - lo
  const a = sorted[lo]!
  const b = sorted[hi]!

  switch (method) {
    case 'lower':
      return a
    case 'higher':
      return b
    case 'nearest':
      return frac < 0.5 ? a : b
    case 'midpoint':
      return (a + b) / 2
    case 'linear':
    default:
      if (lo === hi || a === b) return a
      // -Infinity next to +Infinity has no weighted mean
      if (a === -Infinity && b === Infinity) return frac < 0.5 ? a : b
      return a * (1 - frac) + b * frac
  }
}

/**
 * Compute quantile of unsorted array
 * Creates a sorted copy internally
 */
export function quantileUnsorted(
  values: ArrayLike<number>,
  p: number,
  method: InterpolationMethod = 'linear'
): number {
  const sorted = Array.from(values).sort((a, b) => a - b)
  return quantile(sorted, p, method)
}

/**
 * Compute multiple quantiles at once
 */
export function quantiles(
  sorted: ArrayLike<number>,
  ps: readonly number[],
  method: InterpolationMethod = 'linear'
): number[] {
  return ps.map((p) => quantile(sorted, p, method))
}

/**
 * True when `c` is a probability mass in [0, 1] (NaN is not)
 */
export function isValidCoverage(c: number): boolean {
  return c >= 0 && c <= 1
}

export function assertCoverage(c: number): void {
  if (!isValidCoverage(c)) throw new InvalidCoverageError(c)
}

/**
 * Split a central coverage level into its two tail quantiles.
 * 0.95 -> [0.025, 0.975]; the excluded mass is shared equally by both tails.
 */
export function twoTailedQuantile(coverage: number): [lowTail: number, highTail: number] {
  assertCoverage(coverage)
  const lowTail = (1 - coverage) / 2
  return [lowTail, coverage + lowTail]
}

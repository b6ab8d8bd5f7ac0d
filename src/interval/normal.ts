/**
 * Normal-approximation confidence interval
 */

import { DegenerateSampleError } from '../errors.ts'
import { normalQuantile } from '../stats/normal.ts'
import { twoTailedQuantile } from '../stats/quantile.ts'
import { createAnalyticInterval, type AnalyticInterval } from './types.ts'

/**
 * Approximate sampling variance of a standardized mean difference
 *   σ² = (nx + ny) / (nx·ny) + es² / (2·(nx + ny))
 */
export function effectSizeVariance(nx: number, ny: number, estimate: number): number {
  return (nx + ny) / (nx * ny) + (estimate * estimate) / (2 * (nx + ny))
}

/**
 * Bounds `estimate ∓ z·σ`, where z is the upper critical value of the
 * standard normal at the requested coverage. Deterministic, O(1).
 */
export function buildNormalInterval(
  xs: ArrayLike<number>,
  ys: ArrayLike<number>,
  estimate: number,
  coverage: number
): AnalyticInterval {
  const [, highTail] = twoTailedQuantile(coverage)

  const nx = xs.length
  const ny = ys.length
  if (nx === 0 || ny === 0) {
    throw new DegenerateSampleError(
      Math.min(nx, ny),
      `Normal interval needs non-empty samples, got sizes ${nx} and ${ny}`
    )
  }

  // zero spread in the samples makes the standardized difference unbounded
  if (!Number.isFinite(estimate)) {
    throw new DegenerateSampleError(
      Math.min(nx, ny),
      `Normal interval needs a finite estimate, got ${estimate}`
    )
  }

  const z = normalQuantile(highTail)
  const sigma = Math.sqrt(effectSizeVariance(nx, ny, estimate))
  // zero coverage collapses to the estimate, even when sigma is infinite
  const margin = z === 0 ? 0 : z * sigma

  return createAnalyticInterval(estimate - margin, estimate + margin, coverage)
}

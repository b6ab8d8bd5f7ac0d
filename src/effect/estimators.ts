/**
 * Effect-size point estimates
 * Standardized mean differences; positive when the first sample's mean is larger.
 */

import { DegenerateSampleError } from '../errors.ts'
import { summarize, type SampleSummary } from '../stats/welford.ts'

function requireSize(values: ArrayLike<number>, min: number, label: string): void {
  if (values.length < min) {
    throw new DegenerateSampleError(
      values.length,
      `${label} needs at least ${min} value${min === 1 ? '' : 's'}, got ${values.length}`
    )
  }
}

// denominatorOffset: -2 for Cohen's d, 0 for Hedge's g
function pooled(x: SampleSummary, y: SampleSummary, denominatorOffset: number): number {
  const ss = (x.n - 1) * x.variance + (y.n - 1) * y.variance
  return Math.sqrt(ss / (x.n + y.n + denominatorOffset))
}

/**
 * Pooled standard deviation with nx + ny - 2 degrees of freedom (Cohen's d)
 */
export function pooledStdDev(xs: ArrayLike<number>, ys: ArrayLike<number>): number {
  return pooled(summarize(xs), summarize(ys), -2)
}

/**
 * Pooled standard deviation over nx + ny (Hedge's g)
 */
export function pooledStdDevHedge(xs: ArrayLike<number>, ys: ArrayLike<number>): number {
  return pooled(summarize(xs), summarize(ys), 0)
}

/**
 * Small-sample bias correction ((n - 3) / (n - 2.25)) · √((n - 2) / n)
 */
export function correction(n: number): number {
  if (!(n > 1)) {
    throw new DegenerateSampleError(n, `Bias correction needs a total size above 1, got ${n}`)
  }
  return ((n - 3) / (n - 2.25)) * Math.sqrt((n - 2) / n)
}

export function cohenDEstimate(xs: readonly number[], ys: readonly number[]): number {
  requireSize(xs, 2, "Cohen's d (first sample)")
  requireSize(ys, 2, "Cohen's d (second sample)")
  const x = summarize(xs)
  const y = summarize(ys)
  return ((x.mean - y.mean) / pooled(x, y, -2)) * correction(x.n + y.n)
}

export function hedgeGEstimate(xs: readonly number[], ys: readonly number[]): number {
  requireSize(xs, 2, "Hedge's g (first sample)")
  requireSize(ys, 2, "Hedge's g (second sample)")
  const x = summarize(xs)
  const y = summarize(ys)
  return ((x.mean - y.mean) / pooled(x, y, 0)) * correction(x.n + y.n)
}

/**
 * Glass's Δ scales by the control group's standard deviation only
 */
export function glassDeltaEstimate(
  treatment: readonly number[],
  control: readonly number[]
): number {
  requireSize(treatment, 1, "Glass's delta (treatment)")
  requireSize(control, 2, "Glass's delta (control)")
  const t = summarize(treatment)
  const c = summarize(control)
  return (t.mean - c.mean) / c.stdDev
}

/**
 * Bootstrap confidence interval
 * Resample both groups with replacement, apply a reducer to every resample
 * pair and read the interval off the empirical quantiles.
 */

import { DegenerateSampleError } from '../errors.ts'
import { debug } from '../log.ts'
import { quantile, twoTailedQuantile, type InterpolationMethod } from '../stats/quantile.ts'
import { bootstrapSample, type RandomSource } from '../stats/random.ts'
import {
  assertResampleCount,
  createBootstrapInterval,
  type BootstrapInterval,
} from './types.ts'

/**
 * Statistic computed on a pair of samples, e.g. Cohen's d
 */
export type Reducer = (xs: readonly number[], ys: readonly number[]) => number

export const DEFAULT_RESAMPLE_COUNT = 1000

export interface BootstrapOptions {
  coverage: number
  /** Number of resamples (default: 1000, must be an integer > 1) */
  resampleCount?: number
  /** Defaults to Math.random; pass seededRandom(seed) for reproducible bounds */
  random?: RandomSource
  interpolation?: InterpolationMethod
}

function assertNonEmpty(xs: readonly number[], ys: readonly number[]): void {
  if (xs.length === 0 || ys.length === 0) {
    throw new DegenerateSampleError(
      Math.min(xs.length, ys.length),
      `Bootstrap needs non-empty samples, got sizes ${xs.length} and ${ys.length}`
    )
  }
}

/**
 * Evaluate `reducer` on `resampleCount` independent resample pairs.
 * Iterations share nothing but the random source.
 */
export function bootstrapDistribution(
  xs: readonly number[],
  ys: readonly number[],
  reducer: Reducer,
  resampleCount: number = DEFAULT_RESAMPLE_COUNT,
  random: RandomSource = Math.random
): number[] {
  assertResampleCount(resampleCount)
  assertNonEmpty(xs, ys)

  const estimates = new Array<number>(resampleCount)
  for (let i = 0; i < resampleCount; i++) {
    const e = reducer(bootstrapSample(xs, random), bootstrapSample(ys, random))
    if (Number.isNaN(e)) {
      throw new DegenerateSampleError(
        Math.min(xs.length, ys.length),
        `Reducer returned NaN on resample ${i + 1} of ${resampleCount}`
      )
    }
    estimates[i] = e
  }
  return estimates
}

export function buildBootstrapInterval(
  xs: readonly number[],
  ys: readonly number[],
  reducer: Reducer,
  options: BootstrapOptions
): BootstrapInterval {
  const {
    coverage,
    resampleCount = DEFAULT_RESAMPLE_COUNT,
    random = Math.random,
    interpolation = 'linear',
  } = options

  // All validation happens before the first resample
  const [lowTail, highTail] = twoTailedQuantile(coverage)
  assertResampleCount(resampleCount)
  assertNonEmpty(xs, ys)

  const started = performance.now()
  const estimates = bootstrapDistribution(xs, ys, reducer, resampleCount, random)
  estimates.sort((a, b) => a - b)
  debug(
    'bootstrap',
    `${resampleCount} resamples of (${xs.length}, ${ys.length}) in ${(performance.now() - started).toFixed(1)}ms`
  )

  return createBootstrapInterval(
    quantile(estimates, lowTail, interpolation),
    quantile(estimates, highTail, interpolation),
    coverage,
    resampleCount
  )
}

/**
 * Random sources and resampling with replacement
 */

import { DegenerateSampleError } from '../errors.ts'

/**
 * Uniform draws in [0, 1). `Math.random` satisfies it.
 */
export type RandomSource = () => number

/**
 * Seeded random number generator for reproducible bootstraps (Mulberry32)
 */
export function seededRandom(seed: number): RandomSource {
  let s = seed >>> 0
  return () => {
    s = (s + 0x6d2b79f5) >>> 0
    let t = s
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

/**
 * Draw a resample of the same length, uniformly with replacement.
 * The input is left untouched.
 */
export function bootstrapSample<T>(
  xs: readonly T[],
  random: RandomSource = Math.random
): T[] {
  const n = xs.length
  if (n === 0) {
    throw new DegenerateSampleError(0, 'Cannot resample an empty sample')
  }

  const out = new Array<T>(n)
  for (let i = 0; i < n; i++) {
    const j = Math.min(Math.floor(random() * n), n - 1)
    out[i] = xs[j]!
  }
  return out
}

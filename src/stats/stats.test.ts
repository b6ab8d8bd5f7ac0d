/**
 * Tests for statistics primitives
 * Quantiles, tail splitting, normal quantile, moments and resampling
 */

import { describe, it, expect } from 'vitest'
import {
  createWelford,
  welfordUpdate,
  welfordUpdateBatch,
  welfordFromArray,
  welfordSampleVariance,
  welfordSampleStdDev,
  summarize,
} from './welford.ts'
import {
  quantile,
  quantileUnsorted,
  quantiles,
  isValidCoverage,
  twoTailedQuantile,
} from './quantile.ts'
import { normalQuantile, normalCdf } from './normal.ts'
import { seededRandom, bootstrapSample } from './random.ts'
import { DegenerateSampleError, InvalidCoverageError } from '../errors.ts'

describe('Quantile Calculations', () => {
  const sorted = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10]

  describe('Basic quantile', () => {
    it('should return min for p=0', () => {
      expect(quantile(sorted, 0)).toBe(1)
    })

    it('should return max for p=1', () => {
      expect(quantile(sorted, 1)).toBe(10)
    })

    it('should return median for p=0.5', () => {
      expect(quantile(sorted, 0.5)).toBe(5.5)
    })

    it('should interpolate Q1 and Q3', () => {
      expect(quantile(sorted, 0.25)).toBe(3.25)
      expect(quantile(sorted, 0.75)).toBe(7.75)
    })

    it('should handle single element', () => {
      expect(quantile([42], 0.5)).toBe(42)
    })

    it('should return NaN for empty array', () => {
      expect(quantile([], 0.5)).toBeNaN()
    })

    it('should return the repeated value exactly between equal neighbours', () => {
      expect(quantile([0.1, 0.1, 0.1], 0.3)).toBe(0.1)
    })
  })

  describe('Infinite neighbours', () => {
    it('should stay infinite next to a finite value', () => {
      expect(quantile([-Infinity, 0], 0.5)).toBe(-Infinity)
      expect(quantile([0, Infinity], 0.5)).toBe(Infinity)
    })

    it('should keep repeated infinities', () => {
      expect(quantile([-Infinity, -Infinity, 1], 0.25)).toBe(-Infinity)
    })

    it('should take the nearer side between opposite infinities', () => {
      expect(quantile([-Infinity, Infinity], 0.25)).toBe(-Infinity)
      expect(quantile([-Infinity, Infinity], 0.75)).toBe(Infinity)
    })
  })

  describe('Interpolation methods', () => {
    it('should use lower interpolation', () => {
      expect(quantile(sorted, 0.5, 'lower')).toBe(5)
    })

    it('should use higher interpolation', () => {
      expect(quantile(sorted, 0.5, 'higher')).toBe(6)
    })

    it('should use nearest interpolation', () => {
      expect(quantile(sorted, 0.45, 'nearest')).toBe(5)
      expect(quantile(sorted, 0.55, 'nearest')).toBe(6)
    })

    it('should use midpoint interpolation', () => {
      expect(quantile(sorted, 0.5, 'midpoint')).toBe(5.5)
    })
  })

  describe('quantileUnsorted', () => {
    it('should work with unsorted data without reordering the input', () => {
      const unsorted = [5, 2, 8, 1, 9, 3, 7, 4, 6, 10]
      expect(quantileUnsorted(unsorted, 0.5)).toBe(5.5)
      expect(unsorted[0]).toBe(5)
    })
  })

  describe('Multiple quantiles', () => {
    it('should compute multiple quantiles', () => {
      expect(quantiles(sorted, [0.25, 0.5, 0.75])).toEqual([3.25, 5.5, 7.75])
    })
  })
})

describe('Two-tailed quantile', () => {
  it('should split 0.95 into 0.025 and 0.975', () => {
    const [lo, hi] = twoTailedQuantile(0.95)
    expect(lo).toBeCloseTo(0.025, 12)
    expect(hi).toBeCloseTo(0.975, 12)
  })

  it('should split 0.9 into 0.05 and 0.95', () => {
    const [lo, hi] = twoTailedQuantile(0.9)
    expect(lo).toBeCloseTo(0.05, 12)
    expect(hi).toBeCloseTo(0.95, 12)
  })

  it('should give tails that sum to 1 and are `coverage` apart', () => {
    const random = seededRandom(7)
    for (let i = 0; i < 100; i++) {
      const c = random()
      const [lo, hi] = twoTailedQuantile(c)
      expect(lo + hi).toBe(1)
      expect(hi - lo).toBeCloseTo(c, 12)
    }
  })

  it('should handle the endpoints', () => {
    expect(twoTailedQuantile(0)).toEqual([0.5, 0.5])
    expect(twoTailedQuantile(1)).toEqual([0, 1])
  })

  it('should reject coverage outside [0, 1]', () => {
    expect(() => twoTailedQuantile(-0.1)).toThrow(InvalidCoverageError)
    expect(() => twoTailedQuantile(1.1)).toThrow(InvalidCoverageError)
    expect(() => twoTailedQuantile(NaN)).toThrow(InvalidCoverageError)
  })

  it('should report valid coverage', () => {
    expect(isValidCoverage(0)).toBe(true)
    expect(isValidCoverage(1)).toBe(true)
    expect(isValidCoverage(1.0001)).toBe(false)
    expect(isValidCoverage(NaN)).toBe(false)
  })
})

describe('Normal distribution', () => {
  it('should return the 97.5% critical value', () => {
    expect(normalQuantile(0.975)).toBeCloseTo(1.959964, 5)
    expect(normalQuantile(0.025)).toBeCloseTo(-1.959964, 5)
  })

  it('should be accurate in the tails', () => {
    expect(normalQuantile(0.01)).toBeCloseTo(-2.326348, 5)
    expect(normalQuantile(0.999)).toBeCloseTo(3.090232, 5)
  })

  it('should handle the centre and the endpoints', () => {
    expect(normalQuantile(0.5)).toBe(0)
    expect(normalQuantile(0)).toBe(-Infinity)
    expect(normalQuantile(1)).toBe(Infinity)
    expect(normalQuantile(1.5)).toBeNaN()
  })

  it('should be increasing', () => {
    expect(normalQuantile(0.9)).toBeLessThan(normalQuantile(0.975))
    expect(normalQuantile(0.02)).toBeLessThan(normalQuantile(0.03))
  })

  it('should invert the CDF', () => {
    expect(normalCdf(0)).toBeCloseTo(0.5, 8)
    expect(normalCdf(normalQuantile(0.975))).toBeCloseTo(0.975, 6)
  })
})

describe('Welford Algorithm', () => {
  it('should initialize with zero count', () => {
    const state = createWelford()
    expect(state.n).toBe(0)
    expect(state.mean).toBe(0)
    expect(state.m2).toBe(0)
  })

  it('should update correctly with multiple values', () => {
    const state = createWelford()
    welfordUpdate(state, 2)
    welfordUpdate(state, 4)
    welfordUpdate(state, 6)
    expect(state.n).toBe(3)
    expect(state.mean).toBe(4)
  })

  it('should batch update correctly', () => {
    const state = createWelford()
    welfordUpdateBatch(state, [2, 4, 6])
    expect(state.n).toBe(3)
    expect(state.mean).toBe(4)
  })

  it('should compute sample variance and std dev', () => {
    const state = welfordFromArray([2, 4, 4, 4, 5, 5, 7, 9])
    expect(welfordSampleVariance(state)).toBeCloseTo(32 / 7, 10)
    expect(welfordSampleStdDev(state)).toBeCloseTo(Math.sqrt(32 / 7), 10)
  })

  it('should return NaN sample variance below two values', () => {
    expect(welfordSampleVariance(welfordFromArray([42]))).toBeNaN()
  })

  it('should summarize a sample', () => {
    const s = summarize([1, 2, 3, 4, 5])
    expect(s.n).toBe(5)
    expect(s.mean).toBe(3)
    expect(s.variance).toBeCloseTo(2.5, 12)
    expect(s.stdDev).toBeCloseTo(Math.sqrt(2.5), 12)
  })

  it('should summarize an empty sample as NaN', () => {
    const s = summarize([])
    expect(s.n).toBe(0)
    expect(s.mean).toBeNaN()
    expect(s.variance).toBeNaN()
  })
})

describe('Random sources', () => {
  it('should reproduce a sequence from the same seed', () => {
    const a = seededRandom(42)
    const b = seededRandom(42)
    const seqA = Array.from({ length: 20 }, () => a())
    const seqB = Array.from({ length: 20 }, () => b())
    expect(seqA).toEqual(seqB)
  })

  it('should draw from [0, 1)', () => {
    const random = seededRandom(123)
    for (let i = 0; i < 1000; i++) {
      const u = random()
      expect(u).toBeGreaterThanOrEqual(0)
      expect(u).toBeLessThan(1)
    }
  })

  it('should give different streams for different seeds', () => {
    const a = seededRandom(1)
    const b = seededRandom(2)
    expect(a()).not.toBe(b())
  })
})

describe('bootstrapSample', () => {
  it('should keep the length and only draw existing elements', () => {
    const random = seededRandom(99)
    for (let i = 0; i < 100; i++) {
      const xs = Array.from({ length: 50 }, () => random())
      const ys = bootstrapSample(xs, random)
      expect(ys.length).toBe(xs.length)
      const pool = new Set(xs)
      for (const y of ys) expect(pool.has(y)).toBe(true)
    }
  })

  it('should map draws onto indices', () => {
    expect(bootstrapSample([3, 1, 2], () => 0)).toEqual([3, 3, 3])
    expect(bootstrapSample([3, 1, 2], () => 0.5)).toEqual([1, 1, 1])
    expect(bootstrapSample([3, 1, 2], () => 0.99)).toEqual([2, 2, 2])
  })

  it('should clamp a draw of exactly 1 to the last element', () => {
    expect(bootstrapSample([3, 1, 2], () => 1)).toEqual([2, 2, 2])
  })

  it('should not mutate the input', () => {
    const xs = [1, 2, 3]
    bootstrapSample(xs)
    expect(xs).toEqual([1, 2, 3])
  })

  it('should fail on an empty sample', () => {
    expect(() => bootstrapSample([])).toThrow(DegenerateSampleError)
  })
})

/**
 * Confidence Interval Types
 * An immutable uncertainty band around a point estimate
 */

import { InvalidResampleCountError, InvertedBoundsError } from '../errors.ts'
import { assertCoverage } from '../stats/quantile.ts'

export type IntervalMethod = 'normal' | 'bootstrap'

interface IntervalBase {
  readonly lower: number
  readonly upper: number
  readonly coverage: number // Requested two-sided coverage, e.g. 0.95
}

/**
 * Closed-form normal approximation
 */
export interface AnalyticInterval extends IntervalBase {
  readonly method: 'normal'
}

/**
 * Empirical quantiles of a bootstrap distribution
 */
export interface BootstrapInterval extends IntervalBase {
  readonly method: 'bootstrap'
  readonly resampleCount: number
}

export type ConfidenceInterval = AnalyticInterval | BootstrapInterval

function assertBounds(lower: number, upper: number): void {
  // NaN on either side fails as well
  if (!(lower <= upper)) throw new InvertedBoundsError(lower, upper)
}

export function assertResampleCount(resampleCount: number): void {
  if (!Number.isInteger(resampleCount) || resampleCount <= 1) {
    throw new InvalidResampleCountError(resampleCount)
  }
}

export function createAnalyticInterval(
  lower: number,
  upper: number,
  coverage: number
): AnalyticInterval {
  assertBounds(lower, upper)
  assertCoverage(coverage)
  return Object.freeze({ method: 'normal', lower, upper, coverage })
}

export function createBootstrapInterval(
  lower: number,
  upper: number,
  coverage: number,
  resampleCount: number
): BootstrapInterval {
  assertBounds(lower, upper)
  assertCoverage(coverage)
  assertResampleCount(resampleCount)
  return Object.freeze({ method: 'bootstrap', lower, upper, coverage, resampleCount })
}

export function lowerBound(ci: ConfidenceInterval): number {
  return ci.lower
}

export function upperBound(ci: ConfidenceInterval): number {
  return ci.upper
}

/**
 * Lower and upper bounds as a pair
 */
export function bounds(ci: ConfidenceInterval): [lower: number, upper: number] {
  return [ci.lower, ci.upper]
}

export function intervalCoverage(ci: ConfidenceInterval): number {
  return ci.coverage
}

export function resampleCount(ci: BootstrapInterval): number {
  return ci.resampleCount
}

export function isBootstrapInterval(ci: ConfidenceInterval): ci is BootstrapInterval {
  return ci.method === 'bootstrap'
}

/**
 * Value equality; intervals carry no identity
 */
export function intervalsEqual(a: ConfidenceInterval, b: ConfidenceInterval): boolean {
  if (a.method !== b.method) return false
  if (a.lower !== b.lower || a.upper !== b.upper || a.coverage !== b.coverage) return false
  if (a.method === 'bootstrap' && b.method === 'bootstrap') {
    return a.resampleCount === b.resampleCount
  }
  return true
}

/**
 * Effect Size Results
 * A point estimate bundled with the confidence interval it owns
 */

import { buildBootstrapInterval, type Reducer } from '../interval/bootstrap.ts'
import { buildNormalInterval } from '../interval/normal.ts'
import type { ConfidenceInterval } from '../interval/types.ts'
import type { InterpolationMethod } from '../stats/quantile.ts'
import type { RandomSource } from '../stats/random.ts'
import { cohenDEstimate, glassDeltaEstimate, hedgeGEstimate } from './estimators.ts'

export type EffectSizeKind = 'cohen-d' | 'hedge-g' | 'glass-delta'

export const EFFECT_SIZE_KINDS: readonly EffectSizeKind[] = ['cohen-d', 'hedge-g', 'glass-delta']

export const EFFECT_SIZE_LABELS: Record<EffectSizeKind, string> = {
  'cohen-d': "Cohen's d",
  'hedge-g': "Hedge's g",
  'glass-delta': "Glass's Δ",
}

/**
 * Point-estimate formula for each kind; also the bootstrap reducer
 */
export const REDUCERS: Record<EffectSizeKind, Reducer> = {
  'cohen-d': cohenDEstimate,
  'hedge-g': hedgeGEstimate,
  'glass-delta': glassDeltaEstimate,
}

export interface EffectSize<K extends EffectSizeKind = EffectSizeKind> {
  readonly kind: K
  readonly estimate: number
  readonly interval: ConfidenceInterval
}

export interface EffectSizeOptions {
  /** Two-sided coverage of the interval (default: 0.95) */
  coverage?: number
  /** Resample count; when set the interval is bootstrapped instead of analytic */
  bootstrap?: number
  /** Random source for bootstrap resampling (default: Math.random) */
  random?: RandomSource
  /** Quantile interpolation for bootstrap bounds (default: 'linear') */
  interpolation?: InterpolationMethod
}

export const DEFAULT_COVERAGE = 0.95

export function isEffectSizeKind(value: unknown): value is EffectSizeKind {
  return typeof value === 'string' && (EFFECT_SIZE_KINDS as readonly string[]).includes(value)
}

/**
 * Compute an effect size and its interval.
 * For Glass's Δ, `xs` is the treatment group and `ys` the control group.
 */
export function effectSize<K extends EffectSizeKind>(
  kind: K,
  xs: readonly number[],
  ys: readonly number[],
  options: EffectSizeOptions = {}
): EffectSize<K> {
  const { coverage = DEFAULT_COVERAGE, bootstrap, random, interpolation } = options
  const reducer = REDUCERS[kind]
  const estimate = reducer(xs, ys)

  const interval =
    bootstrap === undefined
      ? buildNormalInterval(xs, ys, estimate, coverage)
      : buildBootstrapInterval(xs, ys, reducer, {
          coverage,
          resampleCount: bootstrap,
          random,
          interpolation,
        })

  return Object.freeze({ kind, estimate, interval })
}

export function cohenD(
  xs: readonly number[],
  ys: readonly number[],
  options?: EffectSizeOptions
): EffectSize<'cohen-d'> {
  return effectSize('cohen-d', xs, ys, options)
}

export function hedgeG(
  xs: readonly number[],
  ys: readonly number[],
  options?: EffectSizeOptions
): EffectSize<'hedge-g'> {
  return effectSize('hedge-g', xs, ys, options)
}

export function glassDelta(
  treatment: readonly number[],
  control: readonly number[],
  options?: EffectSizeOptions
): EffectSize<'glass-delta'> {
  return effectSize('glass-delta', treatment, control, options)
}

/**
 * Default effect size: Cohen's d
 */
export const EffectSize = cohenD

export function effectSizeValue(es: EffectSize): number {
  return es.estimate
}

export function confint(es: EffectSize): ConfidenceInterval {
  return es.interval
}

export function effectSizeCoverage(es: EffectSize): number {
  return es.interval.coverage
}

export type Magnitude = 'negligible' | 'small' | 'medium' | 'large'

/**
 * Conventional thresholds: small 0.2, medium 0.5, large 0.8 (on |estimate|)
 */
export function classifyMagnitude(estimate: number): Magnitude {
  const abs = Math.abs(estimate)
  if (abs < 0.2) return 'negligible'
  if (abs < 0.5) return 'small'
  if (abs < 0.8) return 'medium'
  return 'large'
}

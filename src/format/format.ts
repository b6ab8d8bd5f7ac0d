/**
 * Human-readable formatting
 * Precision is always passed in; nothing here reads global state.
 */

import {
  EFFECT_SIZE_LABELS,
  classifyMagnitude,
  type EffectSize,
  type EffectSizeKind,
  type Magnitude,
} from '../effect/effectSize.ts'
import type { ConfidenceInterval, IntervalMethod } from '../interval/types.ts'

export type ColorName = 'gray' | 'blue' | 'yellow' | 'green'

/**
 * Round to `digits` decimal places; non-finite values pass through
 */
export function roundTo(value: number, digits: number): number {
  if (!Number.isFinite(value)) return value
  const f = 10 ** digits
  return Math.round(value * f) / f
}

/**
 * e.g. `0.95CI (0.1, 0.9)`
 */
export function formatInterval(ci: ConfidenceInterval, precision: number): string {
  return `${ci.coverage}CI (${roundTo(ci.lower, precision)}, ${roundTo(ci.upper, precision)})`
}

/**
 * e.g. `-0.5109, 0.95CI (-1.7706, 0.7487)`
 */
export function formatEffectSize(es: EffectSize, precision: number): string {
  return `${roundTo(es.estimate, precision)}, ${formatInterval(es.interval, precision)}`
}

export function formatMagnitude(magnitude: Magnitude): { text: string; color: ColorName } {
  switch (magnitude) {
    case 'negligible':
      return { text: 'NEGLIGIBLE', color: 'gray' }
    case 'small':
      return { text: 'SMALL', color: 'blue' }
    case 'medium':
      return { text: 'MEDIUM', color: 'yellow' }
    case 'large':
      return { text: 'LARGE', color: 'green' }
  }
}

/**
 * Flat, JSON-safe view of a result (infinite bounds become null)
 */
export interface EffectSizeReport {
  measure: EffectSizeKind
  label: string
  estimate: number
  magnitude: Magnitude
  method: IntervalMethod
  coverage: number
  lower: number | null
  upper: number | null
  resampleCount?: number
}

function finiteOrNull(value: number, precision: number): number | null {
  return Number.isFinite(value) ? roundTo(value, precision) : null
}

export function toReport(es: EffectSize, precision: number): EffectSizeReport {
  const { interval } = es
  const report: EffectSizeReport = {
    measure: es.kind,
    label: EFFECT_SIZE_LABELS[es.kind],
    estimate: roundTo(es.estimate, precision),
    magnitude: classifyMagnitude(es.estimate),
    method: interval.method,
    coverage: interval.coverage,
    lower: finiteOrNull(interval.lower, precision),
    upper: finiteOrNull(interval.upper, precision),
  }
  if (interval.method === 'bootstrap') {
    report.resampleCount = interval.resampleCount
  }
  return report
}

/**
 * Summary lines for plain-text output
 */
export function summaryLines(es: EffectSize, precision: number): string[] {
  const { interval } = es
  const method =
    interval.method === 'bootstrap'
      ? `bootstrap (${interval.resampleCount} resamples)`
      : 'normal approximation'

  return [
    `${EFFECT_SIZE_LABELS[es.kind]}: ${roundTo(es.estimate, precision)}`,
    `Magnitude: ${formatMagnitude(classifyMagnitude(es.estimate)).text}`,
    `Interval: ${formatInterval(interval, precision)}`,
    `Method: ${method}`,
  ]
}

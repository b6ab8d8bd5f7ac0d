/**
 * Tests for result formatting
 */

import { describe, it, expect } from 'vitest'
import {
  roundTo,
  formatInterval,
  formatEffectSize,
  formatMagnitude,
  toReport,
  summaryLines,
} from './format.ts'
import { cohenD, type EffectSize } from '../effect/effectSize.ts'
import { createAnalyticInterval, createBootstrapInterval } from '../interval/types.ts'

const xs = [1, 2, 3, 4, 5]
const ys = [2, 3, 4, 5, 6]

const bootstrapped: EffectSize<'hedge-g'> = {
  kind: 'hedge-g',
  estimate: 0.84567,
  interval: createBootstrapInterval(0.1234, 1.56789, 0.9, 2000),
}

describe('roundTo', () => {
  it('should round to the given decimal places', () => {
    expect(roundTo(-0.5109417, 4)).toBe(-0.5109)
    expect(roundTo(1.56789, 2)).toBe(1.57)
    expect(roundTo(2.5, 0)).toBe(3)
  })

  it('should pass non-finite values through', () => {
    expect(roundTo(Infinity, 3)).toBe(Infinity)
    expect(roundTo(NaN, 3)).toBeNaN()
  })
})

describe('formatInterval', () => {
  it('should prefix the coverage', () => {
    expect(formatInterval(createAnalyticInterval(0.1, 0.9, 0.95), 4)).toBe('0.95CI (0.1, 0.9)')
  })

  it('should print unbounded intervals', () => {
    expect(formatInterval(cohenD(xs, ys, { coverage: 1 }).interval, 4)).toBe(
      '1CI (-Infinity, Infinity)'
    )
  })
})

describe('formatEffectSize', () => {
  it('should print the estimate followed by its interval', () => {
    expect(formatEffectSize(cohenD(xs, ys), 4)).toBe('-0.5109, 0.95CI (-1.7706, 0.7487)')
  })

  it('should respect the precision', () => {
    expect(formatEffectSize(cohenD(xs, ys), 2)).toBe('-0.51, 0.95CI (-1.77, 0.75)')
  })
})

describe('formatMagnitude', () => {
  it('should label and colour each magnitude', () => {
    expect(formatMagnitude('negligible')).toEqual({ text: 'NEGLIGIBLE', color: 'gray' })
    expect(formatMagnitude('small')).toEqual({ text: 'SMALL', color: 'blue' })
    expect(formatMagnitude('medium')).toEqual({ text: 'MEDIUM', color: 'yellow' })
    expect(formatMagnitude('large')).toEqual({ text: 'LARGE', color: 'green' })
  })
})

describe('toReport', () => {
  it('should flatten a normal-interval result', () => {
    expect(toReport(cohenD(xs, ys), 4)).toEqual({
      measure: 'cohen-d',
      label: "Cohen's d",
      estimate: -0.5109,
      magnitude: 'medium',
      method: 'normal',
      coverage: 0.95,
      lower: -1.7706,
      upper: 0.7487,
    })
  })

  it('should include the resample count for a bootstrap interval', () => {
    expect(toReport(bootstrapped, 4)).toEqual({
      measure: 'hedge-g',
      label: "Hedge's g",
      estimate: 0.8457,
      magnitude: 'large',
      method: 'bootstrap',
      coverage: 0.9,
      lower: 0.1234,
      upper: 1.5679,
      resampleCount: 2000,
    })
  })

  it('should replace infinite bounds with null', () => {
    const report = toReport(cohenD(xs, ys, { coverage: 1 }), 4)
    expect(report.lower).toBeNull()
    expect(report.upper).toBeNull()
    expect(JSON.parse(JSON.stringify(report))).toEqual(report)
  })
})

describe('summaryLines', () => {
  it('should describe a normal-interval result', () => {
    expect(summaryLines(cohenD(xs, ys), 4)).toEqual([
      "Cohen's d: -0.5109",
      'Magnitude: MEDIUM',
      'Interval: 0.95CI (-1.7706, 0.7487)',
      'Method: normal approximation',
    ])
  })

  it('should describe a bootstrap result', () => {
    expect(summaryLines(bootstrapped, 4)).toEqual([
      "Hedge's g: 0.8457",
      'Magnitude: LARGE',
      'Interval: 0.9CI (0.1234, 1.5679)',
      'Method: bootstrap (2000 resamples)',
    ])
  })
})

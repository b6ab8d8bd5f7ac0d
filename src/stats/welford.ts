/**
 * Welford's Online Algorithm
 * Single-pass, numerically stable mean and variance for the estimators
 */

export interface WelfordState {
  n: number
  mean: number
  m2: number // Sum of squared deviations
}

/**
 * Create initial Welford state
 */
export function createWelford(): WelfordState {
  return { n: 0, mean: 0, m2: 0 }
}

/**
 * Update Welford state with a new value
 */
export function welfordUpdate(state: WelfordState, x: number): void {
  state.n++
  const delta = x - state.mean
  state.mean += delta / state.n
  state.m2 += delta * (x - state.mean)
}

/**
 * Update Welford state with multiple values
 */
export function welfordUpdateBatch(state: WelfordState, values: ArrayLike<number>): void {
  for (let i = 0; i < values.length; i++) {
    welfordUpdate(state, values[i]!)
  }
}

/**
 * Create Welford state from array (batch initialization)
 */
export function welfordFromArray(values: ArrayLike<number>): WelfordState {
  const state = createWelford()
  welfordUpdateBatch(state, values)
  return state
}

/**
 * Sample variance (n - 1 denominator); NaN below two observations
 */
export function welfordSampleVariance(state: WelfordState): number {
  if (state.n < 2) return NaN
  return state.m2 / (state.n - 1)
}

export function welfordSampleStdDev(state: WelfordState): number {
  return Math.sqrt(welfordSampleVariance(state))
}

/**
 * Sample summary used by the effect-size formulas
 */
export interface SampleSummary {
  n: number
  mean: number
  variance: number // n - 1 denominator
  stdDev: number
}

export function summarize(values: ArrayLike<number>): SampleSummary {
  const state = welfordFromArray(values)
  const variance = welfordSampleVariance(state)
  return {
    n: state.n,
    mean: state.n === 0 ? NaN : state.mean,
    variance,
    stdDev: Math.sqrt(variance),
  }
}

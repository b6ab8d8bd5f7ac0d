/**
 * effect-sizes
 * Cohen's d, Hedge's g and Glass's Δ with normal or bootstrap confidence intervals
 */

export * from './errors.ts'
export * from './stats/index.ts'
export * from './interval/index.ts'
export * from './effect/index.ts'
export * from './format/index.ts'
export * from './config/index.ts'
export { runAnalysis, parseSampleList } from './main.ts'

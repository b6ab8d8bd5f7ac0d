/**
 * Confidence interval engine exports
 */

export {
  createAnalyticInterval,
  createBootstrapInterval,
  assertResampleCount,
  lowerBound,
  upperBound,
  bounds,
  intervalCoverage,
  resampleCount,
  isBootstrapInterval,
  intervalsEqual,
} from './types.ts'
export type {
  IntervalMethod,
  AnalyticInterval,
  BootstrapInterval,
  ConfidenceInterval,
} from './types.ts'

export { buildNormalInterval, effectSizeVariance } from './normal.ts'

export {
  buildBootstrapInterval,
  bootstrapDistribution,
  DEFAULT_RESAMPLE_COUNT,
} from './bootstrap.ts'
export type { Reducer, BootstrapOptions } from './bootstrap.ts'

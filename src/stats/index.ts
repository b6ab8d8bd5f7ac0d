/**
 * Statistics module exports
 */

export {
  createWelford,
  welfordUpdate,
  welfordUpdateBatch,
  welfordFromArray,
  welfordSampleVariance,
  welfordSampleStdDev,
  summarize,
} from './welford.ts'
export type { WelfordState, SampleSummary } from './welford.ts'

export {
  quantile,
  quantileUnsorted,
  quantiles,
  isValidCoverage,
  assertCoverage,
  twoTailedQuantile,
} from './quantile.ts'
export type { InterpolationMethod } from './quantile.ts'

export { normalQuantile, normalCdf, erf } from './normal.ts'

export { seededRandom, bootstrapSample } from './random.ts'
export type { RandomSource } from './random.ts'

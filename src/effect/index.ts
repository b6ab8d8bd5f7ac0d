/**
 * Effect size exports
 */

export {
  pooledStdDev,
  pooledStdDevHedge,
  correction,
  cohenDEstimate,
  hedgeGEstimate,
  glassDeltaEstimate,
} from './estimators.ts'

export {
  effectSize,
  EffectSize,
  cohenD,
  hedgeG,
  glassDelta,
  effectSizeValue,
  confint,
  effectSizeCoverage,
  classifyMagnitude,
  isEffectSizeKind,
  EFFECT_SIZE_KINDS,
  EFFECT_SIZE_LABELS,
  REDUCERS,
  DEFAULT_COVERAGE,
} from './effectSize.ts'
export type {
  EffectSizeKind,
  EffectSizeOptions,
  Magnitude,
} from './effectSize.ts'

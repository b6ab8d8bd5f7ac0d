export {
  roundTo,
  formatInterval,
  formatEffectSize,
  formatMagnitude,
  toReport,
  summaryLines,
} from './format.ts'
export type { ColorName, EffectSizeReport } from './format.ts'

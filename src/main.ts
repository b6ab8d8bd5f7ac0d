/**
 * Analysis runner
 * Turns a validated analysis config into an effect-size result
 */

import type { AnalysisConfig } from './config/types.ts'
import { effectSize, type EffectSize } from './effect/effectSize.ts'
import { debug } from './log.ts'
import { seededRandom } from './stats/random.ts'

/**
 * Parse a comma- or whitespace-separated list of numbers, e.g. "1, 2 3"
 */
export function parseSampleList(text: string): number[] {
  const parts = text
    .split(/[\s,]+/)
    .map((p) => p.trim())
    .filter((p) => p.length > 0)

  return parts.map((p) => {
    const value = Number(p)
    if (!Number.isFinite(value)) {
      throw new Error(`Not a finite number: "${p}"`)
    }
    return value
  })
}

export function runAnalysis(config: AnalysisConfig): EffectSize {
  const { measure, coverage, bootstrap, seed, samples } = config
  const random = bootstrap !== undefined && seed !== undefined ? seededRandom(seed) : undefined

  debug(
    'analysis',
    `${config.name}: ${measure}, coverage=${coverage}, ` +
      (bootstrap === undefined ? 'normal interval' : `bootstrap=${bootstrap}, seed=${seed ?? 'none'}`)
  )

  return effectSize(measure, samples.treatment, samples.control, {
    coverage,
    bootstrap,
    random,
  })
}

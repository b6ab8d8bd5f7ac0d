/**
 * Configuration Types
 * Analysis files describing one effect-size computation
 */

import { EFFECT_SIZE_KINDS, isEffectSizeKind, type EffectSizeKind } from '../effect/effectSize.ts'
import { isValidCoverage } from '../stats/quantile.ts'

/**
 * Two groups; for Glass's Δ `control` supplies the standard deviation
 */
export interface SamplesConfig {
  treatment: number[]
  control: number[]
}

/**
 * Full analysis configuration
 */
export interface AnalysisConfig {
  name: string
  description?: string

  measure: EffectSizeKind
  coverage: number

  // Interval method: bootstrap when a resample count is set, normal otherwise
  bootstrap?: number
  seed?: number

  // Display
  precision: number

  samples: SamplesConfig
}

function validateSample(value: unknown, label: string, errors: string[]): void {
  if (!Array.isArray(value)) {
    errors.push(`samples.${label} must be an array of numbers`)
    return
  }
  if (value.length === 0) {
    errors.push(`samples.${label} must not be empty`)
  }
  value.forEach((v, i) => {
    if (typeof v !== 'number' || !Number.isFinite(v)) {
      errors.push(`samples.${label}[${i}] is not a finite number: ${String(v)}`)
    }
  })
}

/**
 * Validate analysis configuration
 */
export function validateConfig(config: unknown): {
  valid: boolean
  errors: string[]
} {
  const errors: string[] = []

  if (!config || typeof config !== 'object' || Array.isArray(config)) {
    return { valid: false, errors: ['Config must be an object'] }
  }

  const c = config as Record<string, unknown>

  if (c.name !== undefined && typeof c.name !== 'string') {
    errors.push('name must be a string')
  }

  if (c.description !== undefined && typeof c.description !== 'string') {
    errors.push('description must be a string')
  }

  if (c.measure !== undefined && !isEffectSizeKind(c.measure)) {
    errors.push(`measure must be one of ${EFFECT_SIZE_KINDS.join(', ')}`)
  }

  if (c.coverage !== undefined && (typeof c.coverage !== 'number' || !isValidCoverage(c.coverage))) {
    errors.push('coverage must be a number in [0, 1]')
  }

  if (
    c.bootstrap !== undefined &&
    (typeof c.bootstrap !== 'number' || !Number.isInteger(c.bootstrap) || c.bootstrap <= 1)
  ) {
    errors.push('bootstrap must be an integer greater than 1')
  }

  if (c.seed !== undefined && (typeof c.seed !== 'number' || !Number.isInteger(c.seed))) {
    errors.push('seed must be an integer')
  }

  if (
    c.precision !== undefined &&
    (typeof c.precision !== 'number' ||
      !Number.isInteger(c.precision) ||
      c.precision < 0 ||
      c.precision > 15)
  ) {
    errors.push('precision must be an integer between 0 and 15')
  }

  if (!c.samples || typeof c.samples !== 'object') {
    errors.push('Config must have a samples object')
  } else {
    const s = c.samples as Record<string, unknown>
    validateSample(s.treatment, 'treatment', errors)
    validateSample(s.control, 'control', errors)
  }

  return { valid: errors.length === 0, errors }
}

/**
 * Defaults for everything but the samples
 */
export const DEFAULT_CONFIG: Omit<AnalysisConfig, 'samples'> = {
  name: 'analysis',
  measure: 'cohen-d',
  coverage: 0.95,
  precision: 4,
}

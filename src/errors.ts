/**
 * Error taxonomy
 * Every failure is a synchronous input-validation error raised before any
 * interval is constructed. Nothing here is transient, so nothing is retried.
 */

export type EffectSizeErrorCode =
  | 'INVALID_COVERAGE'
  | 'INVALID_RESAMPLE_COUNT'
  | 'INVERTED_BOUNDS'
  | 'DEGENERATE_SAMPLE'

export class EffectSizeError extends Error {
  constructor(
    public readonly code: EffectSizeErrorCode,
    message: string
  ) {
    super(message)
    this.name = 'EffectSizeError'
  }
}

/**
 * Coverage outside [0, 1]
 */
export class InvalidCoverageError extends EffectSizeError {
  constructor(public readonly coverage: number) {
    super('INVALID_COVERAGE', `Coverage must be in [0, 1], got ${coverage}`)
    this.name = 'InvalidCoverageError'
  }
}

/**
 * Bootstrap resample count that cannot define a distribution
 */
export class InvalidResampleCountError extends EffectSizeError {
  constructor(public readonly resampleCount: number) {
    super(
      'INVALID_RESAMPLE_COUNT',
      `Resample count must be an integer greater than 1, got ${resampleCount}`
    )
    this.name = 'InvalidResampleCountError'
  }
}

export class InvertedBoundsError extends EffectSizeError {
  constructor(
    public readonly lower: number,
    public readonly upper: number
  ) {
    super('INVERTED_BOUNDS', `Lower bound ${lower} is not <= upper bound ${upper}`)
    this.name = 'InvertedBoundsError'
  }
}

/**
 * Sample too small for the operation (empty for resampling, fewer than two
 * values for a variance)
 */
export class DegenerateSampleError extends EffectSizeError {
  constructor(
    public readonly size: number,
    reason: string
  ) {
    super('DEGENERATE_SAMPLE', reason)
    this.name = 'DegenerateSampleError'
  }
}

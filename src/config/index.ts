/**
 * Configuration module exports
 */

export { validateConfig, DEFAULT_CONFIG } from './types.ts'
export type { AnalysisConfig, SamplesConfig } from './types.ts'

export {
  loadConfig,
  loadConfigFromString,
  mergeWithDefaults,
  generateExampleConfig,
} from './loader.ts'

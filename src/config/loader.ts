/**
 * Configuration Loader
 * Loads and validates YAML/JSON analysis files
 */

import { readFileSync, existsSync } from 'fs'
import { parse as parseYaml } from 'yaml'
import {
  validateConfig,
  DEFAULT_CONFIG,
  type AnalysisConfig,
  type SamplesConfig,
} from './types.ts'

type ValidatedConfig = Partial<Omit<AnalysisConfig, 'samples'>> & { samples: SamplesConfig }

function checked(parsed: unknown): AnalysisConfig {
  const validation = validateConfig(parsed)
  if (!validation.valid) {
    throw new Error(`Invalid analysis config:\n${validation.errors.join('\n')}`)
  }
  return mergeWithDefaults(parsed as ValidatedConfig)
}

/**
 * Load analysis config from file
 * Supports .yaml, .yml, and .json extensions
 */
export function loadConfig(path: string): AnalysisConfig {
  if (!existsSync(path)) {
    throw new Error(`Config file not found: ${path}`)
  }

  const content = readFileSync(path, 'utf-8')
  const ext = path.toLowerCase().split('.').pop()

  let parsed: unknown

  if (ext === 'json') {
    try {
      parsed = JSON.parse(content)
    } catch (e) {
      throw new Error(`Failed to parse JSON: ${(e as Error).message}`)
    }
  } else {
    // YAML is a superset of JSON, so anything else goes through the YAML parser
    try {
      parsed = parseYaml(content)
    } catch (e) {
      throw new Error(`Failed to parse YAML: ${(e as Error).message}`)
    }
  }

  return checked(parsed)
}

/**
 * Load analysis config from string
 */
export function loadConfigFromString(
  content: string,
  format: 'json' | 'yaml' = 'yaml'
): AnalysisConfig {
  const parsed: unknown = format === 'json' ? JSON.parse(content) : parseYaml(content)
  return checked(parsed)
}

/**
 * Merge config with defaults
 */
export function mergeWithDefaults(config: ValidatedConfig): AnalysisConfig {
  return {
    ...DEFAULT_CONFIG,
    ...config,
    samples: {
      treatment: [...config.samples.treatment],
      control: [...config.samples.control],
    },
  }
}

/**
 * Generate example analysis YAML
 */
export function generateExampleConfig(): string {
  return `# Effect size analysis
name: example
description: Two groups shifted by one unit

# cohen-d | hedge-g | glass-delta
measure: cohen-d
coverage: 0.95

# Uncomment for a bootstrap interval instead of the normal approximation
# bootstrap: 2000
# seed: 42

precision: 4

samples:
  treatment: [1, 2, 3, 4, 5]
  control: [2, 3, 4, 5, 6]
`
}

#!/usr/bin/env tsx
/**
 * effect-size CLI
 * Effect size with a confidence interval for two samples
 */

import { realpathSync } from 'fs'
import { fileURLToPath } from 'url'
import { parseArgs } from 'util'
import { loadConfig, generateExampleConfig } from './config/loader.ts'
import { DEFAULT_CONFIG, validateConfig, type AnalysisConfig } from './config/types.ts'
import { EFFECT_SIZE_KINDS, isEffectSizeKind } from './effect/effectSize.ts'
import { EffectSizeError } from './errors.ts'
import { formatEffectSize, toReport } from './format/format.ts'
import { debug, warn } from './log.ts'
import { parseSampleList, runAnalysis } from './main.ts'

const VERSION = '0.1.0'

const HELP = `
effect-size - Effect sizes with confidence intervals

Usage:
  effect-size --xs <list> --ys <list> [options]
  effect-size --config <file> [options]

Options:
  -x, --xs <list>         First (treatment) sample, e.g. "1,2,3"
  -y, --ys <list>         Second (control) sample
  -m, --measure <kind>    cohen-d (default), hedge-g or glass-delta
  -c, --coverage <level>  Interval coverage in [0, 1] (default: 0.95)
  -b, --bootstrap <n>     Bootstrap the interval with n resamples
  -s, --seed <int>        Seed for reproducible bootstrap resampling
  -p, --precision <int>   Decimal places in the output (default: 4)
  -f, --config <file>     Load analysis from YAML/JSON file
  -j, --json              Print the result as JSON
  -t, --text              Print a single plain-text line
  -g, --generate          Generate example analysis file to stdout
  -v, --version           Show version
  -h, --help              Show this help

Examples:
  effect-size -x 1,2,3,4,5 -y 2,3,4,5,6
  effect-size -f analysis.yaml --json
  effect-size -x 1,2,3,4,5 -y 2,3,4,5,6 -b 2000 -s 42
  effect-size -g > analysis.yaml

Environment:
  EFFECTSIZE_DEBUG=1     Enable debug logging
`

export interface CLIOptions {
  xs?: string
  ys?: string
  measure?: string
  coverage?: string
  bootstrap?: string
  seed?: string
  precision?: string
  config?: string
  json: boolean
  text: boolean
  generate: boolean
  version: boolean
  help: boolean
}

export function parseCliArgs(args: string[] = process.argv.slice(2)): CLIOptions {
  const { values } = parseArgs({
    args,
    options: {
      xs: { type: 'string', short: 'x' },
      ys: { type: 'string', short: 'y' },
      measure: { type: 'string', short: 'm' },
      coverage: { type: 'string', short: 'c' },
      bootstrap: { type: 'string', short: 'b' },
      seed: { type: 'string', short: 's' },
      precision: { type: 'string', short: 'p' },
      config: { type: 'string', short: 'f' },
      json: { type: 'boolean', short: 'j', default: false },
      text: { type: 'boolean', short: 't', default: false },
      generate: { type: 'boolean', short: 'g', default: false },
      version: { type: 'boolean', short: 'v', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
    allowPositionals: false,
  })

  return {
    xs: values.xs,
    ys: values.ys,
    measure: values.measure,
    coverage: values.coverage,
    bootstrap: values.bootstrap,
    seed: values.seed,
    precision: values.precision,
    config: values.config,
    json: values.json ?? false,
    text: values.text ?? false,
    generate: values.generate ?? false,
    version: values.version ?? false,
    help: values.help ?? false,
  }
}

function numberFlag(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined
  const n = Number(value)
  if (value.trim() === '' || Number.isNaN(n)) {
    throw new Error(`--${flag} expects a number, got "${value}"`)
  }
  return n
}

/**
 * Build the analysis config: file (if any), then defaults, then flags
 */
export function resolveConfig(options: CLIOptions): AnalysisConfig {
  const base: Partial<AnalysisConfig> = options.config ? loadConfig(options.config) : DEFAULT_CONFIG

  const measure = options.measure ?? base.measure ?? DEFAULT_CONFIG.measure
  if (!isEffectSizeKind(measure)) {
    throw new Error(`--measure must be one of ${EFFECT_SIZE_KINDS.join(', ')}`)
  }

  const treatment = options.xs !== undefined ? parseSampleList(options.xs) : base.samples?.treatment
  const control = options.ys !== undefined ? parseSampleList(options.ys) : base.samples?.control
  if (!treatment || !control) {
    throw new Error('Both samples are required: pass --xs and --ys, or --config')
  }

  const config: AnalysisConfig = {
    ...DEFAULT_CONFIG,
    ...base,
    measure,
    coverage: numberFlag(options.coverage, 'coverage') ?? base.coverage ?? DEFAULT_CONFIG.coverage,
    bootstrap: numberFlag(options.bootstrap, 'bootstrap') ?? base.bootstrap,
    seed: numberFlag(options.seed, 'seed') ?? base.seed,
    precision: numberFlag(options.precision, 'precision') ?? base.precision ?? DEFAULT_CONFIG.precision,
    samples: { treatment, control },
  }

  const validation = validateConfig(config)
  if (!validation.valid) {
    throw new Error(`Invalid analysis:\n${validation.errors.join('\n')}`)
  }
  return config
}

export async function main(args: string[] = process.argv.slice(2)): Promise<number> {
  const options = parseCliArgs(args)

  // Handle simple flags first
  if (options.help) {
    console.log(HELP)
    return 0
  }

  if (options.version) {
    console.log(`effect-size v${VERSION}`)
    return 0
  }

  if (options.generate) {
    console.log(generateExampleConfig())
    return 0
  }

  let config: AnalysisConfig
  try {
    config = resolveConfig(options)
    debug('cli', `Resolved analysis: ${config.name}`)
    if (config.seed !== undefined && config.bootstrap === undefined) {
      warn('cli', 'seed is ignored without a bootstrap resample count')
    }
  } catch (e) {
    console.error(`Error: ${(e as Error).message}`)
    return 1
  }

  try {
    const result = runAnalysis(config)

    if (options.json) {
      console.log(JSON.stringify(toReport(result, config.precision), null, 2))
    } else if (options.text) {
      console.log(formatEffectSize(result, config.precision))
    } else {
      // Dynamic import to avoid loading React for JSON/text output
      const { renderReport } = await import('./tui/index.tsx')
      await renderReport({
        result,
        precision: config.precision,
        title: config.name === DEFAULT_CONFIG.name ? undefined : config.name,
        description: config.description,
        sizes: { treatment: config.samples.treatment.length, control: config.samples.control.length },
      })
    }
    return 0
  } catch (e) {
    if (e instanceof EffectSizeError) {
      console.error(`Error [${e.code}]: ${e.message}`)
      return 1
    }
    throw e
  }
}

function isEntryPoint(): boolean {
  const entry = process.argv[1]
  if (!entry) return false
  try {
    return realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url))
  } catch {
    return false
  }
}

// Run if called directly
if (isEntryPoint()) {
  main().then(
    (code) => {
      process.exitCode = code
    },
    (e: unknown) => {
      console.error(`Fatal error: ${e instanceof Error ? e.message : String(e)}`)
      process.exitCode = 1
    }
  )
}

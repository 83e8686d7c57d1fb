import { writeFile } from 'fs/promises'
import type { AnalysisConfig, AnalysisResult, InputType } from './domain/types'
import { InvalidArgumentError } from './domain/errors'
import { loadAnalysisConfig } from './config'
import { analyzeFolder, analyzePiece, isInputType } from './services/analysis'
import { formatResult, localResultsToCsv, resultToJson, resultsToCsv } from './services/reports'
import { getLogger } from './utils/logger'

const logger = getLogger('cli')

export const USAGE = `
music-entropy - entropy and Lempel-Ziv complexity of melodies and rhythms

Usage:
  music-entropy analyze --input <file> --input-type <midi|json|csv> [options]
  music-entropy analyze-batch --input <folder> --input-type <midi|json|csv> [options]

Options:
  --markov-order <k>     Markov order k (default 1)
  --window-size <n>      Window size for local metrics (default 16)
  --window-step <n>      Stride for local metrics (default 8)
  --time-unit <beats>    Beat resolution of the MIDI rhythm grid (default 0.25)
  --local                Compute local entropies
  --output-csv <path>    Save global metrics as CSV
  --local-csv <path>     Save local metrics as CSV
  --output-json <path>   Save a JSON summary (analyze only)
  --pattern <glob>       Glob pattern inside the folder (analyze-batch only, default *)
`

export type Command = 'analyze' | 'analyze-batch'

export interface CliOptions {
  command: Command
  input: string
  inputType: InputType
  pattern: string
  overrides: Partial<AnalysisConfig>
  outputCsv?: string
  localCsv?: string
  outputJson?: string
}

// ─────────────────────────────────────────────────────────────────────────────
// Argument Parsing
// ─────────────────────────────────────────────────────────────────────────────

const VALUE_FLAGS = new Set([
  '--input',
  '--input-type',
  '--markov-order',
  '--window-size',
  '--window-step',
  '--time-unit',
  '--output-csv',
  '--local-csv',
  '--output-json',
  '--pattern',
])

function parseNumberFlag(flag: string, raw: string): number {
  const value = Number(raw)
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new InvalidArgumentError(`${flag} expects a number, got "${raw}"`)
  }
  return value
}

/**
 * Parse `<command> [--flag value | --flag=value | --local]...`.
 *
 * @throws {InvalidArgumentError} on unknown commands or flags, missing values
 * and missing required flags
 */
export function parseArgs(argv: readonly string[]): CliOptions {
  const [command, ...rest] = argv
  if (command !== 'analyze' && command !== 'analyze-batch') {
    throw new InvalidArgumentError(command ? `Unknown command: ${command}` : 'Missing command')
  }

  const values = new Map<string, string>()
  let local = false

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i]
    const eq = arg.indexOf('=')
    const flag = eq >= 0 ? arg.slice(0, eq) : arg

    if (flag === '--local' && eq < 0) {
      local = true
      continue
    }
    if (!VALUE_FLAGS.has(flag)) {
      throw new InvalidArgumentError(`Unknown option: ${arg}`)
    }
    if (flag === '--output-json' && command === 'analyze-batch') {
      throw new InvalidArgumentError('--output-json is only available for analyze')
    }
    if (flag === '--pattern' && command === 'analyze') {
      throw new InvalidArgumentError('--pattern is only available for analyze-batch')
    }

    if (eq >= 0) {
      values.set(flag, arg.slice(eq + 1))
    } else {
      const value = rest[i + 1]
      if (value === undefined) {
        throw new InvalidArgumentError(`Missing value for ${flag}`)
      }
      values.set(flag, value)
      i++
    }
  }

  const input = values.get('--input')
  if (!input) throw new InvalidArgumentError('--input is required')

  const inputType = values.get('--input-type')?.toLowerCase()
  if (!inputType) throw new InvalidArgumentError('--input-type is required')
  if (!isInputType(inputType)) {
    throw new InvalidArgumentError(`--input-type must be one of midi, json, csv; got "${inputType}"`)
  }

  const overrides: Partial<AnalysisConfig> = {}
  const markovOrder = values.get('--markov-order')
  if (markovOrder !== undefined) overrides.markovOrder = parseNumberFlag('--markov-order', markovOrder)
  const windowSize = values.get('--window-size')
  if (windowSize !== undefined) overrides.windowSize = parseNumberFlag('--window-size', windowSize)
  const windowStep = values.get('--window-step')
  if (windowStep !== undefined) overrides.windowStep = parseNumberFlag('--window-step', windowStep)
  const timeUnit = values.get('--time-unit')
  if (timeUnit !== undefined) overrides.timeUnit = parseNumberFlag('--time-unit', timeUnit)
  if (local) overrides.computeLocal = true

  return {
    command,
    input,
    inputType,
    pattern: values.get('--pattern') ?? '*',
    overrides,
    outputCsv: values.get('--output-csv'),
    localCsv: values.get('--local-csv'),
    outputJson: values.get('--output-json'),
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Commands
// ─────────────────────────────────────────────────────────────────────────────

async function saveReports(options: CliOptions, results: AnalysisResult[]): Promise<void> {
  if (options.outputCsv) {
    await writeFile(options.outputCsv, resultsToCsv(results) + '\n', 'utf-8')
    logger.info(`Global metrics CSV saved: ${options.outputCsv}`)
  }
  if (options.localCsv) {
    const csv = localResultsToCsv(results)
    if (csv === undefined) {
      logger.warn('No local metrics to save; run with --local to compute them')
    } else {
      await writeFile(options.localCsv, csv + '\n', 'utf-8')
      logger.info(`Local metrics CSV saved: ${options.localCsv}`)
    }
  }
}

async function handleAnalyze(options: CliOptions, config: AnalysisConfig): Promise<number> {
  const result = await analyzePiece(options.input, options.inputType, config)
  console.log(formatResult(result))
  await saveReports(options, [result])
  if (options.outputJson) {
    await writeFile(options.outputJson, resultToJson(result), 'utf-8')
    logger.info(`JSON summary saved: ${options.outputJson}`)
  }
  return 0
}

async function handleAnalyzeBatch(options: CliOptions, config: AnalysisConfig): Promise<number> {
  const results = await analyzeFolder(options.input, options.inputType, config, options.pattern)
  if (results.length === 0) {
    console.error('No files processed.')
    return 1
  }
  for (const result of results) {
    console.log(formatResult(result))
  }
  await saveReports(options, results)
  return 0
}

/**
 * Run the CLI and resolve with the process exit code.
 */
export async function runCli(argv: readonly string[]): Promise<number> {
  let options: CliOptions
  let config: AnalysisConfig
  try {
    options = parseArgs(argv)
    config = loadAnalysisConfig(options.overrides)
  } catch (err) {
    if (err instanceof InvalidArgumentError) {
      console.error(`Error: ${err.message}`)
      console.error(USAGE)
      return 1
    }
    throw err
  }

  try {
    return options.command === 'analyze'
      ? await handleAnalyze(options, config)
      : await handleAnalyzeBatch(options, config)
  } catch (err) {
    logger.error(err)
    return 1
  }
}

import { stat } from 'fs/promises'
import path from 'path'
import fg from 'fast-glob'
import type {
  AnalysisConfig,
  AnalysisResult,
  InputType,
  Melody,
  Rhythm,
  StandardizedSequences,
} from '../domain/types'
import { InvalidArgumentError, SequenceFileNotFoundError } from '../domain/errors'
import { DEFAULT_ANALYSIS_CONFIG } from '../config'
import { getLogger } from '../utils/logger'
import {
  markovEntropy,
  maxEntropy,
  predictabilityIndex,
  redundancy,
  shannonEntropy,
  slidingWindowEntropies,
} from './entropy'
import { lempelZivComplexity, normalizedLzc } from './lempelZiv'
import { encodeSequences } from './encoding'
import { loadTextSequence } from './textLoader'
import { loadMidi } from './midiLoader'

const logger = getLogger('analysis')

// ─────────────────────────────────────────────────────────────────────────────
// Analysis: load a piece, standardize it and compute every metric
// ─────────────────────────────────────────────────────────────────────────────

export const INPUT_TYPES: readonly InputType[] = ['midi', 'json', 'csv']

const SUFFIXES: Record<InputType, readonly string[]> = {
  midi: ['.mid', '.midi'],
  json: ['.json'],
  csv: ['.csv'],
}

export function isInputType(value: string): value is InputType {
  return INPUT_TYPES.some((type) => type === value)
}

function parseInputType(inputType: string): InputType {
  const normalized = inputType.toLowerCase()
  if (!isInputType(normalized)) {
    throw new InvalidArgumentError(`Unsupported input type: ${inputType}`)
  }
  return normalized
}

// ─────────────────────────────────────────────────────────────────────────────
// Metrics
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Compute all metrics for already-loaded sequences.
 *
 * Entropies are measured on the melody; Hmax uses the number of distinct
 * melody symbols, and both redundancy and IP compare against the order-k
 * entropy. Lempel-Ziv complexity is measured on the rhythm.
 */
export function analyzeSequences(
  melody: Melody,
  rhythm: Rhythm,
  config: AnalysisConfig = DEFAULT_ANALYSIS_CONFIG,
  piecePath: string = ''
): AnalysisResult {
  const h0 = shannonEntropy(melody)
  const hk = markovEntropy(melody, config.markovOrder)
  const hmax = maxEntropy(new Set(melody).size)

  const result: AnalysisResult = {
    path: piecePath,
    h0,
    hk,
    hmax,
    redundancy: redundancy(hmax, hk),
    lzc: lempelZivComplexity(rhythm),
    lzcNormalized: normalizedLzc(rhythm),
    ip: predictabilityIndex(hk, hmax),
  }

  if (config.computeLocal) {
    const windows = slidingWindowEntropies(
      melody,
      config.windowSize,
      config.windowStep,
      config.markovOrder
    )
    result.local = windows.map(({ h0: windowH0, hk: windowHk }, window) => ({
      window,
      h0: windowH0,
      hk: windowHk,
    }))
  }

  return result
}

// ─────────────────────────────────────────────────────────────────────────────
// Pieces and Folders
// ─────────────────────────────────────────────────────────────────────────────

async function loadSequences(
  piecePath: string,
  inputType: InputType,
  config: AnalysisConfig
): Promise<StandardizedSequences> {
  const raw =
    inputType === 'midi'
      ? await loadMidi(piecePath, { timeUnit: config.timeUnit })
      : await loadTextSequence(piecePath)
  return encodeSequences(raw.melody, raw.rhythm)
}

/**
 * Analyze a single file.
 *
 * @throws {InvalidArgumentError} for an unknown input type
 */
export async function analyzePiece(
  piecePath: string,
  inputType: string,
  config: AnalysisConfig = DEFAULT_ANALYSIS_CONFIG
): Promise<AnalysisResult> {
  const type = parseInputType(inputType)
  const { melody, rhythm } = await loadSequences(piecePath, type, config)
  logger.debug(`Analyzing ${piecePath}: ${melody.length} melody symbols, ${rhythm.length} rhythm steps`)
  return analyzeSequences(melody, rhythm, config, piecePath)
}

/**
 * Analyze every file in `folder` matching `pattern` whose suffix fits the
 * input type, in path order.
 */
export async function analyzeFolder(
  folder: string,
  inputType: string,
  config: AnalysisConfig = DEFAULT_ANALYSIS_CONFIG,
  pattern: string = '*'
): Promise<AnalysisResult[]> {
  const type = parseInputType(inputType)

  try {
    if (!(await stat(folder)).isDirectory()) {
      throw new InvalidArgumentError(`Not a folder: ${folder}`)
    }
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new SequenceFileNotFoundError(folder)
    }
    throw err
  }

  const matches = await fg(pattern, { cwd: folder, onlyFiles: true })
  const files = matches
    .filter((file) => SUFFIXES[type].includes(path.extname(file).toLowerCase()))
    .sort()
    .map((file) => path.join(folder, file))

  logger.info(`Found ${files.length} ${type} file(s) in ${folder}`)

  const results: AnalysisResult[] = []
  for (const file of files) {
    results.push(await analyzePiece(file, type, config))
  }
  return results
}

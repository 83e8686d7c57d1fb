import dotenv from 'dotenv'
import type { AnalysisConfig } from '../domain/types'
import { InvalidArgumentError } from '../domain/errors'

dotenv.config()

export const DEFAULT_ANALYSIS_CONFIG: Readonly<AnalysisConfig> = {
  markovOrder: 1,
  windowSize: 16,
  windowStep: 8,
  timeUnit: 0.25,
  computeLocal: false,
}

type Env = Record<string, string | undefined>

function getEnvInt(env: Env, name: string, defaultValue: number): number {
  const raw = env[name]
  if (raw === undefined || raw.trim() === '') return defaultValue
  const value = Number(raw)
  if (!Number.isInteger(value)) {
    throw new InvalidArgumentError(`${name} must be an integer, got "${raw}"`)
  }
  return value
}

function getEnvFloat(env: Env, name: string, defaultValue: number): number {
  const raw = env[name]
  if (raw === undefined || raw.trim() === '') return defaultValue
  const value = Number(raw)
  if (!Number.isFinite(value)) {
    throw new InvalidArgumentError(`${name} must be a number, got "${raw}"`)
  }
  return value
}

function getEnvBool(env: Env, name: string, defaultValue: boolean): boolean {
  const raw = env[name]
  if (raw === undefined || raw.trim() === '') return defaultValue
  return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase())
}

/**
 * Build the analysis configuration: defaults, then environment
 * (MARKOV_ORDER, WINDOW_SIZE, WINDOW_STEP, TIME_UNIT, COMPUTE_LOCAL), then
 * explicit overrides (leave a key out rather than setting it to undefined).
 * The result is validated before it is returned.
 */
export function loadAnalysisConfig(
  overrides: Partial<AnalysisConfig> = {},
  env: Env = process.env
): AnalysisConfig {
  const fromEnv: AnalysisConfig = {
    markovOrder: getEnvInt(env, 'MARKOV_ORDER', DEFAULT_ANALYSIS_CONFIG.markovOrder),
    windowSize: getEnvInt(env, 'WINDOW_SIZE', DEFAULT_ANALYSIS_CONFIG.windowSize),
    windowStep: getEnvInt(env, 'WINDOW_STEP', DEFAULT_ANALYSIS_CONFIG.windowStep),
    timeUnit: getEnvFloat(env, 'TIME_UNIT', DEFAULT_ANALYSIS_CONFIG.timeUnit),
    computeLocal: getEnvBool(env, 'COMPUTE_LOCAL', DEFAULT_ANALYSIS_CONFIG.computeLocal),
  }

  const config: AnalysisConfig = { ...fromEnv, ...overrides }
  validateAnalysisConfig(config)
  return config
}

export function validateAnalysisConfig(config: AnalysisConfig): void {
  if (!Number.isInteger(config.markovOrder) || config.markovOrder < 0) {
    throw new InvalidArgumentError('markovOrder must be a non-negative integer.')
  }
  if (!Number.isInteger(config.windowSize) || config.windowSize <= 0) {
    throw new InvalidArgumentError('windowSize must be a positive integer.')
  }
  if (!Number.isInteger(config.windowStep) || config.windowStep <= 0) {
    throw new InvalidArgumentError('windowStep must be a positive integer.')
  }
  if (!(config.timeUnit > 0)) {
    throw new InvalidArgumentError('timeUnit must be positive.')
  }
}

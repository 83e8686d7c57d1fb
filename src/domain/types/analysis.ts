import type { LocalWindowMetric } from './metrics'

export type InputType = 'midi' | 'json' | 'csv'

export interface AnalysisConfig {
  /** Context length k for the conditional entropy */
  markovOrder: number
  /** Window length for local entropies, in symbols */
  windowSize: number
  /** Stride between consecutive windows, in symbols */
  windowStep: number
  /** Rhythm grid resolution in beats (0.25 = sixteenth notes) */
  timeUnit: number
  /** Whether to compute the sliding-window decomposition */
  computeLocal: boolean
}

export interface AnalysisResult {
  path: string
  h0: number
  hk: number
  hmax: number
  redundancy: number
  lzc: number
  lzcNormalized: number
  ip: number
  local?: LocalWindowMetric[]
}

export interface MidiLoadOptions {
  /** Rhythm grid resolution in beats. @default 0.25 */
  timeUnit?: number
  /** Track to read; the track with the most notes when omitted */
  trackIndex?: number
}

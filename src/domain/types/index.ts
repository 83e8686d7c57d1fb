export type {
  SequenceSymbol,
  Melody,
  RhythmValue,
  Rhythm,
  RawSequences,
  StandardizedSequences,
} from './sequences'

export type { WindowEntropy, LocalWindowMetric } from './metrics'

export type { InputType, AnalysisConfig, AnalysisResult, MidiLoadOptions } from './analysis'

// Engines
export {
  shannonEntropy,
  markovEntropy,
  maxEntropy,
  redundancy,
  predictabilityIndex,
  slidingWindowEntropies,
} from './services/entropy'
export { lempelZivComplexity, normalizedLzc } from './services/lempelZiv'

// Loading and standardization
export { noteNameToMidi, standardizeMelody, standardizeRhythm, encodeSequences } from './services/encoding'
export { loadTextSequence, parseTextSequence, type TextFormat } from './services/textLoader'
export { loadMidi, parseMidi, intervalsToRhythm, selectMelodyTrack, type BeatInterval } from './services/midiLoader'

// Analysis and reports
export { analyzeSequences, analyzePiece, analyzeFolder, isInputType, INPUT_TYPES } from './services/analysis'
export {
  resultToRecord,
  resultsToCsv,
  localResultsToCsv,
  resultToJson,
  formatResult,
  type GlobalMetricRecord,
} from './services/reports'

// Configuration and errors
export { DEFAULT_ANALYSIS_CONFIG, loadAnalysisConfig, validateAnalysisConfig } from './config'
export { InvalidArgumentError, SequenceFormatError, SequenceFileNotFoundError } from './domain/errors'

export type * from './domain/types'
